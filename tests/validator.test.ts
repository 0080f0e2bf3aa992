import { expect, test } from "vitest";
import { ConfigStore } from "../src/config-store.ts";
import { ConfigurationError } from "../src/errors.ts";
import { isReachable, validateConfig } from "../src/validator.ts";
import { catchError } from "./helpers.ts";

function createStore() {
	return new ConfigStore(["A", "B", "C"], ["x"]);
}

test("unreachable and dead-end states", () => {
	const store = createStore();
	store.transitions[0][0] = 1;
	store.allowed[0][0] = true;

	expect(isReachable(store, 1)).toBe(true);
	expect(isReachable(store, 2)).toBe(false);
	// C is unreachable, not reported again as dead end
	expect(validateConfig(store)).toEqual({ unreachable: [2], deadEnds: [1] });
});

test("self transitions are not exits", () => {
	const store = createStore();
	store.transitions[0][0] = 1;
	store.allowed[0][0] = true;
	store.transitions[0][1] = 1;
	store.allowed[0][1] = true;
	expect(validateConfig(store).deadEnds).toEqual([1]);

	store.allowed[0][1] = false;
	store.stateInfo[1].inner.push({ event: 0, nextState: 1, active: false });
	expect(validateConfig(store).deadEnds).toEqual([1]);

	store.stateInfo[1].inner[0].nextState = 2;
	expect(validateConfig(store)).toEqual({ unreachable: [], deadEnds: [2] });
});

test("timeouts and pass-states reach and leave", () => {
	const store = createStore();
	store.stateInfo[0].timeout = { enabled: true, duration: 1, unit: "sec", nextState: 1 };
	store.stateInfo[1].passState = 2;
	store.stateInfo[2].timeout = { enabled: true, duration: 1, unit: "ms", nextState: 0 };
	expect(validateConfig(store)).toEqual({ unreachable: [], deadEnds: [] });
});

test("pass-state conflicts throw with a code", () => {
	const selfPass = createStore();
	selfPass.stateInfo[0].passState = 0;
	const err = catchError(() => validateConfig(selfPass));
	expect(err).toBeInstanceOf(ConfigurationError);
	expect(err).toMatchObject({
		code: "same-pass-state",
		message:
			"fsm: configuration error in validateConfig(): state 0 (A) pass-state cannot lead to itself",
	});

	const timed = createStore();
	timed.stateInfo[1].passState = 2;
	timed.stateInfo[1].timeout = { enabled: true, duration: 1, unit: "sec", nextState: 0 };
	expect(catchError(() => validateConfig(timed))).toMatchObject({
		code: "timeout-and-pass-state",
	});

	const chain = createStore();
	chain.stateInfo[1].passState = 2;
	chain.stateInfo[2].passState = 0;
	expect(catchError(() => validateConfig(chain))).toMatchObject({
		code: "pass-state-chain",
		message:
			"fsm: configuration error in validateConfig(): state 1 (B) cannot be followed by another pass-state",
	});
});
