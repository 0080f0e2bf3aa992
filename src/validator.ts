import type { ConfigStore } from "./config-store.ts";
import { ConfigurationError } from "./errors.ts";

/** Non-fatal findings of `validateConfig()`, as state indices in ascending order. */
export type ValidationReport = {
	unreachable: number[];
	deadEnds: number[];
};

/**
 * Returns true if some other state leads to `state` through an allowed
 * transition, a timeout, a pass-state link or an inner transition.
 */
export function isReachable<TState extends string, TEvent extends string, TArg>(
	store: ConfigStore<TState, TEvent, TArg>,
	state: number
): boolean {
	for (let from = 0; from < store.stateCount; from++) {
		if (from === state) continue;

		for (let ev = 0; ev < store.eventCount; ev++) {
			if (store.allowed[ev][from] && store.transitions[ev][from] === state) {
				return true;
			}
		}

		const info = store.stateInfo[from];
		if (info.timeout.enabled && info.timeout.nextState === state) return true;
		if (info.passState === state) return true;
		if (info.inner.some((t) => t.nextState === state)) return true;
	}
	return false;
}

function hasExit<TState extends string, TEvent extends string, TArg>(
	store: ConfigStore<TState, TEvent, TArg>,
	state: number
): boolean {
	const info = store.stateInfo[state];
	if (info.timeout.enabled || info.passState !== null) return true;
	for (let ev = 0; ev < store.eventCount; ev++) {
		if (store.allowed[ev][state] && store.transitions[ev][state] !== state) {
			return true;
		}
	}
	return info.inner.some((t) => t.nextState !== state);
}

/**
 * Checks a configuration before the machine starts.
 *
 * Conflicting transition kinds throw a `ConfigurationError` carrying a
 * `code`. Unreachable and dead-end states are only reported: a state that is
 * unreachable by static analysis may still be entered by means the store does
 * not describe, and a dead end may be the intended final state.
 * A state reported unreachable is not reported again as a dead end.
 */
export function validateConfig<
	TState extends string,
	TEvent extends string,
	TArg
>(store: ConfigStore<TState, TEvent, TArg>): ValidationReport {
	const op = "validateConfig";

	for (let s = 0; s < store.stateCount; s++) {
		const info = store.stateInfo[s];
		if (info.passState === null) continue;

		if (info.passState === s) {
			// prettier-ignore
			throw new ConfigurationError(op, `state ${store.stateLabel(s)} pass-state cannot lead to itself`, "same-pass-state");
		}
		if (store.isPassState(info.passState)) {
			// prettier-ignore
			throw new ConfigurationError(op, `state ${store.stateLabel(s)} cannot be followed by another pass-state`, "pass-state-chain");
		}
		if (info.timeout.enabled) {
			// prettier-ignore
			throw new ConfigurationError(op, `state ${store.stateLabel(s)} cannot have both a timeout and a pass-state flag`, "timeout-and-pass-state");
		}
	}

	// state 0 is the initial state, always reachable
	const unreachable: number[] = [];
	for (let s = 1; s < store.stateCount; s++) {
		if (!isReachable(store, s)) unreachable.push(s);
	}

	const deadEnds: number[] = [];
	for (let s = 0; s < store.stateCount; s++) {
		if (!hasExit(store, s) && !unreachable.includes(s)) deadEnds.push(s);
	}

	return { unreachable, deadEnds };
}
