import { expect, test } from "vitest";
import { PrintFlags, RunTimeTelemetry } from "../src/telemetry.ts";

function createTelemetry(named: boolean) {
	let clock = 1000;
	const telemetry = new RunTimeTelemetry({
		...(named ? { states: ["Locked", "Unlocked"], events: ["Push", "Coin"] } : {}),
		now: () => clock,
	});
	telemetry.initializeCounters(2, 2);
	telemetry.markInitialState(0);
	clock = 1250;
	telemetry.recordTransition(1, 1);
	clock = 1300;
	telemetry.recordTransition(0, 0);
	telemetry.recordIgnoredEvent(0);
	return {
		telemetry,
		setClock: (ms: number) => {
			clock = ms;
		},
	};
}

test("counters and history", () => {
	const { telemetry } = createTelemetry(true);
	expect(telemetry.stateCounters).toEqual([2, 1]);
	expect(telemetry.eventCounters).toEqual([1, 1, 0, 0]);
	expect(telemetry.ignoredCounters).toEqual([1, 0]);
	expect(telemetry.history).toEqual([
		{ elapsed: 250, state: 1, event: 1 },
		{ elapsed: 300, state: 0, event: 0 },
	]);
});

test("printData with names", () => {
	const { telemetry } = createTelemetry(true);
	expect(telemetry.printData()).toBe(
		[
			"# State counters:",
			"0;Locked  ;2",
			"1;Unlocked;1",
			"",
			"# Event counters:",
			"0;Push     ;1",
			"1;Coin     ;1",
			"2;*Timeout*;0",
			"3;*  AAT  *;0",
			"",
			"# Ignored events:",
			"0;Push     ;1",
			"1;Coin     ;0",
			"",
			"# Run history:",
			"#time;event;event_string;state;state_string",
			"250;1;Coin;1;Unlocked",
			"300;0;Push;0;Locked",
			"",
		].join("\n")
	);
});

test("printData without names, selected sections", () => {
	const { telemetry } = createTelemetry(false);
	expect(telemetry.printData(PrintFlags.stateCount | PrintFlags.history)).toBe(
		"# State counters:\n0;2\n1;1\n\n# Run history:\n#time;event;state\n250;1;1\n300;0;0\n"
	);
});

test("clear restarts counters and clock", () => {
	const { telemetry, setClock } = createTelemetry(true);
	setClock(5000);
	telemetry.clear();
	expect(telemetry.stateCounters).toEqual([0, 0]);
	expect(telemetry.eventCounters).toEqual([0, 0, 0, 0]);
	expect(telemetry.ignoredCounters).toEqual([0, 0]);
	expect(telemetry.history).toEqual([]);

	setClock(5040);
	telemetry.recordTransition(1, 2);
	expect(telemetry.history).toEqual([{ elapsed: 40, state: 1, event: 2 }]);
	expect(telemetry.eventCounters).toEqual([0, 0, 1, 0]);
});
