import { afterEach, expect, test, vi } from "vitest";
import { createFsm } from "../src/fsm.ts";
import { MAX_TIMER_DELAY, NodeTimer, type TimerHost } from "../src/timer.ts";
import type { DurUnit } from "../src/types.ts";
import { createTestLogger } from "./helpers.ts";

function createHost(duration: number, unit: DurUnit) {
	const calls: string[] = [];
	const host: TimerHost = {
		stateIndex: 0,
		timeOutDuration: () => ({ duration, unit }),
		processTimeOut: () => {
			calls.push("timeout");
		},
		processInnerEvent: () => {
			calls.push("inner");
			return true;
		},
	};
	return { host, calls };
}

const nextTick = () => new Promise<void>((resolve) => setImmediate(resolve));

afterEach(() => {
	vi.useRealTimers();
});

test("timeout fires once after its duration", () => {
	vi.useFakeTimers();
	const timer = new NodeTimer();
	const { host, calls } = createHost(2, "sec");

	timer.timerStart(host);
	expect(timer.isPending).toBe(true);
	vi.advanceTimersByTime(1999);
	expect(calls).toEqual([]);
	vi.advanceTimersByTime(1);
	expect(calls).toEqual(["timeout"]);
	expect(timer.isPending).toBe(false);
	vi.advanceTimersByTime(10_000);
	expect(calls).toEqual(["timeout"]);
});

test("cancel is idempotent and re-arming replaces", () => {
	vi.useFakeTimers();
	const timer = new NodeTimer();
	const { host, calls } = createHost(100, "ms");

	timer.timerCancel();
	timer.timerStart(host);
	timer.timerCancel();
	timer.timerCancel();
	vi.advanceTimersByTime(500);
	expect(calls).toEqual([]);

	timer.timerStart(host);
	vi.advanceTimersByTime(50);
	timer.timerStart(host);
	vi.advanceTimersByTime(60);
	expect(calls).toEqual([]);
	vi.advanceTimersByTime(40);
	expect(calls).toEqual(["timeout"]);
});

test("minutes", () => {
	vi.useFakeTimers();
	const timer = new NodeTimer();
	const { host, calls } = createHost(1, "min");
	timer.timerStart(host);
	vi.advanceTimersByTime(59_999);
	expect(calls).toEqual([]);
	vi.advanceTimersByTime(1);
	expect(calls).toEqual(["timeout"]);
});

test("delays beyond the setTimeout limit are waited out in full", () => {
	vi.useFakeTimers();
	const fsm = createFsm<"A" | "B">({
		states: ["A", "B"],
		timer: new NodeTimer(),
		logger: createTestLogger().logger,
	});
	// 36000 min = 2_160_000_000 ms
	fsm.assignTimeOut("A", 36000, "min", "B");
	fsm.start();

	vi.advanceTimersByTime(10);
	expect(fsm.state).toBe("A");
	vi.advanceTimersByTime(MAX_TIMER_DELAY);
	expect(fsm.state).toBe("A");
	vi.advanceTimersByTime(2_160_000_000 - 10 - MAX_TIMER_DELAY - 1);
	expect(fsm.state).toBe("A");
	vi.advanceTimersByTime(1);
	expect(fsm.state).toBe("B");
	fsm.stop();
});

test("signals share a single slot", async () => {
	const timer = new NodeTimer();
	const { host, calls } = createHost(1, "sec");

	timer.raiseSignal(host);
	timer.raiseSignal(host);
	expect(calls).toEqual([]);
	await nextTick();
	expect(calls).toEqual(["inner"]);

	timer.raiseSignal(host);
	await nextTick();
	expect(calls).toEqual(["inner", "inner"]);
});

test("kill drops pending timeout and signal", async () => {
	vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
	const timer = new NodeTimer();
	const { host, calls } = createHost(1, "sec");

	timer.timerStart(host);
	timer.raiseSignal(host);
	timer.timerKill();
	vi.advanceTimersByTime(5000);
	await nextTick();
	expect(calls).toEqual([]);
	expect(timer.isPending).toBe(false);
});

test("traffic light on Node timers", () => {
	vi.useFakeTimers();
	const fsm = createFsm<"Red" | "Green" | "Orange">({
		states: ["Red", "Green", "Orange"],
		timer: new NodeTimer(),
		logger: createTestLogger().logger,
	});
	fsm.assignTimeOut("Red", 300, "ms", "Green");
	fsm.assignTimeOut("Green", 200, "ms", "Orange");
	fsm.assignTimeOut("Orange", 100, "ms", "Red");

	const log: string[] = [];
	fsm.subscribe(({ current }) => log.push(current));
	fsm.start();

	vi.advanceTimersByTime(299);
	expect(fsm.state).toBe("Red");
	vi.advanceTimersByTime(1);
	expect(fsm.state).toBe("Green");
	vi.advanceTimersByTime(300);
	expect(fsm.state).toBe("Red");
	expect(log).toEqual(["Red", "Red", "Green", "Orange", "Red"]);

	fsm.stop();
	vi.advanceTimersByTime(10_000);
	expect(fsm.state).toBe("Red");
	expect(log.length).toBe(5);
});

test("inner events are delivered on the next turn", async () => {
	const fsm = createFsm<"Idle" | "Working" | "Done", "start" | "finish">({
		states: ["Idle", "Working", "Done"],
		events: ["start", "finish"],
		timer: new NodeTimer(),
		logger: createTestLogger().logger,
	});
	fsm.assignTransition("Idle", "start", "Working");
	fsm.assignInnerTransition("Working", "finish", "Done");
	fsm.assignTransition("Done", "start", "Working");
	fsm.start();
	fsm.processEvent("start");

	expect(fsm.raiseInnerEvent("finish")).toBe(true);
	expect(fsm.state).toBe("Working");
	await nextTick();
	expect(fsm.state).toBe("Done");
	fsm.stop();
});
