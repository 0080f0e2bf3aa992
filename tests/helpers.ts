import { createFsm, type Logger } from "../src/fsm.ts";
import type { TimerHost, TimerPort } from "../src/timer.ts";

/** Logger keeping warnings (and debug lines) for assertions. */
export function createTestLogger() {
	const warnings: string[] = [];
	const debugs: string[] = [];
	const logger: Logger = {
		debug: (...args: unknown[]) => debugs.push(args.join(" ")),
		log: () => undefined,
		warn: (...args: unknown[]) => warnings.push(args.join(" ")),
		error: () => undefined,
	};
	return { logger, warnings, debugs };
}

/**
 * Timer port driven by hand: records every call, keeps the last host so
 * that tests can fire the timeout or deliver a signal themselves.
 */
export class ManualTimer implements TimerPort {
	calls: string[] = [];
	host: TimerHost | null = null;
	signals = 0;

	constructor(readonly withSignal = false) {
		if (!withSignal) this.raiseSignal = undefined;
	}

	init(host: TimerHost): void {
		this.host = host;
		this.calls.push("init");
	}

	timerStart(host: TimerHost): void {
		this.host = host;
		const { duration, unit } = host.timeOutDuration(host.stateIndex);
		this.calls.push(`start ${duration}${unit}`);
	}

	timerCancel(): void {
		this.calls.push("cancel");
	}

	timerKill(): void {
		this.calls.push("kill");
	}

	raiseSignal?: (host: TimerHost) => void = (host) => {
		this.host = host;
		this.signals++;
	};

	/** Delivers one pending signal. */
	deliver(): boolean {
		if (!this.host || !this.signals) return false;
		this.signals--;
		return this.host.processInnerEvent();
	}
}

/** Returns what `fn` throws, fails if it does not. */
export function catchError(fn: () => unknown): unknown {
	try {
		fn();
	} catch (e) {
		return e;
	}
	throw new Error("expected an error to be thrown");
}

/** Pass-state, timeout and inner transition on three states. */
export function createRunner() {
	const fsm = createFsm<"Idle" | "Check" | "Run", "go" | "stop">({
		states: ["Idle", "Check", "Run"],
		events: ["go", "stop"],
		timer: new ManualTimer(),
		logger: createTestLogger().logger,
	});
	fsm.assignTransition("Idle", "go", "Check");
	fsm.assignTransition("Check", "Run");
	fsm.assignTimeOut("Run", 600, "ms", "Idle");
	fsm.assignInnerTransition("Run", "stop", "Idle");
	return fsm;
}
