import { durationToMs, type DurUnit } from "./types.ts";

/** Longest delay Node's `setTimeout` honours; longer ones fire after 1 ms. */
export const MAX_TIMER_DELAY = 2 ** 31 - 1;

/**
 * The side of the machine a timer talks to.
 * `FSM` implements it; timers never need the full engine type.
 */
export interface TimerHost {
	readonly stateIndex: number;
	timeOutDuration(state: number): { duration: number; unit: DurUnit };
	processTimeOut(): void;
	processInnerEvent(): boolean;
}

/**
 * Contract of the timer collaborator.
 *
 * - `init()` is called once by `start()` (unless the machine was created with
 *   `externalEventLoop`). An implementation owning its own loop may block here.
 * - `timerStart()` arms a one-shot delay of
 *   `host.timeOutDuration(host.stateIndex)`; on expiry it must call
 *   `host.processTimeOut()` unless cancelled first.
 * - `timerCancel()` must be a no-op when nothing is pending.
 * - `timerKill()` releases the timer for good; used by `stop()`.
 * - `raiseSignal()`, when present, delivers a latched inner event later by
 *   calling `host.processInnerEvent()`. Without it the engine consumes the
 *   latch synchronously.
 */
export interface TimerPort {
	init(host: TimerHost): void;
	timerStart(host: TimerHost): void;
	timerCancel(): void;
	timerKill(): void;
	raiseSignal?(host: TimerHost): void;
}

/** Timer of machines built without timeouts. Every operation is a no-op. */
export class NoTimer implements TimerPort {
	init(): void {}
	timerStart(): void {}
	timerCancel(): void {}
	timerKill(): void {}
}

/**
 * Timer port running on Node's own timers.
 *
 * Node's event loop is already running when `start()` is called, so `init()`
 * does not block. Inner-event notifications go through a single slot: while
 * one delivery is pending, further signals only latch their transition and
 * are consumed by later deliveries.
 *
 * @example
 * ```typescript
 * const fsm = createFsm<"RED" | "GREEN", never>({
 *   states: ["RED", "GREEN"],
 *   timer: new NodeTimer(),
 * });
 * fsm.assignTimeOut("RED", 600, "ms", "GREEN");
 * fsm.assignTimeOut("GREEN", 600, "ms", "RED");
 * fsm.start();
 * ```
 */
export class NodeTimer implements TimerPort {
	#pending: ReturnType<typeof setTimeout> | null = null;

	#signal: ReturnType<typeof setImmediate> | null = null;

	/** Whether a timeout is armed and not yet fired nor cancelled. */
	get isPending(): boolean {
		return this.#pending !== null;
	}

	init(): void {}

	timerStart(host: TimerHost): void {
		this.timerCancel();
		const { duration, unit } = host.timeOutDuration(host.stateIndex);
		this.#arm(host, durationToMs(duration, unit));
	}

	// long delays are waited out in steps
	#arm(host: TimerHost, remaining: number): void {
		const step = Math.min(remaining, MAX_TIMER_DELAY);
		this.#pending = setTimeout(() => {
			this.#pending = null;
			if (remaining > step) this.#arm(host, remaining - step);
			else host.processTimeOut();
		}, step);
	}

	timerCancel(): void {
		if (this.#pending !== null) {
			clearTimeout(this.#pending);
			this.#pending = null;
		}
	}

	timerKill(): void {
		this.timerCancel();
		if (this.#signal !== null) {
			clearImmediate(this.#signal);
			this.#signal = null;
		}
	}

	raiseSignal(host: TimerHost): void {
		if (this.#signal !== null) return;
		this.#signal = setImmediate(() => {
			this.#signal = null;
			host.processInnerEvent();
		});
	}
}
