/** Timer units accepted by timeout descriptors. */
export type DurUnit = "ms" | "sec" | "min";

export const DUR_UNITS: readonly DurUnit[] = ["ms", "sec", "min"];

/** Type guard for strings coming from untyped input (CLI, JSON, Mermaid labels). */
export function isDurUnit(value: unknown): value is DurUnit {
	return DUR_UNITS.some((unit) => unit === value);
}

/** Converts a duration to milliseconds. */
export function durationToMs(duration: number, unit: DurUnit): number {
	switch (unit) {
		case "ms":
			return duration;
		case "sec":
			return duration * 1000;
		case "min":
			return duration * 60_000;
	}
}

/**
 * Per state timeout. A disabled descriptor still carries defaults so that
 * the store stays dense.
 */
export type TimeoutDescriptor = {
	enabled: boolean;
	duration: number;
	unit: DurUnit;
	nextState: number;
};

/**
 * A transition latched by `raiseInnerEvent()` and consumed once by
 * `processInnerEvent()`.
 */
export type InnerTransition = {
	event: number;
	nextState: number;
	active: boolean;
};

/** Entry callback, invoked with the state's stored argument. */
export type StateCallback<TArg, TState extends string = string> = (
	arg: TArg | undefined,
	state: TState
) => void;

export type StateInfo<TArg, TState extends string = string> = {
	timeout: TimeoutDescriptor;
	/** Destination of the pass-state (always-active) transition, `null` if none */
	passState: number | null;
	inner: InnerTransition[];
	callback: StateCallback<TArg, TState> | null;
	callbackArg: TArg | undefined;
};

/**
 * Pseudo-event tags used by telemetry and diagnostics. They follow the real
 * event indices, so with `M` events the timeout tag is `M` and the
 * pass-state tag is `M + 1`.
 */
export function timeoutTag(eventCount: number): number {
	return eventCount;
}

export function passTag(eventCount: number): number {
	return eventCount + 1;
}

export const TIMEOUT_LABEL = "*Timeout*";
export const PASS_LABEL = "*  AAT  *";
