import { createClog } from "@marianmeres/clog";
import { createPubSub, type Unsubscriber } from "@marianmeres/pubsub";
import { ConfigStore } from "./config-store.ts";
import { printConfig } from "./config-dump.ts";
import { ConfigurationError, type FSMError, RuntimeError } from "./errors.ts";
import { fromMermaid as fromMermaidParser } from "./from-mermaid.ts";
import { toDot, toMermaid } from "./graph.ts";
import {
	applySnapshot,
	type ConfigSnapshot,
	exportSnapshot,
} from "./snapshot.ts";
import { RunTimeTelemetry, type TelemetrySink } from "./telemetry.ts";
import { NoTimer, type TimerHost, type TimerPort } from "./timer.ts";
import {
	type DurUnit,
	isDurUnit,
	passTag,
	type StateCallback,
	timeoutTag,
} from "./types.ts";
import { validateConfig, type ValidationReport } from "./validator.ts";

/**
 * Logger interface compatible with console and @marianmeres/clog.
 * All methods accept variadic arguments.
 */
export interface Logger {
	debug: (...args: unknown[]) => unknown;
	log: (...args: unknown[]) => unknown;
	warn: (...args: unknown[]) => unknown;
	error: (...args: unknown[]) => unknown;
}

/** A state given by name or by index. */
export type StateRef<TState extends string> = TState | number;

/** An event given by name or by index. */
export type EventRef<TEvent extends string> = TEvent | number;

/** What made the machine enter its current state. */
export type TransitionTrigger<TEvent extends string> =
	| { kind: "start" }
	| { kind: "event"; event: TEvent }
	| { kind: "inner"; event: TEvent }
	| { kind: "timeout" }
	| { kind: "pass" };

/**
 * Published state data sent to subscribers.
 * `trigger` is `null` until the machine is started.
 */
export type PublishedState<TState extends string, TEvent extends string> = {
	current: TState;
	previous: TState | null;
	trigger: TransitionTrigger<TEvent> | null;
};

/**
 * Constructor configuration.
 *
 * States and events are declared once, in order: a name's position is its
 * index, and the first state is the initial one.
 */
export type FSMConfig<TState extends string, TEvent extends string> = {
	states: readonly TState[];
	events?: readonly TEvent[];
	/** Timer port; without it the machine has no timeout capability */
	timer?: TimerPort;
	/** When true, `start()` does not hand control to `timer.init()` (the caller owns the loop) */
	externalEventLoop?: boolean;
	/** Unit used by `assignTimeOut()` calls that give none (default: "sec") */
	defaultTimerUnit?: DurUnit;
	/** `true` for the built-in `RunTimeTelemetry`, or any custom sink */
	telemetry?: boolean | TelemetrySink;
	/** Called for each event ignored because it is not allowed in the current state */
	onIgnoredEvent?: (event: TEvent, state: TState) => void;
	/** Enable debug logging (default: false) */
	debug?: boolean;
	/** Custom logger implementing Logger interface (default: clog "fsm") */
	logger?: Logger;
};

/** Constructor options besides the state and event declarations. */
export type FSMOptions<TState extends string, TEvent extends string> = Omit<
	FSMConfig<TState, TEvent>,
	"states" | "events"
>;

type Fail = (detail: string) => FSMError;

/**
 * Factory function to create an FSM instance.
 * Equivalent to calling `new FSM(config)`.
 *
 * @example
 * ```typescript
 * const fsm = createFsm<"LOCKED" | "UNLOCKED", "push" | "coin">({
 *   states: ["LOCKED", "UNLOCKED"],
 *   events: ["push", "coin"],
 * });
 * fsm.assignTransition("LOCKED", "coin", "UNLOCKED");
 * fsm.assignTransition("UNLOCKED", "push", "LOCKED");
 * fsm.start();
 * ```
 */
export function createFsm<
	TState extends string,
	TEvent extends string = never,
	TArg = unknown
>(config: FSMConfig<TState, TEvent>): FSM<TState, TEvent, TArg> {
	return new FSM<TState, TEvent, TArg>(config);
}

/**
 * A matrix-driven finite state machine.
 *
 * Configuration lives in dense `[event][state]` tables (allowed flag and
 * destination) and per state descriptors (timeout, pass-state, inner
 * transitions, entry callback). At run time the machine reacts to:
 *
 * - **external events** (`processEvent`): honored only where allowed,
 *   silently ignored elsewhere;
 * - **timeouts** (`processTimeOut`): called by the timer port when the delay
 *   armed on state entry expires;
 * - **pass-states**: entered and left in the same step, without event;
 * - **inner events** (`raiseInnerEvent` / `processInnerEvent`): latched by a
 *   signal, consumed once.
 *
 * Entering a state arms its timeout first, then runs its callback.
 * Configuration mistakes throw `ConfigurationError`, misuse of the run-time
 * API throws `RuntimeError`.
 *
 * @template TState - Union type of all state names
 * @template TEvent - Union type of all event names
 * @template TArg - Type of the callback argument
 */
export class FSM<
	TState extends string,
	TEvent extends string = never,
	TArg = unknown
> implements TimerHost
{
	#store: ConfigStore<TState, TEvent, TArg>;

	/** FSM's current state */
	#current = 0;

	/** FSM's previous state */
	#previous: number | null = null;

	#trigger: TransitionTrigger<TEvent> | null = null;

	#running = false;

	#timer: TimerPort;

	#hasTimer: boolean;

	#externalEventLoop: boolean;

	#defaultTimerUnit: DurUnit;

	#telemetry: TelemetrySink | null;

	#onIgnoredEvent: ((event: TEvent, state: TState) => void) | null;

	/** Internal pub sub */
	#pubsub = createPubSub();

	/** Logger instance */
	#logger: Logger;

	/** Debug mode flag */
	#debug: boolean;

	/**
	 * Creates a new FSM instance, every event ignored and no descriptor set.
	 * @throws ConfigurationError on empty, duplicate or missing names
	 */
	constructor(config: FSMConfig<TState, TEvent>) {
		this.#store = new ConfigStore<TState, TEvent, TArg>(
			config.states,
			config.events ?? []
		);
		this.#debug = config.debug ?? false;
		this.#logger = config.logger ?? createClog("fsm");
		this.#timer = config.timer ?? new NoTimer();
		this.#hasTimer = config.timer !== undefined;
		this.#externalEventLoop = config.externalEventLoop ?? false;
		this.#onIgnoredEvent = config.onIgnoredEvent ?? null;

		const unit = config.defaultTimerUnit ?? "sec";
		if (!isDurUnit(unit)) {
			throw new ConfigurationError("constructor", `invalid timer unit: ${unit}`);
		}
		this.#defaultTimerUnit = unit;

		if (config.telemetry === true) {
			this.#telemetry = new RunTimeTelemetry({
				states: this.#store.states,
				events: this.#store.events,
			});
		} else {
			this.#telemetry = config.telemetry || null;
		}
		this.#telemetry?.initializeCounters(
			this.#store.stateCount,
			this.#store.eventCount
		);

		// prettier-ignore
		this.#debugLog(`FSM created with ${this.#store.stateCount} states and ${this.#store.eventCount} events`);
	}

	/** Log debug message if debug mode is enabled */
	#debugLog(...args: unknown[]): void {
		if (this.#debug) {
			this.#logger.debug("[FSM]", ...args);
		}
	}

	/**
	 * Creates an FSM from a configuration snapshot (see `exportConfig()`).
	 * State and event names are taken from the snapshot.
	 */
	static fromSnapshot<TArg = unknown>(
		snapshot: ConfigSnapshot,
		options: FSMOptions<string, string> = {}
	): FSM<string, string, TArg> {
		const fsm = new FSM<string, string, TArg>({
			...options,
			states: snapshot.states,
			events: snapshot.events,
		});
		fsm.assignConfig(snapshot);
		return fsm;
	}

	/**
	 * Creates an FSM from a Mermaid stateDiagram-v2 notation as produced by
	 * `toMermaid()`. Callbacks are not represented and stay unassigned.
	 *
	 * @example
	 * ```typescript
	 * const fsm = FSM.fromMermaid(`
	 *   stateDiagram-v2
	 *   [*] --> Locked
	 *   Locked --> Unlocked: Coin
	 *   Unlocked --> Locked: Push
	 * `);
	 * ```
	 */
	static fromMermaid<TArg = unknown>(
		mermaidDiagram: string,
		options: FSMOptions<string, string> = {}
	): FSM<string, string, TArg> {
		return FSM.fromSnapshot<TArg>(fromMermaidParser(mermaidDiagram), options);
	}

	// ------------------------------------------------------------------
	// Queries

	/** Returns whether debug mode is enabled. */
	get debug(): boolean {
		return this.#debug;
	}

	/** Returns the logger instance used by this FSM. */
	get logger(): Logger {
		return this.#logger;
	}

	/** Current state name. Non-reactive; use `subscribe()` for updates. */
	get state(): TState {
		return this.#store.states[this.#current];
	}

	/** Current state index. */
	get stateIndex(): number {
		return this.#current;
	}

	get isRunning(): boolean {
		return this.#running;
	}

	/** Whether the machine was built with a timer port (and accepts timeouts). */
	get hasTimer(): boolean {
		return this.#hasTimer;
	}

	get stateCount(): number {
		return this.#store.stateCount;
	}

	get eventCount(): number {
		return this.#store.eventCount;
	}

	get states(): readonly TState[] {
		return this.#store.states;
	}

	get events(): readonly TEvent[] {
		return this.#store.events;
	}

	/** The telemetry sink, `null` when disabled. */
	get telemetry(): TelemetrySink | null {
		return this.#telemetry;
	}

	stateName(state: number): TState {
		return this.#store.states[this.#stateIdx(state, "stateName")];
	}

	eventName(event: number): TEvent {
		return this.#store.events[this.#eventIdx(event, "eventName")];
	}

	/** Checks whether the machine is currently in the given state. */
	is(state: StateRef<TState>): boolean {
		return this.#current === this.#stateIdx(state, "is");
	}

	/** Whether `event` is honored on `state` (default: current state). */
	isEventAllowed(event: EventRef<TEvent>, state?: StateRef<TState>): boolean {
		const op = "isEventAllowed";
		const st = state === undefined ? this.#current : this.#stateIdx(state, op);
		return this.#store.allowed[this.#eventIdx(event, op)][st];
	}

	/** Timeout duration and unit of a state (duration 0 when it has none). */
	timeOutDuration(state: StateRef<TState>): { duration: number; unit: DurUnit } {
		const { duration, unit } =
			this.#store.stateInfo[this.#stateIdx(state, "timeOutDuration")].timeout;
		return { duration, unit };
	}

	// ------------------------------------------------------------------
	// Reference resolution

	#resolve(
		kind: "state" | "event",
		names: readonly string[],
		ref: string | number,
		fail: Fail
	): number {
		if (typeof ref === "number") {
			if (Number.isInteger(ref) && ref >= 0 && ref < names.length) return ref;
			throw fail(`invalid ${kind} index ${ref} (${names.length} ${kind}s)`);
		}
		const idx = names.indexOf(ref);
		if (idx === -1) throw fail(`unknown ${kind} "${ref}"`);
		return idx;
	}

	#stateIdx(ref: string | number, op: string): number {
		// prettier-ignore
		return this.#resolve("state", this.#store.states, ref, (d) => new ConfigurationError(op, d));
	}

	#eventIdx(ref: string | number, op: string): number {
		// prettier-ignore
		return this.#resolve("event", this.#store.events, ref, (d) => new ConfigurationError(op, d));
	}

	#runtimeEventIdx(ref: string | number, op: string): number {
		// prettier-ignore
		return this.#resolve("event", this.#store.events, ref, (d) => new RuntimeError(op, d));
	}

	#requireTimer(op: string): void {
		if (!this.#hasTimer) {
			throw new ConfigurationError(op, "FSM built without timer");
		}
	}

	#parseUnit(unit: string, op: string): DurUnit {
		if (!isDurUnit(unit)) {
			throw new ConfigurationError(op, `invalid timer unit: ${unit}`);
		}
		return unit;
	}

	#checkDuration(duration: number, op: string): void {
		if (!Number.isInteger(duration) || duration < 0) {
			// prettier-ignore
			throw new ConfigurationError(op, `duration must be a non-negative integer, got ${duration}`);
		}
	}

	// ------------------------------------------------------------------
	// Configuration

	/**
	 * Assigns an external transition: on `from`, `event` leads to `to`.
	 *
	 * With two arguments, makes `from` a pass-state: once entered, the
	 * machine switches right away to `to`. Inner transitions and allowed
	 * events of `from` are removed (with a warning).
	 *
	 * @throws ConfigurationError if `from` is a pass-state (3 args), if the
	 * pair is an inner transition, if `from === to` or `from` has a timeout
	 * (2 args)
	 */
	assignTransition(from: StateRef<TState>, to: StateRef<TState>): void;
	assignTransition(
		from: StateRef<TState>,
		event: EventRef<TEvent>,
		to: StateRef<TState>
	): void;
	assignTransition(
		from: StateRef<TState>,
		second: EventRef<TEvent> | StateRef<TState>,
		third?: StateRef<TState>
	): void {
		const op = "assignTransition";
		if (third === undefined) {
			this.#assignPassTransition(from, second);
			return;
		}
		const st = this.#stateIdx(from, op);
		const ev = this.#eventIdx(second, op);
		const to = this.#stateIdx(third, op);
		const store = this.#store;

		if (store.isPassState(st)) {
			// prettier-ignore
			throw new ConfigurationError(op, `state ${store.stateLabel(st)} is a pass-state`);
		}
		if (store.isInnerGoverned(st, ev)) {
			// prettier-ignore
			throw new ConfigurationError(op, `event ${store.eventLabel(ev)} is an inner transition on state ${store.stateLabel(st)}`);
		}
		store.transitions[ev][st] = to;
		store.allowed[ev][st] = true;
	}

	#assignPassTransition(fromRef: string | number, toRef: string | number): void {
		const op = "assignTransition";
		const from = this.#stateIdx(fromRef, op);
		const to = this.#stateIdx(toRef, op);
		const store = this.#store;
		const info = store.stateInfo[from];

		if (from === to) {
			// prettier-ignore
			throw new ConfigurationError(op, `state ${store.stateLabel(from)} pass-state cannot lead to itself`, "same-pass-state");
		}
		if (info.timeout.enabled) {
			// prettier-ignore
			throw new ConfigurationError(op, `state ${store.stateLabel(from)} cannot have both a timeout and a pass-state flag`, "timeout-and-pass-state");
		}

		if (info.inner.length) {
			// prettier-ignore
			this.#logger.warn(`fsm: warning, removing ${info.inner.length} inner transition(s) of pass-state ${store.stateLabel(from)}`);
			info.inner = [];
		}
		const allowedCount = store.allowedCount(from);
		if (allowedCount) {
			// prettier-ignore
			this.#logger.warn(`fsm: warning, removing ${allowedCount} allowed event(s) of pass-state ${store.stateLabel(from)}`);
			for (const row of store.allowed) row[from] = false;
		}
		info.passState = to;
	}

	/**
	 * Whatever the state (pass-states excepted), `event` leads to `to`.
	 */
	assignTransitionAlways(event: EventRef<TEvent>, to: StateRef<TState>): void {
		const op = "assignTransitionAlways";
		const ev = this.#eventIdx(event, op);
		const dst = this.#stateIdx(to, op);
		const store = this.#store;

		for (let st = 0; st < store.stateCount; st++) {
			if (store.isInnerGoverned(st, ev)) {
				// prettier-ignore
				throw new ConfigurationError(op, `event ${store.eventLabel(ev)} is an inner transition on state ${store.stateLabel(st)}`);
			}
		}
		for (let st = 0; st < store.stateCount; st++) {
			if (store.isPassState(st)) continue;
			store.transitions[ev][st] = dst;
			store.allowed[ev][st] = true;
		}
	}

	/**
	 * Assigns an inner transition: when `event` is raised while on `from`,
	 * the machine moves to `to`. Clears the pass-state flag of `from`.
	 *
	 * With two arguments (`event`, `to`), assigns it on every state except
	 * `to` and pass-states; states already holding it are skipped.
	 *
	 * @throws ConfigurationError if the pair is already allowed as an
	 * external event, or holds an inner transition to another state
	 */
	assignInnerTransition(event: EventRef<TEvent>, to: StateRef<TState>): void;
	assignInnerTransition(
		from: StateRef<TState>,
		event: EventRef<TEvent>,
		to: StateRef<TState>
	): void;
	assignInnerTransition(
		first: StateRef<TState> | EventRef<TEvent>,
		second: EventRef<TEvent> | StateRef<TState>,
		third?: StateRef<TState>
	): void {
		const op = "assignInnerTransition";
		const store = this.#store;

		if (third === undefined) {
			const ev = this.#eventIdx(first, op);
			const to = this.#stateIdx(second, op);
			const targets: number[] = [];
			for (let st = 0; st < store.stateCount; st++) {
				if (st === to || store.isPassState(st)) continue;
				if (this.#checkInnerPair(st, ev, to, op)) targets.push(st);
			}
			for (const st of targets) {
				store.stateInfo[st].inner.push({ event: ev, nextState: to, active: false });
			}
			return;
		}

		const st = this.#stateIdx(first, op);
		const ev = this.#eventIdx(second, op);
		const to = this.#stateIdx(third, op);
		if (!this.#checkInnerPair(st, ev, to, op)) return;

		const info = store.stateInfo[st];
		if (info.passState !== null) {
			// prettier-ignore
			this.#logger.warn(`fsm: warning, state ${store.stateLabel(st)} is no longer a pass-state`);
			info.passState = null;
		}
		info.inner.push({ event: ev, nextState: to, active: false });
	}

	/** Returns false when the identical descriptor already exists. */
	#checkInnerPair(st: number, ev: number, to: number, op: string): boolean {
		const store = this.#store;
		if (store.allowed[ev][st]) {
			// prettier-ignore
			throw new ConfigurationError(op, `event ${store.eventLabel(ev)} is already allowed on state ${store.stateLabel(st)}`);
		}
		const existing = store.innerFor(st, ev);
		if (!existing) return true;
		if (existing.nextState === to) return false;
		// prettier-ignore
		throw new ConfigurationError(op, `state ${store.stateLabel(st)} already has an inner transition on event ${store.eventLabel(ev)} to ${store.stateLabel(existing.nextState)}`);
	}

	/**
	 * Removes the inner transition of `from` on `event`.
	 * @throws ConfigurationError if there is none
	 */
	disableInnerTransition(event: EventRef<TEvent>, from: StateRef<TState>): void {
		const op = "disableInnerTransition";
		const ev = this.#eventIdx(event, op);
		const st = this.#stateIdx(from, op);
		const info = this.#store.stateInfo[st];
		const idx = info.inner.findIndex((t) => t.event === ev);
		if (idx === -1) {
			// prettier-ignore
			throw new ConfigurationError(op, `no inner transition on event ${this.#store.eventLabel(ev)} for state ${this.#store.stateLabel(st)}`);
		}
		info.inner.splice(idx, 1);
	}

	/**
	 * Assigns a timeout on `state`: once entered, if `duration` expires before
	 * any other transition, the machine switches to `next`.
	 * Without unit, the default timer unit is used.
	 *
	 * @throws ConfigurationError without timer, on a pass-state, on a
	 * negative or fractional duration, or an unknown unit
	 */
	assignTimeOut(state: StateRef<TState>, duration: number, next: StateRef<TState>): void;
	assignTimeOut(
		state: StateRef<TState>,
		duration: number,
		unit: DurUnit | string,
		next: StateRef<TState>
	): void;
	assignTimeOut(
		state: StateRef<TState>,
		duration: number,
		third: StateRef<TState> | DurUnit | string,
		fourth?: StateRef<TState>
	): void {
		const op = "assignTimeOut";
		this.#requireTimer(op);
		const st = this.#stateIdx(state, op);
		let unit = this.#defaultTimerUnit;
		let nextRef = third;
		if (fourth !== undefined) {
			unit = this.#parseUnit(String(third), op);
			nextRef = fourth;
		}
		const next = this.#stateIdx(nextRef, op);
		this.#checkDuration(duration, op);

		if (this.#store.isPassState(st)) {
			// prettier-ignore
			throw new ConfigurationError(op, `state ${this.#store.stateLabel(st)} cannot have both a timeout and a pass-state flag`, "timeout-and-pass-state");
		}
		this.#store.stateInfo[st].timeout = { enabled: true, duration, unit, nextState: next };
	}

	/**
	 * Assigns the same timeout on all states except `final` (and pass-states):
	 * whatever the state, if `duration` expires the machine switches to `final`.
	 *
	 * @throws ConfigurationError if one of those states already has a timeout
	 */
	assignGlobalTimeOut(duration: number, final: StateRef<TState>): void;
	assignGlobalTimeOut(duration: number, unit: DurUnit | string, final: StateRef<TState>): void;
	assignGlobalTimeOut(
		duration: number,
		second: StateRef<TState> | DurUnit | string,
		third?: StateRef<TState>
	): void {
		const op = "assignGlobalTimeOut";
		this.#requireTimer(op);
		let unit = this.#defaultTimerUnit;
		let finalRef = second;
		if (third !== undefined) {
			unit = this.#parseUnit(String(second), op);
			finalRef = third;
		}
		const final = this.#stateIdx(finalRef, op);
		this.#checkDuration(duration, op);

		const store = this.#store;
		const targets: number[] = [];
		for (let st = 0; st < store.stateCount; st++) {
			if (st === final || store.isPassState(st)) continue;
			if (store.stateInfo[st].timeout.enabled) {
				// prettier-ignore
				throw new ConfigurationError(op, `state ${store.stateLabel(st)} already has a timeout`);
			}
			targets.push(st);
		}
		for (const st of targets) {
			store.stateInfo[st].timeout = { enabled: true, duration, unit, nextState: final };
		}
	}

	/** Sets the unit used by `assignTimeOut()` / `assignGlobalTimeOut()` calls without unit. */
	setTimerDefaultUnit(unit: DurUnit | string): void {
		const op = "setTimerDefaultUnit";
		this.#requireTimer(op);
		this.#defaultTimerUnit = this.#parseUnit(unit, op);
	}

	/**
	 * Allows (or ignores) `event` on `state`. Only the allowed flag changes;
	 * the destination stays what `assignTransition()` set (state 0 otherwise).
	 *
	 * @throws ConfigurationError if the pair is an inner transition
	 */
	allowEvent(state: StateRef<TState>, event: EventRef<TEvent>, enabled = true): void {
		const op = "allowEvent";
		const st = this.#stateIdx(state, op);
		const ev = this.#eventIdx(event, op);
		if (this.#store.isInnerGoverned(st, ev)) {
			// prettier-ignore
			throw new ConfigurationError(op, `event ${this.#store.eventLabel(ev)} is an inner transition on state ${this.#store.stateLabel(st)}`);
		}
		this.#store.allowed[ev][st] = enabled;
	}

	/** Allows every event on every state, except on pass-states and inner transition pairs. */
	allowAllEvents(): void {
		const store = this.#store;
		for (let ev = 0; ev < store.eventCount; ev++) {
			for (let st = 0; st < store.stateCount; st++) {
				if (store.isPassState(st) || store.isInnerGoverned(st, ev)) continue;
				store.allowed[ev][st] = true;
			}
		}
	}

	#checkDimensions(matrix: readonly (readonly unknown[])[], op: string): void {
		const store = this.#store;
		if (matrix.length !== store.eventCount || matrix.some((row) => row.length !== store.stateCount)) {
			// prettier-ignore
			throw new ConfigurationError(op, `matrix must be ${store.eventCount} events x ${store.stateCount} states`);
		}
	}

	/** Replaces the whole allowed matrix (`[event][state]`). */
	assignEventMatrix(matrix: readonly (readonly boolean[])[]): void {
		const op = "assignEventMatrix";
		this.#checkDimensions(matrix, op);
		const store = this.#store;
		matrix.forEach((row, ev) =>
			row.forEach((allowed, st) => {
				if (allowed && store.isInnerGoverned(st, ev)) {
					// prettier-ignore
					throw new ConfigurationError(op, `event ${store.eventLabel(ev)} is an inner transition on state ${store.stateLabel(st)}`);
				}
			})
		);
		matrix.forEach((row, ev) => {
			store.allowed[ev] = [...row];
		});
	}

	/** Replaces the whole transition matrix (`[event][state]` → state index). */
	assignTransitionMatrix(matrix: readonly (readonly number[])[]): void {
		const op = "assignTransitionMatrix";
		this.#checkDimensions(matrix, op);
		matrix.forEach((row) => row.forEach((to) => this.#stateIdx(to, op)));
		matrix.forEach((row, ev) => {
			this.#store.transitions[ev] = [...row];
		});
	}

	/** Assigns a callback to a state, called each time the state is entered. */
	assignCallback(
		state: StateRef<TState>,
		callback: StateCallback<TArg, TState>,
		arg?: TArg
	): void {
		const info = this.#store.stateInfo[this.#stateIdx(state, "assignCallback")];
		info.callback = callback;
		info.callbackArg = arg;
	}

	/** Assigns the same callback to all the states, leaving their arguments untouched. */
	assignGlobalCallback(callback: StateCallback<TArg, TState>): void {
		for (const info of this.#store.stateInfo) info.callback = callback;
	}

	/** Updates the callback argument of a state, leaving its callback untouched. */
	assignCallbackValue(state: StateRef<TState>, arg: TArg): void {
		this.#store.stateInfo[this.#stateIdx(state, "assignCallbackValue")].callbackArg = arg;
	}

	/**
	 * Copies matrices and per state descriptors from a snapshot or from
	 * another machine with the same states and events. Callbacks are kept.
	 */
	assignConfig(source: ConfigSnapshot | FSM<TState, TEvent, TArg>): void {
		const snapshot = source instanceof FSM ? source.exportConfig() : source;
		applySnapshot(this.#store, snapshot, {
			op: "assignConfig",
			hasTimer: this.#hasTimer,
		});
	}

	/** Plain-data copy of the configuration (no callbacks). */
	exportConfig(): ConfigSnapshot {
		return exportSnapshot(this.#store);
	}

	/**
	 * Runs the configuration checks without starting.
	 * @throws ConfigurationError on conflicting descriptors
	 */
	validate(): ValidationReport {
		return validateConfig(this.#store);
	}

	// ------------------------------------------------------------------
	// Run time

	/**
	 * Starts the machine on the initial state: checks the configuration
	 * (warnings are logged), runs the initial state's action, then hands
	 * control to the timer's `init()` unless the caller owns the event loop.
	 *
	 * @throws RuntimeError if already running
	 * @throws ConfigurationError on conflicting descriptors
	 */
	start(): void {
		const op = "start";
		if (this.#running) {
			throw new RuntimeError(op, "attempt to start an already running FSM");
		}

		const report = validateConfig(this.#store);
		for (const st of report.unreachable) {
			this.#logger.warn(`fsm: warning, state ${this.#store.stateLabel(st)} is unreachable`);
		}
		for (const st of report.deadEnds) {
			this.#logger.warn(`fsm: warning, state ${this.#store.stateLabel(st)} is a dead-end`);
		}

		this.#current = 0;
		this.#previous = null;
		this.#trigger = { kind: "start" };
		this.#running = true;
		this.#debugLog(`start() on "${this.state}"`);
		this.#telemetry?.markInitialState(0);
		this.#runAction();

		if (this.#hasTimer && !this.#externalEventLoop) {
			this.#timer.init(this);
		}
	}

	/**
	 * Stops the machine: cancels and releases the timer, drops latched
	 * inner events. The current state is kept until the next `start()`.
	 *
	 * @throws RuntimeError if not running
	 */
	stop(): void {
		if (!this.#running) {
			throw new RuntimeError("stop", "attempt to stop an already stopped FSM");
		}
		this.#debugLog(`stop() on "${this.state}"`);
		this.#timer.timerCancel();
		this.#timer.timerKill();
		this.#store.clearAllLatches();
		this.#running = false;
	}

	#requireRunning(op: string): void {
		if (!this.#running) {
			throw new RuntimeError(op, "FSM is not running");
		}
	}

	/**
	 * Processes an external event. An event not allowed in the current state
	 * is ignored (counted by telemetry, reported to `onIgnoredEvent`); this is
	 * not an error.
	 *
	 * @returns `true` if a transition happened, `false` if the event was ignored
	 * @throws RuntimeError if not running or on an unknown event
	 */
	processEvent(event: EventRef<TEvent>): boolean {
		const op = "processEvent";
		this.#requireRunning(op);
		const ev = this.#runtimeEventIdx(event, op);
		const store = this.#store;
		this.#debugLog(`processEvent("${store.events[ev]}") on "${this.state}"`);

		if (!store.allowed[ev][this.#current]) {
			this.#ignore(ev);
			return false;
		}
		const next = store.transitions[ev][this.#current];
		this.#leave();
		this.#moveTo(next, ev, { kind: "event", event: store.events[ev] });
		return true;
	}

	/**
	 * Called by the timer port when the delay armed on the current state
	 * expires.
	 *
	 * @throws RuntimeError if not running, or if the current state has no
	 * timeout (the timer should not have been armed)
	 */
	processTimeOut(): void {
		const op = "processTimeOut";
		this.#requireRunning(op);
		const store = this.#store;
		const timeout = store.stateInfo[this.#current].timeout;
		if (!timeout.enabled) {
			// prettier-ignore
			throw new RuntimeError(op, `timeout expired on state ${store.stateLabel(this.#current)} which has none`);
		}
		this.#debugLog(`processTimeOut() on "${this.state}", delay was ${timeout.duration} ${timeout.unit}`);
		store.clearLatches(this.#current);
		this.#moveTo(timeout.nextState, timeoutTag(store.eventCount), { kind: "timeout" });
	}

	/**
	 * Latches the inner transition of the current state on `event` and
	 * signals it: through the timer port's `raiseSignal()` when it has one
	 * (delivered later), otherwise consumed right away.
	 *
	 * @returns `false` if the current state has no inner transition on
	 * `event` (the event is then ignored)
	 * @throws RuntimeError if not running or on an unknown event
	 */
	raiseInnerEvent(event: EventRef<TEvent>): boolean {
		const op = "raiseInnerEvent";
		this.#requireRunning(op);
		const ev = this.#runtimeEventIdx(event, op);
		const inner = this.#store.innerFor(this.#current, ev);
		if (!inner) {
			this.#ignore(ev);
			return false;
		}
		this.#debugLog(`raiseInnerEvent("${this.#store.events[ev]}") on "${this.state}"`);
		inner.active = true;

		const timer = this.#timer;
		if (timer.raiseSignal) {
			timer.raiseSignal(this);
		} else {
			this.processInnerEvent();
		}
		return true;
	}

	/**
	 * Consumes one inner event. On a pass-state, moves to its destination;
	 * otherwise takes the first latched inner transition of the current
	 * state (declaration order), clears it and moves. Only one transition is
	 * consumed per call.
	 *
	 * @returns whether a transition happened
	 * @throws RuntimeError if not running
	 */
	processInnerEvent(): boolean {
		this.#requireRunning("processInnerEvent");
		const store = this.#store;
		const info = store.stateInfo[this.#current];

		if (info.passState !== null) {
			this.#moveTo(info.passState, passTag(store.eventCount), { kind: "pass" });
			return true;
		}

		const inner = info.inner.find((t) => t.active);
		if (!inner) return false;
		inner.active = false;
		this.#leave();
		this.#moveTo(inner.nextState, inner.event, {
			kind: "inner",
			event: store.events[inner.event],
		});
		return true;
	}

	#ignore(ev: number): void {
		this.#debugLog(`event "${this.#store.events[ev]}" is ignored on "${this.state}"`);
		this.#telemetry?.recordIgnoredEvent(ev);
		this.#onIgnoredEvent?.(this.#store.events[ev], this.state);
	}

	/** Outgoing side of a transition: cancel the pending timeout, drop stale latches. */
	#leave(): void {
		// a timer may still be armed after its timeout was reconfigured away
		this.#timer.timerCancel();
		this.#store.clearLatches(this.#current);
	}

	#moveTo(next: number, tag: number, trigger: TransitionTrigger<TEvent>): void {
		this.#debugLog(`"${this.state}" -> "${this.#store.states[next]}"`);
		this.#previous = this.#current;
		this.#current = next;
		this.#trigger = trigger;
		this.#telemetry?.recordTransition(next, tag);
		this.#runAction();
	}

	/**
	 * Action of the state just entered. A pass-state hands over to its
	 * destination once, without recursion: the validator forbids a
	 * pass-state leading to another.
	 */
	#runAction(): void {
		this.#enterJob();
		const passState = this.#store.stateInfo[this.#current].passState;
		if (passState !== null) {
			this.#debugLog(`"${this.state}" is a pass-state`);
			this.#previous = this.#current;
			this.#current = passState;
			this.#trigger = { kind: "pass" };
			this.#telemetry?.recordTransition(passState, passTag(this.#store.eventCount));
			this.#enterJob();
		}
	}

	/** Arms the timeout before the callback, which may be slow. */
	#enterJob(): void {
		const info = this.#store.stateInfo[this.#current];
		if (info.timeout.enabled) {
			this.#debugLog(`timeout enabled, duration=${info.timeout.duration} ${info.timeout.unit}`);
			this.#timer.timerStart(this);
		}
		if (info.callback) {
			info.callback(info.callbackArg, this.state);
		}
		this.#notify();
	}

	// ------------------------------------------------------------------
	// Observers & output

	#getNotifyData(): PublishedState<TState, TEvent> {
		return {
			current: this.state,
			previous: this.#previous === null ? null : this.#store.states[this.#previous],
			trigger: this.#trigger,
		};
	}

	#notify() {
		this.#pubsub.publish("change", this.#getNotifyData());
	}

	/**
	 * Subscribes to state changes. The callback is invoked immediately with
	 * the current data, then each time a state is entered (a pass-state and
	 * its destination are both published).
	 *
	 * @returns Unsubscriber function to stop receiving updates
	 */
	subscribe(cb: (data: PublishedState<TState, TEvent>) => void): Unsubscriber {
		this.#debugLog("subscribe() called");
		const unsub = this.#pubsub.subscribe("change", cb);
		cb(this.#getNotifyData());
		return unsub;
	}

	/** Human-readable dump of the configuration. */
	printConfig(msg?: string): string {
		return printConfig(this.#store, msg);
	}

	/**
	 * Graphviz rendering of the configuration.
	 * @param options.showActive - highlight the current state
	 */
	toDot(options: { showActive?: boolean; name?: string } = {}): string {
		return toDot(this.#store, {
			name: options.name,
			active: options.showActive ? this.#current : undefined,
		});
	}

	/** Mermaid stateDiagram-v2 rendering of the configuration. */
	toMermaid(): string {
		return toMermaid(this.#store);
	}
}
