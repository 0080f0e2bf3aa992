import { ConfigurationError } from "./errors.ts";
import type {
	InnerTransition,
	StateInfo,
	TimeoutDescriptor,
} from "./types.ts";

/** A disabled timeout, as every state gets at construction. */
export function createTimeout(): TimeoutDescriptor {
	return { enabled: false, duration: 0, unit: "sec", nextState: 0 };
}

function createStateInfo<TArg, TState extends string>(): StateInfo<
	TArg,
	TState
> {
	return {
		timeout: createTimeout(),
		passState: null,
		inner: [],
		callback: null,
		callbackArg: undefined,
	};
}

function assertNames(
	kind: "state" | "event",
	names: readonly string[],
	min: number
): void {
	if (names.length < min) {
		// prettier-ignore
		throw new ConfigurationError("constructor", `at least ${min} ${kind}s are required, got ${names.length}`);
	}
	const seen = new Set<string>();
	for (const name of names) {
		if (typeof name !== "string" || !name.length) {
			throw new ConfigurationError("constructor", `${kind} names must be non-empty strings`);
		}
		if (seen.has(name)) {
			throw new ConfigurationError("constructor", `duplicate ${kind} name "${name}"`);
		}
		seen.add(name);
	}
}

/**
 * Dense configuration of a machine: the `[event][state]` transition and
 * allowed matrices plus one `StateInfo` per state.
 *
 * The store holds no runtime data and performs no reference resolution;
 * callers pass validated indices.
 */
export class ConfigStore<
	TState extends string,
	TEvent extends string,
	TArg = unknown
> {
	/** `[event][state]` → destination state */
	readonly transitions: number[][];

	/** `[event][state]` → is the event honored on that state */
	readonly allowed: boolean[][];

	readonly stateInfo: StateInfo<TArg, TState>[];

	constructor(
		readonly states: readonly TState[],
		readonly events: readonly TEvent[]
	) {
		assertNames("state", states, 2);
		assertNames("event", events, 0);
		this.transitions = events.map(() => states.map(() => 0));
		this.allowed = events.map(() => states.map(() => false));
		this.stateInfo = states.map(() => createStateInfo<TArg, TState>());
	}

	get stateCount(): number {
		return this.states.length;
	}

	get eventCount(): number {
		return this.events.length;
	}

	/** "2 (Green)" */
	stateLabel(state: number): string {
		return `${state} (${this.states[state]})`;
	}

	eventLabel(event: number): string {
		return `${event} (${this.events[event]})`;
	}

	isPassState(state: number): boolean {
		return this.stateInfo[state].passState !== null;
	}

	innerFor(state: number, event: number): InnerTransition | undefined {
		return this.stateInfo[state].inner.find((t) => t.event === event);
	}

	/** Whether the pair is driven by an inner transition rather than the allowed matrix. */
	isInnerGoverned(state: number, event: number): boolean {
		return this.innerFor(state, event) !== undefined;
	}

	/** Drops every latched inner transition of the state. */
	clearLatches(state: number): void {
		for (const t of this.stateInfo[state].inner) t.active = false;
	}

	clearAllLatches(): void {
		for (let s = 0; s < this.stateCount; s++) this.clearLatches(s);
	}

	/** Number of allowed events on the state. */
	allowedCount(state: number): number {
		return this.allowed.filter((row) => row[state]).length;
	}
}
