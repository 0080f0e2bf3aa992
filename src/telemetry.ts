import { PASS_LABEL, TIMEOUT_LABEL } from "./types.ts";

/**
 * What the engine reports while running. Event tags are event indices, or
 * the pseudo tags `eventCount` (timeout) and `eventCount + 1` (pass-state).
 */
export interface TelemetrySink {
	initializeCounters(stateCount: number, eventCount: number): void;
	recordTransition(state: number, eventTag: number): void;
	recordIgnoredEvent(event: number): void;
	/** Counts the initial state entered by `start()`; not a transition. */
	markInitialState(state: number): void;
}

/** Sections of `RunTimeTelemetry.printData()`, combinable with `|`. */
export const PrintFlags = {
	stateCount: 0x01,
	eventCount: 0x02,
	history: 0x04,
	ignoredCount: 0x08,
	all: 0x0f,
} as const;

export type StateChangeRecord = {
	/** Milliseconds since the telemetry was created or cleared */
	elapsed: number;
	state: number;
	event: number;
};

export type RunTimeTelemetryOptions = {
	/** State names, printed next to indices */
	states?: readonly string[];
	/** Event names, printed next to indices */
	events?: readonly string[];
	now?: () => number;
};

/**
 * In-memory telemetry: per state and per event counters, ignored-event
 * counters and the timestamped run history.
 */
export class RunTimeTelemetry implements TelemetrySink {
	#stateCounter: number[] = [];
	#eventCounter: number[] = [];
	#ignoredCounter: number[] = [];
	#history: StateChangeRecord[] = [];
	#now: () => number;
	#startTime: number;
	#stateNames: readonly string[];
	#eventNames: readonly string[];

	constructor(options: RunTimeTelemetryOptions = {}) {
		this.#now = options.now ?? Date.now;
		this.#startTime = this.#now();
		this.#stateNames = options.states ?? [];
		this.#eventNames = options.events ?? [];
	}

	get stateCounters(): readonly number[] {
		return this.#stateCounter;
	}

	/** Real events first, then the timeout and pass-state tags. */
	get eventCounters(): readonly number[] {
		return this.#eventCounter;
	}

	get ignoredCounters(): readonly number[] {
		return this.#ignoredCounter;
	}

	get history(): readonly StateChangeRecord[] {
		return this.#history;
	}

	initializeCounters(stateCount: number, eventCount: number): void {
		this.#stateCounter = new Array<number>(stateCount).fill(0);
		this.#eventCounter = new Array<number>(eventCount + 2).fill(0);
		this.#ignoredCounter = new Array<number>(eventCount).fill(0);
	}

	markInitialState(state: number): void {
		this.#stateCounter[state]++;
	}

	recordTransition(state: number, eventTag: number): void {
		this.#eventCounter[eventTag]++;
		this.#stateCounter[state]++;
		this.#history.push({
			elapsed: this.#now() - this.#startTime,
			state,
			event: eventTag,
		});
	}

	recordIgnoredEvent(event: number): void {
		this.#ignoredCounter[event]++;
	}

	/** Zeroes the counters, empties the history and restarts the clock. */
	clear(): void {
		this.#stateCounter.fill(0);
		this.#eventCounter.fill(0);
		this.#ignoredCounter.fill(0);
		this.#history = [];
		this.#startTime = this.#now();
	}

	#eventName(tag: number): string | undefined {
		const count = this.#ignoredCounter.length;
		if (tag === count) return TIMEOUT_LABEL;
		if (tag === count + 1) return PASS_LABEL;
		return this.#eventNames[tag];
	}

	/**
	 * Renders the collected data as `;` separated lines, names padded to
	 * the longest one when known.
	 *
	 * @example
	 * ```
	 * # State counters:
	 * 0;Locked  ;2
	 * 1;Unlocked;1
	 * ```
	 */
	printData(flags: number = PrintFlags.all): string {
		const sep = ";";
		const stateWidth = maxLength(this.#stateNames);
		const eventNames = this.#eventCounter.map((_, i) => this.#eventName(i));
		const eventWidth = maxLength(eventNames);

		const label = (name: string | undefined, width: number) =>
			name === undefined || !width ? "" : name.padEnd(width) + sep;

		const sections: string[] = [];

		if (flags & PrintFlags.stateCount) {
			const lines = ["# State counters:"];
			this.#stateCounter.forEach((count, i) => {
				lines.push(`${i}${sep}${label(this.#stateNames[i], stateWidth)}${count}`);
			});
			sections.push(lines.join("\n"));
		}

		if (flags & PrintFlags.eventCount) {
			const lines = ["# Event counters:"];
			this.#eventCounter.forEach((count, i) => {
				lines.push(`${i}${sep}${label(eventNames[i], eventWidth)}${count}`);
			});
			sections.push(lines.join("\n"));
		}

		if (flags & PrintFlags.ignoredCount) {
			const lines = ["# Ignored events:"];
			this.#ignoredCounter.forEach((count, i) => {
				lines.push(`${i}${sep}${label(eventNames[i], eventWidth)}${count}`);
			});
			sections.push(lines.join("\n"));
		}

		if (flags & PrintFlags.history) {
			const named = stateWidth > 0;
			const lines = [
				named
					? "# Run history:\n#time;event;event_string;state;state_string"
					: "# Run history:\n#time;event;state",
			];
			for (const h of this.#history) {
				lines.push(
					named
						? [h.elapsed, h.event, eventNames[h.event] ?? "", h.state, this.#stateNames[h.state] ?? ""].join(sep)
						: [h.elapsed, h.event, h.state].join(sep)
				);
			}
			sections.push(lines.join("\n"));
		}

		return sections.join("\n\n") + "\n";
	}
}

function maxLength(names: readonly (string | undefined)[]): number {
	return names.reduce((max, n) => Math.max(max, n?.length ?? 0), 0);
}
