import type { ConfigStore } from "./config-store.ts";
import { ConfigurationError } from "./errors.ts";

export type DotOptions = {
	/** Index of the state to highlight, usually the current one */
	active?: number;
	/** Graph name, default "G" */
	name?: string;
};

const quote = (s: string) => `"${s.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;

/** Label of a timeout edge, e.g. "TO:600ms". */
export function timeoutLabel(duration: number, unit: string): string {
	return `TO:${duration}${unit}`;
}

/**
 * Names `fromMermaid()` reads back: states are word characters, events are
 * trimmed, free of commas and line breaks, and not a reserved label.
 */
function checkMermaidNames(states: readonly string[], events: readonly string[]): void {
	const fail = (detail: string) => new ConfigurationError("toMermaid", detail);
	for (const name of states) {
		if (!/^\w+$/.test(name)) throw fail(`state name "${name}" is not representable in mermaid`);
	}
	for (const name of events) {
		if (name !== name.trim() || /[,\r\n]/.test(name) || /^(AAT$|TO:|IT:)/.test(name)) {
			throw fail(`event name "${name}" is not representable in mermaid`);
		}
	}
}

/**
 * Renders the configuration as a Graphviz digraph.
 *
 * Edges: external transitions are labelled with the event name, timeouts
 * `TO:<duration><unit>`, pass-states `AAT`, inner transitions `IT:<event>`
 * (dashed). The initial state is drawn as a double circle.
 *
 * @example
 * ```
 * digraph G {
 * rankdir=LR;
 * 0 [label="Locked",shape="doublecircle"];
 * 1 [label="Unlocked"];
 * 1 -> 0 [label="Push"];
 * 0 -> 1 [label="Coin"];
 * }
 * ```
 */
export function toDot<TState extends string, TEvent extends string, TArg>(
	store: ConfigStore<TState, TEvent, TArg>,
	options: DotOptions = {}
): string {
	const lines = [`digraph ${options.name ?? "G"} {`, "rankdir=LR;"];

	store.states.forEach((name, st) => {
		const attrs = [`label=${quote(name)}`];
		if (st === 0) attrs.push(`shape="doublecircle"`);
		if (st === options.active) attrs.push(`style="filled"`, `fillcolor="lightgrey"`);
		lines.push(`${st} [${attrs.join(",")}];`);
	});

	for (let ev = 0; ev < store.eventCount; ev++) {
		for (let st = 0; st < store.stateCount; st++) {
			if (store.allowed[ev][st] && !store.isPassState(st)) {
				// prettier-ignore
				lines.push(`${st} -> ${store.transitions[ev][st]} [label=${quote(store.events[ev])}];`);
			}
		}
	}

	store.stateInfo.forEach((info, st) => {
		if (info.passState !== null) {
			lines.push(`${st} -> ${info.passState} [label="AAT"];`);
		} else if (info.timeout.enabled) {
			const { duration, unit, nextState } = info.timeout;
			lines.push(`${st} -> ${nextState} [label=${quote(timeoutLabel(duration, unit))}];`);
		}
	});

	store.stateInfo.forEach((info, st) => {
		for (const t of info.inner) {
			// prettier-ignore
			lines.push(`${st} -> ${t.nextState} [label=${quote(`IT:${store.events[t.event]}`)},style="dashed"];`);
		}
	});

	lines.push("}");
	return lines.join("\n") + "\n";
}

/**
 * Generates a Mermaid stateDiagram-v2 notation of the configuration.
 *
 * Every state is declared first, in index order, and the event order is kept
 * in an `%% events:` comment, so that `fromMermaid()` rebuilds the same
 * indices. Edge labels follow `toDot()`.
 *
 * @example
 * ```
 * stateDiagram-v2
 *     [*] --> Locked
 *     %% events: Push, Coin
 *     Locked
 *     Unlocked
 *     Locked --> Unlocked: Coin
 *     Unlocked --> Locked: Push
 * ```
 */
export function toMermaid<TState extends string, TEvent extends string, TArg>(
	store: ConfigStore<TState, TEvent, TArg>
): string {
	checkMermaidNames(store.states, store.events);
	let mermaid = "stateDiagram-v2\n";
	mermaid += `    [*] --> ${store.states[0]}\n`;
	if (store.eventCount) {
		mermaid += `    %% events: ${store.events.join(", ")}\n`;
	}
	for (const name of store.states) {
		mermaid += `    ${name}\n`;
	}

	store.states.forEach((name, st) => {
		const info = store.stateInfo[st];

		if (info.passState !== null) {
			mermaid += `    ${name} --> ${store.states[info.passState]}: AAT\n`;
		} else {
			for (let ev = 0; ev < store.eventCount; ev++) {
				if (store.allowed[ev][st]) {
					const to = store.states[store.transitions[ev][st]];
					mermaid += `    ${name} --> ${to}: ${store.events[ev]}\n`;
				}
			}
			if (info.timeout.enabled) {
				const { duration, unit, nextState } = info.timeout;
				mermaid += `    ${name} --> ${store.states[nextState]}: ${timeoutLabel(duration, unit)}\n`;
			}
		}

		for (const t of info.inner) {
			mermaid += `    ${name} --> ${store.states[t.nextState]}: IT:${store.events[t.event]}\n`;
		}
	});

	return mermaid;
}
