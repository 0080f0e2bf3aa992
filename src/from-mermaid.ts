import { ConfigurationError } from "./errors.ts";
import { type ConfigSnapshot, parseConfigSnapshot } from "./snapshot.ts";
import { type DurUnit, isDurUnit } from "./types.ts";

type Edge = { from: string; to: string; label: string };

/**
 * Parses a Mermaid stateDiagram-v2 notation into a configuration snapshot.
 *
 * This enables round-tripping with `toMermaid()`, which makes it useful for
 * documentation, visualization, and testing.
 *
 * **Supported lines:**
 * - `[*] --> State` - initial state (index 0)
 * - `State` - bare state declaration (fixes the index order)
 * - `%% events: a, b` - event declaration (fixes the index order)
 * - `A --> B: event` - external transition
 * - `A --> B: TO:<duration><unit>` - timeout (`ms`, `sec` or `min`)
 * - `A --> B: AAT` - pass-state
 * - `A --> B: IT:event` - inner transition
 *
 * States are indexed in order of first appearance after the initial one,
 * events in declaration order, then in order of first use. State names
 * are word characters (`\w+`).
 *
 * **Ignored Mermaid features:** YAML frontmatter, other `%%` comments and
 * directives, styling (`classDef`, `class`, `style`), state descriptions,
 * composite state braces, notes, final state transitions (`State --> [*]`),
 * direction statements, unlabelled transitions and any other unrecognized
 * line.
 *
 * @throws ConfigurationError if the diagram is invalid (missing header or
 * initial state, conflicting edges)
 *
 * @example
 * ```typescript
 * const snapshot = fromMermaid(`
 *   stateDiagram-v2
 *   [*] --> Red
 *   Red --> Green: TO:3sec
 *   Green --> Red: TO:2sec
 * `);
 * const fsm = FSM.fromSnapshot(snapshot, { timer: new NodeTimer() });
 * ```
 */
export function fromMermaid(mermaidDiagram: string): ConfigSnapshot {
	const op = "fromMermaid";
	const lines = mermaidDiagram.trim().split("\n");

	// Find the stateDiagram-v2 header, skipping any YAML frontmatter
	const startIndex = lines.findIndex((line) =>
		line.trim().startsWith("stateDiagram-v2")
	);

	if (startIndex === -1) {
		// prettier-ignore
		throw new ConfigurationError(op, 'invalid mermaid diagram: must contain "stateDiagram-v2"');
	}

	let initial: string | null = null;
	const stateNames: string[] = [];
	const eventNames: string[] = [];
	const edges: Edge[] = [];

	const addState = (name: string) => {
		if (!stateNames.includes(name)) stateNames.push(name);
	};
	const addEvent = (name: string) => {
		if (!eventNames.includes(name)) eventNames.push(name);
	};

	for (let i = startIndex + 1; i < lines.length; i++) {
		const line = lines[i].trim();

		if (!line) continue;

		// Event order directive
		const eventsMatch = line.match(/^%%\s*events:\s*(.*)$/);
		if (eventsMatch) {
			eventsMatch[1]
				.split(",")
				.map((e) => e.trim())
				.filter(Boolean)
				.forEach(addEvent);
			continue;
		}

		// Skip comments (both %% comment and %%{ directive }%%)
		if (line.startsWith("%%")) continue;

		// Skip direction statements (direction LR, direction TB, etc.)
		if (line.startsWith("direction ")) continue;

		// Skip styling: classDef, class, style
		if (/^(classDef|class|style)\s/.test(line)) continue;

		// Skip state descriptions: state "Description" as StateName
		if (/^state\s+["']/.test(line)) continue;

		// Skip composite state definitions: state StateName { or just {
		if (/^state\s+\w+\s*\{/.test(line) || line === "{" || line === "}")
			continue;

		// Skip notes: note left of, note right of, note
		if (/^note\s/.test(line)) continue;

		// Skip final state transitions: StateName --> [*]
		if (/-->\s*\[\*\]\s*$/.test(line)) continue;

		// Match: [*] --> StateName
		const initialMatch = line.match(/^\[\*\]\s*-->\s*(\w+)$/);
		if (initialMatch) {
			if (initial !== null && initial !== initialMatch[1]) {
				// prettier-ignore
				throw new ConfigurationError(op, `more than one initial state: ${initial}, ${initialMatch[1]}`);
			}
			initial = initialMatch[1];
			continue;
		}

		// Match: StateA --> StateB: label
		const transitionMatch = line.match(/^(\w+)\s*-->\s*(\w+):\s*(.+)$/);
		if (transitionMatch) {
			const [, from, to, label] = transitionMatch;
			addState(from);
			addState(to);
			edges.push({ from, to, label: label.trim() });
			continue;
		}

		// Match: bare state declaration
		const stateMatch = line.match(/^(\w+)$/);
		if (stateMatch) {
			addState(stateMatch[1]);
		}
		// Any other unrecognized lines are silently ignored
	}

	if (initial === null) {
		// prettier-ignore
		throw new ConfigurationError(op, "invalid mermaid diagram: no initial state found ([*] --> State)");
	}
	const initialState = initial;
	const states = [initialState, ...stateNames.filter((s) => s !== initialState)];

	// Labels naming events must be known before the matrices are sized
	for (const { label } of edges) {
		const parsed = parseLabel(label);
		if (parsed.kind === "event" || parsed.kind === "inner") addEvent(parsed.event);
	}

	const snapshot: ConfigSnapshot = {
		states,
		events: eventNames,
		transitions: eventNames.map(() => states.map(() => 0)),
		allowed: eventNames.map(() => states.map(() => false)),
		stateInfo: states.map(() => ({ timeout: null, passState: null, inner: [] })),
	};

	for (const edge of edges) {
		const st = states.indexOf(edge.from);
		const to = states.indexOf(edge.to);
		const info = snapshot.stateInfo[st];
		const parsed = parseLabel(edge.label);
		const fail = (detail: string) =>
			new ConfigurationError(op, `${edge.from} --> ${edge.to}: ${detail}`);

		switch (parsed.kind) {
			case "pass":
				if (info.passState !== null) throw fail("state already has a pass-state edge");
				info.passState = to;
				break;
			case "timeout":
				if (info.timeout) throw fail("state already has a timeout edge");
				info.timeout = { duration: parsed.duration, unit: parsed.unit, nextState: to };
				break;
			case "inner": {
				const ev = eventNames.indexOf(parsed.event);
				if (info.inner.some((t) => t.event === ev)) {
					throw fail(`state already has an inner transition on ${parsed.event}`);
				}
				info.inner.push({ event: ev, nextState: to });
				break;
			}
			case "event": {
				const ev = eventNames.indexOf(parsed.event);
				if (snapshot.allowed[ev][st]) {
					throw fail(`state already has a transition on ${parsed.event}`);
				}
				snapshot.allowed[ev][st] = true;
				snapshot.transitions[ev][st] = to;
				break;
			}
		}
	}

	snapshot.stateInfo.forEach((info, st) => {
		const hasEvents = snapshot.allowed.some((row) => row[st]);
		if (info.passState !== null && (info.timeout || hasEvents)) {
			// prettier-ignore
			throw new ConfigurationError(op, `pass-state ${states[st]} cannot have timeout or event edges`);
		}
	});

	return parseConfigSnapshot(snapshot);
}

type ParsedLabel =
	| { kind: "pass" }
	| { kind: "timeout"; duration: number; unit: DurUnit }
	| { kind: "inner"; event: string }
	| { kind: "event"; event: string };

/**
 * Parses a transition label into structured information.
 *
 * Supported formats:
 * - "AAT"
 * - "TO:600ms", "TO:5sec", "TO:1min"
 * - "IT:event"
 * - "event"
 */
function parseLabel(label: string): ParsedLabel {
	if (label === "AAT") return { kind: "pass" };

	const timeoutMatch = label.match(/^TO:(\d+)\s*(\w+)$/);
	if (timeoutMatch) {
		const unit = timeoutMatch[2];
		if (!isDurUnit(unit)) {
			throw new ConfigurationError("fromMermaid", `invalid timer unit in label "${label}"`);
		}
		return { kind: "timeout", duration: Number(timeoutMatch[1]), unit };
	}

	const innerMatch = label.match(/^IT:\s*(.+)$/);
	if (innerMatch) return { kind: "inner", event: innerMatch[1].trim() };

	return { kind: "event", event: label };
}
