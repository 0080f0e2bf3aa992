import type { ConfigStore } from "./config-store.ts";

/**
 * Human-readable dump of a configuration, for operators. The layout is not
 * meant to be parsed.
 *
 * The transition table has one row per event, then a `TO` row (timeouts),
 * a `PS` row (pass-states) and one `IT <event>` row per event used by inner
 * transitions. Cells show the destination state, `.` when nothing applies.
 * Trailing blanks are trimmed.
 *
 * @example
 * ```
 * ---------------------
 * Transition table:
 * EVENTS | 0  1
 * -------|-----
 * 0 Push | .  0
 * 1 Coin | 1  .
 * TO     | .  .
 * PS     | .  .
 *
 * State info:
 * 0:Locked   | -
 * 1:Unlocked | -
 * ---------------------
 * ```
 */
export function printConfig<TState extends string, TEvent extends string, TArg>(
	store: ConfigStore<TState, TEvent, TArg>,
	msg?: string
): string {
	const rows: Array<[string, Array<number | null>]> = [];

	for (let ev = 0; ev < store.eventCount; ev++) {
		rows.push([
			`${ev} ${store.events[ev]}`,
			store.states.map((_, st) =>
				store.allowed[ev][st] ? store.transitions[ev][st] : null
			),
		]);
	}
	rows.push([
		"TO",
		store.stateInfo.map((info) =>
			info.timeout.enabled ? info.timeout.nextState : null
		),
	]);
	rows.push(["PS", store.stateInfo.map((info) => info.passState)]);

	for (let ev = 0; ev < store.eventCount; ev++) {
		const cells = store.stateInfo.map(
			(info) => info.inner.find((t) => t.event === ev)?.nextState ?? null
		);
		if (cells.some((c) => c !== null)) {
			rows.push([`IT ${store.events[ev]}`, cells]);
		}
	}

	const labelWidth = Math.max("EVENTS".length, ...rows.map(([label]) => label.length));
	const cellWidth = String(store.stateCount - 1).length + 2;
	const line = (label: string, cells: string[]) =>
		`${label.padEnd(labelWidth)} | ${cells.map((c) => c.padEnd(cellWidth)).join("")}`.trimEnd();

	const out: string[] = [
		"---------------------",
		`Transition table:${msg ? ` msg=${msg}` : ""}`,
		line("EVENTS", store.states.map((_, st) => String(st))),
		`${"-".repeat(labelWidth)}-|-${"-".repeat(cellWidth * store.stateCount - 2)}`,
	];
	for (const [label, cells] of rows) {
		out.push(line(label, cells.map((c) => (c === null ? "." : String(c)))));
	}

	out.push("", "State info:");
	const nameWidth = Math.max(...store.states.map((s) => s.length));
	store.stateInfo.forEach((info, st) => {
		let desc = "-";
		if (info.timeout.enabled) {
			const { duration, unit, nextState } = info.timeout;
			desc = `${duration} ${unit} => ${store.stateLabel(nextState)}`;
		} else if (info.passState !== null) {
			desc = `AAT => ${store.stateLabel(info.passState)}`;
		}
		const inner = info.inner.map(
			(t) => `${store.events[t.event]} => ${store.stateLabel(t.nextState)}`
		);
		if (inner.length) desc += ` | IT: ${inner.join(", ")}`;
		out.push(`${st}:${store.states[st].padEnd(nameWidth)} | ${desc}`);
	});
	out.push("---------------------");

	return out.join("\n") + "\n";
}
