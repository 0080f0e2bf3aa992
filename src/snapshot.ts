import { z } from "zod";
import { ConfigStore, createTimeout } from "./config-store.ts";
import { ConfigurationError } from "./errors.ts";

const index = z.number().int().nonnegative();

const timeoutSchema = z.object({
	duration: z.number().int().nonnegative(),
	unit: z.enum(["ms", "sec", "min"]),
	nextState: index,
});

const stateInfoSchema = z.object({
	timeout: timeoutSchema.nullable(),
	passState: index.nullable(),
	inner: z.array(z.object({ event: index, nextState: index })),
});

/** Schema of a serialized configuration (JSON file, network, tests). */
export const configSnapshotSchema = z.object({
	states: z.array(z.string().min(1)).min(2),
	events: z.array(z.string().min(1)),
	transitions: z.array(z.array(index)),
	allowed: z.array(z.array(z.boolean())),
	stateInfo: z.array(stateInfoSchema),
});

/**
 * Plain-data copy of a machine configuration: matrices and per state
 * descriptors. Callbacks and their arguments are not part of it.
 */
export type ConfigSnapshot = z.infer<typeof configSnapshotSchema>;

/**
 * Checks dimensions, index ranges and pair conflicts that the schema
 * cannot express. A pass-state takes no events, as with
 * `assignTransition(from, to)`; its other conflicts are left to
 * `validateConfig()`.
 */
function checkSnapshotShape(snapshot: ConfigSnapshot, op: string): void {
	const nbStates = snapshot.states.length;
	const nbEvents = snapshot.events.length;
	const fail = (detail: string) => new ConfigurationError(op, detail);

	if (new Set(snapshot.states).size !== nbStates) throw fail("duplicate state names");
	if (new Set(snapshot.events).size !== nbEvents) throw fail("duplicate event names");

	const checkMatrix = (name: string, matrix: unknown[][]) => {
		if (matrix.length !== nbEvents) {
			throw fail(`${name} has ${matrix.length} rows, expected ${nbEvents}`);
		}
		matrix.forEach((row, ev) => {
			if (row.length !== nbStates) {
				throw fail(`${name} row ${ev} has ${row.length} columns, expected ${nbStates}`);
			}
		});
	};
	checkMatrix("transitions", snapshot.transitions);
	checkMatrix("allowed", snapshot.allowed);

	snapshot.transitions.forEach((row, ev) =>
		row.forEach((to, st) => {
			if (to >= nbStates) throw fail(`transitions[${ev}][${st}] = ${to} is not a state`);
		})
	);

	if (snapshot.stateInfo.length !== nbStates) {
		throw fail(`stateInfo has ${snapshot.stateInfo.length} entries, expected ${nbStates}`);
	}

	snapshot.stateInfo.forEach((info, st) => {
		if (info.timeout && info.timeout.nextState >= nbStates) {
			throw fail(`timeout of state ${st} leads to unknown state ${info.timeout.nextState}`);
		}
		if (info.passState !== null) {
			if (info.passState >= nbStates) throw fail(`pass-state ${st} leads to unknown state ${info.passState}`);
			if (info.inner.length) throw fail(`pass-state ${st} has inner transitions`);
			const allowed = snapshot.allowed.findIndex((row) => row[st]);
			if (allowed !== -1) throw fail(`pass-state ${st} allows event ${allowed}`);
		}
		const seen = new Set<number>();
		for (const t of info.inner) {
			if (t.event >= nbEvents) throw fail(`inner transition of state ${st} uses unknown event ${t.event}`);
			if (t.nextState >= nbStates) throw fail(`inner transition of state ${st} leads to unknown state ${t.nextState}`);
			if (seen.has(t.event)) throw fail(`state ${st} has two inner transitions on event ${t.event}`);
			if (snapshot.allowed[t.event][st]) {
				throw fail(`event ${t.event} on state ${st} is both allowed and an inner transition`);
			}
			seen.add(t.event);
		}
	});
}

/**
 * Validates untrusted input (typically parsed JSON) as a snapshot.
 *
 * @throws ConfigurationError describing the first problems found
 */
export function parseConfigSnapshot(input: unknown): ConfigSnapshot {
	const op = "parseConfigSnapshot";
	const result = configSnapshotSchema.safeParse(input);
	if (!result.success) {
		const detail = result.error.issues
			.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
			.join("; ");
		throw new ConfigurationError(op, `invalid snapshot: ${detail}`);
	}
	checkSnapshotShape(result.data, op);
	return result.data;
}

/** Deep, plain-data copy of the store. */
export function exportSnapshot<TState extends string, TEvent extends string, TArg>(
	store: ConfigStore<TState, TEvent, TArg>
): ConfigSnapshot {
	return {
		states: [...store.states],
		events: [...store.events],
		transitions: store.transitions.map((row) => [...row]),
		allowed: store.allowed.map((row) => [...row]),
		stateInfo: store.stateInfo.map((info) => ({
			timeout: info.timeout.enabled
				? {
						duration: info.timeout.duration,
						unit: info.timeout.unit,
						nextState: info.timeout.nextState,
				  }
				: null,
			passState: info.passState,
			inner: info.inner.map(({ event, nextState }) => ({ event, nextState })),
		})),
	};
}

/**
 * Replaces matrices and descriptors of `store` by those of `snapshot`.
 * State and event names must match index by index. Nothing is modified
 * unless every check passes. Callbacks stay as they are.
 */
export function applySnapshot<TState extends string, TEvent extends string, TArg>(
	store: ConfigStore<TState, TEvent, TArg>,
	snapshot: ConfigSnapshot,
	options: { op: string; hasTimer: boolean }
): void {
	const { op } = options;
	checkSnapshotShape(snapshot, op);

	if (snapshot.states.length !== store.stateCount || snapshot.events.length !== store.eventCount) {
		// prettier-ignore
		throw new ConfigurationError(op, `dimension mismatch: snapshot has ${snapshot.states.length} states and ${snapshot.events.length} events, machine has ${store.stateCount} and ${store.eventCount}`);
	}
	snapshot.states.forEach((name, i) => {
		if (name !== store.states[i]) {
			throw new ConfigurationError(op, `state ${i} is "${name}" in snapshot, "${store.states[i]}" in machine`);
		}
	});
	snapshot.events.forEach((name, i) => {
		if (name !== store.events[i]) {
			throw new ConfigurationError(op, `event ${i} is "${name}" in snapshot, "${store.events[i]}" in machine`);
		}
	});
	if (!options.hasTimer && snapshot.stateInfo.some((info) => info.timeout !== null)) {
		throw new ConfigurationError(op, "snapshot has timeouts but the FSM was built without timer");
	}

	snapshot.transitions.forEach((row, ev) => {
		store.transitions[ev] = [...row];
	});
	snapshot.allowed.forEach((row, ev) => {
		store.allowed[ev] = [...row];
	});
	snapshot.stateInfo.forEach((src, st) => {
		const info = store.stateInfo[st];
		info.timeout = src.timeout ? { enabled: true, ...src.timeout } : createTimeout();
		info.passState = src.passState;
		info.inner = src.inner.map((t) => ({ ...t, active: false }));
	});
}

/**
 * Builds a bare store from a snapshot, for tooling that renders a
 * configuration without running it.
 */
export function storeFromSnapshot(snapshot: ConfigSnapshot): ConfigStore<string, string> {
	const store = new ConfigStore<string, string>(snapshot.states, snapshot.events);
	applySnapshot(store, snapshot, { op: "storeFromSnapshot", hasTimer: true });
	return store;
}
