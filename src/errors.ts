/**
 * Identifies the configuration conflicts detected when the machine is started.
 */
export type ConfigConflictCode =
	| "same-pass-state"
	| "pass-state-chain"
	| "timeout-and-pass-state";

/**
 * Base class for every error thrown by the engine.
 * Use `kind` (or `instanceof` on the subclasses) to tell a broken setup
 * from a machine driven incorrectly.
 */
export abstract class FSMError extends Error {
	abstract readonly kind: "configuration" | "runtime";

	constructor(
		message: string,
		public readonly operation: string
	) {
		super(message);
	}
}

/**
 * Malformed setup: bad state or event reference, conflicting descriptors,
 * duplicate assignment.
 */
export class ConfigurationError extends FSMError {
	readonly kind = "configuration";

	constructor(
		operation: string,
		detail: string,
		public readonly code?: ConfigConflictCode
	) {
		super(`fsm: configuration error in ${operation}(): ${detail}`, operation);
		this.name = "ConfigurationError";
	}
}

/**
 * Misuse of the run-time API: double start, event before start,
 * invalid event reference.
 */
export class RuntimeError extends FSMError {
	readonly kind = "runtime";

	constructor(operation: string, detail: string) {
		super(`fsm: runtime error in ${operation}(): ${detail}`, operation);
		this.name = "RuntimeError";
	}
}
