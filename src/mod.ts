/**
 * @module
 *
 * A typed, table-driven Finite State Machine engine.
 *
 * The configuration is a dense `[event][state]` matrix (which events a state
 * honors and where they lead) plus per state descriptors: timeouts, pass-states
 * (left as soon as entered), inner transitions (latched by a signal, consumed
 * once) and entry callbacks. Timers are pluggable, telemetry is optional, and
 * a configuration can be exported, validated, dumped, drawn (Graphviz,
 * Mermaid) and reloaded.
 *
 * @example Basic usage
 * ```typescript
 * import { createFsm } from "matrix-fsm";
 *
 * const fsm = createFsm<"Locked" | "Unlocked", "Push" | "Coin">({
 *   states: ["Locked", "Unlocked"],
 *   events: ["Push", "Coin"],
 * });
 * fsm.assignTransition("Locked", "Coin", "Unlocked");
 * fsm.assignTransition("Unlocked", "Push", "Locked");
 *
 * fsm.subscribe(({ current }) => console.log(current));
 * fsm.start();
 * fsm.processEvent("Coin"); // → "Unlocked"
 * ```
 *
 * @example Timeouts
 * ```typescript
 * import { createFsm, NodeTimer } from "matrix-fsm";
 *
 * const lights = createFsm<"Red" | "Green" | "Orange">({
 *   states: ["Red", "Green", "Orange"],
 *   timer: new NodeTimer(),
 * });
 * lights.assignTimeOut("Red", 3, "Green");
 * lights.assignTimeOut("Green", 2, "Orange");
 * lights.assignTimeOut("Orange", 1, "Red");
 * lights.start();
 * ```
 *
 * @example Mermaid diagram support
 * ```typescript
 * import { FSM } from "matrix-fsm";
 *
 * const fsm = FSM.fromMermaid(`
 *   stateDiagram-v2
 *   [*] --> IDLE
 *   IDLE --> ACTIVE: start
 *   ACTIVE --> IDLE: stop
 * `);
 * ```
 */

export * from "./fsm.ts";
export * from "./errors.ts";
export * from "./types.ts";
export * from "./timer.ts";
export * from "./telemetry.ts";
export * from "./validator.ts";
export * from "./snapshot.ts";
export * from "./graph.ts";
export * from "./config-dump.ts";
export * from "./from-mermaid.ts";
export * from "./render.ts";
export { ConfigStore } from "./config-store.ts";
