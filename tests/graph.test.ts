import { expect, test } from "vitest";
import { ConfigurationError } from "../src/errors.ts";
import { createFsm } from "../src/fsm.ts";
import { fromMermaid } from "../src/from-mermaid.ts";
import { createRunner, createTestLogger } from "./helpers.ts";

function createTurnstile() {
	const fsm = createFsm<"Locked" | "Unlocked", "Push" | "Coin">({
		states: ["Locked", "Unlocked"],
		events: ["Push", "Coin"],
		logger: createTestLogger().logger,
	});
	fsm.assignTransition("Locked", "Coin", "Unlocked");
	fsm.assignTransition("Unlocked", "Push", "Locked");
	return fsm;
}

test("dot", () => {
	const fsm = createTurnstile();
	expect(fsm.toDot()).toBe(
		[
			"digraph G {",
			"rankdir=LR;",
			'0 [label="Locked",shape="doublecircle"];',
			'1 [label="Unlocked"];',
			'1 -> 0 [label="Push"];',
			'0 -> 1 [label="Coin"];',
			"}",
			"",
		].join("\n")
	);
});

test("dot highlights the active state", () => {
	const fsm = createTurnstile();
	fsm.start();
	fsm.processEvent("Coin");
	const dot = fsm.toDot({ showActive: true, name: "turnstile" });
	expect(dot.split("\n").slice(0, 4)).toEqual([
		"digraph turnstile {",
		"rankdir=LR;",
		'0 [label="Locked",shape="doublecircle"];',
		'1 [label="Unlocked",style="filled",fillcolor="lightgrey"];',
	]);
});

test("dot with timeout, pass-state and inner transition", () => {
	expect(createRunner().toDot()).toBe(
		[
			"digraph G {",
			"rankdir=LR;",
			'0 [label="Idle",shape="doublecircle"];',
			'1 [label="Check"];',
			'2 [label="Run"];',
			'0 -> 1 [label="go"];',
			'1 -> 2 [label="AAT"];',
			'2 -> 0 [label="TO:600ms"];',
			'2 -> 0 [label="IT:stop",style="dashed"];',
			"}",
			"",
		].join("\n")
	);
});

test("dot escapes quotes in names", () => {
	const fsm = createFsm({ states: ['say "hi"', "B"] });
	expect(fsm.toDot().split("\n")[2]).toBe(
		'0 [label="say \\"hi\\"",shape="doublecircle"];'
	);
});

test("mermaid", () => {
	expect(createTurnstile().toMermaid()).toBe(`stateDiagram-v2
    [*] --> Locked
    %% events: Push, Coin
    Locked
    Unlocked
    Locked --> Unlocked: Coin
    Unlocked --> Locked: Push
`);

	expect(createRunner().toMermaid()).toBe(`stateDiagram-v2
    [*] --> Idle
    %% events: go, stop
    Idle
    Check
    Run
    Idle --> Check: go
    Check --> Run: AAT
    Run --> Idle: TO:600ms
    Run --> Idle: IT:stop
`);
});

test("mermaid output parses back to the same configuration", () => {
	const fsm = createRunner();
	expect(fromMermaid(fsm.toMermaid())).toEqual(fsm.exportConfig());
});

test("mermaid refuses names it cannot read back", () => {
	expect(() => createFsm({ states: ["A", "B-1"] }).toMermaid()).toThrow(
		'fsm: configuration error in toMermaid(): state name "B-1" is not representable in mermaid'
	);
	expect(() => createFsm({ states: ["Go Left", "B"] }).toMermaid()).toThrow(
		ConfigurationError
	);
	expect(() =>
		createFsm({ states: ["A", "B"], events: ["a,b"] }).toMermaid()
	).toThrow('event name "a,b" is not representable in mermaid');
	expect(() =>
		createFsm({ states: ["A", "B"], events: ["AAT"] }).toMermaid()
	).toThrow('event name "AAT" is not representable in mermaid');
	expect(createFsm({ states: ["A", "B"], events: ["go left"] }).toMermaid()).toBe(
		"stateDiagram-v2\n    [*] --> A\n    %% events: go left\n    A\n    B\n"
	);
});
