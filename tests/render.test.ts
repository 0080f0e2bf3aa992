import { expect, test } from "vitest";
import {
	isRenderFormat,
	loadSnapshot,
	renderSnapshot,
} from "../src/render.ts";
import { createRunner } from "./helpers.ts";

const TURNSTILE_MMD = `stateDiagram-v2
    [*] --> Locked
    Locked --> Unlocked: Coin
    Unlocked --> Locked: Push
`;

test("loads mermaid and json files", () => {
	const fromMmd = loadSnapshot(TURNSTILE_MMD, "turnstile.mmd");
	expect(fromMmd.states).toEqual(["Locked", "Unlocked"]);
	expect(fromMmd.events).toEqual(["Coin", "Push"]);

	const snapshot = createRunner().exportConfig();
	expect(loadSnapshot(JSON.stringify(snapshot), "runner.json")).toEqual(snapshot);
});

test("rejects invalid json", () => {
	expect(() => loadSnapshot("{ states:", "bad.json")).toThrow(
		"fsm: configuration error in loadSnapshot(): bad.json is not valid JSON"
	);
	expect(() => loadSnapshot("{}", "empty.json")).toThrow("invalid snapshot");
});

test("renders every format", () => {
	const snapshot = loadSnapshot(TURNSTILE_MMD, "turnstile.mermaid");

	expect(renderSnapshot(snapshot, "dot", { active: "Unlocked" })).toBe(
		[
			"digraph G {",
			"rankdir=LR;",
			'0 [label="Locked",shape="doublecircle"];',
			'1 [label="Unlocked",style="filled",fillcolor="lightgrey"];',
			'0 -> 1 [label="Coin"];',
			'1 -> 0 [label="Push"];',
			"}",
			"",
		].join("\n")
	);
	expect(renderSnapshot(snapshot, "mermaid")).toBe(`stateDiagram-v2
    [*] --> Locked
    %% events: Coin, Push
    Locked
    Unlocked
    Locked --> Unlocked: Coin
    Unlocked --> Locked: Push
`);
	expect(renderSnapshot(snapshot, "config").split("\n").slice(2, 5)).toEqual([
		"EVENTS | 0  1",
		"-------|-----",
		"0 Coin | 1  .",
	]);
	expect(JSON.parse(renderSnapshot(snapshot, "json"))).toEqual(snapshot);
});

test("active state must exist", () => {
	const snapshot = loadSnapshot(TURNSTILE_MMD, "turnstile.mmd");
	expect(renderSnapshot(snapshot, "dot", { active: 1 }).split("\n")[3]).toBe(
		'1 [label="Unlocked",style="filled",fillcolor="lightgrey"];'
	);
	expect(() => renderSnapshot(snapshot, "dot", { active: "Open" })).toThrow(
		'fsm: configuration error in renderSnapshot(): unknown active state "Open"'
	);
	expect(() => renderSnapshot(snapshot, "dot", { active: 2 })).toThrow(
		'unknown active state "2"'
	);
});

test("format names", () => {
	expect(isRenderFormat("dot")).toBe(true);
	expect(isRenderFormat("svg")).toBe(false);
});
