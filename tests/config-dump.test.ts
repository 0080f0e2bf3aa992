import { expect, test } from "vitest";
import { createFsm } from "../src/fsm.ts";
import { createRunner, createTestLogger } from "./helpers.ts";

test("turnstile table", () => {
	const fsm = createFsm<"Locked" | "Unlocked", "Push" | "Coin">({
		states: ["Locked", "Unlocked"],
		events: ["Push", "Coin"],
		logger: createTestLogger().logger,
	});
	fsm.assignTransition("Locked", "Coin", "Unlocked");
	fsm.assignTransition("Unlocked", "Push", "Locked");

	expect(fsm.printConfig("boot")).toBe(`---------------------
Transition table: msg=boot
EVENTS | 0  1
-------|-----
0 Push | .  0
1 Coin | 1  .
TO     | .  .
PS     | .  .

State info:
0:Locked   | -
1:Unlocked | -
---------------------
`);
});

test("timeouts, pass-states and inner transitions", () => {
	expect(createRunner().printConfig()).toBe(`---------------------
Transition table:
EVENTS  | 0  1  2
--------|--------
0 go    | 1  .  .
1 stop  | .  .  .
TO      | .  .  0
PS      | .  2  .
IT stop | .  .  0

State info:
0:Idle  | -
1:Check | AAT => 2 (Run)
2:Run   | 600 ms => 0 (Idle) | IT: stop => 0 (Idle)
---------------------
`);
});
