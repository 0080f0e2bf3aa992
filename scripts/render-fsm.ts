#!/usr/bin/env -S npx tsx
/**
 * @module
 *
 * CLI script to render a machine configuration (JSON snapshot or Mermaid
 * stateDiagram-v2 file) as Graphviz, Mermaid, a transition table dump, or a
 * normalized JSON snapshot.
 *
 * @example Usage via npm script
 * ```sh
 * npm run render-fsm -- --infile turnstile.json --format dot | dot -Tsvg > turnstile.svg
 * npm run render-fsm -- --infile lights.mmd --format config
 * ```
 *
 * Options:
 * - `--infile <path>` - Path to the configuration file (required)
 * - `--format <fmt>` - One of dot, mermaid, config, json (default: "dot")
 * - `--active <state>` - State name or index highlighted in dot output
 * - `--help` - Show help message
 */

import { readFile } from "node:fs/promises";
import minimist from "minimist";
import {
	isRenderFormat,
	loadSnapshot,
	RENDER_FORMATS,
	renderSnapshot,
} from "../src/render.ts";

const args = minimist(process.argv.slice(2), {
	string: ["infile", "format", "active"],
	boolean: ["help"],
	default: {
		format: "dot",
	},
});

if (args.help) {
	console.log(`
render-fsm - Render a state machine configuration

Usage:
  npx tsx scripts/render-fsm.ts --infile <path> [options]

Options:
  --infile <path>   Configuration file: .json snapshot, or .mmd/.mermaid diagram (required)
  --format <fmt>    Output format: ${RENDER_FORMATS.join(", ")} (default: "dot")
  --active <state>  State name or index highlighted in dot output
  --help            Show this help message

Examples:
  # Graphviz to SVG
  npx tsx scripts/render-fsm.ts --infile turnstile.json | dot -Tsvg > turnstile.svg

  # Transition table of a Mermaid diagram
  npx tsx scripts/render-fsm.ts --infile lights.mmd --format config

  # Convert a Mermaid diagram to a JSON snapshot
  npx tsx scripts/render-fsm.ts --infile lights.mmd --format json > lights.json
`);
	process.exit(0);
}

const infile: string = args.infile ?? "";
if (!infile) {
	console.error("Error: --infile is required");
	console.error("Run with --help for usage information");
	process.exit(1);
}

const format: string = args.format;
if (!isRenderFormat(format)) {
	console.error(`Error: unknown format "${format}" (expected ${RENDER_FORMATS.join(", ")})`);
	process.exit(1);
}

let active: number | string | undefined;
if (args.active) {
	active = /^\d+$/.test(args.active) ? Number(args.active) : args.active;
}

try {
	const content = await readFile(infile, "utf8");
	const snapshot = loadSnapshot(content, infile);
	process.stdout.write(renderSnapshot(snapshot, format, { active }));
} catch (error) {
	if (error instanceof Error && "code" in error && error.code === "ENOENT") {
		console.error(`Error: File not found: ${infile}`);
		process.exit(1);
	}
	console.error(`Error: ${error instanceof Error ? error.message : error}`);
	process.exit(1);
}
