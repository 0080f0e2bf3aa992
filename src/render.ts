import { printConfig } from "./config-dump.ts";
import { ConfigurationError } from "./errors.ts";
import { fromMermaid } from "./from-mermaid.ts";
import { toDot, toMermaid } from "./graph.ts";
import {
	type ConfigSnapshot,
	parseConfigSnapshot,
	storeFromSnapshot,
} from "./snapshot.ts";

export const RENDER_FORMATS = ["dot", "mermaid", "config", "json"] as const;

export type RenderFormat = (typeof RENDER_FORMATS)[number];

export function isRenderFormat(value: unknown): value is RenderFormat {
	return RENDER_FORMATS.some((format) => format === value);
}

/**
 * Reads a configuration from file content: Mermaid for `.mmd` / `.mermaid`
 * files, a JSON snapshot otherwise.
 */
export function loadSnapshot(content: string, filename: string): ConfigSnapshot {
	if (/\.(mmd|mermaid)$/i.test(filename)) {
		return fromMermaid(content);
	}
	let data: unknown;
	try {
		data = JSON.parse(content);
	} catch (e) {
		// prettier-ignore
		throw new ConfigurationError("loadSnapshot", `${filename} is not valid JSON: ${e instanceof Error ? e.message : e}`);
	}
	return parseConfigSnapshot(data);
}

/**
 * Renders a snapshot without building a machine.
 *
 * @param options.active - state (index or name) highlighted in the `dot` output
 */
export function renderSnapshot(
	snapshot: ConfigSnapshot,
	format: RenderFormat,
	options: { active?: number | string } = {}
): string {
	const store = storeFromSnapshot(snapshot);

	switch (format) {
		case "dot": {
			let active: number | undefined;
			if (options.active !== undefined) {
				active =
					typeof options.active === "number"
						? options.active
						: store.states.indexOf(options.active);
				if (active < 0 || active >= store.stateCount) {
					// prettier-ignore
					throw new ConfigurationError("renderSnapshot", `unknown active state "${options.active}"`);
				}
			}
			return toDot(store, { active });
		}
		case "mermaid":
			return toMermaid(store);
		case "config":
			return printConfig(store);
		case "json":
			return JSON.stringify(snapshot, null, "\t") + "\n";
	}
}
