/**
 * Engine configuration.
 *
 * One process-wide settings object, validated with zod. Environment
 * overrides (TABULA_PARALLELISM) are read once when the module loads.
 */

import { availableParallelism } from "node:os";
import { z } from "zod";
import { InvalidOperationError } from "./errors/index.ts";
import { fail, ok, type Result } from "./types/error.ts";
import { createLogger } from "./utils/logger.ts";

const log = createLogger("config");

const DisplaySchema = z.object({
	/** Rows shown before the table is elided in the middle */
	maxRows: z.number().int().min(2),
	/** Cells longer than this are truncated with an ellipsis */
	maxColWidth: z.number().int().min(3),
	nullMarker: z.string(),
});

const ConfigSchema = z.object({
	/** Worker count used by parApply and parFilter */
	parallelism: z.number().int().min(1).max(256),
	/** Elements a worker computes before yielding to the others */
	parallelBatchSize: z.number().int().min(1),
	display: DisplaySchema,
});

export type EngineConfig = z.infer<typeof ConfigSchema>;

export type EngineConfigInput = Partial<Omit<EngineConfig, "display">> & {
	display?: Partial<EngineConfig["display"]>;
};

const DEFAULT_CONFIG: EngineConfig = {
	parallelism: Math.max(1, availableParallelism()),
	parallelBatchSize: 4096,
	display: {
		maxRows: 10,
		maxColWidth: 20,
		nullMarker: "null",
	},
};

function readEnvOverrides(base: EngineConfig): EngineConfig {
	const raw = process.env.TABULA_PARALLELISM;
	if (raw === undefined || raw === "") return base;

	const parsed = ConfigSchema.shape.parallelism.safeParse(Number(raw));
	if (!parsed.success) {
		log.warn(`ignoring TABULA_PARALLELISM='${raw}': ${parsed.error.issues[0]?.message ?? "invalid"}`);
		return base;
	}
	return { ...base, parallelism: parsed.data };
}

let current: Readonly<EngineConfig> = Object.freeze(readEnvOverrides(DEFAULT_CONFIG));

/** Current configuration snapshot */
export function getConfig(): Readonly<EngineConfig> {
	return current;
}

/**
 * Merge and validate settings. The previous configuration stays in
 * place when validation fails.
 */
export function configure(input: EngineConfigInput): Result<Readonly<EngineConfig>> {
	const merged = {
		...current,
		...input,
		display: { ...current.display, ...input.display },
	};

	const parsed = ConfigSchema.safeParse(merged);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const path = issue ? issue.path.join(".") : "config";
		return fail(
			new InvalidOperationError(
				"configure",
				`rejected '${path}': ${issue?.message ?? "invalid value"}`,
				"see EngineConfig for accepted ranges",
			),
		);
	}

	current = Object.freeze(parsed.data);
	log.debug("configuration updated", current);
	return ok(current);
}

/** Restore defaults (environment overrides included) */
export function resetConfig(): Readonly<EngineConfig> {
	current = Object.freeze(readEnvOverrides(DEFAULT_CONFIG));
	return current;
}
