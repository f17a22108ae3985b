import { z } from "zod";
import { logger, setLogLevel } from "./logger.js";
import type { ParseOptions } from "./parser/index.js";

export const ConfigSchema = z.object({
	PORT: z.coerce.number().default(3000),
	NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
	LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
	BIBTEX_PARSE_MODE: z.enum(["strict", "lenient"]).default("strict"),
	BIBTEX_DUPLICATE_KEYS: z.enum(["overwrite", "error", "keep-first"]).default("overwrite"),
	BIBTEX_MAX_DEPTH: z.coerce.number().int().positive().default(256),
	BIBTEX_JOURNALS_FILE: z.string().min(1).optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

export function loadConfig(): Config {
	const result = ConfigSchema.safeParse(process.env);
	if (!result.success) {
		const message = `Invalid configuration: ${result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ")}`;
		logger.error(message);
		throw new Error(message);
	}
	setLogLevel(result.data.LOG_LEVEL);
	return result.data;
}

export function parserOptionsFromConfig(config: Config): ParseOptions {
	return {
		mode: config.BIBTEX_PARSE_MODE,
		duplicateKeys: config.BIBTEX_DUPLICATE_KEYS,
		maxDepth: config.BIBTEX_MAX_DEPTH,
	};
}
