import { z } from "zod";
import { LOG_LEVELS, logger } from "./logger.js";
import { SiciModeSchema } from "./sici/index.js";

export const ConfigSchema = z.object({
	PORT: z.coerce.number().default(3000),
	NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
	LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
	/** Mode used by tools that are not given one explicitly. */
	SICI_MODE: SiciModeSchema.default("lax"),
	PARSE_CACHE_SIZE: z.coerce.number().int().positive().default(1000),
});

export type Config = z.infer<typeof ConfigSchema>;

export function loadConfig(): Config {
	const result = ConfigSchema.safeParse(process.env);
	if (!result.success) {
		const message = `Invalid configuration: ${result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ")}`;
		logger.error(message);
		throw new Error(message);
	}
	return result.data;
}
