import { z } from "zod";
import { DEFAULT_LOG_LEVEL, LOG_LEVELS, type LogLevel, logger } from "../logger.ts";
import { ErrorCode, err, ok, type Result } from "../types/error.ts";

/**
 * Process-wide limits for CSV ingestion and logging.
 */
export interface UxioConfig {
	/** Maximum number of data rows per input CSV (default: 10000) */
	maxSamples: number;

	/** Maximum characters per CSV line, newline excluded (default: 1048576) */
	maxCharsPerLine: number;

	/** pino level for library diagnostics (default: UXIO_LOG_LEVEL or "info") */
	logLevel: LogLevel;
}

const configSchema = z
	.object({
		maxSamples: z.number().int().positive(),
		maxCharsPerLine: z.number().int().positive(),
		logLevel: z.enum(LOG_LEVELS),
	})
	.partial()
	.strict();

/**
 * Default configuration.
 */
const DEFAULT_CONFIG: UxioConfig = Object.freeze({
	maxSamples: 10000,
	maxCharsPerLine: 1024 * 1024,
	logLevel: DEFAULT_LOG_LEVEL,
});

/** Current global configuration */
let currentConfig: UxioConfig = { ...DEFAULT_CONFIG };

/**
 * Configure global limits.
 *
 * @example
 * ```ts
 * import { configure } from 'uxio';
 *
 * // Allow up to 50k data rows per input file
 * configure({ maxSamples: 50_000 });
 *
 * // Silence library diagnostics
 * configure({ logLevel: 'silent' });
 * ```
 */
export function configure(options: Partial<UxioConfig>): Result<Readonly<UxioConfig>> {
	const parsed = configSchema.safeParse(options);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const where = issue?.path.join(".") ?? "";
		return err(
			ErrorCode.InvalidArgument,
			`Invalid configuration${where ? ` for '${where}'` : ""}: ${issue?.message ?? "unknown issue"}`,
		);
	}
	const next = parsed.data;
	currentConfig = {
		maxSamples: next.maxSamples ?? currentConfig.maxSamples,
		maxCharsPerLine: next.maxCharsPerLine ?? currentConfig.maxCharsPerLine,
		logLevel: next.logLevel ?? currentConfig.logLevel,
	};
	logger.level = currentConfig.logLevel;
	return ok(currentConfig);
}

/**
 * Get current configuration.
 */
export function getConfig(): Readonly<UxioConfig> {
	return currentConfig;
}

/**
 * Reset configuration to defaults.
 */
export function resetConfig(): void {
	currentConfig = { ...DEFAULT_CONFIG };
	logger.level = currentConfig.logLevel;
}

/**
 * Get default configuration.
 */
export function getDefaultConfig(): Readonly<UxioConfig> {
	return DEFAULT_CONFIG;
}
