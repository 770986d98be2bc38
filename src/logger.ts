import pino from "pino";

export const LOG_LEVELS = [
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
	"silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
	return (LOG_LEVELS as readonly string[]).includes(value);
}

/** Level taken from UXIO_LOG_LEVEL when it names a pino level, else "info" */
export const DEFAULT_LOG_LEVEL: LogLevel = (() => {
	const fromEnv = process.env.UXIO_LOG_LEVEL?.trim().toLowerCase();
	return fromEnv && isLogLevel(fromEnv) ? fromEnv : "info";
})();

/**
 * Library logger. Writes to stderr so that CSV and JSON emitted on stdout
 * stay machine-readable.
 */
export const logger = pino(
	{ name: "uxio", level: DEFAULT_LOG_LEVEL },
	pino.destination({ fd: 2, sync: true }),
);
