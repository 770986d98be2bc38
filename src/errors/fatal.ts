import { logger } from "../logger.ts";

/**
 * Log a diagnostic and terminate the process with exit status 1.
 *
 * Reserved for unrecoverable conditions at the application boundary, such as
 * a program declaring the same option twice.
 */
export function fatal(message: string): never {
	logger.fatal(message);
	process.exit(1);
}
