/**
 * Repeated execution of a computation kernel for timing and sampling.
 */

import { logger } from "../logger.ts";
import { ErrorCode, err, ok, type Result } from "../types/error.ts";

export interface RepeatedExecution<T> {
	/** One result per iteration, in order */
	samples: T[];
	/** Wall time across all iterations, truncated to whole microseconds */
	elapsedMicroseconds: number;
}

/**
 * Call `kernel` `iterations` times, collecting each result.
 *
 * @example
 * ```ts
 * const run = runRepeatedExecutions((i) => i * 0.5, 3);
 * if (run.error === ErrorCode.None) {
 *   saveMonteCarloDataToDataDotOutFile(run.value.samples, run.value.elapsedMicroseconds);
 * }
 * ```
 */
export function runRepeatedExecutions<T extends number | ArrayLike<number>>(
	kernel: (iteration: number) => T,
	iterations: number,
): Result<RepeatedExecution<T>> {
	if (!Number.isInteger(iterations) || iterations <= 0) {
		return err(
			ErrorCode.InvalidArgument,
			"The number of multiple executions must be positive.",
		);
	}

	const samples: T[] = [];
	const start = performance.now();
	for (let i = 0; i < iterations; i++) {
		samples.push(kernel(i));
	}
	const elapsedMicroseconds = Math.trunc((performance.now() - start) * 1000);

	logger.debug({ iterations, elapsedMicroseconds }, "Repeated execution finished");
	return ok({ samples, elapsedMicroseconds });
}
