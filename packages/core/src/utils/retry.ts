import { ErrorCode, SimulationError } from "../domain/errors.js";
import { sleep } from "./timing.js";

export type RetryOptions = {
	/** The number of attempts to make. */
	attempts: number;
	/** The base delay in milliseconds. */
	delay: number;
	/** Called before each retry with the failed attempt's error. */
	onRetry?: (error: unknown, attempt: number) => void;
	/** Errors for which this returns false are thrown at once. */
	shouldRetry?: (error: unknown) => boolean;
};

/**
 * Retries a function until it succeeds or the maximum number of attempts is reached.
 *
 * @param fn - The function to retry. Receives the zero-based attempt number.
 * @param options - The retry options.
 * @returns The result of the function.
 */
export async function retry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
	for (let attempt = 0; attempt < options.attempts; attempt++) {
		try {
			return await fn(attempt);
		} catch (error) {
			if (attempt === options.attempts - 1 || options.shouldRetry?.(error) === false) {
				throw error; // Re-throw last error
			}
			options.onRetry?.(error, attempt + 1);
			const backoff = options.delay * 2 ** attempt;
			await sleep(backoff);
		}
	}
	// Only reachable with attempts <= 0
	throw new SimulationError(ErrorCode.UNKNOWN, "Retry logic failed unexpectedly.");
}
