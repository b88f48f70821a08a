import pMap from "p-map";
import { ChannelClosedError, ClientError, ErrorCode } from "../domain/errors.js";
import { type ILogger, noopLogger } from "../domain/logger.js";
import type { UserStateKind } from "../domain/user-state.js";
import type { User } from "../user/user.js";
import { retry } from "../utils/retry.js";

/** States one successful `act` leads to, in onboarding order. */
const ONBOARDING: readonly UserStateKind[] = ["unauthenticated", "logged-in", "syncing"];

export interface BootstrapOptions {
	/** Ordinal of the first new user; ordinals are consecutive. */
	firstOrdinal: number;
	count: number;
	/** Pipelines running at once. */
	concurrency: number;
	/** Fresh users tried per ordinal before giving up on it. */
	attempts: number;
	/** Base backoff between attempts. */
	retryDelayMs?: number;
	logger?: ILogger;
	onProgress?: (done: number, total: number) => void;
}

/**
 * Builds a user for `ordinal`. Called once per attempt so a retry starts from a clean client.
 */
export type UserFactory = (ordinal: number) => User;

/**
 * Runs register, login and sync for `user`.
 * @throws ClientError naming the state the user got stuck in.
 */
export async function onboard(user: User): Promise<User> {
	for (const expected of ONBOARDING) {
		await user.act();
		if (user.stateKind !== expected) {
			throw new ClientError(ErrorCode.CLIENT_REQUEST_FAILED, `${user.localpart} is stuck in ${user.stateKind}`);
		}
	}
	return user;
}

/**
 * Brings `count` new users to the syncing state, in completion order.
 * A user that exhausts its attempts is left out; a closed event channel is fatal.
 */
export async function bootstrapUsers(createUser: UserFactory, options: BootstrapOptions): Promise<User[]> {
	const logger = options.logger ?? noopLogger;
	const ordinals = Array.from({ length: options.count }, (_, i) => options.firstOrdinal + i);
	const ready: User[] = [];
	let done = 0;

	options.onProgress?.(done, ordinals.length);
	await pMap(
		ordinals,
		async (ordinal) => {
			try {
				const user = await retry(
					async () => {
						const candidate = createUser(ordinal);
						try {
							return await onboard(candidate);
						} catch (error) {
							candidate.stop();
							throw error;
						}
					},
					{
						attempts: options.attempts,
						delay: options.retryDelayMs ?? 100,
						shouldRetry: (error) => !(error instanceof ChannelClosedError),
						onRetry: (error, attempt) => logger.debug(`User #${ordinal} attempt ${attempt} after: ${describe(error)}`),
					},
				);
				ready.push(user);
			} catch (error) {
				if (error instanceof ChannelClosedError) throw error;
				logger.warn(`Could not bring up user #${ordinal}: ${describe(error)}`);
			}
			options.onProgress?.(++done, ordinals.length);
		},
		{ concurrency: Math.max(1, options.concurrency) },
	);

	return ready;
}

function describe(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
