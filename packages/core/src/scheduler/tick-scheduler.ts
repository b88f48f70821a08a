import { ChannelClosedError } from "../domain/errors.js";
import type { SimulationEvent } from "../domain/event.js";
import { type ILogger, noopLogger } from "../domain/logger.js";
import type { TickStats } from "../domain/report.js";
import type { EventChannel } from "../events/channel.js";
import type { ActOutcome } from "../user/user.js";
import { defaultRng, type Rng, sampleWithoutReplacement } from "../utils/random.js";
import { elapsedSince, sleep } from "../utils/timing.js";

/**
 * Anything the scheduler can drive. `act` must stop committing work once the signal aborts.
 */
export interface Actor {
	readonly id: string;
	act(signal: AbortSignal): Promise<ActOutcome>;
}

export interface TickSchedulerOptions {
	stepDurationMs: number;
	/** Length of a tick, which is also the hard deadline of every task started in it. */
	tickDurationMs: number;
	maxUsersPerTick: number;
	rng?: Rng;
	logger?: ILogger;
	/** Ends the loop before the next tick. */
	signal?: AbortSignal;
	onTick?: (tick: number, total: number) => void;
}

type TaskResult = { kind: ActOutcome | "timeout" } | { kind: "failed"; error: unknown };

/**
 * Drives random subsets of `actors` tick by tick until the step duration has elapsed,
 * then announces on `events` that no more messages will be sent.
 *
 * @throws ChannelClosedError when a task could not record its events.
 */
export async function runTicks(
	actors: readonly Actor[],
	events: EventChannel<SimulationEvent>,
	options: TickSchedulerOptions,
): Promise<TickStats> {
	const { stepDurationMs, tickDurationMs, maxUsersPerTick } = options;
	if (!(tickDurationMs > 0)) throw new RangeError(`Tick duration must be positive, got ${tickDurationMs}`);

	const rng = options.rng ?? defaultRng;
	const logger = options.logger ?? noopLogger;
	const totalTicks = Math.ceil(stepDurationMs / tickDurationMs);
	const stats: TickStats = { ticks: 0, completed: 0, timedOut: 0, skipped: 0, failed: 0 };
	const start = performance.now();

	while (elapsedSince(start) < stepDurationMs && !options.signal?.aborted) {
		const tickStart = performance.now();
		const batch = sampleWithoutReplacement(actors, maxUsersPerTick, rng);
		const results = await runTick(batch, tickDurationMs, logger);

		stats.ticks++;
		for (const result of results) {
			switch (result.kind) {
				case "done":
					stats.completed++;
					break;
				case "cancelled":
				case "timeout":
					stats.timedOut++;
					break;
				case "skipped":
					stats.skipped++;
					break;
				case "failed":
					if (result.error instanceof ChannelClosedError) throw result.error;
					stats.failed++;
					logger.warn(`Task failed: ${result.error instanceof Error ? result.error.message : String(result.error)}`);
					break;
			}
		}
		options.onTick?.(stats.ticks, totalTicks);

		const idle = Math.min(tickDurationMs - elapsedSince(tickStart), stepDurationMs - elapsedSince(start));
		if (idle > 0) await sleep(idle);
	}

	logger.debug(`Step ran ${stats.ticks} tick(s): ${stats.completed} done, ${stats.timedOut} timed out, ${stats.skipped} skipped`);
	await events.send({ type: "all-messages-sent" });
	return stats;
}

/**
 * Starts one task per actor and waits for all of them, but never past the deadline.
 * Tasks still running then see their signal aborted and are left to settle on their own.
 */
async function runTick(batch: readonly Actor[], deadlineMs: number, logger: ILogger): Promise<TaskResult[]> {
	const controller = new AbortController();
	const timer = setTimeout(() => controller.abort(), deadlineMs);
	const deadline = new Promise<TaskResult>((resolve) => {
		controller.signal.addEventListener("abort", () => resolve({ kind: "timeout" }), { once: true });
	});

	try {
		return await Promise.all(
			batch.map((actor) =>
				Promise.race([
					actor.act(controller.signal).then(
						(outcome): TaskResult => ({ kind: outcome }),
						(error: unknown): TaskResult => {
							if (controller.signal.aborted) logger.debug(`Abandoned task of ${actor.id} failed: ${String(error)}`);
							return { kind: "failed", error };
						},
					),
					deadline,
				]),
			),
		);
	} finally {
		clearTimeout(timer);
		controller.abort();
	}
}
