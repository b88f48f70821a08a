import { EventEmitter } from "eventemitter3";
import type { ChatClientFactory } from "./domain/client.js";
import { ErrorCode, SimulationError } from "./domain/errors.js";
import type { SimulationEvent } from "./domain/event.js";
import type { Friendship } from "./domain/friendship.js";
import { type ILogger, noopLogger } from "./domain/logger.js";
import type { IReportSink, StepReport, TickStats } from "./domain/report.js";
import { EventChannel } from "./events/channel.js";
import { FriendshipGraph } from "./friendship/graph.js";
import { MetricsAggregator } from "./metrics/aggregator.js";
import { bootstrapUsers } from "./population/bootstrap.js";
import { runTicks } from "./scheduler/tick-scheduler.js";
import { connectUsers, User } from "./user/user.js";
import type { UsersStore } from "./users-store/index.js";
import { defaultRng, pickRandom, type Rng } from "./utils/random.js";
import { elapsedSince, sleep } from "./utils/timing.js";

export type SimulationConfig = {
	/** Distinguishes this run's accounts and reports from earlier ones. */
	executionId: number;
	homeserverUrl: string;
	totalSteps: number;
	usersPerStep: number;
	/** Share of all possible user pairs that should be friends, in (0, 1]. */
	friendshipRatio: number;
	stepDurationMs: number;
	tickDurationMs: number;
	maxUsersPerTick: number;
	/** Longest wait for outstanding messages once a step's ticks are over. */
	waitingPeriodMs: number;
	userCreationRetryAttempts: number;
	userCreationThroughput: number;
	roomCreationThroughput: number;
	/** How often the teardown checks for outstanding messages. Defaults to 1s. */
	pollIntervalMs?: number;
	/** Base backoff between user creation attempts. Defaults to 100ms. */
	retryDelayMs?: number;
};

export type SimulationDependencies = {
	createClient: ChatClientFactory;
	sink?: IReportSink;
	usersStore?: UsersStore;
	logger?: ILogger;
	rng?: Rng;
};

export type SimulationPhase = "users" | "friendships" | "ticks" | "teardown";

type SimulationEvents = {
	"step-start": [step: number, totalSteps: number];
	"phase-start": [phase: SimulationPhase];
	"phase-progress": [phase: SimulationPhase, done: number, total: number];
	"phase-end": [phase: SimulationPhase];
	/** `location` is where the sink put the report, null when it was not persisted. */
	"step-report": [report: StepReport, location: string | null];
};

const DEFAULT_POLL_INTERVAL_MS = 1000;

/**
 * Runs the configured number of steps against one homeserver. Each step grows the
 * population and the friendship graph, lets the users act for the step duration,
 * waits for in-flight messages and reports what the aggregator saw.
 *
 * Observers (progress bars, printers) subscribe to the emitted events; they never drive the run.
 */
export class Simulation extends EventEmitter<SimulationEvents> {
	private readonly users: User[] = [];
	private readonly graph: FriendshipGraph<User>;
	private readonly channel = new EventChannel<SimulationEvent>();
	private readonly logger: ILogger;
	private readonly rng: Rng;
	private started = false;
	/** Ordinal of the next user to create; dropped users keep theirs. */
	private nextOrdinal = 0;

	constructor(
		private readonly config: SimulationConfig,
		private readonly deps: SimulationDependencies,
	) {
		super();
		this.logger = deps.logger ?? noopLogger;
		this.rng = deps.rng ?? defaultRng;
		this.graph = new FriendshipGraph<User>({
			concurrency: config.roomCreationThroughput,
			rng: this.rng,
			logger: this.logger,
		});
	}

	get population(): readonly User[] {
		return this.users;
	}

	get friendships(): Friendship[] {
		return this.graph.list();
	}

	/**
	 * Runs every step in order. Stops before the next step or tick once `signal` aborts;
	 * the step in progress still waits for its messages and reports.
	 *
	 * @returns The report of each step that ran.
	 * @throws ChannelClosedError if the event pipeline broke down.
	 */
	async run(signal?: AbortSignal): Promise<StepReport[]> {
		if (this.started) throw new SimulationError(ErrorCode.SIMULATION_ALREADY_RAN, "A simulation can only run once");
		this.started = true;

		const reports: StepReport[] = [];
		try {
			for (let step = 1; step <= this.config.totalSteps; step++) {
				if (signal?.aborted) {
					this.logger.info(`Stopping before step ${step}`);
					break;
				}
				reports.push(await this.runStep(step, signal));
			}
		} finally {
			for (const user of this.users) user.stop();
			this.channel.close();
		}
		return reports;
	}

	private async runStep(step: number, signal: AbortSignal | undefined): Promise<StepReport> {
		this.emit("step-start", step, this.config.totalSteps);
		this.logger.info(`Step ${step}/${this.config.totalSteps} starting with ${this.users.length} user(s)`);

		const aggregator = new MetricsAggregator(this.channel);
		const metrics = aggregator.run();

		let ticks: TickStats;
		try {
			await this.phase("users", () => this.growPopulation());
			await this.phase("friendships", () => this.growFriendships());
			ticks = await this.phase("ticks", () =>
				runTicks(this.users, this.channel, {
					stepDurationMs: this.config.stepDurationMs,
					tickDurationMs: this.config.tickDurationMs,
					maxUsersPerTick: this.config.maxUsersPerTick,
					rng: this.rng,
					logger: this.logger,
					signal,
					onTick: (tick, total) => this.emit("phase-progress", "ticks", tick, total),
				}),
			);
			await this.phase("teardown", () => this.awaitDelivery(aggregator, signal));
			await this.channel.send({ type: "finish" });
		} catch (error) {
			// Unblocks the aggregator of the failed step.
			this.channel.close();
			await metrics.catch((closed: unknown) => this.logger.debug(`Aggregator stopped: ${String(closed)}`));
			throw error;
		}

		const report: StepReport = {
			executionId: this.config.executionId,
			step,
			timestamp: new Date().toISOString(),
			homeserver: this.config.homeserverUrl,
			stepUsers: this.users.length,
			stepFriendships: this.graph.size,
			ticks,
			metrics: await metrics,
		};

		const location = await this.persist(report);
		await this.recordUsers();
		this.emit("step-report", report, location);
		return report;
	}

	private async phase<T>(phase: SimulationPhase, work: () => Promise<T>): Promise<T> {
		this.emit("phase-start", phase);
		try {
			return await work();
		} finally {
			this.emit("phase-end", phase);
		}
	}

	private async growPopulation(): Promise<void> {
		const { executionId, usersPerStep } = this.config;
		const firstOrdinal = this.nextOrdinal;
		this.nextOrdinal += usersPerStep;
		const created = await bootstrapUsers(
			(ordinal) =>
				new User({
					localpart: `user_${ordinal}_${executionId}`,
					client: this.deps.createClient(),
					events: this.channel,
					pickFriend: (self) => this.pickFriend(self),
					rng: this.rng,
					logger: this.logger,
				}),
			{
				firstOrdinal,
				count: usersPerStep,
				concurrency: this.config.userCreationThroughput,
				attempts: this.config.userCreationRetryAttempts,
				retryDelayMs: this.config.retryDelayMs,
				logger: this.logger,
				onProgress: (done, total) => this.emit("phase-progress", "users", done, total),
			},
		);
		this.users.push(...created);

		const dropped = usersPerStep - created.length;
		if (dropped > 0) this.logger.warn(`${dropped} user(s) could not be created`);
	}

	private async growFriendships(): Promise<void> {
		const result = await this.graph.extend(this.users, this.config.friendshipRatio, connectUsers, (done, total) =>
			this.emit("phase-progress", "friendships", done, total),
		);
		this.logger.info(`${this.graph.size}/${result.target} friendship(s), ${result.failed} failed this step`);
	}

	/**
	 * Waits until every sent message was received or the waiting period is over.
	 */
	private async awaitDelivery(aggregator: MetricsAggregator, signal: AbortSignal | undefined): Promise<void> {
		const start = performance.now();
		const interval = this.config.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
		while (!aggregator.allMessagesReceived()) {
			const remaining = this.config.waitingPeriodMs - elapsedSince(start);
			if (remaining <= 0 || signal?.aborted) {
				this.logger.warn("Waiting period over with messages still in flight");
				return;
			}
			await sleep(Math.min(interval, remaining));
		}
	}

	private pickFriend(self: User): string | undefined {
		const others = this.users.filter((user) => user.id !== self.id);
		return pickRandom(others, this.rng)?.id;
	}

	private async persist(report: StepReport): Promise<string | null> {
		if (!this.deps.sink) return null;
		try {
			return await this.deps.sink.persist(report);
		} catch (error) {
			this.logger.error(`Could not persist the report of step ${report.step}: ${String(error)}`);
			return null;
		}
	}

	private async recordUsers(): Promise<void> {
		if (!this.deps.usersStore) return;
		try {
			await this.deps.usersStore.record({
				executionId: this.config.executionId,
				homeserverUrl: this.config.homeserverUrl,
				users: this.users.length,
				friendships: this.graph.size,
				updatedAt: new Date().toISOString(),
			});
		} catch (error) {
			this.logger.warn(`Could not record the user counters: ${String(error)}`);
		}
	}
}
