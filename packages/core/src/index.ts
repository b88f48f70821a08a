export { InMemoryClient, InMemoryHomeserver, type InMemoryHomeserverOptions, type InMemoryOperation } from "./client/in-memory.js";
export { ActionKind, ALL_ACTION_KINDS } from "./domain/action.js";
export type {
	CallResult,
	ChatClientFactory,
	IChatClient,
	InboundMessage,
	LoginOutcome,
	RegisterOutcome,
	SyncEvent,
	SyncOutcome,
} from "./domain/client.js";
export { ChannelClosedError, ClientError, ConfigError, ErrorCode, SimulationError } from "./domain/errors.js";
export type { SimulationEvent } from "./domain/event.js";
export { type Friendship, friendshipKey, targetFriendships, toFriendship } from "./domain/friendship.js";
export type { IKVStore } from "./domain/kv-store.js";
export { type ILogger, noopLogger } from "./domain/logger.js";
export type { ActionMetrics, IReportSink, LatencyStats, MetricsReport, StepReport, TickStats } from "./domain/report.js";
export type { UserState, UserStateKind } from "./domain/user-state.js";
export { DEFAULT_CHANNEL_CAPACITY, EventChannel } from "./events/channel.js";
export { FriendshipGraph } from "./friendship/graph.js";
export { InMemoryKVStore } from "./kv-store/in-memory.js";
export { MetricsAggregator } from "./metrics/aggregator.js";
export { bootstrapUsers, onboard } from "./population/bootstrap.js";
export { type Actor, runTicks } from "./scheduler/tick-scheduler.js";
export { Simulation, type SimulationConfig, type SimulationDependencies, type SimulationPhase } from "./simulation.js";
export { type ActOutcome, connectUsers, User } from "./user/user.js";
export { type UsersEntry, UsersStore } from "./users-store/index.js";
export { retry } from "./utils/retry.js";
export { calculateLatencyStats } from "./utils/stats.js";
export { sleep } from "./utils/timing.js";
