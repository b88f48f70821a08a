import { ActionKind } from "../domain/action.js";
import type { IChatClient, InboundMessage, SyncEvent } from "../domain/client.js";
import type { SimulationEvent } from "../domain/event.js";
import { type ILogger, noopLogger } from "../domain/logger.js";
import { type SyncingState, type UserState, type UserStateKind, withRoom } from "../domain/user-state.js";
import type { EventChannel } from "../events/channel.js";
import { bernoulli, defaultRng, pickRandom, type Rng, randomText } from "../utils/random.js";

/** Chances of the idle social actions, tried in this order. */
export const LOGOUT_PROBABILITY = 1 / 50;
export const UPDATE_STATUS_PROBABILITY = 1 / 25;
export const ADD_FRIEND_PROBABILITY = 1 / 3;

export interface UserOptions {
	localpart: string;
	client: IChatClient;
	events: EventChannel<SimulationEvent>;
	/** Picks someone for this user to befriend; undefined when nobody is available. */
	pickFriend?: (self: User) => string | undefined;
	rng?: Rng;
	logger?: ILogger;
}

/**
 * - done: the action ran and its transition was applied
 * - cancelled: the signal fired first; nothing was applied
 * - skipped: a previous, abandoned action of this user is still settling
 */
export type ActOutcome = "done" | "cancelled" | "skipped";

/** Applied to the state current at commit time, so concurrent room joins are not lost. */
type Transition = (current: UserState) => UserState;

const keep: Transition = (current) => current;
const moveTo = (state: UserState): Transition => () => state;

const NEVER: AbortSignal = new AbortController().signal;

/**
 * A simulated user. Each `act` call issues exactly one client request chosen
 * by the current lifecycle state, then moves the state forward.
 */
export class User {
	readonly localpart: string;
	readonly client: IChatClient;
	private readonly events: EventChannel<SimulationEvent>;
	private readonly pickFriend: (self: User) => string | undefined;
	private readonly rng: Rng;
	private readonly logger: ILogger;
	private state: UserState = { kind: "unregistered" };
	private busy = false;
	private messageListener: ((message: InboundMessage) => void) | null = null;

	constructor(options: UserOptions) {
		this.localpart = options.localpart;
		this.client = options.client;
		this.events = options.events;
		this.pickFriend = options.pickFriend ?? (() => undefined);
		this.rng = options.rng ?? defaultRng;
		this.logger = options.logger ?? noopLogger;
	}

	/** Fully qualified id once the server has told us, the localpart before. */
	get id(): string {
		return this.client.userId ?? this.localpart;
	}

	get currentState(): UserState {
		return this.state;
	}

	get stateKind(): UserStateKind {
		return this.state.kind;
	}

	get rooms(): readonly string[] {
		return this.state.kind === "syncing" ? this.state.rooms : [];
	}

	get isBusy(): boolean {
		return this.busy;
	}

	/**
	 * Performs the next lifecycle action. Once `signal` aborts, the result of the
	 * in-flight request is discarded and no further events are recorded.
	 */
	async act(signal: AbortSignal = NEVER): Promise<ActOutcome> {
		if (this.busy) return "skipped";
		this.busy = true;
		try {
			const transition = await this.next(signal);
			if (signal.aborted) return "cancelled";
			this.commit(transition);
			return "done";
		} finally {
			this.busy = false;
		}
	}

	/**
	 * Creates a room inviting `invitees` and adds it to this user's rooms.
	 * Resolves with the room id, or null when the user is not syncing or the request failed.
	 */
	async createRoom(invitees: string[]): Promise<string | null> {
		if (this.state.kind !== "syncing") {
			this.logger.debug(`${this.id} cannot create a room while ${this.state.kind}`);
			return null;
		}
		const result = await this.call(ActionKind.CREATE_ROOM, NEVER, () => this.client.createRoom(invitees));
		if (result.status !== "ok") return null;
		this.commit(addRoom(result.value));
		return result.value;
	}

	/**
	 * Joins `roomId` and adds it to this user's rooms. Resolves false when not syncing or on failure.
	 */
	async joinRoom(roomId: string): Promise<boolean> {
		if (this.state.kind !== "syncing") {
			this.logger.debug(`${this.id} cannot join ${roomId} while ${this.state.kind}`);
			return false;
		}
		const result = await this.call(ActionKind.JOIN_ROOM, NEVER, () => this.client.joinRoom(roomId));
		if (result.status !== "ok") return false;
		this.commit(addRoom(result.value));
		return true;
	}

	/**
	 * Stops the background sync and detaches from inbound messages.
	 */
	stop(): void {
		if (this.state.kind === "syncing") this.state.cancel.abort();
		this.detach();
	}

	private commit(transition: Transition): void {
		this.state = transition(this.state);
	}

	private next(signal: AbortSignal): Promise<Transition> {
		const state = this.state;
		switch (state.kind) {
			case "unregistered":
				return this.register(signal);
			case "unauthenticated":
				return this.login(signal);
			case "logged-in":
				return this.sync(signal);
			case "syncing":
				return this.socialize(state, signal);
			case "logged-out":
				return Promise.resolve(this.restart());
		}
	}

	private async register(signal: AbortSignal): Promise<Transition> {
		const outcome = await this.call(ActionKind.REGISTER, signal, () => this.client.register(this.localpart));
		switch (outcome.status) {
			case "ok":
				return moveTo({ kind: "unauthenticated" });
			case "already-exists":
				this.logger.debug(`${this.localpart} already registered, proceeding to login`);
				return moveTo({ kind: "unauthenticated" });
			case "failed":
				return keep;
		}
	}

	private async login(signal: AbortSignal): Promise<Transition> {
		const outcome = await this.call(ActionKind.LOGIN, signal, () => this.client.login(this.localpart), (result) =>
			result.status === "not-registered" ? new Error("User is not registered") : null,
		);
		switch (outcome.status) {
			case "ok":
				return moveTo({ kind: "logged-in" });
			case "not-registered":
				return moveTo({ kind: "unregistered" });
			case "failed":
				return keep;
		}
	}

	private async sync(signal: AbortSignal): Promise<Transition> {
		const outcome = await this.call(ActionKind.SYNC, signal, () => this.client.sync());
		if (outcome.status !== "ok") return keep;

		if (signal.aborted) {
			outcome.cancel.abort();
			return keep;
		}

		this.attach(outcome.cancel.signal);
		let rooms: readonly string[] = [];
		for (const roomId of outcome.joinedRooms) rooms = withRoom(rooms, roomId);
		const pending: SyncEvent[] = outcome.invitedRooms
			.filter((roomId) => !rooms.includes(roomId))
			.map((roomId) => ({ type: "invite", roomId }));

		return moveTo({ kind: "syncing", rooms, pending, cancel: outcome.cancel });
	}

	private async socialize(state: SyncingState, signal: AbortSignal): Promise<Transition> {
		if (state.cancel.signal.aborted) {
			this.detach();
			return moveTo({ kind: "logged-out" });
		}

		// Absorb what sync saw before any await: draining is destructive and must not be lost on cancellation.
		this.commit(absorb(this.client.readSyncEvents()));
		const current = this.state;
		if (current.kind !== "syncing") return keep;

		const event = current.pending[current.pending.length - 1];
		if (event) return this.react(event, signal);

		if (bernoulli(LOGOUT_PROBABILITY, this.rng)) return this.logout(current, signal);
		if (bernoulli(UPDATE_STATUS_PROBABILITY, this.rng)) return this.updateStatus(signal);
		if (bernoulli(ADD_FRIEND_PROBABILITY, this.rng)) return this.addFriend(signal);
		return this.sendToRandomRoom(current, signal);
	}

	private async react(event: SyncEvent, signal: AbortSignal): Promise<Transition> {
		let joined: string | null = null;
		if (event.type === "invite") {
			const result = await this.call(ActionKind.JOIN_ROOM, signal, () => this.client.joinRoom(event.roomId));
			if (result.status === "ok") joined = result.value;
		} else if (event.type === "message") {
			await this.send(event.roomId, signal);
		}

		return (current) => {
			if (current.kind !== "syncing") return current;
			return {
				...current,
				rooms: joined === null ? current.rooms : withRoom(current.rooms, joined),
				pending: current.pending.filter((pending) => pending !== event),
			};
		};
	}

	private async logout(state: SyncingState, signal: AbortSignal): Promise<Transition> {
		const result = await this.call(ActionKind.LOGOUT, signal, () => this.client.logout());
		if (result.status !== "ok" || signal.aborted) return keep;
		state.cancel.abort();
		this.detach();
		return moveTo({ kind: "logged-out" });
	}

	private async updateStatus(signal: AbortSignal): Promise<Transition> {
		await this.call(ActionKind.UPDATE_STATUS, signal, () => this.client.updateStatus());
		return keep;
	}

	private async addFriend(signal: AbortSignal): Promise<Transition> {
		const friend = this.pickFriend(this);
		if (friend === undefined) return keep;
		const result = await this.call(ActionKind.ADD_FRIEND, signal, () => this.client.addFriend(friend));
		return result.status === "ok" ? addRoom(result.value) : keep;
	}

	private async sendToRandomRoom(state: SyncingState, signal: AbortSignal): Promise<Transition> {
		const roomId = pickRandom(state.rooms, this.rng);
		if (roomId !== undefined) await this.send(roomId, signal);
		return keep;
	}

	private async send(roomId: string, signal: AbortSignal): Promise<void> {
		const result = await this.call(ActionKind.SEND_MESSAGE, signal, () =>
			this.client.sendMessage(roomId, randomText(16, this.rng)),
		);
		if (result.status === "ok") await this.record({ type: "message-sent", id: result.value }, signal);
	}

	private restart(): Transition {
		this.detach();
		this.client.reset();
		return moveTo({ kind: "unauthenticated" });
	}

	/**
	 * Runs one client request and records its duration, or its error when `failure` finds one.
	 */
	private async call<R extends { status: string; error?: Error }>(
		action: ActionKind,
		signal: AbortSignal,
		request: () => Promise<R>,
		failure: (result: R) => Error | null = () => null,
	): Promise<R> {
		const start = performance.now();
		const result = await request();
		const durationMs = performance.now() - start;
		const error = result.error ?? failure(result);
		if (error) {
			this.logger.debug(`${this.id} ${action} failed: ${error.message}`);
			await this.record({ type: "error", action, cause: error }, signal);
		} else {
			await this.record({ type: "request-duration", action, durationMs }, signal);
		}
		return result;
	}

	private async record(event: SimulationEvent, signal: AbortSignal): Promise<void> {
		if (signal.aborted) return;
		await this.events.send(event);
	}

	private attach(stop: AbortSignal): void {
		this.detach();
		const listener = (message: InboundMessage) => {
			if (stop.aborted) return;
			this.events.send({ type: "message-received", id: message.eventId }).catch((error: unknown) => {
				this.logger.warn(`${this.id} could not record a received message: ${String(error)}`);
			});
		};
		this.messageListener = listener;
		this.client.on("message", listener);
	}

	private detach(): void {
		if (!this.messageListener) return;
		this.client.off("message", this.messageListener);
		this.messageListener = null;
	}
}

function addRoom(roomId: string): Transition {
	return (current) => (current.kind === "syncing" ? { ...current, rooms: withRoom(current.rooms, roomId) } : current);
}

/**
 * Room creations join the room list directly; invites and messages queue up for a reaction.
 * Invites to rooms already joined are dropped.
 */
function absorb(events: SyncEvent[]): Transition {
	return (current) => {
		if (current.kind !== "syncing" || events.length === 0) return current;
		let rooms = current.rooms;
		const pending = [...current.pending];
		for (const event of events) {
			if (event.type === "room-created") {
				rooms = withRoom(rooms, event.roomId);
			} else if (event.type === "invite") {
				if (!rooms.includes(event.roomId)) pending.push(event);
			} else {
				pending.push(event);
			}
		}
		return { ...current, rooms, pending };
	};
}

/**
 * Makes two users friends: the first opens a room inviting the second, who joins it.
 */
export async function connectUsers(first: User, second: User): Promise<boolean> {
	const roomId = await first.createRoom([second.id]);
	if (roomId === null) {
		return false;
	}
	return second.joinRoom(roomId);
}
