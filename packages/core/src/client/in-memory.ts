import { EventEmitter } from "eventemitter3";
import type {
	CallResult,
	IChatClient,
	InboundMessage,
	LoginOutcome,
	RegisterOutcome,
	SyncEvent,
	SyncOutcome,
} from "../domain/client.js";
import { ClientError, ErrorCode } from "../domain/errors.js";
import { defaultRng, type Rng } from "../utils/random.js";
import { sleep } from "../utils/timing.js";

export type InMemoryOperation =
	| "register"
	| "login"
	| "sync"
	| "createRoom"
	| "joinRoom"
	| "sendMessage"
	| "updateStatus"
	| "logout";

export interface InMemoryHomeserverOptions {
	serverName?: string;
	/** Artificial response time per request in ms (fixed, or drawn per call). */
	latencyMs?: number | (() => number);
	/** Probability that any request fails. */
	failureRate?: number;
	/**
	 * Fails the request when it returns true; checked before `failureRate`.
	 * `who` is the localpart for register and login, the user id afterwards.
	 */
	shouldFail?: (operation: InMemoryOperation, who: string) => boolean;
	rng?: Rng;
}

interface Room {
	members: Set<string>;
	invited: Set<string>;
	messages: number;
}

/**
 * A homeserver living in the current process. Accounts, rooms and live sync
 * delivery behave like the real thing, without a network.
 */
export class InMemoryHomeserver {
	readonly serverName: string;
	private readonly accounts = new Set<string>();
	private readonly rooms = new Map<string, Room>();
	private readonly syncing = new Map<string, Set<InMemoryClient>>();
	private readonly options: InMemoryHomeserverOptions;
	private readonly rng: Rng;
	private nextRoom = 1;
	private nextEvent = 1;

	constructor(options: InMemoryHomeserverOptions = {}) {
		this.options = options;
		this.serverName = options.serverName ?? "localhost";
		this.rng = options.rng ?? defaultRng;
	}

	createClient(): InMemoryClient {
		return new InMemoryClient(this);
	}

	userIdFor(localpart: string): string {
		return `@${localpart}:${this.serverName}`;
	}

	get accountCount(): number {
		return this.accounts.size;
	}

	get roomCount(): number {
		return this.rooms.size;
	}

	/** Members of `roomId`, empty for an unknown room. */
	membersOf(roomId: string): string[] {
		return [...(this.rooms.get(roomId)?.members ?? [])];
	}

	/** Ends every live sync of `userId`, as a server-side session revocation would. */
	revoke(userId: string): void {
		for (const client of this.syncing.get(userId) ?? []) client.endSync();
		this.syncing.delete(userId);
	}

	/** Simulated network round-trip; resolves with an error when this request should fail. */
	async respond(operation: InMemoryOperation, who: string): Promise<Error | null> {
		const { latencyMs = 0, failureRate = 0, shouldFail } = this.options;
		const latency = typeof latencyMs === "function" ? latencyMs() : latencyMs;
		await (latency > 0 ? sleep(latency) : Promise.resolve());
		if (shouldFail?.(operation, who) || (failureRate > 0 && this.rng() < failureRate)) {
			return new ClientError(ErrorCode.INJECTED_FAILURE, `${operation} failed for ${who}`);
		}
		return null;
	}

	hasAccount(userId: string): boolean {
		return this.accounts.has(userId);
	}

	addAccount(userId: string): boolean {
		if (this.accounts.has(userId)) return false;
		this.accounts.add(userId);
		return true;
	}

	roomsOf(userId: string): { joined: string[]; invited: string[] } {
		const joined: string[] = [];
		const invited: string[] = [];
		for (const [roomId, room] of this.rooms) {
			if (room.members.has(userId)) joined.push(roomId);
			else if (room.invited.has(userId)) invited.push(roomId);
		}
		return { joined, invited };
	}

	attach(userId: string, client: InMemoryClient): void {
		let clients = this.syncing.get(userId);
		if (!clients) {
			clients = new Set();
			this.syncing.set(userId, clients);
		}
		clients.add(client);
	}

	detach(userId: string, client: InMemoryClient): void {
		this.syncing.get(userId)?.delete(client);
	}

	createRoom(creator: string, invitees: string[]): string {
		const roomId = `!room${this.nextRoom++}:${this.serverName}`;
		const invited = new Set(invitees.filter((invitee) => invitee !== creator));
		this.rooms.set(roomId, { members: new Set([creator]), invited, messages: 0 });
		this.deliver(creator, { type: "room-created", roomId });
		for (const invitee of invited) this.deliver(invitee, { type: "invite", roomId });
		return roomId;
	}

	join(roomId: string, userId: string): Error | null {
		const room = this.rooms.get(roomId);
		if (!room) return new ClientError(ErrorCode.ROOM_NOT_FOUND, `Unknown room ${roomId}`);
		if (room.members.has(userId)) return null;
		if (!room.invited.has(userId)) return new ClientError(ErrorCode.NOT_INVITED, `${userId} is not invited to ${roomId}`);
		room.invited.delete(userId);
		room.members.add(userId);
		return null;
	}

	send(roomId: string, sender: string, body: string): CallResult<string> {
		const room = this.rooms.get(roomId);
		if (!room) return { status: "failed", error: new ClientError(ErrorCode.ROOM_NOT_FOUND, `Unknown room ${roomId}`) };
		if (!room.members.has(sender)) {
			return { status: "failed", error: new ClientError(ErrorCode.NOT_INVITED, `${sender} is not in ${roomId}`) };
		}
		const eventId = `$event${this.nextEvent++}`;
		room.messages++;
		for (const member of room.members) {
			if (member !== sender) this.deliver(member, { type: "message", roomId, eventId, sender, body });
		}
		return { status: "ok", value: eventId };
	}

	private deliver(userId: string, event: SyncEvent): void {
		for (const client of this.syncing.get(userId) ?? []) client.receive(event);
	}
}

type ClientEvents = {
	message: [message: InboundMessage];
};

/**
 * Client bound to an `InMemoryHomeserver`.
 */
export class InMemoryClient extends EventEmitter<ClientEvents> implements IChatClient {
	userId: string | null = null;
	private authenticated = false;
	private cancel: AbortController | null = null;
	private inbox: SyncEvent[] = [];

	constructor(private readonly server: InMemoryHomeserver) {
		super();
	}

	get isSyncing(): boolean {
		return this.cancel !== null && !this.cancel.signal.aborted;
	}

	async register(localpart: string): Promise<RegisterOutcome> {
		const error = await this.server.respond("register", localpart);
		if (error) return { status: "failed", error };
		const userId = this.server.userIdFor(localpart);
		this.userId = userId;
		return this.server.addAccount(userId) ? { status: "ok" } : { status: "already-exists" };
	}

	async login(localpart: string): Promise<LoginOutcome> {
		const error = await this.server.respond("login", localpart);
		if (error) return { status: "failed", error };
		const userId = this.server.userIdFor(localpart);
		if (!this.server.hasAccount(userId)) return { status: "not-registered" };
		this.userId = userId;
		this.authenticated = true;
		return { status: "ok" };
	}

	async sync(): Promise<SyncOutcome> {
		const failure = await this.guard("sync");
		if (failure) return failure;
		const userId = this.requireUserId();

		this.endSync();
		const cancel = new AbortController();
		this.cancel = cancel;
		this.server.attach(userId, this);
		cancel.signal.addEventListener("abort", () => this.server.detach(userId, this), { once: true });

		const { joined, invited } = this.server.roomsOf(userId);
		return { status: "ok", joinedRooms: joined, invitedRooms: invited, cancel };
	}

	readSyncEvents(): SyncEvent[] {
		return this.inbox.splice(0);
	}

	async createRoom(invitees: string[]): Promise<CallResult<string>> {
		const failure = await this.guard("createRoom");
		if (failure) return failure;
		return { status: "ok", value: this.server.createRoom(this.requireUserId(), invitees) };
	}

	async joinRoom(roomId: string): Promise<CallResult<string>> {
		const failure = await this.guard("joinRoom");
		if (failure) return failure;
		const error = this.server.join(roomId, this.requireUserId());
		return error ? { status: "failed", error } : { status: "ok", value: roomId };
	}

	async sendMessage(roomId: string, text: string): Promise<CallResult<string>> {
		const failure = await this.guard("sendMessage");
		if (failure) return failure;
		return this.server.send(roomId, this.requireUserId(), text);
	}

	addFriend(userId: string): Promise<CallResult<string>> {
		return this.createRoom([userId]);
	}

	async updateStatus(): Promise<CallResult> {
		const failure = await this.guard("updateStatus");
		return failure ?? { status: "ok", value: undefined };
	}

	async logout(): Promise<CallResult> {
		const failure = await this.guard("logout");
		if (failure) return failure;
		this.authenticated = false;
		this.endSync();
		return { status: "ok", value: undefined };
	}

	reset(): void {
		this.authenticated = false;
		this.endSync();
		this.inbox = [];
	}

	/** Called by the server for every event addressed to this client's user. */
	receive(event: SyncEvent): void {
		if (!this.isSyncing) return;
		this.inbox.push(event);
		if (event.type === "message") {
			this.emit("message", { roomId: event.roomId, eventId: event.eventId, sender: event.sender });
		}
	}

	endSync(): void {
		this.cancel?.abort();
		this.cancel = null;
	}

	private async guard(operation: InMemoryOperation): Promise<{ status: "failed"; error: Error } | null> {
		const error = await this.server.respond(operation, this.userId ?? "anonymous");
		if (error) return { status: "failed", error };
		if (!this.authenticated || this.userId === null) {
			return { status: "failed", error: new ClientError(ErrorCode.CLIENT_NOT_AUTHENTICATED, `${operation} requires a login`) };
		}
		return null;
	}

	private requireUserId(): string {
		if (this.userId === null) throw new ClientError(ErrorCode.CLIENT_NOT_AUTHENTICATED, "No user id");
		return this.userId;
	}
}
