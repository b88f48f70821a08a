/**
 * Outcome of a call that only succeeds or fails.
 * Protocol failures are values, never rejections.
 */
export type CallResult<T = void> = { status: "ok"; value: T } | { status: "failed"; error: Error };

export type RegisterOutcome = { status: "ok" } | { status: "already-exists" } | { status: "failed"; error: Error };

export type LoginOutcome = { status: "ok" } | { status: "not-registered" } | { status: "failed"; error: Error };

export type SyncOutcome =
	| {
			status: "ok";
			joinedRooms: string[];
			invitedRooms: string[];
			/** Aborting stops the background sync; the client aborts it itself when the session dies. */
			cancel: AbortController;
	  }
	| { status: "failed"; error: Error };

/**
 * Something the background sync observed since the last read.
 */
export type SyncEvent =
	| { type: "invite"; roomId: string }
	| { type: "message"; roomId: string; eventId: string; sender: string; body: string }
	| { type: "room-created"; roomId: string };

/**
 * An inbound message from another user, reported as soon as sync sees it.
 */
export interface InboundMessage {
	roomId: string;
	eventId: string;
	sender: string;
}

/**
 * The chat protocol as the simulation needs it. One instance per simulated user.
 */
export interface IChatClient {
	/** Fully qualified id (`@localpart:server`) once known. */
	readonly userId: string | null;

	register(localpart: string): Promise<RegisterOutcome>;
	login(localpart: string): Promise<LoginOutcome>;
	sync(): Promise<SyncOutcome>;

	/** Drains everything the background sync buffered since the previous call. */
	readSyncEvents(): SyncEvent[];

	createRoom(invitees: string[]): Promise<CallResult<string>>;
	joinRoom(roomId: string): Promise<CallResult<string>>;
	/** Resolves with the id the server assigned to the message. */
	sendMessage(roomId: string, text: string): Promise<CallResult<string>>;
	/** Opens a direct room with `userId` and resolves with its id. */
	addFriend(userId: string): Promise<CallResult<string>>;
	updateStatus(): Promise<CallResult>;
	logout(): Promise<CallResult>;

	/** Forgets credentials and sync position so the user can log in again. */
	reset(): void;

	on(event: "message", handler: (message: InboundMessage) => void): void;
	off(event: "message", handler: (message: InboundMessage) => void): void;
}

/**
 * Creates one client per simulated user.
 */
export type ChatClientFactory = () => IChatClient;
