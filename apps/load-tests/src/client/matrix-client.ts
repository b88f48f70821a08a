import {
	type CallResult,
	ClientError,
	ErrorCode,
	type IChatClient,
	type ILogger,
	type InboundMessage,
	type LoginOutcome,
	noopLogger,
	type RegisterOutcome,
	retry,
	type SyncEvent,
	type SyncOutcome,
	sleep,
} from "@homeserver-loadgen/core";
import { EventEmitter } from "eventemitter3";
import { v4 as uuidv4 } from "uuid";

const API = "/_matrix/client/v3";
const DEFAULT_PASSWORD = "loadgen-password";
const REQUEST_TIMEOUT_MS = 30_000;
const SYNC_TIMEOUT_MS = 30_000;
const RETRY_ATTEMPTS = 3;
const SYNC_ERROR_BACKOFF_MS = 1_000;

/**
 * Matrix API error, carrying the HTTP status and the Matrix `errcode` when there is one.
 */
export class MatrixApiError extends ClientError {
	constructor(
		message: string,
		public readonly statusCode: number,
		public readonly errcode?: string,
	) {
		super(ErrorCode.CLIENT_REQUEST_FAILED, message);
	}

	/** Server overload and gateway errors are worth another attempt. */
	get isTransient(): boolean {
		return this.statusCode === 429 || this.statusCode >= 500;
	}
}

/**
 * Splits a homeserver argument into its server name and base URL.
 *  - getHomeserverUrl("matrix.domain.com") => { serverName: "matrix.domain.com", url: "https://matrix.domain.com" }
 *  - an explicit http:// or https:// prefix is kept as given
 */
export function getHomeserverUrl(homeserver: string, protocol = "https"): { serverName: string; url: string } {
	const match = /^https?:\/\//.exec(homeserver);
	if (match) {
		return { serverName: homeserver.slice(match[0].length), url: homeserver };
	}
	return { serverName: homeserver, url: `${protocol}://${homeserver}` };
}

export interface MatrixClientOptions {
	homeserver: string;
	/** Retry transient failures with exponential backoff; a single attempt otherwise. */
	retryEnabled: boolean;
	retryDelayMs?: number;
	requestTimeoutMs?: number;
	syncTimeoutMs?: number;
	password?: string;
	logger?: ILogger;
	fetch?: typeof fetch;
}

type Json = Record<string, unknown>;

interface ApiResponse {
	status: number;
	data: Json;
}

type ClientEvents = {
	message: [message: InboundMessage];
};

/**
 * Client-server API client for one simulated user. A background long-poll
 * sync buffers invites, messages and newly joined rooms until they are read.
 */
export class MatrixHttpClient extends EventEmitter<ClientEvents> implements IChatClient {
	userId: string | null = null;
	private readonly serverName: string;
	private readonly baseUrl: string;
	private readonly options: MatrixClientOptions;
	private readonly logger: ILogger;
	private readonly fetchImpl: typeof fetch;
	private accessToken: string | null = null;
	private nextBatch: string | null = null;
	private cancel: AbortController | null = null;
	private syncTask: Promise<void> | null = null;
	private inbox: SyncEvent[] = [];
	private readonly knownRooms = new Set<string>();

	constructor(options: MatrixClientOptions) {
		super();
		const { serverName, url } = getHomeserverUrl(options.homeserver);
		this.serverName = serverName;
		this.baseUrl = url.replace(/\/+$/, "");
		this.options = options;
		this.logger = options.logger ?? noopLogger;
		this.fetchImpl = options.fetch ?? fetch;
	}

	/** Settles once the background sync has stopped; resolves at once when none runs. */
	get syncStopped(): Promise<void> {
		return this.syncTask ?? Promise.resolve();
	}

	async register(localpart: string): Promise<RegisterOutcome> {
		try {
			const { status, data } = await this.request("POST", `${API}/register`, {
				body: { username: localpart, password: this.password, auth: { type: "m.login.dummy" }, inhibit_login: true },
			});
			if (status === 200) {
				this.userId = readString(data, "user_id") ?? this.toUserId(localpart);
				return { status: "ok" };
			}
			if (readString(data, "errcode") === "M_USER_IN_USE") {
				this.userId = this.toUserId(localpart);
				return { status: "already-exists" };
			}
			return { status: "failed", error: toApiError("register", status, data) };
		} catch (error) {
			return { status: "failed", error: toError(error) };
		}
	}

	async login(localpart: string): Promise<LoginOutcome> {
		try {
			const { status, data } = await this.request("POST", `${API}/login`, {
				body: { type: "m.login.password", identifier: { type: "m.id.user", user: localpart }, password: this.password },
			});
			const token = readString(data, "access_token");
			if (status === 200 && token) {
				this.accessToken = token;
				this.userId = readString(data, "user_id") ?? this.toUserId(localpart);
				return { status: "ok" };
			}
			if (status === 403 && readString(data, "errcode") === "M_FORBIDDEN") return { status: "not-registered" };
			return { status: "failed", error: toApiError("login", status, data) };
		} catch (error) {
			return { status: "failed", error: toError(error) };
		}
	}

	async sync(): Promise<SyncOutcome> {
		const unauthenticated = this.requireSession("sync");
		if (unauthenticated) return unauthenticated;
		try {
			const { status, data } = await this.request("GET", `${API}/sync`, { query: { timeout: "0" }, auth: true });
			if (status !== 200) return { status: "failed", error: toApiError("sync", status, data) };

			const rooms = readObject(data, "rooms");
			const joinedRooms = Object.keys(readObject(rooms, "join"));
			const invitedRooms = Object.keys(readObject(rooms, "invite"));
			for (const roomId of joinedRooms) this.knownRooms.add(roomId);
			this.nextBatch = readString(data, "next_batch") ?? null;

			this.stopSync();
			const cancel = new AbortController();
			this.cancel = cancel;
			this.syncTask = this.syncLoop(cancel.signal).catch((error: unknown) => {
				this.logger.warn(`Background sync of ${this.userId} stopped: ${toError(error).message}`);
			});
			return { status: "ok", joinedRooms, invitedRooms, cancel };
		} catch (error) {
			return { status: "failed", error: toError(error) };
		}
	}

	readSyncEvents(): SyncEvent[] {
		return this.inbox.splice(0);
	}

	createRoom(invitees: string[]): Promise<CallResult<string>> {
		return this.openRoom({ invite: invitees, preset: "private_chat" });
	}

	async joinRoom(roomId: string): Promise<CallResult<string>> {
		return this.authenticated("joinRoom", async () => {
			const { status, data } = await this.request("POST", `${API}/join/${encodeURIComponent(roomId)}`, { body: {}, auth: true });
			const joined = readString(data, "room_id");
			if (status !== 200 || !joined) throw toApiError("joinRoom", status, data);
			this.knownRooms.add(joined);
			return joined;
		});
	}

	async sendMessage(roomId: string, text: string): Promise<CallResult<string>> {
		return this.authenticated("sendMessage", async () => {
			const path = `${API}/rooms/${encodeURIComponent(roomId)}/send/m.room.message/${uuidv4()}`;
			const { status, data } = await this.request("PUT", path, { body: { msgtype: "m.text", body: text }, auth: true });
			const eventId = readString(data, "event_id");
			if (status !== 200 || !eventId) throw toApiError("sendMessage", status, data);
			return eventId;
		});
	}

	addFriend(userId: string): Promise<CallResult<string>> {
		return this.openRoom({ invite: [userId], is_direct: true, preset: "trusted_private_chat" });
	}

	async updateStatus(): Promise<CallResult> {
		return this.authenticated("updateStatus", async () => {
			const path = `${API}/presence/${encodeURIComponent(this.userId ?? "")}/status`;
			const { status, data } = await this.request("PUT", path, {
				body: { presence: "online", status_msg: `Load testing ${new Date().toISOString()}` },
				auth: true,
			});
			if (status !== 200) throw toApiError("updateStatus", status, data);
		});
	}

	async logout(): Promise<CallResult> {
		return this.authenticated("logout", async () => {
			const { status, data } = await this.request("POST", `${API}/logout`, { body: {}, auth: true });
			if (status !== 200) throw toApiError("logout", status, data);
			this.accessToken = null;
			this.stopSync();
		});
	}

	reset(): void {
		this.stopSync();
		this.accessToken = null;
		this.nextBatch = null;
		this.inbox = [];
		this.knownRooms.clear();
	}

	private get password(): string {
		return this.options.password ?? DEFAULT_PASSWORD;
	}

	private toUserId(localpart: string): string {
		return `@${localpart}:${this.serverName}`;
	}

	private openRoom(body: Json): Promise<CallResult<string>> {
		return this.authenticated("createRoom", async () => {
			const { status, data } = await this.request("POST", `${API}/createRoom`, { body, auth: true });
			const roomId = readString(data, "room_id");
			if (status !== 200 || !roomId) throw toApiError("createRoom", status, data);
			this.knownRooms.add(roomId);
			return roomId;
		});
	}

	private requireSession(operation: string): { status: "failed"; error: Error } | null {
		if (this.accessToken) return null;
		return { status: "failed", error: new ClientError(ErrorCode.CLIENT_NOT_AUTHENTICATED, `${operation} requires a login`) };
	}

	private async authenticated<T>(operation: string, work: () => Promise<T>): Promise<CallResult<T>> {
		const unauthenticated = this.requireSession(operation);
		if (unauthenticated) return unauthenticated;
		try {
			return { status: "ok", value: await work() };
		} catch (error) {
			return { status: "failed", error: toError(error) };
		}
	}

	private stopSync(): void {
		this.cancel?.abort();
		this.cancel = null;
	}

	/**
	 * Long-polls /sync until `signal` aborts or the session is rejected.
	 */
	private async syncLoop(signal: AbortSignal): Promise<void> {
		const timeout = this.options.syncTimeoutMs ?? SYNC_TIMEOUT_MS;
		while (!signal.aborted) {
			const query: Record<string, string> = { timeout: String(timeout) };
			if (this.nextBatch) query.since = this.nextBatch;
			let response: ApiResponse;
			try {
				response = await this.request("GET", `${API}/sync`, { query, auth: true, signal, retry: false });
			} catch (error) {
				if (signal.aborted) return;
				this.logger.debug(`Sync of ${this.userId} failed: ${toError(error).message}`);
				await sleep(SYNC_ERROR_BACKOFF_MS);
				continue;
			}
			if (signal.aborted) return;
			if (response.status === 401) {
				this.stopSync();
				return;
			}
			if (response.status !== 200) {
				await sleep(SYNC_ERROR_BACKOFF_MS);
				continue;
			}
			this.nextBatch = readString(response.data, "next_batch") ?? this.nextBatch;
			this.absorb(response.data);
		}
	}

	private absorb(data: Json): void {
		const rooms = readObject(data, "rooms");
		for (const roomId of Object.keys(readObject(rooms, "invite"))) {
			this.inbox.push({ type: "invite", roomId });
		}
		for (const [roomId, room] of Object.entries(readObject(rooms, "join"))) {
			if (!this.knownRooms.has(roomId)) {
				this.knownRooms.add(roomId);
				this.inbox.push({ type: "room-created", roomId });
			}
			for (const event of readArray(readObject(toObject(room), "timeline"), "events")) {
				const fields = toObject(event);
				const sender = readString(fields, "sender");
				const eventId = readString(fields, "event_id");
				if (readString(fields, "type") !== "m.room.message" || !sender || !eventId || sender === this.userId) continue;
				const body = readString(readObject(fields, "content"), "body") ?? "";
				this.inbox.push({ type: "message", roomId, eventId, sender, body });
				this.emit("message", { roomId, eventId, sender });
			}
		}
	}

	private async request(
		method: string,
		path: string,
		init: { body?: unknown; query?: Record<string, string>; auth?: boolean; signal?: AbortSignal; retry?: boolean } = {},
	): Promise<ApiResponse> {
		const url = new URL(`${this.baseUrl}${path}`);
		for (const [key, value] of Object.entries(init.query ?? {})) url.searchParams.set(key, value);

		const headers: Record<string, string> = { "Content-Type": "application/json" };
		if (init.auth && this.accessToken) headers.Authorization = `Bearer ${this.accessToken}`;

		const attempt = async (): Promise<ApiResponse> => {
			const response = await this.fetchImpl(url, {
				method,
				headers,
				body: init.body === undefined ? undefined : JSON.stringify(init.body),
				signal: init.signal ?? AbortSignal.timeout(this.options.requestTimeoutMs ?? REQUEST_TIMEOUT_MS),
			});
			const text = await response.text();
			const data: Json = text ? toObject(parseJson(text)) : {};
			const error = toApiError(`${method} ${path}`, response.status, data);
			if (error.isTransient) throw error;
			return { status: response.status, data };
		};

		const retryEnabled = this.options.retryEnabled && init.retry !== false;
		return retry(attempt, {
			attempts: retryEnabled ? RETRY_ATTEMPTS : 1,
			delay: this.options.retryDelayMs ?? 500,
			shouldRetry: (error) => !(error instanceof MatrixApiError) || error.isTransient,
			onRetry: (error, n) => this.logger.debug(`Retrying ${method} ${path} (attempt ${n + 1}): ${toError(error).message}`),
		});
	}
}

function toApiError(operation: string, status: number, data: Json): MatrixApiError {
	const errcode = readString(data, "errcode");
	const detail = readString(data, "error") ?? errcode ?? `HTTP ${status}`;
	return new MatrixApiError(`${operation} failed: ${detail}`, status, errcode);
}

function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}

function parseJson(text: string): unknown {
	try {
		return JSON.parse(text);
	} catch {
		return null;
	}
}

function toObject(value: unknown): Json {
	return typeof value === "object" && value !== null && !Array.isArray(value) ? { ...value } : {};
}

function readObject(data: Json, key: string): Json {
	return toObject(data[key]);
}

function readArray(data: Json, key: string): unknown[] {
	const value = data[key];
	return Array.isArray(value) ? value : [];
}

function readString(data: Json, key: string): string | undefined {
	const value = data[key];
	return typeof value === "string" ? value : undefined;
}
