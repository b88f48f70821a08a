import type { SyncEvent } from "./client.js";

/**
 * Lifecycle of a simulated user. Each variant carries only what that stage needs.
 */
export type UserState =
	| { kind: "unregistered" }
	| { kind: "unauthenticated" }
	| { kind: "logged-in" }
	| {
			kind: "syncing";
			/** Unique, in join order. */
			rooms: readonly string[];
			/** Invites and messages not yet reacted to; the newest is handled first. */
			pending: readonly SyncEvent[];
			cancel: AbortController;
	  }
	| { kind: "logged-out" };

export type UserStateKind = UserState["kind"];

export type SyncingState = Extract<UserState, { kind: "syncing" }>;

/**
 * Appends `roomId` unless it is already known.
 */
export function withRoom(rooms: readonly string[], roomId: string): readonly string[] {
	return rooms.includes(roomId) ? rooms : [...rooms, roomId];
}
