/**
 * Every externally visible request a simulated user can issue.
 * Values are the keys used in reports.
 */
export enum ActionKind {
	REGISTER = "register",
	LOGIN = "login",
	SYNC = "sync",
	CREATE_ROOM = "create_room",
	JOIN_ROOM = "join_room",
	SEND_MESSAGE = "send_message",
	ADD_FRIEND = "add_friend",
	UPDATE_STATUS = "update_status",
	LOGOUT = "logout",
}

export const ALL_ACTION_KINDS: readonly ActionKind[] = Object.values(ActionKind);
