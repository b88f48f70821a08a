import type { ActionKind } from "./action.js";

/**
 * Timed outcomes flowing from users and the scheduler to the metrics aggregator.
 */
export type SimulationEvent =
	| { type: "request-duration"; action: ActionKind; durationMs: number }
	| { type: "error"; action: ActionKind; cause: Error }
	| { type: "message-sent"; id: string }
	| { type: "message-received"; id: string }
	| { type: "all-messages-sent" }
	| { type: "finish" };

export type SimulationEventType = SimulationEvent["type"];
