import * as t from "vitest";
import { InMemoryHomeserver } from "../client/in-memory.js";
import { ActionKind } from "../domain/action.js";
import type { SimulationEvent } from "../domain/event.js";
import { EventChannel } from "../events/channel.js";
import { connectUsers, User, type UserOptions } from "./user.js";

async function drain(channel: EventChannel<SimulationEvent>): Promise<SimulationEvent[]> {
	const events: SimulationEvent[] = [];
	while (channel.size > 0) {
		const event = await channel.recv();
		if (event) events.push(event);
	}
	return events;
}

t.describe("User", () => {
	let server: InMemoryHomeserver;
	let channel: EventChannel<SimulationEvent>;

	const createUser = (localpart: string, options: Partial<UserOptions> = {}) =>
		new User({ localpart, client: server.createClient(), events: channel, ...options });

	const toSyncing = async (user: User) => {
		await user.act();
		await user.act();
		await user.act();
		t.expect(user.stateKind).toBe("syncing");
	};

	t.beforeEach(() => {
		server = new InMemoryHomeserver({ serverName: "test.local" });
		channel = new EventChannel<SimulationEvent>(1000);
	});

	t.describe("onboarding", () => {
		t.it("moves from unregistered to unauthenticated on a fresh registration", async () => {
			const user = createUser("alice");
			t.expect(await user.act()).toBe("done");
			t.expect(user.stateKind).toBe("unauthenticated");

			const [event] = await drain(channel);
			t.expect(event).toMatchObject({ type: "request-duration", action: ActionKind.REGISTER });
		});

		t.it("treats an existing account as registered", async () => {
			await createUser("alice").act();
			const again = createUser("alice");
			await again.act();
			t.expect(again.stateKind).toBe("unauthenticated");
		});

		t.it("stays unregistered and records the error when registration fails", async () => {
			server = new InMemoryHomeserver({ shouldFail: (operation) => operation === "register" });
			const user = createUser("alice");
			await user.act();
			t.expect(user.stateKind).toBe("unregistered");

			const [event] = await drain(channel);
			t.expect(event).toMatchObject({ type: "error", action: ActionKind.REGISTER });
		});

		t.it("goes back to registration when the server does not know the user", async () => {
			const user = createUser("alice");
			await user.act();
			t.vi.spyOn(user.client, "login").mockResolvedValueOnce({ status: "not-registered" });
			await user.act();
			t.expect(user.stateKind).toBe("unregistered");

			const events = await drain(channel);
			t.expect(events[1]).toMatchObject({ type: "error", action: ActionKind.LOGIN });
		});

		t.it("turns invites seen on the first sync into pending events", async () => {
			const alice = createUser("alice");
			await toSyncing(alice);
			const roomId = await alice.createRoom(["@bob:test.local"]);

			const bob = createUser("bob");
			await toSyncing(bob);
			const state = bob.currentState;
			t.expect(state.kind === "syncing" && state.pending).toEqual([{ type: "invite", roomId }]);

			await bob.act();
			t.expect(bob.rooms).toEqual([roomId]);
		});
	});

	t.describe("socializing", () => {
		t.it("reacts to the most recent pending event first", async () => {
			const alice = createUser("alice");
			const bob = createUser("bob", { rng: () => 0.9 });
			await toSyncing(alice);
			await toSyncing(bob);

			const shared = await alice.createRoom([bob.id]);
			if (shared === null) throw new Error("room creation failed");
			await bob.joinRoom(shared);
			const second = await alice.createRoom([bob.id]);
			const sent = await alice.client.sendMessage(shared, "ping");
			t.expect(sent.status).toBe("ok");
			await drain(channel);

			// inbox: invite(shared) [already joined], invite(second), message(shared)
			await bob.act();
			const afterReply = bob.currentState;
			t.expect(afterReply.kind === "syncing" && afterReply.pending).toEqual([{ type: "invite", roomId: second }]);
			const events = await drain(channel);
			t.expect(events.map((event) => event.type)).toEqual(["message-received", "request-duration", "message-sent"]);
			t.expect(events[1]).toMatchObject({ action: ActionKind.SEND_MESSAGE });

			await bob.act();
			t.expect(bob.rooms).toEqual([shared, second]);
			const finalState = bob.currentState;
			t.expect(finalState.kind === "syncing" && finalState.pending).toEqual([]);
		});

		t.it("logs out on the first trial", async () => {
			const user = createUser("alice", { rng: () => 0.01 });
			await toSyncing(user);
			const state = user.currentState;
			if (state.kind !== "syncing") throw new Error("not syncing");

			await user.act();
			t.expect(user.stateKind).toBe("logged-out");
			t.expect(state.cancel.signal.aborted).toBe(true);

			await user.act();
			t.expect(user.stateKind).toBe("unauthenticated");
			await user.act();
			t.expect(user.stateKind).toBe("logged-in");
		});

		t.it("updates the status on the second trial", async () => {
			const user = createUser("alice", { rng: () => 0.03 });
			await toSyncing(user);
			await drain(channel);

			await user.act();
			t.expect(await drain(channel)).toEqual([
				{ type: "request-duration", action: ActionKind.UPDATE_STATUS, durationMs: t.expect.any(Number) },
			]);
		});

		t.it("adds a friend on the third trial", async () => {
			const bob = createUser("bob");
			await toSyncing(bob);
			const alice = createUser("alice", { rng: () => 0.2, pickFriend: () => bob.id });
			await toSyncing(alice);

			await alice.act();
			t.expect(alice.rooms).toHaveLength(1);
			t.expect(bob.client.readSyncEvents()).toEqual([{ type: "invite", roomId: alice.rooms[0] }]);
		});

		t.it("does nothing when there is nobody to befriend", async () => {
			const alice = createUser("alice", { rng: () => 0.2 });
			await toSyncing(alice);
			await drain(channel);

			t.expect(await alice.act()).toBe("done");
			t.expect(await drain(channel)).toEqual([]);
		});

		t.it("sends a message to a known room otherwise", async () => {
			const alice = createUser("alice", { rng: () => 0.9 });
			const bob = createUser("bob");
			await toSyncing(alice);
			await toSyncing(bob);
			t.expect(await connectUsers(alice, bob)).toBe(true);
			await drain(channel);

			await alice.act();
			const events = await drain(channel);
			t.expect(events).toContainEqual({ type: "message-sent", id: "$event1" });
			t.expect(events).toContainEqual({ type: "message-received", id: "$event1" });
		});

		t.it("logs out without a request once the sync was stopped", async () => {
			const user = createUser("alice");
			await toSyncing(user);
			await drain(channel);

			server.revoke(user.id);
			await user.act();
			t.expect(user.stateKind).toBe("logged-out");
			t.expect(await drain(channel)).toEqual([]);
		});
	});

	t.describe("cancellation", () => {
		t.it("discards the result of a cancelled action and skips overlapping calls", async () => {
			server = new InMemoryHomeserver({ latencyMs: 30 });
			const user = createUser("alice");
			const controller = new AbortController();

			const first = user.act(controller.signal);
			t.expect(user.isBusy).toBe(true);
			t.expect(await user.act()).toBe("skipped");
			controller.abort();

			t.expect(await first).toBe("cancelled");
			t.expect(user.stateKind).toBe("unregistered");
			t.expect(user.isBusy).toBe(false);
			t.expect(await drain(channel)).toEqual([]);
		});
	});

	t.it("connects two users through a shared room", async () => {
		const alice = createUser("alice");
		const bob = createUser("bob");
		await toSyncing(alice);
		await toSyncing(bob);

		t.expect(await connectUsers(alice, bob)).toBe(true);
		t.expect(alice.rooms).toEqual(["!room1:test.local"]);
		t.expect(bob.rooms).toEqual(["!room1:test.local"]);
	});

	t.it("cannot connect users that are not syncing", async () => {
		const alice = createUser("alice");
		const bob = createUser("bob");
		t.expect(await connectUsers(alice, bob)).toBe(false);
	});
});
