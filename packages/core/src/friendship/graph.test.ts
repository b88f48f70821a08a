import * as t from "vitest";
import { InMemoryHomeserver } from "../client/in-memory.js";
import type { SimulationEvent } from "../domain/event.js";
import { EventChannel } from "../events/channel.js";
import { connectUsers, User } from "../user/user.js";
import { FriendshipGraph } from "./graph.js";

type Node = { id: string };

const nodes = (count: number): Node[] => Array.from({ length: count }, (_, i) => ({ id: `u${i}` }));
const succeed = async () => true;

t.describe("FriendshipGraph", () => {
	t.it("reaches the target with distinct pairs and no self-pairs", async () => {
		const graph = new FriendshipGraph<Node>({ concurrency: 2 });
		const result = await graph.extend(nodes(4), 0.5, succeed);

		t.expect(result).toEqual({ target: 3, added: 3, failed: 0 });
		const pairs = graph.list();
		t.expect(pairs).toHaveLength(3);
		t.expect(new Set(pairs.map((p) => `${p.first}|${p.second}`)).size).toBe(3);
		for (const pair of pairs) t.expect(pair.first < pair.second).toBe(true);
	});

	t.it("only adds what is missing when the population grows", async () => {
		const graph = new FriendshipGraph<Node>({ concurrency: 4 });
		await graph.extend(nodes(4), 0.5, succeed);
		const before = graph.list();

		t.expect(await graph.extend(nodes(4), 0.5, succeed)).toEqual({ target: 3, added: 0, failed: 0 });

		const result = await graph.extend(nodes(5), 0.5, succeed);
		t.expect(result).toEqual({ target: 5, added: 2, failed: 0 });
		t.expect(graph.list()).toEqual(t.expect.arrayContaining(before));
	});

	t.it("enumerates missing pairs for dense targets", async () => {
		const graph = new FriendshipGraph<Node>({ concurrency: 3 });
		const result = await graph.extend(nodes(6), 1, succeed);
		t.expect(result).toEqual({ target: 15, added: 15, failed: 0 });
		t.expect(graph.has("u0", "u5")).toBe(true);
		t.expect(graph.has("u5", "u0")).toBe(true);
	});

	t.it("leaves out pairs whose connection failed", async () => {
		const graph = new FriendshipGraph<Node>({ concurrency: 1 });
		const result = await graph.extend(nodes(3), 1, async (a, b) => a.id !== "u0" && b.id !== "u0");

		t.expect(result).toEqual({ target: 3, added: 1, failed: 2 });
		t.expect(graph.list()).toEqual([{ first: "u1", second: "u2" }]);
	});

	t.it("reports progress for every connected pair", async () => {
		const graph = new FriendshipGraph<Node>({ concurrency: 1 });
		const progress: Array<[number, number]> = [];
		await graph.extend(nodes(4), 0.5, succeed, (done, total) => progress.push([done, total]));
		t.expect(progress).toEqual([
			[0, 3],
			[1, 3],
			[2, 3],
			[3, 3],
		]);
	});

	t.it("never runs more connects than the concurrency allows", async () => {
		const graph = new FriendshipGraph<Node>({ concurrency: 2 });
		let running = 0;
		let peak = 0;
		await graph.extend(nodes(5), 1, async () => {
			running++;
			peak = Math.max(peak, running);
			await new Promise((resolve) => setTimeout(resolve, 1));
			running--;
			return true;
		});
		t.expect(peak).toBe(2);
	});

	t.it("does nothing for fewer than two users", async () => {
		const graph = new FriendshipGraph<Node>({ concurrency: 1 });
		t.expect(await graph.extend(nodes(1), 1, succeed)).toEqual({ target: 0, added: 0, failed: 0 });
	});

	t.it("rejects a ratio outside (0, 1]", async () => {
		const graph = new FriendshipGraph<Node>({ concurrency: 1 });
		await t.expect(graph.extend(nodes(3), 0, succeed)).rejects.toThrow(RangeError);
		await t.expect(graph.extend(nodes(3), 1.5, succeed)).rejects.toThrow(RangeError);
	});

	t.it("rejects users sharing an id", async () => {
		const graph = new FriendshipGraph<Node>({ concurrency: 1 });
		const connect = t.vi.fn(succeed);
		const users = [...nodes(3), { id: "u1" }];

		await t.expect(graph.extend(users, 1, connect)).rejects.toThrow("Users must have distinct ids, got 1 repeated");
		t.expect(connect).not.toHaveBeenCalled();
		t.expect(graph.size).toBe(0);
	});

	t.it("gives each of three fully connected users two rooms", async () => {
		const server = new InMemoryHomeserver({ serverName: "test.local" });
		const channel = new EventChannel<SimulationEvent>(1000);
		const users = ["alice", "bob", "carol"].map((localpart) => new User({ localpart, client: server.createClient(), events: channel }));
		for (const user of users) {
			await user.act();
			await user.act();
			await user.act();
		}

		const graph = new FriendshipGraph<User>({ concurrency: 2 });
		const result = await graph.extend(users, 1, connectUsers);

		t.expect(result.added).toBe(3);
		t.expect(server.roomCount).toBe(3);
		for (const user of users) t.expect(user.rooms).toHaveLength(2);
	});
});
