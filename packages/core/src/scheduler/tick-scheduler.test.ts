import * as t from "vitest";
import { InMemoryHomeserver } from "../client/in-memory.js";
import { ChannelClosedError } from "../domain/errors.js";
import type { SimulationEvent } from "../domain/event.js";
import type { ILogger } from "../domain/logger.js";
import { EventChannel } from "../events/channel.js";
import { User } from "../user/user.js";
import { type Actor, runTicks } from "./tick-scheduler.js";

function recordingActors(count: number) {
	const batches: string[][] = [];
	let current: string[] = [];
	let lastSignal: AbortSignal | null = null;
	const actors: Actor[] = Array.from({ length: count }, (_, i) => ({
		id: `u${i}`,
		act: async (signal) => {
			if (signal !== lastSignal) {
				lastSignal = signal;
				current = [];
				batches.push(current);
			}
			current.push(`u${i}`);
			return "done";
		},
	}));
	return { actors, batches };
}

async function drain(channel: EventChannel<SimulationEvent>): Promise<SimulationEvent[]> {
	const events: SimulationEvent[] = [];
	while (channel.size > 0) {
		const event = await channel.recv();
		if (event) events.push(event);
	}
	return events;
}

t.describe("runTicks", () => {
	let channel: EventChannel<SimulationEvent>;
	let logger: ILogger;

	t.beforeEach(() => {
		channel = new EventChannel<SimulationEvent>(100);
		logger = { debug: t.vi.fn(), info: t.vi.fn(), warn: t.vi.fn(), error: t.vi.fn() };
	});

	t.it("splits the step into ticks of distinct, bounded batches", async () => {
		const { actors, batches } = recordingActors(10);

		const stats = await runTicks(actors, channel, { stepDurationMs: 200, tickDurationMs: 50, maxUsersPerTick: 3 });

		t.expect(stats.ticks).toBeGreaterThanOrEqual(3);
		t.expect(stats.ticks).toBeLessThanOrEqual(5);
		t.expect(batches).toHaveLength(stats.ticks);
		for (const batch of batches) {
			t.expect(batch).toHaveLength(3);
			t.expect(new Set(batch).size).toBe(3);
		}
		t.expect(stats.completed).toBe(stats.ticks * 3);
	});

	t.it("takes every user when fewer than the per-tick maximum exist", async () => {
		const { actors, batches } = recordingActors(2);
		await runTicks(actors, channel, { stepDurationMs: 10, tickDurationMs: 10, maxUsersPerTick: 5 });
		t.expect([...(batches[0] ?? [])].sort()).toEqual(["u0", "u1"]);
	});

	t.it("announces the end of sending once the step is over", async () => {
		const { actors } = recordingActors(1);
		await runTicks(actors, channel, { stepDurationMs: 10, tickDurationMs: 10, maxUsersPerTick: 1 });
		t.expect(await drain(channel)).toEqual([{ type: "all-messages-sent" }]);
	});

	t.it("does not wait for a task past its tick and skips the user while it settles", async () => {
		const server = new InMemoryHomeserver({ latencyMs: 500 });
		const user = new User({ localpart: "slow", client: server.createClient(), events: channel });
		const start = performance.now();

		const stats = await runTicks([user], channel, { stepDurationMs: 100, tickDurationMs: 50, maxUsersPerTick: 1 });

		t.expect(performance.now() - start).toBeLessThan(400);
		t.expect(stats.timedOut).toBe(1);
		t.expect(stats.completed).toBe(0);
		t.expect(stats.skipped).toBe(stats.ticks - 1);
		t.expect(user.stateKind).toBe("unregistered");
		t.expect(await drain(channel)).toEqual([{ type: "all-messages-sent" }]);
	});

	t.it("counts and logs failing tasks without stopping", async () => {
		const actor: Actor = { id: "broken", act: async () => Promise.reject(new Error("boom")) };

		const stats = await runTicks([actor], channel, { stepDurationMs: 10, tickDurationMs: 10, maxUsersPerTick: 1, logger });

		t.expect(stats.failed).toBe(stats.ticks);
		t.expect(logger.warn).toHaveBeenCalledWith("Task failed: boom");
	});

	t.it("aborts the run when the event channel is closed", async () => {
		const actor: Actor = { id: "u0", act: async () => Promise.reject(new ChannelClosedError()) };
		await t
			.expect(runTicks([actor], channel, { stepDurationMs: 100, tickDurationMs: 10, maxUsersPerTick: 1 }))
			.rejects.toBeInstanceOf(ChannelClosedError);
	});

	t.it("runs no tick once stopped", async () => {
		const { actors, batches } = recordingActors(3);
		const controller = new AbortController();
		controller.abort();

		const stats = await runTicks(actors, channel, {
			stepDurationMs: 100,
			tickDurationMs: 10,
			maxUsersPerTick: 3,
			signal: controller.signal,
		});

		t.expect(stats).toEqual({ ticks: 0, completed: 0, timedOut: 0, skipped: 0, failed: 0 });
		t.expect(batches).toHaveLength(0);
		t.expect(await drain(channel)).toEqual([{ type: "all-messages-sent" }]);
	});

	t.it("reports each finished tick", async () => {
		const { actors } = recordingActors(1);
		const onTick = t.vi.fn();
		await runTicks(actors, channel, { stepDurationMs: 10, tickDurationMs: 10, maxUsersPerTick: 1, onTick });
		t.expect(onTick).toHaveBeenCalledWith(1, 1);
	});
});
