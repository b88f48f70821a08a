import * as t from "vitest";
import { ChannelClosedError } from "../domain/errors.js";
import { EventChannel } from "./channel.js";

t.describe("EventChannel", () => {
	t.it("delivers events from one producer in send order", async () => {
		const channel = new EventChannel<number>();
		await channel.send(1);
		await channel.send(2);
		await channel.send(3);

		t.expect(await channel.recv()).toBe(1);
		t.expect(await channel.recv()).toBe(2);
		t.expect(await channel.recv()).toBe(3);
	});

	t.it("hands an event straight to a waiting receiver", async () => {
		const channel = new EventChannel<string>();
		const received = channel.recv();
		await channel.send("hello");
		t.expect(await received).toBe("hello");
		t.expect(channel.size).toBe(0);
	});

	t.it("makes senders wait while the buffer is full", async () => {
		const channel = new EventChannel<number>(1);
		await channel.send(1);

		let secondSent = false;
		const second = channel.send(2).then(() => {
			secondSent = true;
		});
		await Promise.resolve();
		t.expect(secondSent).toBe(false);
		t.expect(channel.size).toBe(2);

		t.expect(await channel.recv()).toBe(1);
		await second;
		t.expect(secondSent).toBe(true);
		t.expect(await channel.recv()).toBe(2);
	});

	t.it("rejects sends after close but drains what was buffered", async () => {
		const channel = new EventChannel<number>();
		await channel.send(1);
		channel.close();

		await t.expect(channel.send(2)).rejects.toBeInstanceOf(ChannelClosedError);
		t.expect(await channel.recv()).toBe(1);
		t.expect(await channel.recv()).toBeUndefined();
	});

	t.it("wakes a waiting receiver with undefined on close", async () => {
		const channel = new EventChannel<number>();
		const received = channel.recv();
		channel.close();
		t.expect(await received).toBeUndefined();
	});

	t.it("rejects senders blocked on a full buffer when closed", async () => {
		const channel = new EventChannel<number>(1);
		await channel.send(1);
		const blocked = channel.send(2);
		channel.close();
		await t.expect(blocked).rejects.toBeInstanceOf(ChannelClosedError);
	});

	t.it("allows only one outstanding receive", async () => {
		const channel = new EventChannel<number>();
		const first = channel.recv();
		await t.expect(channel.recv()).rejects.toThrow("EventChannel supports a single consumer");
		channel.close();
		t.expect(await first).toBeUndefined();
	});

	t.it("iterates until closed", async () => {
		const channel = new EventChannel<number>();
		await channel.send(1);
		await channel.send(2);
		channel.close();

		const seen: number[] = [];
		for await (const value of channel) seen.push(value);
		t.expect(seen).toEqual([1, 2]);
	});
});
