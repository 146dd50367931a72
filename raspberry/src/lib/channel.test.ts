import { describe, expect, it } from "vitest";

import { Channel } from "./channel";

describe("Channel", () => {
	it("delivers buffered values in order and ends once closed", async () => {
		const channel = new Channel<number>();
		channel.push(1);
		channel.push(2);
		channel.close();

		const seen: number[] = [];
		for await (const v of channel) {
			seen.push(v);
		}
		expect(seen).toEqual([1, 2]);
	});

	it("wakes a waiting consumer", async () => {
		const channel = new Channel<string>();
		const pending = channel.next();
		expect(channel.push("a")).toBe(true);
		await expect(pending).resolves.toEqual({ value: "a", done: false });
	});

	it("drops values pushed after close", async () => {
		const channel = new Channel<string>();
		const pending = channel.next();
		channel.close();

		await expect(pending).resolves.toEqual({ value: undefined, done: true });
		expect(channel.push("late")).toBe(false);
		expect(channel.size).toBe(0);
		expect(channel.isClosed).toBe(true);
	});
});
