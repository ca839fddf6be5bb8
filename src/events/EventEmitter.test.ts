import { describe, expect, it, vi } from "vitest";
import { createEventEmitter } from "./EventEmitter";

interface TestEvents {
	volumeChanged: number;
	playStateChanged: boolean;
}

describe("EventEmitter", () => {
	it("delivers payloads synchronously", () => {
		const events = createEventEmitter<TestEvents>();
		const received: number[] = [];
		events.on("volumeChanged", (volume) => received.push(volume));

		events.emit("volumeChanged", 0.5);

		expect(received).toEqual([0.5]);
	});

	it("stops delivering after unsubscribe", () => {
		const events = createEventEmitter<TestEvents>();
		const listener = vi.fn();
		const subscription = events.on("playStateChanged", listener);

		subscription.unsubscribe();
		events.emit("playStateChanged", true);

		expect(listener).not.toHaveBeenCalled();
		expect(events.listenerCount("playStateChanged")).toBe(0);
	});

	it("keeps calling listeners after one throws", () => {
		const events = createEventEmitter<TestEvents>();
		const after = vi.fn();
		events.on("volumeChanged", () => {
			throw new Error("listener failed");
		});
		events.on("volumeChanged", after);

		events.emit("volumeChanged", 1);

		expect(after).toHaveBeenCalledWith(1);
	});

	it("lets a listener unsubscribe itself while being called", () => {
		const events = createEventEmitter<TestEvents>();
		const second = vi.fn();
		const subscription = events.on("volumeChanged", () => subscription.unsubscribe());
		events.on("volumeChanged", second);

		events.emit("volumeChanged", 1);
		events.emit("volumeChanged", 2);

		expect(second).toHaveBeenCalledTimes(2);
		expect(events.listenerCount("volumeChanged")).toBe(1);
	});

	it("delivers a once listener a single time", () => {
		const events = createEventEmitter<TestEvents>();
		const listener = vi.fn();
		events.once("playStateChanged", listener);

		events.emit("playStateChanged", true);
		events.emit("playStateChanged", false);

		expect(listener).toHaveBeenCalledTimes(1);
		expect(listener).toHaveBeenCalledWith(true);
		expect(events.listenerCount("playStateChanged")).toBe(0);
	});

	it("removes all listeners", () => {
		const events = createEventEmitter<TestEvents>();
		events.on("volumeChanged", vi.fn());
		events.on("playStateChanged", vi.fn());

		events.removeAllListeners("volumeChanged");
		expect(events.listenerCount("volumeChanged")).toBe(0);
		expect(events.listenerCount("playStateChanged")).toBe(1);

		events.removeAllListeners();
		expect(events.listenerCount("playStateChanged")).toBe(0);
	});
});
