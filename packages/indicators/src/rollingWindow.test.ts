import { describe, expect, it } from "vitest";
import { RollingWindow } from "./rollingWindow";

describe("RollingWindow", () => {
	it("fills, then evicts the oldest value on each push", () => {
		const window = new RollingWindow(3);
		expect(window.push(1)).toBeNull();
		expect(window.push(2)).toBeNull();
		expect(window.isFull).toBe(false);
		expect(window.push(3)).toBeNull();
		expect(window.isFull).toBe(true);
		expect(window.push(4)).toBe(1);
		expect(window.toArray()).toEqual([2, 3, 4]);
		expect(window.sum).toBe(9);
		expect(window.mean()).toBe(3);
	});

	it("indexes from the newest value", () => {
		const window = new RollingWindow(4);
		[10, 20, 30, 40, 50].forEach((value) => window.push(value));
		expect(window.latest()).toBe(50);
		expect(window.at(1)).toBe(40);
		expect(window.oldest()).toBe(20);
		expect(window.at(4)).toBeNull();
	});

	it("keeps its running sum exact across many wraps", () => {
		const window = new RollingWindow(7);
		for (let i = 0; i < 10_000; i += 1) {
			window.push(0.1 * (i % 13));
		}
		const expected = window.toArray().reduce((acc, value) => acc + value, 0);
		expect(window.sum).toBeCloseTo(expected, 10);
	});

	it("rejects a non-positive capacity", () => {
		expect(() => new RollingWindow(0)).toThrow(RangeError);
	});

	it("empties on clear", () => {
		const window = new RollingWindow(2);
		window.push(5);
		window.clear();
		expect(window.size).toBe(0);
		expect(window.mean()).toBeNull();
	});
});
