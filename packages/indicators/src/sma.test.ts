import { describe, it, expect } from "vitest";
import { sma } from "./sma";

const btcCloses = [
	100, 102, 101, 105, 107, 103, 110, 108, 112, 115, 113, 117, 119, 121,
];

describe("sma", () => {
	it("averages exactly the last n values", () => {
		expect(sma(btcCloses, 3)).toBe(119);
		expect(sma([1, 2, 3, 4], 4)).toBe(2.5);
	});

	it("matches the arithmetic mean of the trailing window for every n", () => {
		for (let n = 1; n <= btcCloses.length; n += 1) {
			const window = btcCloses.slice(btcCloses.length - n);
			const mean = window.reduce((acc, value) => acc + value, 0) / n;
			expect(sma(btcCloses, n)).toBeCloseTo(mean, 10);
		}
	});

	it("reports insufficient data as null", () => {
		expect(sma([1, 2], 3)).toBeNull();
		expect(sma([], 1)).toBeNull();
	});

	it("returns null for a non-positive period", () => {
		expect(sma([1, 2, 3], 0)).toBeNull();
	});
});
