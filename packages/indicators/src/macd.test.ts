import { describe, it, expect } from "vitest";
import { macd, macdSeries } from "./macd";

const wave = Array.from(
	{ length: 80 },
	(_, i) => 100 + Math.sin(i / 4) * 10 + i * 0.5
);

describe("macd", () => {
	it("returns null until slow + signal prices are available", () => {
		expect(macd(wave.slice(0, 34), 12, 26, 9)).toBeNull();
		expect(macd(wave.slice(0, 35), 12, 26, 9)).not.toBeNull();
	});

	it("keeps histogram equal to macd minus signal for every point", () => {
		const series = macdSeries(wave, 12, 26, 9);
		expect(series.length).toBeGreaterThan(0);
		for (const point of series) {
			expect(point.histogram).toBe(point.macd - point.signal);
		}
	});

	it("computes the lines from seeded EMAs", () => {
		// fast EMA(2) runs one step ahead of slow EMA(3) on a unit ramp
		const result = macd([1, 2, 3, 4, 5], 2, 3, 2);
		expect(result).not.toBeNull();
		expect(result?.macd).toBeCloseTo(0.5, 10);
		expect(result?.signal).toBeCloseTo(0.5, 10);
		expect(result?.histogram).toBeCloseTo(0, 10);
	});

	it("is positive for a rising series", () => {
		const rising = Array.from({ length: 50 }, (_, i) => 100 + i * i * 0.1);
		expect(macd(rising)?.macd).toBeGreaterThan(0);
	});

	it("returns null for non-positive periods", () => {
		expect(macd(wave, 0, 26, 9)).toBeNull();
	});

	it("uses the last series point as the latest value", () => {
		const series = macdSeries(wave, 12, 26, 9);
		expect(macd(wave)).toEqual(series[series.length - 1]);
	});
});
