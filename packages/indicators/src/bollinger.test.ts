import { describe, it, expect } from "vitest";
import { bollinger } from "./bollinger";

describe("bollinger", () => {
	it("places bands stdDevs population deviations around the SMA", () => {
		expect(bollinger([2, 4, 4, 4, 5, 5, 7, 9], 8, 2)).toEqual({
			upper: 9,
			middle: 5,
			lower: 1,
		});
	});

	it("uses only the trailing window", () => {
		expect(bollinger([100, 3, 3, 3], 3, 2)).toEqual({
			upper: 3,
			middle: 3,
			lower: 3,
		});
	});

	it("returns null when history is short", () => {
		expect(bollinger([1, 2, 3], 20)).toBeNull();
	});
});
