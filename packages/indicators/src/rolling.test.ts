import { describe, expect, it } from "vitest";
import { rollingMax, rollingMidpoint, rollingMin, shiftSeries } from "./rolling";

describe("rolling windows", () => {
	const values = [3, 1, 4, 1, 5];

	it("tracks the trailing max and min once the window is full", () => {
		expect(rollingMax(values, 3)).toEqual([null, null, 4, 4, 5]);
		expect(rollingMin(values, 3)).toEqual([null, null, 1, 1, 1]);
	});

	it("returns all nulls when the window is larger than the input", () => {
		expect(rollingMax(values, 6)).toEqual([null, null, null, null, null]);
	});

	it("returns all nulls for a non-positive period", () => {
		expect(rollingMin(values, 0)).toEqual([null, null, null, null, null]);
	});

	it("averages the high max and the low min", () => {
		expect(rollingMidpoint([10, 12, 11], [8, 9, 7], 2)).toEqual([null, 10, 9.5]);
	});
});

describe("shiftSeries", () => {
	it("pushes values forward for a positive offset", () => {
		expect(shiftSeries([1, 2, 3], 1)).toEqual([null, 1, 2]);
	});

	it("pulls values back for a negative offset", () => {
		expect(shiftSeries([1, 2, 3], -1)).toEqual([2, 3, null]);
	});

	it("keeps nulls from the source", () => {
		expect(shiftSeries([null, 2, 3], 1)).toEqual([null, null, 2]);
	});
});
