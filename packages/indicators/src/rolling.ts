import type { SeriesValue } from "@kumo/core";

const rollingExtreme = (
	values: readonly number[],
	period: number,
	pick: (a: number, b: number) => number
): SeriesValue[] => {
	const result: SeriesValue[] = new Array<SeriesValue>(values.length).fill(null);
	if (period <= 0) {
		return result;
	}
	for (let i = period - 1; i < values.length; i += 1) {
		let extreme = values[i - period + 1];
		for (let j = i - period + 2; j <= i; j += 1) {
			extreme = pick(extreme, values[j]);
		}
		result[i] = extreme;
	}
	return result;
};

/** Trailing inclusive max over `period` values; null until the window fills. */
export const rollingMax = (values: readonly number[], period: number): SeriesValue[] =>
	rollingExtreme(values, period, Math.max);

export const rollingMin = (values: readonly number[], period: number): SeriesValue[] =>
	rollingExtreme(values, period, Math.min);

/** (rolling max of highs + rolling min of lows) / 2 */
export const rollingMidpoint = (
	highs: readonly number[],
	lows: readonly number[],
	period: number
): SeriesValue[] => {
	const maxes = rollingMax(highs, period);
	const mins = rollingMin(lows, period);
	return maxes.map((max, idx) => {
		const min = mins[idx];
		return max === null || min === null ? null : (max + min) / 2;
	});
};

/**
 * Moves values by `offset` positions: positive pushes them to later indexes,
 * negative pulls later values back. Length is kept; vacated slots are null.
 */
export const shiftSeries = (
	values: readonly SeriesValue[],
	offset: number
): SeriesValue[] =>
	values.map((_, idx) => {
		const source = idx - offset;
		return source >= 0 && source < values.length ? values[source] : null;
	});
