import { InsufficientDataError } from "@kumo/core";
import type { IchimokuSeries, QuoteSeries, SeriesValue } from "@kumo/core";
import { rollingMidpoint, shiftSeries } from "./rolling";

export const TENKAN_PERIOD = 9;
export const KIJUN_PERIOD = 26;
export const SENKOU_B_PERIOD = 52;
export const DISPLACEMENT = 26;

/** Fewer quotes than this and no series is produced at all. */
export const ICHIMOKU_MIN_LENGTH = SENKOU_B_PERIOD;

export function calculateIchimoku(series: QuoteSeries): IchimokuSeries {
	if (series.length < ICHIMOKU_MIN_LENGTH) {
		throw new InsufficientDataError("ichimoku", ICHIMOKU_MIN_LENGTH, series.length);
	}

	const highs = series.map((quote) => quote.high);
	const lows = series.map((quote) => quote.low);
	const closes = series.map((quote) => quote.close);

	const tenkanSen = rollingMidpoint(highs, lows, TENKAN_PERIOD);
	const kijunSen = rollingMidpoint(highs, lows, KIJUN_PERIOD);
	const midline = tenkanSen.map((tenkan, idx): SeriesValue => {
		const kijun = kijunSen[idx];
		return tenkan === null || kijun === null ? null : (tenkan + kijun) / 2;
	});

	return {
		tenkanSen,
		kijunSen,
		senkouSpanA: shiftSeries(midline, DISPLACEMENT),
		senkouSpanB: shiftSeries(
			rollingMidpoint(highs, lows, SENKOU_B_PERIOD),
			DISPLACEMENT
		),
		chikouSpan: shiftSeries(closes, -DISPLACEMENT),
	};
}

/** Last non-null value of each line, for logging and summaries. */
export const latestIchimokuValues = (
	ichimoku: IchimokuSeries
): Record<keyof IchimokuSeries, SeriesValue> => {
	const lastDefined = (values: SeriesValue[]): SeriesValue => {
		for (let i = values.length - 1; i >= 0; i -= 1) {
			if (values[i] !== null) {
				return values[i];
			}
		}
		return null;
	};
	return {
		tenkanSen: lastDefined(ichimoku.tenkanSen),
		kijunSen: lastDefined(ichimoku.kijunSen),
		senkouSpanA: lastDefined(ichimoku.senkouSpanA),
		senkouSpanB: lastDefined(ichimoku.senkouSpanB),
		chikouSpan: lastDefined(ichimoku.chikouSpan),
	};
};
