import type {
	IchimokuSeries,
	QuoteRecord,
	QuoteSeries,
	SeriesValue,
} from "@kumo/core";

export interface ChartOptions {
	/** Trailing positions to show. */
	rows?: number;
}

const COLUMNS = ["#", "close", "tenkan", "kijun", "spanA", "spanB", "chikou", "cloud"];
const CELL_WIDTH = 9;

const formatValue = (value: SeriesValue): string =>
	value === null ? "-" : value.toFixed(2);

const cloudBias = (spanA: SeriesValue, spanB: SeriesValue): string => {
	if (spanA === null || spanB === null || spanA === spanB) {
		return "-";
	}
	return spanA > spanB ? "bull" : "bear";
};

const formatRow = (cells: string[]): string =>
	cells.map((cell) => cell.padStart(CELL_WIDTH)).join(" ");

/**
 * Renders the close and the five Ichimoku lines as a fixed-width table, one
 * row per position, with the cloud colour (span A above or below span B).
 */
export const renderIchimokuChart = (
	series: QuoteSeries,
	ichimoku: IchimokuSeries,
	options: ChartOptions = {}
): string[] => {
	const rows = Math.max(options.rows ?? 30, 1);
	const start = Math.max(series.length - rows, 0);
	const lines = [formatRow(COLUMNS)];

	for (let i = start; i < series.length; i += 1) {
		lines.push(
			formatRow([
				String(i),
				formatValue(series[i].close),
				formatValue(ichimoku.tenkanSen[i]),
				formatValue(ichimoku.kijunSen[i]),
				formatValue(ichimoku.senkouSpanA[i]),
				formatValue(ichimoku.senkouSpanB[i]),
				formatValue(ichimoku.chikouSpan[i]),
				cloudBias(ichimoku.senkouSpanA[i], ichimoku.senkouSpanB[i]),
			])
		);
	}
	return lines;
};

export const formatQuote = (quote: QuoteRecord): string =>
	`${quote.symbol}  open ${quote.open.toFixed(2)}  high ${quote.high.toFixed(
		2
	)}  low ${quote.low.toFixed(2)}  last ${quote.close.toFixed(2)}`;
