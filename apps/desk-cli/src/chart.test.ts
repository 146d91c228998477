import type { IchimokuSeries, QuoteRecord } from "@kumo/core";
import { describe, expect, it } from "vitest";
import { formatQuote, renderIchimokuChart } from "./chart";

const series: QuoteRecord[] = [
	{ symbol: "ACME", open: 1, high: 2, low: 0, close: 1.5 },
	{ symbol: "ACME", open: 1.5, high: 3, low: 1, close: 2.25 },
	{ symbol: "ACME", open: 2.25, high: 4, low: 2, close: 3 },
];

const ichimoku: IchimokuSeries = {
	tenkanSen: [null, 2, 2.5],
	kijunSen: [null, null, 2],
	senkouSpanA: [null, 1.5, 1],
	senkouSpanB: [null, 1, 1],
	chikouSpan: [2.25, 3, null],
};

describe("renderIchimokuChart", () => {
	it("prints a header and the trailing rows with dashes for gaps", () => {
		const lines = renderIchimokuChart(series, ichimoku, { rows: 2 });

		expect(lines).toEqual([
			"        #     close    tenkan     kijun     spanA     spanB    chikou     cloud",
			"        1      2.25      2.00         -      1.50      1.00      3.00      bull",
			"        2      3.00      2.50      2.00      1.00      1.00         -         -",
		]);
	});

	it("shows every row when fewer quotes than requested exist", () => {
		expect(renderIchimokuChart(series, ichimoku, { rows: 50 })).toHaveLength(4);
	});
});

describe("formatQuote", () => {
	it("prints the symbol and prices with two decimals", () => {
		expect(formatQuote(series[1])).toBe("ACME  open 1.50  high 3.00  low 1.00  last 2.25");
	});
});
