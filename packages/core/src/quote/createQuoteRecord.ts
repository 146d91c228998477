import { MalformedQuoteError } from "../errors";
import type { QuoteRecord } from "../types";

export interface RawQuoteFields {
	symbol?: unknown;
	open?: unknown;
	high?: unknown;
	low?: unknown;
	close?: unknown;
}

const PRICE_FIELDS = ["open", "high", "low", "close"] as const;

const toPrice = (value: unknown, field: string, symbol: string): number => {
	const numeric =
		typeof value === "string" && value.trim().length
			? Number(value)
			: value;
	if (typeof numeric !== "number" || !Number.isFinite(numeric)) {
		throw new MalformedQuoteError(
			`Quote for ${symbol || "<unknown>"} has invalid ${field}: ${String(value)}`
		);
	}
	return numeric;
};

/**
 * Builds a frozen QuoteRecord. Numeric strings are accepted since both the
 * broker feed and quote files may carry prices as text.
 */
export const createQuoteRecord = (fields: RawQuoteFields): QuoteRecord => {
	const symbol =
		typeof fields.symbol === "string" ? fields.symbol.trim() : "";
	if (!symbol) {
		throw new MalformedQuoteError("Quote is missing a symbol");
	}
	const [open, high, low, close] = PRICE_FIELDS.map((field) =>
		toPrice(fields[field], field, symbol)
	);
	return Object.freeze({ symbol, open, high, low, close });
};
