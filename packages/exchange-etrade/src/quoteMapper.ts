import { MalformedQuoteError, createQuoteRecord } from "@kumo/core";
import type { QuoteRecord } from "@kumo/core";

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const firstItem = (value: unknown): unknown =>
	Array.isArray(value) ? value[0] : undefined;

const describeMessages = (quoteResponse: Record<string, unknown>): string | null => {
	const messages = quoteResponse.Messages;
	if (!isRecord(messages)) {
		return null;
	}
	const first = firstItem(messages.Message);
	return isRecord(first) && typeof first.description === "string"
		? first.description
		: null;
};

/**
 * Maps a `/v1/market/quote/{symbol}.json` payload to a QuoteRecord. Only the
 * first QuoteData entry is read; `lastTrade` becomes `close`.
 */
export const mapQuoteResponse = (symbol: string, payload: unknown): QuoteRecord => {
	const quoteResponse = isRecord(payload) ? payload.QuoteResponse : undefined;
	if (!isRecord(quoteResponse)) {
		throw new MalformedQuoteError(`Quote response for ${symbol} has no QuoteResponse`);
	}

	const quoteData = quoteResponse.QuoteData;
	if (!Array.isArray(quoteData) || quoteData.length === 0) {
		const detail = describeMessages(quoteResponse);
		throw new MalformedQuoteError(
			`No data available for ${symbol}${detail ? `: ${detail}` : ""}`
		);
	}

	const entry = quoteData[0];
	const all = isRecord(entry) ? entry.All : undefined;
	if (!isRecord(entry) || !isRecord(all)) {
		throw new MalformedQuoteError(`Quote data for ${symbol} has no All block`);
	}

	const product = entry.Product;
	const productSymbol =
		isRecord(product) && typeof product.symbol === "string" ? product.symbol : symbol;

	return createQuoteRecord({
		symbol: productSymbol,
		open: all.open,
		high: all.high,
		low: all.low,
		close: all.lastTrade,
	});
};
