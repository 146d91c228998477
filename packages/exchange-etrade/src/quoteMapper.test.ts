import { MalformedQuoteError } from "@kumo/core";
import { describe, expect, it } from "vitest";
import { mapQuoteResponse } from "./quoteMapper";

const payload = (all: Record<string, unknown>) => ({
	QuoteResponse: {
		QuoteData: [{ Product: { symbol: "ACME", securityType: "EQ" }, All: all }],
	},
});

describe("mapQuoteResponse", () => {
	it("reads open, high, low and lastTrade from the first quote", () => {
		const quote = mapQuoteResponse(
			"ACME",
			payload({ open: 10.1, high: 11.5, low: 9.9, lastTrade: 11.2, bid: 11.1 })
		);

		expect(quote).toEqual({ symbol: "ACME", open: 10.1, high: 11.5, low: 9.9, close: 11.2 });
	});

	it("reports the broker message when no quote data is returned", () => {
		const body = {
			QuoteResponse: {
				Messages: { Message: [{ description: "Invalid symbol", code: 1002 }] },
			},
		};

		expect(() => mapQuoteResponse("NOPE", body)).toThrowError(
			"No data available for NOPE: Invalid symbol"
		);
	});

	it("rejects an empty QuoteData list", () => {
		expect(() => mapQuoteResponse("ACME", { QuoteResponse: { QuoteData: [] } })).toThrowError(
			"No data available for ACME"
		);
	});

	it("rejects a payload without QuoteResponse", () => {
		expect(() => mapQuoteResponse("ACME", { Error: "oops" })).toThrow(MalformedQuoteError);
	});

	it("rejects a quote missing its All block", () => {
		expect(() =>
			mapQuoteResponse("ACME", { QuoteResponse: { QuoteData: [{ Product: {} }] } })
		).toThrowError("Quote data for ACME has no All block");
	});

	it("rejects a quote with a missing price field", () => {
		expect(() =>
			mapQuoteResponse("ACME", payload({ open: 1, high: 2, low: 0.5 }))
		).toThrowError("Quote for ACME has invalid close: undefined");
	});
});
