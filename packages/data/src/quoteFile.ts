import { readFileSync } from "node:fs";
import { MalformedQuoteError, createQuoteRecord, errorMessage } from "@kumo/core";
import type { QuoteRecord, QuoteSeries } from "@kumo/core";

export interface QuoteFileOptions {
	/** Used for rows when the file has no symbol column. */
	symbol?: string;
}

const CLOSE_COLUMNS = ["close", "lasttrade"];

const splitRow = (line: string): string[] =>
	line.split(",").map((cell) => cell.trim());

/**
 * Parses quote rows in file order. The header must name open, high, low and
 * close (or lastTrade); any other column is ignored.
 */
export const parseQuoteCsv = (
	content: string,
	options: QuoteFileOptions = {}
): QuoteSeries => {
	const lines = content
		.split(/\r?\n/)
		.map((line, idx) => ({ line: line.trim(), lineNumber: idx + 1 }))
		.filter(({ line }) => line.length > 0);
	if (lines.length < 2) {
		throw new MalformedQuoteError("Quote file has no data rows");
	}

	const header = splitRow(lines[0].line).map((name) => name.toLowerCase());
	const column = (names: string[]): number =>
		header.findIndex((name) => names.includes(name));
	const indexes = {
		symbol: column(["symbol"]),
		open: column(["open"]),
		high: column(["high"]),
		low: column(["low"]),
		close: column(CLOSE_COLUMNS),
	};
	const missing = (["open", "high", "low", "close"] as const).filter(
		(key) => indexes[key] < 0
	);
	if (missing.length) {
		throw new MalformedQuoteError(
			`Quote file header is missing: ${missing.join(", ")}`
		);
	}
	if (indexes.symbol < 0 && !options.symbol) {
		throw new MalformedQuoteError(
			"Quote file has no symbol column and no symbol was given"
		);
	}

	return lines.slice(1).map(({ line, lineNumber }): QuoteRecord => {
		const cells = splitRow(line);
		const cell = (idx: number): string | undefined =>
			idx >= 0 ? cells[idx] : undefined;
		try {
			return createQuoteRecord({
				symbol: cell(indexes.symbol) || options.symbol,
				open: cell(indexes.open),
				high: cell(indexes.high),
				low: cell(indexes.low),
				close: cell(indexes.close),
			});
		} catch (error) {
			throw new MalformedQuoteError(
				`Quote file line ${lineNumber}: ${errorMessage(error)}`,
				{ cause: error }
			);
		}
	});
};

export const loadQuoteSeriesCsv = (
	filePath: string,
	options: QuoteFileOptions = {}
): QuoteSeries => {
	let content: string;
	try {
		content = readFileSync(filePath, "utf8");
	} catch (error) {
		throw new MalformedQuoteError(
			`Cannot read quote file ${filePath}: ${errorMessage(error)}`,
			{ cause: error }
		);
	}
	return parseQuoteCsv(content, options);
};
