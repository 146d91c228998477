import {
	InsufficientDataError,
	MalformedQuoteError,
	PersistenceError,
	createLogger,
	errorMessage,
} from "@kumo/core";
import type { IchimokuSeries, QuoteRecord, QuoteSeries } from "@kumo/core";
import { loadQuoteSeriesCsv } from "@kumo/data";
import type { OAuthToken } from "@kumo/exchange-etrade";
import { calculateIchimoku, latestIchimokuValues } from "@kumo/indicators";
import type { TradeLog } from "@kumo/persistence";
import { StrategyEngine } from "@kumo/strategy-engine";
import type { StrategyOutcome } from "@kumo/strategy-engine";
import { formatQuote, renderIchimokuChart } from "./chart";
import { parseTargetPrice } from "./cliArgs";
import type { DeskCliOptions } from "./cliArgs";
import type { Prompter } from "./prompts";

const logger = createLogger("desk-cli");

const MAX_PRICE_ATTEMPTS = 3;

const loadSeriesFromFile = (filePath: string, symbol: string): QuoteSeries =>
	loadQuoteSeriesCsv(filePath, { symbol });

export const TITLE = "Kumo Desk: E*TRADE sandbox with Ichimoku strategy";

/** The slice of the sandbox client the desk talks to. */
export interface QuoteGateway {
	fetchRequestToken(): Promise<OAuthToken>;
	authorizationUrl(requestToken: OAuthToken): string;
	fetchAccessToken(requestToken: OAuthToken, verifier: string): Promise<OAuthToken>;
	fetchQuote(symbol: string): Promise<QuoteRecord>;
}

export interface DeskSessionDeps {
	gateway: QuoteGateway;
	prompter: Prompter;
	tradeLog: TradeLog;
	write: (line: string) => void;
	loadSeries?: (filePath: string, symbol: string) => QuoteSeries;
	now?: () => Date;
}

export type DeskSessionStatus =
	| "completed"
	| "auth_failed"
	| "no_symbol"
	| "quote_failed"
	| "history_failed"
	| "no_target_price";

export interface DeskSessionResult {
	status: DeskSessionStatus;
	quote: QuoteRecord | null;
	ichimoku: IchimokuSeries | null;
	outcome: StrategyOutcome | null;
}

const result = (
	status: DeskSessionStatus,
	partial: Partial<Omit<DeskSessionResult, "status">> = {}
): DeskSessionResult => ({
	status,
	quote: partial.quote ?? null,
	ichimoku: partial.ichimoku ?? null,
	outcome: partial.outcome ?? null,
});

/**
 * One pass of the dashboard: authenticate, fetch a quote, chart the cloud,
 * evaluate the strategy and log the trade. Expected failures end the pass
 * with a message; anything else propagates.
 */
export async function runDeskSession(
	options: DeskCliOptions,
	deps: DeskSessionDeps
): Promise<DeskSessionResult> {
	const { gateway, prompter, write } = deps;
	write(TITLE);

	try {
		const requestToken = await gateway.fetchRequestToken();
		write(`Please authenticate by visiting this URL: ${gateway.authorizationUrl(requestToken)}`);
		const verifier = await prompter.ask("Enter the verifier code here: ");
		await gateway.fetchAccessToken(requestToken, verifier);
	} catch (error) {
		logger.error("authentication_failed", { error: errorMessage(error) });
		write("Authentication failed, please check your credentials and network connection.");
		return result("auth_failed");
	}

	const symbol = (options.symbol ?? (await prompter.ask("Enter stock symbol: "))).trim();
	if (!symbol) {
		write("No symbol entered.");
		return result("no_symbol");
	}

	let quote: QuoteRecord;
	try {
		quote = await gateway.fetchQuote(symbol);
		write(formatQuote(quote));
	} catch (error) {
		logger.error("quote_fetch_failed", { symbol, error: errorMessage(error) });
		write(
			error instanceof MalformedQuoteError
				? `No data available for the given symbol. (${error.message})`
				: "Failed to fetch stock data."
		);
		return result("quote_failed");
	}

	let series: QuoteSeries = [quote];
	if (options.quotesPath) {
		try {
			series = (deps.loadSeries ?? loadSeriesFromFile)(options.quotesPath, quote.symbol);
			write(`Loaded ${series.length} quotes from ${options.quotesPath}`);
		} catch (error) {
			logger.error("quote_history_failed", {
				path: options.quotesPath,
				error: errorMessage(error),
			});
			write(`Failed to load quote history. (${errorMessage(error)})`);
			return result("history_failed", { quote });
		}
	}

	const ichimoku = computeCloud(series, options.chartRows, write);

	const targetPrice = options.targetPrice ?? (await askTargetPrice(prompter, write));
	if (targetPrice === null) {
		write("No valid target price entered.");
		return result("no_target_price", { quote, ichimoku });
	}

	const engine = new StrategyEngine({ tradeLog: deps.tradeLog, now: deps.now });
	try {
		const outcome = engine.evaluate(series, targetPrice);
		write(outcome.summary);
		write(
			`Trade logged: ${outcome.entry.symbol} ${outcome.entry.action} at ${outcome.entry.price.toFixed(2)}`
		);
		return result("completed", { quote, ichimoku, outcome });
	} catch (error) {
		if (error instanceof InsufficientDataError) {
			logger.warn("strategy_insufficient_data", {
				required: error.required,
				actual: error.actual,
			});
			write("Not enough data to apply the strategy.");
			return result("completed", { quote, ichimoku });
		}
		if (error instanceof PersistenceError) {
			write(`Failed to log trade: ${error.message}`);
			return result("completed", { quote, ichimoku });
		}
		throw error;
	}
}

const computeCloud = (
	series: QuoteSeries,
	rows: number,
	write: (line: string) => void
): IchimokuSeries | null => {
	try {
		const ichimoku = calculateIchimoku(series);
		logger.info("ichimoku_calculated", {
			symbol: series[0].symbol,
			length: series.length,
			latest: latestIchimokuValues(ichimoku),
		});
		renderIchimokuChart(series, ichimoku, { rows }).forEach(write);
		return ichimoku;
	} catch (error) {
		if (!(error instanceof InsufficientDataError)) {
			throw error;
		}
		logger.warn("ichimoku_insufficient_data", {
			required: error.required,
			actual: error.actual,
		});
		write("Not enough data for Ichimoku Cloud calculation.");
		return null;
	}
};

const askTargetPrice = async (
	prompter: Prompter,
	write: (line: string) => void
): Promise<number | null> => {
	for (let attempt = 0; attempt < MAX_PRICE_ATTEMPTS; attempt += 1) {
		const price = parseTargetPrice(
			await prompter.ask("Enter your target price for trade execution: ")
		);
		if (price !== null) {
			return price;
		}
		write("Target price must be a number of at least 0.00.");
	}
	return null;
};
