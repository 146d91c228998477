import { appendFileSync, mkdirSync } from "node:fs";
import path from "node:path";
import { PersistenceError, createLogger, errorMessage } from "@kumo/core";
import type { TradeLogEntry } from "@kumo/core";

const logger = createLogger("persistence:trade-log");

/**
 * Append-only sink for trade decisions. Entries keep insertion order and are
 * never rewritten; there is no read path in the engine.
 */
export interface TradeLog {
	append(entry: TradeLogEntry): void;
}

export const TRADE_LOG_COLUMNS = ["timestamp", "symbol", "action", "price"] as const;

const escapeField = (value: string): string =>
	/[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;

/** One CSV line in fixed column order, newline included. */
export const formatTradeLogLine = (entry: TradeLogEntry): string =>
	[
		entry.timestamp.toISOString(),
		escapeField(entry.symbol),
		entry.action,
		String(entry.price),
	].join(",") + "\n";

export class CsvTradeLog implements TradeLog {
	constructor(readonly filePath: string) {}

	append(entry: TradeLogEntry): void {
		const line = formatTradeLogLine(entry);
		try {
			mkdirSync(path.dirname(this.filePath), { recursive: true });
			// a single write per entry keeps each line whole
			appendFileSync(this.filePath, line, { encoding: "utf8", flag: "a" });
		} catch (error) {
			logger.error("trade_log_append_failed", {
				path: this.filePath,
				error: errorMessage(error),
			});
			throw new PersistenceError(
				this.filePath,
				`Failed to append trade to ${this.filePath}: ${errorMessage(error)}`,
				{ cause: error }
			);
		}
		logger.debug("trade_log_appended", { path: this.filePath, symbol: entry.symbol });
	}
}

export class InMemoryTradeLog implements TradeLog {
	private readonly items: TradeLogEntry[] = [];

	append(entry: TradeLogEntry): void {
		this.items.push(entry);
	}

	get entries(): readonly TradeLogEntry[] {
		return this.items;
	}

	get length(): number {
		return this.items.length;
	}
}
