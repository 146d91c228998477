import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { PersistenceError, type TradeLogEntry } from "@kumo/core";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CsvTradeLog, InMemoryTradeLog, formatTradeLogLine } from "./tradeLog";

const entry = (overrides: Partial<TradeLogEntry> = {}): TradeLogEntry => ({
	timestamp: new Date("2024-05-02T14:30:00.000Z"),
	symbol: "ACME",
	action: "buy_call",
	price: 101.25,
	...overrides,
});

describe("formatTradeLogLine", () => {
	it("writes timestamp, symbol, action and price in that order", () => {
		expect(formatTradeLogLine(entry())).toBe(
			"2024-05-02T14:30:00.000Z,ACME,buy_call,101.25\n"
		);
	});

	it("quotes symbols that would break the row", () => {
		expect(formatTradeLogLine(entry({ symbol: 'A,"B"', action: "hold", price: 0 }))).toBe(
			'2024-05-02T14:30:00.000Z,"A,""B""",hold,0\n'
		);
	});
});

describe("CsvTradeLog", () => {
	let dir: string;

	beforeEach(() => {
		dir = mkdtempSync(path.join(os.tmpdir(), "kumo-trade-log-"));
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it("creates the file and appends entries in insertion order", () => {
		const filePath = path.join(dir, "nested", "trade_log.csv");
		const log = new CsvTradeLog(filePath);

		log.append(entry());
		log.append(entry({ symbol: "ZED", action: "buy_put", price: 7 }));
		log.append(entry({ action: "hold", price: 101.25 }));

		expect(readFileSync(filePath, "utf8").split("\n")).toEqual([
			"2024-05-02T14:30:00.000Z,ACME,buy_call,101.25",
			"2024-05-02T14:30:00.000Z,ZED,buy_put,7",
			"2024-05-02T14:30:00.000Z,ACME,hold,101.25",
			"",
		]);
	});

	it("keeps earlier content when appending to an existing file", () => {
		const filePath = path.join(dir, "trade_log.csv");
		writeFileSync(filePath, "existing\n");

		new CsvTradeLog(filePath).append(entry());

		expect(readFileSync(filePath, "utf8")).toBe(
			"existing\n2024-05-02T14:30:00.000Z,ACME,buy_call,101.25\n"
		);
	});

	it("raises a persistence error when the target cannot be written", () => {
		// the target path is a directory
		const log = new CsvTradeLog(dir);

		expect(() => log.append(entry())).toThrow(PersistenceError);
	});
});

describe("InMemoryTradeLog", () => {
	it("keeps every appended entry", () => {
		const log = new InMemoryTradeLog();
		log.append(entry());
		log.append(entry({ action: "hold" }));

		expect(log.length).toBe(2);
		expect(log.entries.map((item) => item.action)).toEqual(["buy_call", "hold"]);
	});
});
