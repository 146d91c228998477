import { createLogger } from '@kumo/core';
import type { QuoteSeries, TradeDecision, TradeLogEntry } from '@kumo/core';
import type { TradeLog } from '@kumo/persistence';
import { describeDecision, evaluateFirstCandles } from './firstCandlesStrategy';

const logger = createLogger('strategy-engine');

export interface StrategyEngineOptions {
  tradeLog: TradeLog;
  now?: () => Date;
}

export interface StrategyOutcome {
  decision: TradeDecision;
  entry: TradeLogEntry;
  summary: string;
}

/**
 * Runs the first-candles heuristic and records every decision, `hold`
 * included, as exactly one trade log entry. Insufficient data throws before
 * anything is written.
 */
export class StrategyEngine {
  private readonly tradeLog: TradeLog;
  private readonly now: () => Date;

  constructor(options: StrategyEngineOptions) {
    this.tradeLog = options.tradeLog;
    this.now = options.now ?? (() => new Date());
  }

  evaluate(series: QuoteSeries, targetPrice: number): StrategyOutcome {
    const { decision, avgClose, firstOpen } = evaluateFirstCandles(series, targetPrice);
    logger.info('strategy_decision', { ...decision, avgClose, firstOpen });

    const entry: TradeLogEntry = { timestamp: this.now(), ...decision };
    this.tradeLog.append(entry);
    logger.info('trade_logged', { ...entry });

    return { decision, entry, summary: describeDecision(decision) };
  }
}
