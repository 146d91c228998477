import { InsufficientDataError } from '@kumo/core';
import type { QuoteSeries, TradeActionType, TradeDecision } from '@kumo/core';

export const FIRST_CANDLES_WINDOW = 5;

export interface FirstCandlesEvaluation {
  decision: TradeDecision;
  avgClose: number;
  firstOpen: number;
}

/**
 * Compares the mean close of the first five quotes (in the order given, not
 * the most recent five) with the first open. The decision always carries the
 * caller's target price, `hold` included.
 */
export function evaluateFirstCandles(
  series: QuoteSeries,
  targetPrice: number
): FirstCandlesEvaluation {
  if (series.length < FIRST_CANDLES_WINDOW) {
    throw new InsufficientDataError('first_candles_strategy', FIRST_CANDLES_WINDOW, series.length);
  }

  const window = series.slice(0, FIRST_CANDLES_WINDOW);
  const avgClose = window.reduce((acc, quote) => acc + quote.close, 0) / FIRST_CANDLES_WINDOW;
  const firstOpen = series[0].open;

  return {
    decision: {
      symbol: series[0].symbol,
      action: resolveAction(avgClose, firstOpen),
      price: targetPrice
    },
    avgClose,
    firstOpen
  };
}

const resolveAction = (avgClose: number, firstOpen: number): TradeActionType => {
  if (avgClose > firstOpen) {
    return 'buy_call';
  }
  if (avgClose < firstOpen) {
    return 'buy_put';
  }
  return 'hold';
};

export const describeDecision = (decision: TradeDecision): string => {
  const price = decision.price.toFixed(2);
  switch (decision.action) {
    case 'buy_call':
      return `Average close is above the first open; buying calls at $${price}`;
    case 'buy_put':
      return `Average close is below the first open; buying puts at $${price}`;
    case 'hold':
      return 'Average close is equal to the first open; no action recommended.';
  }
};
