import { InsufficientDataError, type QuoteRecord } from '@kumo/core';
import { describe, expect, it } from 'vitest';
import { describeDecision, evaluateFirstCandles } from './firstCandlesStrategy';

const quotes = (firstOpen: number, closes: number[], symbol = 'ACME'): QuoteRecord[] =>
  closes.map((close, idx) => ({
    symbol,
    open: idx === 0 ? firstOpen : close,
    high: close + 1,
    low: close - 1,
    close
  }));

describe('evaluateFirstCandles', () => {
  it('buys calls when the average close is above the first open', () => {
    const result = evaluateFirstCandles(quotes(11, [10, 11, 12, 13, 14]), 150);

    expect(result.avgClose).toBe(12);
    expect(result.firstOpen).toBe(11);
    expect(result.decision).toEqual({ symbol: 'ACME', action: 'buy_call', price: 150 });
  });

  it('buys puts when the average close is below the first open', () => {
    const result = evaluateFirstCandles(quotes(11, [10, 9, 8, 7, 6]), 95.5);

    expect(result.avgClose).toBe(8);
    expect(result.decision).toEqual({ symbol: 'ACME', action: 'buy_put', price: 95.5 });
  });

  it('holds on exact equality and still carries the target price', () => {
    const result = evaluateFirstCandles(quotes(5, [5, 5, 5, 5, 5]), 42.42);

    expect(result.decision).toEqual({ symbol: 'ACME', action: 'hold', price: 42.42 });
  });

  it('only looks at the first five quotes in the given order', () => {
    const series = quotes(11, [10, 9, 8, 7, 6, 500, 900]);

    expect(evaluateFirstCandles(series, 1).decision.action).toBe('buy_put');
  });

  it('takes the symbol from the first quote', () => {
    const series = [...quotes(1, [2], 'FIRST'), ...quotes(1, [2, 2, 2, 2], 'OTHER')];

    expect(evaluateFirstCandles(series, 1).decision.symbol).toBe('FIRST');
  });

  it('rejects fewer than five quotes', () => {
    expect(() => evaluateFirstCandles(quotes(1, [1, 2, 3, 4]), 10)).toThrow(
      InsufficientDataError
    );
    expect(() => evaluateFirstCandles([], 10)).toThrowError(
      'first_candles_strategy needs at least 5 quotes, got 0'
    );
  });
});

describe('describeDecision', () => {
  it('formats the target price with two decimals', () => {
    expect(describeDecision({ symbol: 'ACME', action: 'buy_call', price: 101.5 })).toBe(
      'Average close is above the first open; buying calls at $101.50'
    );
    expect(describeDecision({ symbol: 'ACME', action: 'buy_put', price: 3 })).toBe(
      'Average close is below the first open; buying puts at $3.00'
    );
    expect(describeDecision({ symbol: 'ACME', action: 'hold', price: 3 })).toBe(
      'Average close is equal to the first open; no action recommended.'
    );
  });
});
