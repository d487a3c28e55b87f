import type { Action, Comparison, ComparisonInput, Signal } from './types.js';

function isUsablePrice(price: number | null): price is number {
  return price !== null && Number.isFinite(price) && price > 0;
}

export function computePercentageDiff(entryPrice: number | null, referencePrice: number | null): number | null {
  if (!isUsablePrice(entryPrice) || !isUsablePrice(referencePrice)) {
    return null;
  }
  return ((entryPrice - referencePrice) / referencePrice) * 100;
}

export function classifyAction(percentageDiff: number): Action {
  return percentageDiff < 0 ? 'BUY' : 'SELL';
}

export function evaluateComparison(input: ComparisonInput, threshold: number): Comparison | null {
  const { entryPrice, referencePrice } = input;
  const percentageDiff = computePercentageDiff(entryPrice, referencePrice);
  if (percentageDiff === null || entryPrice === null || referencePrice === null) {
    return null;
  }

  const magnitude = Math.abs(percentageDiff);

  return {
    symbol: input.symbol,
    baseAsset: input.baseAsset,
    entryPrice,
    referencePrice,
    percentageDiff,
    action: classifyAction(percentageDiff),
    magnitude,
    signal: magnitude >= threshold,
  };
}

export function isSignal(comparison: Comparison): comparison is Signal {
  return comparison.signal;
}
