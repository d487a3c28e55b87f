import { formatPercentageChange, formatPrice } from '../utils/formatting.js';
import type { Comparison } from './types.js';

export function formatComparisonReport(comparison: Comparison): string {
  const lines = [
    '=======================================',
    `📊 Symbol: ${comparison.symbol}`,
    `  - Wallex Last Trade : ${formatPrice(comparison.entryPrice)}`,
    `  - CoinCatch Price   : ${formatPrice(comparison.referencePrice)}`,
    `  - Difference        : ${formatPercentageChange(comparison.percentageDiff)}`,
    comparison.signal ? '🔥🔥🔥 SIGNAL FOUND! 🔥🔥🔥' : '  - No signal. Difference is below threshold.',
  ];
  return lines.join('\n');
}
