import type { Signal } from '../signals/types.js';
import { escapeLinkUrl, escapeMarkdown } from '../telegram/markdown.js';
import { formatAmount, formatTimestamp } from '../utils/formatting.js';
import type { SignalMessageOptions } from './types.js';

const ACTION_LINK_LABELS = {
  BUY: 'خرید در والکس',
  SELL: 'فروش در والکس',
} as const;

export function buildTradeLink(tradeLinkBase: string, symbol: string): string {
  return `${tradeLinkBase}${encodeURIComponent(symbol)}`;
}

/** Renders a signal as a Telegram MarkdownV2 message. */
export function buildSignalMessage(signal: Signal, options: SignalMessageOptions): string {
  const { pivotCurrency, tradeLinkBase, timeZone, now = new Date() } = options;

  const pair = `${escapeMarkdown(signal.baseAsset)}\\-${escapeMarkdown(pivotCurrency)}`;
  const entryPrice = escapeMarkdown(formatAmount(signal.entryPrice, 4));
  const referencePrice = escapeMarkdown(formatAmount(signal.referencePrice, 4));
  const magnitude = escapeMarkdown(signal.magnitude.toFixed(2));
  const link = escapeLinkUrl(buildTradeLink(tradeLinkBase, signal.symbol));
  const time = escapeMarkdown(formatTimestamp(now, timeZone));

  return [
    `*${signal.action} : ${pair}*`,
    '',
    `Inter Price : \`$${entryPrice}\``,
    `Target Price : \`$${referencePrice}\``,
    `Difference : *${magnitude}\\%*`,
    '',
    `[${escapeMarkdown(ACTION_LINK_LABELS[signal.action])}](${link})`,
    '',
    `Time : \`${time}\``,
  ].join('\n');
}
