import type { Trade } from '../core/types.js';
import type { LedgerSummary } from '../ledger/ledger.js';

const usd = (value: number): string => `${value < 0 ? '-' : ''}$${Math.abs(value).toFixed(2)}`;

const describeTrade = (trade: Trade): string => {
  const legs = trade.legs.map((leg) => `${leg.code}@${leg.venue} ${leg.price}`).join(' + ');
  const result =
    trade.status === 'pending'
      ? `expected ${usd(trade.profit)}`
      : `realized ${usd(trade.realizedProfit)}`;
  return `- [${trade.status}] ${trade.placedAt} ${trade.description} (${legs}) x${trade.quantity.toFixed(
    2
  )} cost ${usd(trade.cost)}, ${result}`;
};

export function formatSummary(summary: LedgerSummary, limit = 10): string[] {
  const lines = [
    '=== Ledger Summary ===',
    `Balance: ${usd(summary.balance)} (initial ${usd(summary.initialBalance)})`,
    `Realized profit: ${usd(summary.totalProfit)}`,
    `Estimated profit (pending): ${usd(summary.estimatedProfit)}`,
    `Trades: ${summary.totalTrades}`,
    `Today: ${summary.dailyTrades} trades, loss ${usd(summary.dailyLoss)}`
  ];

  if (summary.trades.length) {
    lines.push('', `Most recent trades (${Math.min(limit, summary.trades.length)} of ${summary.trades.length}):`);
    summary.trades.slice(0, limit).forEach((trade) => lines.push(describeTrade(trade)));
  }

  return lines;
}
