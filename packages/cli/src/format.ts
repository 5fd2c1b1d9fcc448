/**
 * Text rendering for the terminal front end
 */

import type { MarketTimeline, PortfolioSnapshot } from '@stocksim/shared';

// ANSI colors
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  red: '\x1b[31m',
};

export const c = {
  success: (text: string | number) => `${colors.green}${text}${colors.reset}`,
  error: (text: string | number) => `${colors.red}${text}${colors.reset}`,
  info: (text: string | number) => `${colors.cyan}${text}${colors.reset}`,
  warning: (text: string | number) => `${colors.yellow}${text}${colors.reset}`,
  bold: (text: string | number) => `${colors.bold}${text}${colors.reset}`,
  dim: (text: string | number) => `${colors.dim}${text}${colors.reset}`,
};

const SPARK = ['▁', '▂', '▃', '▄', '▅', '▆', '▇', '█'];

export function formatMoney(value: number): string {
  return `$${value.toFixed(2)}`;
}

export function formatStatus(snapshot: PortfolioSnapshot, price: number, value: number): string {
  return `Cash: ${formatMoney(snapshot.cash)} | Shares Owned: ${snapshot.shares} | Price: ${formatMoney(price)} | Value: ${formatMoney(value)}`;
}

/**
 * Sparkline of the last `width` prices, with B/S under ticks that saw trades
 */
export function formatChart(timeline: MarketTimeline, width = 60): string {
  const { priceHistory, buyEvents, sellEvents } = timeline;
  const start = Math.max(0, priceHistory.length - width);
  const window = priceHistory.slice(start);

  const min = Math.min(...window);
  const max = Math.max(...window);
  const range = max - min;

  const line = window
    .map((price) => {
      if (range === 0) return SPARK[0];
      const level = Math.round(((price - min) / range) * (SPARK.length - 1));
      return SPARK[level];
    })
    .join('');

  const markers = window.map(() => ' ');
  for (const event of buyEvents) {
    if (event.timeIndex >= start) markers[event.timeIndex - start] = 'B';
  }
  for (const event of sellEvents) {
    if (event.timeIndex < start) continue;
    const slot = event.timeIndex - start;
    markers[slot] = markers[slot] === 'B' ? '*' : 'S';
  }

  return [
    `${formatMoney(max)} high / ${formatMoney(min)} low, ticks ${start}-${priceHistory.length - 1}`,
    line,
    markers.join('').trimEnd(),
  ].join('\n');
}
