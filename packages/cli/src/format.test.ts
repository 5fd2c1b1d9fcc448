import { describe, it, expect } from 'vitest';
import { formatChart, formatMoney, formatStatus } from './format.js';

describe('format', () => {
  it('should print money with two decimals', () => {
    expect(formatMoney(5000)).toBe('$5000.00');
    expect(formatMoney(0.5)).toBe('$0.50');
  });

  it('should print the portfolio line', () => {
    expect(formatStatus({ cash: 5000, shares: 100 }, 50, 10000)).toBe(
      'Cash: $5000.00 | Shares Owned: 100 | Price: $50.00 | Value: $10000.00'
    );
  });

  describe('formatChart', () => {
    it('should scale prices between low and high', () => {
      const chart = formatChart({ priceHistory: [10, 17, 24], buyEvents: [], sellEvents: [] });

      expect(chart.split('\n')).toEqual(['$24.00 high / $10.00 low, ticks 0-2', '▁▅█', '']);
    });

    it('should draw a flat line for a constant price', () => {
      const chart = formatChart({ priceHistory: [5, 5], buyEvents: [], sellEvents: [] });

      expect(chart.split('\n')[1]).toBe('▁▁');
    });

    it('should mark trades under their tick', () => {
      const chart = formatChart({
        priceHistory: [1, 2, 3, 4],
        buyEvents: [{ timeIndex: 1, price: 2 }],
        sellEvents: [
          { timeIndex: 1, price: 2 },
          { timeIndex: 3, price: 4 },
        ],
      });

      expect(chart.split('\n')[2]).toBe(' * S');
    });

    it('should only show the last window of ticks', () => {
      const chart = formatChart(
        {
          priceHistory: [1, 2, 3, 4, 5],
          buyEvents: [{ timeIndex: 0, price: 1 }],
          sellEvents: [{ timeIndex: 4, price: 5 }],
        },
        3
      );

      expect(chart.split('\n')).toEqual(['$5.00 high / $3.00 low, ticks 2-4', '▁▅█', '  S']);
    });
  });
});
