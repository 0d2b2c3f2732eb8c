import { describe, expect, it } from 'vitest';

import { computeStatistics } from '../../src/modules/sales/sales.statistics';

describe('computeStatistics', () => {
  it('returns zeros for an empty ledger', () => {
    expect(computeStatistics([])).toEqual({
      sales_count: 0,
      total_quantity: 0,
      total_revenue: '0.00',
      average_sale: '0.00',
      total_revenue_value: 0,
      average_sale_value: 0,
    });
  });

  it('sums quantities and revenue and rounds the average half up', () => {
    const stats = computeStatistics([
      { quantity: 2, total_amount: '199.98' },
      { quantity: 1, total_amount: '0.01' },
    ]);

    expect(stats).toEqual({
      sales_count: 2,
      total_quantity: 3,
      total_revenue: '199.99',
      average_sale: '100.00',
      total_revenue_value: 199.99,
      average_sale_value: 100,
    });
  });

  it('averages per sale, not per unit', () => {
    const stats = computeStatistics([
      { quantity: 5, total_amount: '50.00' },
      { quantity: 1, total_amount: '10.00' },
      { quantity: 1, total_amount: '10.00' },
    ]);

    expect(stats.average_sale).toBe('23.33');
    expect(stats.average_sale_value).toBe(23.33);
    expect(stats.total_quantity).toBe(7);
  });
});
