import Decimal from 'decimal.js';
import type { SalesRecord, SalesStatistics } from '../../connections/db/models';
import { formatMoney, sumMoney } from '../../utils/money';

/**
 * Totals over any subset of the ledger. An empty subset yields zeros.
 */
export const computeStatistics = (
  sales: ReadonlyArray<Pick<SalesRecord, 'quantity' | 'total_amount'>>
): SalesStatistics => {
  const totalQuantity = sales.reduce((sum, sale) => sum + sale.quantity, 0);
  const totalRevenue = sumMoney(sales.map((sale) => sale.total_amount));
  const average = sales.length > 0 ? totalRevenue.dividedBy(sales.length) : new Decimal(0);

  const revenue = formatMoney(totalRevenue);
  const averageSale = formatMoney(average);

  return {
    sales_count: sales.length,
    total_quantity: totalQuantity,
    total_revenue: revenue,
    average_sale: averageSale,
    total_revenue_value: Number(revenue),
    average_sale_value: Number(averageSale),
  };
};
