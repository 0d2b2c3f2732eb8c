import { formatMoney, normalizeMoney, toDecimal } from '../../../utils/money';

// Sales Record Model (append-only ledger)

export interface SalesRecord {
  id: number;
  product_id: number;
  product_name: string; // joined
  quantity: number; // > 0
  sale_date: Date;
  total_amount: string; // frozen at sale time
  unit_price: string; // derived: total_amount / quantity
  customer_info: string | null;
  created_at: Date;
}

// Amounts are exact two-digit decimal strings; the *_value fields carry the
// same amounts as numbers for charts and comparisons.
export interface SalesStatistics {
  sales_count: number;
  total_quantity: number;
  total_revenue: string;
  average_sale: string;
  total_revenue_value: number;
  average_sale_value: number;
}

export interface NewSalesRecord {
  product_id: number;
  quantity: number;
  total_amount: string;
  customer_info: string | null;
  sale_date?: Date; // defaults to now
}

export type SalesRecordRow = {
  id: number;
  product_id: number;
  product_name: string;
  quantity: number;
  sale_date: Date;
  total_amount: string | number;
  customer_info: string | null;
  created_at: Date;
};

export const toSalesRecord = (row: SalesRecordRow): SalesRecord => ({
  id: row.id,
  product_id: row.product_id,
  product_name: row.product_name,
  quantity: row.quantity,
  sale_date: row.sale_date,
  total_amount: normalizeMoney(row.total_amount),
  unit_price: formatMoney(toDecimal(row.total_amount).dividedBy(row.quantity)),
  customer_info: row.customer_info,
  created_at: row.created_at,
});
