import type { Queryable, Store } from '../../connections/db/store';
import {
  NewSalesRecord,
  SalesRecord,
  SalesRecordRow,
  SalesStatistics,
  toSalesRecord,
} from '../../connections/db/models';
import { listSalesSchema, recordSaleSchema } from './sales.validation';
import { computeStatistics } from './sales.statistics';
import { formatMoney, MAX_TOTAL, toDecimal } from '../../utils/money';
import { NotFoundError, ValidationError } from '../../utils/errors';
import { getLogger } from '../../utils/logging';

const log = getLogger('sales');

/**
 * Appends one row to the ledger. `total_amount` is stored as given.
 */
export const insertSalesRecord = async (db: Queryable, sale: NewSalesRecord): Promise<number> => {
  const columns = ['product_id', 'quantity', 'total_amount', 'customer_info'];
  const values: unknown[] = [sale.product_id, sale.quantity, sale.total_amount, sale.customer_info];

  if (sale.sale_date) {
    columns.push('sale_date');
    values.push(sale.sale_date);
  }

  const placeholders = values.map((_, index) => `$${index + 1}`).join(', ');
  const result = await db.query<{ id: number }>(
    `INSERT INTO sales_history (${columns.join(', ')}) VALUES (${placeholders}) RETURNING id`,
    values
  );
  return result.rows[0].id;
};

export class SalesService {
  constructor(private readonly store: Store) {}

  /**
   * Records a sale at the product's current price. The total is computed
   * once, here, and never re-derived.
   * @returns the sale id
   */
  async recordSale(productId: number, quantity: number, customerInfo?: string | null): Promise<number> {
    const sale = recordSaleSchema.parse({
      product_id: productId,
      quantity,
      customer_info: customerInfo,
    });

    return this.store.transaction(async (db) => {
      const product = await db.query<{ price: string | number }>(
        'SELECT price FROM products WHERE id = $1',
        [sale.product_id]
      );
      if (product.rows.length === 0) {
        throw new NotFoundError('Product not found', { productId: sale.product_id });
      }

      const total = toDecimal(product.rows[0].price).times(sale.quantity);
      if (total.gt(MAX_TOTAL)) {
        throw new ValidationError(`Sale total must not exceed ${MAX_TOTAL.toFixed(2)}`, {
          productId: sale.product_id,
          quantity: sale.quantity,
        });
      }
      const totalAmount = formatMoney(total);
      const saleId = await insertSalesRecord(db, {
        product_id: sale.product_id,
        quantity: sale.quantity,
        total_amount: totalAmount,
        customer_info: sale.customer_info,
      });

      log.info('Sale recorded', { saleId, productId: sale.product_id, quantity: sale.quantity, totalAmount });
      return saleId;
    });
  }

  /**
   * Ledger rows, most recent first, optionally for one product.
   */
  async listSales(productId?: number): Promise<SalesRecord[]> {
    const filter = listSalesSchema.parse({ product_id: productId });

    const params: unknown[] = [];
    let where = '';
    if (filter.product_id !== undefined) {
      params.push(filter.product_id);
      where = 'WHERE sh.product_id = $1';
    }

    const result = await this.store.query<SalesRecordRow>(
      `SELECT sh.id, sh.product_id, p.name AS product_name, sh.quantity, sh.sale_date,
              sh.total_amount, sh.customer_info, sh.created_at
       FROM sales_history sh
       JOIN products p ON p.id = sh.product_id
       ${where}
       ORDER BY sh.sale_date DESC, sh.id DESC`,
      params
    );

    return result.rows.map(toSalesRecord);
  }

  computeStatistics(sales: ReadonlyArray<Pick<SalesRecord, 'quantity' | 'total_amount'>>): SalesStatistics {
    return computeStatistics(sales);
  }

  async getStatistics(productId?: number): Promise<SalesStatistics> {
    return computeStatistics(await this.listSales(productId));
  }
}
