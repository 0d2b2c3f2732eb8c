import { Migration } from './types';

export const migration: Migration = {
  async up(db) {
    await db.query(`
      CREATE TABLE IF NOT EXISTS sales_history (
        id SERIAL PRIMARY KEY,
        product_id INTEGER NOT NULL REFERENCES products(id),
        quantity INTEGER NOT NULL CHECK (quantity > 0),
        sale_date TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        -- Frozen at sale time: unit price x quantity
        total_amount NUMERIC(12, 2) NOT NULL,
        customer_info TEXT,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_sales_history_product ON sales_history(product_id)
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_sales_history_sale_date ON sales_history(sale_date DESC)
    `);
  },

  async down(db) {
    await db.query('DROP INDEX IF EXISTS idx_sales_history_sale_date');
    await db.query('DROP INDEX IF EXISTS idx_sales_history_product');
    await db.query('DROP TABLE IF EXISTS sales_history CASCADE');
  },
};
