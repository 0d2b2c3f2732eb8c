import { Migration } from './types';

export const migration: Migration = {
  async up(db) {
    await db.query(`
      CREATE TABLE IF NOT EXISTS product_relations (
        id SERIAL PRIMARY KEY,
        main_product_id INTEGER NOT NULL REFERENCES products(id),
        related_product_id INTEGER NOT NULL REFERENCES products(id),
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        UNIQUE (main_product_id, related_product_id),
        CHECK (main_product_id <> related_product_id)
      )
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_product_relations_related ON product_relations(related_product_id)
    `);
  },

  async down(db) {
    await db.query('DROP INDEX IF EXISTS idx_product_relations_related');
    await db.query('DROP TABLE IF EXISTS product_relations CASCADE');
  },
};
