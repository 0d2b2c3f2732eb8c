import { Migration } from './types';

export const migration: Migration = {
  async up(db) {
    await db.query(`
      CREATE TABLE IF NOT EXISTS products (
        id SERIAL PRIMARY KEY,
        name VARCHAR(255) NOT NULL,
        -- Exact money; never stored as a binary float
        price NUMERIC(10, 2) NOT NULL CHECK (price >= 0),
        description TEXT,
        image_path TEXT,
        manufacturer_id INTEGER REFERENCES manufacturers(id),
        is_active BOOLEAN DEFAULT TRUE,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_products_manufacturer ON products(manufacturer_id)
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_products_name ON products(name)
    `);
  },

  async down(db) {
    await db.query('DROP INDEX IF EXISTS idx_products_name');
    await db.query('DROP INDEX IF EXISTS idx_products_manufacturer');
    await db.query('DROP TABLE IF EXISTS products CASCADE');
  },
};
