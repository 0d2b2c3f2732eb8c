import { Migration } from './types';

export const migration: Migration = {
  async up(db) {
    await db.query(`
      CREATE TABLE IF NOT EXISTS manufacturers (
        id SERIAL PRIMARY KEY,
        name VARCHAR(255) NOT NULL UNIQUE,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);
  },

  async down(db) {
    await db.query('DROP TABLE IF EXISTS manufacturers CASCADE');
  },
};
