import type { Queryable, Store } from './store';
import seedData from './seed-data.json';
import { insertSalesRecord } from '../../modules/sales/sales.service';
import { multiplyMoney } from '../../utils/money';
import { getLogger } from '../../utils/logging';

const log = getLogger('seed');

const DAY_MS = 24 * 60 * 60 * 1000;

export interface SeedOptions {
  random?: () => number; // [0, 1)
  now?: Date;
}

// Rows inserted by one run
export interface SeedSummary {
  manufacturers: number;
  products: number;
  relations: number;
  sales: number;
}

const countRows = async (db: Queryable, table: 'products' | 'sales_history'): Promise<number> => {
  const result = await db.query<{ count: string | number }>(`SELECT COUNT(*) AS count FROM ${table}`);
  return Number(result.rows[0].count);
};

// Integer in [min, max]
const randomInt = (random: () => number, min: number, max: number): number =>
  min + Math.floor(random() * (max - min + 1));

const seedManufacturers = async (db: Queryable): Promise<{ ids: Map<string, number>; inserted: number }> => {
  let inserted = 0;
  for (const name of seedData.manufacturers) {
    const result = await db.query(
      'INSERT INTO manufacturers (name) VALUES ($1) ON CONFLICT (name) DO NOTHING RETURNING id',
      [name]
    );
    inserted += result.rows.length;
  }

  const all = await db.query<{ id: number; name: string }>('SELECT id, name FROM manufacturers');
  return { ids: new Map(all.rows.map((row) => [row.name, row.id])), inserted };
};

const seedCatalog = async (db: Queryable, manufacturerIds: Map<string, number>) => {
  const productIds = new Map<string, number>();
  for (const product of seedData.products) {
    const result = await db.query<{ id: number }>(
      `INSERT INTO products (name, price, description, image_path, manufacturer_id, is_active)
       VALUES ($1, $2, $3, NULL, $4, TRUE)
       RETURNING id`,
      [product.name, product.price, product.description, manufacturerIds.get(product.manufacturer) ?? null]
    );
    productIds.set(product.name, result.rows[0].id);
  }

  let relations = 0;
  for (const [main, related] of seedData.relations) {
    const mainId = productIds.get(main);
    const relatedId = productIds.get(related);
    if (mainId === undefined || relatedId === undefined) {
      throw new Error(`Seed relation refers to an unknown product: ${main} -> ${related}`);
    }
    const result = await db.query(
      `INSERT INTO product_relations (main_product_id, related_product_id)
       VALUES ($1, $2)
       ON CONFLICT (main_product_id, related_product_id) DO NOTHING
       RETURNING id`,
      [mainId, relatedId]
    );
    relations += result.rows.length;
  }

  return { products: productIds.size, relations };
};

const seedSales = async (db: Queryable, random: () => number, now: Date): Promise<number> => {
  const products = await db.query<{ id: number; price: string | number }>('SELECT id, price FROM products ORDER BY id');
  if (products.rows.length === 0) {
    return 0;
  }

  const { count, maxQuantity, maxDaysBack } = seedData.sales;
  for (let i = 0; i < count; i++) {
    const product = products.rows[randomInt(random, 0, products.rows.length - 1)];
    const quantity = randomInt(random, 1, maxQuantity);
    const saleDate = new Date(now.getTime() - randomInt(random, 0, maxDaysBack) * DAY_MS);

    await insertSalesRecord(db, {
      product_id: product.id,
      quantity,
      total_amount: multiplyMoney(product.price, quantity),
      customer_info: `Customer ${i + 1}`,
      sale_date: saleDate,
    });
  }
  return count;
};

/**
 * Fills an empty database with demonstration rows. Each table is only seeded
 * while it is empty, so running this again never duplicates data.
 */
export const seedDemoData = async (store: Store, options: SeedOptions = {}): Promise<SeedSummary> => {
  const random = options.random ?? Math.random;
  const now = options.now ?? new Date();

  const summary = await store.transaction(async (db) => {
    const manufacturers = await seedManufacturers(db);

    let catalog = { products: 0, relations: 0 };
    if ((await countRows(db, 'products')) === 0) {
      catalog = await seedCatalog(db, manufacturers.ids);
    }

    const sales = (await countRows(db, 'sales_history')) === 0 ? await seedSales(db, random, now) : 0;

    return { manufacturers: manufacturers.inserted, ...catalog, sales };
  });

  log.info('Demo data seeded', { ...summary });
  return summary;
};
