import type { Queryable, Store } from '../../connections/db/store';
import {
  Manufacturer,
  ManufacturerRow,
  Product,
  ProductListFilter,
  ProductRow,
  SaveProductData,
  toProduct,
} from '../../connections/db/models';
import {
  ListProductsOptions,
  listProductsSchema,
  manufacturerSchema,
  SaveProductInput,
  saveProductSchema,
  idSchema,
} from './catalog.validation';
import { ConflictError, NotFoundError, ValidationError } from '../../utils/errors';
import { getLogger } from '../../utils/logging';

const log = getLogger('catalog');

const PRODUCT_COLUMNS = `
  p.id, p.name, p.price, p.description, p.image_path, p.manufacturer_id,
  p.is_active, p.created_at, p.updated_at, m.name AS manufacturer_name`;

// Grouped columns must match PRODUCT_COLUMNS for the edge-count aggregate
const PRODUCT_GROUP_BY = `
  p.id, p.name, p.price, p.description, p.image_path, p.manufacturer_id,
  p.is_active, p.created_at, p.updated_at, m.name`;

const SORT_COLUMNS: Record<ProductListFilter['sort_by'], string> = {
  name: 'p.name',
  price: 'p.price',
};

const escapeLikePattern = (term: string): string => term.replace(/[\\%_]/g, (char) => `\\${char}`);

/**
 * Reads one product with its manufacturer name and outgoing edge count.
 * Shared by the services that need a product inside their own transaction.
 */
export const findProductById = async (db: Queryable, id: number): Promise<Product | null> => {
  const result = await db.query<ProductRow>(
    `SELECT ${PRODUCT_COLUMNS}, COUNT(pr.id) AS related_products_count
     FROM products p
     LEFT JOIN manufacturers m ON m.id = p.manufacturer_id
     LEFT JOIN product_relations pr ON pr.main_product_id = p.id
     WHERE p.id = $1
     GROUP BY ${PRODUCT_GROUP_BY}`,
    [id]
  );
  return result.rows.length > 0 ? toProduct(result.rows[0]) : null;
};

export const productExists = async (db: Queryable, id: number): Promise<boolean> => {
  const result = await db.query('SELECT id FROM products WHERE id = $1', [id]);
  return result.rows.length > 0;
};

export class CatalogService {
  constructor(private readonly store: Store) {}

  async listProducts(options: ListProductsOptions = {}): Promise<Product[]> {
    const filter: ProductListFilter = listProductsSchema.parse(options);

    const conditions: string[] = [];
    const params: unknown[] = [];
    let paramCount = 0;

    if (filter.manufacturer_id !== undefined) {
      paramCount++;
      conditions.push(`p.manufacturer_id = $${paramCount}`);
      params.push(filter.manufacturer_id);
    }

    if (filter.search) {
      paramCount++;
      conditions.push(`LOWER(p.name) LIKE $${paramCount}`);
      params.push(`%${escapeLikePattern(filter.search.toLowerCase())}%`);
    }

    if (!filter.include_inactive) {
      conditions.push('p.is_active = TRUE');
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const direction = filter.sort_order === 'desc' ? 'DESC' : 'ASC';

    const result = await this.store.query<ProductRow>(
      `SELECT ${PRODUCT_COLUMNS}, COUNT(pr.id) AS related_products_count
       FROM products p
       LEFT JOIN manufacturers m ON m.id = p.manufacturer_id
       LEFT JOIN product_relations pr ON pr.main_product_id = p.id
       ${where}
       GROUP BY ${PRODUCT_GROUP_BY}
       ORDER BY ${SORT_COLUMNS[filter.sort_by]} ${direction}, p.id ASC`,
      params
    );

    return result.rows.map(toProduct);
  }

  /**
   * @returns the product, or null when no product has this id
   */
  async getProduct(id: number): Promise<Product | null> {
    return findProductById(this.store, idSchema.parse(id));
  }

  /**
   * Inserts a product when `id` is absent, otherwise updates every mutable
   * field and refreshes `updated_at`.
   * @returns the product id
   */
  async saveProduct(input: SaveProductInput): Promise<number> {
    const product: SaveProductData = saveProductSchema.parse(input);

    return this.store.transaction(async (db) => {
      if (product.manufacturer_id !== null) {
        const manufacturer = await db.query('SELECT id FROM manufacturers WHERE id = $1', [product.manufacturer_id]);
        if (manufacturer.rows.length === 0) {
          throw new ValidationError('Manufacturer does not exist', { manufacturerId: product.manufacturer_id });
        }
      }

      if (product.id !== undefined) {
        const updated = await db.query<{ id: number }>(
          `UPDATE products
           SET name = $1, price = $2, description = $3, image_path = $4,
               manufacturer_id = $5, is_active = $6, updated_at = CURRENT_TIMESTAMP
           WHERE id = $7
           RETURNING id`,
          [
            product.name,
            product.price,
            product.description,
            product.image_path,
            product.manufacturer_id,
            product.is_active,
            product.id,
          ]
        );
        if (updated.rows.length === 0) {
          throw new NotFoundError('Product not found', { productId: product.id });
        }
        log.info('Product updated', { productId: product.id, price: product.price });
        return product.id;
      }

      const inserted = await db.query<{ id: number }>(
        `INSERT INTO products (name, price, description, image_path, manufacturer_id, is_active)
         VALUES ($1, $2, $3, $4, $5, $6)
         RETURNING id`,
        [
          product.name,
          product.price,
          product.description,
          product.image_path,
          product.manufacturer_id,
          product.is_active,
        ]
      );
      const productId = inserted.rows[0].id;
      log.info('Product created', { productId, price: product.price });
      return productId;
    });
  }

  /**
   * Removes the product's relation edges in both directions, then the product.
   * @returns false when there was no such product
   */
  async deleteProduct(id: number): Promise<boolean> {
    const productId = idSchema.parse(id);

    return this.store.transaction(async (db) => {
      if (!(await productExists(db, productId))) {
        return false;
      }

      const sales = await db.query('SELECT id FROM sales_history WHERE product_id = $1 LIMIT 1', [productId]);
      if (sales.rows.length > 0) {
        throw new ConflictError('Product has recorded sales and cannot be deleted; deactivate it instead', {
          productId,
        });
      }

      // Edges first: the product row is still referenced until they are gone
      const edges = await db.query(
        'DELETE FROM product_relations WHERE main_product_id = $1 OR related_product_id = $1 RETURNING id',
        [productId]
      );
      await db.query('DELETE FROM products WHERE id = $1', [productId]);

      log.info('Product deleted', { productId, removedRelations: edges.rows.length });
      return true;
    });
  }

  async listManufacturers(): Promise<Manufacturer[]> {
    const result = await this.store.query<ManufacturerRow>(
      'SELECT id, name, created_at FROM manufacturers ORDER BY name ASC, id ASC'
    );
    return result.rows;
  }

  /**
   * Insert-if-absent by name.
   */
  async ensureManufacturer(name: string): Promise<Manufacturer> {
    const validated = manufacturerSchema.parse({ name });

    return this.store.transaction(async (db) => {
      await db.query('INSERT INTO manufacturers (name) VALUES ($1) ON CONFLICT (name) DO NOTHING', [validated.name]);
      const result = await db.query<ManufacturerRow>(
        'SELECT id, name, created_at FROM manufacturers WHERE name = $1',
        [validated.name]
      );
      return result.rows[0];
    });
  }
}
