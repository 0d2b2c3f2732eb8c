import type { Store } from '../../connections/db/store';
import {
  ProductRelationWithProduct,
  ProductRow,
  RelatedProduct,
  toRelatedProduct,
} from '../../connections/db/models';
import { addRelationSchema, relationIdSchema } from './relations.validation';
import { idSchema } from '../catalog/catalog.validation';
import { productExists } from '../catalog/catalog.service';
import { NotFoundError } from '../../utils/errors';
import { getLogger } from '../../utils/logging';

const log = getLogger('relations');

type RelationRow = ProductRow & {
  relation_id: number;
  main_product_id: number;
  relation_created_at: Date;
};

/**
 * Directed "related product" graph. A -> B never implies B -> A.
 */
export class RelationService {
  constructor(private readonly store: Store) {}

  /**
   * Edges leaving `productId` whose target is active, in insertion order.
   */
  async listRelated(productId: number): Promise<ProductRelationWithProduct[]> {
    const result = await this.store.query<RelationRow>(
      `SELECT pr.id AS relation_id, pr.main_product_id, pr.created_at AS relation_created_at,
              p.id, p.name, p.price, p.description, p.image_path, p.manufacturer_id,
              p.is_active, p.created_at, p.updated_at, m.name AS manufacturer_name
       FROM product_relations pr
       JOIN products p ON p.id = pr.related_product_id
       LEFT JOIN manufacturers m ON m.id = p.manufacturer_id
       WHERE pr.main_product_id = $1 AND p.is_active = TRUE
       ORDER BY pr.id ASC`,
      [idSchema.parse(productId)]
    );

    return result.rows.map((row) => ({
      id: row.relation_id,
      main_product_id: row.main_product_id,
      related_product_id: row.id,
      created_at: row.relation_created_at,
      related_product: toRelatedProduct(row),
    }));
  }

  /**
   * Active products that `productId` could still link to: itself and its
   * current targets excluded. Complement of listRelated within active products.
   */
  async listAvailableTargets(productId: number): Promise<RelatedProduct[]> {
    const result = await this.store.query<ProductRow>(
      `SELECT p.id, p.name, p.price, p.description, p.image_path, p.manufacturer_id,
              p.is_active, p.created_at, p.updated_at, m.name AS manufacturer_name
       FROM products p
       LEFT JOIN manufacturers m ON m.id = p.manufacturer_id
       LEFT JOIN product_relations pr ON pr.related_product_id = p.id AND pr.main_product_id = $1
       WHERE p.id <> $1 AND p.is_active = TRUE AND pr.id IS NULL
       ORDER BY p.name ASC, p.id ASC`,
      [idSchema.parse(productId)]
    );

    return result.rows.map(toRelatedProduct);
  }

  /**
   * Creates the edge main -> related.
   * @returns the new edge id, or null when the edge would be a self-relation
   *   or already exists
   */
  async addRelation(mainProductId: number, relatedProductId: number): Promise<number | null> {
    const { main_product_id, related_product_id } = addRelationSchema.parse({
      main_product_id: mainProductId,
      related_product_id: relatedProductId,
    });

    if (main_product_id === related_product_id) {
      log.debug('Self relation rejected', { productId: main_product_id });
      return null;
    }

    return this.store.transaction(async (db) => {
      for (const id of [main_product_id, related_product_id]) {
        if (!(await productExists(db, id))) {
          throw new NotFoundError('Product not found', { productId: id });
        }
      }

      const inserted = await db.query<{ id: number }>(
        `INSERT INTO product_relations (main_product_id, related_product_id)
         VALUES ($1, $2)
         ON CONFLICT (main_product_id, related_product_id) DO NOTHING
         RETURNING id`,
        [main_product_id, related_product_id]
      );

      if (inserted.rows.length === 0) {
        log.debug('Duplicate relation rejected', { mainProductId: main_product_id, relatedProductId: related_product_id });
        return null;
      }

      const relationId = inserted.rows[0].id;
      log.info('Relation created', { relationId, mainProductId: main_product_id, relatedProductId: related_product_id });
      return relationId;
    });
  }

  /**
   * @returns false when no edge had this id
   */
  async removeRelation(relationId: number): Promise<boolean> {
    const id = relationIdSchema.parse(relationId);

    return this.store.transaction(async (db) => {
      const deleted = await db.query('DELETE FROM product_relations WHERE id = $1 RETURNING id', [id]);
      if (deleted.rows.length > 0) {
        log.info('Relation removed', { relationId: id });
      }
      return deleted.rows.length > 0;
    });
  }
}
