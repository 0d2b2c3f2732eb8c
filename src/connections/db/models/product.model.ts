import { normalizeMoney } from '../../../utils/money';

// Product Model

export interface Product {
  id: number;
  name: string;
  price: string; // NUMERIC(10,2), always two fractional digits
  description: string | null;
  image_path: string | null; // opaque reference owned by the image store
  manufacturer_id: number | null;
  manufacturer_name: string | null; // joined
  is_active: boolean; // default: true
  created_at: Date;
  updated_at: Date;
  related_products_count: number; // outgoing relation edges
}

/**
 * Product as reached through a relation edge; the edge count is not joined.
 */
export type RelatedProduct = Omit<Product, 'related_products_count'>;

export interface SaveProductData {
  id?: number; // absent: insert
  name: string;
  price: string;
  description: string | null;
  image_path: string | null;
  manufacturer_id: number | null;
  is_active: boolean;
}

export type ProductSortKey = 'name' | 'price';
export type SortOrder = 'asc' | 'desc';

export interface ProductListFilter {
  manufacturer_id?: number;
  sort_by: ProductSortKey;
  sort_order: SortOrder;
  search?: string;
  include_inactive: boolean;
}

/**
 * Raw row shape. NUMERIC and COUNT come back as strings from node-postgres.
 */
export type ProductRow = {
  id: number;
  name: string;
  price: string | number;
  description: string | null;
  image_path: string | null;
  manufacturer_id: number | null;
  manufacturer_name: string | null;
  is_active: boolean | null;
  created_at: Date;
  updated_at: Date;
  related_products_count?: string | number | null;
};

export const toRelatedProduct = (row: ProductRow): RelatedProduct => ({
  id: row.id,
  name: row.name,
  price: normalizeMoney(row.price),
  description: row.description,
  image_path: row.image_path,
  manufacturer_id: row.manufacturer_id,
  manufacturer_name: row.manufacturer_name,
  is_active: row.is_active !== false,
  created_at: row.created_at,
  updated_at: row.updated_at,
});

export const toProduct = (row: ProductRow): Product => ({
  ...toRelatedProduct(row),
  related_products_count: Number(row.related_products_count ?? 0),
});
