import type { RelatedProduct } from './product.model';

// Product Relation Model: directed edge main -> related

export interface ProductRelation {
  id: number;
  main_product_id: number;
  related_product_id: number; // never equal to main_product_id
  created_at: Date;
}

export interface ProductRelationWithProduct extends ProductRelation {
  related_product: RelatedProduct;
}
