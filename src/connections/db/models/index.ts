export * from './manufacturer.model';
export * from './product.model';
export * from './product-relation.model';
export * from './sales-record.model';
