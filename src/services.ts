import type { Store } from './connections/db/store';
import { CatalogService } from './modules/catalog/catalog.service';
import { RelationService } from './modules/relations/relations.service';
import { SalesService } from './modules/sales/sales.service';

export interface Services {
  store: Store;
  catalog: CatalogService;
  relations: RelationService;
  sales: SalesService;
}

export const createServices = (store: Store): Services => ({
  store,
  catalog: new CatalogService(store),
  relations: new RelationService(store),
  sales: new SalesService(store),
});
