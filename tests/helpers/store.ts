import { Store } from '../../src/connections/db/store';
import { createPglitePool } from './pglite';
import { migrate } from '../../src/connections/db/migrate';
import { createServices, Services } from '../../src/services';

/**
 * Fresh in-process Postgres per call, schema already migrated.
 */
export const createTestStore = async (): Promise<Store> => {
  const store = new Store(await createPglitePool());
  await migrate(store);
  return store;
};

export const createTestServices = async (): Promise<Services> => createServices(await createTestStore());

export interface ProductFixture {
  name: string;
  price?: string;
  manufacturer_id?: number | null;
  is_active?: boolean;
}

export const seedProducts = async (services: Services, fixtures: ProductFixture[]): Promise<number[]> => {
  const ids: number[] = [];
  for (const fixture of fixtures) {
    ids.push(
      await services.catalog.saveProduct({
        name: fixture.name,
        price: fixture.price ?? '100.00',
        manufacturer_id: fixture.manufacturer_id ?? null,
        is_active: fixture.is_active ?? true,
      })
    );
  }
  return ids;
};
