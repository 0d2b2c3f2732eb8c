import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createTestServices, seedProducts } from '../helpers/store';
import { Services } from '../../src/services';
import { NotFoundError } from '../../src/utils/errors';

describe('relation service', () => {
  let services: Services;

  beforeEach(async () => {
    services = await createTestServices();
  });

  afterEach(async () => {
    await services.store.close();
  });

  it('refuses to relate a product to itself', async () => {
    const [a] = await seedProducts(services, [{ name: 'A' }]);

    expect(await services.relations.addRelation(a, a)).toBeNull();
    expect(await services.relations.listRelated(a)).toEqual([]);
  });

  it('stores a pair only once', async () => {
    const [a, b] = await seedProducts(services, [{ name: 'A' }, { name: 'B' }]);

    const first = await services.relations.addRelation(a, b);
    const second = await services.relations.addRelation(a, b);

    expect(first).toEqual(expect.any(Number));
    expect(second).toBeNull();
    const related = await services.relations.listRelated(a);
    expect(related.map((edge) => edge.id)).toEqual([first]);
  });

  it('keeps edges directional', async () => {
    const [a, b] = await seedProducts(services, [{ name: 'A' }, { name: 'B' }]);

    await services.relations.addRelation(a, b);

    expect(await services.relations.listRelated(b)).toEqual([]);
    const reverse = await services.relations.addRelation(b, a);
    expect(reverse).toEqual(expect.any(Number));
  });

  it('returns edges in insertion order with the joined target', async () => {
    const toyota = await services.catalog.ensureManufacturer('Toyota');
    const [oil, plugs, filter] = await seedProducts(services, [
      { name: 'Oil' },
      { name: 'Spark plugs', price: '1800.00', manufacturer_id: toyota.id },
      { name: 'Air filter' },
    ]);
    await services.relations.addRelation(oil, plugs);
    await services.relations.addRelation(oil, filter);

    const related = await services.relations.listRelated(oil);

    expect(related.map((edge) => edge.related_product_id)).toEqual([plugs, filter]);
    expect(related[0]).toMatchObject({
      main_product_id: oil,
      related_product_id: plugs,
      related_product: {
        id: plugs,
        name: 'Spark plugs',
        price: '1800.00',
        manufacturer_name: 'Toyota',
        is_active: true,
      },
    });
  });

  it('hides edges to inactive targets without deleting them', async () => {
    const [a, b, c] = await seedProducts(services, [{ name: 'A' }, { name: 'B' }, { name: 'C' }]);
    await services.relations.addRelation(a, b);
    await services.relations.addRelation(a, c);

    await services.catalog.saveProduct({ id: b, name: 'B', price: '100.00', is_active: false });

    const related = await services.relations.listRelated(a);
    expect(related.map((edge) => edge.related_product_id)).toEqual([c]);
    expect((await services.catalog.getProduct(a))?.related_products_count).toBe(2);
  });

  it('offers exactly the active products not yet linked', async () => {
    const [a, b, c, d] = await seedProducts(services, [
      { name: 'Delta' },
      { name: 'Bravo' },
      { name: 'Charlie' },
      { name: 'Alpha', is_active: false },
    ]);
    await services.relations.addRelation(a, b);

    const available = await services.relations.listAvailableTargets(a);

    expect(available.map((p) => p.id)).toEqual([c]);
    expect(available.map((p) => p.id)).not.toContain(d);

    const fromB = await services.relations.listAvailableTargets(b);
    expect(fromB.map((p) => p.name)).toEqual(['Charlie', 'Delta']);
  });

  it('rejects an edge to an unknown product', async () => {
    const [a] = await seedProducts(services, [{ name: 'A' }]);

    await expect(services.relations.addRelation(a, a + 50)).rejects.toBeInstanceOf(NotFoundError);
    await expect(services.relations.addRelation(a + 50, a)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('removes an edge once and reports a second removal as a no-op', async () => {
    const [a, b] = await seedProducts(services, [{ name: 'A' }, { name: 'B' }]);
    const relationId = await services.relations.addRelation(a, b);
    if (relationId === null) {
      throw new Error('expected the edge to be created');
    }

    expect(await services.relations.removeRelation(relationId)).toBe(true);
    expect(await services.relations.removeRelation(relationId)).toBe(false);
    expect(await services.relations.listRelated(a)).toEqual([]);
  });
});
