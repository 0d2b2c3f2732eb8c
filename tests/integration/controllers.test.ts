import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import express, { Request, Response } from 'express';

import { createTestServices, seedProducts } from '../helpers/store';
import { Services } from '../../src/services';
import { createCatalogController } from '../../src/modules/catalog/catalog.controller';
import { createRelationsController } from '../../src/modules/relations/relations.controller';
import { IdParams } from '../../src/types/request.types';

const createRequest = (init: { params?: IdParams; body?: unknown; query?: Record<string, string> }) => {
  const req: Request<IdParams> = Object.create(express.request);
  req.params = init.params ?? { id: '' };
  req.body = init.body;
  req.query = init.query ?? {};
  return req;
};

const createResponse = () => {
  const res: Response = Object.create(express.response);
  const status = vi.fn().mockReturnValue(res);
  const json = vi.fn().mockReturnValue(res);
  res.status = status;
  res.json = json;
  return { res, status, json };
};

describe('catalog and relation controllers', () => {
  let services: Services;

  beforeEach(async () => {
    services = await createTestServices();
  });

  afterEach(async () => {
    await services.store.close();
  });

  it('creates a product from a request body and answers 201', async () => {
    const controller = createCatalogController(services.catalog);
    const { res, status, json } = createResponse();

    await controller.createProduct(createRequest({ body: { name: 'Oil', price: '2500' } }), res);

    expect(status).toHaveBeenCalledWith(201);
    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({
        success: true,
        message: 'Product created',
        data: expect.objectContaining({ name: 'Oil', price: '2500.00', related_products_count: 0 }),
      })
    );
  });

  it('lists products filtered by query-string flags', async () => {
    await seedProducts(services, [{ name: 'Active' }, { name: 'Retired', is_active: false }]);
    const controller = createCatalogController(services.catalog);
    const { res, json } = createResponse();

    await controller.listProducts(createRequest({ query: { include_inactive: 'false' } }), res);

    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({
        data: [expect.objectContaining({ name: 'Active' })],
        meta: { total: 1 },
      })
    );
  });

  it('answers 404 for a product that does not exist', async () => {
    const controller = createCatalogController(services.catalog);
    const { res, status } = createResponse();

    await controller.getProduct(createRequest({ params: { id: '99' } }), res);

    expect(status).toHaveBeenCalledWith(404);
  });

  it('answers 409 for a duplicate relation', async () => {
    const [a, b] = await seedProducts(services, [{ name: 'A' }, { name: 'B' }]);
    const controller = createRelationsController(services.relations);
    const first = createResponse();
    const second = createResponse();
    const request = () => createRequest({ params: { id: String(a) }, body: { related_product_id: b } });

    await controller.addRelation(request(), first.res);
    await controller.addRelation(request(), second.res);

    expect(first.status).toHaveBeenCalledWith(201);
    expect(second.status).toHaveBeenCalledWith(409);
  });
});
