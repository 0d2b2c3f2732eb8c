import express from 'express';
import type { Services } from '../services';
import { createManufacturerRoutes, createProductRoutes } from '../modules/catalog/catalog.routes';
import { createProductRelationRoutes, createRelationRoutes } from '../modules/relations/relations.routes';
import { createSalesRoutes } from '../modules/sales/sales.routes';

export const createRoutes = ({ catalog, relations, sales }: Services) => {
  const router = express.Router();

  // API Routes
  router.use('/manufacturers', createManufacturerRoutes(catalog));
  router.use('/products', createProductRoutes(catalog));
  router.use('/products', createProductRelationRoutes(relations));
  router.use('/relations', createRelationRoutes(relations));
  router.use('/sales', createSalesRoutes(sales));

  return router;
};
