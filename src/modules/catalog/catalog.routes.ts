import express from 'express';
import { CatalogService } from './catalog.service';
import { createCatalogController } from './catalog.controller';
import { asyncHandler } from '../../utils/async-handler';

export const createProductRoutes = (catalog: CatalogService) => {
  const router = express.Router();
  const controller = createCatalogController(catalog);

  router.get('/', asyncHandler(controller.listProducts));
  router.post('/', asyncHandler(controller.createProduct));
  router.get('/:id', asyncHandler(controller.getProduct));
  router.put('/:id', asyncHandler(controller.updateProduct));
  router.delete('/:id', asyncHandler(controller.deleteProduct));

  return router;
};

export const createManufacturerRoutes = (catalog: CatalogService) => {
  const router = express.Router();
  const controller = createCatalogController(catalog);

  router.get('/', asyncHandler(controller.listManufacturers));
  router.post('/', asyncHandler(controller.ensureManufacturer));

  return router;
};
