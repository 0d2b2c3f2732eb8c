import express from 'express';
import { SalesService } from './sales.service';
import { createSalesController } from './sales.controller';
import { asyncHandler } from '../../utils/async-handler';

export const createSalesRoutes = (sales: SalesService) => {
  const router = express.Router();
  const controller = createSalesController(sales);

  router.get('/', asyncHandler(controller.listSales));
  router.get('/statistics', asyncHandler(controller.getStatistics));
  router.post('/', asyncHandler(controller.recordSale));

  return router;
};
