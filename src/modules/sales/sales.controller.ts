import { Request, Response } from 'express';
import { SalesService } from './sales.service';
import { listSalesSchema, recordSaleSchema } from './sales.validation';
import { ResponseHandler } from '../../utils/response';

export const createSalesController = (sales: SalesService) => ({
  listSales: async (req: Request, res: Response) => {
    const { product_id } = listSalesSchema.parse(req.query);
    const records = await sales.listSales(product_id);
    return ResponseHandler.success(res, records, 'Sales loaded', 200, {
      statistics: sales.computeStatistics(records),
    });
  },

  getStatistics: async (req: Request, res: Response) => {
    const { product_id } = listSalesSchema.parse(req.query);
    const statistics = await sales.getStatistics(product_id);
    return ResponseHandler.success(res, statistics);
  },

  recordSale: async (req: Request, res: Response) => {
    const validated = recordSaleSchema.parse(req.body);
    const saleId = await sales.recordSale(validated.product_id, validated.quantity, validated.customer_info);
    return ResponseHandler.created(res, { id: saleId }, 'Sale recorded');
  },
});
