import { Request, Response } from 'express';
import { CatalogService } from './catalog.service';
import { idSchema, listProductsSchema, manufacturerSchema, saveProductSchema } from './catalog.validation';
import { IdParams } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';

const bodyObject = (body: unknown): Record<string, unknown> =>
  typeof body === 'object' && body !== null ? { ...body } : {};

export const createCatalogController = (catalog: CatalogService) => ({
  listProducts: async (req: Request, res: Response) => {
    const products = await catalog.listProducts(listProductsSchema.parse(req.query));
    return ResponseHandler.success(res, products, 'Products loaded', 200, { total: products.length });
  },

  getProduct: async (req: Request<IdParams>, res: Response) => {
    const product = await catalog.getProduct(idSchema.parse(req.params.id));
    if (!product) {
      return ResponseHandler.notFound(res, 'Product not found');
    }
    return ResponseHandler.success(res, product);
  },

  createProduct: async (req: Request, res: Response) => {
    // The id is assigned by the database
    const validated = saveProductSchema.omit({ id: true }).parse(req.body);
    const productId = await catalog.saveProduct(validated);
    const product = await catalog.getProduct(productId);
    return ResponseHandler.created(res, product, 'Product created');
  },

  updateProduct: async (req: Request<IdParams>, res: Response) => {
    const validated = saveProductSchema.parse({
      ...bodyObject(req.body),
      id: idSchema.parse(req.params.id),
    });
    const productId = await catalog.saveProduct(validated);
    const product = await catalog.getProduct(productId);
    return ResponseHandler.success(res, product, 'Product updated');
  },

  deleteProduct: async (req: Request<IdParams>, res: Response) => {
    const deleted = await catalog.deleteProduct(idSchema.parse(req.params.id));
    if (!deleted) {
      return ResponseHandler.notFound(res, 'Product not found');
    }
    return ResponseHandler.success(res, { id: Number(req.params.id) }, 'Product deleted');
  },

  listManufacturers: async (_req: Request, res: Response) => {
    const manufacturers = await catalog.listManufacturers();
    return ResponseHandler.success(res, manufacturers);
  },

  ensureManufacturer: async (req: Request, res: Response) => {
    const { name } = manufacturerSchema.parse(req.body);
    const manufacturer = await catalog.ensureManufacturer(name);
    return ResponseHandler.success(res, manufacturer, 'Manufacturer saved');
  },
});

export type CatalogController = ReturnType<typeof createCatalogController>;
