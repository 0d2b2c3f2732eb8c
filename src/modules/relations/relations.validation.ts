import { z } from 'zod';
import { idSchema } from '../catalog/catalog.validation';

export const addRelationSchema = z.object({
  main_product_id: idSchema,
  related_product_id: idSchema,
});

export const relationIdSchema = idSchema;

export type AddRelationInput = z.input<typeof addRelationSchema>;
