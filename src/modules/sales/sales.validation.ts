import { z } from 'zod';
import { idSchema } from '../catalog/catalog.validation';

// INTEGER column
export const MAX_QUANTITY = 2147483647;

export const recordSaleSchema = z.object({
  product_id: idSchema,
  quantity: z
    .number()
    .int('Quantity must be a whole number')
    .positive('Quantity must be greater than 0')
    .max(MAX_QUANTITY, `Quantity must not exceed ${MAX_QUANTITY}`),
  customer_info: z
    .string()
    .nullish()
    .transform((value) => {
      const trimmed = value?.trim();
      return trimmed ? trimmed : null;
    }),
});

export const listSalesSchema = z.object({
  product_id: idSchema.optional(),
});

export type RecordSaleInput = z.input<typeof recordSaleSchema>;
