import { z } from 'zod';
import Decimal from 'decimal.js';
import { isMoneyString, MAX_MONEY, normalizeMoney } from '../../utils/money';

const optionalText = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
  });

const booleanFlag = z.union([
  z.boolean(),
  z.enum(['true', 'false']).transform((value) => value === 'true'),
]);

// Accepts "2500", "99.99" or 99.99; stored as a two-digit string
export const priceSchema = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .superRefine((value, ctx) => {
    if (!isMoneyString(value)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Price must be a non-negative amount with at most 2 decimal places',
      });
      return;
    }
    if (new Decimal(value).gt(MAX_MONEY)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Price must not exceed ${MAX_MONEY.toFixed(2)}` });
    }
  })
  .transform((value) => normalizeMoney(value));

export const idSchema = z.coerce.number().int().positive();

export const saveProductSchema = z.object({
  id: z.number().int().positive().optional(),
  name: z.string().trim().min(1, 'Product name is required').max(255, 'Product name must be at most 255 characters'),
  price: priceSchema,
  description: optionalText,
  image_path: optionalText,
  manufacturer_id: z.number().int().positive().nullish().transform((value) => value ?? null),
  is_active: z.boolean().default(true),
});

export const listProductsSchema = z.object({
  manufacturer_id: idSchema.optional(),
  sort_by: z.enum(['name', 'price']).default('name'),
  sort_order: z.enum(['asc', 'desc']).default('asc'),
  search: z
    .string()
    .optional()
    .transform((value) => value?.trim() || undefined),
  include_inactive: booleanFlag.default(true),
});

export const manufacturerSchema = z.object({
  name: z.string().trim().min(1, 'Manufacturer name is required').max(255, 'Manufacturer name must be at most 255 characters'),
});

export type SaveProductInput = z.input<typeof saveProductSchema>;
export type ListProductsOptions = z.input<typeof listProductsSchema>;
