import { z } from 'zod';

// Base types
export type ProductId = number;
export type Quantity = number;

export const CATEGORIES = ['Bakery', 'Cake', 'Cookies'] as const;
export type Category = (typeof CATEGORIES)[number];
export const DEFAULT_CATEGORY: Category = 'Bakery';

// Quantities are stored as unsigned 32-bit counts
export const MAX_QUANTITY = 4294967295;

// Zod schemas for validation
export const ProductIdSchema = z.number().int().positive().max(Number.MAX_SAFE_INTEGER);
export const QuantitySchema = z.number().int().min(0).max(MAX_QUANTITY);
export const CategorySchema = z.enum(CATEGORIES);

// Product record type and schema
export interface Product {
  id: ProductId;
  name: string;
  category: Category;
  quantity: Quantity;
  createdAt: Date;
  updatedAt?: Date;
}

export const ProductSchema = z.object({
  id: ProductIdSchema,
  name: z.string().min(1),
  category: CategorySchema,
  quantity: QuantitySchema,
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date().optional(),
});

// Command payloads
export interface ProductPayload {
  name: string;
  quantity: Quantity;
  category?: Category;
}

export interface StockPayload {
  amount: Quantity;
}

// Shape checks only: emptiness and zero values are rejected by the service
export const ProductPayloadSchema = z.object({
  name: z.string(),
  quantity: QuantitySchema,
  category: CategorySchema.default(DEFAULT_CATEGORY),
});

export const StockPayloadSchema = z.object({
  amount: QuantitySchema,
});

const MAX_PATH_ID = 18446744073709551615n;

// Any unsigned 64-bit decimal is a valid lookup key; ids the store never allocated resolve to NotFound
export const ProductIdParamsSchema = z.object({
  id: z
    .string()
    .regex(/^\d+$/, 'Id must be an unsigned decimal integer')
    .refine((raw) => BigInt(raw) <= MAX_PATH_ID, 'Id is out of range')
    .transform(Number),
});

// API Response DTOs
export interface ProductResponse {
  success: true;
  data: Product;
}

export interface StockResponse {
  success: true;
  data: {
    id: ProductId;
    quantity: Quantity;
  };
}
