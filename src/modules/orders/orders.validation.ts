import { z } from 'zod';

const quantitySchema = z.number().int('quantity must be an integer');

// Positivity and emptiness are checked by the order normalizer, not here
const orderItemSchema = z.union([
  z.object({
    product_id: z.number().int().positive(),
    quantity: quantitySchema,
  }).strict(),
  z.object({
    product_name: z.string().trim().min(1, 'product_name must not be empty'),
    quantity: quantitySchema,
  }).strict(),
]);

export const createOrderSchema = z.object({
  user_id: z.string().trim().min(1, 'user_id is required').max(64),
  items: z.array(orderItemSchema),
});

export const orderIdParamSchema = z.object({
  id: z.coerce.number().int().positive().max(2147483647),
});

export const listOrdersQuerySchema = z.object({
  user_id: z.string().trim().min(1, 'user_id is required'),
});

export type CreateOrderBody = z.infer<typeof createOrderSchema>;
