/**
 * Request schemas for the demo API.
 */

import { z } from 'zod';

const positiveId = z.coerce.number().int().positive();

export const userIdParamsSchema = z.object({ userId: positiveId });
export const orderIdParamsSchema = z.object({ orderId: positiveId });
export const paymentIdParamsSchema = z.object({ paymentId: positiveId });

export const createUserSchema = z.object({
  name: z.string().trim().min(1, 'name is required').max(100),
  email: z.email(),
  status: z.enum(['active', 'inactive']).optional(),
});

export const listOrdersQuerySchema = z.object({
  userId: positiveId.optional(),
});

export const createOrderSchema = z.object({
  userId: z.number().int().positive(),
  amount: z.number().positive().max(1_000_000),
  items: z.array(z.string().min(1)).min(1, 'at least one item is required'),
});

export const processPaymentSchema = z.object({
  orderId: z.number().int().positive(),
  amount: z.number().positive(),
  method: z.enum(['credit_card', 'debit_card', 'paypal', 'bank_transfer']).default('credit_card'),
});

export const slowQuerySchema = z.object({
  ms: z.coerce.number().int().transform((ms) => Math.min(Math.max(ms, 0), 10_000)).default(1_000),
});
