import { z } from 'zod';

// Envelopes the server answers with. Each is applied to the output of the
// JSON reader, never to raw text.

export const loginResponseSchema = z.object({
  token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().optional()
});

export const claimResponseSchema = z.object({
  status: z.string(),
  total_claimed: z.number().int().nonnegative(),
  claimed_sales_count: z.number().int().nonnegative()
});

export const buyResponseSchema = z.object({
  status: z.string().default('success'),
  total_cost: z.number().int().nonnegative(),
  purchased_items: z.array(z.unknown()).default([])
});

export const pendingSaleSchema = z.object({
  buyer_name: z.string().default(''),
  item: z.string(),
  quantity: z.number().int().nonnegative(),
  price: z.number().int().nonnegative(),
  total_silver: z.number().int().nonnegative(),
  timestamp: z.number().default(0)
});

export const pendingSalesResponseSchema = z.object({
  pending_sales: z.array(z.unknown()),
  count: z.number().int().optional()
});

/**
 * Server error body, version 1: { "detail": "..." } for rejections and
 * { "detail": [{ "msg": "...", ... }] } for request validation failures.
 */
export const serverErrorSchemaV1 = z.object({
  detail: z.union([
    z.string(),
    z.array(z.object({ msg: z.string() }).passthrough())
  ])
});
