import { z } from 'zod';

/** TradeOgre sends decimals as strings ("0.00061000"); accept numbers too. */
const decimal = z
  .union([z.string(), z.number()])
  .transform((v) => Number(v))
  .pipe(z.number().finite());

// ─── PUBLIC responses ───────────────────────────────────────────────────────────

export const tickerSchema = z.object({
  success: z.boolean().optional(),
  initialprice: decimal.optional(),
  price: decimal,
  high: decimal,
  low: decimal,
  volume: decimal,
  bid: decimal,
  ask: decimal,
});

// ─── PRIVATE responses ─────────────────────────────────────────────────────────

/** totals in `balances`; some responses also carry `available` */
export const balancesSchema = z.object({
  success: z.boolean().optional(),
  balances: z.record(z.string(), decimal).optional(),
  available: z.record(z.string(), decimal).optional(),
});

export const orderItemSchema = z.object({
  uuid: z.string(),
  date: z.number().optional(),
  type: z.enum(['buy', 'sell']),
  price: decimal,
  quantity: decimal,
  market: z.string(),
});
export type OrderItem = z.infer<typeof orderItemSchema>;

/** array, or an object keyed by uuid */
export const openOrdersSchema = z.union([
  z.array(orderItemSchema),
  z.record(z.string(), orderItemSchema.partial({ uuid: true })),
]);

export const orderPlacedSchema = z.object({
  success: z.literal(true),
  uuid: z.string().min(1),
  bnewbalavail: decimal.optional(),
  snewbalavail: decimal.optional(),
});

export const successSchema = z.object({
  success: z.literal(true),
});
