import { z } from 'zod';

/**
 * Position side schema
 */
export const PositionSideSchema = z.enum(['long', 'short']);

/**
 * Order schema, checked before an order leaves for the broker
 */
export const OrderSchema = z.object({
  id: z.string().min(1),
  symbol: z.string().min(1),
  action: z.enum(['buy', 'sell']),
  intent: z.enum(['entry', 'exit']),
  side: PositionSideSchema,
  quantity: z.number().int().positive(),
  referencePrice: z.number().positive(),
  timestamp: z.number().int().positive(),
});

/**
 * Broker fill schema
 */
export const BrokerFillSchema = z.object({
  price: z.number().positive(),
  quantity: z.number().int().positive(),
  commission: z.number().nonnegative(),
  timestamp: z.number().int().positive(),
});

export type OrderSchemaType = z.infer<typeof OrderSchema>;
export type BrokerFillSchemaType = z.infer<typeof BrokerFillSchema>;
