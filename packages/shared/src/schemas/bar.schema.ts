import { z } from 'zod';

/**
 * Zod schema for Bar validation
 */
export const BarSchema = z
  .object({
    symbol: z.string().min(1),
    timestamp: z.number().int().positive(),
    open: z.number().positive(),
    high: z.number().positive(),
    low: z.number().positive(),
    close: z.number().positive(),
    volume: z.number().nonnegative(),
  })
  .refine((bar) => bar.high >= bar.low, { message: 'high must be >= low' })
  .refine((bar) => bar.high >= Math.max(bar.open, bar.close), {
    message: 'high must be >= open and close',
  })
  .refine((bar) => bar.low <= Math.min(bar.open, bar.close), {
    message: 'low must be <= open and close',
  });

/**
 * Type inferred from schema
 */
export type BarSchemaType = z.infer<typeof BarSchema>;
