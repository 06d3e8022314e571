/**
 * Validation schema for ledger seed data
 */

import { z } from 'zod';
import { isIsoDate } from '../utils/dates.js';

const isoDate = z.string().refine(isIsoDate, { message: 'Expected an ISO date (YYYY-MM-DD)' });

export const ItemCategorySchema = z.enum(['paper', 'product', 'large_format', 'specialty']);

export const SeedItemSchema = z.object({
  name: z.string().min(1, 'Item name is required'),
  category: ItemCategorySchema,
  unitPrice: z.number().positive('Unit price must be positive'),
  stock: z.number().int().nonnegative('Stock cannot be negative'),
  minStockLevel: z.number().int().nonnegative('Minimum stock level cannot be negative'),
});

export const QuoteHistoryEntrySchema = z.object({
  requestText: z.string(),
  totalAmount: z.number().nonnegative(),
  explanation: z.string(),
  jobType: z.string().optional(),
  orderSize: z.string().optional(),
  eventType: z.string().optional(),
  date: isoDate,
});

export const LedgerSeedSchema = z
  .object({
    openedAt: isoDate,
    cash: z.number().nonnegative('Opening cash cannot be negative'),
    items: z.array(SeedItemSchema),
    quoteHistory: z.array(QuoteHistoryEntrySchema).default([]),
  })
  .superRefine((seed, ctx) => {
    const seen = new Set<string>();
    seed.items.forEach((item, index) => {
      if (seen.has(item.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['items', index, 'name'],
          message: `Duplicate item name '${item.name}'`,
        });
      }
      seen.add(item.name);
    });
  });

export type LedgerSeedInput = z.input<typeof LedgerSeedSchema>;
export type LedgerSeed = z.output<typeof LedgerSeedSchema>;

/**
 * Validate raw seed data (e.g. parsed from a JSON file)
 */
export function parseLedgerSeed(input: unknown): LedgerSeed {
  return LedgerSeedSchema.parse(input);
}
