/**
 * Request schema - the resolved customer request handed to the order desk
 */

import { z } from 'zod';
import { ErrorCollection, InvalidQuantityError, InvalidRequestError } from '../errors.js';
import { isIsoDate } from '../utils/dates.js';

export const RequestTypeSchema = z.enum(['quote', 'order', 'inquiry']);

export const RequestItemSchema = z.object({
  name: z.string().trim().min(1, 'Item name is required'),
  quantity: z.number().int().positive().optional(),
});

export const OrderRequestSchema = z
  .object({
    id: z.string().min(1).optional(),
    type: RequestTypeSchema,
    items: z.array(RequestItemSchema).default([]),
    date: z.string().refine(isIsoDate, { message: 'Expected an ISO date (YYYY-MM-DD)' }),
  })
  .superRefine((request, ctx) => {
    if (request.type === 'inquiry') return;

    if (request.items.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['items'],
        message: `Items are required for ${request.type} requests`,
      });
    }
    request.items.forEach((item, index) => {
      if (item.quantity === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['items', index, 'quantity'],
          message: 'Quantity is required',
        });
      }
    });
  });

export type RequestType = z.infer<typeof RequestTypeSchema>;
export type OrderRequestInput = z.input<typeof OrderRequestSchema>;
export type OrderRequest = z.output<typeof OrderRequestSchema>;

function valueAt(input: unknown, path: readonly (string | number)[]): unknown {
  let current: unknown = input;
  for (const key of path) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}

/**
 * Validate a raw request.
 *
 * @throws InvalidQuantityError for a quantity that is not a positive integer
 * @throws InvalidRequestError for any other problem, with per-field messages
 */
export function parseRequest(input: unknown): OrderRequest {
  const parsed = OrderRequestSchema.safeParse(input);
  if (parsed.success) {
    return parsed.data;
  }

  const errors = new ErrorCollection();
  for (const issue of parsed.error.issues) {
    const field = issue.path.join('.');
    if (issue.path[issue.path.length - 1] === 'quantity' && issue.code !== z.ZodIssueCode.custom) {
      throw new InvalidQuantityError(valueAt(input, issue.path), field);
    }
    errors.add(field === '' ? 'request' : field, issue.message);
  }
  throw new InvalidRequestError(errors);
}
