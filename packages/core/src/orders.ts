import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { Order } from './types.js';

/**
 * Shape of an order submission, as received from a caller.
 */
export const CreateOrderRequestSchema = z.object({
  userId: z.string().min(1),
  productId: z.string().min(1),
  quantity: z.number().int().positive(),
  amount: z.number().positive(),
});

export type CreateOrderRequest = z.infer<typeof CreateOrderRequestSchema>;

/**
 * Thrown when an order submission does not match
 * {@link CreateOrderRequestSchema}.  No saga is started for it.
 */
export class InvalidOrderRequestError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(issues: z.ZodIssue[]) {
    super(
      `Invalid order request: ${issues
        .map((issue) => `${issue.path.join('.') || '<root>'} ${issue.message}`)
        .join('; ')}`,
    );
    this.name = 'InvalidOrderRequestError';
    this.issues = issues;
  }
}

/**
 * @throws {@link InvalidOrderRequestError}
 */
export function parseCreateOrderRequest(input: unknown): CreateOrderRequest {
  const parsed = CreateOrderRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidOrderRequestError(parsed.error.issues);
  }
  return parsed.data;
}

/** A new `pending` order with a fresh id. */
export function createOrder(request: CreateOrderRequest): Order {
  return {
    id: randomUUID(),
    userId: request.userId,
    productId: request.productId,
    quantity: request.quantity,
    amount: request.amount,
    status: 'pending',
  };
}
