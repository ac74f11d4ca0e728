import { z } from 'zod';
import { ORDER_STATUSES, STEP_STATUSES } from './types.js';
import type { Order, SagaStepRecord, SagaTransaction, UserSession } from './types.js';

/**
 * Thrown when a stored session payload cannot be decoded: invalid JSON, an
 * unknown format version, or a record that does not match the schema.
 *
 * The {@link SessionStore} treats it as absence and purges the record.
 */
export class SerializationError extends Error {
  /** The underlying parse or validation error. */
  readonly cause: unknown;

  constructor(message: string, cause: unknown) {
    super(`SerializationError: ${message}`);
    this.name = 'SerializationError';
    this.cause = cause;
  }
}

/** Bumped whenever the stored layout changes. */
export const SESSION_FORMAT_VERSION = 1;

// Orders are stored as submitted, including ones validation rejected.  JSON
// writes NaN and Infinity as null; they read back as NaN.
const submittedNumber = z
  .number()
  .nullable()
  .transform((value) => value ?? Number.NaN);

const orderRecordSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  product_id: z.string(),
  quantity: submittedNumber,
  amount: submittedNumber,
  status: z.enum(ORDER_STATUSES),
});

const sagaStepRecordSchema = z.object({
  name: z.string(),
  status: z.enum(STEP_STATUSES),
  error_message: z.string().nullable().optional(),
});

const sagaRecordSchema = z.object({
  id: z.string(),
  order_id: z.string(),
  steps: z.array(sagaStepRecordSchema),
  status: z.enum(ORDER_STATUSES),
});

const sessionRecordSchema = z.object({
  version: z.literal(SESSION_FORMAT_VERSION),
  session_id: z.string().min(1),
  created_at: z.number(),
  orders: z.record(orderRecordSchema),
  inventory: z.record(z.number().int()),
  balances: z.record(z.number()),
  saga_transactions: z.record(sagaRecordSchema),
});

/** The stored shape of a session, one JSON document per session key. */
export type SessionRecord = z.infer<typeof sessionRecordSchema>;

function mapRecord<A, B>(record: Record<string, A>, fn: (value: A) => B): Record<string, B> {
  return Object.fromEntries(Object.entries(record).map(([key, value]) => [key, fn(value)]));
}

/**
 * Convert a live session into its stored form.
 */
export function toSessionRecord(session: UserSession): SessionRecord {
  return {
    version: SESSION_FORMAT_VERSION,
    session_id: session.sessionId,
    created_at: session.createdAt,
    orders: mapRecord(session.orders, (order) => ({
      id: order.id,
      user_id: order.userId,
      product_id: order.productId,
      quantity: order.quantity,
      amount: order.amount,
      status: order.status,
    })),
    inventory: { ...session.inventory },
    balances: { ...session.balances },
    saga_transactions: mapRecord(session.sagaTransactions, (saga) => ({
      id: saga.id,
      order_id: saga.orderId,
      steps: saga.steps.map((step) => ({
        name: step.name,
        status: step.status,
        error_message: step.errorMessage ?? null,
      })),
      status: saga.status,
    })),
  };
}

/**
 * Convert a validated stored record back into a live session.
 */
export function fromSessionRecord(record: SessionRecord): UserSession {
  return {
    sessionId: record.session_id,
    createdAt: record.created_at,
    orders: mapRecord(
      record.orders,
      (order): Order => ({
        id: order.id,
        userId: order.user_id,
        productId: order.product_id,
        quantity: order.quantity,
        amount: order.amount,
        status: order.status,
      }),
    ),
    inventory: { ...record.inventory },
    balances: { ...record.balances },
    sagaTransactions: mapRecord(
      record.saga_transactions,
      (saga): SagaTransaction => ({
        id: saga.id,
        orderId: saga.order_id,
        steps: saga.steps.map((step): SagaStepRecord => {
          const decoded: SagaStepRecord = { name: step.name, status: step.status };
          if (step.error_message !== null && step.error_message !== undefined) {
            decoded.errorMessage = step.error_message;
          }
          return decoded;
        }),
        status: saga.status,
      }),
    ),
  };
}

/**
 * Encode a session as the JSON payload handed to a {@link SessionStateAdapter}.
 */
export function encodeSession(session: UserSession): string {
  return JSON.stringify(toSessionRecord(session));
}

/**
 * Decode a payload produced by {@link encodeSession}.
 *
 * @throws {@link SerializationError} if the payload is not valid JSON or does
 *   not match the current format version.
 */
export function decodeSession(payload: string): UserSession {
  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch (cause) {
    throw new SerializationError('session payload is not valid JSON', cause);
  }
  const parsed = sessionRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SerializationError(
      `session payload does not match format v${SESSION_FORMAT_VERSION}: ${parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ')}`,
      parsed.error,
    );
  }
  return fromSessionRecord(parsed.data);
}
