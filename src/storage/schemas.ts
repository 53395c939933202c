// Persisted document schemas. Decimals are stored as plain-notation strings,
// timestamps as ISO-8601.

import BigNumber from 'bignumber.js';
import { z } from 'zod';

const decimal = (predicate: (value: BigNumber) => boolean, message: string) =>
    z
        .string()
        .refine(value => {
            const parsed = new BigNumber(value);
            return parsed.isFinite() && predicate(parsed);
        }, { message })
        .transform(value => new BigNumber(value));

const positiveDecimal = decimal(value => value.gt(0), 'must be a positive decimal string');
const nonNegativeDecimal = decimal(value => value.gte(0), 'must be a non-negative decimal string');

const isoDate = z
    .string()
    .refine(value => !Number.isNaN(Date.parse(value)), { message: 'must be an ISO-8601 timestamp' })
    .transform(value => new Date(value));

export const orderRecordSchema = z.object({
    id: z.string().min(1),
    pair: z.string().min(1),
    side: z.enum(['buy', 'sell']),
    quantity: positiveDecimal,
    price: nonNegativeDecimal,
    role: z.enum(['entry', 'take_profit', 'stop_loss']),
    status: z.enum(['active', 'filled', 'cancelled']),
    createdAt: isoDate,
    lastUpdated: isoDate,
});

export const orderDocumentSchema = z.object({
    version: z.string(),
    savedAt: z.string().optional(),
    orders: z.array(z.unknown()),
});

export const positionSchema = z
    .object({
        id: z.string().min(1),
        pair: z.string().min(1),
        quantity: positiveDecimal,
        entryPrice: positiveDecimal,
        stopLossPrice: positiveDecimal,
        takeProfitPrice: positiveDecimal,
        createdAt: isoDate,
        entryFilledAt: isoDate,
        status: z.enum(['open', 'closed']),
        entryOrderId: z.string(),
        takeProfitOrderId: z.string().min(1).optional(),
        stopLossOrderId: z.string().min(1).optional(),
    })
    .refine(position => position.stopLossPrice.lt(position.entryPrice) && position.entryPrice.lt(position.takeProfitPrice), {
        message: 'requires stopLossPrice < entryPrice < takeProfitPrice',
    })
    .refine(position => position.takeProfitOrderId !== undefined || position.stopLossOrderId !== undefined, {
        message: 'requires at least one protective order id',
    });

// positionId → serialized position, no envelope
export const positionDocumentSchema = z.record(z.unknown());

export function describeIssues(error: z.ZodError): string {
    return error.issues.map(issue => `${issue.path.join('.') || '(root)'} ${issue.message}`).join('; ');
}
