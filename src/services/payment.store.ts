import type Redis from 'ioredis';
import { PaymentSummary, PersistedPayment, ProcessorName, SummaryRange } from '../types';
import { persistedPaymentSchema } from '../validation/payment.schema';
import { errorMessage, fromCents, toCents } from '../util';

export const PAYMENTS_KEY = 'payments:rows';

/**
 * Settled payments, one hash field per correlationId. The hash field is the
 * primary key: HSETNX is the only write, so a second insert for the same id is
 * a no-op decided by Redis, whatever order the callers race in.
 */
export class PaymentStore {
    constructor(private readonly redis: Redis) {}

    async insertIfAbsent(payment: PersistedPayment): Promise<boolean> {
        const written = await this.redis.hsetnx(PAYMENTS_KEY, payment.correlationId, JSON.stringify(payment));
        return written === 1;
    }

    async exists(correlationId: string): Promise<boolean> {
        return (await this.redis.hexists(PAYMENTS_KEY, correlationId)) === 1;
    }

    /**
     * Aggregates the committed rows at call time. `from`/`to` bound
     * `createdAt` inclusively when given.
     */
    async getSummary(range: SummaryRange = {}): Promise<PaymentSummary> {
        const rows = await this.redis.hvals(PAYMENTS_KEY);
        const fromTs = range.from?.getTime() ?? -Infinity;
        const toTs = range.to?.getTime() ?? Infinity;

        const totals: Record<ProcessorName, { requests: number; cents: number }> = {
            default: { requests: 0, cents: 0 },
            fallback: { requests: 0, cents: 0 }
        };

        for (const raw of rows) {
            const row = this.parseRow(raw);
            if (!row) continue;

            const createdAt = Date.parse(row.createdAt);
            if (createdAt < fromTs || createdAt > toTs) continue;

            totals[row.processor].requests++;
            totals[row.processor].cents += toCents(row.amount);
        }

        return {
            default: { totalRequests: totals.default.requests, totalAmount: fromCents(totals.default.cents) },
            fallback: { totalRequests: totals.fallback.requests, totalAmount: fromCents(totals.fallback.cents) }
        };
    }

    async purge(): Promise<void> {
        await this.redis.del(PAYMENTS_KEY);
    }

    private parseRow(raw: string): PersistedPayment | null {
        try {
            return persistedPaymentSchema.parse(JSON.parse(raw));
        } catch (error) {
            console.error(`[PaymentStore] skipping malformed row ${raw}: ${errorMessage(error)}`);
            return null;
        }
    }
}
