import { Queue } from "bullmq";
import { redisConnectionConfig } from "../config/redis";
import { PaymentData, SettlementDispatcher } from "../types";

export const SETTLEMENT_QUEUE = 'settlement_queue';

export function createSettlementQueue(): Queue<PaymentData> {
    return new Queue<PaymentData>(SETTLEMENT_QUEUE, {
        connection: redisConnectionConfig
    });
}

/**
 * Hands an accepted payment to the settlement workers. The caller learns that
 * the payment was queued, never whether it settled.
 */
export class QueueSettlementDispatcher implements SettlementDispatcher {
    constructor(private readonly queue: Queue<PaymentData>) {}

    async dispatch(payment: PaymentData): Promise<void> {
        await this.queue.add('settle-payment', payment, {
            // one attempt: failover happens inside the job, never by re-running it
            attempts: 1,
            removeOnComplete: true,
            removeOnFail: 1000
        });
    }
}
