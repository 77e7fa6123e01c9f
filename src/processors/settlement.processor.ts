import { Worker } from "bullmq";
import { redisConnectionConfig } from "../config/redis";
import { SETTLEMENT_QUEUE } from "../jobs/settlement.queue";
import { PaymentService } from "../services/payment.service";
import { PaymentData, SettlementOutcome } from "../types";

export async function settlePayment(service: PaymentService, data: PaymentData): Promise<SettlementOutcome> {
    const outcome = await service.processPayment(data);

    if (outcome.status === 'settled') {
        console.log(`[Worker] ${data.correlationId} settled via ${outcome.processor}`);
    } else if (outcome.status === 'dropped') {
        console.warn(`[Worker] ${data.correlationId} dropped: ${outcome.reason}`);
    }
    return outcome;
}

export const startSettlementWorker = (service: PaymentService, concurrency: number) => {
    const worker = new Worker<PaymentData, SettlementOutcome>(
        SETTLEMENT_QUEUE,
        async job => settlePayment(service, job.data),
        {
            connection: redisConnectionConfig,
            concurrency,
            autorun: false
        }
    );

    worker.on('failed', (job, err) => {
        console.error(`[Worker] Job ${job?.id} failed:`, err.message);
    });

    worker.on('error', err => {
        console.error('[Worker] error:', err.message);
    });

    worker.run().catch(err => {
        console.error('[Worker] stopped unexpectedly:', err);
    });
    console.log(`[Worker] Started with concurrency ${concurrency}`);

    return worker;
};
