import { serve } from '@hono/node-server'
import { createWorkerApp } from './app'
import { SETTLEMENT_CONCURRENCY } from './config/app'
import { PROCESSORS } from './config/processors'
import { closeRedis, initializeRedis } from './config/redis'
import { createSettlementQueue, QueueSettlementDispatcher } from './jobs/settlement.queue'
import { startSettlementWorker } from './processors/settlement.processor'
import { PaymentService } from './services/payment.service'
import { PaymentStore } from './services/payment.store'
import { ProcessorHealth, ProcessorHealthTracker } from './services/processor-health'
import { onShutdown } from './shutdown'

export async function startWorker(port: number): Promise<void> {
    const redis = await initializeRedis()

    const health = new ProcessorHealth()
    const tracker = new ProcessorHealthTracker(health, PROCESSORS)
    const store = new PaymentStore(redis)
    const paymentService = new PaymentService(store, health, PROCESSORS)

    const settlementQueue = createSettlementQueue()
    const settlementWorker = startSettlementWorker(paymentService, SETTLEMENT_CONCURRENCY)
    tracker.start()

    const app = createWorkerApp({
        dispatcher: new QueueSettlementDispatcher(settlementQueue),
        store
    })
    const server = serve({ fetch: app.fetch, port }, info => {
        console.log(`[Worker] listening on port ${info.port}`)
    })

    onShutdown('Worker', async () => {
        await new Promise<void>(resolve => server.close(() => resolve()))
        await tracker.stop()
        await settlementWorker.close()
        await settlementQueue.close()
        await closeRedis()
    })
}
