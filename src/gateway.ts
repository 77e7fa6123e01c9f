import { serve } from '@hono/node-server'
import { createGatewayApp } from './app'
import {
    COMPLIANCE_LOG_ENABLED,
    FORWARD_TIMEOUT,
    NUM_WORKERS,
    QUEUE_SIZE,
    WORKER_URL
} from './config/app'
import { closeRedis, initializeRedis } from './config/redis'
import { BoundedQueue } from './core/bounded-queue'
import { ComplianceLog } from './services/compliance-log'
import { DispatchPool } from './services/dispatch-pool'
import { PaymentStore } from './services/payment.store'
import { PaymentSubmission } from './types'
import { onShutdown } from './shutdown'

export async function startGateway(port: number): Promise<void> {
    const redis = await initializeRedis()

    const queue = new BoundedQueue<PaymentSubmission>(QUEUE_SIZE)
    const pool = new DispatchPool(queue, {
        workers: NUM_WORKERS,
        workerUrl: WORKER_URL,
        timeoutMs: FORWARD_TIMEOUT
    })
    const complianceLog = COMPLIANCE_LOG_ENABLED ? new ComplianceLog(redis) : null
    const store = new PaymentStore(redis)

    pool.start()
    complianceLog?.start()

    const app = createGatewayApp({ queue, store, complianceLog })
    const server = serve({ fetch: app.fetch, port }, info => {
        console.log(`[Gateway] listening on port ${info.port} (queue=${queue.getCapacity()}, workers=${NUM_WORKERS})`)
    })

    onShutdown('Gateway', async () => {
        await new Promise<void>(resolve => server.close(() => resolve()))
        await pool.stop()
        await complianceLog?.close()

        const { forwarded, dropped } = pool.stats
        const complianceDropped = complianceLog?.droppedCount ?? 0
        console.log(`[Gateway] forwarded=${forwarded} dropped=${dropped} complianceDropped=${complianceDropped}`)
        await closeRedis()
    })
}
