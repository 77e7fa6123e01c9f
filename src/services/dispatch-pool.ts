import { BoundedQueue } from '../core/bounded-queue'
import { PaymentSubmission } from '../types'
import { errorMessage } from '../util'

export interface DispatchPoolOptions {
    workers: number
    workerUrl: string
    timeoutMs: number
}

/**
 * Fixed set of loops draining the ingress queue into the worker process.
 * A failed handoff is logged and the item is dropped: it is neither retried
 * nor put back on the queue.
 */
export class DispatchPool {
    private loops: Promise<void>[] = []
    private forwarded = 0
    private failed = 0

    constructor(
        private readonly queue: BoundedQueue<PaymentSubmission>,
        private readonly options: DispatchPoolOptions
    ) {}

    start(): void {
        if (this.loops.length > 0) return
        for (let i = 0; i < this.options.workers; i++) {
            this.loops.push(this.run())
        }
        console.log(`[DispatchPool] ${this.options.workers} forwarders started -> ${this.options.workerUrl}`)
    }

    /**
     * Closes the queue and waits for every loop to drain it and exit.
     */
    async stop(): Promise<void> {
        this.queue.close()
        await Promise.all(this.loops)
        this.loops = []
        console.log(`[DispatchPool] stopped (forwarded=${this.forwarded}, dropped=${this.failed})`)
    }

    get stats(): { forwarded: number; dropped: number } {
        return { forwarded: this.forwarded, dropped: this.failed }
    }

    private async run(): Promise<void> {
        for (;;) {
            const item = await this.queue.take()
            if (item === null) return

            if (await this.forward(item)) {
                this.forwarded++
            } else {
                this.failed++
            }
        }
    }

    async forward(payment: PaymentSubmission): Promise<boolean> {
        try {
            const res = await fetch(`${this.options.workerUrl}/process-payment`, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify({ correlationId: payment.correlationId, amount: payment.amount }),
                signal: AbortSignal.timeout(this.options.timeoutMs)
            })
            await res.body?.cancel()

            if (!res.ok) {
                console.error(`[DispatchPool] handoff of ${payment.correlationId} rejected: HTTP ${res.status}`)
                return false
            }
            return true
        } catch (error) {
            console.error(`[DispatchPool] handoff of ${payment.correlationId} failed: ${errorMessage(error)}`)
            return false
        }
    }
}
