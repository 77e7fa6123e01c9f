import { Hono } from 'hono'
import type { Context } from 'hono'
import { BoundedQueue } from './core/bounded-queue'
import { ComplianceLog } from './services/compliance-log'
import { PaymentStore } from './services/payment.store'
import { PaymentSubmission, SettlementDispatcher } from './types'
import {
    forwardedPaymentSchema,
    paymentSubmissionSchema,
    summaryQuerySchema
} from './validation/payment.schema'

async function readJson(c: Context): Promise<unknown> {
    try {
        return await c.req.json()
    } catch {
        return undefined
    }
}

/**
 * Ingress: validate, then offer to the queue without waiting. Nothing on
 * this path touches the network or the store.
 */
export function createPaymentsRoute(
    queue: BoundedQueue<PaymentSubmission>,
    complianceLog: ComplianceLog | null
): Hono {
    const route = new Hono()

    route.post('/payments', async c => {
        const parsed = paymentSubmissionSchema.safeParse(await readJson(c))
        if (!parsed.success) {
            return c.json({ error: 'Invalid request body' }, 400)
        }

        const payment: PaymentSubmission = {
            correlationId: parsed.data.correlationId,
            amount: parsed.data.amount
        }
        if (!queue.offer(payment)) {
            return c.json({ error: 'Service Unavailable: queue full' }, 503)
        }

        complianceLog?.record(payment)
        return c.json({ status: 'accepted' }, 200)
    })

    return route
}

/**
 * Worker-side entry of the forwarding hop. Answers once the payment is handed
 * to the settlement queue; "accepted" says nothing about settlement.
 */
export function createSettlementRoute(dispatcher: SettlementDispatcher): Hono {
    const route = new Hono()

    route.post('/process-payment', async c => {
        const parsed = forwardedPaymentSchema.safeParse(await readJson(c))
        if (!parsed.success) {
            return c.json({ error: 'Invalid request body' }, 400)
        }

        await dispatcher.dispatch({
            correlationId: parsed.data.correlationId,
            amount: parsed.data.amount,
            requestedAt: parsed.data.requestedAt ?? new Date().toISOString()
        })
        return c.json({ status: 'accepted' }, 200)
    })

    return route
}

export function createAdminRoute(store: PaymentStore, complianceLog: ComplianceLog | null): Hono {
    const route = new Hono()

    route.get('/payments-summary', async c => {
        const query = summaryQuerySchema.safeParse(c.req.query())
        if (!query.success) {
            return c.json({ error: 'Invalid from/to parameters' }, 400)
        }

        const summary = await store.getSummary(query.data)
        return c.json(summary)
    })

    route.post('/purge-payments', async c => {
        await store.purge()
        await complianceLog?.purge()
        console.log('[Admin] all payments purged')
        return c.json({ message: 'All payments purged.' })
    })

    route.get('/healthz', c => c.body(null, 200))

    return route
}
