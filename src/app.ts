import { Hono } from 'hono'
import { BoundedQueue } from './core/bounded-queue'
import { ComplianceLog } from './services/compliance-log'
import { PaymentStore } from './services/payment.store'
import { PaymentSubmission, SettlementDispatcher } from './types'
import { createAdminRoute, createPaymentsRoute, createSettlementRoute } from './routes'

export interface GatewayDeps {
    queue: BoundedQueue<PaymentSubmission>
    store: PaymentStore
    complianceLog: ComplianceLog | null
}

export interface WorkerDeps {
    dispatcher: SettlementDispatcher
    store: PaymentStore
}

function withErrorHandling(app: Hono): Hono {
    app.notFound(c => c.json({ error: 'Not Found' }, 404))
    app.onError((err, c) => {
        console.error(`[HTTP] ${c.req.method} ${c.req.path} failed:`, err)
        return c.json({ error: 'Internal Server Error' }, 500)
    })
    return app
}

export function createGatewayApp(deps: GatewayDeps): Hono {
    const app = new Hono()
    app.route('/', createPaymentsRoute(deps.queue, deps.complianceLog))
    app.route('/', createAdminRoute(deps.store, deps.complianceLog))
    return withErrorHandling(app)
}

export function createWorkerApp(deps: WorkerDeps): Hono {
    const app = new Hono()
    app.route('/', createSettlementRoute(deps.dispatcher))
    app.route('/', createAdminRoute(deps.store, null))
    return withErrorHandling(app)
}
