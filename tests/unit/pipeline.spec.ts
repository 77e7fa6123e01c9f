import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import type { Hono } from 'hono'
import { createGatewayApp, createWorkerApp } from '../../src/app'
import { BoundedQueue } from '../../src/core/bounded-queue'
import { settlePayment } from '../../src/processors/settlement.processor'
import { DispatchPool } from '../../src/services/dispatch-pool'
import { PaymentService } from '../../src/services/payment.service'
import { PaymentStore } from '../../src/services/payment.store'
import { ProcessorHealth, ProcessorHealthTracker } from '../../src/services/processor-health'
import type { PaymentSubmission, SettlementOutcome } from '../../src/types'
import { createTestRedis } from '../helpers/redis'
import { DEFAULT_URL, FALLBACK_URL, TEST_PROCESSORS } from '../helpers/processors'
import { jsonResponse, processed, stubFetch } from '../helpers/fetch-stub'

const WORKER_URL = 'http://worker.test'

describe('gateway to settlement', () => {
    let gateway: Hono
    let pool: DispatchPool
    let tracker: ProcessorHealthTracker
    let settlements: Promise<SettlementOutcome>[]
    let defaultFailing: boolean
    let processorCalls: string[]

    beforeEach(async () => {
        vi.spyOn(console, 'log').mockImplementation(() => {})
        vi.spyOn(console, 'warn').mockImplementation(() => {})

        const store = new PaymentStore(await createTestRedis())
        const health = new ProcessorHealth()
        const service = new PaymentService(store, health, TEST_PROCESSORS)
        tracker = new ProcessorHealthTracker(health, TEST_PROCESSORS, { intervalMs: 60_000, timeoutMs: 100 })
        settlements = []
        defaultFailing = false
        processorCalls = []

        const worker = createWorkerApp({
            dispatcher: {
                dispatch: async payment => {
                    settlements.push(settlePayment(service, payment))
                },
            },
            store,
        })

        stubFetch((url, init) => {
            if (url.startsWith(WORKER_URL)) return worker.request(url, init)
            if (url.endsWith('/payments/service-health')) {
                return jsonResponse({ failing: url.startsWith(DEFAULT_URL) && defaultFailing, minResponseTime: 0 })
            }
            if (url === `${DEFAULT_URL}/payments` || url === `${FALLBACK_URL}/payments`) {
                processorCalls.push(url)
                return processed()
            }
            throw new Error(`unexpected call to ${url}`)
        })

        const queue = new BoundedQueue<PaymentSubmission>(100)
        pool = new DispatchPool(queue, { workers: 4, workerUrl: WORKER_URL, timeoutMs: 1000 })
        gateway = createGatewayApp({ queue, store, complianceLog: null })
        pool.start()
    })

    afterEach(async () => {
        await pool.stop()
        await tracker.stop()
    })

    async function submit(body: { correlationId: string; amount: number }): Promise<number> {
        const res = await gateway.request('/payments', {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify(body),
        })
        return res.status
    }

    async function settled(count: number): Promise<SettlementOutcome[]> {
        await vi.waitFor(() => expect(settlements).toHaveLength(count))
        return Promise.all(settlements)
    }

    async function summary(): Promise<unknown> {
        const res = await gateway.request('/payments-summary')
        return res.json()
    }

    it('settles an accepted payment through default', async () => {
        expect(await submit({ correlationId: 't1', amount: 100.5 })).toBe(200)

        expect(await settled(1)).toEqual([{ status: 'settled', processor: 'default' }])
        expect(await summary()).toEqual({
            default: { totalRequests: 1, totalAmount: 100.5 },
            fallback: { totalRequests: 0, totalAmount: 0 },
        })
    })

    it('records a payment submitted twice only once', async () => {
        expect(await submit({ correlationId: 't1', amount: 100.5 })).toBe(200)
        await settled(1)
        expect(await submit({ correlationId: 't1', amount: 100.5 })).toBe(200)

        expect((await settled(2))[1]).toEqual({ status: 'duplicate' })
        expect(processorCalls).toHaveLength(1)
        expect(await summary()).toEqual({
            default: { totalRequests: 1, totalAmount: 100.5 },
            fallback: { totalRequests: 0, totalAmount: 0 },
        })
    })

    it('routes to fallback after a probe reports default failing', async () => {
        defaultFailing = true
        await tracker.tick()

        expect(await submit({ correlationId: 't2', amount: 50 })).toBe(200)

        expect(await settled(1)).toEqual([{ status: 'settled', processor: 'fallback' }])
        expect(processorCalls).toEqual([`${FALLBACK_URL}/payments`])
        expect(await summary()).toEqual({
            default: { totalRequests: 0, totalAmount: 0 },
            fallback: { totalRequests: 1, totalAmount: 50 },
        })
    })

    it('starts from zero after a purge', async () => {
        await submit({ correlationId: 'p1', amount: 10 })
        await submit({ correlationId: 'p2', amount: 20 })
        await settled(2)

        const purge = await gateway.request('/purge-payments', { method: 'POST' })
        expect(purge.status).toBe(200)

        expect(await summary()).toEqual({
            default: { totalRequests: 0, totalAmount: 0 },
            fallback: { totalRequests: 0, totalAmount: 0 },
        })
    })
})
