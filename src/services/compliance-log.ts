import type Redis from 'ioredis'
import { ComplianceRecord, PaymentSubmission } from '../types'
import {
    COMPLIANCE_BATCH_SIZE,
    COMPLIANCE_BUFFER_SIZE,
    COMPLIANCE_FLUSH_INTERVAL
} from '../config/app'
import { errorMessage } from '../util'

export const COMPLIANCE_KEY = 'payments:compliance'

export interface ComplianceLogOptions {
    bufferSize?: number
    batchSize?: number
    flushIntervalMs?: number
}

/**
 * Audit trail of raw inbound submissions, kept apart from settlement.
 *
 * `record` only touches memory. Batches are written off the request path,
 * every `flushIntervalMs` or as soon as `batchSize` records are waiting.
 * Write errors are logged and the batch is dropped; nothing here ever
 * reaches the settlement path.
 */
export class ComplianceLog {
    private buffer: ComplianceRecord[] = []
    private timer: NodeJS.Timeout | null = null
    private flushing: Promise<void> = Promise.resolve()
    private dropped = 0
    private readonly bufferSize: number
    private readonly batchSize: number
    private readonly flushIntervalMs: number

    constructor(private readonly redis: Redis, options: ComplianceLogOptions = {}) {
        this.bufferSize = options.bufferSize ?? COMPLIANCE_BUFFER_SIZE
        this.batchSize = options.batchSize ?? COMPLIANCE_BATCH_SIZE
        this.flushIntervalMs = options.flushIntervalMs ?? COMPLIANCE_FLUSH_INTERVAL
    }

    start(): void {
        if (this.timer) return
        this.timer = setInterval(() => void this.flush(), this.flushIntervalMs)
    }

    /**
     * @returns false when the buffer is full and the record was dropped
     */
    record(submission: PaymentSubmission): boolean {
        if (this.buffer.length >= this.bufferSize) {
            this.dropped++
            return false
        }

        this.buffer.push({
            correlationId: submission.correlationId,
            amount: submission.amount,
            receivedAt: new Date().toISOString()
        })

        if (this.buffer.length >= this.batchSize) {
            void this.flush()
        }
        return true
    }

    get pending(): number {
        return this.buffer.length
    }

    get droppedCount(): number {
        return this.dropped
    }

    /**
     * Writes everything buffered so far. Flushes are chained so batches
     * reach Redis in the order they were taken.
     */
    flush(): Promise<void> {
        this.flushing = this.flushing.then(async () => {
            while (this.buffer.length > 0) {
                const batch = this.buffer.splice(0, this.batchSize)
                await this.writeBatch(batch)
            }
        })
        return this.flushing
    }

    async purge(): Promise<void> {
        this.buffer = []
        await this.flushing
        await this.redis.del(COMPLIANCE_KEY)
    }

    async close(): Promise<void> {
        if (this.timer) {
            clearInterval(this.timer)
            this.timer = null
        }
        await this.flush()
    }

    private async writeBatch(batch: ComplianceRecord[]): Promise<void> {
        try {
            const pipeline = this.redis.pipeline()
            for (const record of batch) {
                pipeline.hsetnx(COMPLIANCE_KEY, record.correlationId, JSON.stringify(record))
            }

            const results = await pipeline.exec()
            const failed = results?.filter(([err]) => err !== null).length ?? 0
            if (failed > 0) {
                console.error(`[ComplianceLog] ${failed}/${batch.length} inserts failed in batch`)
            }
        } catch (error) {
            console.error(`[ComplianceLog] batch of ${batch.length} not written:`, errorMessage(error))
        }
    }
}
