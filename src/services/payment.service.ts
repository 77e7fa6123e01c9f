import { PaymentData, ProcessorConfig, ProcessorName, SettlementOutcome } from '../types';
import { PAYMENT_SUCCESS_MESSAGE } from '../config/processors';
import { processorResponseSchema } from '../validation/payment.schema';
import { errorMessage } from '../util';
import { ProcessorHealth } from './processor-health';
import { PaymentStore } from './payment.store';

type AttemptResult = { success: true } | { success: false; error: string };

/**
 * Settles one payment: skip if already recorded, pick a processor by health,
 * fail over once, then record the outcome.
 */
export class PaymentService {
    private readonly processors: Record<ProcessorName, ProcessorConfig>;

    constructor(
        private readonly store: PaymentStore,
        private readonly health: ProcessorHealth,
        processors: ProcessorConfig[]
    ) {
        const byName = new Map(processors.map(p => [p.name, p]));
        const defaultProcessor = byName.get('default');
        const fallbackProcessor = byName.get('fallback');
        if (!defaultProcessor || !fallbackProcessor) {
            throw new Error('Both the default and the fallback processor must be configured');
        }
        this.processors = { default: defaultProcessor, fallback: fallbackProcessor };
    }

    async processPayment(data: PaymentData): Promise<SettlementOutcome> {
        if (await this.store.exists(data.correlationId)) {
            console.log(`[PaymentService] ${data.correlationId} already settled, skipping`);
            return { status: 'duplicate' };
        }

        const candidates = this.selectProcessors();
        if (candidates.length === 0) {
            console.warn(`[PaymentService] No healthy processor for ${data.correlationId}, dropping`);
            return { status: 'dropped', reason: 'No processors available' };
        }

        let lastError = '';
        for (const processor of candidates) {
            const result = await this.callProcessor(processor, data);

            if (result.success) {
                return this.record(processor.name, data);
            }

            lastError = result.error;
            console.warn(`[PaymentService] ${processor.name} failed for ${data.correlationId}: ${result.error}`);
        }

        console.error(`[PaymentService] All processors failed for ${data.correlationId}, dropping`);
        return { status: 'dropped', reason: lastError };
    }

    /**
     * Default first when healthy, fallback second when healthy. Health is
     * read once, so a probe landing mid-settlement does not change the plan.
     */
    selectProcessors(): ProcessorConfig[] {
        const health = this.health.snapshot();
        const order: ProcessorName[] = ['default', 'fallback'];
        return order
            .filter(name => health[name].healthy)
            .map(name => this.processors[name]);
    }

    async callProcessor(processor: ProcessorConfig, data: PaymentData): Promise<AttemptResult> {
        try {
            const res = await fetch(`${processor.url}/payments`, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify({
                    correlationId: data.correlationId,
                    amount: data.amount,
                    requestedAt: data.requestedAt
                }),
                signal: AbortSignal.timeout(processor.timeout)
            });

            if (res.status !== 200) {
                await res.body?.cancel();
                return { success: false, error: `HTTP ${res.status}` };
            }

            const parsed = processorResponseSchema.safeParse(await res.json());
            if (!parsed.success || parsed.data.message !== PAYMENT_SUCCESS_MESSAGE) {
                return { success: false, error: 'Unexpected processor response' };
            }

            return { success: true };
        } catch (error) {
            return { success: false, error: errorMessage(error) };
        }
    }

    private async record(processor: ProcessorName, data: PaymentData): Promise<SettlementOutcome> {
        try {
            const inserted = await this.store.insertIfAbsent({
                correlationId: data.correlationId,
                amount: data.amount,
                processor,
                createdAt: data.requestedAt
            });

            if (!inserted) {
                console.log(`[PaymentService] ${data.correlationId} was recorded concurrently, not counted twice`);
                return { status: 'duplicate' };
            }

            return { status: 'settled', processor };
        } catch (error) {
            console.error(`[PaymentService] Settled ${data.correlationId} via ${processor} but could not persist it:`, errorMessage(error));
            return { status: 'dropped', reason: 'Persistence failure' };
        }
    }
}
