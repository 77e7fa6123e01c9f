import { ProcessorConfig, ProcessorName, HealthStatus } from '../types';
import { HEALTH_CHECK_INTERVAL, HEALTH_CHECK_TIMEOUT } from '../config/processors';
import { healthResponseSchema } from '../validation/payment.schema';
import { errorMessage } from '../util';

/**
 * Last-known health per processor. Only the tracker writes; the router reads
 * snapshots. Each flag is replaced as a whole, so a reader never observes a
 * half-written status.
 */
export class ProcessorHealth {
    private statuses: Record<ProcessorName, HealthStatus> = {
        default: { name: 'default', healthy: true, lastCheckedAt: null },
        fallback: { name: 'fallback', healthy: true, lastCheckedAt: null }
    };

    isHealthy(name: ProcessorName): boolean {
        return this.statuses[name].healthy;
    }

    snapshot(): Record<ProcessorName, HealthStatus> {
        return { default: this.statuses.default, fallback: this.statuses.fallback };
    }

    mark(name: ProcessorName, healthy: boolean, checkedAt: number = Date.now()): void {
        this.statuses[name] = Object.freeze({ name, healthy, lastCheckedAt: checkedAt });
    }
}

export interface HealthTrackerOptions {
    intervalMs?: number;
    timeoutMs?: number;
}

export class ProcessorHealthTracker {
    private timer: NodeJS.Timeout | null = null;
    private inFlight: Promise<void> | null = null;
    private readonly intervalMs: number;
    private readonly timeoutMs: number;

    constructor(
        private readonly health: ProcessorHealth,
        private readonly processors: ProcessorConfig[],
        options: HealthTrackerOptions = {}
    ) {
        this.intervalMs = options.intervalMs ?? HEALTH_CHECK_INTERVAL;
        this.timeoutMs = options.timeoutMs ?? HEALTH_CHECK_TIMEOUT;
    }

    start(): void {
        if (this.timer) return;
        void this.tick();
        this.timer = setInterval(() => void this.tick(), this.intervalMs);
        console.log(`[HealthTracker] probing ${this.processors.length} processors every ${this.intervalMs}ms`);
    }

    async stop(): Promise<void> {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
        await this.inFlight;
    }

    /**
     * Runs one probe round unless the previous one is still going.
     */
    tick(): Promise<void> {
        if (this.inFlight) return this.inFlight;

        this.inFlight = this.probeAll().finally(() => {
            this.inFlight = null;
        });
        return this.inFlight;
    }

    private async probeAll(): Promise<void> {
        await Promise.all(this.processors.map(async processor => {
            const healthy = await this.checkHealth(processor);
            const previous = this.health.isHealthy(processor.name);
            this.health.mark(processor.name, healthy);

            if (previous !== healthy) {
                console.log(`[HealthTracker] ${processor.name} is now ${healthy ? 'healthy' : 'unhealthy'}`);
            }
        }));
    }

    async checkHealth(processor: ProcessorConfig): Promise<boolean> {
        try {
            const res = await fetch(`${processor.url}/payments/service-health`, {
                signal: AbortSignal.timeout(this.timeoutMs),
                headers: { 'Content-Type': 'application/json' }
            });

            if (!res.ok) {
                await res.body?.cancel();
                console.warn(`[HealthTracker] ${processor.name} answered HTTP ${res.status}`);
                return false;
            }

            const parsed = healthResponseSchema.safeParse(await res.json());
            if (!parsed.success) {
                console.warn(`[HealthTracker] ${processor.name} returned an unexpected health body`);
                return false;
            }

            return !parsed.data.failing;
        } catch (error) {
            console.warn(`[HealthTracker] probe to ${processor.name} failed: ${errorMessage(error)}`);
            return false;
        }
    }
}
