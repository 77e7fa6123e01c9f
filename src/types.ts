export type ProcessorName = 'default' | 'fallback';

export interface PaymentSubmission {
    correlationId: string;
    amount: number;
}

export interface PaymentData extends PaymentSubmission {
    requestedAt: string;
}

export interface PersistedPayment {
    correlationId: string;
    amount: number;
    processor: ProcessorName;
    createdAt: string;
}

export interface ComplianceRecord extends PaymentSubmission {
    receivedAt: string;
}

export interface ProcessorConfig {
    url: string;
    name: ProcessorName;
    timeout: number;
}

export interface HealthStatus {
    name: ProcessorName;
    healthy: boolean;
    lastCheckedAt: number | null;
}

export interface ProcessorSummary {
    totalRequests: number;
    totalAmount: number;
}

export type PaymentSummary = Record<ProcessorName, ProcessorSummary>;

export interface SummaryRange {
    from?: Date;
    to?: Date;
}

export type SettlementOutcome =
    | { status: 'settled'; processor: ProcessorName }
    | { status: 'duplicate' }
    | { status: 'dropped'; reason: string };

export interface SettlementDispatcher {
    dispatch(payment: PaymentData): Promise<void>;
}
