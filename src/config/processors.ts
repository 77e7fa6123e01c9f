import { ProcessorConfig } from "../types";
import { intFromEnv } from "./env";

export const PAYMENT_TIMEOUT = intFromEnv('PAYMENT_TIMEOUT_MS', 3000);

export const PROCESSORS: ProcessorConfig[] = [
    {
        url: process.env.PAYMENT_PROCESSOR_DEFAULT_URL ?? 'http://payment-processor-default:8080',
        name: 'default',
        timeout: PAYMENT_TIMEOUT
    },
    {
        url: process.env.PAYMENT_PROCESSOR_FALLBACK_URL ?? 'http://payment-processor-fallback:8080',
        name: 'fallback',
        timeout: PAYMENT_TIMEOUT
    }
];

export const HEALTH_CHECK_INTERVAL = intFromEnv('HEALTH_CHECK_INTERVAL_MS', 5000);
export const HEALTH_CHECK_TIMEOUT = intFromEnv('HEALTH_CHECK_TIMEOUT_MS', 3000);
export const PAYMENT_SUCCESS_MESSAGE = 'payment processed successfully';
