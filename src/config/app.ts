import { boolFromEnv, intFromEnv } from './env'

export type AppMode = 'gateway' | 'worker'

export const MODE: AppMode = process.env.MODE === 'worker' ? 'worker' : 'gateway'
export const PORT = intFromEnv('PORT', MODE === 'worker' ? 8081 : 8080)

const WORKER_HOST = process.env.WORKER_HOST ?? 'worker'
const WORKER_PORT = process.env.WORKER_PORT ?? '8081'
export const WORKER_URL = process.env.WORKER_URL ?? `http://${WORKER_HOST}:${WORKER_PORT}`

// gateway
export const QUEUE_SIZE = intFromEnv('QUEUE_SIZE', 10000)
export const NUM_WORKERS = intFromEnv('NUM_WORKERS', 100)
export const FORWARD_TIMEOUT = intFromEnv('FORWARD_TIMEOUT_MS', 1000)

export const COMPLIANCE_LOG_ENABLED = boolFromEnv('COMPLIANCE_LOG_ENABLED', true)
export const COMPLIANCE_BUFFER_SIZE = 4096
export const COMPLIANCE_BATCH_SIZE = 256
export const COMPLIANCE_FLUSH_INTERVAL = 200

// worker
export const SETTLEMENT_CONCURRENCY = intFromEnv('SETTLEMENT_CONCURRENCY', 50)
