import { errorMessage } from './util'

/**
 * Runs `cleanup` once on SIGINT/SIGTERM, then exits.
 */
export function onShutdown(tag: string, cleanup: () => Promise<void>): void {
    let shuttingDown = false

    const handler = (signal: NodeJS.Signals) => {
        if (shuttingDown) return
        shuttingDown = true
        console.log(`[${tag}] ${signal} received, shutting down gracefully...`)

        cleanup()
            .then(() => process.exit(0))
            .catch(err => {
                console.error(`[${tag}] shutdown failed:`, errorMessage(err))
                process.exit(1)
            })
    }

    process.on('SIGINT', handler)
    process.on('SIGTERM', handler)
}
