import { MODE, PORT } from './config/app'
import { startGateway } from './gateway'
import { startWorker } from './worker'

try {
    if (MODE === 'worker') {
        await startWorker(PORT)
    } else {
        await startGateway(PORT)
    }
} catch (err) {
    console.error(`[Startup] ${MODE} failed to start:`, err)
    process.exit(1)
}
