import Redis, { type RedisOptions } from 'ioredis'

export const REDIS_URI = process.env.REDIS_URI
export const REDIS_HOST = process.env.REDIS_HOST ?? 'localhost'
export const REDIS_PORT = process.env.REDIS_PORT ?? '6379'

export function redisOptionsFromUri(uri: string): RedisOptions {
    const parsed = new URL(uri)
    const db = parsed.pathname.replace(/^\//, '')
    return {
        host: parsed.hostname,
        port: parsed.port ? parseInt(parsed.port, 10) : 6379,
        ...(parsed.username ? { username: decodeURIComponent(parsed.username) } : {}),
        ...(parsed.password ? { password: decodeURIComponent(parsed.password) } : {}),
        ...(db ? { db: parseInt(db, 10) } : {}),
        ...(parsed.protocol === 'rediss:' ? { tls: {} } : {})
    }
}

// ioredis and BullMQ connect with the same options
export const redisConnectionConfig: RedisOptions = REDIS_URI
    ? redisOptionsFromUri(REDIS_URI)
    : { host: REDIS_HOST, port: parseInt(REDIS_PORT, 10) }

let redisInstance: Redis | null = null

function createRedisConnection(): Redis {
    return new Redis({
        ...redisConnectionConfig,
        lazyConnect: true,
    })
}

function setupRedisEventListeners(redis: Redis) {
    redis.on('ready', () => console.log('[Redis] ready to use'))
    redis.on('error', (err: Error) => console.error('[Redis] connection or command error:', err.message))
    redis.on('close', () => console.warn('[Redis] connection closed'))
    redis.on('reconnecting', (delay: number) =>
        console.log(`[Redis] reconnecting in ${delay}ms`)
    )
}

/**
 * Connects and pings the shared store. A failure here is fatal for the
 * caller: neither process role may serve without its persistence store.
 */
export async function initializeRedis(): Promise<Redis> {
    if (redisInstance) return redisInstance

    const redis = createRedisConnection()
    setupRedisEventListeners(redis)

    try {
        await redis.connect()

        const pong = await redis.ping()
        if (pong !== 'PONG') {
            throw new Error(`Unexpected ping: ${pong}`)
        }

        console.log('[Redis] ping OK, connection established')
        redisInstance = redis
        return redisInstance
    } catch (err) {
        console.error('[Redis] failed to connect:', err)
        redis.disconnect()
        throw err
    }
}

export async function closeRedis(): Promise<void> {
    if (!redisInstance) return
    console.log('[Redis] closing connection...')
    await redisInstance.quit()
    redisInstance = null
}
