export function intFromEnv(name: string, fallback: number): number {
    const raw = process.env[name]
    if (raw === undefined || raw === '') return fallback

    const value = parseInt(raw, 10)
    if (Number.isNaN(value) || value <= 0) {
        throw new Error(`${name} must be a positive integer, got "${raw}"`)
    }
    return value
}

export function boolFromEnv(name: string, fallback: boolean): boolean {
    const raw = process.env[name]
    if (raw === undefined || raw === '') return fallback
    return raw === 'true' || raw === '1'
}
