/**
 * Backoff for response-provider calls.
 *
 * Transient failures are retried: rate limits, 500/502/503, and network
 * errors that surface only as a message (ECONNRESET, ETIMEDOUT, fetch failed).
 * Anything else is thrown on the first attempt so the provider chain can move
 * on to the next provider.
 */

export interface RetryPolicy {
    /** Retries after the first attempt. */
    maxRetries: number
    baseDelayMs: number
    maxDelayMs: number
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
    maxRetries: 2,
    baseDelayMs: 500,
    maxDelayMs: 5000,
})

const RETRYABLE_STATUS = new Set([429, 500, 502, 503])

const TRANSIENT_MESSAGES = [
    'ECONNRESET',
    'ETIMEDOUT',
    'ENOTFOUND',
    'fetch failed',
    'socket hang up',
    'rate_limit',
    'overloaded',
]

/** HTTP status carried by an SDK or fetch error, if any. */
export function statusOf(err: unknown): number | undefined {
    if (!err || typeof err !== 'object') return undefined
    const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined
    return typeof status === 'number' ? status : undefined
}

export function isTransient(err: unknown): boolean {
    const status = statusOf(err)
    if (status !== undefined) return RETRYABLE_STATUS.has(status)
    if (!(err instanceof Error)) return false
    return TRANSIENT_MESSAGES.some(fragment => err.message.includes(fragment))
}

function backoffMs(attempt: number, policy: RetryPolicy): number {
    return Math.min(policy.baseDelayMs * 2 ** attempt, policy.maxDelayMs)
}

export async function withLlmRetry<T>(
    fn: () => Promise<T>,
    label: string,
    policy: RetryPolicy = DEFAULT_RETRY_POLICY,
): Promise<T> {
    for (let attempt = 0; ; attempt++) {
        try {
            return await fn()
        } catch (err) {
            if (attempt >= policy.maxRetries || !isTransient(err)) throw err

            const waitMs = backoffMs(attempt, policy)
            console.warn(
                `[retry] ${label} attempt ${attempt + 1}/${policy.maxRetries + 1} failed` +
                ` (status: ${statusOf(err) ?? '?'}), retrying in ${waitMs}ms`,
            )
            await new Promise<void>(resolve => setTimeout(resolve, waitMs))
        }
    }
}
