import { classifyError, isAbortError, TransientError } from '../core/errors.js'

export interface RetryPolicy {
    maxRetries: number
    baseDelayMs: number
    maxDelayMs: number
}

export interface RetryHooks {
    /** Aborted when the caller's deadline passes; no further attempt or wait is started. */
    signal?: AbortSignal
    onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void
    random?: () => number
}

/** Exponential backoff for retry `attempt` (0-based) with up to 10% jitter. */
export function backoffDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
    const delay = Math.min(policy.baseDelayMs * 2 ** attempt, policy.maxDelayMs)
    return Math.round(delay + delay * 0.1 * random())
}

function waitFor(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(signal.reason)
            return
        }
        const onAbort = () => {
            clearTimeout(timer)
            reject(signal?.reason)
        }
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort)
            resolve()
        }, ms)
        signal?.addEventListener('abort', onAbort, { once: true })
    })
}

/**
 * Retries transient failures of an oracle call. Once the signal fires, the
 * abort reason (a TimeoutError at the oracle deadline) is thrown in place of
 * the last attempt's error.
 */
export async function withRetry<T>(fn: () => Promise<T>, policy: RetryPolicy, hooks: RetryHooks = {}): Promise<T> {
    const { signal } = hooks
    for (let attempt = 0; ; attempt++) {
        try {
            return await fn()
        } catch (error) {
            if (signal?.aborted) throw signal.reason ?? error
            if (isAbortError(error) || classifyError(error) === 'permanent' || attempt >= policy.maxRetries) {
                throw error
            }
            const delayMs = backoffDelay(policy, attempt, hooks.random)
            hooks.onRetry?.({ attempt: attempt + 1, delayMs, error })
            await waitFor(delayMs, signal)
        }
    }
}

type CircuitState = 'closed' | 'open' | 'half_open'

export interface CircuitBreakerOptions {
    threshold: number
    cooldownMs: number
    now?: () => number
}

/**
 * Stops calling an endpoint after `threshold` consecutive failed calls until
 * `cooldownMs` has passed. Cancelled calls are not counted as failures.
 */
export class CircuitBreaker {
    private state: CircuitState = 'closed'
    private failures = 0
    private openedAt = 0
    private now: () => number

    constructor(private options: CircuitBreakerOptions) {
        this.now = options.now ?? Date.now
    }

    async execute<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
        if (this.state === 'open') {
            const remaining = this.options.cooldownMs - (this.now() - this.openedAt)
            if (remaining > 0) {
                throw new TransientError(
                    `LLM endpoint failed ${this.failures} time(s) in a row; next attempt in ${Math.ceil(remaining / 1000)}s`
                )
            }
            this.state = 'half_open'
        }

        try {
            const result = await fn()
            this.failures = 0
            this.state = 'closed'
            return result
        } catch (error) {
            if (!signal?.aborted && !isAbortError(error)) this.onFailure()
            throw error
        }
    }

    private onFailure(): void {
        this.failures++
        if (this.state === 'half_open' || this.failures >= this.options.threshold) {
            this.state = 'open'
            this.openedAt = this.now()
        }
    }

    getState(): CircuitState {
        return this.state
    }
}
