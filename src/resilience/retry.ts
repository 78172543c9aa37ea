import { classifyError, errorMessage } from '../core/errors.js'
import { sleep } from '../core/async.js'
import { err, failure, type Failure, type Result } from '../core/result.js'
import { MetricNames } from '../metrics/names.js'
import type { MetricsSink } from '../metrics/types.js'

type ErrorClass = abstract new (...args: never[]) => Error

export type RetryEvent =
    | { type: 'retry'; attempt: number; delayMs: number; error: unknown }
    | { type: 'success'; attempts: number }
    | { type: 'exhausted'; attempts: number; error: unknown }

export interface RetryOptions {
    maxAttempts: number
    initialDelayMs: number
    backoffFactor: number
    maxDelayMs: number
    /** Adds 0-25% random extra delay before the cap is applied. */
    jitter: boolean
    /** Error classes or predicate deciding what is retried. Every error is retried when unset. */
    retryOn?: ErrorClass[] | ((error: unknown) => boolean)
    onEvent?: (event: RetryEvent) => void
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
    maxAttempts: 3,
    initialDelayMs: 1000,
    backoffFactor: 2,
    maxDelayMs: 10000,
    jitter: true,
}

/** Opt-in `retryOn` predicate that retries only errors classified as transient. */
export function isTransient(error: unknown): boolean {
    return classifyError(error) === 'transient'
}

function shouldRetry(error: unknown, retryOn: RetryOptions['retryOn']): boolean {
    if (retryOn === undefined) return true
    if (typeof retryOn === 'function') return retryOn(error)
    return retryOn.some((cls) => error instanceof cls)
}

export function backoffDelay(base: number, opts: Pick<RetryOptions, 'jitter' | 'maxDelayMs'>): number {
    const extra = opts.jitter ? base * 0.25 * Math.random() : 0
    return Math.min(base + extra, opts.maxDelayMs)
}

/**
 * Runs `fn` up to `maxAttempts` times with exponential backoff. Errors not
 * matched by `retryOn` propagate on first occurrence; after the last attempt
 * the last error is rethrown.
 */
export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions = DEFAULT_RETRY_OPTIONS): Promise<T> {
    const maxAttempts = Math.max(1, opts.maxAttempts)
    let delay = opts.initialDelayMs

    for (let attempt = 1; ; attempt++) {
        try {
            const value = await fn()
            if (attempt > 1) opts.onEvent?.({ type: 'success', attempts: attempt })
            return value
        } catch (error) {
            if (!shouldRetry(error, opts.retryOn)) throw error
            if (attempt >= maxAttempts) {
                opts.onEvent?.({ type: 'exhausted', attempts: attempt, error })
                throw error
            }
            const delayMs = backoffDelay(delay, opts)
            opts.onEvent?.({ type: 'retry', attempt, delayMs, error })
            await sleep(delayMs)
            delay *= opts.backoffFactor
        }
    }
}

/**
 * Result-returning variant: retries while `fn` yields a `retryable` failure,
 * returns immediately on success or a `fatal` failure. A thrown error is
 * treated as a fatal failure.
 */
export async function retryResult<T>(
    fn: () => Promise<Result<T, Failure>>,
    opts: RetryOptions = DEFAULT_RETRY_OPTIONS
): Promise<Result<T, Failure>> {
    const maxAttempts = Math.max(1, opts.maxAttempts)
    let delay = opts.initialDelayMs

    for (let attempt = 1; ; attempt++) {
        let result: Result<T, Failure>
        try {
            result = await fn()
        } catch (error) {
            return err(failure('fatal', errorMessage(error), error))
        }
        if (result.ok) {
            if (attempt > 1) opts.onEvent?.({ type: 'success', attempts: attempt })
            return result
        }
        if (result.error.kind === 'fatal') return result
        if (attempt >= maxAttempts) {
            opts.onEvent?.({ type: 'exhausted', attempts: attempt, error: result.error })
            return result
        }
        const delayMs = backoffDelay(delay, opts)
        opts.onEvent?.({ type: 'retry', attempt, delayMs, error: result.error })
        await sleep(delayMs)
        delay *= opts.backoffFactor
    }
}

/** Retry listener that reports attempts and exhaustion as counters. */
export function metricsRetryListener(metrics: MetricsSink): (event: RetryEvent) => void {
    return (event) => {
        switch (event.type) {
            case 'retry':
                metrics.incrementCounter(MetricNames.retryAttempts)
                break
            case 'success':
                metrics.incrementCounter(MetricNames.retrySuccessAfterAttempts)
                break
            case 'exhausted':
                metrics.incrementCounter(MetricNames.retryExhausted)
                break
        }
    }
}
