export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Waits for `promise` at most `ms` milliseconds. Resolves `true` when the
 * promise settled in time; a rejection is rethrown.
 */
export async function settleWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined
    const timeout = new Promise<false>((resolve) => {
        timer = setTimeout(() => resolve(false), ms)
        timer.unref()
    })
    try {
        return await Promise.race([promise.then(() => true as const), timeout])
    } finally {
        clearTimeout(timer)
    }
}
