export type Result<T, E = string> = { ok: true; value: T } | { ok: false; error: E }

export function ok<T>(value: T): { ok: true; value: T } {
    return { ok: true, value }
}

export function err<E>(error: E): { ok: false; error: E } {
    return { ok: false, error }
}

export type FailureKind = 'retryable' | 'fatal'

/** Outcome of a fallible step that callers branch on instead of catching. */
export interface Failure {
    kind: FailureKind
    message: string
    cause?: unknown
}

export function failure(kind: FailureKind, message: string, cause?: unknown): Failure {
    return cause === undefined ? { kind, message } : { kind, message, cause }
}
