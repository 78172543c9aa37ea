import type { PolicyDecision } from '../policy/types.js'

export type ErrorKind = 'transient' | 'permanent'

export class AgentwatchError extends Error {
    readonly kind: ErrorKind

    constructor(message: string, kind: ErrorKind, options?: ErrorOptions) {
        super(message, options)
        this.name = 'AgentwatchError'
        this.kind = kind
    }
}

export class TransientError extends AgentwatchError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'transient', options)
        this.name = 'TransientError'
    }
}

export class PermanentError extends AgentwatchError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'permanent', options)
        this.name = 'PermanentError'
    }
}

/** Raised by the config loader; the process must not start with a half-built config. */
export class ConfigError extends AgentwatchError {
    readonly issues: string[]

    constructor(issues: string[], options?: ErrorOptions) {
        super(`Invalid configuration: ${issues.join('; ')}`, 'permanent', options)
        this.name = 'ConfigError'
        this.issues = issues
    }
}

export function classifyHttpError(status: number): ErrorKind {
    if ([429, 500, 502, 503, 504].includes(status)) return 'transient'
    return 'permanent'
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error))
}

function hasStatus(error: object): error is { status: number } {
    return 'status' in error && typeof error.status === 'number'
}

export function classifyError(error: unknown): ErrorKind {
    if (error instanceof AgentwatchError) return error.kind
    if (error instanceof TypeError && error.message.includes('fetch')) return 'transient'
    if (typeof error === 'object' && error !== null && hasStatus(error)) {
        return classifyHttpError(error.status)
    }
    return 'permanent'
}

/** Thrown by `PolicyGuard.enforce*` when the evaluator denies an action. */
export class PolicyViolationError extends AgentwatchError {
    readonly decision: PolicyDecision

    constructor(decision: PolicyDecision, options?: ErrorOptions) {
        super(`Policy denied ${decision.decisionType}: ${decision.reason}`, 'permanent', options)
        this.name = 'PolicyViolationError'
        this.decision = decision
    }
}
