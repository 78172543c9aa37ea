import { dirname } from 'node:path'
import type { FileSystem } from '../core/fs.js'
import type { Logger } from '../logger/index.js'
import { decisionRecord, type PolicyDecision } from './types.js'

/** Durable destination for flushed decisions. A rejected write keeps the batch queued. */
export interface DecisionSink {
    readonly name: string
    write(decisions: readonly PolicyDecision[]): Promise<void>
}

/** Stringifies anything JSON cannot carry instead of failing the line. */
export function decisionReplacer(_key: string, value: unknown): unknown {
    if (typeof value === 'bigint' || typeof value === 'symbol' || typeof value === 'function') {
        return value.toString()
    }
    if (value instanceof Error) return `${value.name}: ${value.message}`
    if (value instanceof Map) return Object.fromEntries(value)
    if (value instanceof Set) return [...value]
    return value
}

export function toNdjson(decisions: readonly PolicyDecision[]): string {
    return decisions.map((d) => `${JSON.stringify(decisionRecord(d), decisionReplacer)}\n`).join('')
}

/** Append-only newline-delimited JSON file, one decision per line. */
export class FileDecisionSink implements DecisionSink {
    readonly name = 'file'
    private dirReady = false

    constructor(
        private readonly fs: FileSystem,
        private readonly path: string
    ) {}

    async write(decisions: readonly PolicyDecision[]): Promise<void> {
        if (decisions.length === 0) return
        if (!this.dirReady) {
            await this.fs.mkdir(dirname(this.path))
            this.dirReady = true
        }
        await this.fs.appendText(this.path, toNdjson(decisions))
    }
}

/** Emits each decision as a structured log record for log-based pipelines. */
export class LogDecisionSink implements DecisionSink {
    readonly name = 'log'

    constructor(private readonly logger: Logger) {}

    async write(decisions: readonly PolicyDecision[]): Promise<void> {
        for (const decision of decisions) {
            this.logger.info({ decision: decisionRecord(decision) }, 'decision:record')
        }
    }
}

/** Writes to every sink in order; the first failure fails the whole write. */
export class CompositeDecisionSink implements DecisionSink {
    readonly name: string

    constructor(private readonly sinks: readonly DecisionSink[]) {
        this.name = sinks.map((s) => s.name).join('+')
    }

    async write(decisions: readonly PolicyDecision[]): Promise<void> {
        for (const sink of this.sinks) {
            await sink.write(decisions)
        }
    }
}
