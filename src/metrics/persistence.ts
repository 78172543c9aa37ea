import { dirname } from 'node:path'
import { z } from 'zod'
import { errorMessage } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import type { Logger } from '../logger/index.js'
import type { MetricsStore } from './store.js'

const HistogramStatsSchema = z.object({
    count: z.number(),
    sum: z.number(),
    min: z.number(),
    max: z.number(),
    avg: z.number(),
    p50: z.number(),
    p95: z.number(),
    p99: z.number(),
})

export const MetricsFileSchema = z.object({
    counters: z.record(z.number()),
    gauges: z.record(z.number()),
    histograms: z.record(HistogramStatsSchema),
    timestamp: z.number(),
})

export type MetricsFileContent = z.infer<typeof MetricsFileSchema>

/**
 * JSON snapshot of a metrics store. Histograms are written as stats only, so a
 * reload brings back counters and gauges.
 */
export class MetricsFile {
    constructor(
        private readonly fs: FileSystem,
        readonly path: string,
        private readonly logger: Logger
    ) {}

    async save(store: MetricsStore): Promise<boolean> {
        const content: MetricsFileContent = { ...store.getAll(), timestamp: Date.now() }
        try {
            await this.fs.mkdir(dirname(this.path))
            await this.fs.writeText(this.path, JSON.stringify(content, null, 2))
            this.logger.debug({ path: this.path }, 'metrics:saved')
            return true
        } catch (error) {
            this.logger.warn({ path: this.path, error: errorMessage(error) }, 'metrics:save-failed')
            return false
        }
    }

    /** Resolves false when there is no file or it cannot be read; the store is left untouched then. */
    async load(store: MetricsStore): Promise<boolean> {
        if (!(await this.fs.exists(this.path))) return false
        let raw: unknown
        try {
            raw = await this.fs.readJSON(this.path)
        } catch (error) {
            this.logger.warn({ path: this.path, error: errorMessage(error) }, 'metrics:load-failed')
            return false
        }
        const parsed = MetricsFileSchema.safeParse(raw)
        if (!parsed.success) {
            this.logger.warn({ path: this.path, issues: parsed.error.issues.length }, 'metrics:load-invalid')
            return false
        }
        store.restore(parsed.data)
        this.logger.debug({ path: this.path, counters: Object.keys(parsed.data.counters).length }, 'metrics:loaded')
        return true
    }
}
