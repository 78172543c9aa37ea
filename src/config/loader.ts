import path from 'node:path'
import type { ZodIssue } from 'zod'
import { ConfigError, errorMessage } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import { CONFIG_FILE, DEFAULT_CONFIG } from './defaults.js'
import { type Config, ConfigSchema, type ResolvedConfig, ResolvedConfigSchema } from './schema.js'

export interface LoadConfigOptions {
    fs: FileSystem
    overrides?: Config
    projectDir?: string
    env?: NodeJS.ProcessEnv
}

type Layer = Record<string, unknown>

function formatIssues(issues: ZodIssue[], prefix?: string): string[] {
    return issues.map((issue) => {
        const where = issue.path.length > 0 ? issue.path.join('.') : '(root)'
        return prefix ? `${prefix}: ${where}: ${issue.message}` : `${where}: ${issue.message}`
    })
}

function isPlainObject(value: unknown): value is Layer {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Deep merge of plain objects; arrays and scalars from later layers replace earlier ones. */
export function mergeLayers(...layers: Layer[]): Layer {
    const merged: Layer = {}
    for (const layer of layers) {
        for (const [key, value] of Object.entries(layer)) {
            if (value === undefined) continue
            const current = merged[key]
            merged[key] = isPlainObject(current) && isPlainObject(value) ? mergeLayers(current, value) : value
        }
    }
    return merged
}

async function loadFileLayer(fs: FileSystem, filePath: string, required: boolean): Promise<Layer> {
    if (!(await fs.exists(filePath))) {
        if (required) throw new ConfigError([`${filePath}: file not found`])
        return {}
    }
    let raw: unknown
    try {
        raw = await fs.readJSON(filePath)
    } catch (error) {
        throw new ConfigError([`${filePath}: ${errorMessage(error)}`], { cause: error })
    }
    const parsed = ConfigSchema.safeParse(raw)
    if (!parsed.success) throw new ConfigError(formatIssues(parsed.error.issues, filePath))
    return parsed.data
}

function parseNumber(name: string, value: string, issues: string[]): number | undefined {
    const n = Number(value)
    if (value.trim() === '' || !Number.isFinite(n)) {
        issues.push(`${name}: expected a number, got '${value}'`)
        return undefined
    }
    return n
}

function parseBoolean(name: string, value: string, issues: string[]): boolean | undefined {
    const v = value.trim().toLowerCase()
    if (['1', 'true', 'yes', 'on'].includes(v)) return true
    if (['0', 'false', 'no', 'off'].includes(v)) return false
    issues.push(`${name}: expected a boolean, got '${value}'`)
    return undefined
}

/** Reads `AGENTWATCH_*` variables (with OTEL_ fallbacks) into a config layer. */
export function envLayer(env: NodeJS.ProcessEnv): Layer {
    const issues: string[] = []
    const num = (name: string) => {
        const value = env[name]
        return value === undefined ? undefined : parseNumber(name, value, issues)
    }
    const bool = (name: string) => {
        const value = env[name]
        return value === undefined ? undefined : parseBoolean(name, value, issues)
    }

    const layer: Layer = {
        serviceName: env.AGENTWATCH_SERVICE_NAME ?? env.OTEL_SERVICE_NAME,
        logLevel: env.AGENTWATCH_LOG_LEVEL,
        tracing: {
            enabled: bool('AGENTWATCH_TRACING_ENABLED'),
            endpoint: env.AGENTWATCH_OTLP_ENDPOINT ?? env.OTEL_EXPORTER_OTLP_TRACES_ENDPOINT,
            queueCapacity: num('AGENTWATCH_EXPORT_QUEUE_CAPACITY'),
            unhealthyQueueDepth: num('AGENTWATCH_EXPORT_UNHEALTHY_DEPTH'),
            spanFile: env.AGENTWATCH_SPAN_FILE,
        },
        metrics: {
            file: env.AGENTWATCH_METRICS_FILE,
        },
        decisionLog: {
            file: env.AGENTWATCH_DECISION_LOG_FILE,
            batchSize: num('AGENTWATCH_DECISION_BATCH_SIZE'),
            flushIntervalMs: num('AGENTWATCH_DECISION_FLUSH_INTERVAL_MS'),
        },
        retry: {
            maxAttempts: num('AGENTWATCH_RETRY_MAX_ATTEMPTS'),
            initialDelayMs: num('AGENTWATCH_RETRY_INITIAL_DELAY_MS'),
            backoffFactor: num('AGENTWATCH_RETRY_BACKOFF_FACTOR'),
            maxDelayMs: num('AGENTWATCH_RETRY_MAX_DELAY_MS'),
        },
    }
    if (issues.length > 0) throw new ConfigError(issues)
    return layer
}

/**
 * Resolves configuration. Priority: overrides > env vars > config file >
 * defaults. Any invalid value throws `ConfigError`.
 */
export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
    const { fs, overrides = {}, projectDir = process.cwd(), env = process.env } = options

    const explicitFile = env.AGENTWATCH_CONFIG
    const filePath = explicitFile ? path.resolve(projectDir, explicitFile) : path.join(projectDir, CONFIG_FILE)
    const fileConfig = await loadFileLayer(fs, filePath, explicitFile !== undefined)

    const overrideCheck = ConfigSchema.safeParse(overrides)
    if (!overrideCheck.success) throw new ConfigError(formatIssues(overrideCheck.error.issues, 'overrides'))

    const merged = mergeLayers(DEFAULT_CONFIG, fileConfig, envLayer(env), overrideCheck.data)
    const resolved = ResolvedConfigSchema.safeParse(merged)
    if (!resolved.success) throw new ConfigError(formatIssues(resolved.error.issues))
    return resolved.data
}
