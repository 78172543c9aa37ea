import { DEFAULT_PRICING } from '../metrics/cost.js'
import type { ResolvedConfig } from './schema.js'

export const CONFIG_FILE = 'agentwatch.config.json'

export const DEFAULT_OTLP_ENDPOINT = 'http://localhost:4318/v1/traces'

export const DEFAULT_CONFIG: ResolvedConfig = {
    serviceName: 'agentwatch',
    serviceVersion: '0.1.0',
    logLevel: 'info',
    logPretty: false,
    defaultModel: 'default',
    tracing: {
        enabled: true,
        endpoint: DEFAULT_OTLP_ENDPOINT,
        processor: 'batch',
        queueCapacity: 1000,
        healthCheckIntervalMs: 30_000,
        pollIntervalMs: 1000,
        shutdownGraceMs: 5000,
        maxSpans: 1000,
        spanFile: null,
    },
    decisionLog: {
        file: 'logs/policy_decisions.jsonl',
        logRecords: true,
        batchSize: 100,
        flushIntervalMs: 5000,
    },
    retry: {
        maxAttempts: 3,
        initialDelayMs: 1000,
        backoffFactor: 2,
        maxDelayMs: 10_000,
        jitter: true,
    },
    metrics: { maxSamples: 1000, file: null },
    errors: { maxErrors: 1000 },
    pricing: DEFAULT_PRICING,
    policy: {
        version: '1.0.0',
        deniedKeywords: [],
        deniedTools: [],
        approvalRequiredTools: [],
    },
}
