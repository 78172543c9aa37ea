import { z } from 'zod'

const positiveInt = z.number().int().positive()

export const ModelPricingSchema = z.object({
    input: z.number().nonnegative(),
    output: z.number().nonnegative(),
})

export const ResolvedConfigSchema = z
    .object({
        serviceName: z.string().min(1),
        serviceVersion: z.string().min(1),
        logLevel: z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace']),
        logPretty: z.boolean(),
        defaultModel: z.string().min(1),
        tracing: z
            .object({
                enabled: z.boolean(),
                endpoint: z.string().url(),
                processor: z.enum(['batch', 'simple']),
                queueCapacity: positiveInt,
                /** Defaults to half of `queueCapacity` when unset. */
                unhealthyQueueDepth: positiveInt.optional(),
                healthCheckIntervalMs: positiveInt,
                pollIntervalMs: positiveInt,
                shutdownGraceMs: z.number().int().nonnegative(),
                maxSpans: positiveInt,
                /** JSONL file finished spans are appended to and reloaded from. */
                spanFile: z.string().min(1).nullable(),
            })
            .strict(),
        decisionLog: z
            .object({
                file: z.string().min(1).nullable(),
                logRecords: z.boolean(),
                batchSize: positiveInt,
                flushIntervalMs: positiveInt,
            })
            .strict(),
        retry: z
            .object({
                maxAttempts: positiveInt,
                initialDelayMs: z.number().nonnegative(),
                backoffFactor: z.number().min(1),
                maxDelayMs: z.number().nonnegative(),
                jitter: z.boolean(),
            })
            .strict(),
        metrics: z
            .object({
                maxSamples: positiveInt,
                /** Snapshot file restored on start and written on shutdown. */
                file: z.string().min(1).nullable(),
            })
            .strict(),
        errors: z.object({ maxErrors: positiveInt }).strict(),
        pricing: z.record(ModelPricingSchema),
        policy: z
            .object({
                version: z.string().min(1),
                deniedKeywords: z.array(z.string().min(1)),
                deniedTools: z.array(z.string().min(1)),
                approvalRequiredTools: z.array(z.string().min(1)),
            })
            .strict(),
    })
    .strict()
    .superRefine((cfg, ctx) => {
        const depth = cfg.tracing.unhealthyQueueDepth
        if (depth !== undefined && depth > cfg.tracing.queueCapacity) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['tracing', 'unhealthyQueueDepth'],
                message: 'must not exceed tracing.queueCapacity',
            })
        }
    })

/** Shape accepted from config files and overrides; every field optional. */
export const ConfigSchema = ResolvedConfigSchema.innerType().deepPartial()

export type ResolvedConfig = z.infer<typeof ResolvedConfigSchema>
export type Config = z.infer<typeof ConfigSchema>
