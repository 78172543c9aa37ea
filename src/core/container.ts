import path from 'node:path'
import type { SpanExporter } from '@opentelemetry/sdk-trace-base'
import type { ResolvedConfig } from '../config/schema.js'
import { HealthChecker, healthPayload, recordHealthMetrics, type HealthPayload } from '../health/checker.js'
import { decisionLogCheck, metricsStoreCheck, traceExporterCheck } from '../health/checks.js'
import { ErrorTracker, type ErrorSummary } from '../errors/tracker.js'
import { createLogger, type Logger } from '../logger/index.js'
import { computeGoldenSignals, type GoldenSignals } from '../metrics/golden-signals.js'
import { MetricsFile } from '../metrics/persistence.js'
import { renderPrometheus } from '../metrics/prometheus.js'
import { MetricsRecorder } from '../metrics/recorder.js'
import { MetricsStore } from '../metrics/store.js'
import { DecisionLogger } from '../policy/decision-logger.js'
import { RulePolicyEvaluator, type PolicyEvaluator } from '../policy/evaluator.js'
import { PolicyGuard } from '../policy/guard.js'
import { CompositeDecisionSink, FileDecisionSink, LogDecisionSink, type DecisionSink } from '../policy/sinks.js'
import { metricsRetryListener, type RetryOptions } from '../resilience/retry.js'
import { TraceExporter } from '../tracing/exporter.js'
import { workflowSpanName } from '../tracing/names.js'
import { SpanFile } from '../tracing/span-file.js'
import { Tracer } from '../tracing/tracer.js'
import { AgentRunner } from '../workflow/agent-runner.js'
import type { AgentHandler } from '../workflow/types.js'
import { Workflow } from '../workflow/workflow.js'
import { errorMessage, toError } from './errors.js'
import { TypedEventEmitter } from './events.js'
import { NodeFileSystem, type FileSystem } from './fs.js'

export interface ContainerOverrides {
    logger?: Logger
    fs?: FileSystem
    /** Backend exporter replacing OTLP over HTTP. */
    spanExporter?: SpanExporter
    spanProcessor?: 'batch' | 'simple'
    decisionSink?: DecisionSink
    evaluator?: PolicyEvaluator
}

export interface Container {
    config: ResolvedConfig
    logger: Logger
    eventBus: TypedEventEmitter
    fs: FileSystem
    metrics: MetricsStore
    metricsRecorder: MetricsRecorder
    metricsFile: MetricsFile | null
    errorTracker: ErrorTracker
    tracer: Tracer
    spanFile: SpanFile | null
    traceExporter: TraceExporter
    decisionLogger: DecisionLogger
    policyGuard: PolicyGuard
    healthChecker: HealthChecker
    agentRunner: AgentRunner
    createWorkflow(steps: readonly AgentHandler[]): Workflow
    metricsText(): string
    goldenSignals(): GoldenSignals
    errorSummary(): ErrorSummary
    health(): Promise<HealthPayload>
    initialize(): Promise<void>
    shutdown(): Promise<void>
}

function buildDecisionSink(config: ResolvedConfig, fs: FileSystem, logger: Logger): DecisionSink {
    const sinks: DecisionSink[] = []
    if (config.decisionLog.file) sinks.push(new FileDecisionSink(fs, path.resolve(config.decisionLog.file)))
    if (config.decisionLog.logRecords) sinks.push(new LogDecisionSink(logger))
    return new CompositeDecisionSink(sinks)
}

export function createContainer(config: ResolvedConfig, overrides: ContainerOverrides = {}): Container {
    const logger = overrides.logger ?? createLogger(config)
    const fs = overrides.fs ?? new NodeFileSystem()
    const eventBus = new TypedEventEmitter()
    const metrics = new MetricsStore(config.metrics.maxSamples)
    const metricsRecorder = new MetricsRecorder(eventBus, metrics, config.pricing)
    const tracer = new Tracer(logger, eventBus, { maxSpans: config.tracing.maxSpans })
    const errorTracker = new ErrorTracker(logger, config.errors.maxErrors)
    errorTracker.attach(eventBus)
    const metricsFile = config.metrics.file ? new MetricsFile(fs, path.resolve(config.metrics.file), logger) : null
    const spanFile = config.tracing.spanFile ? new SpanFile(fs, path.resolve(config.tracing.spanFile), logger) : null
    spanFile?.attach(eventBus)

    const retry: RetryOptions = {
        ...config.retry,
        onEvent: metricsRetryListener(metrics),
    }

    const traceExporter = new TraceExporter(logger, {
        serviceName: config.serviceName,
        serviceVersion: config.serviceVersion,
        endpoint: config.tracing.endpoint,
        enabled: config.tracing.enabled,
        rootSpanName: workflowSpanName(config.serviceName),
        queueCapacity: config.tracing.queueCapacity,
        unhealthyQueueDepth: config.tracing.unhealthyQueueDepth,
        healthCheckIntervalMs: config.tracing.healthCheckIntervalMs,
        pollIntervalMs: config.tracing.pollIntervalMs,
        shutdownGraceMs: config.tracing.shutdownGraceMs,
        processor: overrides.spanProcessor ?? config.tracing.processor,
        spanExporter: overrides.spanExporter,
        metrics,
        retry,
    })
    traceExporter.attach(eventBus)

    const decisionLogger = new DecisionLogger(overrides.decisionSink ?? buildDecisionSink(config, fs, logger), logger, {
        batchSize: config.decisionLog.batchSize,
        flushIntervalMs: config.decisionLog.flushIntervalMs,
        metrics,
        retry,
    })

    const evaluator = overrides.evaluator ?? new RulePolicyEvaluator(config.policy)
    const policyGuard = new PolicyGuard(evaluator, decisionLogger, tracer, eventBus, logger)

    const healthChecker = new HealthChecker(logger)
    healthChecker.register('trace_exporter', traceExporterCheck(traceExporter))
    healthChecker.register('decision_log', decisionLogCheck(decisionLogger))
    healthChecker.register('metrics_store', metricsStoreCheck(metrics))

    const agentRunner = new AgentRunner(tracer, policyGuard, eventBus, logger, {
        serviceName: config.serviceName,
        defaultModel: config.defaultModel,
    })

    let shutdownPromise: Promise<void> | null = null

    const container: Container = {
        config,
        logger,
        eventBus,
        fs,
        metrics,
        metricsRecorder,
        metricsFile,
        errorTracker,
        tracer,
        spanFile,
        traceExporter,
        decisionLogger,
        policyGuard,
        healthChecker,
        agentRunner,

        createWorkflow(steps) {
            return new Workflow(steps, agentRunner, tracer, eventBus, logger, config.serviceName)
        },

        metricsText() {
            return renderPrometheus(metrics.getAll())
        },

        goldenSignals() {
            return computeGoldenSignals(metrics)
        },

        errorSummary() {
            return errorTracker.summary()
        },

        async health() {
            const report = await healthChecker.checkHealth()
            recordHealthMetrics(report, metrics)
            return healthPayload(report)
        },

        async initialize() {
            if (metricsFile) await metricsFile.load(metrics)
            if (spanFile) {
                const loaded = await spanFile.load(tracer)
                logger.debug({ loaded }, 'container:spans-restored')
            }
            traceExporter.start()
            decisionLogger.start()
            logger.info(
                { service: config.serviceName, tracing: config.tracing.enabled, endpoint: config.tracing.endpoint },
                'container:initialized'
            )
        },

        shutdown() {
            shutdownPromise ??= (async () => {
                const errors: Error[] = []
                try {
                    await traceExporter.shutdown()
                } catch (e) {
                    errors.push(toError(e))
                }
                try {
                    const flushed = await decisionLogger.stop()
                    if (!flushed) errors.push(new Error(`${decisionLogger.pending} decisions not flushed`))
                } catch (e) {
                    errors.push(toError(e))
                }
                try {
                    if (spanFile) {
                        await spanFile.flush()
                        spanFile.detach()
                    }
                    if (metricsFile && !(await metricsFile.save(metrics))) {
                        errors.push(new Error(`metrics not saved to ${metricsFile.path}`))
                    }
                } catch (e) {
                    errors.push(toError(e))
                }
                try {
                    errorTracker.detach()
                    metricsRecorder.dispose()
                    eventBus.removeAll()
                } catch (e) {
                    errors.push(toError(e))
                }
                if (errors.length > 0) {
                    logger.warn({ errors: errors.map((e) => errorMessage(e)) }, 'container:shutdown-errors')
                }
            })()
            return shutdownPromise
        },
    }

    return container
}
