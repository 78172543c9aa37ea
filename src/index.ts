export { loadConfig, mergeLayers, envLayer, type LoadConfigOptions } from './config/loader.js'
export { DEFAULT_CONFIG, CONFIG_FILE, DEFAULT_OTLP_ENDPOINT } from './config/defaults.js'
export { ConfigSchema, ResolvedConfigSchema, type Config, type ResolvedConfig } from './config/schema.js'
export { createContainer, type Container, type ContainerOverrides } from './core/container.js'
export {
    AgentwatchError,
    ConfigError,
    PermanentError,
    PolicyViolationError,
    TransientError,
    classifyError,
    type ErrorKind,
} from './core/errors.js'
export { TypedEventEmitter, type EventMap } from './core/events.js'
export { NodeFileSystem, MockFileSystem, type FileSystem } from './core/fs.js'
export { ok, err, failure, type Result, type Failure, type FailureKind } from './core/result.js'
export {
    HealthChecker,
    healthPayload,
    recordHealthMetrics,
    type HealthCheck,
    type HealthCheckResult,
    type HealthPayload,
    type HealthReport,
    type HealthStatus,
} from './health/checker.js'
export { ErrorTracker, errorKey, type ErrorRecord, type ErrorSummary, type ErrorTags } from './errors/tracker.js'
export { createLogger, createSilentLogger, type Logger } from './logger/index.js'
export { calculateCost, trackLlmUsage, DEFAULT_PRICING, type PricingTable, type TokenUsage } from './metrics/cost.js'
export { computeGoldenSignals, type GoldenSignals } from './metrics/golden-signals.js'
export { MetricNames } from './metrics/names.js'
export { MetricsFile, MetricsFileSchema, type MetricsFileContent } from './metrics/persistence.js'
export { renderPrometheus, sanitizeMetricName, KEY_METRICS } from './metrics/prometheus.js'
export { MetricsRecorder } from './metrics/recorder.js'
export { MetricsStore, percentile } from './metrics/store.js'
export type { MetricsSink, MetricsSnapshot, HistogramStats } from './metrics/types.js'
export { DecisionLogger, type DecisionLoggerOptions } from './policy/decision-logger.js'
export { RulePolicyEvaluator, type PolicyEvaluator, type PolicyInput, type PolicyVerdict } from './policy/evaluator.js'
export { PolicyGuard, type GuardContext } from './policy/guard.js'
export { CompositeDecisionSink, FileDecisionSink, LogDecisionSink, type DecisionSink } from './policy/sinks.js'
export { createDecision, decisionRecord, type PolicyDecision, type DecisionResult, type DecisionType } from './policy/types.js'
export { withRetry, retryResult, isTransient, metricsRetryListener, type RetryOptions, type RetryEvent } from './resilience/retry.js'
export { TraceExporter, type TraceExporterOptions, type TraceExporterStats } from './tracing/exporter.js'
export { SpanFile, spanRecord, type SpanRecord } from './tracing/span-file.js'
export { Tracer } from './tracing/tracer.js'
export type { Span, SpanEvent, StartSpanOptions } from './tracing/types.js'
export { toAgentResponse, responseText, type AgentResponse } from './workflow/response.js'
export type { AgentContext, AgentHandler, AgentOutput, WorkflowResult } from './workflow/types.js'
export { Workflow } from './workflow/workflow.js'
