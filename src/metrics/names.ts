/**
 * Metric name contracts. Names are `{category}.{entity}.{metric}`, dot
 * separated and lowercase; dashboards and the golden-signals view depend on
 * them, so rename only together with those consumers.
 */
export const MetricNames = {
    workflowRuns: 'workflow.runs',
    workflowSuccess: 'workflow.success',
    workflowErrors: 'workflow.errors',
    workflowLatencyMs: 'workflow.latency_ms',

    agentInvocations: (agent: string) => `agent.${agent}.invocations`,
    agentSuccess: (agent: string) => `agent.${agent}.success`,
    agentErrors: (agent: string) => `agent.${agent}.errors`,
    agentLatencyMs: (agent: string) => `agent.${agent}.latency_ms`,
    agentPolicyViolations: (agent: string) => `agent.${agent}.policy.violations`,

    llmCostTotal: 'llm.cost.total',
    llmCostAgent: (agent: string) => `llm.cost.agent.${agent}`,
    llmCostModel: (model: string) => `llm.cost.model.${model}`,
    llmTokensInputTotal: 'llm.tokens.input.total',
    llmTokensOutputTotal: 'llm.tokens.output.total',
    llmTokensTotal: 'llm.tokens.total.all',
    llmTokensInputModel: (model: string) => `llm.tokens.input.${model}`,
    llmTokensOutputModel: (model: string) => `llm.tokens.output.${model}`,
    llmQualityCorrect: 'llm.quality.user_confirmed_correct',
    llmQualityIncorrect: 'llm.quality.user_confirmed_incorrect',

    policyViolationsTotal: 'policy.violations.total',
    policyDecisions: (result: string) => `policy.decisions.${result}`,

    retryAttempts: 'retry.attempts',
    retryExhausted: 'retry.exhausted',
    retrySuccessAfterAttempts: 'retry.success_after_attempts',

    spanDurationMs: (spanName: string) => `span.${spanName}.duration_ms`,

    traceExportLatencyMs: 'observability.trace_export_latency_ms',
    traceExportQueueSize: 'observability.trace_export_queue_size',
    traceExportFailures: 'observability.trace_export_failures',
    traceExportDropped: 'observability.trace_export_dropped',
    traceExportSkipped: 'observability.trace_export_skipped',
    traceExportDelivered: 'observability.trace_export_delivered',
    collectorHealth: 'observability.otel_collector_health',
    decisionLogFlushLatencyMs: 'observability.decision_log_flush_latency_ms',
    decisionLogPending: 'observability.decision_log_pending',
    decisionLogFlushFailures: 'observability.decision_log_flush_failures',

    healthStatus: 'health.status',
    healthCheck: (check: string) => `health.check.${check}`,
} as const
