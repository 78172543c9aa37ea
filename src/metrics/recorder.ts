import type { TypedEventEmitter } from '../core/events.js'
import type { PolicyDecision } from '../policy/types.js'
import type { Span } from '../tracing/types.js'
import { DEFAULT_PRICING, trackLlmUsage, type PricingTable, type TokenUsage } from './cost.js'
import { MetricNames } from './names.js'
import type { MetricsSink } from './types.js'

/**
 * Maps bus events onto the metrics store. Producers only emit; nothing on the
 * producer path knows metric names.
 */
export class MetricsRecorder {
    private cleanups: Array<() => void> = []

    constructor(
        eventBus: TypedEventEmitter,
        private readonly metrics: MetricsSink,
        private readonly pricing: PricingTable = DEFAULT_PRICING
    ) {
        const onSpanEnd = ({ span, durationMs }: { span: Span; durationMs: number }) => {
            this.metrics.recordHistogram(MetricNames.spanDurationMs(span.name), durationMs)
        }
        eventBus.on('span:end', onSpanEnd)
        this.cleanups.push(() => eventBus.off('span:end', onSpanEnd))

        const onWorkflowStart = () => {
            this.metrics.incrementCounter(MetricNames.workflowRuns)
        }
        eventBus.on('workflow:start', onWorkflowStart)
        this.cleanups.push(() => eventBus.off('workflow:start', onWorkflowStart))

        const onWorkflowComplete = ({ durationMs }: { durationMs: number }) => {
            this.metrics.incrementCounter(MetricNames.workflowSuccess)
            this.metrics.recordHistogram(MetricNames.workflowLatencyMs, durationMs)
        }
        eventBus.on('workflow:complete', onWorkflowComplete)
        this.cleanups.push(() => eventBus.off('workflow:complete', onWorkflowComplete))

        const onWorkflowError = ({ durationMs }: { durationMs: number }) => {
            this.metrics.incrementCounter(MetricNames.workflowErrors)
            this.metrics.recordHistogram(MetricNames.workflowLatencyMs, durationMs)
        }
        eventBus.on('workflow:error', onWorkflowError)
        this.cleanups.push(() => eventBus.off('workflow:error', onWorkflowError))

        const onAgentStart = ({ agent }: { agent: string }) => {
            this.metrics.incrementCounter(MetricNames.agentInvocations(agent))
        }
        eventBus.on('agent:start', onAgentStart)
        this.cleanups.push(() => eventBus.off('agent:start', onAgentStart))

        const onAgentComplete = ({ agent, durationMs }: { agent: string; durationMs: number }) => {
            this.metrics.incrementCounter(MetricNames.agentSuccess(agent))
            this.metrics.recordHistogram(MetricNames.agentLatencyMs(agent), durationMs)
        }
        eventBus.on('agent:complete', onAgentComplete)
        this.cleanups.push(() => eventBus.off('agent:complete', onAgentComplete))

        const onAgentError = ({ agent }: { agent: string }) => {
            this.metrics.incrementCounter(MetricNames.agentErrors(agent))
        }
        eventBus.on('agent:error', onAgentError)
        this.cleanups.push(() => eventBus.off('agent:error', onAgentError))

        const onTokenUsage = ({ agent, usage }: { agent: string; usage: TokenUsage }) => {
            trackLlmUsage(this.metrics, usage, agent, this.pricing)
        }
        eventBus.on('token:usage', onTokenUsage)
        this.cleanups.push(() => eventBus.off('token:usage', onTokenUsage))

        const onDecision = ({ decision }: { decision: PolicyDecision }) => {
            this.metrics.incrementCounter(MetricNames.policyDecisions(decision.result))
            if (decision.result === 'deny') {
                this.metrics.incrementCounter(MetricNames.policyViolationsTotal)
                if (decision.agentId) {
                    this.metrics.incrementCounter(MetricNames.agentPolicyViolations(decision.agentId))
                }
            }
        }
        eventBus.on('decision:recorded', onDecision)
        this.cleanups.push(() => eventBus.off('decision:recorded', onDecision))
    }

    /** Records explicit user feedback on an answer's correctness. */
    recordFeedback(correct: boolean): void {
        this.metrics.incrementCounter(correct ? MetricNames.llmQualityCorrect : MetricNames.llmQualityIncorrect)
    }

    dispose(): void {
        for (const cleanup of this.cleanups) cleanup()
        this.cleanups = []
    }
}
