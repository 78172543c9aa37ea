import { performance } from 'node:perf_hooks'
import { errorMessage, PolicyViolationError } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { Logger } from '../logger/index.js'
import type { Tracer } from '../tracing/tracer.js'
import type { Span } from '../tracing/types.js'
import type { DecisionLogger } from './decision-logger.js'
import type { PolicyEvaluator, PolicyInput, PolicyVerdict } from './evaluator.js'
import { createDecision, type PolicyDecision } from './types.js'

export interface GuardContext {
    correlationId?: string
    agentId?: string
    userId?: string
    /** Span that receives a `policy.decision` event. */
    span?: Span
    context?: Record<string, unknown>
}

/**
 * Decision point: asks the evaluator, then records the outcome to the audit
 * log, the bus and the current span. An evaluator failure is a deny.
 */
export class PolicyGuard {
    constructor(
        private readonly evaluator: PolicyEvaluator,
        private readonly decisions: DecisionLogger,
        private readonly tracer: Tracer,
        private readonly eventBus: TypedEventEmitter,
        private readonly logger: Logger
    ) {}

    async check(input: PolicyInput, ctx: GuardContext = {}): Promise<PolicyDecision> {
        const started = performance.now()
        let verdict: PolicyVerdict
        try {
            verdict = await this.evaluator.evaluate(input)
        } catch (error) {
            this.logger.warn({ decisionType: input.decisionType, error: errorMessage(error) }, 'policy:evaluator-error')
            verdict = { result: 'deny', reason: `evaluator error: ${errorMessage(error)}` }
        }
        const latencyMs = Math.round((performance.now() - started) * 1000) / 1000

        const decision = createDecision({
            decisionType: input.decisionType,
            result: verdict.result,
            reason: verdict.reason,
            toolName: input.toolName,
            agentId: input.agentId ?? ctx.agentId,
            correlationId: ctx.correlationId,
            userId: input.userId ?? ctx.userId,
            policyVersion: this.evaluator.version,
            latencyMs,
            context: ctx.context,
        })

        this.decisions.record(decision)
        if (ctx.span) {
            this.tracer.addEvent(ctx.span, {
                event: 'policy.decision',
                decision_type: decision.decisionType,
                result: decision.result,
                reason: decision.reason,
                ...(decision.toolName ? { tool_name: decision.toolName } : {}),
            })
        }
        this.eventBus.emit('decision:recorded', { decision })
        if (decision.result !== 'allow') {
            this.logger.info(
                { decisionType: decision.decisionType, result: decision.result, reason: decision.reason },
                'policy:decision'
            )
        }
        return decision
    }

    /**
     * Like `check`, but a deny throws `PolicyViolationError`. `require_approval`
     * is returned, not thrown; the caller owns the approval step.
     */
    async enforce(input: PolicyInput, ctx: GuardContext = {}): Promise<PolicyDecision> {
        const decision = await this.check(input, ctx)
        if (decision.result === 'deny') throw new PolicyViolationError(decision)
        return decision
    }

    enforceToolCall(toolName: string, args: Record<string, unknown>, ctx: GuardContext = {}): Promise<PolicyDecision> {
        return this.enforce({ decisionType: 'tool_call', toolName, args, agentId: ctx.agentId }, ctx)
    }

    enforceInput(text: string, ctx: GuardContext = {}): Promise<PolicyDecision> {
        return this.enforce({ decisionType: 'guardrails_input', text, agentId: ctx.agentId }, ctx)
    }

    enforceOutput(text: string, ctx: GuardContext = {}): Promise<PolicyDecision> {
        return this.enforce({ decisionType: 'guardrails_output', text, agentId: ctx.agentId }, ctx)
    }
}
