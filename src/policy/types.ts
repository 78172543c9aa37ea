import { randomUUID } from 'node:crypto'

export type DecisionType = 'guardrails_input' | 'guardrails_output' | 'tool_call' | 'ingress' | 'human_approval'

export type DecisionResult = 'allow' | 'deny' | 'require_approval'

/** One policy decision. Frozen at creation; only ever appended to the audit log. */
export interface PolicyDecision {
    readonly decisionId: string
    readonly timestamp: string
    readonly decisionType: DecisionType
    readonly result: DecisionResult
    readonly reason: string
    readonly toolName?: string
    readonly agentId?: string
    readonly correlationId?: string
    readonly userId?: string
    readonly policyVersion: string
    readonly latencyMs: number
    readonly context: Readonly<Record<string, unknown>>
}

export interface DecisionInput {
    decisionType: DecisionType
    result: DecisionResult
    reason: string
    toolName?: string
    agentId?: string
    correlationId?: string
    userId?: string
    policyVersion?: string
    latencyMs?: number
    context?: Record<string, unknown>
}

export function createDecision(input: DecisionInput): PolicyDecision {
    return Object.freeze({
        decisionId: randomUUID(),
        timestamp: new Date().toISOString(),
        decisionType: input.decisionType,
        result: input.result,
        reason: input.reason,
        toolName: input.toolName,
        agentId: input.agentId,
        correlationId: input.correlationId,
        userId: input.userId,
        policyVersion: input.policyVersion ?? '1.0.0',
        latencyMs: input.latencyMs ?? 0,
        context: Object.freeze({ ...input.context }),
    })
}

/** Wire shape of a decision log line. */
export interface DecisionRecord {
    decision_id: string
    timestamp: string
    decision_type: DecisionType
    result: DecisionResult
    reason: string
    tool_name: string | null
    agent_id: string | null
    correlation_id: string | null
    user_id: string | null
    policy_version: string
    latency_ms: number
    context: Record<string, unknown>
}

export function decisionRecord(decision: PolicyDecision): DecisionRecord {
    return {
        decision_id: decision.decisionId,
        timestamp: decision.timestamp,
        decision_type: decision.decisionType,
        result: decision.result,
        reason: decision.reason,
        tool_name: decision.toolName ?? null,
        agent_id: decision.agentId ?? null,
        correlation_id: decision.correlationId ?? null,
        user_id: decision.userId ?? null,
        policy_version: decision.policyVersion,
        latency_ms: decision.latencyMs,
        context: { ...decision.context },
    }
}
