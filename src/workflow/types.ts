import type { PolicyDecision } from '../policy/types.js'
import type { Span } from '../tracing/types.js'
import type { AgentResponse } from './response.js'

export interface AgentContext {
    correlationId: string
    span: Span
    /**
     * Runs a `tool_call` decision; throws `PolicyViolationError` on deny.
     * A `require_approval` result resolves like `allow`, so callers that gate
     * on approval must inspect `result`.
     */
    checkToolCall(toolName: string, args?: Record<string, unknown>): Promise<PolicyDecision>
    /** Runs `fn` inside a tool span that is a child of the agent span. */
    traceTool<T>(toolName: string, fn: (span: Span) => Promise<T>): Promise<T>
}

/** One workflow step. `run` may return any shape; it is classified by `toAgentResponse`. */
export interface AgentHandler {
    readonly name: string
    run(input: string, ctx: AgentContext): Promise<unknown>
}

export interface AgentOutput {
    agent: string
    response: AgentResponse
    text: string
    durationMs: number
}

export interface WorkflowResult {
    correlationId: string
    ok: boolean
    outputs: AgentOutput[]
    error?: { agent?: string; message: string; kind: string }
}
