import { toError } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { Logger } from '../logger/index.js'
import type { PolicyGuard } from '../policy/guard.js'
import { agentSpanName, toolSpanName, workflowSpanName } from '../tracing/names.js'
import type { Tracer } from '../tracing/tracer.js'
import type { Span } from '../tracing/types.js'
import { responseText, toAgentResponse } from './response.js'
import type { AgentContext, AgentHandler, AgentOutput } from './types.js'

export interface AgentRunnerOptions {
    serviceName: string
    defaultModel?: string
    userId?: string
}

/**
 * Runs one agent inside its own span with input and output guardrails, and
 * reports lifecycle and token usage on the bus.
 */
export class AgentRunner {
    constructor(
        private readonly tracer: Tracer,
        private readonly guard: PolicyGuard,
        private readonly eventBus: TypedEventEmitter,
        private readonly logger: Logger,
        private readonly options: AgentRunnerOptions
    ) {}

    async run(agent: AgentHandler, input: string, correlationId: string): Promise<AgentOutput> {
        const { serviceName } = this.options
        const root = this.tracer.findActive(correlationId, workflowSpanName(serviceName))
        const span = this.tracer.startSpan(agentSpanName(serviceName, agent.name), {
            correlationId,
            parentId: root?.id,
            tags: { agent: agent.name },
        })
        const guardCtx = { correlationId, agentId: agent.name, userId: this.options.userId, span }
        const started = Date.now()
        this.eventBus.emit('agent:start', { agent: agent.name, correlationId })

        try {
            await this.guard.enforceInput(input, guardCtx)

            const ctx: AgentContext = {
                correlationId,
                span,
                checkToolCall: (toolName, args = {}) => this.guard.enforceToolCall(toolName, args, guardCtx),
                traceTool: <T>(toolName: string, fn: (s: Span) => Promise<T>) => this.traceTool(span, toolName, fn),
            }
            const response = toAgentResponse(await agent.run(input, ctx), this.options.defaultModel)
            const text = responseText(response)

            if (response.usage) {
                this.tracer.setTag(span, 'llm.model', response.usage.model)
                this.tracer.setTag(span, 'llm.tokens.input', String(response.usage.inputTokens))
                this.tracer.setTag(span, 'llm.tokens.output', String(response.usage.outputTokens))
                this.eventBus.emit('token:usage', { agent: agent.name, correlationId, usage: response.usage })
            }

            await this.guard.enforceOutput(text, guardCtx)

            const durationMs = Date.now() - started
            this.tracer.setTag(span, 'agent.status', 'success')
            this.eventBus.emit('agent:complete', { agent: agent.name, correlationId, durationMs })
            return { agent: agent.name, response, text, durationMs }
        } catch (error) {
            const e = toError(error)
            this.tracer.setTag(span, 'error', 'true')
            this.tracer.setTag(span, 'error.message', e.message)
            this.tracer.addEvent(span, { event: 'error', error_type: e.name, message: e.message })
            this.eventBus.emit('agent:error', { agent: agent.name, correlationId, error: e })
            this.logger.warn({ agent: agent.name, correlationId, error: e.message }, 'agent:error')
            throw e
        } finally {
            this.tracer.endSpan(span)
        }
    }

    private async traceTool<T>(parent: Span, toolName: string, fn: (span: Span) => Promise<T>): Promise<T> {
        const span = this.tracer.startSpan(toolSpanName(this.options.serviceName, toolName), {
            correlationId: parent.correlationId,
            parentId: parent.id,
            tags: { tool_name: toolName },
        })
        try {
            return await fn(span)
        } catch (error) {
            this.tracer.setTag(span, 'error', 'true')
            this.tracer.setTag(span, 'error.message', toError(error).message)
            throw error
        } finally {
            this.tracer.endSpan(span)
        }
    }
}
