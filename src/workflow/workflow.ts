import { randomUUID } from 'node:crypto'
import { classifyError, toError, PolicyViolationError } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { Logger } from '../logger/index.js'
import { workflowSpanName } from '../tracing/names.js'
import type { Tracer } from '../tracing/tracer.js'
import type { AgentRunner } from './agent-runner.js'
import type { AgentHandler, AgentOutput, WorkflowResult } from './types.js'

export interface RunOptions {
    correlationId?: string
}

/**
 * Sequential multi-agent workflow. Each step receives the previous step's
 * text. Failures come back in the result instead of being thrown.
 */
export class Workflow {
    constructor(
        private readonly steps: readonly AgentHandler[],
        private readonly runner: AgentRunner,
        private readonly tracer: Tracer,
        private readonly eventBus: TypedEventEmitter,
        private readonly logger: Logger,
        private readonly serviceName: string
    ) {
        if (steps.length === 0) throw new Error('Workflow needs at least one step')
    }

    async run(input: string, options: RunOptions = {}): Promise<WorkflowResult> {
        const correlationId = options.correlationId ?? randomUUID()
        const root = this.tracer.startSpan(workflowSpanName(this.serviceName), {
            correlationId,
            tags: { steps: this.steps.map((s) => s.name).join(',') },
        })
        const started = Date.now()
        const outputs: AgentOutput[] = []
        this.eventBus.emit('workflow:start', { correlationId })
        this.logger.info({ correlationId }, 'workflow:start')

        let current = input
        let failedAgent: string | undefined
        try {
            for (const step of this.steps) {
                failedAgent = step.name
                const output = await this.runner.run(step, current, correlationId)
                outputs.push(output)
                current = output.text
            }
            const durationMs = Date.now() - started
            this.tracer.setTag(root, 'workflow.status', 'success')
            this.eventBus.emit('workflow:complete', { correlationId, durationMs })
            this.logger.info({ correlationId, durationMs }, 'workflow:complete')
            return { correlationId, ok: true, outputs }
        } catch (error) {
            const e = toError(error)
            const durationMs = Date.now() - started
            const kind = e instanceof PolicyViolationError ? 'policy_violation' : classifyError(e)
            this.tracer.setTag(root, 'error', 'true')
            this.tracer.setTag(root, 'error.message', e.message)
            this.eventBus.emit('workflow:error', { correlationId, durationMs, error: e })
            this.logger.warn({ correlationId, agent: failedAgent, error: e.message }, 'workflow:error')
            return { correlationId, ok: false, outputs, error: { agent: failedAgent, message: e.message, kind } }
        } finally {
            this.tracer.endSpan(root)
        }
    }
}
