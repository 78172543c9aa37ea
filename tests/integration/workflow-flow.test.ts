import { InMemorySpanExporter } from '@opentelemetry/sdk-trace-base'
import { afterEach, describe, expect, it } from 'vitest'
import { DEFAULT_CONFIG } from '../../src/config/defaults.js'
import type { ResolvedConfig } from '../../src/config/schema.js'
import { sleep } from '../../src/core/async.js'
import { createContainer, type Container } from '../../src/core/container.js'
import { MockFileSystem } from '../../src/core/fs.js'
import { createSilentLogger } from '../../src/logger/index.js'
import type { AgentHandler } from '../../src/workflow/types.js'

const config: ResolvedConfig = {
    ...DEFAULT_CONFIG,
    serviceName: 'taskflow',
    tracing: { ...DEFAULT_CONFIG.tracing, pollIntervalMs: 5 },
    decisionLog: { ...DEFAULT_CONFIG.decisionLog, file: '/logs/decisions.jsonl', batchSize: 100, flushIntervalMs: 60_000 },
    retry: { maxAttempts: 1, initialDelayMs: 0, backoffFactor: 1, maxDelayMs: 0, jitter: false },
    pricing: { ...DEFAULT_CONFIG.pricing, 'model-mini': { input: 0.15, output: 0.6 } },
    policy: { ...DEFAULT_CONFIG.policy, deniedTools: ['shell'], approvalRequiredTools: ['send_email'] },
}

const planner: AgentHandler = {
    name: 'planner',
    run: async () => ({
        model: 'model-mini',
        choices: [{ message: { content: 'plan ready' } }],
        usage: { prompt_tokens: 120, completion_tokens: 30 },
    }),
}

const reviewer: AgentHandler = {
    name: 'reviewer',
    run: async (input) => ({ text: `approved: ${input}` }),
}

function executor(tool: string): AgentHandler {
    return {
        name: 'executor',
        run: async (_input, ctx) => {
            await ctx.checkToolCall(tool, { q: 'status' })
            const found = await ctx.traceTool(tool, async () => 'result')
            return `done with ${found}`
        },
    }
}

let container: Container | undefined
let memory: InMemorySpanExporter
let fs: MockFileSystem

async function setup(overrides: Partial<ResolvedConfig> = {}, files = new MockFileSystem()): Promise<Container> {
    memory = new InMemorySpanExporter()
    fs = files
    container = createContainer({ ...config, ...overrides }, {
        logger: createSilentLogger(),
        fs,
        spanExporter: memory,
        spanProcessor: 'simple',
    })
    await container.initialize()
    return container
}

afterEach(async () => {
    await container?.shutdown()
    container = undefined
})

describe('instrumented workflow', () => {
    it('runs every step under one trace and records metrics and decisions', async () => {
        const c = await setup()
        const result = await c.createWorkflow([planner, reviewer, executor('search')]).run('ship it', {
            correlationId: 'req-1',
        })

        expect(result.ok).toBe(true)
        expect(result.correlationId).toBe('req-1')
        expect(result.outputs.map((o) => o.text)).toEqual(['plan ready', 'approved: plan ready', 'done with result'])

        await c.traceExporter.forceFlush()
        const spans = memory.getFinishedSpans()
        expect(spans.map((s) => s.name).sort()).toEqual([
            'taskflow.agent.executor.run',
            'taskflow.agent.planner.run',
            'taskflow.agent.reviewer.run',
            'taskflow.tool.search.call',
            'taskflow.workflow.run',
        ])
        expect(new Set(spans.map((s) => s.spanContext().traceId)).size).toBe(1)

        expect(c.metrics.getCounter('workflow.runs')).toBe(1)
        expect(c.metrics.getCounter('workflow.success')).toBe(1)
        expect(c.metrics.getCounter('agent.planner.success')).toBe(1)
        expect(c.metrics.getCounter('llm.cost.total')).toBe(0.036)
        expect(c.metrics.getCounter('llm.tokens.input.total')).toBe(120)
        expect(c.decisionLogger.pending).toBe(7)
        expect(c.tracer.getTrace('req-1')).toHaveLength(5)

        await c.shutdown()
        const lines = (fs.getFile('/logs/decisions.jsonl') ?? '').split('\n').filter(Boolean)
        expect(lines).toHaveLength(7)
        expect(JSON.parse(lines[0] ?? '')).toMatchObject({
            decision_type: 'guardrails_input',
            result: 'allow',
            agent_id: 'planner',
            correlation_id: 'req-1',
        })
    })

    it('returns a failed result when a tool call is denied', async () => {
        const c = await setup()
        const result = await c.createWorkflow([planner, reviewer, executor('shell')]).run('ship it')

        expect(result.ok).toBe(false)
        expect(result.outputs).toHaveLength(2)
        expect(result.error).toEqual({
            agent: 'executor',
            message: "Policy denied tool_call: tool 'shell' is not allowed",
            kind: 'policy_violation',
        })
        expect(c.metrics.getCounter('workflow.errors')).toBe(1)
        expect(c.metrics.getCounter('policy.violations.total')).toBe(1)
        expect(c.metrics.getCounter('agent.executor.policy.violations')).toBe(1)
        expect(c.metrics.getCounter('agent.executor.errors')).toBe(1)

        await c.traceExporter.forceFlush()
        const root = memory.getFinishedSpans().find((s) => s.name === 'taskflow.workflow.run')
        expect(root?.status.code).toBe(2)
        expect(c.tracer.getActiveSpans()).toHaveLength(0)
    })

    it('exposes metrics, golden signals and health', async () => {
        const c = await setup()
        await c.createWorkflow([planner]).run('hello')

        const text = c.metricsText()
        expect(text.split('\n')).toContain('workflow_runs 1')
        expect(text.split('\n')).toContain('# TYPE policy_violations_total counter')
        expect(c.goldenSignals().successRate).toBe(100)

        const health = await c.health()
        expect(health.status).toBe('healthy')
        expect(Object.keys(health.checks).sort()).toEqual(['decision_log', 'metrics_store', 'trace_exporter'])
        expect(c.metrics.getGauge('health.status')).toBe(1)
    })

    it('shutdown is idempotent', async () => {
        const c = await setup()
        const first = c.shutdown()
        expect(c.shutdown()).toBe(first)
        await first
    })

    it('keeps one trace per correlation when workflows run concurrently', async () => {
        const c = await setup()
        const slow: AgentHandler = {
            name: 'planner',
            run: async (input) => {
                await sleep(input.length % 3)
                return { text: `planned ${input}` }
            },
        }
        const ids = ['w0', 'w1', 'w2', 'w3', 'w4']

        const results = await Promise.all(
            ids.map((id, i) => c.createWorkflow([slow, reviewer]).run('x'.repeat(i + 1), { correlationId: id }))
        )
        expect(results.every((r) => r.ok)).toBe(true)

        await c.traceExporter.forceFlush()
        const spans = memory.getFinishedSpans()
        expect(spans).toHaveLength(15)

        const traceIdsByCorrelation = new Map<string, Set<string>>()
        for (const span of spans) {
            const correlationId = String(span.attributes['correlation.id'])
            const set = traceIdsByCorrelation.get(correlationId) ?? new Set<string>()
            set.add(span.spanContext().traceId)
            traceIdsByCorrelation.set(correlationId, set)
        }
        expect([...traceIdsByCorrelation.keys()].sort()).toEqual(ids)
        for (const set of traceIdsByCorrelation.values()) expect(set.size).toBe(1)
        expect(new Set(spans.map((s) => s.spanContext().traceId)).size).toBe(ids.length)
    })

    it('hands approval-required tool calls back to the agent', async () => {
        const c = await setup()
        const mailer: AgentHandler = {
            name: 'executor',
            run: async (_input, ctx) => {
                const decision = await ctx.checkToolCall('send_email', { to: 'ops' })
                if (decision.result === 'require_approval') return 'awaiting approval'
                return ctx.traceTool('send_email', async () => 'sent')
            },
        }

        const result = await c.createWorkflow([mailer]).run('notify')

        expect(result.ok).toBe(true)
        expect(result.outputs.map((o) => o.text)).toEqual(['awaiting approval'])
        expect(c.metrics.getCounter('policy.violations.total')).toBe(0)
    })

    it('tracks agent errors by correlation', async () => {
        const c = await setup()
        const failing: AgentHandler = {
            name: 'reviewer',
            run: async () => {
                throw new Error('model unavailable')
            },
        }

        await c.createWorkflow([planner, failing]).run('ship it', { correlationId: 'req-err' })

        const summary = c.errorSummary()
        expect(summary.totalErrors).toBe(1)
        expect(summary.errorCounts).toEqual({ 'Error:model unavailable': 1 })
        expect(c.errorTracker.byCorrelation('req-err')[0]?.agentName).toBe('reviewer')
    })

    it('persists spans and metrics across containers', async () => {
        const files = new MockFileSystem()
        const persisted = {
            tracing: { ...config.tracing, spanFile: '/data/traces.jsonl' },
            metrics: { ...config.metrics, file: '/data/metrics.json' },
        }
        const first = await setup(persisted, files)
        await first.createWorkflow([planner]).run('hello', { correlationId: 'req-p' })
        await first.shutdown()

        expect((files.getFile('/data/traces.jsonl') ?? '').split('\n').filter(Boolean)).toHaveLength(2)

        const second = await setup(persisted, files)
        expect(second.tracer.getTrace('req-p').map((s) => s.name).sort()).toEqual([
            'taskflow.agent.planner.run',
            'taskflow.workflow.run',
        ])
        expect(second.metrics.getCounter('workflow.runs')).toBe(1)
    })
})
