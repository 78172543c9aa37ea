import type { DecisionResult, DecisionType } from './types.js'

export interface PolicyInput {
    decisionType: DecisionType
    agentId?: string
    toolName?: string
    /** Text under inspection for guardrail decisions. */
    text?: string
    args?: Record<string, unknown>
    userId?: string
}

export interface PolicyVerdict {
    result: DecisionResult
    reason: string
}

/** Call contract of a policy engine; rule content lives behind it. */
export interface PolicyEvaluator {
    readonly version: string
    evaluate(input: PolicyInput): PolicyVerdict | Promise<PolicyVerdict>
}

export interface RulePolicyConfig {
    version: string
    deniedKeywords: string[]
    deniedTools: string[]
    approvalRequiredTools: string[]
}

/** Keyword and tool-list rules; no rule language. */
export class RulePolicyEvaluator implements PolicyEvaluator {
    readonly version: string
    private readonly keywords: string[]
    private readonly deniedTools: Set<string>
    private readonly approvalTools: Set<string>

    constructor(config: RulePolicyConfig) {
        this.version = config.version
        this.keywords = config.deniedKeywords.map((k) => k.toLowerCase())
        this.deniedTools = new Set(config.deniedTools)
        this.approvalTools = new Set(config.approvalRequiredTools)
    }

    evaluate(input: PolicyInput): PolicyVerdict {
        if (input.toolName && this.deniedTools.has(input.toolName)) {
            return { result: 'deny', reason: `tool '${input.toolName}' is not allowed` }
        }

        const haystack = [input.text ?? '', input.args ? JSON.stringify(input.args) : ''].join(' ').toLowerCase()
        const keyword = this.keywords.find((k) => haystack.includes(k))
        if (keyword) {
            return { result: 'deny', reason: `contains denied keyword '${keyword}'` }
        }

        if (input.toolName && this.approvalTools.has(input.toolName)) {
            return { result: 'require_approval', reason: `tool '${input.toolName}' requires approval` }
        }
        return { result: 'allow', reason: 'no rule matched' }
    }
}
