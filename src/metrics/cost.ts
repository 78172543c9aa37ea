import { MetricNames } from './names.js'
import type { MetricsSink } from './types.js'

/** USD per 1K tokens. */
export interface ModelPricing {
    input: number
    output: number
}

export type PricingTable = Record<string, ModelPricing>

export interface TokenUsage {
    inputTokens: number
    outputTokens: number
    model: string
}

export const FALLBACK_PRICING: ModelPricing = { input: 0.15, output: 0.6 }

export const DEFAULT_PRICING: PricingTable = {
    'gpt-4o': { input: 2.5, output: 10 },
    'gpt-4o-mini': { input: 0.15, output: 0.6 },
    'gpt-4-turbo': { input: 10, output: 30 },
    'gpt-4': { input: 30, output: 60 },
    'gpt-3.5-turbo': { input: 0.5, output: 1.5 },
    default: FALLBACK_PRICING,
}

export function calculateCost(
    inputTokens: number,
    outputTokens: number,
    model: string,
    pricing: PricingTable = DEFAULT_PRICING
): number {
    const price = pricing[model] ?? pricing.default ?? FALLBACK_PRICING
    const cost = (inputTokens / 1000) * price.input + (outputTokens / 1000) * price.output
    return Math.round(cost * 1e6) / 1e6
}

/** Records token counters and cost for one LLM call; returns the cost in USD. */
export function trackLlmUsage(
    metrics: MetricsSink,
    usage: TokenUsage,
    agent: string,
    pricing: PricingTable = DEFAULT_PRICING
): number {
    const { inputTokens, outputTokens, model } = usage
    metrics.incrementCounter(MetricNames.llmTokensInputModel(model), inputTokens)
    metrics.incrementCounter(MetricNames.llmTokensOutputModel(model), outputTokens)
    metrics.incrementCounter(MetricNames.llmTokensInputTotal, inputTokens)
    metrics.incrementCounter(MetricNames.llmTokensOutputTotal, outputTokens)
    metrics.incrementCounter(MetricNames.llmTokensTotal, inputTokens + outputTokens)

    const cost = calculateCost(inputTokens, outputTokens, model, pricing)
    metrics.incrementCounter(MetricNames.llmCostTotal, cost)
    metrics.incrementCounter(MetricNames.llmCostAgent(agent), cost)
    metrics.incrementCounter(MetricNames.llmCostModel(model), cost)
    return cost
}
