import { z } from 'zod'
import type { TokenUsage } from '../metrics/cost.js'

export interface AgentMessage {
    role: string
    content: string
}

/** Agent output, classified once at the adapter boundary. */
export type AgentResponse =
    | { kind: 'text'; text: string; usage?: TokenUsage }
    | { kind: 'messages'; messages: AgentMessage[]; usage?: TokenUsage }
    | { kind: 'structured'; data: unknown; usage?: TokenUsage }

const UsageSchema = z.object({
    inputTokens: z.number().int().nonnegative(),
    outputTokens: z.number().int().nonnegative(),
    model: z.string().min(1),
})

const ChatCompletionSchema = z.object({
    model: z.string().optional(),
    choices: z.array(z.object({ message: z.object({ content: z.string().nullable() }) })).min(1),
    usage: z
        .object({
            prompt_tokens: z.number().int().nonnegative(),
            completion_tokens: z.number().int().nonnegative(),
        })
        .optional(),
})

const TextSchema = z.object({ text: z.string(), usage: UsageSchema.optional() })
const ContentSchema = z.object({ content: z.string(), usage: UsageSchema.optional() })
const MessagesSchema = z.object({
    messages: z.array(z.object({ role: z.string().default('assistant'), content: z.string() })).min(1),
    usage: UsageSchema.optional(),
})

function withUsage<T extends AgentResponse>(response: T, usage: TokenUsage | undefined): T {
    return usage ? { ...response, usage } : response
}

export function toAgentResponse(raw: unknown, defaultModel = 'default'): AgentResponse {
    if (typeof raw === 'string') return { kind: 'text', text: raw }

    const completion = ChatCompletionSchema.safeParse(raw)
    if (completion.success) {
        const { choices, usage, model } = completion.data
        const text = choices[0]?.message.content ?? ''
        const tokens = usage
            ? { inputTokens: usage.prompt_tokens, outputTokens: usage.completion_tokens, model: model ?? defaultModel }
            : undefined
        return withUsage({ kind: 'text', text }, tokens)
    }

    const text = TextSchema.safeParse(raw)
    if (text.success) return withUsage({ kind: 'text', text: text.data.text }, text.data.usage)

    const content = ContentSchema.safeParse(raw)
    if (content.success) return withUsage({ kind: 'text', text: content.data.content }, content.data.usage)

    const messages = MessagesSchema.safeParse(raw)
    if (messages.success) {
        return withUsage({ kind: 'messages', messages: messages.data.messages }, messages.data.usage)
    }

    return { kind: 'structured', data: raw }
}

export function responseText(response: AgentResponse): string {
    switch (response.kind) {
        case 'text':
            return response.text
        case 'messages':
            return response.messages[response.messages.length - 1]?.content ?? ''
        case 'structured':
            return response.data === undefined ? '' : JSON.stringify(response.data) ?? String(response.data)
    }
}
