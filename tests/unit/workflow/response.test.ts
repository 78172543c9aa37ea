import { describe, it, expect } from 'vitest'
import { responseText, toAgentResponse } from '../../../src/workflow/response.js'

describe('toAgentResponse', () => {
    it('treats a plain string as text', () => {
        expect(toAgentResponse('hello')).toEqual({ kind: 'text', text: 'hello' })
    })

    it('reads { text } and { content } shapes', () => {
        expect(toAgentResponse({ text: 'a' })).toEqual({ kind: 'text', text: 'a' })
        expect(toAgentResponse({ content: 'b' })).toEqual({ kind: 'text', text: 'b' })
    })

    it('keeps explicit usage', () => {
        const usage = { inputTokens: 10, outputTokens: 5, model: 'model-mini' }
        expect(toAgentResponse({ text: 'a', usage })).toEqual({ kind: 'text', text: 'a', usage })
    })

    it('reads chat completion responses with usage', () => {
        const response = toAgentResponse(
            {
                model: 'model-mini',
                choices: [{ message: { content: 'plan ready' } }],
                usage: { prompt_tokens: 120, completion_tokens: 30 },
            },
            'fallback'
        )
        expect(response).toEqual({
            kind: 'text',
            text: 'plan ready',
            usage: { inputTokens: 120, outputTokens: 30, model: 'model-mini' },
        })
    })

    it('falls back to the default model when a completion names none', () => {
        const response = toAgentResponse(
            { choices: [{ message: { content: null } }], usage: { prompt_tokens: 1, completion_tokens: 2 } },
            'fallback'
        )
        expect(response.usage?.model).toBe('fallback')
        expect(responseText(response)).toBe('')
    })

    it('reads message lists', () => {
        const response = toAgentResponse({
            messages: [
                { role: 'user', content: 'q' },
                { content: 'answer' },
            ],
        })
        expect(response).toEqual({
            kind: 'messages',
            messages: [
                { role: 'user', content: 'q' },
                { role: 'assistant', content: 'answer' },
            ],
        })
        expect(responseText(response)).toBe('answer')
    })

    it('keeps anything else as structured data', () => {
        const response = toAgentResponse({ approved: true })
        expect(response).toEqual({ kind: 'structured', data: { approved: true } })
        expect(responseText(response)).toBe('{"approved":true}')
    })

    it('renders undefined structured data as empty text', () => {
        expect(responseText(toAgentResponse(undefined))).toBe('')
    })
})
