import type { ChatParams, ChatResponse, LLMClient } from '../../src/llm/types.js'

export interface ScriptedReply {
    content: string | null
    finishReason?: ChatResponse['finishReason']
}

/** A reply body, a full reply, or an error the endpoint raises. */
export type ScriptedTurn = string | ScriptedReply | Error

/** Chat endpoint stand-in: answers each call with the next scripted turn and keeps the request. */
export class ScriptedLLMClient implements LLMClient {
    readonly requests: ChatParams[] = []

    constructor(private turns: ScriptedTurn[]) {}

    async chat(params: ChatParams): Promise<ChatResponse> {
        if (params.signal?.aborted) throw params.signal.reason
        this.requests.push(params)

        const turn = this.turns[this.requests.length - 1]
        if (turn === undefined) {
            throw new Error(`Chat endpoint called ${this.requests.length} times; ${this.turns.length} turn(s) scripted`)
        }
        if (turn instanceof Error) throw turn

        const reply = typeof turn === 'string' ? { content: turn } : turn
        const content = reply.content ?? ''
        return {
            content: reply.content,
            finishReason: reply.finishReason ?? 'stop',
            usage: { promptTokens: params.messages.reduce((n, m) => n + m.content.length, 0), completionTokens: content.length },
        }
    }
}
