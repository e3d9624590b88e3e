import type { ChatMessage, LLMClient } from '../../llm/types.js'
import { buildSystemPrompt, STRICT_FORMAT_REMINDER } from './system-prompt.js'
import type { ProposeOptions, ReasoningOracle, SituationContext } from './types.js'

export interface LLMOracleOptions {
    model?: string
    temperature?: number
    maxTokens?: number
}

/** Reasoning oracle backed by an OpenAI-compatible chat endpoint. */
export class LLMOracle implements ReasoningOracle {
    constructor(
        private llm: LLMClient,
        private options: LLMOracleOptions = {}
    ) {}

    async propose(context: SituationContext, opts: ProposeOptions): Promise<unknown> {
        const { availableCapabilities, ...situation } = context
        const messages: ChatMessage[] = [
            { role: 'system', content: buildSystemPrompt(availableCapabilities) },
            { role: 'user', content: JSON.stringify(situation, null, 2) },
        ]
        if (opts.strict) {
            messages.push({ role: 'user', content: STRICT_FORMAT_REMINDER })
        }

        const response = await this.llm.chat({
            model: this.options.model,
            messages,
            temperature: this.options.temperature,
            maxTokens: this.options.maxTokens,
            jsonMode: true,
            signal: opts.signal,
        })
        if (response.finishReason === 'length') {
            throw new Error('Oracle reply was cut off at the token limit')
        }
        if (!response.content) {
            throw new Error('Oracle returned an empty reply')
        }
        return response.content
    }
}
