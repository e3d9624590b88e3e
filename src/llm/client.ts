import OpenAI from 'openai'
import type { ResolvedConfig } from '../config/schema.js'
import { errorMessage, TransientError } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import { CircuitBreaker, withRetry } from './retry.js'
import type { ChatMessage, ChatParams, ChatResponse, LLMClient } from './types.js'

type LLMConfig = Pick<ResolvedConfig, 'apiKey' | 'baseURL' | 'model' | 'temperature' | 'maxTokens' | 'llm'>

function toOpenAIMessage(message: ChatMessage): OpenAI.ChatCompletionMessageParam {
    switch (message.role) {
        case 'system':
            return { role: 'system', content: message.content }
        case 'user':
            return { role: 'user', content: message.content }
        case 'assistant':
            return { role: 'assistant', content: message.content }
    }
}

/** A local endpoint that is still starting up refuses connections; that is worth retrying. */
export function toRetryable(error: unknown): unknown {
    if (error instanceof OpenAI.APIConnectionError) {
        return new TransientError(`LLM endpoint unreachable: ${errorMessage(error)}`, { cause: error })
    }
    return error
}

export function createLLMClient(config: LLMConfig, logger: Logger): LLMClient {
    const openai = new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseURL,
        // retries are owned by withRetry below
        maxRetries: 0,
    })

    const { maxRetries, retryBaseDelayMs, retryMaxDelayMs, breakerThreshold, breakerCooldownMs } = config.llm
    const policy = { maxRetries, baseDelayMs: retryBaseDelayMs, maxDelayMs: retryMaxDelayMs }
    const breaker = new CircuitBreaker({ threshold: breakerThreshold, cooldownMs: breakerCooldownMs })

    return {
        async chat(params: ChatParams): Promise<ChatResponse> {
            const model = params.model ?? config.model
            const started = Date.now()

            const request = async (): Promise<ChatResponse> => {
                const response = await openai.chat.completions
                    .create(
                        {
                            model,
                            messages: params.messages.map(toOpenAIMessage),
                            temperature: params.temperature ?? config.temperature,
                            max_tokens: params.maxTokens ?? config.maxTokens,
                            response_format: params.jsonMode ? { type: 'json_object' } : undefined,
                        },
                        { signal: params.signal }
                    )
                    .catch((error: unknown) => {
                        throw toRetryable(error)
                    })

                const choice = response.choices[0]
                if (!choice) throw new Error('No response from LLM')

                let finishReason: ChatResponse['finishReason'] = 'other'
                if (choice.finish_reason === 'stop') finishReason = 'stop'
                else if (choice.finish_reason === 'length') finishReason = 'length'

                return {
                    content: choice.message.content,
                    finishReason,
                    usage: {
                        promptTokens: response.usage?.prompt_tokens ?? 0,
                        completionTokens: response.usage?.completion_tokens ?? 0,
                    },
                }
            }

            const result = await breaker.execute(
                () =>
                    withRetry(request, policy, {
                        signal: params.signal,
                        onRetry: ({ attempt, delayMs, error }) =>
                            logger.warn({ model, attempt, delayMs, err: errorMessage(error) }, 'llm:retry'),
                    }),
                params.signal
            )

            logger.debug(
                { model, usage: result.usage, finishReason: result.finishReason, durationMs: Date.now() - started },
                'llm:response'
            )
            return result
        },
    }
}
