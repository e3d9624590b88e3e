export interface ChatMessage {
    role: 'system' | 'user' | 'assistant'
    content: string
}

export interface ChatParams {
    model?: string
    messages: ChatMessage[]
    temperature?: number
    maxTokens?: number
    /** Ask the endpoint to constrain output to a single JSON object. */
    jsonMode?: boolean
    signal?: AbortSignal
}

export interface ChatResponse {
    content: string | null
    finishReason: 'stop' | 'length' | 'other'
    usage: { promptTokens: number; completionTokens: number }
}

export interface LLMClient {
    chat(params: ChatParams): Promise<ChatResponse>
}
