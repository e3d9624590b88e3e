export type ErrorKind = 'transient' | 'permanent'

export type ErrorCode =
    | 'ValidationFailed'
    | 'CapabilityNotFound'
    | 'TimeoutError'
    | 'InsufficientData'
    | 'NoModelAvailable'
    | 'NoDataAvailable'
    | 'ReasoningDivergence'
    | 'InternalCapabilityError'
    | 'OracleFailure'
    | 'Aborted'

export const ERROR_CODES: readonly ErrorCode[] = [
    'ValidationFailed',
    'CapabilityNotFound',
    'TimeoutError',
    'InsufficientData',
    'NoModelAvailable',
    'NoDataAvailable',
    'ReasoningDivergence',
    'InternalCapabilityError',
    'OracleFailure',
    'Aborted',
]

export function isErrorCode(value: unknown): value is ErrorCode {
    return ERROR_CODES.some((code) => code === value)
}

export class AgentError extends Error {
    readonly kind: ErrorKind

    constructor(message: string, kind: ErrorKind, options?: ErrorOptions) {
        super(message, options)
        this.name = 'AgentError'
        this.kind = kind
    }
}

export class TransientError extends AgentError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'transient', options)
        this.name = 'TransientError'
    }
}

export class PermanentError extends AgentError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'permanent', options)
        this.name = 'PermanentError'
    }
}

/** Failure raised inside a capability or the model manager, tagged with its domain code. */
export class CapabilityError extends AgentError {
    readonly code: ErrorCode

    constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
        super(message, code === 'TimeoutError' ? 'transient' : 'permanent', options)
        this.name = 'CapabilityError'
        this.code = code
    }
}

export class ConfigError extends AgentError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'permanent', options)
        this.name = 'ConfigError'
    }
}

export class TimeoutError extends AgentError {
    readonly timeoutMs: number

    constructor(label: string, timeoutMs: number) {
        super(`${label} timed out after ${timeoutMs}ms`, 'transient')
        this.name = 'TimeoutError'
        this.timeoutMs = timeoutMs
    }
}

export function classifyHttpError(status: number): ErrorKind {
    if ([429, 500, 502, 503, 504].includes(status)) return 'transient'
    return 'permanent'
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error))
}

export function isAbortError(error: unknown): boolean {
    if (error instanceof DOMException && error.name === 'AbortError') return true
    if (error instanceof Error && error.name === 'AbortError') return true
    return false
}

function hasStatus(error: unknown): error is { status: number } {
    return typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
}

export function classifyError(error: unknown): ErrorKind {
    if (error instanceof AgentError) return error.kind
    if (error instanceof TypeError && error.message.includes('fetch')) return 'transient'
    if (hasStatus(error)) return classifyHttpError(error.status)
    return 'permanent'
}

/**
 * Races `run` against a deadline. The signal handed to `run` is aborted when
 * the deadline passes or the parent signal fires, so cooperative work can stop
 * before committing side effects.
 */
export async function withTimeout<T>(
    label: string,
    timeoutMs: number,
    run: (signal: AbortSignal) => Promise<T>,
    parent?: AbortSignal
): Promise<T> {
    const controller = new AbortController()
    const onParentAbort = () => controller.abort(parent?.reason)
    if (parent?.aborted) controller.abort(parent.reason)
    else parent?.addEventListener('abort', onParentAbort, { once: true })

    let timer: NodeJS.Timeout | undefined
    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            const error = new TimeoutError(label, timeoutMs)
            controller.abort(error)
            reject(error)
        }, timeoutMs)
    })

    try {
        return await Promise.race([run(controller.signal), deadline])
    } finally {
        clearTimeout(timer)
        parent?.removeEventListener('abort', onParentAbort)
    }
}
