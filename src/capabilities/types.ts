import type { z } from 'zod'
import type { ErrorCode } from '../core/errors.js'
import type { InvocationOutcome } from '../core/types.js'
import type { Logger } from '../logger/index.js'

export type EnvelopeMetadata = Record<string, unknown>

export interface SuccessEnvelope<T = unknown> {
    success: true
    data: T
    message: string
    metadata: EnvelopeMetadata
}

export interface FailureEnvelope {
    success: false
    data: unknown
    message: string
    metadata: EnvelopeMetadata & { errorCode: ErrorCode }
}

/**
 * The only shape in which capability outcomes reach the orchestrator.
 * A success always carries data; a failure always carries a message and its code.
 */
export type ResultEnvelope<T = unknown> = SuccessEnvelope<T> | FailureEnvelope

export interface CapabilityContext {
    signal: AbortSignal
    logger: Logger
    sessionId?: string
}

/** What a capability declares it returns, so the orchestrator can recognise goal-satisfying results. */
export type CapabilityProduct = 'forecast' | 'series' | 'report' | 'model' | 'status'

export interface Capability<TInput = unknown, TOutput = unknown> {
    name: string
    description: string
    parameters: z.ZodType<TInput, z.ZodTypeDef, unknown>
    result: z.ZodType<TOutput, z.ZodTypeDef, unknown>
    produces: CapabilityProduct
    timeoutMs?: number
    execute(input: TInput, ctx: CapabilityContext): Promise<ResultEnvelope<TOutput>>
}

export type AnyCapability = Capability<unknown, unknown>

export interface InvocationRequest {
    capability: string
    arguments: Record<string, unknown>
}

export interface CapabilityInvocation {
    capability: string
    arguments: Record<string, unknown>
    envelope: ResultEnvelope
    startedAt: string
    durationMs: number
    outcome: InvocationOutcome
}
