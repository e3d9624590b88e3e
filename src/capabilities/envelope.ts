import { z } from 'zod'
import { type ErrorCode, isErrorCode } from '../core/errors.js'
import type { EnvelopeMetadata, FailureEnvelope, ResultEnvelope, SuccessEnvelope } from './types.js'

export function succeed<T>(data: T, message: string, metadata: EnvelopeMetadata = {}): SuccessEnvelope<T> {
    return { success: true, data, message, metadata }
}

export function fail(code: ErrorCode, message: string, metadata: EnvelopeMetadata = {}, data: unknown = null): FailureEnvelope {
    return {
        success: false,
        data,
        message: message.trim() || code,
        metadata: { ...metadata, errorCode: code },
    }
}

export function errorCodeOf(envelope: ResultEnvelope): ErrorCode | undefined {
    return envelope.success ? undefined : envelope.metadata.errorCode
}

const RawEnvelopeSchema = z.object({
    success: z.boolean(),
    data: z.unknown().optional(),
    message: z.string().optional(),
    metadata: z.record(z.unknown()).optional(),
})

/**
 * Coerces whatever a capability handed back into a valid envelope:
 * success without data and failure without a message are both rewritten
 * as InternalCapabilityError failures.
 */
export function normalizeEnvelope(capability: string, raw: unknown): ResultEnvelope {
    const parsed = RawEnvelopeSchema.safeParse(raw)
    if (!parsed.success) {
        return fail('InternalCapabilityError', `Capability '${capability}' returned a malformed result envelope`)
    }

    const { success, data, message = '', metadata = {} } = parsed.data
    if (success) {
        if (data === null || data === undefined) {
            return fail('InternalCapabilityError', `Capability '${capability}' reported success without data`, metadata)
        }
        return succeed(data, message, metadata)
    }

    const code = isErrorCode(metadata.errorCode) ? metadata.errorCode : 'InternalCapabilityError'
    const text = message.trim() || `Capability '${capability}' failed without a message`
    return fail(code, text, metadata, data ?? null)
}
