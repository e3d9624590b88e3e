import type { ResolvedConfig } from '../config/schema.js'
import { CapabilityError, errorMessage, TimeoutError, withTimeout } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { InvocationOutcome } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import { errorCodeOf, fail, normalizeEnvelope } from './envelope.js'
import type { CapabilityRegistry } from './registry.js'
import type { AnyCapability, CapabilityInvocation, InvocationRequest, ResultEnvelope } from './types.js'

export interface DispatchOptions {
    signal?: AbortSignal
    sessionId?: string
    logger?: Logger
}

type TimeoutPolicy = ResolvedConfig['capabilities']

/**
 * Single entry point for running a capability. Whatever happens inside the
 * capability, the caller gets back a CapabilityInvocation whose envelope
 * satisfies the envelope invariants; nothing is thrown past this boundary.
 */
export class CapabilityDispatcher {
    constructor(
        private registry: CapabilityRegistry,
        private timeouts: TimeoutPolicy,
        private logger: Logger,
        private eventBus?: TypedEventEmitter
    ) {}

    timeoutFor(capability: AnyCapability): number {
        return this.timeouts.timeouts[capability.name] ?? capability.timeoutMs ?? this.timeouts.defaultTimeoutMs
    }

    async dispatch(request: InvocationRequest, opts: DispatchOptions = {}): Promise<CapabilityInvocation> {
        const startedAt = new Date()
        const started = performance.now()
        const envelope = await this.run(request, opts)
        const durationMs = Math.round(performance.now() - started)

        const invocation: CapabilityInvocation = {
            capability: request.capability,
            arguments: request.arguments,
            envelope,
            startedAt: startedAt.toISOString(),
            durationMs,
            outcome: outcomeOf(envelope),
        }

        const log = opts.logger ?? this.logger
        const errorCode = errorCodeOf(envelope)
        if (invocation.outcome === 'ok') {
            log.debug({ capability: request.capability, durationMs }, 'capability:ok')
        } else {
            log.warn({ capability: request.capability, durationMs, errorCode, message: envelope.message }, 'capability:failed')
        }

        this.eventBus?.emit('capability:after', {
            sessionId: opts.sessionId,
            capability: request.capability,
            outcome: invocation.outcome,
            durationMs,
            errorCode,
        })

        return invocation
    }

    private async run(request: InvocationRequest, opts: DispatchOptions): Promise<ResultEnvelope> {
        const capability = this.registry.get(request.capability)
        if (!capability) {
            return fail('CapabilityNotFound', `Capability '${request.capability}' is not registered`)
        }

        const validated = this.registry.validate(request)
        if (!validated.ok) {
            return fail(validated.error.code, validated.error.message)
        }

        const timeoutMs = this.timeoutFor(capability)
        const log = opts.logger ?? this.logger

        try {
            const raw = await withTimeout(
                `Capability '${capability.name}'`,
                timeoutMs,
                (signal) => capability.execute(validated.value, { signal, logger: log, sessionId: opts.sessionId }),
                opts.signal
            )
            const envelope = normalizeEnvelope(capability.name, raw)
            if (envelope.success && !capability.result.safeParse(envelope.data).success) {
                return fail(
                    'InternalCapabilityError',
                    `InternalCapabilityError: capability '${capability.name}' returned data that does not match its declared result`
                )
            }
            return envelope
        } catch (error) {
            if (error instanceof TimeoutError) {
                return fail('TimeoutError', `Capability '${capability.name}' timed out after ${timeoutMs}ms`, { timeoutMs })
            }
            if (opts.signal?.aborted) {
                return fail('Aborted', `Capability '${capability.name}' was cancelled`)
            }
            if (error instanceof CapabilityError) {
                return fail(error.code, error.message)
            }
            return fail(
                'InternalCapabilityError',
                `InternalCapabilityError: capability '${capability.name}' failed unexpectedly: ${errorMessage(error)}`
            )
        }
    }
}

function outcomeOf(envelope: ResultEnvelope): InvocationOutcome {
    if (envelope.success) return 'ok'
    return errorCodeOf(envelope) === 'TimeoutError' ? 'timeout' : 'error'
}
