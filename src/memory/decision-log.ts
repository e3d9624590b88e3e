import type { CapabilityInvocation } from '../capabilities/types.js'
import type { FileSystem } from '../core/fs.js'
import { errorCodeOf } from '../capabilities/envelope.js'
import { errorMessage, type ErrorCode } from '../core/errors.js'
import { type Clock, type Phase, systemClock } from '../core/types.js'
import type { Logger } from '../logger/index.js'

export interface PhaseRecord {
    readonly phase: Phase
    readonly timestamp: string
    readonly rationale: string
    readonly invocations: readonly CapabilityInvocation[]
    readonly errorCode?: ErrorCode
}

/** On-disk layout of one decision-log line. Payload data is left out. */
export interface PersistedPhaseRecord {
    session_id: string
    timestamp: string
    phase: Phase
    rationale: string
    error_code?: ErrorCode
    invocations: Array<{
        capability: string
        arguments: Record<string, unknown>
        outcome: CapabilityInvocation['outcome']
        success: boolean
        message: string
        error_code?: ErrorCode
        duration_ms: number
    }>
}

export interface DecisionLogSink {
    append(record: PersistedPhaseRecord): Promise<void>
}

/** Appends one JSON line per record. Writes are chained so lines never interleave. */
export class JsonlDecisionSink implements DecisionLogSink {
    private queue: Promise<void> = Promise.resolve()

    constructor(
        private fs: FileSystem,
        private filePath: string
    ) {}

    append(record: PersistedPhaseRecord): Promise<void> {
        const write = this.queue.then(() => this.fs.appendText(this.filePath, `${JSON.stringify(record)}\n`))
        this.queue = write.catch(() => undefined)
        return write
    }
}

export interface DecisionLogOptions {
    sink?: DecisionLogSink
    logger?: Logger
    clock?: Clock
}

/** Append-only record of one session's phases. Records are frozen on append. */
export class DecisionLog {
    private records: PhaseRecord[] = []
    private clock: Clock

    constructor(
        readonly sessionId: string,
        private options: DecisionLogOptions = {}
    ) {
        this.clock = options.clock ?? systemClock
    }

    async append(
        phase: Phase,
        rationale: string,
        invocations: readonly CapabilityInvocation[] = [],
        errorCode?: ErrorCode
    ): Promise<PhaseRecord> {
        const record: PhaseRecord = Object.freeze({
            phase,
            timestamp: this.clock().toISOString(),
            rationale,
            invocations: Object.freeze([...invocations]),
            ...(errorCode ? { errorCode } : {}),
        })
        this.records.push(record)

        if (this.options.sink) {
            try {
                await this.options.sink.append(toPersisted(this.sessionId, record))
            } catch (error) {
                this.options.logger?.warn({ phase, error: errorMessage(error) }, 'Failed to persist decision record')
            }
        }
        return record
    }

    entries(): readonly PhaseRecord[] {
        return [...this.records]
    }

    get length(): number {
        return this.records.length
    }
}

export function toPersisted(sessionId: string, record: PhaseRecord): PersistedPhaseRecord {
    return {
        session_id: sessionId,
        timestamp: record.timestamp,
        phase: record.phase,
        rationale: record.rationale,
        ...(record.errorCode ? { error_code: record.errorCode } : {}),
        invocations: record.invocations.map((inv) => {
            const code = errorCodeOf(inv.envelope)
            return {
                capability: inv.capability,
                arguments: inv.arguments,
                outcome: inv.outcome,
                success: inv.envelope.success,
                message: inv.envelope.message,
                ...(code ? { error_code: code } : {}),
                duration_ms: inv.durationMs,
            }
        }),
    }
}
