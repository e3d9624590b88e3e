import type { CapabilityDefinition } from '../../capabilities/registry.js'
import type { ErrorCode } from '../../core/errors.js'
import type { MetricName, ModelKind, Phase, TerminationState } from '../../core/types.js'
import type { AccuracyMetrics } from '../../forecasting/types.js'
import type { FreshnessVerdict } from '../../freshness/gate.js'

export type Unknown = 'unknown'

export interface ModelPerformanceFact {
    kind: ModelKind
    trainedAt: string
    metrics: AccuracyMetrics
    primaryMetric: MetricName
}

export interface PriorSessionFact {
    goal: string
    state: TerminationState
    reason?: string
    modelKind?: ModelKind
    mape?: number
}

export interface SituationFacts {
    now: string
    freshness: FreshnessVerdict | Unknown
    modelPerformance: ModelPerformanceFact | Unknown
    priorSessions: PriorSessionFact[] | Unknown
}

export interface OutcomeNote {
    capability: string
    success: boolean
    message: string
    errorCode?: ErrorCode
    data?: unknown
}

/** One entry of the session's running context, in the order it happened. */
export interface SituationNote {
    iteration: number
    phase: Phase
    summary: string
    outcomes?: OutcomeNote[]
}

export interface SituationContext {
    goal: string
    facts: SituationFacts
    history: SituationNote[]
    availableCapabilities: CapabilityDefinition[]
}

export interface ProposeOptions {
    /** Set on the retry after a failed attempt: restate the output contract. */
    strict: boolean
    signal: AbortSignal
}

/**
 * Pluggable decision maker. Its output is untrusted and is always parsed and
 * validated before use, so implementations return the raw reply.
 */
export interface ReasoningOracle {
    propose(context: SituationContext, opts: ProposeOptions): Promise<unknown>
}
