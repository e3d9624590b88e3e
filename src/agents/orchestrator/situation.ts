import { z } from 'zod'
import { errorCodeOf } from '../../capabilities/envelope.js'
import type { CapabilityInvocation } from '../../capabilities/types.js'
import type { FreshnessPolicy } from '../../config/schema.js'
import type { MetricName } from '../../core/types.js'
import type { ModelCandidate } from '../../forecasting/types.js'
import { checkFreshness, describeStaleness, type FreshnessVerdict } from '../../freshness/gate.js'
import type { LedgerEntry } from '../../memory/performance-ledger.js'
import type { ModelPerformanceFact, OutcomeNote, PriorSessionFact, SituationFacts } from '../oracle/types.js'

const MAX_PREVIEW_CHARS = 4000

const FreshnessDataSchema = z.object({ latestKnownTimestamp: z.string() })

/** Recomputes the verdict from the timestamp a freshness capability reported. */
export function freshnessFromInvocation(
    invocation: CapabilityInvocation | undefined,
    now: Date,
    policy: FreshnessPolicy
): FreshnessVerdict | 'unknown' {
    if (!invocation?.envelope.success) return 'unknown'
    const parsed = FreshnessDataSchema.safeParse(invocation.envelope.data)
    if (!parsed.success) return 'unknown'
    const latest = new Date(parsed.data.latestKnownTimestamp)
    if (Number.isNaN(latest.getTime())) return 'unknown'
    return checkFreshness(latest, now, policy)
}

export function modelPerformanceFact(
    candidate: ModelCandidate | undefined,
    primaryMetric: MetricName
): ModelPerformanceFact | 'unknown' {
    if (!candidate) return 'unknown'
    return { kind: candidate.kind, trainedAt: candidate.trainedAt, metrics: { ...candidate.metrics }, primaryMetric }
}

export function priorSessionFacts(entries: readonly LedgerEntry[]): PriorSessionFact[] {
    return entries.map((e) => ({
        goal: e.goal,
        state: e.state,
        ...(e.reason ? { reason: e.reason } : {}),
        ...(e.forecast ? { modelKind: e.forecast.modelKind } : {}),
        ...(e.forecast?.mape !== undefined ? { mape: e.forecast.mape } : {}),
    }))
}

export function describeFacts(facts: SituationFacts): string {
    const parts: string[] = []
    parts.push(
        facts.freshness === 'unknown'
            ? 'freshness unknown'
            : `data ${facts.freshness.verdict} (${describeStaleness(facts.freshness.stalenessMs)} old)`
    )
    if (facts.modelPerformance === 'unknown') {
        parts.push('no trained model')
    } else {
        const { kind, metrics, primaryMetric } = facts.modelPerformance
        const value = metrics[primaryMetric]
        parts.push(`last model ${kind}${value === undefined ? '' : ` ${primaryMetric.toUpperCase()} ${value.toFixed(2)}`}`)
    }
    parts.push(facts.priorSessions === 'unknown' ? 'prior sessions unknown' : `${facts.priorSessions.length} prior session(s)`)
    return parts.join('; ')
}

export function outcomeNotes(invocations: readonly CapabilityInvocation[]): OutcomeNote[] {
    return invocations.map((inv) => {
        const code = errorCodeOf(inv.envelope)
        return {
            capability: inv.capability,
            success: inv.envelope.success,
            message: inv.envelope.message,
            ...(code ? { errorCode: code } : {}),
            ...(inv.envelope.success ? { data: preview(inv.envelope.data) } : {}),
        }
    })
}

/** Keeps oracle context bounded: large payloads are cut to a text prefix. */
export function preview(data: unknown): unknown {
    const json = JSON.stringify(data)
    if (json === undefined || json.length <= MAX_PREVIEW_CHARS) return data
    return `${json.slice(0, MAX_PREVIEW_CHARS)}... (truncated, ${json.length} chars)`
}
