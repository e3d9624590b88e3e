import type { FreshnessPolicy } from '../config/schema.js'

export type Freshness = 'fresh' | 'stale'

export interface FreshnessVerdict {
    latestKnownTimestamp: string
    stalenessMs: number
    thresholdMs: number
    verdict: Freshness
}

export function thresholdMs(policy: FreshnessPolicy): number {
    return policy.expectedIntervalMinutes * 60_000 * policy.staleMultiplier
}

/**
 * Stale only when the gap since the latest observation exceeds the threshold.
 * A timestamp in the future counts as zero staleness.
 */
export function checkFreshness(latestKnownTimestamp: Date, now: Date, policy: FreshnessPolicy): FreshnessVerdict {
    const stalenessMs = Math.max(now.getTime() - latestKnownTimestamp.getTime(), 0)
    const limit = thresholdMs(policy)
    return {
        latestKnownTimestamp: latestKnownTimestamp.toISOString(),
        stalenessMs,
        thresholdMs: limit,
        verdict: stalenessMs > limit ? 'stale' : 'fresh',
    }
}

export function describeStaleness(ms: number): string {
    const minutes = Math.round(ms / 60_000)
    if (minutes < 60) return `${minutes}m`
    const hours = Math.floor(minutes / 60)
    if (hours < 48) return `${hours}h ${minutes % 60}m`
    return `${Math.floor(hours / 24)}d ${hours % 24}h`
}
