import { z } from 'zod'
import type { FreshnessPolicy } from '../../config/schema.js'
import type { Clock } from '../../core/types.js'
import type { DataSource } from '../../data/types.js'
import { checkFreshness, describeStaleness } from '../../freshness/gate.js'
import { fail, succeed } from '../envelope.js'
import type { Capability } from '../types.js'

const FreshnessInput = z.object({})

const FreshnessOutput = z.object({
    latestKnownTimestamp: z.string(),
    earliestDate: z.string().nullable(),
    totalRows: z.number(),
    stalenessMs: z.number(),
    thresholdMs: z.number(),
    verdict: z.enum(['fresh', 'stale']),
})

type FreshnessOutput = z.infer<typeof FreshnessOutput>

export function createCheckFreshnessCapability(
    source: DataSource,
    policy: FreshnessPolicy,
    clock: Clock
): Capability<z.infer<typeof FreshnessInput>, FreshnessOutput> {
    return {
        name: 'check_data_freshness',
        description:
            'Check when demand data was last updated. Returns the latest timestamp, how old it is and whether it is stale. Call before forecasting.',
        parameters: FreshnessInput,
        result: FreshnessOutput,
        produces: 'status',
        async execute() {
            const latest = await source.latestTimestamp()
            if (!latest) {
                return fail('NoDataAvailable', 'The demand table holds no observations')
            }
            const summary = await source.summary()
            const verdict = checkFreshness(latest, clock(), policy)
            return succeed(
                {
                    ...verdict,
                    earliestDate: summary.earliest,
                    totalRows: summary.totalRows,
                },
                `Latest data: ${verdict.latestKnownTimestamp}, ${describeStaleness(verdict.stalenessMs)} old (${verdict.verdict})`
            )
        },
    }
}
