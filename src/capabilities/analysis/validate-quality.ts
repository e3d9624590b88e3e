import { z } from 'zod'
import type { FreshnessPolicy } from '../../config/schema.js'
import type { DataSource } from '../../data/types.js'
import { IsoDate, ORDERED_DATES_MESSAGE, orderedDates } from '../args.js'
import { emptyRangeFailure } from '../data/empty-range.js'
import { succeed } from '../envelope.js'
import type { Capability } from '../types.js'
import { round2, sampleStd } from './statistics.js'

const HOUR_MS = 3_600_000
const MIN_COMPLETENESS_PCT = 95
const MAX_OUTLIER_SHARE = 0.01
const OUTLIER_SIGMAS = 3

const QualityInput = z
    .object({
        start_date: IsoDate.describe('Start date (YYYY-MM-DD, inclusive)'),
        end_date: IsoDate.describe('End date (YYYY-MM-DD, inclusive)'),
    })
    .refine(orderedDates, ORDERED_DATES_MESSAGE)

type QualityInput = z.infer<typeof QualityInput>

const QualityOutput = z.object({
    is_valid: z.boolean(),
    expected_hours: z.number(),
    actual_hours: z.number(),
    missing_hours: z.number(),
    completeness_pct: z.number(),
    outlier_count: z.number(),
    gap_count: z.number(),
    has_gaps: z.boolean(),
    issues: z.array(z.string()),
})

type QualityOutput = z.infer<typeof QualityOutput>

export function createValidateQualityCapability(
    source: DataSource,
    policy: FreshnessPolicy
): Capability<QualityInput, QualityOutput> {
    return {
        name: 'validate_data_quality',
        description:
            'Check demand data for a date range: missing hours, completeness, outliers beyond 3 standard deviations and time gaps. Run before training.',
        parameters: QualityInput,
        result: QualityOutput,
        produces: 'report',
        async execute(input) {
            const observations = await source.query({ start: input.start_date, end: input.end_date })
            if (observations.length === 0) {
                return emptyRangeFailure(source, { start: input.start_date, end: input.end_date })
            }

            const days = (Date.parse(input.end_date) - Date.parse(input.start_date)) / 86_400_000 + 1
            const expected = Math.round(days * 24)
            const actual = observations.length
            const missing = Math.max(expected - actual, 0)
            const completeness = Math.min((actual / expected) * 100, 100)

            const values = observations.map((o) => o.value)
            const mean = values.reduce((a, b) => a + b, 0) / values.length
            const std = sampleStd(values)
            const outliers = std === 0 ? 0 : values.filter((v) => Math.abs(v - mean) > OUTLIER_SIGMAS * std).length

            const maxStep = policy.staleMultiplier * policy.expectedIntervalMinutes * 60_000
            let gaps = 0
            for (let i = 1; i < observations.length; i++) {
                const prev = observations[i - 1]
                const curr = observations[i]
                if (prev && curr && Date.parse(curr.timestamp) - Date.parse(prev.timestamp) > maxStep) gaps++
            }

            const issues: string[] = []
            if (missing > 0) issues.push(`${missing} missing hours out of ${expected} expected`)
            if (outliers > 0) issues.push(`${outliers} outlier values detected`)
            if (gaps > 0) issues.push(`${gaps} time gaps detected (longer than ${maxStep / HOUR_MS}h)`)

            const isValid = completeness >= MIN_COMPLETENESS_PCT && outliers < actual * MAX_OUTLIER_SHARE
            return succeed(
                {
                    is_valid: isValid,
                    expected_hours: expected,
                    actual_hours: actual,
                    missing_hours: missing,
                    completeness_pct: round2(completeness),
                    outlier_count: outliers,
                    gap_count: gaps,
                    has_gaps: gaps > 0,
                    issues: issues.length > 0 ? issues : ['No quality issues detected'],
                },
                isValid ? 'Data validation passed' : `Data validation found problems: ${issues.join('; ')}`
            )
        },
    }
}
