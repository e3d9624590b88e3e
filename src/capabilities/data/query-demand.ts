import { z } from 'zod'
import type { Clock } from '../../core/types.js'
import type { DataSource } from '../../data/types.js'
import { round2 } from '../analysis/statistics.js'
import { describeRange, ORDERED_DATES_MESSAGE, orderedDates, rangeFields, resolveRange } from '../args.js'
import { succeed } from '../envelope.js'
import type { Capability } from '../types.js'
import { emptyRangeFailure } from './empty-range.js'

const QueryInput = z
    .object({
        ...rangeFields(7),
        limit: z.number().int().min(1).max(1000).default(100).describe('Maximum records to include in the preview (default: 100)'),
    })
    .refine(orderedDates, ORDERED_DATES_MESSAGE)

type QueryInput = z.infer<typeof QueryInput>

const QueryOutput = z.object({
    records: z.array(
        z.object({
            timestamp: z.string(),
            date: z.string(),
            hour: z.number(),
            demand_mw: z.number(),
            market_demand_mw: z.number().nullable(),
        })
    ),
    record_count: z.number(),
    date_range: z.object({ start: z.string(), end: z.string() }),
    avg_demand_mw: z.number(),
    peak_demand_mw: z.number(),
    min_demand_mw: z.number(),
})

type QueryOutput = z.infer<typeof QueryOutput>

export function createQueryDemandCapability(source: DataSource, clock: Clock): Capability<QueryInput, QueryOutput> {
    return {
        name: 'query_demand_data',
        description:
            'Query hourly electricity demand for a date range. Without dates, returns the last `days_back` days. Includes average, peak and minimum demand.',
        parameters: QueryInput,
        result: QueryOutput,
        produces: 'series',
        async execute(input) {
            const range = resolveRange(input, clock())
            const observations = await source.query(range)
            const first = observations[0]
            const last = observations[observations.length - 1]
            if (!first || !last) {
                return emptyRangeFailure(source, range)
            }

            const values = observations.map((o) => o.value)
            return succeed(
                {
                    records: observations.slice(0, input.limit).map((o) => ({
                        timestamp: o.timestamp,
                        date: o.date,
                        hour: o.hour,
                        demand_mw: o.value,
                        market_demand_mw: o.marketDemand,
                    })),
                    record_count: observations.length,
                    date_range: { start: first.timestamp, end: last.timestamp },
                    avg_demand_mw: round2(values.reduce((a, b) => a + b, 0) / values.length),
                    peak_demand_mw: values.reduce((a, b) => Math.max(a, b)),
                    min_demand_mw: values.reduce((a, b) => Math.min(a, b)),
                },
                `Retrieved ${observations.length} hourly demand records from ${describeRange(range)}`,
                { range, truncated: observations.length > input.limit }
            )
        },
    }
}
