import { z } from 'zod'
import type { DataSource } from '../../data/types.js'
import { IsoDate, ORDERED_DATES_MESSAGE, orderedDates } from '../args.js'
import { emptyRangeFailure } from '../data/empty-range.js'
import { succeed } from '../envelope.js'
import type { Capability } from '../types.js'
import { quantile, round2, sampleStd } from './statistics.js'

const StatisticsInput = z
    .object({
        start_date: IsoDate.describe('Start date (YYYY-MM-DD, inclusive)'),
        end_date: IsoDate.describe('End date (YYYY-MM-DD, inclusive)'),
    })
    .refine(orderedDates, ORDERED_DATES_MESSAGE)

type StatisticsInput = z.infer<typeof StatisticsInput>

const StatisticsOutput = z.object({
    hours: z.number(),
    mean_demand_mw: z.number(),
    median_demand_mw: z.number(),
    std_dev_mw: z.number(),
    min_demand_mw: z.number(),
    max_demand_mw: z.number(),
    percentiles: z.object({ p25: z.number(), p50: z.number(), p75: z.number(), p95: z.number() }),
    peak_hour: z.number(),
    peak_hour_avg_mw: z.number(),
    min_hour: z.number(),
    min_hour_avg_mw: z.number(),
})

type StatisticsOutput = z.infer<typeof StatisticsOutput>

export function createDemandStatisticsCapability(source: DataSource): Capability<StatisticsInput, StatisticsOutput> {
    return {
        name: 'calculate_demand_statistics',
        description:
            'Mean, median, standard deviation, percentiles and the hour of day (1-24, hour-ending) with the highest and lowest average demand',
        parameters: StatisticsInput,
        result: StatisticsOutput,
        produces: 'report',
        async execute(input) {
            const observations = await source.query({ start: input.start_date, end: input.end_date })
            if (observations.length === 0) {
                return emptyRangeFailure(source, { start: input.start_date, end: input.end_date })
            }

            const values = observations.map((o) => o.value)
            const sorted = [...values].sort((a, b) => a - b)

            const byHour = new Map<number, { total: number; count: number }>()
            for (const o of observations) {
                const bucket = byHour.get(o.hour) ?? { total: 0, count: 0 }
                bucket.total += o.value
                bucket.count++
                byHour.set(o.hour, bucket)
            }
            const hourly = [...byHour.entries()]
                .map(([hour, b]) => ({ hour, avg: b.total / b.count }))
                .sort((a, b) => a.hour - b.hour)
            const peak = hourly.reduce((best, h) => (h.avg > best.avg ? h : best))
            const trough = hourly.reduce((best, h) => (h.avg < best.avg ? h : best))

            return succeed(
                {
                    hours: values.length,
                    mean_demand_mw: round2(values.reduce((a, b) => a + b, 0) / values.length),
                    median_demand_mw: round2(quantile(sorted, 0.5)),
                    std_dev_mw: round2(sampleStd(values)),
                    min_demand_mw: sorted[0] ?? 0,
                    max_demand_mw: sorted[sorted.length - 1] ?? 0,
                    percentiles: {
                        p25: Math.trunc(quantile(sorted, 0.25)),
                        p50: Math.trunc(quantile(sorted, 0.5)),
                        p75: Math.trunc(quantile(sorted, 0.75)),
                        p95: Math.trunc(quantile(sorted, 0.95)),
                    },
                    peak_hour: peak.hour,
                    peak_hour_avg_mw: round2(peak.avg),
                    min_hour: trough.hour,
                    min_hour_avg_mw: round2(trough.avg),
                },
                `Statistics calculated for ${values.length} hours of data`
            )
        },
    }
}
