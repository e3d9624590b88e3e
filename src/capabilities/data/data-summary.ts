import { z } from 'zod'
import type { DataSource } from '../../data/types.js'
import { round2 } from '../analysis/statistics.js'
import { fail, succeed } from '../envelope.js'
import type { Capability } from '../types.js'

const SummaryInput = z.object({})

const SummaryOutput = z.object({
    total_rows: z.number(),
    min_demand_mw: z.number().nullable(),
    max_demand_mw: z.number().nullable(),
    avg_demand_mw: z.number().nullable(),
    earliest_date: z.string().nullable(),
    latest_date: z.string().nullable(),
})

type SummaryOutput = z.infer<typeof SummaryOutput>

export function createDataSummaryCapability(source: DataSource): Capability<z.infer<typeof SummaryInput>, SummaryOutput> {
    return {
        name: 'get_data_summary',
        description: 'Summarise the demand table: row count, min/max/average demand (MW) and the covered date range',
        parameters: SummaryInput,
        result: SummaryOutput,
        produces: 'report',
        async execute() {
            const summary = await source.summary()
            if (summary.totalRows === 0) {
                return fail('NoDataAvailable', 'The demand table holds no observations')
            }
            return succeed(
                {
                    total_rows: summary.totalRows,
                    min_demand_mw: summary.minDemand,
                    max_demand_mw: summary.maxDemand,
                    avg_demand_mw: summary.avgDemand === null ? null : round2(summary.avgDemand),
                    earliest_date: summary.earliest,
                    latest_date: summary.latest,
                },
                `${summary.totalRows} rows from ${summary.earliest} to ${summary.latest}`
            )
        },
    }
}
