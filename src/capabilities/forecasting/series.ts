import { err, ok, type Result } from '../../core/result.js'
import type { DataSource, DateRange, DemandObservation } from '../../data/types.js'
import type { TrainingWindow } from '../../forecasting/types.js'
import { emptyRangeFailure } from '../data/empty-range.js'
import type { FailureEnvelope } from '../types.js'

export interface LoadedSeries {
    observations: DemandObservation[]
    window: TrainingWindow
}

export async function loadSeries(source: DataSource, range: DateRange): Promise<Result<LoadedSeries, FailureEnvelope>> {
    const observations = await source.query(range)
    const first = observations[0]
    const last = observations[observations.length - 1]
    if (!first || !last) {
        return err(await emptyRangeFailure(source, range))
    }
    return ok({ observations, window: { start: first.timestamp, end: last.timestamp } })
}

export function formatMetric(value: number | undefined, suffix = ''): string {
    return value === undefined ? 'n/a' : `${value.toFixed(2)}${suffix}`
}
