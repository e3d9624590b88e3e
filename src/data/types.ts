import type { SeriesPoint } from '../forecasting/types.js'

/**
 * One hourly observation. `date` and `hour` are as stored: hour-ending (1–24)
 * in the store's local time. `timestamp` is the start of that hour in UTC.
 */
export interface DemandObservation extends SeriesPoint {
    date: string
    hour: number
    marketDemand: number | null
}

/** Inclusive calendar-day bounds (YYYY-MM-DD). An absent bound is open. */
export interface DateRange {
    start?: string
    end?: string
}

export interface QueryFilters {
    limit?: number
}

export interface DataSummary {
    totalRows: number
    minDemand: number | null
    maxDemand: number | null
    avgDemand: number | null
    earliest: string | null
    latest: string | null
}

/** Opaque query interface over the demand store. Results are ordered by time. */
export interface DataSource {
    query(range: DateRange, filters?: QueryFilters): Promise<DemandObservation[]>
    latestTimestamp(): Promise<Date | null>
    summary(): Promise<DataSummary>
    close?(): Promise<void>
}

/** Start of hour-ending `hour` on `date`, for a store recording local time at a fixed UTC offset. */
export function observationTimestamp(date: string, hour: number, utcOffsetMinutes = 0): string {
    return new Date(Date.parse(`${date}T00:00:00.000Z`) + (hour - 1) * 3_600_000 - utcOffsetMinutes * 60_000).toISOString()
}
