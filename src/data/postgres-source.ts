import type pg from 'pg'
import { z } from 'zod'
import { ConfigError } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import { type DataSource, type DataSummary, type DateRange, type DemandObservation, observationTimestamp, type QueryFilters } from './types.js'

/** The slice of a pg pool the source needs; tests substitute an in-process fake. */
export interface Queryable {
    query(text: string, values?: unknown[]): Promise<Record<string, unknown>[]>
    end(): Promise<void>
}

export function createPgQueryable(pool: pg.Pool): Queryable {
    return {
        async query(text, values) {
            const result = await pool.query<Record<string, unknown>>(text, values)
            return result.rows
        },
        end: () => pool.end(),
    }
}

const TABLE_PATTERN = /^("[^"]+"|\w+)(\.("[^"]+"|\w+))?$/

const numeric = z.union([z.number(), z.string().regex(/^-?\d+(\.\d+)?$/)]).transform(Number)

const DemandRowSchema = z.object({
    date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
    hour: numeric.pipe(z.number().int().min(1).max(24)),
    ontario_demand: numeric,
    market_demand: numeric.nullable(),
})

const LatestRowSchema = DemandRowSchema.pick({ date: true, hour: true })

const SummaryRowSchema = z.object({
    total_rows: numeric,
    min_demand: numeric.nullable(),
    max_demand: numeric.nullable(),
    avg_demand: numeric.nullable(),
    earliest_date: z.string().nullable(),
    latest_date: z.string().nullable(),
})

export class PostgresDemandSource implements DataSource {
    private table: string

    constructor(
        private db: Queryable,
        table: string,
        private logger: Logger,
        /** Offset of the store's local clock; IESO publishes Eastern Standard Time all year. */
        private utcOffsetMinutes = 0
    ) {
        if (!TABLE_PATTERN.test(table)) {
            throw new ConfigError(`Invalid demand table identifier: ${table}`)
        }
        this.table = table
    }

    async query(range: DateRange, filters: QueryFilters = {}): Promise<DemandObservation[]> {
        const clauses: string[] = []
        const values: unknown[] = []
        if (range.start) {
            values.push(range.start)
            clauses.push(`"Date" >= $${values.length}`)
        }
        if (range.end) {
            values.push(range.end)
            clauses.push(`"Date" <= $${values.length}`)
        }

        let sql =
            `SELECT to_char("Date", 'YYYY-MM-DD') AS date, "Hour" AS hour, ` +
            `"Ontario_Demand" AS ontario_demand, "Market_Demand" AS market_demand FROM ${this.table}`
        if (clauses.length > 0) sql += ` WHERE ${clauses.join(' AND ')}`
        sql += ' ORDER BY "Date", "Hour"'
        if (filters.limit !== undefined) {
            values.push(filters.limit)
            sql += ` LIMIT $${values.length}`
        }

        const rows = await this.db.query(sql, values)
        const observations: DemandObservation[] = []
        let rejected = 0
        for (const row of rows) {
            const parsed = DemandRowSchema.safeParse(row)
            if (!parsed.success) {
                rejected++
                continue
            }
            const { date, hour, ontario_demand, market_demand } = parsed.data
            observations.push({
                date,
                hour,
                timestamp: observationTimestamp(date, hour, this.utcOffsetMinutes),
                value: ontario_demand,
                marketDemand: market_demand,
            })
        }
        if (rejected > 0) {
            this.logger.warn({ rejected, table: this.table }, 'Dropped malformed demand rows')
        }
        return observations
    }

    async latestTimestamp(): Promise<Date | null> {
        const rows = await this.db.query(
            `SELECT to_char("Date", 'YYYY-MM-DD') AS date, "Hour" AS hour FROM ${this.table} ORDER BY "Date" DESC, "Hour" DESC LIMIT 1`
        )
        const parsed = LatestRowSchema.safeParse(rows[0])
        if (!parsed.success) return null
        return new Date(observationTimestamp(parsed.data.date, parsed.data.hour, this.utcOffsetMinutes))
    }

    async summary(): Promise<DataSummary> {
        const rows = await this.db.query(
            `SELECT COUNT(*) AS total_rows, MIN("Ontario_Demand") AS min_demand, MAX("Ontario_Demand") AS max_demand, ` +
                `AVG("Ontario_Demand") AS avg_demand, to_char(MIN("Date"), 'YYYY-MM-DD') AS earliest_date, ` +
                `to_char(MAX("Date"), 'YYYY-MM-DD') AS latest_date FROM ${this.table}`
        )
        const row = SummaryRowSchema.parse(rows[0])
        return {
            totalRows: row.total_rows,
            minDemand: row.min_demand,
            maxDemand: row.max_demand,
            avgDemand: row.avg_demand,
            earliest: row.earliest_date,
            latest: row.latest_date,
        }
    }

    async close(): Promise<void> {
        await this.db.end()
    }
}
