import { describe, expect, it } from 'vitest'
import { ConfigError } from '../../../src/core/errors.js'
import { PostgresDemandSource, type Queryable } from '../../../src/data/postgres-source.js'
import { silentLogger } from '../../helpers/logger.js'

class FakeDb implements Queryable {
    calls: Array<{ text: string; values?: unknown[] }> = []
    ended = false

    constructor(private rows: Record<string, unknown>[]) {}

    async query(text: string, values?: unknown[]): Promise<Record<string, unknown>[]> {
        this.calls.push({ text, values })
        return this.rows
    }

    async end(): Promise<void> {
        this.ended = true
    }
}

const TABLE = '"00_RAW"."00_IESO_DEMAND"'

describe('PostgresDemandSource', () => {
    it('rejects table names that are not plain identifiers', () => {
        expect(() => new PostgresDemandSource(new FakeDb([]), 'demand; DROP TABLE x', silentLogger())).toThrow(ConfigError)
    })

    it('binds the date range and limit as parameters', async () => {
        const db = new FakeDb([])
        const source = new PostgresDemandSource(db, TABLE, silentLogger())

        await source.query({ start: '2024-05-01', end: '2024-05-02' }, { limit: 10 })

        const call = db.calls[0]
        expect(call?.values).toEqual(['2024-05-01', '2024-05-02', 10])
        expect(call?.text).toContain(`FROM ${TABLE} WHERE "Date" >= $1 AND "Date" <= $2 ORDER BY "Date", "Hour" LIMIT $3`)
    })

    it('omits the WHERE clause for an open range', async () => {
        const db = new FakeDb([])
        await new PostgresDemandSource(db, TABLE, silentLogger()).query({})
        expect(db.calls[0]?.text).not.toContain('WHERE')
        expect(db.calls[0]?.values).toEqual([])
    })

    it('maps rows to hour-ending observations and drops malformed ones', async () => {
        const db = new FakeDb([
            { date: '2024-05-01', hour: 1, ontario_demand: '15000.5', market_demand: null },
            { date: '2024-05-01', hour: '24', ontario_demand: 14000, market_demand: '16000' },
            { date: '2024-05-01', hour: 25, ontario_demand: 1, market_demand: null },
        ])

        const rows = await new PostgresDemandSource(db, TABLE, silentLogger()).query({})

        expect(rows).toEqual([
            { date: '2024-05-01', hour: 1, timestamp: '2024-05-01T00:00:00.000Z', value: 15000.5, marketDemand: null },
            { date: '2024-05-01', hour: 24, timestamp: '2024-05-01T23:00:00.000Z', value: 14000, marketDemand: 16000 },
        ])
    })

    it('reads the latest timestamp, or null for an empty table', async () => {
        const latest = await new PostgresDemandSource(
            new FakeDb([{ date: '2024-05-02', hour: 24 }]),
            TABLE,
            silentLogger()
        ).latestTimestamp()
        expect(latest?.toISOString()).toBe('2024-05-02T23:00:00.000Z')

        expect(await new PostgresDemandSource(new FakeDb([]), TABLE, silentLogger()).latestTimestamp()).toBeNull()
    })

    it('converts the summary row', async () => {
        const db = new FakeDb([
            {
                total_rows: '48',
                min_demand: 1000,
                max_demand: '1047',
                avg_demand: '1023.5',
                earliest_date: '2024-05-01',
                latest_date: '2024-05-02',
            },
        ])
        expect(await new PostgresDemandSource(db, TABLE, silentLogger()).summary()).toEqual({
            totalRows: 48,
            minDemand: 1000,
            maxDemand: 1047,
            avgDemand: 1023.5,
            earliest: '2024-05-01',
            latest: '2024-05-02',
        })
    })

    it('shifts local hours to UTC by the configured offset', async () => {
        const db = new FakeDb([{ date: '2024-05-02', hour: 1, ontario_demand: 15000, market_demand: null }])
        const source = new PostgresDemandSource(db, TABLE, silentLogger(), -300)

        const [row] = await source.query({})
        expect(row?.timestamp).toBe('2024-05-02T05:00:00.000Z')
        expect(row?.hour).toBe(1)
    })

    it('reads the latest timestamp in UTC for an EST store', async () => {
        const source = new PostgresDemandSource(new FakeDb([{ date: '2024-05-02', hour: 24 }]), TABLE, silentLogger(), -300)
        expect((await source.latestTimestamp())?.toISOString()).toBe('2024-05-03T04:00:00.000Z')
    })

    it('ends the pool on close', async () => {
        const db = new FakeDb([])
        await new PostgresDemandSource(db, TABLE, silentLogger()).close()
        expect(db.ended).toBe(true)
    })
})
