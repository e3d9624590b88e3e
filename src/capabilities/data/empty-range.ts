import type { DataSource, DateRange } from '../../data/types.js'
import { describeRange } from '../args.js'
import { fail } from '../envelope.js'
import type { FailureEnvelope } from '../types.js'

/**
 * Failure for a range query that matched no rows. Only an empty store is
 * NoDataAvailable; otherwise the reply names the stored span so another
 * range can be planned.
 */
export async function emptyRangeFailure(source: DataSource, range: DateRange): Promise<FailureEnvelope> {
    const summary = await source.summary()
    if (summary.totalRows === 0 || !summary.earliest || !summary.latest) {
        return fail('NoDataAvailable', 'The demand table holds no observations', { range })
    }
    return fail(
        'InsufficientData',
        `No demand data found from ${describeRange(range)}; stored data covers ${summary.earliest} to ${summary.latest}`,
        { range, available: { start: summary.earliest, end: summary.latest } }
    )
}
