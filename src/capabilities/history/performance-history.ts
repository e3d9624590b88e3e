import { z } from 'zod'
import { LedgerEntrySchema, type PerformanceLedger } from '../../memory/performance-ledger.js'
import { succeed } from '../envelope.js'
import type { Capability } from '../types.js'

const HistoryInput = z.object({
    limit: z.number().int().min(1).max(100).default(10).describe('Number of recent sessions (default: 10)'),
})

type HistoryInput = z.infer<typeof HistoryInput>

const HistoryOutput = z.object({
    sessions: z.array(LedgerEntrySchema),
    total: z.number(),
})

type HistoryOutput = z.infer<typeof HistoryOutput>

export function createPerformanceHistoryCapability(ledger: PerformanceLedger): Capability<HistoryInput, HistoryOutput> {
    return {
        name: 'get_performance_history',
        description: 'Recent agent sessions with their outcome, model used and forecast accuracy, newest first',
        parameters: HistoryInput,
        result: HistoryOutput,
        produces: 'report',
        async execute(input) {
            const sessions = ledger.recent(input.limit)
            const succeeded = sessions.filter((s) => s.state === 'succeeded').length
            return succeed(
                { sessions, total: ledger.recent(Number.MAX_SAFE_INTEGER).length },
                sessions.length === 0
                    ? 'No previous sessions recorded'
                    : `${sessions.length} recent sessions, ${succeeded} succeeded`
            )
        },
    }
}
