import { randomUUID } from 'node:crypto'
import { z } from 'zod'
import type { FileSystem } from '../core/fs.js'
import { type ErrorCode, errorMessage, isErrorCode } from '../core/errors.js'
import { type Clock, systemClock } from '../core/types.js'
import type { Logger } from '../logger/index.js'

export const LedgerEntrySchema = z.object({
    id: z.string(),
    recordedAt: z.string(),
    sessionId: z.string(),
    goal: z.string(),
    state: z.enum(['running', 'succeeded', 'failed', 'aborted']),
    iterations: z.number().int().nonnegative(),
    reason: z.string().optional(),
    errorCode: z.custom<ErrorCode>(isErrorCode).optional(),
    forecast: z
        .object({
            id: z.string(),
            modelKind: z.enum(['seasonal', 'autoregressive', 'naive']),
            horizon: z.number().int().positive(),
            mape: z.number().optional(),
        })
        .optional(),
    correctsId: z.string().optional(),
    note: z.string().optional(),
})

export type LedgerEntry = z.infer<typeof LedgerEntrySchema>

export type NewLedgerEntry = Omit<LedgerEntry, 'id' | 'recordedAt' | 'correctsId'>

export type LedgerCorrection = Partial<Pick<LedgerEntry, 'state' | 'reason' | 'errorCode' | 'note'>>

export interface LedgerOptions {
    filePath?: string
    logger?: Logger
    clock?: Clock
    idGenerator?: () => string
}

/**
 * Process-wide, append-only history of terminal session summaries.
 * Entries are never rewritten; a correction is a new entry pointing at the one it corrects.
 */
export class PerformanceLedger {
    private items: LedgerEntry[] = []
    private queue: Promise<void> = Promise.resolve()
    private clock: Clock
    private nextId: () => string

    constructor(
        private fs: FileSystem,
        private options: LedgerOptions = {}
    ) {
        this.clock = options.clock ?? systemClock
        this.nextId = options.idGenerator ?? randomUUID
    }

    async load(): Promise<number> {
        const file = this.options.filePath
        if (!file || !(await this.fs.exists(file))) return 0

        const lines = (await this.fs.readText(file)).split('\n').filter((l) => l.trim())
        let skipped = 0
        for (const line of lines) {
            const parsed = parseLine(line)
            if (parsed) this.items.push(parsed)
            else skipped++
        }
        if (skipped > 0) {
            this.options.logger?.warn({ file, skipped }, 'Skipped unreadable ledger lines')
        }
        return this.items.length
    }

    async append(entry: NewLedgerEntry): Promise<LedgerEntry> {
        return this.commit({ ...entry, id: this.nextId(), recordedAt: this.clock().toISOString() })
    }

    async correct(entryId: string, patch: LedgerCorrection): Promise<LedgerEntry | undefined> {
        const current = this.resolve(entryId)
        if (!current) return undefined
        return this.commit({
            ...current,
            ...patch,
            id: this.nextId(),
            recordedAt: this.clock().toISOString(),
            correctsId: current.correctsId ?? current.id,
        })
    }

    entries(): readonly LedgerEntry[] {
        return [...this.items]
    }

    /** Newest first, with each original replaced by its latest correction. */
    recent(limit: number): LedgerEntry[] {
        const effective = new Map<string, LedgerEntry>()
        for (const entry of this.items) {
            effective.set(entry.correctsId ?? entry.id, entry)
        }
        const originals = this.items.filter((e) => !e.correctsId)
        return originals
            .map((e) => effective.get(e.id) ?? e)
            .reverse()
            .slice(0, limit)
    }

    /** Resolves once every pending write has been attempted. */
    flush(): Promise<void> {
        return this.queue
    }

    private resolve(entryId: string): LedgerEntry | undefined {
        const target = this.items.find((e) => e.id === entryId)
        if (!target) return undefined
        const rootId = target.correctsId ?? target.id
        return this.items.filter((e) => e.id === rootId || e.correctsId === rootId).at(-1)
    }

    private async commit(entry: LedgerEntry): Promise<LedgerEntry> {
        const frozen = Object.freeze(entry)
        this.items.push(frozen)

        const file = this.options.filePath
        if (file) {
            this.queue = this.queue
                .then(() => this.fs.appendText(file, `${JSON.stringify(frozen)}\n`))
                .catch((error: unknown) => {
                    this.options.logger?.warn({ file, error: errorMessage(error) }, 'Failed to persist ledger entry')
                })
            await this.queue
        }
        return frozen
    }
}

function parseLine(line: string): LedgerEntry | undefined {
    try {
        const result = LedgerEntrySchema.safeParse(JSON.parse(line))
        return result.success ? result.data : undefined
    } catch (error) {
        if (error instanceof SyntaxError) return undefined
        throw error
    }
}
