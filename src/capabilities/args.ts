import { z } from 'zod'
import type { DateRange } from '../data/types.js'

const DAY_MS = 86_400_000

export const IsoDate = z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected a YYYY-MM-DD date')
    .refine((s) => !Number.isNaN(Date.parse(s)), 'not a valid calendar date')

export function rangeFields(defaultDaysBack: number) {
    return {
        start_date: IsoDate.optional().describe('Start date (YYYY-MM-DD, inclusive)'),
        end_date: IsoDate.optional().describe('End date (YYYY-MM-DD, inclusive)'),
        days_back: z
            .number()
            .int()
            .min(1)
            .max(3650)
            .default(defaultDaysBack)
            .describe(`Days to look back when no dates are given (default: ${defaultDaysBack})`),
    }
}

export function orderedDates<T extends { start_date?: string; end_date?: string }>(args: T): boolean {
    return !args.start_date || !args.end_date || args.start_date <= args.end_date
}

export const ORDERED_DATES_MESSAGE = { message: 'start_date must not be after end_date', path: ['start_date'] }

export function formatDay(date: Date): string {
    return date.toISOString().slice(0, 10)
}

/** Explicit dates win; with neither given, the last `days_back` days up to today. */
export function resolveRange(args: { start_date?: string; end_date?: string; days_back: number }, now: Date): DateRange {
    if (args.start_date || args.end_date) {
        return {
            ...(args.start_date ? { start: args.start_date } : {}),
            ...(args.end_date ? { end: args.end_date } : {}),
        }
    }
    return {
        start: formatDay(new Date(now.getTime() - args.days_back * DAY_MS)),
        end: formatDay(now),
    }
}

export function describeRange(range: DateRange): string {
    return `${range.start ?? 'the beginning'} to ${range.end ?? 'the latest record'}`
}
