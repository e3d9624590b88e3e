import { z } from 'zod'
import { err, ok, type Result } from '../../core/result.js'

const PlannedInvocationSchema = z.object({
    capability_name: z.string().min(1),
    arguments: z.record(z.unknown()).default({}),
    depends_on: z.array(z.number().int().nonnegative()).optional(),
})

const TerminationSchema = z.object({
    done: z.literal(true),
    summary: z.string().min(1),
})

const PlanSchema = z.object({
    done: z.literal(false),
    rationale: z.string().optional(),
    invocations: z.array(PlannedInvocationSchema),
})

const DecisionSchema = z.discriminatedUnion('done', [TerminationSchema, PlanSchema])

export type PlannedInvocation = z.infer<typeof PlannedInvocationSchema>
export type TerminationDecision = z.infer<typeof TerminationSchema>
export type PlanDecision = z.infer<typeof PlanSchema>
export type Decision = z.infer<typeof DecisionSchema>

export function extractJSON(raw: unknown): unknown {
    if (raw === null || raw === undefined) return null
    if (typeof raw !== 'string') return raw

    const fenced = raw.match(/```(?:json)?\s*([\s\S]*?)```/)
    const str = fenced?.[1] ?? raw

    try {
        return JSON.parse(str)
    } catch (error) {
        if (!(error instanceof SyntaxError)) throw error
    }

    // fall back to the first balanced object in surrounding prose
    const startIdx = str.indexOf('{')
    if (startIdx === -1) return null

    let depth = 0
    let inString = false
    for (let i = startIdx; i < str.length; i++) {
        const ch = str[i]
        if (inString) {
            if (ch === '\\') i++
            else if (ch === '"') inString = false
            continue
        }
        if (ch === '"') inString = true
        else if (ch === '{') depth++
        else if (ch === '}') depth--
        if (depth === 0) {
            try {
                return JSON.parse(str.slice(startIdx, i + 1))
            } catch (error) {
                if (error instanceof SyntaxError) return null
                throw error
            }
        }
    }
    return null
}

/** Structural check only; capability names and arguments are checked in PLAN. */
export function parseDecision(raw: unknown): Result<Decision, string> {
    const parsed = extractJSON(raw)
    if (parsed === null || typeof parsed !== 'object') {
        return err('Oracle reply is not a JSON object')
    }
    const result = DecisionSchema.safeParse(parsed)
    if (!result.success) {
        const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
        return err(`Oracle reply does not match the decision format: ${issues}`)
    }
    return ok(result.data)
}
