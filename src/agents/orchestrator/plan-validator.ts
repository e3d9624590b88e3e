import type { CapabilityRegistry } from '../../capabilities/registry.js'
import type { InvocationRequest } from '../../capabilities/types.js'
import { err, ok, type Result } from '../../core/result.js'
import type { PlannedInvocation } from '../oracle/decision-parser.js'

export interface ScheduledInvocation {
    index: number
    request: InvocationRequest
    dependsOn: number[]
}

export interface PlanRejection {
    code: 'ValidationFailed' | 'CapabilityNotFound'
    message: string
}

/**
 * Checks a proposed plan against the registry contracts without executing
 * anything. All problems are reported together so the oracle can fix them in one go.
 */
export function validatePlan(
    invocations: readonly PlannedInvocation[],
    registry: CapabilityRegistry,
    maxInvocations: number
): Result<ScheduledInvocation[], PlanRejection> {
    if (invocations.length === 0) {
        return err({ code: 'ValidationFailed', message: 'Plan contains no invocations' })
    }
    if (invocations.length > maxInvocations) {
        return err({
            code: 'ValidationFailed',
            message: `Plan has ${invocations.length} invocations; at most ${maxInvocations} are allowed`,
        })
    }

    const problems: string[] = []
    let notFound = false
    const scheduled: ScheduledInvocation[] = []

    for (const [index, planned] of invocations.entries()) {
        const request: InvocationRequest = { capability: planned.capability_name, arguments: planned.arguments }
        const check = registry.validate(request)
        if (!check.ok) {
            if (check.error.code === 'CapabilityNotFound') notFound = true
            problems.push(`#${index}: ${check.error.message}`)
        }

        const dependsOn = [...new Set(planned.depends_on ?? [])]
        for (const dep of dependsOn) {
            if (dep >= index) {
                problems.push(`#${index}: depends_on ${dep} must refer to an earlier invocation`)
            }
        }
        scheduled.push({ index, request, dependsOn })
    }

    if (problems.length > 0) {
        return err({ code: notFound ? 'CapabilityNotFound' : 'ValidationFailed', message: problems.join('; ') })
    }
    return ok(scheduled)
}
