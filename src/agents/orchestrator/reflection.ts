import { errorCodeOf } from '../../capabilities/envelope.js'
import type { CapabilityInvocation } from '../../capabilities/types.js'
import { ForecastOutputSchema } from '../../capabilities/forecasting/forecast-demand.js'
import type { ErrorCode } from '../../core/errors.js'
import type { ForecastResult } from '../../forecasting/types.js'

export interface ReflectionInput {
    invocations: readonly CapabilityInvocation[]
    /** Whether a capability's declared product is a forecast. */
    producesForecast: (capability: string) => boolean
    /** InternalCapabilityError count per capability earlier in the session. */
    priorInternalErrors: ReadonlyMap<string, number>
}

export type Reflection =
    | { next: 'DONE'; rationale: string; forecast: ForecastResult }
    | { next: 'ADAPT'; rationale: string; forecast?: ForecastResult }
    | { next: 'FAILED'; rationale: string; errorCode: ErrorCode; forecast?: ForecastResult }

/** Errors after which another REASON round cannot help. */
const UNRECOVERABLE: readonly ErrorCode[] = ['NoDataAvailable', 'NoModelAvailable', 'Aborted']

export function reflectOnOutcomes(input: ReflectionInput): Reflection {
    const { invocations } = input
    const failed = invocations.filter((i) => !i.envelope.success)
    const forecast = latestForecast(invocations, input.producesForecast)

    const internalErrors = new Map(input.priorInternalErrors)
    for (const inv of failed) {
        const code = errorCodeOf(inv.envelope)
        if (code && UNRECOVERABLE.includes(code)) {
            return {
                next: 'FAILED',
                rationale: `${inv.capability} failed with ${code}: ${inv.envelope.message}`,
                errorCode: code,
                ...(forecast ? { forecast } : {}),
            }
        }
        if (code !== 'InternalCapabilityError') continue
        const seen = (internalErrors.get(inv.capability) ?? 0) + 1
        internalErrors.set(inv.capability, seen)
        if (seen >= 2) {
            return {
                next: 'FAILED',
                rationale: `${inv.capability} failed unexpectedly twice in this session: ${inv.envelope.message}`,
                errorCode: code,
                ...(forecast ? { forecast } : {}),
            }
        }
    }

    if (forecast && failed.length === 0) {
        return {
            next: 'DONE',
            rationale: `Forecast ${forecast.id} produced with the ${forecast.candidate.kind} model`,
            forecast,
        }
    }

    const ok = invocations.length - failed.length
    const rationale =
        failed.length === 0
            ? `All ${ok} invocation(s) succeeded; no forecast produced yet`
            : `${failed.length} of ${invocations.length} invocation(s) failed: ${failed.map((f) => `${f.capability} (${errorCodeOf(f.envelope) ?? 'error'})`).join(', ')}`
    return { next: 'ADAPT', rationale, ...(forecast ? { forecast } : {}) }
}

function latestForecast(
    invocations: readonly CapabilityInvocation[],
    producesForecast: (capability: string) => boolean
): ForecastResult | undefined {
    let found: ForecastResult | undefined
    for (const inv of invocations) {
        if (!inv.envelope.success || !producesForecast(inv.capability)) continue
        const parsed = ForecastOutputSchema.safeParse(inv.envelope.data)
        if (parsed.success) found = parsed.data.forecast
    }
    return found
}
