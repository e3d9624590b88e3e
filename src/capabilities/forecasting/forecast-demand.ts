import { z } from 'zod'
import type { ForecastingPolicy } from '../../config/schema.js'
import { type ErrorCode, isErrorCode } from '../../core/errors.js'
import type { Clock } from '../../core/types.js'
import type { DataSource } from '../../data/types.js'
import type { ForecastModelManager, TrainingAttempt } from '../../forecasting/model-manager.js'
import { AccuracyMetricsSchema, type ForecastResult, ForecastResultSchema } from '../../forecasting/types.js'
import { ORDERED_DATES_MESSAGE, orderedDates, rangeFields, resolveRange } from '../args.js'
import { fail, succeed } from '../envelope.js'
import type { Capability } from '../types.js'
import { formatMetric, loadSeries } from './series.js'

const KindSchema = z.enum(['seasonal', 'autoregressive', 'naive'])

export const TrainingAttemptSchema = z.object({
    kind: KindSchema,
    status: z.enum(['trained', 'failed']),
    candidateId: z.string().optional(),
    metrics: AccuracyMetricsSchema.optional(),
    errorCode: z.custom<ErrorCode>(isErrorCode).optional(),
    message: z.string().optional(),
})

export const ForecastOutputSchema = z.object({
    forecast: ForecastResultSchema,
    strategy: z.enum(['fallback', 'compete']),
    attempts: z.array(TrainingAttemptSchema),
})

export interface ForecastOutput {
    forecast: ForecastResult
    strategy: 'fallback' | 'compete'
    attempts: TrainingAttempt[]
}

function forecastInput(policy: ForecastingPolicy) {
    return z
        .object({
            horizon: z
                .number()
                .int()
                .min(1)
                .max(policy.maxHorizon)
                .default(policy.defaultHorizon)
                .describe(`Hours ahead to forecast (1-${policy.maxHorizon}, default: ${policy.defaultHorizon})`),
            strategy: z
                .enum(['fallback', 'compete'])
                .optional()
                .describe('fallback: first model kind that trains; compete: train all and pick the most accurate'),
            ...rangeFields(28),
        })
        .refine(orderedDates, ORDERED_DATES_MESSAGE)
}

type ForecastInput = z.infer<ReturnType<typeof forecastInput>>

/**
 * The consolidated "produce a forecast" capability. Internal fallback steps
 * never surface as separate outcomes; they are listed in `metadata.attempts`.
 */
export function createForecastDemandCapability(
    source: DataSource,
    manager: ForecastModelManager,
    policy: ForecastingPolicy,
    clock: Clock
): Capability<ForecastInput, ForecastOutput> {
    return {
        name: 'forecast_demand',
        description:
            'Forecast hourly electricity demand. Trains models along the fallback chain (seasonal, autoregressive, naive) on recent history and returns point estimates with lower/upper bounds.',
        parameters: forecastInput(policy),
        result: ForecastOutputSchema,
        produces: 'forecast',
        async execute(input, ctx) {
            const loaded = await loadSeries(source, resolveRange(input, clock()))
            if (!loaded.ok) return loaded.error

            const strategy = input.strategy ?? policy.strategy
            const produced = await manager.produceForecast(loaded.value.observations, input.horizon, {
                strategy,
                signal: ctx.signal,
            })
            if (!produced.ok) {
                const { code, message, attempts } = produced.error
                return fail(code, message, { attempts, strategy })
            }

            const { forecast, attempts } = produced.value
            const candidate = forecast.candidate
            return succeed(
                { forecast, strategy, attempts },
                `Forecast ${forecast.horizon}h ahead with the ${candidate.kind} model (MAPE ${formatMetric(candidate.metrics.mape, '%')})`,
                { attempts, strategy, modelKind: candidate.kind, candidateId: candidate.id }
            )
        },
    }
}
