import { z } from 'zod'
import type { MetricName, ModelKind } from '../core/types.js'

export interface SeriesPoint {
    /** ISO-8601 instant at which the observation period starts. */
    timestamp: string
    value: number
}

export interface TrainingWindow {
    start: string
    end: string
}

export type AccuracyMetrics = Partial<Record<MetricName | 'intervalWidthVariance', number>>

export interface ModelCandidate {
    readonly id: string
    readonly kind: ModelKind
    readonly target: string
    readonly window: TrainingWindow
    readonly trainedAt: string
    readonly stepMs: number
    readonly params: Readonly<Record<string, unknown>>
    readonly metrics: Readonly<AccuracyMetrics>
}

export interface ForecastPoint {
    timestamp: string
    estimate: number
    lower: number
    upper: number
}

export interface ForecastResult {
    readonly id: string
    readonly candidate: ModelCandidate
    readonly horizon: number
    readonly points: readonly ForecastPoint[]
    readonly generatedAt: string
}

export interface Prediction {
    point: number[]
    /** Absent when the model has no native uncertainty model. */
    interval?: { lower: number[]; upper: number[] }
}

/** A trained model. Deterministic: the same horizon always yields the same prediction. */
export interface FittedModel {
    params: Record<string, unknown>
    /** In-sample errors, used for residual-spread bounds when the model has no native interval. */
    residuals: number[]
    predict(horizon: number): Prediction
}

/** Black-box fit/predict component for one model kind. */
export interface ForecastModel {
    readonly kind: ModelKind
    /** Fewest observations `fit` accepts. */
    minimumPoints(): number
    fit(values: readonly number[]): FittedModel
}

export const AccuracyMetricsSchema = z.object({
    mape: z.number().optional(),
    rmse: z.number().optional(),
    mae: z.number().optional(),
    intervalWidthVariance: z.number().optional(),
})

export const ModelCandidateSchema = z.object({
    id: z.string(),
    kind: z.enum(['seasonal', 'autoregressive', 'naive']),
    target: z.string(),
    window: z.object({ start: z.string(), end: z.string() }),
    trainedAt: z.string(),
    stepMs: z.number(),
    params: z.record(z.unknown()),
    metrics: AccuracyMetricsSchema,
})

export const ForecastResultSchema = z.object({
    id: z.string(),
    candidate: ModelCandidateSchema,
    horizon: z.number().int().positive(),
    points: z.array(
        z.object({
            timestamp: z.string(),
            estimate: z.number(),
            lower: z.number(),
            upper: z.number(),
        })
    ),
    generatedAt: z.string(),
})
