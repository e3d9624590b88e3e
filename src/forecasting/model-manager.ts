import { randomUUID } from 'node:crypto'
import type { ForecastingPolicy, ForecastStrategy } from '../config/schema.js'
import { errorMessage, type ErrorCode } from '../core/errors.js'
import { KeyedMutex } from '../core/mutex.js'
import { err, ok, type Result } from '../core/result.js'
import { type Clock, type ModelKind, systemClock } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import { computeMetrics, rootMeanSquare } from './metrics.js'
import type {
    AccuracyMetrics,
    FittedModel,
    ForecastModel,
    ForecastPoint,
    ForecastResult,
    ModelCandidate,
    SeriesPoint,
    TrainingWindow,
} from './types.js'

const HOUR_MS = 3_600_000

export interface ForecastFailure {
    code: ErrorCode
    message: string
}

export interface TrainingAttempt {
    kind: ModelKind
    status: 'trained' | 'failed'
    candidateId?: string
    metrics?: AccuracyMetrics
    errorCode?: ErrorCode
    message?: string
}

export interface ProducedForecast {
    forecast: ForecastResult
    attempts: TrainingAttempt[]
    ranking: ModelCandidate[]
}

export interface ProduceForecastOptions {
    target?: string
    strategy?: ForecastStrategy
    signal?: AbortSignal
}

export interface ModelManagerOptions {
    models: Record<ModelKind, ForecastModel>
    clock?: Clock
    idGenerator?: () => string
    logger?: Logger
}

/**
 * Owns the candidate registry. Training and selection for one target are
 * serialized; evaluation and forecasting against a held candidate are not.
 */
export class ForecastModelManager {
    private registry = new Map<string, ModelCandidate[]>()
    private fitted = new WeakMap<ModelCandidate, FittedModel>()
    private locks = new KeyedMutex()
    private clock: Clock
    private nextId: () => string

    constructor(
        private policy: ForecastingPolicy,
        private options: ModelManagerOptions
    ) {
        this.clock = options.clock ?? systemClock
        this.nextId = options.idGenerator ?? randomUUID
    }

    get chain(): readonly ModelKind[] {
        return this.policy.chain
    }

    /** Fits one kind on the points inside `window` and registers the candidate. */
    async train(
        series: readonly SeriesPoint[],
        window: TrainingWindow,
        kind: ModelKind,
        opts: { target?: string; signal?: AbortSignal } = {}
    ): Promise<Result<ModelCandidate, ForecastFailure>> {
        const target = opts.target ?? 'demand'
        return this.locks.runExclusive(target, async () => this.trainUnlocked(series, window, kind, target, opts.signal))
    }

    /**
     * Scores a candidate against the observations that follow its training
     * window. Pure: the same candidate and holdout always give the same metrics.
     */
    evaluate(candidate: ModelCandidate, holdout: readonly number[]): Result<AccuracyMetrics, ForecastFailure> {
        const model = this.fitted.get(candidate)
        if (!model) {
            return err({ code: 'NoModelAvailable', message: `Candidate ${candidate.id} is not registered` })
        }
        if (holdout.length === 0) {
            return err({ code: 'InsufficientData', message: 'Holdout is empty' })
        }
        const prediction = model.predict(holdout.length)
        const bounds = this.resolveBounds(model, prediction.point, prediction.interval)
        return ok(computeMetrics(holdout, prediction.point, bounds))
    }

    /** Ascending by the primary metric, then by interval-width variance. Missing values rank last. */
    rank(candidates: readonly ModelCandidate[]): ModelCandidate[] {
        const metric = this.policy.primaryMetric
        const score = (c: ModelCandidate) => c.metrics[metric] ?? Number.POSITIVE_INFINITY
        const spread = (c: ModelCandidate) => c.metrics.intervalWidthVariance ?? Number.POSITIVE_INFINITY
        return [...candidates].sort((a, b) => {
            const byMetric = compare(score(a), score(b))
            return byMetric !== 0 ? byMetric : compare(spread(a), spread(b))
        })
    }

    selectBest(candidates: readonly ModelCandidate[]): Result<ModelCandidate, ForecastFailure> {
        const best = this.rank(candidates)[0]
        if (!best) {
            return err({ code: 'NoModelAvailable', message: 'No trained model candidate is available' })
        }
        return ok(best)
    }

    forecast(candidate: ModelCandidate, horizon: number): Result<ForecastResult, ForecastFailure> {
        const model = this.fitted.get(candidate)
        if (!model || !this.isRegistered(candidate)) {
            return err({ code: 'NoModelAvailable', message: `Candidate ${candidate.id} is no longer registered` })
        }
        if (!Number.isInteger(horizon) || horizon < 1 || horizon > this.policy.maxHorizon) {
            return err({
                code: 'ValidationFailed',
                message: `Horizon must be an integer between 1 and ${this.policy.maxHorizon}, got ${horizon}`,
            })
        }

        const prediction = model.predict(horizon)
        const bounds = this.resolveBounds(model, prediction.point, prediction.interval)
        const origin = Date.parse(candidate.window.end)

        const points: ForecastPoint[] = prediction.point.map((estimate, i) =>
            Object.freeze({
                timestamp: new Date(origin + (i + 1) * candidate.stepMs).toISOString(),
                estimate,
                lower: Math.min(bounds.lower[i] ?? estimate, estimate),
                upper: Math.max(bounds.upper[i] ?? estimate, estimate),
            })
        )

        return ok(
            Object.freeze({
                id: this.nextId(),
                candidate,
                horizon,
                points: Object.freeze(points),
                generatedAt: this.clock().toISOString(),
            })
        )
    }

    /**
     * Trains along the chain and forecasts from the chosen candidate.
     * `fallback` stops at the first kind that trains; `compete` trains every
     * kind and forecasts from the best ranked one. Every attempt is reported.
     */
    async produceForecast(
        series: readonly SeriesPoint[],
        horizon: number,
        opts: ProduceForecastOptions = {}
    ): Promise<Result<ProducedForecast, ForecastFailure & { attempts: TrainingAttempt[] }>> {
        const target = opts.target ?? 'demand'
        const strategy = opts.strategy ?? this.policy.strategy
        const window = windowOf(series)
        const attempts: TrainingAttempt[] = []

        const selection = await this.locks.runExclusive(target, async () => {
            const trained: ModelCandidate[] = []
            for (const kind of this.policy.chain) {
                if (opts.signal?.aborted) {
                    return err<ForecastFailure>({ code: 'Aborted', message: 'Forecast was cancelled' })
                }
                const result = await this.trainUnlocked(series, window, kind, target, opts.signal)
                if (result.ok) {
                    attempts.push({
                        kind,
                        status: 'trained',
                        candidateId: result.value.id,
                        metrics: result.value.metrics,
                    })
                    trained.push(result.value)
                    if (strategy === 'fallback') break
                } else {
                    attempts.push({ kind, status: 'failed', errorCode: result.error.code, message: result.error.message })
                    this.options.logger?.debug({ kind, code: result.error.code }, 'model:train-failed')
                }
            }

            if (trained.length === 0) {
                const detail = attempts.map((a) => `${a.kind}: ${a.message ?? a.status}`).join('; ')
                return err<ForecastFailure>({
                    code: 'NoModelAvailable',
                    message: `No model in the chain could be trained (${detail})`,
                })
            }
            const best = this.selectBest(trained)
            return best.ok ? ok({ best: best.value, ranking: this.rank(trained) }) : best
        })

        if (!selection.ok) return err({ ...selection.error, attempts })

        const forecast = this.forecast(selection.value.best, horizon)
        if (!forecast.ok) return err({ ...forecast.error, attempts })
        return ok({ forecast: forecast.value, attempts, ranking: selection.value.ranking })
    }

    candidates(target?: string): ModelCandidate[] {
        if (target !== undefined) return [...(this.registry.get(target) ?? [])]
        return [...this.registry.values()].flat()
    }

    /** Most recently trained candidate for the target, if any. */
    latest(target = 'demand'): ModelCandidate | undefined {
        const list = this.registry.get(target) ?? []
        return list[list.length - 1]
    }

    private async trainUnlocked(
        series: readonly SeriesPoint[],
        window: TrainingWindow,
        kind: ModelKind,
        target: string,
        signal?: AbortSignal
    ): Promise<Result<ModelCandidate, ForecastFailure>> {
        const model = this.options.models[kind]
        const start = Date.parse(window.start)
        const end = Date.parse(window.end)
        const points = series.filter((p) => {
            const t = Date.parse(p.timestamp)
            return t >= start && t <= end
        })
        const first = points[0]
        const last = points[points.length - 1]
        const minimum = model.minimumPoints()

        if (!first || !last || points.length < minimum) {
            return err({
                code: 'InsufficientData',
                message: `${kind} model needs at least ${minimum} points, got ${points.length}`,
            })
        }

        const values = points.map((p) => p.value)
        let metrics: AccuracyMetrics = {}
        let full: FittedModel
        try {
            const holdout = this.policy.holdoutPeriods
            if (holdout > 0 && values.length - holdout >= minimum) {
                const backtest = model.fit(values.slice(0, -holdout))
                const prediction = backtest.predict(holdout)
                const bounds = this.resolveBounds(backtest, prediction.point, prediction.interval)
                metrics = computeMetrics(values.slice(-holdout), prediction.point, bounds)
            }
            full = model.fit(values)
        } catch (error) {
            return err({ code: 'InternalCapabilityError', message: `${kind} model failed to fit: ${errorMessage(error)}` })
        }

        // a cancelled run must not leave a candidate behind
        if (signal?.aborted) {
            return err({ code: 'Aborted', message: `Training of ${kind} model was cancelled` })
        }

        const candidate: ModelCandidate = Object.freeze({
            id: this.nextId(),
            kind,
            target,
            window: Object.freeze({ start: first.timestamp, end: last.timestamp }),
            trainedAt: this.clock().toISOString(),
            stepMs: inferStep(points),
            params: Object.freeze({ ...full.params }),
            metrics: Object.freeze({ ...metrics }),
        })
        this.fitted.set(candidate, full)
        this.commit(candidate)
        this.options.logger?.debug({ kind, candidateId: candidate.id, metrics }, 'model:trained')
        return ok(candidate)
    }

    private commit(candidate: ModelCandidate): void {
        const list = this.registry.get(candidate.target) ?? []
        list.push(candidate)
        const sameKind = list.filter((c) => c.kind === candidate.kind)
        const evicted = new Set(sameKind.slice(0, Math.max(sameKind.length - this.policy.retainPerKind, 0)))
        this.registry.set(
            candidate.target,
            list.filter((c) => !evicted.has(c))
        )
    }

    private isRegistered(candidate: ModelCandidate): boolean {
        return (this.registry.get(candidate.target) ?? []).includes(candidate)
    }

    /** Native interval when the model has one, otherwise ± z × residual RMS. */
    private resolveBounds(
        model: FittedModel,
        point: readonly number[],
        interval?: { lower: number[]; upper: number[] }
    ): { lower: number[]; upper: number[] } {
        if (interval) return interval
        const half = this.policy.intervalZ * rootMeanSquare(model.residuals)
        return {
            lower: point.map((p) => p - half),
            upper: point.map((p) => p + half),
        }
    }
}

function compare(a: number, b: number): number {
    if (a === b) return 0
    return a < b ? -1 : 1
}

function windowOf(series: readonly SeriesPoint[]): TrainingWindow {
    const first = series[0]
    const last = series[series.length - 1]
    return {
        start: first?.timestamp ?? new Date(0).toISOString(),
        end: last?.timestamp ?? new Date(0).toISOString(),
    }
}

/** Median spacing between consecutive points; hourly when it cannot be determined. */
function inferStep(points: readonly SeriesPoint[]): number {
    const diffs: number[] = []
    for (let i = 1; i < points.length; i++) {
        const prev = points[i - 1]
        const curr = points[i]
        if (prev && curr) diffs.push(Date.parse(curr.timestamp) - Date.parse(prev.timestamp))
    }
    const positive = diffs.filter((d) => d > 0).sort((a, b) => a - b)
    return positive[Math.floor(positive.length / 2)] ?? HOUR_MS
}
