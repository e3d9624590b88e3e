import { rootMeanSquare } from '../metrics.js'
import type { FittedModel, ForecastModel, Prediction } from '../types.js'

export interface SeasonalModelOptions {
    period: number
    z: number
}

/**
 * Additive decomposition: least-squares linear trend plus one seasonal index
 * per position in the period. Intervals widen slowly with the horizon.
 */
export class SeasonalModel implements ForecastModel {
    readonly kind = 'seasonal'

    constructor(private options: SeasonalModelOptions) {}

    minimumPoints(): number {
        return 2 * this.options.period
    }

    fit(values: readonly number[]): FittedModel {
        const { period, z } = this.options
        const n = values.length
        const { intercept, slope } = linearTrend(values)

        const sums = new Array<number>(period).fill(0)
        const counts = new Array<number>(period).fill(0)
        for (let t = 0; t < n; t++) {
            const slot = t % period
            sums[slot] = (sums[slot] ?? 0) + (values[t] ?? 0) - (intercept + slope * t)
            counts[slot] = (counts[slot] ?? 0) + 1
        }
        const raw = sums.map((s, i) => s / Math.max(counts[i] ?? 1, 1))
        const offset = raw.reduce((a, b) => a + b, 0) / period
        const indices = raw.map((s) => s - offset)

        const residuals: number[] = []
        for (let t = 0; t < n; t++) {
            residuals.push((values[t] ?? 0) - (intercept + slope * t + (indices[t % period] ?? 0)))
        }
        const sigma = rootMeanSquare(residuals)

        return {
            params: { period, intercept, slope, seasonalIndices: indices },
            residuals,
            predict(horizon: number): Prediction {
                const point: number[] = []
                const lower: number[] = []
                const upper: number[] = []
                for (let i = 0; i < horizon; i++) {
                    const t = n + i
                    const estimate = intercept + slope * t + (indices[t % period] ?? 0)
                    const half = z * sigma * Math.sqrt(1 + (i + 1) / n)
                    point.push(estimate)
                    lower.push(estimate - half)
                    upper.push(estimate + half)
                }
                return { point, interval: { lower, upper } }
            },
        }
    }
}

function linearTrend(values: readonly number[]): { intercept: number; slope: number } {
    const n = values.length
    if (n < 2) return { intercept: values[0] ?? 0, slope: 0 }
    const meanT = (n - 1) / 2
    let meanY = 0
    for (const v of values) meanY += v
    meanY /= n

    let num = 0
    let den = 0
    for (let t = 0; t < n; t++) {
        num += (t - meanT) * ((values[t] ?? 0) - meanY)
        den += (t - meanT) * (t - meanT)
    }
    const slope = den === 0 ? 0 : num / den
    return { intercept: meanY - slope * meanT, slope }
}
