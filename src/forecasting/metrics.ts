import type { AccuracyMetrics } from './types.js'

export function meanAbsolutePercentageError(actual: readonly number[], predicted: readonly number[]): number | undefined {
    let total = 0
    let count = 0
    for (let i = 0; i < actual.length; i++) {
        const a = actual[i] ?? 0
        // zero actuals have no defined percentage error
        if (a === 0) continue
        total += Math.abs((a - (predicted[i] ?? 0)) / a)
        count++
    }
    return count === 0 ? undefined : (total / count) * 100
}

export function rootMeanSquaredError(actual: readonly number[], predicted: readonly number[]): number | undefined {
    if (actual.length === 0) return undefined
    let total = 0
    for (let i = 0; i < actual.length; i++) {
        const diff = (actual[i] ?? 0) - (predicted[i] ?? 0)
        total += diff * diff
    }
    return Math.sqrt(total / actual.length)
}

export function meanAbsoluteError(actual: readonly number[], predicted: readonly number[]): number | undefined {
    if (actual.length === 0) return undefined
    let total = 0
    for (let i = 0; i < actual.length; i++) {
        total += Math.abs((actual[i] ?? 0) - (predicted[i] ?? 0))
    }
    return total / actual.length
}

export function mean(values: readonly number[]): number {
    if (values.length === 0) return 0
    let total = 0
    for (const v of values) total += v
    return total / values.length
}

/** Population variance. */
export function variance(values: readonly number[]): number {
    if (values.length === 0) return 0
    const m = mean(values)
    let total = 0
    for (const v of values) total += (v - m) * (v - m)
    return total / values.length
}

export function rootMeanSquare(values: readonly number[]): number {
    if (values.length === 0) return 0
    let total = 0
    for (const v of values) total += v * v
    return Math.sqrt(total / values.length)
}

export function computeMetrics(
    actual: readonly number[],
    predicted: readonly number[],
    bounds?: { lower: readonly number[]; upper: readonly number[] }
): AccuracyMetrics {
    const metrics: AccuracyMetrics = {}
    const mape = meanAbsolutePercentageError(actual, predicted)
    const rmse = rootMeanSquaredError(actual, predicted)
    const mae = meanAbsoluteError(actual, predicted)
    if (mape !== undefined) metrics.mape = mape
    if (rmse !== undefined) metrics.rmse = rmse
    if (mae !== undefined) metrics.mae = mae
    if (bounds && bounds.lower.length > 0) {
        const widths = bounds.upper.map((u, i) => u - (bounds.lower[i] ?? u))
        metrics.intervalWidthVariance = variance(widths)
    }
    return metrics
}
