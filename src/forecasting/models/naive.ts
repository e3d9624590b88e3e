import type { FittedModel, ForecastModel } from '../types.js'

/** Seasonal naive baseline: repeats the last observed period. No native interval. */
export class SeasonalNaiveModel implements ForecastModel {
    readonly kind = 'naive'

    constructor(private period: number) {}

    minimumPoints(): number {
        return this.period + 1
    }

    fit(values: readonly number[]): FittedModel {
        const period = this.period
        const lastPeriod = values.slice(-period)
        const residuals: number[] = []
        for (let t = period; t < values.length; t++) {
            residuals.push((values[t] ?? 0) - (values[t - period] ?? 0))
        }

        return {
            params: { period },
            residuals,
            predict: (horizon) => ({
                point: Array.from({ length: horizon }, (_, i) => lastPeriod[i % lastPeriod.length] ?? 0),
            }),
        }
    }
}
