import { mean } from '../metrics.js'
import type { FittedModel, ForecastModel, Prediction } from '../types.js'

export interface AutoregressiveModelOptions {
    order: number
    z: number
}

/** AR(p) on the mean-centred series, coefficients from Yule-Walker via Levinson-Durbin. */
export class AutoregressiveModel implements ForecastModel {
    readonly kind = 'autoregressive'

    constructor(private options: AutoregressiveModelOptions) {}

    minimumPoints(): number {
        return 3 * this.options.order
    }

    fit(values: readonly number[]): FittedModel {
        const { order: p, z } = this.options
        const mu = mean(values)
        const x = values.map((v) => v - mu)
        const phi = levinsonDurbin(autocovariance(x, p), p)

        const residuals: number[] = []
        for (let t = p; t < x.length; t++) {
            let fitted = 0
            for (let j = 0; j < p; j++) fitted += (phi[j] ?? 0) * (x[t - j - 1] ?? 0)
            residuals.push((x[t] ?? 0) - fitted)
        }
        const sigma2 = residuals.length === 0 ? 0 : residuals.reduce((a, r) => a + r * r, 0) / residuals.length

        return {
            params: { order: p, mean: mu, coefficients: phi, noiseVariance: sigma2 },
            residuals,
            predict(horizon: number): Prediction {
                const history = x.slice(-p)
                const psi = psiWeights(phi, horizon)
                const point: number[] = []
                const lower: number[] = []
                const upper: number[] = []
                let cumulative = 0
                for (let h = 0; h < horizon; h++) {
                    let next = 0
                    for (let j = 0; j < p; j++) next += (phi[j] ?? 0) * (history[history.length - 1 - j] ?? 0)
                    history.push(next)
                    cumulative += (psi[h] ?? 0) ** 2
                    const half = z * Math.sqrt(sigma2 * cumulative)
                    point.push(next + mu)
                    lower.push(next + mu - half)
                    upper.push(next + mu + half)
                }
                return { point, interval: { lower, upper } }
            },
        }
    }
}

function autocovariance(x: readonly number[], maxLag: number): number[] {
    const n = x.length
    const gamma: number[] = []
    for (let lag = 0; lag <= maxLag; lag++) {
        let total = 0
        for (let t = lag; t < n; t++) total += (x[t] ?? 0) * (x[t - lag] ?? 0)
        gamma.push(n === 0 ? 0 : total / n)
    }
    return gamma
}

function levinsonDurbin(gamma: readonly number[], p: number): number[] {
    const phi = new Array<number>(p).fill(0)
    const g0 = gamma[0] ?? 0
    // constant series: no autocorrelation to model
    if (g0 === 0) return phi

    let error = g0
    for (let k = 1; k <= p; k++) {
        let acc = gamma[k] ?? 0
        for (let j = 1; j < k; j++) acc -= (phi[j - 1] ?? 0) * (gamma[k - j] ?? 0)
        const reflection = error === 0 ? 0 : acc / error

        const previous = phi.slice()
        phi[k - 1] = reflection
        for (let j = 1; j < k; j++) {
            phi[j - 1] = (previous[j - 1] ?? 0) - reflection * (previous[k - j - 1] ?? 0)
        }
        error *= 1 - reflection * reflection
    }
    return phi
}

function psiWeights(phi: readonly number[], horizon: number): number[] {
    const psi = [1]
    for (let j = 1; j < horizon; j++) {
        let total = 0
        for (let k = 1; k <= Math.min(j, phi.length); k++) total += (phi[k - 1] ?? 0) * (psi[j - k] ?? 0)
        psi.push(total)
    }
    return psi
}
