export function round2(value: number): number {
    return Math.round(value * 100) / 100
}

/** Sample standard deviation (n − 1). Zero for fewer than two values. */
export function sampleStd(values: readonly number[]): number {
    if (values.length < 2) return 0
    const m = values.reduce((a, b) => a + b, 0) / values.length
    const ss = values.reduce((a, v) => a + (v - m) * (v - m), 0)
    return Math.sqrt(ss / (values.length - 1))
}

/** Linear-interpolation quantile over an ascending array. */
export function quantile(sorted: readonly number[], q: number): number {
    if (sorted.length === 0) return Number.NaN
    const pos = (sorted.length - 1) * q
    const lo = Math.floor(pos)
    const hi = Math.ceil(pos)
    const a = sorted[lo] ?? 0
    const b = sorted[hi] ?? a
    return a + (b - a) * (pos - lo)
}
