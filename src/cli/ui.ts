import pc from 'picocolors'
import type { SessionSummary } from '../agents/orchestrator/orchestrator.js'
import type { CapabilityRegistry } from '../capabilities/registry.js'
import type { ForecastResult } from '../forecasting/types.js'
import type { LedgerEntry } from '../memory/performance-ledger.js'

export const colors = {
    brand: (text: string) => pc.magenta(pc.bold(text)),
    success: (text: string) => pc.green(text),
    error: (text: string) => pc.red(text),
    warn: (text: string) => pc.yellow(text),
    dim: (text: string) => pc.dim(text),
    bold: (text: string) => pc.bold(text),
    phase: (name: string) => pc.cyan(`[${name}]`),
    capability: (name: string) => pc.blue(name),
}

export function banner(version: string): string {
    return `${colors.brand('demand-agent')} ${colors.dim(`v${version}`)} - electricity demand decisions`
}

export function formatError(message: string): string {
    return `${colors.error('Error:')} ${message}`
}

const STATE_COLORS: Record<LedgerEntry['state'], (text: string) => string> = {
    running: colors.dim,
    succeeded: colors.success,
    failed: colors.error,
    aborted: colors.warn,
}

function formatMW(value: number): string {
    return `${Math.round(value).toLocaleString('en-US')} MW`
}

export function formatForecast(forecast: ForecastResult, maxRows = 24): string {
    const { candidate } = forecast
    const mape = candidate.metrics.mape
    const lines: string[] = []
    lines.push(
        `${colors.bold('Forecast')} ${forecast.id} ${colors.dim(`(${candidate.kind} model${mape === undefined ? '' : `, MAPE ${mape.toFixed(2)}%`})`)}`
    )
    for (const point of forecast.points.slice(0, maxRows)) {
        lines.push(`  ${point.timestamp}  ${formatMW(point.estimate).padStart(10)}  ${colors.dim(`[${formatMW(point.lower)} .. ${formatMW(point.upper)}]`)}`)
    }
    if (forecast.points.length > maxRows) {
        lines.push(colors.dim(`  ... ${forecast.points.length - maxRows} more step(s)`))
    }
    return lines.join('\n')
}

export function formatSessionSummary(summary: SessionSummary, verbose = false): string {
    const lines: string[] = []
    const paint = STATE_COLORS[summary.state]
    lines.push(`${paint(summary.state.toUpperCase())} ${colors.dim(`after ${summary.iterations} iteration(s), session ${summary.sessionId}`)}`)
    if (summary.answer) lines.push(summary.answer)
    if (summary.reason) lines.push(`${colors.warn('Reason:')} ${summary.reason}${summary.errorCode ? colors.dim(` (${summary.errorCode})`) : ''}`)
    if (summary.forecast) lines.push('', formatForecast(summary.forecast))

    if (verbose) {
        lines.push('', colors.bold('Decision log:'))
        for (const record of summary.records) {
            const code = record.errorCode ? colors.error(` ${record.errorCode}`) : ''
            lines.push(`  ${colors.phase(record.phase)}${code} ${record.rationale}`)
            for (const inv of record.invocations) {
                const mark = inv.envelope.success ? colors.success('ok') : colors.error('fail')
                lines.push(`      ${colors.capability(inv.capability)} ${mark} ${colors.dim(`${inv.durationMs}ms`)} ${inv.envelope.message}`)
            }
        }
    }
    return lines.join('\n')
}

export function formatHistory(entries: readonly LedgerEntry[]): string {
    if (entries.length === 0) return colors.dim('No sessions recorded yet.')
    return entries
        .map((e) => {
            const state = STATE_COLORS[e.state](e.state)
            const model = e.forecast ? colors.dim(` ${e.forecast.modelKind}${e.forecast.mape === undefined ? '' : ` MAPE ${e.forecast.mape.toFixed(2)}%`}`) : ''
            return `${colors.dim(e.recordedAt)} ${state}${model} ${e.goal}`
        })
        .join('\n')
}

export function formatCapabilities(registry: CapabilityRegistry): string {
    const lines = registry.listAll().map((c) => `  ${colors.capability(c.name.padEnd(28))} ${c.description}`)
    return `Capabilities:\n${lines.join('\n')}`
}
