import { z } from 'zod'
import type { ErrorCode } from '../../core/errors.js'
import { isErrorCode } from '../../core/errors.js'
import type { Clock, MetricName, ModelKind } from '../../core/types.js'
import type { DataSource } from '../../data/types.js'
import type { ForecastModelManager } from '../../forecasting/model-manager.js'
import { type AccuracyMetrics, AccuracyMetricsSchema, type ModelCandidate } from '../../forecasting/types.js'
import { ORDERED_DATES_MESSAGE, orderedDates, rangeFields, resolveRange } from '../args.js'
import { fail, succeed } from '../envelope.js'
import type { Capability } from '../types.js'
import { formatMetric, loadSeries } from './series.js'

const KindSchema = z.enum(['seasonal', 'autoregressive', 'naive'])

const CompareInput = z.object(rangeFields(28)).refine(orderedDates, ORDERED_DATES_MESSAGE)

type CompareInput = z.infer<typeof CompareInput>

const CompareOutput = z.object({
    metric: z.string(),
    ranking: z.array(
        z.object({
            rank: z.number(),
            candidateId: z.string(),
            kind: KindSchema,
            metrics: AccuracyMetricsSchema,
        })
    ),
    failures: z.array(z.object({ kind: KindSchema, errorCode: z.custom<ErrorCode>(isErrorCode), message: z.string() })),
})

interface CompareOutput {
    metric: string
    ranking: Array<{ rank: number; candidateId: string; kind: ModelKind; metrics: AccuracyMetrics }>
    failures: Array<{ kind: ModelKind; errorCode: ErrorCode; message: string }>
}

export function createCompareModelsCapability(
    source: DataSource,
    manager: ForecastModelManager,
    primaryMetric: MetricName,
    clock: Clock
): Capability<CompareInput, CompareOutput> {
    return {
        name: 'compare_models',
        description:
            'Train every model kind in the fallback chain on the same history and rank them by backtest accuracy (lower is better).',
        parameters: CompareInput,
        result: CompareOutput,
        produces: 'report',
        async execute(input, ctx) {
            const loaded = await loadSeries(source, resolveRange(input, clock()))
            if (!loaded.ok) return loaded.error

            const { observations, window } = loaded.value
            const trained: ModelCandidate[] = []
            const failures: CompareOutput['failures'] = []
            for (const kind of manager.chain) {
                const result = await manager.train(observations, window, kind, { signal: ctx.signal })
                if (result.ok) trained.push(result.value)
                else failures.push({ kind, errorCode: result.error.code, message: result.error.message })
            }

            if (trained.length === 0) {
                return fail('NoModelAvailable', 'No model kind could be trained on the requested history', { failures })
            }

            const ranking = manager.rank(trained).map((c, i) => ({
                rank: i + 1,
                candidateId: c.id,
                kind: c.kind,
                metrics: c.metrics,
            }))
            const leader = ranking[0]
            return succeed(
                { metric: primaryMetric, ranking, failures },
                leader
                    ? `Best model: ${leader.kind} (${primaryMetric.toUpperCase()} ${formatMetric(leader.metrics[primaryMetric])})`
                    : 'No ranking available'
            )
        },
    }
}
