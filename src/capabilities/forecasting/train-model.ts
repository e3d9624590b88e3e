import { z } from 'zod'
import type { Clock } from '../../core/types.js'
import type { DataSource } from '../../data/types.js'
import type { ForecastModelManager } from '../../forecasting/model-manager.js'
import { type ModelCandidate, ModelCandidateSchema } from '../../forecasting/types.js'
import { ORDERED_DATES_MESSAGE, orderedDates, rangeFields, resolveRange } from '../args.js'
import { fail, succeed } from '../envelope.js'
import type { Capability } from '../types.js'
import { formatMetric, loadSeries } from './series.js'

const TrainInput = z
    .object({
        kind: z.enum(['seasonal', 'autoregressive', 'naive']).describe('Model kind to train'),
        ...rangeFields(28),
    })
    .refine(orderedDates, ORDERED_DATES_MESSAGE)

type TrainInput = z.infer<typeof TrainInput>

const TrainOutput = z.object({ candidate: ModelCandidateSchema })

interface TrainOutput {
    candidate: ModelCandidate
}

export function createTrainModelCapability(
    source: DataSource,
    manager: ForecastModelManager,
    clock: Clock
): Capability<TrainInput, TrainOutput> {
    return {
        name: 'train_model',
        description:
            'Train one forecasting model kind on hourly demand history, backtesting on the most recent holdout. Returns the candidate with its accuracy metrics.',
        parameters: TrainInput,
        result: TrainOutput,
        produces: 'model',
        async execute(input, ctx) {
            const loaded = await loadSeries(source, resolveRange(input, clock()))
            if (!loaded.ok) return loaded.error

            const { observations, window } = loaded.value
            const trained = await manager.train(observations, window, input.kind, { signal: ctx.signal })
            if (!trained.ok) {
                return fail(trained.error.code, trained.error.message, { kind: input.kind, points: observations.length })
            }

            const candidate = trained.value
            return succeed(
                { candidate },
                `Trained ${candidate.kind} model on ${observations.length} points (MAPE ${formatMetric(candidate.metrics.mape, '%')})`,
                { candidateId: candidate.id }
            )
        },
    }
}
