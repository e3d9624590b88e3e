import { describe, expect, it } from 'vitest'
import { errorCodeOf } from '../../../src/capabilities/envelope.js'
import { createCompareModelsCapability } from '../../../src/capabilities/forecasting/compare-models.js'
import { createForecastDemandCapability, ForecastOutputSchema } from '../../../src/capabilities/forecasting/forecast-demand.js'
import { createTrainModelCapability } from '../../../src/capabilities/forecasting/train-model.js'
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js'
import { ForecastModelManager } from '../../../src/forecasting/model-manager.js'
import type { ModelSet } from '../../../src/forecasting/models/index.js'
import { hourlySeries, InMemoryDemandSource } from '../../helpers/demand-data.js'
import { fakeModels } from '../../helpers/fake-models.js'
import { runCapability } from '../../helpers/capabilities.js'

const NOW = new Date('2024-05-03T00:30:00.000Z')
const clock = () => NOW
const RANGE = { start_date: '2024-05-01', end_date: '2024-05-02' }
const POLICY = DEFAULT_CONFIG.forecasting

function setup(models: ModelSet) {
    const source = new InMemoryDemandSource(hourlySeries(48, '2024-05-01T00:00:00.000Z', () => 1000))
    const manager = new ForecastModelManager(POLICY, { models, clock })
    return { source, manager }
}

describe('train_model', () => {
    it('trains the requested kind and reports its accuracy', async () => {
        const { source, manager } = setup(fakeModels())
        const envelope = await runCapability(createTrainModelCapability(source, manager, clock), { kind: 'naive', ...RANGE })

        if (!envelope.success) throw new Error(envelope.message)
        expect(envelope.data.candidate.kind).toBe('naive')
        expect(envelope.data.candidate.metrics.mape).toBe(0)
        expect(envelope.message).toBe('Trained naive model on 48 points (MAPE 0.00%)')
        expect(manager.latest()?.id).toBe(envelope.data.candidate.id)
    })

    it('surfaces InsufficientData with the point count', async () => {
        const { source, manager } = setup(fakeModels({ seasonal: { minimum: 100 } }))
        const envelope = await runCapability(createTrainModelCapability(source, manager, clock), { kind: 'seasonal', ...RANGE })

        expect(errorCodeOf(envelope)).toBe('InsufficientData')
        expect(envelope.message).toBe('seasonal model needs at least 100 points, got 48')
        expect(envelope.metadata).toMatchObject({ kind: 'seasonal', points: 48 })
    })

    it('rejects unknown model kinds before training', () => {
        const { source, manager } = setup(fakeModels())
        const capability = createTrainModelCapability(source, manager, clock)
        expect(capability.parameters.safeParse({ kind: 'prophet' }).success).toBe(false)
    })
})

describe('compare_models', () => {
    it('ranks every kind by the primary metric', async () => {
        const { source, manager } = setup(
            fakeModels({ seasonal: { factor: 1.06 }, autoregressive: { factor: 1.02 }, naive: { factor: 1.1 } })
        )
        const envelope = await runCapability(createCompareModelsCapability(source, manager, 'mape', clock), RANGE)

        if (!envelope.success) throw new Error(envelope.message)
        expect(envelope.data.metric).toBe('mape')
        expect(envelope.data.ranking.map((r) => [r.rank, r.kind])).toEqual([
            [1, 'autoregressive'],
            [2, 'seasonal'],
            [3, 'naive'],
        ])
        expect(envelope.data.failures).toEqual([])
        expect(envelope.message).toBe('Best model: autoregressive (MAPE 2.00)')
    })

    it('lists kinds that failed to train', async () => {
        const { source, manager } = setup(fakeModels({ naive: { fail: 'boom' } }))
        const envelope = await runCapability(createCompareModelsCapability(source, manager, 'mape', clock), RANGE)

        expect(envelope.success && envelope.data.failures).toEqual([
            { kind: 'naive', errorCode: 'InternalCapabilityError', message: 'naive model failed to fit: boom' },
        ])
    })

    it('fails with NoModelAvailable when nothing trains', async () => {
        const { source, manager } = setup(
            fakeModels({ seasonal: { minimum: 100 }, autoregressive: { minimum: 100 }, naive: { minimum: 100 } })
        )
        const envelope = await runCapability(createCompareModelsCapability(source, manager, 'mape', clock), RANGE)
        expect(errorCodeOf(envelope)).toBe('NoModelAvailable')
    })
})

describe('forecast_demand', () => {
    it('returns a forecast matching the declared output', async () => {
        const { source, manager } = setup(fakeModels({ seasonal: { factor: 1.06 } }))
        const envelope = await runCapability(createForecastDemandCapability(source, manager, POLICY, clock), {
            horizon: 6,
            ...RANGE,
        })

        if (!envelope.success) throw new Error(envelope.message)
        expect(ForecastOutputSchema.safeParse(envelope.data).success).toBe(true)
        expect(envelope.data.forecast.points).toHaveLength(6)
        expect(envelope.data.strategy).toBe('fallback')
        expect(envelope.metadata).toMatchObject({ strategy: 'fallback', modelKind: 'seasonal' })
        expect(envelope.message).toBe('Forecast 6h ahead with the seasonal model (MAPE 6.00%)')
    })

    it('defaults the horizon and rejects one beyond the maximum', () => {
        const { source, manager } = setup(fakeModels())
        const capability = createForecastDemandCapability(source, manager, POLICY, clock)
        const parsed = capability.parameters.safeParse({})
        expect(parsed.success && parsed.data.horizon).toBe(24)
        expect(capability.parameters.safeParse({ horizon: 169 }).success).toBe(false)
    })

    it('lists every fallback attempt when no model trains', async () => {
        const { source, manager } = setup(
            fakeModels({ seasonal: { minimum: 100 }, autoregressive: { minimum: 100 }, naive: { minimum: 100 } })
        )
        const envelope = await runCapability(createForecastDemandCapability(source, manager, POLICY, clock), RANGE)

        expect(errorCodeOf(envelope)).toBe('NoModelAvailable')
        expect(Array.isArray(envelope.metadata.attempts) && envelope.metadata.attempts.length).toBe(3)
    })

    it('fails with InsufficientData and the stored span when the range is empty', async () => {
        const { source, manager } = setup(fakeModels())
        const envelope = await runCapability(createForecastDemandCapability(source, manager, POLICY, clock), {
            start_date: '2020-01-01',
            end_date: '2020-01-31',
        })
        expect(errorCodeOf(envelope)).toBe('InsufficientData')
        expect(envelope.metadata.available).toEqual({ start: '2024-05-01', end: '2024-05-02' })
    })

    it('fails with NoDataAvailable when the store is empty', async () => {
        const manager = new ForecastModelManager(POLICY, { models: fakeModels(), clock })
        const envelope = await runCapability(
            createForecastDemandCapability(new InMemoryDemandSource([]), manager, POLICY, clock),
            RANGE
        )
        expect(errorCodeOf(envelope)).toBe('NoDataAvailable')
        expect(envelope.message).toBe('The demand table holds no observations')
    })
})
