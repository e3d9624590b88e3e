import { describe, expect, it } from 'vitest'
import { reflectOnOutcomes } from '../../../src/agents/orchestrator/reflection.js'
import { fail, succeed } from '../../../src/capabilities/envelope.js'
import type { CapabilityInvocation, ResultEnvelope } from '../../../src/capabilities/types.js'
import type { ForecastResult } from '../../../src/forecasting/types.js'

const FORECAST: ForecastResult = {
    id: 'forecast-1',
    candidate: {
        id: 'candidate-1',
        kind: 'seasonal',
        target: 'demand',
        window: { start: '2024-05-01T00:00:00.000Z', end: '2024-05-02T23:00:00.000Z' },
        trainedAt: '2024-05-03T00:30:00.000Z',
        stepMs: 3_600_000,
        params: {},
        metrics: { mape: 4.2 },
    },
    horizon: 1,
    points: [{ timestamp: '2024-05-03T00:00:00.000Z', estimate: 15000, lower: 14500, upper: 15500 }],
    generatedAt: '2024-05-03T00:30:00.000Z',
}

function inv(capability: string, envelope: ResultEnvelope): CapabilityInvocation {
    return {
        capability,
        arguments: {},
        envelope,
        startedAt: '2024-05-03T00:30:00.000Z',
        durationMs: 10,
        outcome: envelope.success ? 'ok' : 'error',
    }
}

const forecastOk = () => inv('forecast_demand', succeed({ forecast: FORECAST, strategy: 'fallback', attempts: [] }, 'ok'))
const producesForecast = (name: string) => name === 'forecast_demand'

function reflect(invocations: CapabilityInvocation[], prior: Array<[string, number]> = []) {
    return reflectOnOutcomes({ invocations, producesForecast, priorInternalErrors: new Map(prior) })
}

describe('reflectOnOutcomes', () => {
    it('finishes when a forecast was produced and nothing failed', () => {
        const result = reflect([inv('check_data_freshness', succeed({}, 'fresh')), forecastOk()])
        expect(result.next).toBe('DONE')
        expect(result.rationale).toBe('Forecast forecast-1 produced with the seasonal model')
        expect(result.forecast?.id).toBe('forecast-1')
    })

    it('adapts when everything succeeded but no forecast exists yet', () => {
        expect(reflect([inv('get_data_summary', succeed({}, 'ok'))])).toEqual({
            next: 'ADAPT',
            rationale: 'All 1 invocation(s) succeeded; no forecast produced yet',
        })
    })

    it('adapts on recoverable failures and names them', () => {
        const result = reflect([
            inv('train_model', fail('InsufficientData', 'too few points')),
            inv('get_data_summary', succeed({}, 'ok')),
        ])
        expect(result).toEqual({ next: 'ADAPT', rationale: '1 of 2 invocation(s) failed: train_model (InsufficientData)' })
    })

    it('keeps a forecast when another invocation failed', () => {
        const result = reflect([forecastOk(), inv('validate_data_quality', fail('ValidationFailed', 'bad'))])
        expect(result.next).toBe('ADAPT')
        expect(result.forecast?.id).toBe('forecast-1')
    })

    it('fails on an unrecoverable code', () => {
        expect(reflect([inv('query_demand_data', fail('NoDataAvailable', 'No demand data found'))])).toEqual({
            next: 'FAILED',
            rationale: 'query_demand_data failed with NoDataAvailable: No demand data found',
            errorCode: 'NoDataAvailable',
        })
    })

    it('fails on the second unexpected error from the same capability', () => {
        const once = reflect([inv('compare_models', fail('InternalCapabilityError', 'boom'))])
        expect(once.next).toBe('ADAPT')

        const twice = reflect([inv('compare_models', fail('InternalCapabilityError', 'boom'))], [['compare_models', 1]])
        expect(twice).toEqual({
            next: 'FAILED',
            rationale: 'compare_models failed unexpectedly twice in this session: boom',
            errorCode: 'InternalCapabilityError',
        })
    })

    it('ignores forecast-shaped data from capabilities that do not produce forecasts', () => {
        const result = reflect([inv('get_data_summary', succeed({ forecast: FORECAST, strategy: 'fallback', attempts: [] }, 'ok'))])
        expect(result.next).toBe('ADAPT')
    })
})
