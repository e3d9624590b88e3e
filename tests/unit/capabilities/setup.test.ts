import { describe, expect, it } from 'vitest'
import { createCapabilityRegistry } from '../../../src/capabilities/setup.js'
import { createPerformanceHistoryCapability } from '../../../src/capabilities/history/performance-history.js'
import { createCurrentTimeCapability } from '../../../src/capabilities/utility/current-time.js'
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js'
import { MockFileSystem } from '../../../src/core/fs.js'
import { ForecastModelManager } from '../../../src/forecasting/model-manager.js'
import { PerformanceLedger } from '../../../src/memory/performance-ledger.js'
import { echoCapability, runCapability } from '../../helpers/capabilities.js'
import { InMemoryDemandSource } from '../../helpers/demand-data.js'
import { fakeModels } from '../../helpers/fake-models.js'

const clock = () => new Date('2024-05-03T00:30:00.000Z')

function deps() {
    return {
        config: DEFAULT_CONFIG,
        dataSource: new InMemoryDemandSource([]),
        models: new ForecastModelManager(DEFAULT_CONFIG.forecasting, { models: fakeModels() }),
        ledger: new PerformanceLedger(new MockFileSystem()),
        clock,
    }
}

describe('createCapabilityRegistry', () => {
    it('registers the built-in capabilities and seals the registry', () => {
        const registry = createCapabilityRegistry(deps())

        expect(registry.names().sort()).toEqual([
            'calculate_demand_statistics',
            'check_data_freshness',
            'compare_models',
            'forecast_demand',
            'get_current_time',
            'get_data_summary',
            'get_performance_history',
            'query_demand_data',
            'train_model',
            'validate_data_quality',
        ])
        expect(registry.isSealed()).toBe(true)
        expect(registry.get('forecast_demand')?.produces).toBe('forecast')
    })

    it('adds extra capabilities before sealing', () => {
        const registry = createCapabilityRegistry({ ...deps(), extra: [echoCapability()] })
        expect(registry.has('echo')).toBe(true)
        expect(() => registry.register(echoCapability({ name: 'late' }))).toThrow('sealed')
    })
})

describe('get_current_time', () => {
    it('reports the clock in ISO 8601', async () => {
        const envelope = await runCapability(createCurrentTimeCapability(clock))
        expect(envelope.success && envelope.data).toEqual({ now: '2024-05-03T00:30:00.000Z' })
    })
})

describe('get_performance_history', () => {
    it('returns recent sessions newest first', async () => {
        let n = 0
        const ledger = new PerformanceLedger(new MockFileSystem(), { clock, idGenerator: () => `entry-${++n}` })
        await ledger.append({ sessionId: 's1', goal: 'forecast tomorrow', state: 'succeeded', iterations: 2 })
        await ledger.append({ sessionId: 's2', goal: 'compare models', state: 'failed', iterations: 6 })

        const envelope = await runCapability(createPerformanceHistoryCapability(ledger), { limit: 5 })
        if (!envelope.success) throw new Error(envelope.message)
        expect(envelope.data.sessions.map((s) => s.sessionId)).toEqual(['s2', 's1'])
        expect(envelope.data.total).toBe(2)
        expect(envelope.message).toBe('2 recent sessions, 1 succeeded')
    })

    it('says so when there is no history', async () => {
        const envelope = await runCapability(createPerformanceHistoryCapability(new PerformanceLedger(new MockFileSystem())))
        expect(envelope.message).toBe('No previous sessions recorded')
    })
})
