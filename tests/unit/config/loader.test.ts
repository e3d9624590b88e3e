import { describe, expect, it } from 'vitest'
import { configFromEnv, loadConfig, mergeConfigs } from '../../../src/config/loader.js'
import { MockFileSystem } from '../../../src/core/fs.js'

const GLOBAL = '/home/test/.config/demand-agent/config.json'
const LOCAL = '/work/.demand-agent/config.json'

function load(fs: MockFileSystem, extra: Partial<Parameters<typeof loadConfig>[0]> = {}) {
    return loadConfig({ fs, env: {}, projectDir: '/work', globalConfigFile: GLOBAL, ...extra })
}

describe('loadConfig', () => {
    it('returns defaults when no config files exist', async () => {
        const config = await load(new MockFileSystem())
        expect(config.model).toBe('llama3.1')
        expect(config.baseURL).toBe('http://localhost:11434/v1')
        expect(config.temperature).toBe(0.1)
        expect(config.logLevel).toBe('info')
        expect(config.apiKey).toBe('ollama')
        expect(config.agent.maxIterations).toBe(6)
        expect(config.forecasting.chain).toEqual(['seasonal', 'autoregressive', 'naive'])
        expect(config.freshness).toEqual({ expectedIntervalMinutes: 60, staleMultiplier: 1.5 })
        expect(config.dataDir).toBe('/work/.demand-agent')
    })

    it('layers local config over global config', async () => {
        const fs = new MockFileSystem()
        fs.setFile(GLOBAL, JSON.stringify({ model: 'qwen2.5', agent: { maxIterations: 4, planRetryLimit: 1 } }))
        fs.setFile(LOCAL, JSON.stringify({ agent: { maxIterations: 9 } }))

        const config = await load(fs)
        expect(config.model).toBe('qwen2.5')
        expect(config.agent.maxIterations).toBe(9)
        expect(config.agent.planRetryLimit).toBe(1)
        expect(config.agent.oracleRetries).toBe(1)
    })

    it('env vars override config files', async () => {
        const fs = new MockFileSystem()
        fs.setFile(LOCAL, JSON.stringify({ model: 'from-file' }))
        const config = await load(fs, { env: { DEMAND_AGENT_MODEL: 'from-env', DATABASE_URL: 'postgres://localhost/test' } })
        expect(config.model).toBe('from-env')
        expect(config.database.connectionString).toBe('postgres://localhost/test')
        expect(config.database.demandTable).toBe('"00_RAW"."00_IESO_DEMAND"')
        expect(config.database.utcOffsetMinutes).toBe(-300)
    })

    it('CLI flags override env vars', async () => {
        const config = await load(new MockFileSystem(), {
            env: { DEMAND_AGENT_API_KEY: 'env-secret' },
            cliFlags: { apiKey: 'test-secret' },
        })
        expect(config.apiKey).toBe('test-secret')
    })

    it('merges capability timeouts key by key', async () => {
        const fs = new MockFileSystem()
        fs.setFile(LOCAL, JSON.stringify({ capabilities: { timeouts: { query_demand_data: 5000 } } }))
        const config = await load(fs)
        expect(config.capabilities.timeouts.query_demand_data).toBe(5000)
        expect(config.capabilities.timeouts.forecast_demand).toBe(120_000)
        expect(config.capabilities.defaultTimeoutMs).toBe(30_000)
    })

    it('rejects a config file that breaks the schema', async () => {
        const fs = new MockFileSystem()
        fs.setFile(LOCAL, JSON.stringify({ forecasting: { chain: ['prophet'] } }))
        await expect(load(fs)).rejects.toThrow(`Config file ${LOCAL} is invalid`)
    })

    it('rejects a config file that is not JSON', async () => {
        const fs = new MockFileSystem()
        fs.setFile(GLOBAL, '{ not json')
        await expect(load(fs)).rejects.toThrow(`Config file ${GLOBAL} is not valid JSON`)
    })
})

describe('configFromEnv', () => {
    it('rejects an unknown log level', () => {
        expect(() => configFromEnv({ DEMAND_AGENT_LOG_LEVEL: 'loud' })).toThrow('DEMAND_AGENT_LOG_LEVEL is invalid: loud')
    })
})

describe('mergeConfigs', () => {
    it('never lets an absent key override a present one', () => {
        expect(mergeConfigs({ model: 'a', temperature: 0.5 }, { model: 'b' })).toEqual({ model: 'b', temperature: 0.5 })
    })
})
