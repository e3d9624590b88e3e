import os from 'node:os'
import path from 'node:path'
import type { ResolvedConfig } from './schema.js'

export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'apiKey' | 'projectDir' | 'configDir' | 'dataDir'> = {
    model: 'llama3.1',
    // Ollama exposes an OpenAI-compatible endpoint under /v1
    baseURL: 'http://localhost:11434/v1',
    temperature: 0.1,
    maxTokens: 2048,
    logLevel: 'info',
    llm: {
        timeoutMs: 60_000,
        maxRetries: 2,
        retryBaseDelayMs: 1000,
        retryMaxDelayMs: 10_000,
        breakerThreshold: 5,
        breakerCooldownMs: 30_000,
    },
    agent: {
        maxIterations: 6,
        planRetryLimit: 3,
        oracleRetries: 1,
        maxInvocationsPerPlan: 8,
        actConcurrency: 1,
        historyLimit: 5,
    },
    capabilities: {
        defaultTimeoutMs: 30_000,
        timeouts: {
            compare_models: 120_000,
            forecast_demand: 120_000,
            train_model: 90_000,
        },
    },
    freshness: {
        expectedIntervalMinutes: 60,
        staleMultiplier: 1.5,
    },
    forecasting: {
        chain: ['seasonal', 'autoregressive', 'naive'],
        primaryMetric: 'mape',
        holdoutPeriods: 24,
        seasonalPeriod: 24,
        arOrder: 24,
        naivePeriod: 168,
        retainPerKind: 3,
        intervalZ: 1.96,
        strategy: 'fallback',
        defaultHorizon: 24,
        maxHorizon: 168,
    },
    database: {
        demandTable: '"00_RAW"."00_IESO_DEMAND"',
        // IESO reports in EST year-round
        utcOffsetMinutes: -300,
    },
}

export const CONFIG_DIR = path.join(os.homedir(), '.config', 'demand-agent')
export const GLOBAL_CONFIG_FILE = path.join(CONFIG_DIR, 'config.json')
export const LOCAL_CONFIG_DIR = '.demand-agent'
export const LOCAL_CONFIG_FILE = `${LOCAL_CONFIG_DIR}/config.json`
export const DECISION_LOG_FILE = 'decisions.jsonl'
export const LEDGER_FILE = 'sessions.jsonl'
