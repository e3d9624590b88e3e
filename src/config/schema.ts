import { z } from 'zod'
import type { MetricName, ModelKind } from '../core/types.js'

const ModelKindSchema = z.enum(['seasonal', 'autoregressive', 'naive'])

export const LogLevelSchema = z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'])

export const ConfigSchema = z.object({
    model: z.string().optional(),
    apiKey: z.string().optional(),
    baseURL: z.string().url().optional(),
    temperature: z.number().min(0).max(2).optional(),
    maxTokens: z.number().int().positive().optional(),
    logLevel: LogLevelSchema.optional(),
    dataDir: z.string().optional(),
    llm: z
        .object({
            timeoutMs: z.number().int().positive().optional(),
            maxRetries: z.number().int().nonnegative().optional(),
            retryBaseDelayMs: z.number().int().positive().optional(),
            retryMaxDelayMs: z.number().int().positive().optional(),
            breakerThreshold: z.number().int().positive().optional(),
            breakerCooldownMs: z.number().int().positive().optional(),
        })
        .optional(),
    agent: z
        .object({
            maxIterations: z.number().int().positive().optional(),
            planRetryLimit: z.number().int().nonnegative().optional(),
            oracleRetries: z.number().int().nonnegative().optional(),
            maxInvocationsPerPlan: z.number().int().positive().optional(),
            actConcurrency: z.number().int().positive().optional(),
            historyLimit: z.number().int().positive().optional(),
        })
        .optional(),
    capabilities: z
        .object({
            defaultTimeoutMs: z.number().int().positive().optional(),
            timeouts: z.record(z.number().int().positive()).optional(),
        })
        .optional(),
    freshness: z
        .object({
            expectedIntervalMinutes: z.number().positive().optional(),
            staleMultiplier: z.number().positive().optional(),
        })
        .optional(),
    forecasting: z
        .object({
            chain: z.array(ModelKindSchema).nonempty().optional(),
            primaryMetric: z.enum(['mape', 'rmse', 'mae']).optional(),
            holdoutPeriods: z.number().int().nonnegative().optional(),
            seasonalPeriod: z.number().int().min(2).optional(),
            arOrder: z.number().int().positive().optional(),
            naivePeriod: z.number().int().positive().optional(),
            retainPerKind: z.number().int().positive().optional(),
            intervalZ: z.number().positive().optional(),
            strategy: z.enum(['fallback', 'compete']).optional(),
            defaultHorizon: z.number().int().positive().optional(),
            maxHorizon: z.number().int().positive().optional(),
        })
        .optional(),
    database: z
        .object({
            connectionString: z.string().optional(),
            demandTable: z.string().optional(),
            utcOffsetMinutes: z.number().int().min(-840).max(840).optional(),
        })
        .optional(),
})

export type Config = z.infer<typeof ConfigSchema>

export type LogLevel = z.infer<typeof LogLevelSchema>

export type ForecastStrategy = 'fallback' | 'compete'

export interface AgentPolicy {
    maxIterations: number
    planRetryLimit: number
    oracleRetries: number
    maxInvocationsPerPlan: number
    actConcurrency: number
    historyLimit: number
}

export interface FreshnessPolicy {
    expectedIntervalMinutes: number
    staleMultiplier: number
}

export interface ForecastingPolicy {
    chain: ModelKind[]
    primaryMetric: MetricName
    holdoutPeriods: number
    seasonalPeriod: number
    arOrder: number
    naivePeriod: number
    retainPerKind: number
    intervalZ: number
    strategy: ForecastStrategy
    defaultHorizon: number
    maxHorizon: number
}

export interface ResolvedConfig {
    model: string
    apiKey: string
    baseURL: string
    temperature: number
    maxTokens: number
    logLevel: LogLevel
    llm: {
        timeoutMs: number
        maxRetries: number
        retryBaseDelayMs: number
        retryMaxDelayMs: number
        breakerThreshold: number
        breakerCooldownMs: number
    }
    agent: AgentPolicy
    capabilities: { defaultTimeoutMs: number; timeouts: Record<string, number> }
    freshness: FreshnessPolicy
    forecasting: ForecastingPolicy
    database: { connectionString?: string; demandTable: string; utcOffsetMinutes: number }
    projectDir: string
    configDir: string
    dataDir: string
}
