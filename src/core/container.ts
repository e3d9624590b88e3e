import path from 'node:path'
import pg from 'pg'
import { LLMOracle } from '../agents/oracle/llm-oracle.js'
import type { ReasoningOracle } from '../agents/oracle/types.js'
import { Orchestrator } from '../agents/orchestrator/orchestrator.js'
import { CapabilityDispatcher } from '../capabilities/dispatcher.js'
import type { CapabilityRegistry } from '../capabilities/registry.js'
import { createCapabilityRegistry } from '../capabilities/setup.js'
import { DECISION_LOG_FILE, LEDGER_FILE } from '../config/defaults.js'
import type { ResolvedConfig } from '../config/schema.js'
import { createPgQueryable, PostgresDemandSource } from '../data/postgres-source.js'
import type { DataSource } from '../data/types.js'
import { ForecastModelManager } from '../forecasting/model-manager.js'
import { createDefaultModels } from '../forecasting/models/index.js'
import { createLLMClient } from '../llm/client.js'
import type { LLMClient } from '../llm/types.js'
import type { Logger } from '../logger/index.js'
import { createLogger } from '../logger/index.js'
import { JsonlDecisionSink } from '../memory/decision-log.js'
import { PerformanceLedger } from '../memory/performance-ledger.js'
import { MetricsCollector } from '../tracing/metrics.js'
import { errorMessage, toError } from './errors.js'
import { TypedEventEmitter } from './events.js'
import { type FileSystem, NodeFileSystem } from './fs.js'

export interface Container {
    config: ResolvedConfig
    logger: Logger
    eventBus: TypedEventEmitter
    fs: FileSystem
    llmClient: LLMClient
    oracle: ReasoningOracle
    dataSource: DataSource
    models: ForecastModelManager
    ledger: PerformanceLedger
    registry: CapabilityRegistry
    dispatcher: CapabilityDispatcher
    orchestrator: Orchestrator
    metricsCollector: MetricsCollector
    initialize(): Promise<void>
    shutdown(): Promise<void>
}

/** Pieces a caller may substitute; everything else is built from the config. */
export interface ContainerOverrides {
    fs?: FileSystem
    logger?: Logger
    llmClient?: LLMClient
    oracle?: ReasoningOracle
    dataSource?: DataSource
}

function createDataSource(config: ResolvedConfig, logger: Logger): DataSource {
    // without a connection string pg falls back to the PG* environment variables
    const pool = new pg.Pool(config.database.connectionString ? { connectionString: config.database.connectionString } : {})
    pool.on('error', (error) => logger.error({ error: error.message }, 'Idle database client failed'))
    return new PostgresDemandSource(
        createPgQueryable(pool),
        config.database.demandTable,
        logger,
        config.database.utcOffsetMinutes
    )
}

export function createContainer(config: ResolvedConfig, overrides: ContainerOverrides = {}): Container {
    const logger = overrides.logger ?? createLogger(config)
    const eventBus = new TypedEventEmitter((event, error) =>
        logger.warn({ event, error: errorMessage(error) }, 'Event listener failed')
    )
    const fs = overrides.fs ?? new NodeFileSystem()
    const llmClient = overrides.llmClient ?? createLLMClient(config, logger)
    const oracle =
        overrides.oracle ??
        new LLMOracle(llmClient, { model: config.model, temperature: config.temperature, maxTokens: config.maxTokens })
    const dataSource = overrides.dataSource ?? createDataSource(config, logger)

    const ledger = new PerformanceLedger(fs, {
        filePath: path.join(config.dataDir, LEDGER_FILE),
        logger: logger.child({ component: 'ledger' }),
    })
    const models = new ForecastModelManager(config.forecasting, {
        models: createDefaultModels(config.forecasting),
        logger: logger.child({ component: 'models' }),
    })
    const registry = createCapabilityRegistry({ config, dataSource, models, ledger })
    const dispatcher = new CapabilityDispatcher(registry, config.capabilities, logger, eventBus)
    const orchestrator = new Orchestrator({
        oracle,
        registry,
        dispatcher,
        models,
        ledger,
        policy: config.agent,
        freshness: config.freshness,
        primaryMetric: config.forecasting.primaryMetric,
        oracleTimeoutMs: config.llm.timeoutMs,
        logger,
        eventBus,
        decisionSink: new JsonlDecisionSink(fs, path.join(config.dataDir, DECISION_LOG_FILE)),
    })
    const metricsCollector = new MetricsCollector(eventBus)

    const container: Container = {
        config,
        logger,
        eventBus,
        fs,
        llmClient,
        oracle,
        dataSource,
        models,
        ledger,
        registry,
        dispatcher,
        orchestrator,
        metricsCollector,

        async initialize() {
            const loaded = await ledger.load()
            logger.debug({ entries: loaded }, 'Performance ledger loaded')
        },

        async shutdown() {
            const errors: Error[] = []
            try {
                await ledger.flush()
            } catch (e) {
                errors.push(toError(e))
            }
            try {
                await dataSource.close?.()
            } catch (e) {
                errors.push(toError(e))
            }
            try {
                metricsCollector.dispose()
            } catch (e) {
                errors.push(toError(e))
            }
            try {
                eventBus.removeAll()
            } catch (e) {
                errors.push(toError(e))
            }
            if (errors.length > 0) {
                logger.warn({ errors: errors.map((e) => e.message) }, 'Errors during shutdown')
            }
        },
    }

    return container
}
