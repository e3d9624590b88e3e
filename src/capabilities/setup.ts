import type { ResolvedConfig } from '../config/schema.js'
import { type Clock, systemClock } from '../core/types.js'
import type { DataSource } from '../data/types.js'
import type { ForecastModelManager } from '../forecasting/model-manager.js'
import type { PerformanceLedger } from '../memory/performance-ledger.js'
import { createDemandStatisticsCapability } from './analysis/demand-statistics.js'
import { createValidateQualityCapability } from './analysis/validate-quality.js'
import { createCheckFreshnessCapability } from './data/check-freshness.js'
import { createDataSummaryCapability } from './data/data-summary.js'
import { createQueryDemandCapability } from './data/query-demand.js'
import { createCompareModelsCapability } from './forecasting/compare-models.js'
import { createForecastDemandCapability } from './forecasting/forecast-demand.js'
import { createTrainModelCapability } from './forecasting/train-model.js'
import { createPerformanceHistoryCapability } from './history/performance-history.js'
import { CapabilityRegistry } from './registry.js'
import type { AnyCapability } from './types.js'
import { createCurrentTimeCapability } from './utility/current-time.js'

export interface CapabilityDeps {
    config: Pick<ResolvedConfig, 'freshness' | 'forecasting'>
    dataSource: DataSource
    models: ForecastModelManager
    ledger: PerformanceLedger
    clock?: Clock
    /** Registered after the built-ins, before the registry is sealed. */
    extra?: AnyCapability[]
}

/** Builds the process-wide registry. It is sealed on return. */
export function createCapabilityRegistry(deps: CapabilityDeps): CapabilityRegistry {
    const { config, dataSource, models, ledger } = deps
    const clock = deps.clock ?? systemClock
    const registry = new CapabilityRegistry()

    // data
    registry.register(createCheckFreshnessCapability(dataSource, config.freshness, clock))
    registry.register(createDataSummaryCapability(dataSource))
    registry.register(createQueryDemandCapability(dataSource, clock))

    // analysis
    registry.register(createValidateQualityCapability(dataSource, config.freshness))
    registry.register(createDemandStatisticsCapability(dataSource))

    // forecasting
    registry.register(createTrainModelCapability(dataSource, models, clock))
    registry.register(createCompareModelsCapability(dataSource, models, config.forecasting.primaryMetric, clock))
    registry.register(createForecastDemandCapability(dataSource, models, config.forecasting, clock))

    registry.register(createPerformanceHistoryCapability(ledger))
    registry.register(createCurrentTimeCapability(clock))

    for (const capability of deps.extra ?? []) {
        registry.register(capability)
    }

    return registry.seal()
}
