import type { ForecastingPolicy } from '../../config/schema.js'
import type { ModelKind } from '../../core/types.js'
import type { ForecastModel } from '../types.js'
import { AutoregressiveModel } from './autoregressive.js'
import { SeasonalNaiveModel } from './naive.js'
import { SeasonalModel } from './seasonal.js'

export type ModelSet = Record<ModelKind, ForecastModel>

export function createDefaultModels(policy: ForecastingPolicy): ModelSet {
    return {
        seasonal: new SeasonalModel({ period: policy.seasonalPeriod, z: policy.intervalZ }),
        autoregressive: new AutoregressiveModel({ order: policy.arOrder, z: policy.intervalZ }),
        naive: new SeasonalNaiveModel(policy.naivePeriod),
    }
}

export { AutoregressiveModel, SeasonalModel, SeasonalNaiveModel }
