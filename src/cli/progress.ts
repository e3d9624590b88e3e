import type { TypedEventEmitter } from '../core/events.js'
import type { Phase } from '../core/types.js'

const PHASE_LABELS: Record<Phase, string> = {
    PERCEIVE: 'Checking data freshness...',
    REASON: 'Reasoning...',
    PLAN: 'Validating plan...',
    ACT: 'Running capabilities...',
    REFLECT: 'Reviewing results...',
    ADAPT: 'Adjusting context...',
    DONE: 'Done',
    FAILED: 'Failed',
}

const CAPABILITY_LABELS: Record<string, string> = {
    query_demand_data: 'Loading demand data...',
    train_model: 'Training model...',
    compare_models: 'Comparing models...',
    forecast_demand: 'Forecasting demand...',
    validate_data_quality: 'Validating data quality...',
    calculate_demand_statistics: 'Computing statistics...',
}

interface Spinner {
    message(msg: string): void
}

export interface ProgressTracker {
    dispose(): void
}

export function createProgressTracker(eventBus: TypedEventEmitter, spinner: Spinner): ProgressTracker {
    const onPhase = (data: { phase: Phase; iteration: number }) => {
        const suffix = data.iteration > 0 ? ` (iteration ${data.iteration})` : ''
        spinner.message(`${PHASE_LABELS[data.phase]}${suffix}`)
    }

    const onCapability = (data: { capability: string; durationMs: number; outcome: string }) => {
        const label = CAPABILITY_LABELS[data.capability]
        if (!label) return
        const secs = (data.durationMs / 1000).toFixed(1)
        spinner.message(`${label.replace('...', '')} ${data.outcome === 'ok' ? 'done' : data.outcome} (${secs}s)`)
    }

    eventBus.on('phase:enter', onPhase)
    eventBus.on('capability:after', onCapability)

    return {
        dispose() {
            eventBus.off('phase:enter', onPhase)
            eventBus.off('capability:after', onCapability)
        },
    }
}
