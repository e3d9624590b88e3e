export type Phase = 'PERCEIVE' | 'REASON' | 'PLAN' | 'ACT' | 'REFLECT' | 'ADAPT' | 'DONE' | 'FAILED'

export type TerminalPhase = Extract<Phase, 'DONE' | 'FAILED'>

export type TerminationState = 'running' | 'succeeded' | 'failed' | 'aborted'

export type InvocationOutcome = 'ok' | 'error' | 'timeout'

export type ModelKind = 'seasonal' | 'autoregressive' | 'naive'

export const MODEL_KINDS: readonly ModelKind[] = ['seasonal', 'autoregressive', 'naive']

export type MetricName = 'mape' | 'rmse' | 'mae'

/** Injectable clock so sessions and freshness checks are reproducible in tests. */
export type Clock = () => Date

export const systemClock: Clock = () => new Date()
