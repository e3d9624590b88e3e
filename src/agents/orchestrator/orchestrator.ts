import { randomUUID } from 'node:crypto'
import type { CapabilityDispatcher } from '../../capabilities/dispatcher.js'
import { errorCodeOf } from '../../capabilities/envelope.js'
import type { CapabilityRegistry } from '../../capabilities/registry.js'
import type { CapabilityInvocation, InvocationRequest } from '../../capabilities/types.js'
import type { AgentPolicy, FreshnessPolicy } from '../../config/schema.js'
import { type ErrorCode, errorMessage, TimeoutError, withTimeout } from '../../core/errors.js'
import type { TypedEventEmitter } from '../../core/events.js'
import { type Clock, type MetricName, type Phase, systemClock, type TerminationState } from '../../core/types.js'
import type { ForecastModelManager } from '../../forecasting/model-manager.js'
import type { ForecastResult } from '../../forecasting/types.js'
import type { Logger } from '../../logger/index.js'
import { DecisionLog, type DecisionLogSink, type PhaseRecord } from '../../memory/decision-log.js'
import type { PerformanceLedger } from '../../memory/performance-ledger.js'
import { type Decision, type PlanDecision, parseDecision } from '../oracle/decision-parser.js'
import type { ReasoningOracle, SituationContext, SituationFacts, SituationNote } from '../oracle/types.js'
import { type ScheduledInvocation, validatePlan } from './plan-validator.js'
import { reflectOnOutcomes } from './reflection.js'
import { runPlan } from './scheduler.js'
import { describeFacts, freshnessFromInvocation, modelPerformanceFact, outcomeNotes, priorSessionFacts } from './situation.js'
import { canTransition, isTerminal } from './transitions.js'

export const FRESHNESS_CAPABILITY = 'check_data_freshness'

export interface OrchestratorDeps {
    oracle: ReasoningOracle
    registry: CapabilityRegistry
    dispatcher: CapabilityDispatcher
    models: ForecastModelManager
    ledger: PerformanceLedger
    policy: AgentPolicy
    freshness: FreshnessPolicy
    primaryMetric: MetricName
    oracleTimeoutMs: number
    logger: Logger
    eventBus?: TypedEventEmitter
    decisionSink?: DecisionLogSink
    clock?: Clock
    idGenerator?: () => string
}

export interface SessionSummary {
    sessionId: string
    goal: string
    state: Exclude<TerminationState, 'running'>
    iterations: number
    answer?: string
    reason?: string
    errorCode?: ErrorCode
    /** The last forecast the session produced, kept on failure as a partial result. */
    forecast?: ForecastResult
    records: readonly PhaseRecord[]
    startedAt: string
    endedAt: string
}

export interface RunOptions {
    signal?: AbortSignal
}

interface AgentSession {
    id: string
    goal: string
    log: DecisionLog
    logger: Logger
    signal: AbortSignal
    phase: Phase
    iterations: number
    facts: SituationFacts
    history: SituationNote[]
    decision?: PlanDecision
    plan?: ScheduledInvocation[]
    lastInvocations: CapabilityInvocation[]
    lastReflection: string
    consecutiveRejections: number
    internalErrors: Map<string, number>
    forecast?: ForecastResult
    answer?: string
    failure?: { code: ErrorCode; reason: string }
}

/**
 * Drives one session through PERCEIVE → REASON → PLAN → ACT → REFLECT → ADAPT
 * until DONE or FAILED. Each phase appends exactly one record before the next
 * phase starts, and `run` never rejects: every failure ends as a FAILED session.
 */
export class Orchestrator {
    private clock: Clock
    private nextId: () => string

    constructor(private deps: OrchestratorDeps) {
        this.clock = deps.clock ?? systemClock
        this.nextId = deps.idGenerator ?? randomUUID
    }

    async run(goal: string, opts: RunOptions = {}): Promise<SessionSummary> {
        const id = this.nextId()
        const logger = this.deps.logger.child({ sessionId: id })
        const startedAt = this.clock().toISOString()
        const session: AgentSession = {
            id,
            goal,
            log: new DecisionLog(id, { sink: this.deps.decisionSink, logger, clock: this.clock }),
            logger,
            signal: opts.signal ?? new AbortController().signal,
            phase: 'PERCEIVE',
            iterations: 0,
            facts: { now: startedAt, freshness: 'unknown', modelPerformance: 'unknown', priorSessions: 'unknown' },
            history: [],
            lastInvocations: [],
            lastReflection: '',
            consecutiveRejections: 0,
            internalErrors: new Map(),
        }

        this.deps.eventBus?.emit('session:start', { sessionId: id, goal })
        logger.info({ goal }, 'session:start')
        this.enter(session, 'PERCEIVE')

        while (!isTerminal(session.phase)) {
            const next = await this.advance(session)
            this.enter(session, this.guard(session, next))
        }

        return this.finish(session, startedAt)
    }

    private async advance(s: AgentSession): Promise<Phase> {
        if (s.signal.aborted) {
            s.failure = { code: 'Aborted', reason: 'Session was cancelled' }
            return 'FAILED'
        }

        const recorded = s.log.length
        try {
            return await this.step(s)
        } catch (error) {
            const reason = `Unexpected error in ${s.phase}: ${errorMessage(error)}`
            s.logger.error({ phase: s.phase, error: errorMessage(error) }, 'phase:crashed')
            s.failure = { code: 'InternalCapabilityError', reason }
            if (s.log.length === recorded) {
                await s.log.append(s.phase, reason, [], 'InternalCapabilityError')
            }
            return 'FAILED'
        }
    }

    private step(s: AgentSession): Promise<Phase> {
        switch (s.phase) {
            case 'PERCEIVE':
                return this.perceive(s)
            case 'REASON':
                return this.reason(s)
            case 'PLAN':
                return this.plan(s)
            case 'ACT':
                return this.act(s)
            case 'REFLECT':
                return this.reflect(s)
            case 'ADAPT':
                return this.adapt(s)
            case 'DONE':
            case 'FAILED':
                throw new Error(`No step for terminal phase ${s.phase}`)
        }
    }

    /** Applies the abort check and the iteration cap to a proposed transition. */
    private guard(s: AgentSession, next: Phase): Phase {
        if (next !== 'FAILED' && s.signal.aborted) {
            s.failure = { code: 'Aborted', reason: 'Session was cancelled' }
            return 'FAILED'
        }
        if (next === 'REASON' && s.iterations >= this.deps.policy.maxIterations) {
            s.failure = {
                code: 'ReasoningDivergence',
                reason: `Did not converge within ${this.deps.policy.maxIterations} iterations`,
            }
            return 'FAILED'
        }
        if (!canTransition(s.phase, next)) {
            s.failure = { code: 'InternalCapabilityError', reason: `Illegal transition ${s.phase} -> ${next}` }
            return 'FAILED'
        }
        return next
    }

    private enter(s: AgentSession, phase: Phase): void {
        s.phase = phase
        if (phase === 'REASON') s.iterations++
        this.deps.eventBus?.emit('phase:enter', { sessionId: s.id, phase, iteration: s.iterations })
        s.logger.info({ phase, iteration: s.iterations }, 'phase:enter')
    }

    private async perceive(s: AgentSession): Promise<Phase> {
        const now = this.clock()
        const invocations: CapabilityInvocation[] = []
        if (this.deps.registry.has(FRESHNESS_CAPABILITY)) {
            invocations.push(await this.dispatch(s, { capability: FRESHNESS_CAPABILITY, arguments: {} }))
        }

        s.facts = {
            now: now.toISOString(),
            freshness: freshnessFromInvocation(invocations[0], now, this.deps.freshness),
            modelPerformance: modelPerformanceFact(this.deps.models.latest(), this.deps.primaryMetric),
            priorSessions: priorSessionFacts(this.deps.ledger.recent(this.deps.policy.historyLimit)),
        }
        await s.log.append('PERCEIVE', describeFacts(s.facts), invocations)
        return 'REASON'
    }

    private async reason(s: AgentSession): Promise<Phase> {
        const context: SituationContext = {
            goal: s.goal,
            facts: s.facts,
            history: s.history,
            availableCapabilities: this.deps.registry.getDefinitions(),
        }

        const attempts = 1 + this.deps.policy.oracleRetries
        let lastError = ''
        let lastCode: ErrorCode = 'OracleFailure'
        for (let attempt = 0; attempt < attempts; attempt++) {
            const started = performance.now()
            try {
                const raw = await withTimeout(
                    'Reasoning oracle',
                    this.deps.oracleTimeoutMs,
                    (signal) => this.deps.oracle.propose(context, { strict: attempt > 0, signal }),
                    s.signal
                )
                const decision = parseDecision(raw)
                this.emitOracleCall(s, attempt, decision.ok, started)
                if (decision.ok) return this.accept(s, decision.value)
                lastError = decision.error
                lastCode = 'OracleFailure'
            } catch (error) {
                this.emitOracleCall(s, attempt, false, started)
                if (s.signal.aborted) {
                    s.failure = { code: 'Aborted', reason: 'Session was cancelled while reasoning' }
                    await s.log.append('REASON', s.failure.reason, [], 'Aborted')
                    return 'FAILED'
                }
                lastError = errorMessage(error)
                lastCode = error instanceof TimeoutError ? 'TimeoutError' : 'OracleFailure'
            }
            s.logger.warn({ attempt, error: lastError }, 'oracle:failed')
        }

        s.failure = { code: lastCode, reason: `Reasoning oracle failed after ${attempts} attempt(s): ${lastError}` }
        await s.log.append('REASON', s.failure.reason, [], lastCode)
        return 'FAILED'
    }

    private async accept(s: AgentSession, decision: Decision): Promise<Phase> {
        if (decision.done) {
            s.answer = decision.summary
            await s.log.append('REASON', decision.summary)
            return 'DONE'
        }
        s.decision = decision
        const names = decision.invocations.map((i) => i.capability_name).join(', ')
        await s.log.append('REASON', decision.rationale ?? `Proposed ${decision.invocations.length} invocation(s): ${names}`)
        return 'PLAN'
    }

    private async plan(s: AgentSession): Promise<Phase> {
        const decision = s.decision
        s.decision = undefined
        if (!decision) throw new Error('PLAN entered without a proposed plan')

        const validated = validatePlan(decision.invocations, this.deps.registry, this.deps.policy.maxInvocationsPerPlan)
        if (!validated.ok) {
            const { code, message } = validated.error
            s.consecutiveRejections++
            s.history.push({ iteration: s.iterations, phase: 'PLAN', summary: `Plan rejected (${code}): ${message}` })

            if (s.consecutiveRejections > this.deps.policy.planRetryLimit) {
                s.failure = { code, reason: `Plan rejected ${s.consecutiveRejections} times in a row: ${message}` }
                await s.log.append('PLAN', s.failure.reason, [], code)
                return 'FAILED'
            }
            await s.log.append('PLAN', `Plan rejected: ${message}`, [], code)
            return 'REASON'
        }

        s.consecutiveRejections = 0
        s.plan = validated.value
        const names = validated.value.map((i) => i.request.capability).join(', ')
        await s.log.append('PLAN', `Plan accepted: ${names}`)
        return 'ACT'
    }

    private async act(s: AgentSession): Promise<Phase> {
        const plan = s.plan
        s.plan = undefined
        if (!plan) throw new Error('ACT entered without a validated plan')

        const invocations = await runPlan(plan, (request) => this.dispatch(s, request), this.deps.policy.actConcurrency)
        s.lastInvocations = invocations
        const failed = invocations.filter((i) => !i.envelope.success).length
        await s.log.append(
            'ACT',
            `Executed ${invocations.length} invocation(s): ${invocations.length - failed} succeeded, ${failed} failed`,
            invocations
        )
        return 'REFLECT'
    }

    private async reflect(s: AgentSession): Promise<Phase> {
        const registry = this.deps.registry
        const outcome = reflectOnOutcomes({
            invocations: s.lastInvocations,
            producesForecast: (name) => registry.get(name)?.produces === 'forecast',
            priorInternalErrors: s.internalErrors,
        })

        for (const inv of s.lastInvocations) {
            if (errorCodeOf(inv.envelope) === 'InternalCapabilityError') {
                s.internalErrors.set(inv.capability, (s.internalErrors.get(inv.capability) ?? 0) + 1)
            }
        }
        if (outcome.forecast) s.forecast = outcome.forecast
        s.lastReflection = outcome.rationale

        if (outcome.next === 'FAILED') {
            s.failure = { code: outcome.errorCode, reason: outcome.rationale }
            await s.log.append('REFLECT', outcome.rationale, [], outcome.errorCode)
            return 'FAILED'
        }
        await s.log.append('REFLECT', outcome.rationale)
        return outcome.next
    }

    private async adapt(s: AgentSession): Promise<Phase> {
        const outcomes = outcomeNotes(s.lastInvocations)
        s.history.push({ iteration: s.iterations, phase: 'ADAPT', summary: s.lastReflection, outcomes })
        await s.log.append('ADAPT', `Added ${outcomes.length} outcome(s) to the context: ${s.lastReflection}`)
        return 'REASON'
    }

    private async finish(s: AgentSession, startedAt: string): Promise<SessionSummary> {
        let state: SessionSummary['state']
        if (s.phase === 'DONE') {
            state = 'succeeded'
            const rationale =
                s.answer ?? (s.forecast ? `Forecast ${s.forecast.id} (${s.forecast.horizon} steps) is ready` : 'Goal satisfied')
            await s.log.append('DONE', rationale)
        } else {
            state = s.failure?.code === 'Aborted' ? 'aborted' : 'failed'
            const reason = s.failure?.reason ?? 'Session failed'
            const partial = s.forecast ? `; last forecast ${s.forecast.id} is kept` : ''
            await s.log.append('FAILED', `${reason}${partial}`, [], s.failure?.code)
        }

        const summary: SessionSummary = {
            sessionId: s.id,
            goal: s.goal,
            state,
            iterations: s.iterations,
            ...(s.answer ? { answer: s.answer } : {}),
            ...(state !== 'succeeded' && s.failure ? { reason: s.failure.reason, errorCode: s.failure.code } : {}),
            ...(s.forecast ? { forecast: s.forecast } : {}),
            records: s.log.entries(),
            startedAt,
            endedAt: this.clock().toISOString(),
        }

        await this.deps.ledger.append({
            sessionId: s.id,
            goal: s.goal,
            state,
            iterations: s.iterations,
            ...(summary.reason ? { reason: summary.reason } : {}),
            ...(summary.errorCode ? { errorCode: summary.errorCode } : {}),
            ...(s.forecast
                ? {
                      forecast: {
                          id: s.forecast.id,
                          modelKind: s.forecast.candidate.kind,
                          horizon: s.forecast.horizon,
                          ...(s.forecast.candidate.metrics.mape !== undefined ? { mape: s.forecast.candidate.metrics.mape } : {}),
                      },
                  }
                : {}),
        })

        this.deps.eventBus?.emit('session:end', { sessionId: s.id, state, iterations: s.iterations })
        s.logger.info({ state, iterations: s.iterations, reason: summary.reason }, 'session:end')
        return summary
    }

    private dispatch(s: AgentSession, request: InvocationRequest): Promise<CapabilityInvocation> {
        return this.deps.dispatcher.dispatch(request, { signal: s.signal, sessionId: s.id, logger: s.logger })
    }

    private emitOracleCall(s: AgentSession, attempt: number, success: boolean, started: number): void {
        this.deps.eventBus?.emit('oracle:call', {
            sessionId: s.id,
            attempt,
            success,
            durationMs: Math.round(performance.now() - started),
        })
    }
}
