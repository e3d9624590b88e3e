import { describe, expect, it } from 'vitest'
import { Orchestrator, type SessionSummary } from '../../src/agents/orchestrator/orchestrator.js'
import { CapabilityDispatcher } from '../../src/capabilities/dispatcher.js'
import { createCapabilityRegistry } from '../../src/capabilities/setup.js'
import type { AgentPolicy } from '../../src/config/schema.js'
import { DEFAULT_CONFIG } from '../../src/config/defaults.js'
import { TypedEventEmitter } from '../../src/core/events.js'
import { MockFileSystem } from '../../src/core/fs.js'
import type { Phase } from '../../src/core/types.js'
import type { DemandObservation } from '../../src/data/types.js'
import { ForecastModelManager } from '../../src/forecasting/model-manager.js'
import { createDefaultModels, type ModelSet } from '../../src/forecasting/models/index.js'
import { JsonlDecisionSink } from '../../src/memory/decision-log.js'
import { PerformanceLedger } from '../../src/memory/performance-ledger.js'
import { dailyCycle, hourlySeries, InMemoryDemandSource } from '../helpers/demand-data.js'
import { fakeModels } from '../helpers/fake-models.js'
import { silentLogger } from '../helpers/logger.js'
import { finish, plan, ScriptedOracle } from '../helpers/scripted-oracle.js'

const NOW = new Date('2024-05-03T00:30:00.000Z')
const LEDGER = '/data/sessions.jsonl'
const DECISIONS = '/data/decisions.jsonl'
const RANGE = { start_date: '2024-05-01', end_date: '2024-05-02' }

function counter(prefix: string) {
    let n = 0
    return () => `${prefix}-${++n}`
}

interface HarnessOptions {
    steps: unknown[]
    rows?: DemandObservation[]
    models?: ModelSet
    policy?: Partial<AgentPolicy>
    now?: Date
}

function harness(options: HarnessOptions) {
    const clock = () => options.now ?? NOW
    const logger = silentLogger()
    const eventBus = new TypedEventEmitter()
    const fs = new MockFileSystem()
    const ledger = new PerformanceLedger(fs, { filePath: LEDGER, clock, idGenerator: counter('entry') })
    const models = new ForecastModelManager(DEFAULT_CONFIG.forecasting, {
        models: options.models ?? fakeModels({ seasonal: { factor: 1.06 } }),
        clock,
        idGenerator: counter('model'),
    })
    const dataSource = new InMemoryDemandSource(options.rows ?? hourlySeries(48, '2024-05-01T00:00:00.000Z', dailyCycle))
    const registry = createCapabilityRegistry({ config: DEFAULT_CONFIG, dataSource, models, ledger, clock })
    const dispatcher = new CapabilityDispatcher(registry, DEFAULT_CONFIG.capabilities, logger, eventBus)
    const oracle = new ScriptedOracle(options.steps)
    const orchestrator = new Orchestrator({
        oracle,
        registry,
        dispatcher,
        models,
        ledger,
        policy: { ...DEFAULT_CONFIG.agent, ...options.policy },
        freshness: DEFAULT_CONFIG.freshness,
        primaryMetric: 'mape',
        oracleTimeoutMs: 1000,
        logger,
        eventBus,
        decisionSink: new JsonlDecisionSink(fs, DECISIONS),
        clock,
        idGenerator: counter('session'),
    })

    const phases: Phase[] = []
    eventBus.on('phase:enter', ({ phase }) => phases.push(phase))
    return { orchestrator, oracle, ledger, fs, phases, dataSource }
}

const phasesOf = (summary: SessionSummary) => summary.records.map((r) => r.phase)

/** Every capability outcome in the log satisfies the envelope rules. */
function expectWellFormedEnvelopes(summary: SessionSummary) {
    for (const record of summary.records) {
        for (const inv of record.invocations) {
            if (inv.envelope.success) {
                expect(inv.envelope.data).not.toBeNull()
                expect(inv.envelope.data).toBeDefined()
            } else {
                expect(inv.envelope.message.length).toBeGreaterThan(0)
                expect(typeof inv.envelope.metadata.errorCode).toBe('string')
            }
        }
    }
}

describe('Orchestrator session flow', () => {
    it('checks freshness, forecasts and finishes with the forecast', async () => {
        const h = harness({ steps: [plan({ capability_name: 'forecast_demand', arguments: { horizon: 6, ...RANGE } })] })

        const summary = await h.orchestrator.run('Forecast the next 6 hours')

        expect(summary.state).toBe('succeeded')
        expect(summary.sessionId).toBe('session-1')
        expect(summary.iterations).toBe(1)
        expect(phasesOf(summary)).toEqual(['PERCEIVE', 'REASON', 'PLAN', 'ACT', 'REFLECT', 'DONE'])
        expect(h.phases).toEqual(['PERCEIVE', 'REASON', 'PLAN', 'ACT', 'REFLECT', 'DONE'])

        expect(summary.records[0]?.rationale).toBe('data fresh (1h 30m old); no trained model; 0 prior session(s)')
        expect(summary.records[0]?.invocations.map((i) => i.capability)).toEqual(['check_data_freshness'])
        expect(summary.records[2]?.rationale).toBe('Plan accepted: forecast_demand')
        expect(summary.records[3]?.rationale).toBe('Executed 1 invocation(s): 1 succeeded, 0 failed')
        expect(summary.records[4]?.rationale).toBe('Forecast model-2 produced with the seasonal model')
        expect(summary.records[5]?.rationale).toBe('Forecast model-2 (6 steps) is ready')

        expect(summary.forecast?.points).toHaveLength(6)
        expect(summary.forecast?.candidate.kind).toBe('seasonal')
        expect(h.oracle.calls).toHaveLength(1)
        expectWellFormedEnvelopes(summary)
    })

    it('appends the session to the ledger and the decision log to disk', async () => {
        const h = harness({ steps: [plan({ capability_name: 'forecast_demand', arguments: { horizon: 6, ...RANGE } })] })

        const summary = await h.orchestrator.run('Forecast the next 6 hours')

        const entry = h.ledger.recent(1)[0]
        expect(entry).toMatchObject({
            id: 'entry-1',
            sessionId: 'session-1',
            goal: 'Forecast the next 6 hours',
            state: 'succeeded',
            iterations: 1,
            forecast: { id: 'model-2', modelKind: 'seasonal', horizon: 6 },
        })
        expect((await h.fs.readText(LEDGER)).trim().split('\n')).toHaveLength(1)

        const lines = (await h.fs.readText(DECISIONS)).trim().split('\n')
        expect(lines).toHaveLength(summary.records.length)
        expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({ session_id: 'session-1', phase: 'PERCEIVE' })
    })

    it('finishes straight from REASON when the oracle can answer', async () => {
        const h = harness({ steps: [finish('Data is current as of 23:00 UTC')] })

        const summary = await h.orchestrator.run('Is the data current?')

        expect(summary.state).toBe('succeeded')
        expect(summary.answer).toBe('Data is current as of 23:00 UTC')
        expect(phasesOf(summary)).toEqual(['PERCEIVE', 'REASON', 'DONE'])
        expect(summary.records[2]?.rationale).toBe('Data is current as of 23:00 UTC')
    })

    it('feeds outcomes back into the next REASON round', async () => {
        const h = harness({
            steps: [plan({ capability_name: 'get_current_time' }), finish('It is half past midnight')],
        })

        const summary = await h.orchestrator.run('What time is it?')

        expect(phasesOf(summary)).toEqual(['PERCEIVE', 'REASON', 'PLAN', 'ACT', 'REFLECT', 'ADAPT', 'REASON', 'DONE'])
        expect(summary.iterations).toBe(2)
        expect(h.oracle.calls[1]?.context.history).toEqual([
            {
                iteration: 1,
                phase: 'ADAPT',
                summary: 'All 1 invocation(s) succeeded; no forecast produced yet',
                outcomes: [
                    {
                        capability: 'get_current_time',
                        success: true,
                        message: 'Current time is 2024-05-03T00:30:00.000Z',
                        data: { now: '2024-05-03T00:30:00.000Z' },
                    },
                ],
            },
        ])
    })

    it('fails with ReasoningDivergence at the iteration cap', async () => {
        const h = harness({ steps: [plan({ capability_name: 'get_current_time' })], policy: { maxIterations: 2 } })

        const summary = await h.orchestrator.run('Loop forever')

        expect(summary.state).toBe('failed')
        expect(summary.errorCode).toBe('ReasoningDivergence')
        expect(summary.reason).toBe('Did not converge within 2 iterations')
        expect(summary.iterations).toBe(2)
        expect(h.oracle.calls).toHaveLength(2)
        expect(summary.records.at(-1)).toMatchObject({
            phase: 'FAILED',
            rationale: 'Did not converge within 2 iterations',
            errorCode: 'ReasoningDivergence',
        })
    })

    it('rejects an unregistered capability before anything runs', async () => {
        const h = harness({ steps: [plan({ capability_name: 'launch_rocket' }), finish('Cannot do that')] })

        const summary = await h.orchestrator.run('Launch a rocket')

        expect(phasesOf(summary)).toEqual(['PERCEIVE', 'REASON', 'PLAN', 'REASON', 'DONE'])
        expect(summary.records[2]).toMatchObject({
            rationale: "Plan rejected: #0: Capability 'launch_rocket' is not registered",
            errorCode: 'CapabilityNotFound',
        })
        expect(h.oracle.calls[1]?.context.history).toEqual([
            {
                iteration: 1,
                phase: 'PLAN',
                summary: "Plan rejected (CapabilityNotFound): #0: Capability 'launch_rocket' is not registered",
            },
        ])
    })

    it('records each invalid plan and recovers when the oracle corrects it', async () => {
        const h = harness({
            steps: [
                plan({ capability_name: 'forecast_demand', arguments: { horizon: 500 } }),
                plan({ capability_name: 'forecast_demand', arguments: { horizon: 'tomorrow' } }),
                plan({ capability_name: 'forecast_demand', arguments: { horizon: 6, ...RANGE } }),
            ],
        })

        const summary = await h.orchestrator.run('Forecast the next 6 hours')

        expect(summary.state).toBe('succeeded')
        expect(summary.iterations).toBe(3)
        expect(summary.records.filter((r) => r.phase === 'PLAN' && r.errorCode === 'ValidationFailed')).toHaveLength(2)
        expect(summary.records.filter((r) => r.phase === 'ACT')).toHaveLength(1)
    })

    it('fails once plans keep being rejected', async () => {
        const h = harness({ steps: [plan({ capability_name: 'launch_rocket' })] })

        const summary = await h.orchestrator.run('Launch a rocket')

        expect(summary.state).toBe('failed')
        expect(summary.errorCode).toBe('CapabilityNotFound')
        expect(summary.reason).toBe("Plan rejected 4 times in a row: #0: Capability 'launch_rocket' is not registered")
        expect(summary.iterations).toBe(4)
    })

    it('retries a failed oracle call once in strict mode', async () => {
        const h = harness({ steps: [new Error('connection refused'), finish('Recovered')] })

        const summary = await h.orchestrator.run('Anything')

        expect(summary.state).toBe('succeeded')
        expect(h.oracle.calls.map((c) => c.strict)).toEqual([false, true])
    })

    it('fails with OracleFailure when no reply can be parsed', async () => {
        const h = harness({ steps: ['let me think about it'] })

        const summary = await h.orchestrator.run('Anything')

        expect(summary.state).toBe('failed')
        expect(summary.errorCode).toBe('OracleFailure')
        expect(summary.reason).toBe('Reasoning oracle failed after 2 attempt(s): Oracle reply is not a JSON object')
        expect(phasesOf(summary)).toEqual(['PERCEIVE', 'REASON', 'FAILED'])
    })

    it('ends as aborted when cancelled mid-session', async () => {
        const controller = new AbortController()
        const h = harness({
            steps: [
                () => {
                    controller.abort()
                    return plan({ capability_name: 'get_current_time' })
                },
            ],
        })

        const summary = await h.orchestrator.run('Forecast', { signal: controller.signal })

        expect(summary.state).toBe('aborted')
        expect(summary.errorCode).toBe('Aborted')
        expect(phasesOf(summary)).toEqual(['PERCEIVE', 'REASON', 'FAILED'])
        expect(h.ledger.recent(1)[0]?.state).toBe('aborted')
    })

    it('fails when there is no data to work with', async () => {
        const h = harness({ rows: [], steps: [plan({ capability_name: 'forecast_demand' })] })

        const summary = await h.orchestrator.run('Forecast tomorrow')

        expect(summary.records[0]?.rationale).toBe('freshness unknown; no trained model; 0 prior session(s)')
        expect(summary.state).toBe('failed')
        expect(summary.errorCode).toBe('NoDataAvailable')
        expect(summary.reason).toBe('forecast_demand failed with NoDataAvailable: The demand table holds no observations')
        expectWellFormedEnvelopes(summary)
    })

    it('lets the oracle pick another range when the default one holds no rows', async () => {
        const h = harness({
            now: new Date('2024-06-15T12:00:00.000Z'),
            rows: hourlySeries(240, '2024-04-23T00:00:00.000Z', dailyCycle),
            steps: [
                plan({ capability_name: 'forecast_demand', arguments: { horizon: 24 } }),
                plan({
                    capability_name: 'forecast_demand',
                    arguments: { horizon: 24, start_date: '2024-04-23', end_date: '2024-05-02' },
                }),
            ],
        })

        const summary = await h.orchestrator.run('Forecast tomorrow')

        expect(summary.state).toBe('succeeded')
        expect(phasesOf(summary)).toEqual([
            'PERCEIVE',
            'REASON',
            'PLAN',
            'ACT',
            'REFLECT',
            'ADAPT',
            'REASON',
            'PLAN',
            'ACT',
            'REFLECT',
            'DONE',
        ])
        expect(h.oracle.calls).toHaveLength(2)
        expect(h.oracle.calls[1]?.context.history[0]).toMatchObject({
            phase: 'ADAPT',
            summary: '1 of 1 invocation(s) failed: forecast_demand (InsufficientData)',
            outcomes: [
                {
                    capability: 'forecast_demand',
                    success: false,
                    errorCode: 'InsufficientData',
                    message:
                        'No demand data found from 2024-05-18 to 2024-06-15; stored data covers 2024-04-23 to 2024-05-02',
                },
            ],
        })
        expect(summary.forecast?.points[0]?.timestamp).toBe('2024-05-03T00:00:00.000Z')
        expectWellFormedEnvelopes(summary)
    })

    it('falls back to the naive model when the others cannot train', async () => {
        const h = harness({
            models: fakeModels({ seasonal: { fail: 'singular matrix' }, autoregressive: { minimum: 10_000 } }),
            steps: [plan({ capability_name: 'forecast_demand', arguments: { horizon: 6, ...RANGE } })],
        })

        const summary = await h.orchestrator.run('Forecast the next 6 hours')

        expect(summary.state).toBe('succeeded')
        expect(summary.forecast?.candidate.kind).toBe('naive')
        const act = summary.records.find((r) => r.phase === 'ACT')
        const envelope = act?.invocations[0]?.envelope
        expect(envelope?.success).toBe(true)
        expect(envelope?.metadata.attempts).toMatchObject([
            { kind: 'seasonal', status: 'failed', errorCode: 'InternalCapabilityError' },
            { kind: 'autoregressive', status: 'failed', errorCode: 'InsufficientData' },
            { kind: 'naive', status: 'trained' },
        ])
        expect(h.ledger.recent(1)[0]?.forecast?.modelKind).toBe('naive')
    })

    it('sees earlier sessions and the trained model in the next PERCEIVE', async () => {
        const h = harness({ steps: [plan({ capability_name: 'forecast_demand', arguments: { horizon: 6, ...RANGE } })] })

        const first = await h.orchestrator.run('Forecast the next 6 hours')
        const second = await h.orchestrator.run('Forecast the next 6 hours')

        const mape = first.forecast?.candidate.metrics.mape ?? Number.NaN
        expect(second.sessionId).toBe('session-2')
        expect(second.records[0]?.rationale).toBe(
            `data fresh (1h 30m old); last model seasonal MAPE ${mape.toFixed(2)}; 1 prior session(s)`
        )
        expect(h.oracle.calls[1]?.context.facts.priorSessions).toEqual([
            { goal: 'Forecast the next 6 hours', state: 'succeeded', modelKind: 'seasonal', mape },
        ])
    })

    it('forecasts end to end with the built-in models', async () => {
        const h = harness({
            rows: hourlySeries(240, '2024-04-23T00:00:00.000Z', dailyCycle),
            models: createDefaultModels(DEFAULT_CONFIG.forecasting),
            steps: [
                plan(
                    { capability_name: 'check_data_freshness' },
                    {
                        capability_name: 'forecast_demand',
                        arguments: { horizon: 24, start_date: '2024-04-23', end_date: '2024-05-02' },
                        depends_on: [0],
                    }
                ),
            ],
        })

        const summary = await h.orchestrator.run('Forecast tomorrow')

        expect(summary.state).toBe('succeeded')
        expect(summary.forecast?.points).toHaveLength(24)
        expect(summary.forecast?.points[0]?.timestamp).toBe('2024-05-03T00:00:00.000Z')
        expectWellFormedEnvelopes(summary)
    })
})
