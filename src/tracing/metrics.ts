import type { TypedEventEmitter } from '../core/events.js'
import type { Phase } from '../core/types.js'

interface CapabilityMetrics {
    calls: number
    errors: number
    timeouts: number
    totalDuration: number
}

interface OracleMetrics {
    calls: number
    failures: number
    totalDuration: number
}

export class MetricsCollector {
    private capabilities = new Map<string, CapabilityMetrics>()
    private phases = new Map<Phase, number>()
    private oracle: OracleMetrics = { calls: 0, failures: 0, totalDuration: 0 }
    private sessions = { started: 0, succeeded: 0, failed: 0, aborted: 0 }
    private cleanups: Array<() => void> = []

    constructor(eventBus: TypedEventEmitter) {
        const onSessionStart = () => {
            this.sessions.started++
        }
        eventBus.on('session:start', onSessionStart)
        this.cleanups.push(() => eventBus.off('session:start', onSessionStart))

        const onPhase = ({ phase }: { phase: Phase }) => {
            this.phases.set(phase, (this.phases.get(phase) ?? 0) + 1)
        }
        eventBus.on('phase:enter', onPhase)
        this.cleanups.push(() => eventBus.off('phase:enter', onPhase))

        const onOracle = ({ success, durationMs }: { success: boolean; durationMs: number }) => {
            this.oracle.calls++
            if (!success) this.oracle.failures++
            this.oracle.totalDuration += durationMs
        }
        eventBus.on('oracle:call', onOracle)
        this.cleanups.push(() => eventBus.off('oracle:call', onOracle))

        const onCapability = ({ capability, outcome, durationMs }: { capability: string; outcome: string; durationMs: number }) => {
            const m = this.ensureCapability(capability)
            m.calls++
            m.totalDuration += durationMs
            if (outcome === 'error') m.errors++
            if (outcome === 'timeout') m.timeouts++
        }
        eventBus.on('capability:after', onCapability)
        this.cleanups.push(() => eventBus.off('capability:after', onCapability))

        const onSessionEnd = ({ state }: { state: string }) => {
            if (state === 'succeeded') this.sessions.succeeded++
            else if (state === 'aborted') this.sessions.aborted++
            else if (state === 'failed') this.sessions.failed++
        }
        eventBus.on('session:end', onSessionEnd)
        this.cleanups.push(() => eventBus.off('session:end', onSessionEnd))
    }

    dispose(): void {
        for (const cleanup of this.cleanups) cleanup()
        this.cleanups = []
    }

    private ensureCapability(name: string): CapabilityMetrics {
        let m = this.capabilities.get(name)
        if (!m) {
            m = { calls: 0, errors: 0, timeouts: 0, totalDuration: 0 }
            this.capabilities.set(name, m)
        }
        return m
    }

    getCapabilityMetrics(): Map<string, CapabilityMetrics> {
        return new Map(this.capabilities)
    }

    getPhaseCounts(): Map<Phase, number> {
        return new Map(this.phases)
    }

    getOracleMetrics(): OracleMetrics {
        return { ...this.oracle }
    }

    getSessionCounts(): { started: number; succeeded: number; failed: number; aborted: number } {
        return { ...this.sessions }
    }

    formatStatus(): string {
        const s = this.sessions
        const lines: string[] = []
        lines.push(`Sessions: ${s.started} started, ${s.succeeded} succeeded, ${s.failed} failed, ${s.aborted} aborted`)
        lines.push(`Oracle: ${this.oracle.calls} calls, ${this.oracle.failures} failures, ${this.oracle.totalDuration}ms`)

        if (this.phases.size > 0) {
            const phases = [...this.phases].map(([phase, n]) => `${phase}=${n}`).join(' ')
            lines.push(`Phases: ${phases}`)
        }
        if (this.capabilities.size > 0) {
            lines.push('Capabilities:')
            for (const [name, m] of this.capabilities) {
                lines.push(`  ${name}: ${m.calls} calls, ${m.errors} errors, ${m.timeouts} timeouts, ${m.totalDuration}ms`)
            }
        }

        return lines.join('\n')
    }
}
