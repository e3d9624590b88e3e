import type { Phase, TerminalPhase } from '../../core/types.js'

/** Every legal phase change. FAILED is reachable from every live phase (abort, iteration cap, fatal errors). */
export const TRANSITIONS: Readonly<Record<Phase, readonly Phase[]>> = {
    PERCEIVE: ['REASON', 'FAILED'],
    REASON: ['PLAN', 'DONE', 'FAILED'],
    PLAN: ['ACT', 'REASON', 'FAILED'],
    ACT: ['REFLECT', 'FAILED'],
    REFLECT: ['DONE', 'ADAPT', 'FAILED'],
    ADAPT: ['REASON', 'FAILED'],
    DONE: [],
    FAILED: [],
}

export function isTerminal(phase: Phase): phase is TerminalPhase {
    return phase === 'DONE' || phase === 'FAILED'
}

export function canTransition(from: Phase, to: Phase): boolean {
    return TRANSITIONS[from].includes(to)
}
