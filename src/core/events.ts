import type { ErrorCode } from './errors.js'
import type { InvocationOutcome, Phase, TerminationState } from './types.js'

export type EventMap = {
    'session:start': { sessionId: string; goal: string }
    'phase:enter': { sessionId: string; phase: Phase; iteration: number }
    'oracle:call': { sessionId: string; attempt: number; success: boolean; durationMs: number }
    'capability:after': {
        sessionId?: string
        capability: string
        outcome: InvocationOutcome
        durationMs: number
        errorCode?: ErrorCode
    }
    'session:end': { sessionId: string; state: TerminationState; iterations: number }
}

type EventHandler<T> = (data: T) => void

type HandlerTable = { [K in keyof EventMap]?: Set<EventHandler<EventMap[K]>> }

export class TypedEventEmitter {
    private handlers: HandlerTable = {}

    constructor(private onListenerError?: (event: keyof EventMap, error: unknown) => void) {}

    on<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        const set: Set<EventHandler<EventMap[K]>> = this.handlers[event] ?? new Set()
        set.add(handler)
        const handlers: { [P in K]?: Set<EventHandler<EventMap[P]>> } = this.handlers
        handlers[event] = set
    }

    off<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        this.handlers[event]?.delete(handler)
    }

    emit<K extends keyof EventMap>(event: K, data: EventMap[K]): void {
        const set: Set<EventHandler<EventMap[K]>> | undefined = this.handlers[event]
        if (!set) return
        for (const handler of set) {
            // listeners are observers; one failing must not break the session loop
            try {
                handler(data)
            } catch (error) {
                this.onListenerError?.(event, error)
            }
        }
    }

    removeAll(): void {
        this.handlers = {}
    }
}
