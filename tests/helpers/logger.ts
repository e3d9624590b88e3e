import pino from 'pino'
import type { Logger } from '../../src/logger/index.js'

export function silentLogger(): Logger {
    return pino({ level: 'silent' })
}
