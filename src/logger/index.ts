import pino from 'pino'
import type { ResolvedConfig } from '../config/schema.js'

export type Logger = pino.Logger

// stdout belongs to the CLI's answers; logs go to stderr
const STDERR = 2

export function createLogger(config: Pick<ResolvedConfig, 'logLevel'>): Logger {
    const options = { name: 'demand-agent', level: config.logLevel }
    if (config.logLevel === 'debug' || config.logLevel === 'trace') {
        return pino({
            ...options,
            transport: { target: 'pino-pretty', options: { colorize: true, destination: STDERR } },
        })
    }
    return pino(options, pino.destination(STDERR))
}
