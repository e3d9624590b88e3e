import { Command, InvalidArgumentError } from 'commander'
import { loadConfig } from '../config/loader.js'
import type { Config } from '../config/schema.js'
import { type Container, createContainer } from '../core/container.js'
import { errorMessage } from '../core/errors.js'
import { NodeFileSystem } from '../core/fs.js'
import { runGoal, startREPL } from './repl.js'
import { colors, formatCapabilities, formatError, formatHistory } from './ui.js'

export const VERSION = '0.1.0'

interface GlobalOptions {
    model?: string
    baseUrl?: string
    maxIterations?: number
    dataDir?: string
    debug?: boolean
    verbose?: boolean
}

function parsePositiveInt(value: string): number {
    const n = Number.parseInt(value, 10)
    if (Number.isNaN(n) || n < 1 || String(n) !== value.trim()) {
        throw new InvalidArgumentError('Expected a positive integer.')
    }
    return n
}

/** Flags become the highest-priority config layer; absent flags leave lower layers alone. */
export function cliFlagsToConfig(options: GlobalOptions): Config {
    const flags: Config = {}
    if (options.model) flags.model = options.model
    if (options.baseUrl) flags.baseURL = options.baseUrl
    if (options.dataDir) flags.dataDir = options.dataDir
    if (options.debug) flags.logLevel = 'debug'
    if (options.maxIterations !== undefined) flags.agent = { maxIterations: options.maxIterations }
    return flags
}

async function withContainer(options: GlobalOptions, fn: (container: Container) => Promise<void>): Promise<void> {
    const config = await loadConfig({ fs: new NodeFileSystem(), cliFlags: cliFlagsToConfig(options) })
    const container = createContainer(config)
    try {
        await container.initialize()
        await fn(container)
        if (options.debug) console.error(colors.dim(container.metricsCollector.formatStatus()))
    } finally {
        await container.shutdown()
    }
}

function fail(error: unknown): void {
    console.error(formatError(errorMessage(error)))
    process.exitCode = 1
}

export function createProgram(): Command {
    const program = new Command()

    const chat = async () => {
        const options = program.opts<GlobalOptions>()
        try {
            await withContainer(options, (container) => startREPL(container, { version: VERSION, verbose: options.verbose }))
        } catch (error) {
            fail(error)
        }
    }

    program
        .name('demand-agent')
        .description('Autonomous decision loop for electricity demand questions')
        .version(VERSION)
        .option('-m, --model <model>', 'reasoning model served by the LLM endpoint')
        .option('--base-url <url>', 'OpenAI-compatible endpoint (default: local Ollama)')
        .option('--max-iterations <n>', 'REASON rounds before a session gives up', parsePositiveInt)
        .option('--data-dir <dir>', 'where the decision log and session ledger are written')
        .option('--debug', 'enable debug logging')
        .option('-v, --verbose', 'print the decision log after each session')
        .action(chat)

    program
        .command('chat')
        .description('Start the interactive loop (same as running without a command)')
        .action(chat)

    program
        .command('ask')
        .description('Run a single goal and print the outcome')
        .argument('<goal...>', 'what the agent should achieve')
        .option('--json', 'print the session summary as JSON')
        .action(async (words: string[], cmdOptions: { json?: boolean }) => {
            const options = program.opts<GlobalOptions>()
            const goal = words.join(' ')
            try {
                await withContainer(options, async (container) => {
                    if (cmdOptions.json) {
                        const summary = await container.orchestrator.run(goal)
                        console.log(JSON.stringify(summary, null, 2))
                        if (summary.state !== 'succeeded') process.exitCode = 1
                        return
                    }
                    console.log(await runGoal(container, goal, options.verbose))
                })
            } catch (error) {
                fail(error)
            }
        })

    program
        .command('history')
        .description('List recent sessions from the performance ledger')
        .option('-n, --limit <n>', 'number of sessions', parsePositiveInt, 10)
        .action(async (cmdOptions: { limit: number }) => {
            try {
                await withContainer(program.opts<GlobalOptions>(), async (container) => {
                    console.log(formatHistory(container.ledger.recent(cmdOptions.limit)))
                })
            } catch (error) {
                fail(error)
            }
        })

    program
        .command('capabilities')
        .description('List the capabilities the agent can invoke')
        .action(async () => {
            try {
                await withContainer(program.opts<GlobalOptions>(), async (container) => {
                    console.log(formatCapabilities(container.registry))
                    console.log(colors.dim(`\nModel chain: ${container.models.chain.join(' -> ')}`))
                })
            } catch (error) {
                fail(error)
            }
        })

    return program
}
