import * as clack from '@clack/prompts'
import type { Container } from '../core/container.js'
import { errorMessage } from '../core/errors.js'
import { createProgressTracker } from './progress.js'
import { getCommandNames, handleSlashCommand } from './slash-commands.js'
import { banner, colors, formatError, formatSessionSummary } from './ui.js'

interface ReplOptions {
    version: string
    verbose?: boolean
}

async function promptInput(): Promise<string | null> {
    const result = await clack.text({ message: 'Goal', placeholder: 'e.g. forecast demand for the next 24 hours' })
    if (clack.isCancel(result)) return null
    return result
}

/** Runs one goal with a spinner; Ctrl+C cancels the session rather than the process. */
export async function runGoal(container: Container, goal: string, verbose = false): Promise<string> {
    const controller = new AbortController()
    const onSigint = () => controller.abort()
    process.once('SIGINT', onSigint)

    const spinner = clack.spinner()
    spinner.start('Starting session...')
    const progress = createProgressTracker(container.eventBus, spinner)
    try {
        const summary = await container.orchestrator.run(goal, { signal: controller.signal })
        spinner.stop(summary.state === 'succeeded' ? colors.success('Done') : colors.warn('Stopped'))
        return formatSessionSummary(summary, verbose)
    } finally {
        progress.dispose()
        process.off('SIGINT', onSigint)
    }
}

export async function startREPL(container: Container, options: ReplOptions): Promise<void> {
    console.log(banner(options.version))
    console.log(colors.dim(`Model: ${container.config.model}`))
    console.log(colors.dim('Type /help for commands, /exit to quit\n'))

    while (true) {
        const input = await promptInput()
        if (input === null) {
            console.log(colors.dim('Goodbye!'))
            break
        }

        const text = input.trim()
        if (!text) continue
        if (text === '/exit') {
            console.log(colors.dim('Goodbye!'))
            break
        }

        if (text.startsWith('/')) {
            try {
                const result = await handleSlashCommand(text, container)
                console.log(result ?? formatError(`Unknown command: ${text} (available: ${getCommandNames().join(', ')})`))
            } catch (error) {
                console.log(formatError(errorMessage(error)))
            }
            continue
        }

        try {
            console.log(await runGoal(container, text, options.verbose))
        } catch (error) {
            console.log(formatError(errorMessage(error)))
        }
    }
}
