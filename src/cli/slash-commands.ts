import type { Container } from '../core/container.js'
import { colors, formatCapabilities, formatHistory } from './ui.js'

interface SlashCommand {
    name: string
    description: string
    handler: (container: Container, args: string) => Promise<string>
}

const commands: SlashCommand[] = [
    {
        name: '/help',
        description: 'Show available commands',
        handler: async () => {
            const lines = commands.map((c) => `  ${colors.bold(c.name.padEnd(14))} ${c.description}`)
            return `Commands:\n${lines.join('\n')}\n\nAnything else is sent to the agent as a goal.`
        },
    },
    {
        name: '/status',
        description: 'Show session and capability metrics',
        handler: async (container) => {
            const parts: string[] = []
            parts.push(`Model: ${container.config.model}`)
            const latest = container.models.latest()
            if (latest) {
                const mape = latest.metrics.mape
                parts.push(`Latest candidate: ${latest.kind} (${latest.id})${mape === undefined ? '' : `, MAPE ${mape.toFixed(2)}%`}`)
            }
            parts.push('')
            parts.push(container.metricsCollector.formatStatus())
            return parts.join('\n')
        },
    },
    {
        name: '/history',
        description: 'List recent sessions from the ledger',
        handler: async (container, args) => {
            const limit = Number.parseInt(args.trim(), 10)
            return formatHistory(container.ledger.recent(Number.isNaN(limit) || limit < 1 ? 10 : limit))
        },
    },
    {
        name: '/capabilities',
        description: 'List registered capabilities',
        handler: async (container) => formatCapabilities(container.registry),
    },
    {
        name: '/models',
        description: 'List trained model candidates',
        handler: async (container) => {
            const candidates = container.models.candidates()
            if (candidates.length === 0) return colors.dim('No candidates trained in this process.')
            return candidates
                .map((c) => {
                    const metrics = Object.entries(c.metrics)
                        .flatMap(([k, v]) => (v === undefined ? [] : [`${k}=${v.toFixed(2)}`]))
                        .join(' ')
                    return `  ${colors.bold(c.kind.padEnd(15))} ${c.id} ${colors.dim(`${c.window.start}..${c.window.end}`)} ${metrics}`
                })
                .join('\n')
        },
    },
]

/** Returns the command's output, or null when the input names no known command. */
export async function handleSlashCommand(input: string, container: Container): Promise<string | null> {
    const spaceIdx = input.indexOf(' ')
    const name = spaceIdx === -1 ? input : input.slice(0, spaceIdx)
    const args = spaceIdx === -1 ? '' : input.slice(spaceIdx + 1)

    const command = commands.find((c) => c.name === name)
    if (!command) return null
    return command.handler(container, args)
}

export function getCommandNames(): string[] {
    return [...commands.map((c) => c.name), '/exit']
}
