import { z } from 'zod'
import type { Clock } from '../../core/types.js'
import { succeed } from '../envelope.js'
import type { Capability } from '../types.js'

const CurrentTimeInput = z.object({})

const CurrentTimeOutput = z.object({ now: z.string() })

type CurrentTimeOutput = z.infer<typeof CurrentTimeOutput>

export function createCurrentTimeCapability(clock: Clock): Capability<z.infer<typeof CurrentTimeInput>, CurrentTimeOutput> {
    return {
        name: 'get_current_time',
        description: 'Get the current date and time (ISO 8601, UTC)',
        parameters: CurrentTimeInput,
        result: CurrentTimeOutput,
        produces: 'status',
        async execute() {
            const now = clock().toISOString()
            return succeed({ now }, `Current time is ${now}`)
        },
    }
}
