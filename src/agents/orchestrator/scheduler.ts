import type { CapabilityInvocation, InvocationRequest } from '../../capabilities/types.js'
import type { ScheduledInvocation } from './plan-validator.js'

type SlotStatus = 'pending' | 'running' | 'settled'

interface Slot {
    item: ScheduledInvocation
    status: SlotStatus
    result?: CapabilityInvocation
}

/**
 * Runs a validated plan. With a concurrency of 1 invocations run strictly in
 * planned order; otherwise each wave starts every pending invocation whose
 * prerequisites have settled, up to the concurrency limit. Every invocation is
 * attempted whatever its prerequisites returned, and results come back in planned order.
 */
export async function runPlan(
    plan: readonly ScheduledInvocation[],
    dispatch: (request: InvocationRequest) => Promise<CapabilityInvocation>,
    concurrency: number
): Promise<CapabilityInvocation[]> {
    const slots: Slot[] = plan.map((item) => ({ item, status: 'pending' }))
    const limit = Math.max(1, concurrency)

    while (slots.some((s) => s.status === 'pending')) {
        const ready = slots
            .filter((s) => s.status === 'pending' && s.item.dependsOn.every((dep) => slots[dep]?.status === 'settled'))
            .slice(0, limit)

        if (ready.length === 0) {
            throw new Error('Plan has unsatisfiable dependencies')
        }

        for (const slot of ready) slot.status = 'running'
        await Promise.all(
            ready.map(async (slot) => {
                slot.result = await dispatch(slot.item.request)
                slot.status = 'settled'
            })
        )
    }

    return slots.flatMap((s) => (s.result ? [s.result] : []))
}
