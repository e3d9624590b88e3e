import { zodToJsonSchema } from 'zod-to-json-schema'
import { err, ok, type Result } from '../core/result.js'
import type { AnyCapability, InvocationRequest } from './types.js'

export interface CapabilityDefinition {
    name: string
    description: string
    parameters: ReturnType<typeof zodToJsonSchema>
}

export type ContractViolation =
    | { code: 'CapabilityNotFound'; message: string }
    | { code: 'ValidationFailed'; message: string }

/**
 * Name → descriptor table. Populated during startup, then sealed: any
 * registration after `seal()` throws, so sessions always see the same contracts.
 */
export class CapabilityRegistry {
    private capabilities = new Map<string, AnyCapability>()
    private definitionCache: CapabilityDefinition[] | null = null
    private sealed = false

    register(capability: AnyCapability): void {
        if (this.sealed) {
            throw new Error(`Capability registry is sealed; cannot register '${capability.name}'`)
        }
        if (this.capabilities.has(capability.name)) {
            throw new Error(`Capability '${capability.name}' is already registered`)
        }
        this.capabilities.set(capability.name, capability)
        this.definitionCache = null
    }

    seal(): this {
        this.sealed = true
        return this
    }

    isSealed(): boolean {
        return this.sealed
    }

    get(name: string): AnyCapability | undefined {
        return this.capabilities.get(name)
    }

    has(name: string): boolean {
        return this.capabilities.has(name)
    }

    names(): string[] {
        return [...this.capabilities.keys()]
    }

    listAll(): AnyCapability[] {
        return [...this.capabilities.values()]
    }

    /** Checks a requested invocation against the declared contract without executing anything. */
    validate(request: InvocationRequest): Result<unknown, ContractViolation> {
        const capability = this.capabilities.get(request.capability)
        if (!capability) {
            return err({ code: 'CapabilityNotFound', message: `Capability '${request.capability}' is not registered` })
        }

        const parsed = capability.parameters.safeParse(request.arguments)
        if (!parsed.success) {
            const issues = parsed.error.issues
                .map((issue) => `${issue.path.join('.') || '(arguments)'}: ${issue.message}`)
                .join('; ')
            return err({ code: 'ValidationFailed', message: `Invalid arguments for '${request.capability}': ${issues}` })
        }
        return ok(parsed.data)
    }

    getDefinitions(): CapabilityDefinition[] {
        if (this.definitionCache) return this.definitionCache

        const defs = this.listAll().map((capability) => ({
            name: capability.name,
            description: capability.description,
            parameters: zodToJsonSchema(capability.parameters, { target: 'openApi3' }),
        }))

        this.definitionCache = defs
        return defs
    }
}
