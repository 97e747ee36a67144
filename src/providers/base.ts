import { ProviderUnavailableError } from '../core/errors.js'
import { CAPABILITIES } from './types.js'
import type {
	Capability,
	CapabilityHandlers,
	CapabilityParams,
	CapabilityResult,
	InvokeOptions,
	Provider,
	ProviderInfo,
} from './types.js'

export interface ProviderDefinition {
	name: string
	vendor: string
	requiresKey: boolean
	keyEnvVar?: string
	isEnabled(): boolean
	handlers: CapabilityHandlers
}

// Capabilities are derived from the handlers so the two can never disagree.
export function defineProvider(definition: ProviderDefinition): Provider {
	const { handlers } = definition
	const capabilities = CAPABILITIES.filter((c) => handlers[c] !== undefined)
	const info: ProviderInfo = {
		name: definition.name,
		vendor: definition.vendor,
		capabilities,
		requiresKey: definition.requiresKey,
		keyEnvVar: definition.keyEnvVar,
	}

	return {
		describe(): ProviderInfo {
			return { ...info, capabilities: [...info.capabilities] }
		},

		isEnabled(): boolean {
			return definition.isEnabled()
		},

		async invoke<C extends Capability>(
			capability: C,
			params: CapabilityParams[C],
			options: InvokeOptions,
		): Promise<CapabilityResult[C]> {
			const handler = handlers[capability]
			if (!handler) {
				throw new ProviderUnavailableError(definition.name, `Unsupported operation: ${capability}`)
			}
			return handler(params, options)
		},
	}
}
