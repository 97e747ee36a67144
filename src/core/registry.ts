import type { Capability, ProviderDescriptor } from '../providers/types.js'
import { RegistryError, UnknownCapabilityError } from './errors.js'

export const DEFAULT_PRIORITY = 99

interface Slot {
	descriptor: ProviderDescriptor
	priority: number
	seq: number
}

/**
 * Providers per capability, kept sorted by priority then registration order.
 *
 * Each capability maps to a frozen array that is replaced, never edited, on
 * every change. `candidates()` hands that array out directly, so a dispatch
 * keeps iterating the snapshot it started with while a hot swap installs the
 * next one.
 */
export class ProviderRegistry {
	private readonly slots = new Map<Capability, readonly Slot[]>()
	private readonly snapshots = new Map<Capability, readonly ProviderDescriptor[]>()
	private nextSeq = 0

	register(capability: Capability, descriptor: ProviderDescriptor): void {
		if (!descriptor.capabilities.includes(capability)) {
			throw new RegistryError(`Provider "${descriptor.name}" does not support "${capability}"`, {
				provider: descriptor.name,
				capability,
			})
		}

		const current = this.slots.get(capability) ?? []
		const existing = current.find((s) => s.descriptor.name === descriptor.name)
		const slot: Slot = {
			descriptor,
			priority: descriptor.priority[capability] ?? existing?.priority ?? DEFAULT_PRIORITY,
			seq: existing?.seq ?? this.nextSeq++,
		}
		const next = existing
			? current.map((s) => (s === existing ? slot : s))
			: [...current, slot]
		this.install(capability, next)
	}

	registerAll(descriptor: ProviderDescriptor): void {
		for (const capability of descriptor.capabilities) {
			this.register(capability, descriptor)
		}
	}

	unregister(capability: Capability, name: string): boolean {
		const current = this.slots.get(capability)
		if (!current?.some((s) => s.descriptor.name === name)) return false
		this.install(
			capability,
			current.filter((s) => s.descriptor.name !== name),
		)
		return true
	}

	remove(name: string): boolean {
		let removed = false
		for (const capability of [...this.slots.keys()]) {
			removed = this.unregister(capability, name) || removed
		}
		return removed
	}

	candidates(capability: Capability): readonly ProviderDescriptor[] {
		const snapshot = this.snapshots.get(capability)
		if (!snapshot || snapshot.length === 0) throw new UnknownCapabilityError(capability)
		return snapshot
	}

	has(capability: Capability): boolean {
		return (this.snapshots.get(capability)?.length ?? 0) > 0
	}

	get(name: string): ProviderDescriptor | undefined {
		return this.providers().find((d) => d.name === name)
	}

	/** Every registered descriptor once, in first-registration order. */
	providers(): ProviderDescriptor[] {
		const byName = new Map<string, Slot>()
		for (const slots of this.slots.values()) {
			for (const slot of slots) {
				const seen = byName.get(slot.descriptor.name)
				if (!seen || slot.seq < seen.seq) byName.set(slot.descriptor.name, slot)
			}
		}
		return [...byName.values()].sort((a, b) => a.seq - b.seq).map((s) => s.descriptor)
	}

	capabilities(): Capability[] {
		return [...this.snapshots.entries()].filter(([, s]) => s.length > 0).map(([c]) => c)
	}

	priorityOf(capability: Capability, name: string): number | undefined {
		return this.slots.get(capability)?.find((s) => s.descriptor.name === name)?.priority
	}

	private install(capability: Capability, slots: Slot[]): void {
		const sorted = Object.freeze([...slots].sort((a, b) => a.priority - b.priority || a.seq - b.seq))
		this.slots.set(capability, sorted)
		this.snapshots.set(capability, Object.freeze(sorted.map((s) => s.descriptor)))
	}
}
