/** Maximum number of samples a running average gives weight to. */
export const MAX_SAMPLES = 5;

/** Read-only view of a registered peer's statistics. */
export interface PeerStats {
	readonly id: string;
	readonly sampleCount: number;
	readonly avgLatency: number;
	readonly avgClockOffset: number;
}

/**
 * Per-peer record owned by a {@link PeerRegistry}.
 * `prev` and `next` are positional links only; once the entry is removed they are
 * cleared and `linked` becomes false.
 */
export class RegistryEntry {
	sampleCount = 0;
	avgLatency = 0;
	avgClockOffset = 0;
	prev?: RegistryEntry;
	next?: RegistryEntry;
	linked = true;

	constructor(readonly id: string) {}

	snapshot(): PeerStats {
		return Object.freeze({
			id: this.id,
			sampleCount: this.sampleCount,
			avgLatency: this.avgLatency,
			avgClockOffset: this.avgClockOffset,
		});
	}
}

export class DuplicateEntryError extends Error {
	readonly code = 'ERR_DUPLICATE_ENTRY';

	constructor(readonly id: string) {
		super(`peer ${id} is already registered`);
		this.name = 'DuplicateEntryError';
	}
}

export class UnknownEntryError extends Error {
	readonly code = 'ERR_UNKNOWN_ENTRY';

	constructor(readonly id: string) {
		super(`peer ${id} is not registered`);
		this.name = 'UnknownEntryError';
	}
}

export interface Removal {
	entry: RegistryEntry;
	/** Entry that followed the removed one at the moment it was spliced out. */
	successor: RegistryEntry | undefined;
}

/**
 * Insertion-ordered peer table: an id index over a doubly-linked list.
 * List order is the round-robin probe order.
 */
export class PeerRegistry implements Iterable<RegistryEntry> {
	private readonly entries = new Map<string, RegistryEntry>();
	private first?: RegistryEntry;
	private last?: RegistryEntry;

	get head(): RegistryEntry | undefined {
		return this.first;
	}

	get tail(): RegistryEntry | undefined {
		return this.last;
	}

	get size(): number {
		return this.entries.size;
	}

	has(id: string): boolean {
		return this.entries.has(id);
	}

	lookup(id: string): RegistryEntry | undefined {
		return this.entries.get(id);
	}

	register(id: string): RegistryEntry {
		if (this.entries.has(id)) throw new DuplicateEntryError(id);
		const entry = new RegistryEntry(id);
		if (this.last) {
			this.last.next = entry;
			entry.prev = this.last;
		} else {
			this.first = entry;
		}
		this.last = entry;
		this.entries.set(id, entry);
		return entry;
	}

	unregister(id: string): Removal {
		const entry = this.entries.get(id);
		if (!entry) throw new UnknownEntryError(id);
		const successor = entry.next;

		if (this.first === entry) this.first = entry.next;
		if (this.last === entry) this.last = entry.prev;
		if (entry.prev) entry.prev.next = entry.next;
		if (entry.next) entry.next.prev = entry.prev;

		entry.prev = undefined;
		entry.next = undefined;
		entry.linked = false;
		this.entries.delete(id);
		return { entry, successor };
	}

	ids(): string[] {
		return Array.from(this, (e) => e.id);
	}

	*[Symbol.iterator](): Iterator<RegistryEntry> {
		for (let e = this.first; e; e = e.next) yield e;
	}
}
