import type { PeerResolver, ProbeResult, ProbeTransport } from '../../src/index.js'

export interface Deferred<T> {
	promise: Promise<T>
	resolve: (value: T) => void
}

export function deferred<T>(): Deferred<T> {
	let resolve: (value: T) => void = () => {}
	const promise = new Promise<T>((r) => { resolve = r })
	return { promise, resolve }
}

/** Resolver over a mutable set of ids that are "connected". */
export class FakeResolver implements PeerResolver<string> {
	readonly live = new Set<string>()

	constructor(ids: string[] = []) {
		for (const id of ids) this.live.add(id)
	}

	resolveLivePeer(id: string): string | undefined {
		return this.live.has(id) ? id : undefined
	}
}

/** Transport answering from a per-peer script, defaulting to a successful reading. */
export class FakeTransport implements ProbeTransport<string> {
	readonly calls: string[] = []
	readonly signals: AbortSignal[] = []
	private readonly scripted = new Map<string, Array<ProbeResult | Promise<ProbeResult> | Error>>()

	constructor(private readonly fallback: ProbeResult = { ok: true, remoteTimestamp: 0 }) {}

	/** Queues the next answers for `id`; an Error makes the probe reject. */
	script(id: string, ...answers: Array<ProbeResult | Promise<ProbeResult> | Error>): void {
		const queue = this.scripted.get(id) ?? []
		queue.push(...answers)
		this.scripted.set(id, queue)
	}

	async probe(peer: string, options: { signal: AbortSignal }): Promise<ProbeResult> {
		this.calls.push(peer)
		this.signals.push(options.signal)
		const next = this.scripted.get(peer)?.shift()
		if (next === undefined) return this.fallback
		if (next instanceof Error) throw next
		return await next
	}
}

/** Clock returning queued readings, then stepping by `step` seconds from the last one. */
export function scriptedClock(readings: number[] = [], step = 0.01): () => number {
	let last = 0
	return () => {
		const next = readings.shift()
		last = next ?? last + step
		return last
	}
}

export async function waitFor(predicate: () => boolean, timeoutMs = 5000, pollMs = 10): Promise<void> {
	const deadline = Date.now() + timeoutMs
	while (!predicate()) {
		if (Date.now() > deadline) throw new Error(`condition not met within ${timeoutMs}ms`)
		await new Promise((r) => setTimeout(r, pollMs))
	}
}
