import type { PeerRegistry, RegistryEntry } from '../registry/peer-registry.js';
import type { IntervalController } from '../schedule/interval-controller.js';
import { recordSample } from '../stats/running-average.js';
import type {
	Clock,
	PeerResolver,
	ProbeObservation,
	ProbeResult,
	ProbeTransport,
	TickOutcome,
} from '../index.js';
import { createLogger } from '../logger.js';

const log = createLogger('service:scheduler');

export interface SchedulerDiagnostics {
	cycles: number;
	probesSent: number;
	probesOk: number;
	probesFailed: number;
	skippedStale: number;
	discarded: number;
}

export interface ProbeSchedulerInit<H> {
	registry: PeerRegistry;
	interval: IntervalController;
	resolver: PeerResolver<H>;
	transport: ProbeTransport<H>;
	clock: Clock;
	onObservation?: (observation: ProbeObservation) => void;
}

/**
 * Round-robin cursor over the registry. Each {@link tick} probes at most one peer,
 * so there is never more than one probe outstanding.
 */
export class ProbeScheduler<H> {
	private cursor?: RegistryEntry;
	private readonly registry: PeerRegistry;
	private readonly interval: IntervalController;
	private readonly resolver: PeerResolver<H>;
	private readonly transport: ProbeTransport<H>;
	private readonly clock: Clock;
	private readonly onObservation?: (observation: ProbeObservation) => void;
	private readonly diag: SchedulerDiagnostics = {
		cycles: 0,
		probesSent: 0,
		probesOk: 0,
		probesFailed: 0,
		skippedStale: 0,
		discarded: 0,
	};

	constructor(init: ProbeSchedulerInit<H>) {
		this.registry = init.registry;
		this.interval = init.interval;
		this.resolver = init.resolver;
		this.transport = init.transport;
		this.clock = init.clock;
		this.onObservation = init.onObservation;
	}

	/** Id of the entry the next tick will probe, if any. */
	get cursorId(): string | undefined {
		return this.cursor?.id;
	}

	getDiagnostics(): Readonly<SchedulerDiagnostics> {
		return this.diag;
	}

	/**
	 * Must be called for every registry removal. A cursor resting on the removed
	 * entry moves to the entry that followed it.
	 */
	entryRemoved(entry: RegistryEntry, successor: RegistryEntry | undefined): void {
		if (this.cursor === entry) this.cursor = successor;
	}

	async tick(signal: AbortSignal = new AbortController().signal): Promise<TickOutcome> {
		if (!this.cursor) {
			const head = this.registry.head;
			if (!head) return 'idle';
			this.cursor = head;
			this.interval.recompute(this.registry.size);
			this.diag.cycles++;
		}

		const entry = this.cursor;
		const peer = this.resolver.resolveLivePeer(entry.id);
		if (peer === undefined) {
			// registry not yet told about the disconnect
			this.diag.skippedStale++;
			this.advancePast(entry);
			return 'skipped';
		}

		const sendTimestamp = this.clock();
		this.diag.probesSent++;
		const result = await this.invoke(peer, signal);
		if (!result.ok) {
			this.diag.probesFailed++;
			log.error('failed to probe peer %s - %e', entry.id, result.error);
			this.advancePast(entry);
			return 'failed';
		}

		const receiveTimestamp = this.clock();
		this.advancePast(entry);
		if (!entry.linked) {
			this.diag.discarded++;
			log('peer %s left while its probe was in flight, discarding sample', entry.id);
			return 'discarded';
		}

		const latency = receiveTimestamp - sendTimestamp;
		const clockOffset = receiveTimestamp - result.remoteTimestamp;
		const stats = recordSample(entry, latency, clockOffset);
		this.diag.probesOk++;
		const observation: ProbeObservation = {
			id: entry.id,
			sendTimestamp,
			remoteTimestamp: result.remoteTimestamp,
			receiveTimestamp,
			latency,
			avgLatency: stats.avgLatency,
			clockOffset,
			avgClockOffset: stats.avgClockOffset,
			sampleCount: stats.sampleCount,
		};
		log('peer %s - sent %d; remote %d; received %d; latency %d; avg latency %d; offset %d; avg offset %d; samples %d',
			observation.id,
			observation.sendTimestamp,
			observation.remoteTimestamp,
			observation.receiveTimestamp,
			observation.latency,
			observation.avgLatency,
			observation.clockOffset,
			observation.avgClockOffset,
			observation.sampleCount
		);
		this.onObservation?.(observation);
		return 'probed';
	}

	private async invoke(peer: H, signal: AbortSignal): Promise<ProbeResult> {
		try {
			return await this.transport.probe(peer, { signal });
		} catch (err) {
			return { ok: false, error: err instanceof Error ? err : new Error(String(err)) };
		}
	}

	private advancePast(entry: RegistryEntry): void {
		// a removal during the probe may already have moved the cursor on
		if (this.cursor === entry) this.cursor = entry.next;
	}
}
