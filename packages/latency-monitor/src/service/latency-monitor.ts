import type { Startable } from '@libp2p/interface';
import { PeerRegistry, type PeerStats } from '../registry/peer-registry.js';
import { IntervalController, DEFAULT_TOTAL_CYCLE_MS } from '../schedule/interval-controller.js';
import { ProbeScheduler, type SchedulerDiagnostics } from './probe-scheduler.js';
import type {
	LatencyMonitor,
	LatencyMonitorConfig,
	LatencyMonitorHooks,
	PeerResolver,
	ProbeTransport,
	TickOutcome,
} from '../index.js';
import { createLogger } from '../logger.js';

const log = createLogger('service:monitor');

export class MonitorRunningError extends Error {
	readonly code = 'ERR_MONITOR_RUNNING';

	constructor() {
		super('the probe loop is running; stop the monitor before ticking by hand');
		this.name = 'MonitorRunningError';
	}
}

export interface MonitorCollaborators<H> {
	resolver: PeerResolver<H>;
	transport: ProbeTransport<H>;
}

export function wallClockSeconds(): number {
	return Date.now() / 1000;
}

/**
 * Owns the registry, interval controller and scheduler, and drives the probe loop
 * between {@link start} and {@link stop}.
 */
export class LatencyMonitorService<H> implements LatencyMonitor, Startable {
	private readonly registry = new PeerRegistry();
	private readonly interval: IntervalController;
	private readonly scheduler: ProbeScheduler<H>;
	private readonly hooks: LatencyMonitorHooks;
	private running = false;
	private timer?: ReturnType<typeof setTimeout>;
	private inflight?: Promise<void>;
	private abort?: AbortController;
	private generation = 0;

	constructor(collaborators: MonitorCollaborators<H>, cfg?: Partial<LatencyMonitorConfig>, hooks: LatencyMonitorHooks = {}) {
		this.hooks = hooks;
		this.interval = new IntervalController(cfg?.totalCycleMs ?? DEFAULT_TOTAL_CYCLE_MS);
		this.scheduler = new ProbeScheduler<H>({
			registry: this.registry,
			interval: this.interval,
			resolver: collaborators.resolver,
			transport: collaborators.transport,
			clock: hooks.clock ?? wallClockSeconds,
			onObservation: hooks.onObservation,
		});
	}

	get intervalSeconds(): number {
		return this.interval.currentIntervalSeconds;
	}

	get totalCycleMs(): number {
		return this.interval.totalCycleMs;
	}

	get cursorId(): string | undefined {
		return this.scheduler.cursorId;
	}

	isRunning(): boolean {
		return this.running;
	}

	getDiagnostics(): Readonly<SchedulerDiagnostics> {
		return this.scheduler.getDiagnostics();
	}

	setTotalCycleMs(totalCycleMs: number): void {
		this.interval.setTotalCycleMs(totalCycleMs);
		this.interval.recompute(this.registry.size);
	}

	register(id: string): PeerStats {
		const entry = this.registry.register(id);
		this.interval.recompute(this.registry.size);
		log('monitoring peer %s', id);
		return entry.snapshot();
	}

	unregister(id: string): void {
		const { entry, successor } = this.registry.unregister(id);
		this.scheduler.entryRemoved(entry, successor);
		this.interval.recompute(this.registry.size);
		log('peer %s removed from monitoring', id);
	}

	lookup(id: string): PeerStats | undefined {
		return this.registry.lookup(id)?.snapshot();
	}

	listPeers(): PeerStats[] {
		return Array.from(this.registry, (e) => e.snapshot());
	}

	/** One scheduler step, for driving the monitor by hand while the loop is stopped. */
	async tick(): Promise<TickOutcome> {
		if (this.running || this.inflight !== undefined) throw new MonitorRunningError();
		return await this.scheduler.tick();
	}

	async start(): Promise<void> {
		if (this.running) return;
		this.running = true;
		const generation = ++this.generation;
		const abort = new AbortController();
		this.abort = abort;
		const draining = this.inflight;
		if (draining) {
			// a stop() is still waiting on the previous loop's tick
			void draining.then(() => { this.schedule(generation, abort.signal); });
		} else {
			this.schedule(generation, abort.signal);
		}
	}

	async stop(): Promise<void> {
		if (!this.running) {
			await this.inflight;
			return;
		}
		this.running = false;
		clearTimeout(this.timer);
		this.timer = undefined;
		const abort = this.abort;
		abort?.abort(new Error('latency monitor stopped'));
		await this.inflight;
		if (this.abort === abort && !this.running) this.abort = undefined;
	}

	private schedule(generation: number, signal: AbortSignal): void {
		if (!this.running || generation !== this.generation) return;
		this.timer = setTimeout(() => {
			this.timer = undefined;
			const inflight = this.runTick(generation, signal).finally(() => {
				if (this.inflight === inflight) this.inflight = undefined;
			});
			this.inflight = inflight;
		}, this.interval.currentIntervalSeconds * 1000);
	}

	private async runTick(generation: number, signal: AbortSignal): Promise<void> {
		try {
			await this.scheduler.tick(signal);
		} catch (err) {
			if (generation === this.generation) this.running = false;
			log.error('probe loop halted - %e', err);
			try {
				this.hooks.onFatal?.(err);
			} catch (hookErr) {
				log.error('onFatal hook threw - %e', hookErr);
			}
			return;
		}
		this.schedule(generation, signal);
	}
}
