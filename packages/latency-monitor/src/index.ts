import type { Libp2p } from 'libp2p';
import type { PeerStats } from './registry/peer-registry.js';
import type { SchedulerDiagnostics } from './service/probe-scheduler.js';
import { Libp2pLatencyMonitor } from './service/libp2p-latency-monitor.js';

export interface LatencyMonitorConfig {
	/** Time budget in milliseconds for probing every registered peer once. */
	totalCycleMs: number;
}

export interface Libp2pLatencyMonitorConfig extends LatencyMonitorConfig {
	networkName: string;
	/** Also answer clock probes from other nodes. */
	respond: boolean;
	maxResponseBytes: number;
	idleTimeoutMs: number;
}

/** Wall-clock reading in seconds. */
export type Clock = () => number;

export type ProbeResult =
	| { ok: true; remoteTimestamp: number }
	| { ok: false; error: Error };

export interface ProbeTransport<H> {
	probe(peer: H, options: { signal: AbortSignal }): Promise<ProbeResult>;
}

export interface PeerResolver<H> {
	/** Returns the live handle for `id`, or undefined once the peer is gone. */
	resolveLivePeer(id: string): H | undefined;
}

/** One completed probe. Timestamps and durations are in seconds. */
export interface ProbeObservation {
	id: string;
	sendTimestamp: number;
	remoteTimestamp: number;
	receiveTimestamp: number;
	latency: number;
	avgLatency: number;
	clockOffset: number;
	avgClockOffset: number;
	sampleCount: number;
}

export type TickOutcome = 'idle' | 'skipped' | 'failed' | 'probed' | 'discarded';

export interface LatencyMonitorHooks {
	clock?: Clock;
	onObservation?: (observation: ProbeObservation) => void;
	/** Called when an unexpected error halts the probe loop. */
	onFatal?: (err: unknown) => void;
}

export interface LatencyMonitor {
	start(): Promise<void>;
	stop(): Promise<void>;
	isRunning(): boolean;
	register(id: string): PeerStats;
	unregister(id: string): void;
	lookup(id: string): PeerStats | undefined;
	listPeers(): PeerStats[];
	setTotalCycleMs(totalCycleMs: number): void;
	readonly intervalSeconds: number;
	getDiagnostics(): Readonly<SchedulerDiagnostics>;
}

export type { PeerStats, SchedulerDiagnostics };
export {
	PeerRegistry,
	RegistryEntry,
	DuplicateEntryError,
	UnknownEntryError,
	MAX_SAMPLES,
} from './registry/peer-registry.js';
export { IntervalController, DEFAULT_TOTAL_CYCLE_MS } from './schedule/interval-controller.js';
export { recordSample, runningAverage } from './stats/running-average.js';
export { ProbeScheduler } from './service/probe-scheduler.js';
export { LatencyMonitorService, MonitorRunningError } from './service/latency-monitor.js';
export { Libp2pLatencyMonitor } from './service/libp2p-latency-monitor.js';
export { registerClock, sendClockProbe } from './rpc/clock.js';
export { makeProtocols, readAllBounded } from './rpc/protocols.js';

export function createLatencyMonitor(
	node: Libp2p,
	cfg?: Partial<Libp2pLatencyMonitorConfig>,
	hooks?: LatencyMonitorHooks
): Libp2pLatencyMonitor {
	return new Libp2pLatencyMonitor(node, cfg, hooks);
}
