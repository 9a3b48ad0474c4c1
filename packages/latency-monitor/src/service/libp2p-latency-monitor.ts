import type { Libp2p } from 'libp2p';
import type { Libp2pEvents, PeerId, Startable } from '@libp2p/interface';
import { peerIdFromString } from '@libp2p/peer-id';
import type {
	LatencyMonitor,
	LatencyMonitorHooks,
	Libp2pLatencyMonitorConfig,
	PeerResolver,
	ProbeTransport,
} from '../index.js';
import { DuplicateEntryError, UnknownEntryError, type PeerStats } from '../registry/peer-registry.js';
import { DEFAULT_TOTAL_CYCLE_MS } from '../schedule/interval-controller.js';
import { makeProtocols, type LatencyProtocols } from '../rpc/protocols.js';
import { registerClock, sendClockProbe } from '../rpc/clock.js';
import { LatencyMonitorService } from './latency-monitor.js';
import type { SchedulerDiagnostics } from './probe-scheduler.js';
import { createLogger } from '../logger.js';

const log = createLogger('service:libp2p');

/** Monitors every peer the node is connected to, following libp2p's connect/disconnect events. */
export class Libp2pLatencyMonitor implements LatencyMonitor, Startable {
	private readonly node: Libp2p;
	private readonly cfg: Libp2pLatencyMonitorConfig;
	private readonly protocols: LatencyProtocols;
	private readonly service: LatencyMonitorService<PeerId>;
	private started = false;

	constructor(node: Libp2p, cfg?: Partial<Libp2pLatencyMonitorConfig>, hooks?: LatencyMonitorHooks) {
		this.node = node;
		this.cfg = {
			totalCycleMs: cfg?.totalCycleMs ?? DEFAULT_TOTAL_CYCLE_MS,
			networkName: cfg?.networkName ?? 'default',
			respond: cfg?.respond ?? true,
			maxResponseBytes: cfg?.maxResponseBytes ?? 1024,
			idleTimeoutMs: cfg?.idleTimeoutMs ?? 2000,
		};
		this.protocols = makeProtocols(this.cfg.networkName);
		const resolver: PeerResolver<PeerId> = {
			resolveLivePeer: (id) => this.resolveLivePeer(id),
		};
		const transport: ProbeTransport<PeerId> = {
			probe: async (peer, { signal }) => await sendClockProbe(this.node, peer, this.protocols.PROTOCOL_CLOCK, {
				signal,
				maxBytes: this.cfg.maxResponseBytes,
				idleMs: this.cfg.idleTimeoutMs,
			}),
		};
		this.service = new LatencyMonitorService(
			{ resolver, transport },
			{ totalCycleMs: this.cfg.totalCycleMs },
			hooks
		);
	}

	get intervalSeconds(): number {
		return this.service.intervalSeconds;
	}

	get protocol(): string {
		return this.protocols.PROTOCOL_CLOCK;
	}

	async start(): Promise<void> {
		if (this.started) {
			// no-op while running; restarts the loop after a fatal halt
			await this.service.start();
			return;
		}
		this.started = true;
		if (this.cfg.respond) await registerClock(this.node, this.protocols.PROTOCOL_CLOCK);
		this.node.addEventListener('peer:connect', this.onPeerConnect);
		this.node.addEventListener('peer:disconnect', this.onPeerDisconnect);
		for (const peer of this.node.getPeers()) this.track(peer.toString());
		await this.service.start();
	}

	async stop(): Promise<void> {
		if (!this.started) return;
		this.started = false;
		this.node.removeEventListener('peer:connect', this.onPeerConnect);
		this.node.removeEventListener('peer:disconnect', this.onPeerDisconnect);
		if (this.cfg.respond) {
			try { await this.node.unhandle(this.protocols.PROTOCOL_CLOCK); } catch (err) { log.error('unhandle clock protocol failed - %e', err); }
		}
		await this.service.stop();
	}

	isRunning(): boolean {
		return this.service.isRunning();
	}

	register(id: string): PeerStats {
		return this.service.register(id);
	}

	unregister(id: string): void {
		this.service.unregister(id);
	}

	lookup(id: string): PeerStats | undefined {
		return this.service.lookup(id);
	}

	listPeers(): PeerStats[] {
		return this.service.listPeers();
	}

	setTotalCycleMs(totalCycleMs: number): void {
		this.service.setTotalCycleMs(totalCycleMs);
	}

	getDiagnostics(): Readonly<SchedulerDiagnostics> {
		return this.service.getDiagnostics();
	}

	private resolveLivePeer(id: string): PeerId | undefined {
		let peer: PeerId;
		try {
			peer = peerIdFromString(id);
		} catch (err) {
			log.error('unparseable peer id %s - %e', id, err);
			return undefined;
		}
		return this.node.getConnections(peer).length > 0 ? peer : undefined;
	}

	private track(id: string): void {
		try {
			this.service.register(id);
		} catch (err) {
			if (!(err instanceof DuplicateEntryError)) throw err;
			log('peer %s already monitored', id);
		}
	}

	private readonly onPeerConnect = (evt: Libp2pEvents['peer:connect']): void => {
		// libp2p v3: evt.detail is the PeerId directly
		this.track(evt.detail.toString());
	};

	private readonly onPeerDisconnect = (evt: Libp2pEvents['peer:disconnect']): void => {
		const id = evt.detail.toString();
		try {
			this.service.unregister(id);
		} catch (err) {
			if (!(err instanceof UnknownEntryError)) throw err;
			log('disconnected peer %s was not monitored', id);
		}
	};
}
