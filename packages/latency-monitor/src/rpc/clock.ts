import type { Libp2p } from 'libp2p';
import type { AbortOptions, PeerId, Stream } from '@libp2p/interface';
import { makeProtocols, encodeJson, decodeJson, readAllBounded } from './protocols.js';
import type { ProbeResult } from '../index.js';
import { createLogger } from '../logger.js';

const log = createLogger('rpc:clock');

export interface ClockResponseV1 {
	v: 1;
	/** Responder's wall clock, milliseconds since the epoch. */
	ts: number;
}

export interface ClockProbeOptions extends AbortOptions {
	maxBytes?: number;
	idleMs?: number;
}

const DEFAULT_PROTOCOL_CLOCK = makeProtocols().PROTOCOL_CLOCK;

export function isClockResponse(res: unknown): res is ClockResponseV1 {
	if (typeof res !== 'object' || res === null) return false;
	if (!('v' in res) || res.v !== 1) return false;
	return 'ts' in res && typeof res.ts === 'number' && Number.isFinite(res.ts);
}

/** Answers each inbound clock probe with one {@link ClockResponseV1}. */
export async function registerClock(
	node: Libp2p,
	protocol: string = DEFAULT_PROTOCOL_CLOCK,
	nowMs: () => number = Date.now
): Promise<void> {
	await node.handle(protocol, async (stream: Stream) => {
		try {
			stream.send(await encodeJson({ v: 1, ts: nowMs() } satisfies ClockResponseV1));
			await stream.close();
		} catch (err) {
			log.error('clock handler error - %e', err);
			stream.abort(err instanceof Error ? err : new Error(String(err)));
		}
	});
}

/**
 * Reads one clock reading from `peer`. Never rejects: every failure comes back as
 * `{ ok: false }`. The remote timestamp is returned in seconds.
 */
export async function sendClockProbe(
	node: Libp2p,
	peer: PeerId,
	protocol: string = DEFAULT_PROTOCOL_CLOCK,
	options: ClockProbeOptions = {}
): Promise<ProbeResult> {
	let stream: Stream | undefined;
	try {
		const conn = node.getConnections(peer)[0];
		stream = conn != null
			? await conn.newStream([protocol], { signal: options.signal })
			: await node.dialProtocol(peer, [protocol], { signal: options.signal });
		const bytes = await readAllBounded(stream, options.maxBytes ?? 1024, options.idleMs, { signal: options.signal });
		if (bytes.length === 0) return { ok: false, error: new Error('empty clock response') };
		const res = await decodeJson<unknown>(bytes);
		if (!isClockResponse(res)) return { ok: false, error: new Error('malformed clock response') };
		return { ok: true, remoteTimestamp: res.ts / 1000 };
	} catch (err) {
		return { ok: false, error: err instanceof Error ? err : new Error(String(err)) };
	} finally {
		if (stream != null) {
			try { await stream.close(); } catch (err) { log('closing clock stream failed - %e', err); }
		}
	}
}
