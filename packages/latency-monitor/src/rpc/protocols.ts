import type { AbortOptions } from '@libp2p/interface';
import { fromString as u8FromString } from 'uint8arrays/from-string';
import { toString as u8ToString } from 'uint8arrays/to-string';
import { concat as u8Concat } from 'uint8arrays/concat';

export function makeProtocols(networkName = 'default') {
	return {
		PROTOCOL_CLOCK: `/${networkName}/latency/clock/1.0.0`,
	} as const;
}

export type LatencyProtocols = ReturnType<typeof makeProtocols>;

export class PayloadTooLargeError extends Error {
	readonly code = 'ERR_PAYLOAD_TOO_LARGE';

	constructor(readonly maxBytes: number) {
		super(`payload exceeds ${maxBytes} bytes`);
		this.name = 'PayloadTooLargeError';
	}
}

export async function encodeJson(obj: unknown): Promise<Uint8Array> {
	return u8FromString(JSON.stringify(obj), 'utf8');
}

export async function decodeJson<T>(bytes: Uint8Array): Promise<T> {
	return JSON.parse(u8ToString(bytes, 'utf8')) as T;
}

/** Anything yielding byte chunks: a libp2p `Stream`, or a plain async iterable. */
export interface ByteSource extends AsyncIterable<{ subarray(): Uint8Array }> {
	abort?(err: Error): void;
}

/**
 * Collects a source's bytes until the remote closes, `maxBytes` is exceeded (throws),
 * or nothing arrives for `idleMs`. The idle cut-off covers muxers that fail to
 * deliver the remote close to the dialer's iterator. Aborting `options.signal`
 * aborts the source and rejects with the signal's reason.
 */
export async function readAllBounded(
	source: ByteSource,
	maxBytes: number,
	idleMs = 2000,
	options: AbortOptions = {}
): Promise<Uint8Array> {
	const { signal } = options;
	signal?.throwIfAborted();
	let onAbort = (): void => {};
	const aborted = new Promise<'aborted'>((resolve) => { onAbort = () => resolve('aborted'); });
	signal?.addEventListener('abort', onAbort, { once: true });

	const chunks: Uint8Array[] = [];
	let total = 0;
	const it = source[Symbol.asyncIterator]();
	try {
		for (;;) {
			let timer: ReturnType<typeof setTimeout> | undefined;
			const idle = new Promise<'idle'>((resolve) => { timer = setTimeout(() => resolve('idle'), idleMs); });
			const next = await Promise.race([it.next(), idle, aborted]).finally(() => clearTimeout(timer));
			if (next === 'aborted') {
				const reason: unknown = signal?.reason;
				const err = reason instanceof Error ? reason : new Error('read aborted');
				source.abort?.(err);
				throw err;
			}
			if (next === 'idle' || next.done === true) break;
			const bytes = next.value.subarray();
			total += bytes.length;
			if (total > maxBytes) throw new PayloadTooLargeError(maxBytes);
			chunks.push(bytes);
		}
	} finally {
		signal?.removeEventListener('abort', onAbort);
	}
	return u8Concat(chunks, total);
}
