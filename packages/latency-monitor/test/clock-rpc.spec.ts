import { describe, it } from 'mocha'
import { expect } from 'chai'
import { isClockResponse } from '../src/rpc/clock.js'
import { makeProtocols, encodeJson, decodeJson, readAllBounded, PayloadTooLargeError } from '../src/rpc/protocols.js'

describe('Clock RPC codec', () => {
	it('namespaces the protocol by network name', () => {
		expect(makeProtocols().PROTOCOL_CLOCK).to.equal('/default/latency/clock/1.0.0')
		expect(makeProtocols('testnet').PROTOCOL_CLOCK).to.equal('/testnet/latency/clock/1.0.0')
	})

	it('decodes what it encodes', async () => {
		const bytes = await encodeJson({ v: 1, ts: 1700000000123 })
		expect(new TextDecoder().decode(bytes)).to.equal('{"v":1,"ts":1700000000123}')
		expect(await decodeJson<unknown>(bytes)).to.deep.equal({ v: 1, ts: 1700000000123 })
	})

	it('accepts a well-formed clock response', () => {
		expect(isClockResponse({ v: 1, ts: 42 })).to.equal(true)
	})

	it('rejects malformed clock responses', () => {
		expect(isClockResponse(null)).to.equal(false)
		expect(isClockResponse('{"v":1}')).to.equal(false)
		expect(isClockResponse({ ts: 42 })).to.equal(false)
		expect(isClockResponse({ v: 2, ts: 42 })).to.equal(false)
		expect(isClockResponse({ v: 1, ts: '42' })).to.equal(false)
		expect(isClockResponse({ v: 1, ts: Number.NaN })).to.equal(false)
		expect(isClockResponse({ v: 1 })).to.equal(false)
	})

	it('rejects invalid json', async () => {
		let caught: unknown
		try { await decodeJson(new TextEncoder().encode('{ not: json }')) } catch (err) { caught = err }
		expect(caught).to.be.instanceOf(SyntaxError)
	})
})

/** Byte source yielding `chunks`, then either ending or going silent forever. */
function chunkSource(chunks: number[][], opts: { stall?: boolean } = {}) {
	const aborts: Error[] = []
	return {
		aborts,
		abort(err: Error) { aborts.push(err) },
		async *[Symbol.asyncIterator]() {
			for (const c of chunks) yield Uint8Array.from(c)
			if (opts.stall) await new Promise<void>(() => {})
		},
	}
}

describe('readAllBounded', () => {
	it('concatenates chunks until the source ends', async () => {
		const bytes = await readAllBounded(chunkSource([[1, 2], [3, 4]]), 4)
		expect(Array.from(bytes)).to.deep.equal([1, 2, 3, 4])
	})

	it('throws once the byte bound is exceeded', async () => {
		let caught: unknown
		try { await readAllBounded(chunkSource([[1, 2, 3], [4, 5, 6]]), 5) } catch (err) { caught = err }
		expect(caught).to.be.instanceOf(PayloadTooLargeError)
		expect(caught instanceof PayloadTooLargeError ? caught.maxBytes : 0).to.equal(5)
	})

	it('returns what it has after the idle timeout', async () => {
		const started = Date.now()
		const bytes = await readAllBounded(chunkSource([[7, 8]], { stall: true }), 64, 30)
		expect(Array.from(bytes)).to.deep.equal([7, 8])
		expect(Date.now() - started).to.be.lessThan(1000)
	})

	it('aborts a stalled read when the signal fires', async () => {
		const source = chunkSource([[1]], { stall: true })
		const controller = new AbortController()
		const reason = new Error('monitor stopped')
		setTimeout(() => controller.abort(reason), 20)
		const started = Date.now()
		let caught: unknown
		try { await readAllBounded(source, 64, 10_000, { signal: controller.signal }) } catch (err) { caught = err }
		expect(caught).to.equal(reason)
		expect(source.aborts).to.deep.equal([reason])
		expect(Date.now() - started).to.be.lessThan(1000)
	})

	it('rejects straight away with an already-aborted signal', async () => {
		const controller = new AbortController()
		const reason = new Error('already stopped')
		controller.abort(reason)
		let caught: unknown
		try { await readAllBounded(chunkSource([[1]]), 64, 10_000, { signal: controller.signal }) } catch (err) { caught = err }
		expect(caught).to.equal(reason)
	})
})
