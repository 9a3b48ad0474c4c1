import { MAX_SAMPLES, type PeerStats, type RegistryEntry } from '../registry/peer-registry.js';

/**
 * Incremental mean that stops growing its window at `n`: a true cumulative mean for
 * the first `n` samples, afterwards each new sample replaces 1/n of the average.
 */
export function runningAverage(avg: number, sample: number, n: number): number {
	return avg - avg / n + sample / n;
}

/** Folds one latency/offset sample pair into the entry's averages. */
export function recordSample(entry: RegistryEntry, latency: number, clockOffset: number): PeerStats {
	const n = Math.min(entry.sampleCount + 1, MAX_SAMPLES);
	entry.sampleCount = n;
	entry.avgLatency = runningAverage(entry.avgLatency, latency, n);
	entry.avgClockOffset = runningAverage(entry.avgClockOffset, clockOffset, n);
	return entry.snapshot();
}
