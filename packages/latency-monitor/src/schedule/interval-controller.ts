export const DEFAULT_TOTAL_CYCLE_MS = 1000;

/** Spacing used while no peers are registered. */
export const IDLE_INTERVAL_SECONDS = 1;

export function assertCycleMs(totalCycleMs: number): number {
	if (!Number.isFinite(totalCycleMs) || totalCycleMs <= 0) {
		throw new RangeError(`totalCycleMs must be a positive finite number, got ${totalCycleMs}`);
	}
	return totalCycleMs;
}

/**
 * Spreads one full round-robin cycle of `totalCycleMs` across the active peers, so
 * the aggregate probe rate stays constant as the population grows or shrinks.
 */
export class IntervalController {
	private cycleMs: number;
	private interval = IDLE_INTERVAL_SECONDS;

	constructor(totalCycleMs = DEFAULT_TOTAL_CYCLE_MS) {
		this.cycleMs = assertCycleMs(totalCycleMs);
	}

	get totalCycleMs(): number {
		return this.cycleMs;
	}

	get currentIntervalSeconds(): number {
		return this.interval;
	}

	/** Takes effect at the next recompute. */
	setTotalCycleMs(totalCycleMs: number): void {
		this.cycleMs = assertCycleMs(totalCycleMs);
	}

	recompute(activeCount: number): number {
		this.interval = activeCount > 0
			? (this.cycleMs / activeCount) / 1000
			: IDLE_INTERVAL_SECONDS;
		return this.interval;
	}
}
