export interface BackoffOptions {
	initialDelayMs: number;
	maxDelayMs: number;
	factor: number;
	jitterMs: number;
	/** Returns a number in [0, 1). Defaults to Math.random. */
	random?: () => number;
}

/**
 * Exponential reconnect delay with an upper bound and additive jitter.
 * Attempt n (1-based) waits initialDelayMs * factor^(n-1), capped at maxDelayMs.
 */
export class BackoffPolicy {
	private attempt = 0;
	private readonly random: () => number;

	constructor(private readonly opts: BackoffOptions) {
		this.random = opts.random ?? Math.random;
	}

	get attempts(): number {
		return this.attempt;
	}

	nextDelay(): number {
		this.attempt++;
		const base = this.opts.initialDelayMs * Math.pow(this.opts.factor, this.attempt - 1);
		const capped = Math.min(base, this.opts.maxDelayMs);
		return Math.round(capped + this.random() * this.opts.jitterMs);
	}

	reset(): void {
		this.attempt = 0;
	}
}
