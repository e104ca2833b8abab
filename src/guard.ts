import type { AbuseRejection } from './errors'

export interface GuardLimits {
	/** Sliding window length in ms (`ratelimit_window`) */
	readonly window: number
	/** Admissions allowed per IP inside the window, 0 = unlimited */
	readonly rateLimit: number
	/** Live connections per IP, 0 = unlimited */
	readonly concurrentLimit: number
	/** Live connections overall, 0 = unlimited */
	readonly clientsLimit: number
}

export type Admission =
	| { readonly admitted: true }
	| { readonly admitted: false; readonly reason: AbuseRejection }

export interface GuardStats {
	readonly active: number
	readonly trackedIps: number
	readonly admitted: number
	readonly rejected: Readonly<Record<AbuseRejection, number>>
}

interface IpState {
	live: number
	// admission timestamps, oldest first
	attempts: number[]
}

const ADMITTED: Admission = { admitted: true }

/**
 * Per-IP and global admission bookkeeping.
 *
 * `admit` and `release` run to completion on the event loop, so the check
 * and the increment that follows it can never interleave with another
 * connection's; this is the whole concurrency story for the counters.
 */
export class AbuseGuard {
	private readonly ips = new Map<string, IpState>()
	private readonly blocklist: ReadonlySet<string>
	private live = 0
	private admittedTotal = 0
	private readonly rejectedTotal: Record<AbuseRejection, number> = {
		Blocked: 0,
		GlobalLimit: 0,
		ConcurrencyLimit: 0,
		RateLimited: 0
	}

	constructor(
		private readonly limits: GuardLimits,
		blocklist: Iterable<string> = [],
		private readonly now: () => number = Date.now
	) {
		this.blocklist = new Set(Array.from(blocklist, normalizeIp))
	}

	admit(rawIp: string): Admission {
		const ip = normalizeIp(rawIp)
		const reason = this.check(ip)
		if (reason) {
			this.rejectedTotal[reason]++
			return { admitted: false, reason }
		}

		const state = this.ips.get(ip) ?? { live: 0, attempts: [] }
		state.live++
		state.attempts.push(this.now())
		this.ips.set(ip, state)
		this.live++
		this.admittedTotal++
		return ADMITTED
	}

	/** Must be called exactly once for every admitted connection. */
	release(rawIp: string): void {
		const ip = normalizeIp(rawIp)
		const state = this.ips.get(ip)
		if (!state || state.live === 0) return
		state.live--
		this.live = Math.max(0, this.live - 1)
		if (state.live === 0 && state.attempts.length === 0) this.ips.delete(ip)
	}

	isBlocked(rawIp: string): boolean {
		return this.blocklist.has(normalizeIp(rawIp))
	}

	activeFor(rawIp: string): number {
		return this.ips.get(normalizeIp(rawIp))?.live ?? 0
	}

	/** Drops IPs with no live connection whose window has fully decayed. */
	sweep(): number {
		let removed = 0
		for (const [ip, state] of this.ips) {
			this.prune(state)
			if (state.live === 0 && state.attempts.length === 0) {
				this.ips.delete(ip)
				removed++
			}
		}
		return removed
	}

	stats(): GuardStats {
		return {
			active: this.live,
			trackedIps: this.ips.size,
			admitted: this.admittedTotal,
			rejected: { ...this.rejectedTotal }
		}
	}

	private check(ip: string): AbuseRejection | undefined {
		if (this.blocklist.has(ip)) return 'Blocked'

		const { clientsLimit, concurrentLimit, rateLimit } = this.limits
		if (clientsLimit > 0 && this.live >= clientsLimit) return 'GlobalLimit'

		const state = this.ips.get(ip)
		if (!state) return undefined
		if (concurrentLimit > 0 && state.live >= concurrentLimit) {
			return 'ConcurrencyLimit'
		}
		this.prune(state)
		if (rateLimit > 0 && state.attempts.length >= rateLimit) return 'RateLimited'
		return undefined
	}

	private prune(state: IpState): void {
		const cutoff = this.now() - this.limits.window
		let expired = 0
		while (
			expired < state.attempts.length &&
			state.attempts[expired] <= cutoff
		) {
			expired++
		}
		if (expired > 0) state.attempts.splice(0, expired)
	}
}

const IPV4_MAPPED = /^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/i

/** `::ffff:10.0.0.1` and `10.0.0.1` are the same client. */
export function normalizeIp(ip: string): string {
	const mapped = IPV4_MAPPED.exec(ip)
	return mapped ? mapped[1] : ip.toLowerCase()
}
