// ===== Endpoint model =====

export interface OriginAddress {
	readonly host: string
	readonly port: number
}

export interface StatusTemplate {
	readonly motd: string
	readonly versionName: string
	readonly favicon?: string
}

/** What the proxy does for a virtual host once the handshake is in. */
export type EndpointAction =
	| { readonly kind: 'proxy'; readonly origin: OriginAddress }
	| {
			readonly kind: 'respond'
			readonly status: StatusTemplate
			readonly message: string
	  }

export interface Endpoint {
	readonly hostname: string
	readonly action: EndpointAction
}

export function formatOrigin(origin: OriginAddress): string {
	return origin.host.includes(':')
		? `[${origin.host}]:${origin.port}`
		: `${origin.host}:${origin.port}`
}

// ===== LRU =====

/** Map-backed LRU: iteration order of a Map is insertion order. */
export class LruCache<K, V> {
	private readonly entries = new Map<K, V>()

	constructor(readonly capacity: number) {}

	get size(): number {
		return this.entries.size
	}

	get(key: K): V | undefined {
		const value = this.entries.get(key)
		if (value === undefined) return undefined
		this.entries.delete(key)
		this.entries.set(key, value)
		return value
	}

	set(key: K, value: V): void {
		if (this.capacity <= 0) return
		this.entries.delete(key)
		this.entries.set(key, value)
		while (this.entries.size > this.capacity) {
			const oldest = this.entries.keys().next()
			if (oldest.done) break
			this.entries.delete(oldest.value)
		}
	}

	has(key: K): boolean {
		return this.entries.has(key)
	}

	keys(): K[] {
		return Array.from(this.entries.keys())
	}
}

// ===== Routing table =====

export interface RouteStats {
	readonly endpoints: number
	readonly cached: number
	readonly hits: number
	readonly misses: number
}

/**
 * Exact, case-sensitive hostname lookup with an LRU in front of it.
 * The cache only ever holds answers the table itself gave.
 */
export class RouteTable {
	private readonly table: ReadonlyMap<string, Endpoint>
	private readonly cache: LruCache<string, Endpoint>
	private hits = 0
	private misses = 0

	constructor(endpoints: Iterable<Endpoint>, cacheSize: number) {
		const table = new Map<string, Endpoint>()
		for (const endpoint of endpoints) {
			if (!table.has(endpoint.hostname)) table.set(endpoint.hostname, endpoint)
		}
		this.table = table
		this.cache = new LruCache(cacheSize)
	}

	resolve(serverAddress: string): Endpoint | undefined {
		const hostname = routingKey(serverAddress)
		const cached = this.cache.get(hostname)
		if (cached) {
			this.hits++
			return cached
		}
		this.misses++
		const endpoint = this.table.get(hostname)
		if (endpoint) this.cache.set(hostname, endpoint)
		return endpoint
	}

	get endpoints(): ReadonlyArray<Endpoint> {
		return Array.from(this.table.values())
	}

	isCached(hostname: string): boolean {
		return this.cache.has(hostname)
	}

	stats(): RouteStats {
		return {
			endpoints: this.table.size,
			cached: this.cache.size,
			hits: this.hits,
			misses: this.misses
		}
	}
}

/**
 * Forge appends `\0FML\0`-style markers to the address, and some clients
 * keep the trailing dot of a fully qualified name; neither is part of the
 * virtual host.
 */
export function routingKey(serverAddress: string): string {
	const nul = serverAddress.indexOf('\0')
	const host = nul === -1 ? serverAddress : serverAddress.slice(0, nul)
	return host.endsWith('.') ? host.slice(0, -1) : host
}
