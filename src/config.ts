import { readFile } from 'fs/promises'
import { parse as parseYaml } from 'yaml'
import { z } from 'zod'
import { ConfigError } from './errors'
import type { Endpoint, OriginAddress } from './router'

export const DEFAULT_ORIGIN_PORT = 25565
export const VERSION_NAME_DEFAULT = '1.20.4'
export const MOTD_DEFAULT = 'A Minecraft Server'
export const DISCONNECT_MESSAGE_DEFAULT = 'Server configuration error'

export const LOG_LEVELS = ['none', 'connection', 'verbose', 'debug'] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

const count = z.number().int().min(0)
const positive = z.number().int().positive()

const settingsSchema = z
	.object({
		cache_size: count.default(1024),
		handshake_timeout: positive.default(5000),
		connect_timeout: positive.default(3000),
		client_buffer_size: positive.default(4096),
		backend_buffer_size: positive.default(4096),
		client_packets_limit: count.default(8),
		ratelimit_window: positive.default(60_000),
		ratelimit: count.default(10),
		concurrent_limit: count.default(0),
		clients_limit: count.default(0),
		listen: z.number().int().min(0).max(65535).default(25565),
		host: z.string().min(1).default('0.0.0.0'),
		log: z.enum(LOG_LEVELS).default('connection'),
		log_inspect_buffer_limit: count.default(1024)
	})
	.strict()
	.transform(s => ({
		cacheSize: s.cache_size,
		handshakeTimeout: s.handshake_timeout,
		connectTimeout: s.connect_timeout,
		clientBufferSize: s.client_buffer_size,
		backendBufferSize: s.backend_buffer_size,
		clientPacketsLimit: s.client_packets_limit,
		ratelimitWindow: s.ratelimit_window,
		ratelimit: s.ratelimit,
		concurrentLimit: s.concurrent_limit,
		clientsLimit: s.clients_limit,
		listen: s.listen,
		host: s.host,
		log: s.log,
		logInspectBufferLimit: s.log_inspect_buffer_limit
	}))

export type ProxySettings = z.output<typeof settingsSchema>

const ORIGIN_PATTERN = /^(?:\[([0-9a-fA-F:.]+)\]|([^:[\]\s]+))(?::(\d{1,5}))?$/

export function parseOrigin(value: string): OriginAddress | undefined {
	const match = ORIGIN_PATTERN.exec(value.trim())
	if (!match) return undefined
	const host = match[1] ?? match[2]
	const port = match[3] === undefined ? DEFAULT_ORIGIN_PORT : Number(match[3])
	if (!host || port < 1 || port > 65535) return undefined
	return { host, port }
}

const endpointSchema = z
	.object({
		// Clients' trailing dots are stripped before lookup, so one here never matches
		hostname: z
			.string()
			.min(1)
			.refine(h => !h.endsWith('.'), 'hostname must not end with a dot'),
		origin: z.string().optional(),
		motd: z.string().optional(),
		message: z.string().optional(),
		version: z.string().optional(),
		favicon: z.string().startsWith('data:image/png;base64,').optional()
	})
	.strict()
	.transform((e, ctx): Endpoint => {
		if (e.origin !== undefined) {
			const origin = parseOrigin(e.origin)
			if (!origin) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					message: `origin '${e.origin}' is not host[:port]`,
					path: ['origin']
				})
				return z.NEVER
			}
			return { hostname: e.hostname, action: { kind: 'proxy', origin } }
		}
		return {
			hostname: e.hostname,
			action: {
				kind: 'respond',
				status: {
					motd: e.motd ?? MOTD_DEFAULT,
					versionName: e.version ?? VERSION_NAME_DEFAULT,
					favicon: e.favicon
				},
				message: e.message ?? DISCONNECT_MESSAGE_DEFAULT
			}
		}
	})

const configSchema = z.object({
	settings: settingsSchema.default({}),
	endpoints: z
		.array(endpointSchema)
		.default([])
		.superRefine((endpoints, ctx) => {
			const seen = new Set<string>()
			endpoints.forEach((endpoint, i) => {
				if (seen.has(endpoint.hostname)) {
					ctx.addIssue({
						code: z.ZodIssueCode.custom,
						message: `duplicate hostname '${endpoint.hostname}'`,
						path: [i, 'hostname']
					})
				}
				seen.add(endpoint.hostname)
			})
		}),
	blocklist: z.array(z.string().min(1)).default([])
})

export type ConfigInput = z.input<typeof configSchema>
export type Config = z.output<typeof configSchema>

export function parseConfig(document: unknown): Config {
	const result = configSchema.safeParse(document ?? {})
	if (!result.success) {
		throw new ConfigError(
			result.error.issues
				.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
				.join('; ')
		)
	}
	return result.data
}

export function defineConfig(input: ConfigInput): Config {
	return parseConfig(input)
}

export async function loadConfig(path: string): Promise<Config> {
	const raw = await readFile(path, 'utf8')
	let document: unknown
	try {
		document = parseYaml(raw)
	} catch (e) {
		throw new ConfigError(
			`${path} is not valid YAML: ${e instanceof Error ? e.message : String(e)}`
		)
	}
	return parseConfig(document)
}
