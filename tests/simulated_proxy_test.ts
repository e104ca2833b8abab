import { describe, test, expect, beforeAll, afterAll, beforeEach } from 'vitest'
import { connect } from 'net'
import { encodeHandshake, type Handshake } from '../src/handshake'
import type { ConfigInput } from '../src/config'
import type { ConnectionInfo, PortcullisProxy } from '../src/portcullis'
import type { ConnectionOutcome } from '../src/supervisor'
import {
	startBackendServer,
	startProxy,
	runClient,
	getFreePort,
	createLoginStartPacket,
	createStatusRequest,
	createPingPacket,
	splitFrames,
	readJsonFrame,
	readString,
	sleep,
	TEST_CONSTANTS,
	type Backend
} from './helpers'

function handshake(serverAddress: string, nextState: Handshake['nextState']): Buffer {
	return encodeHandshake({
		protocolVersion: TEST_CONSTANTS.TEST_PROTOCOL_VERSION,
		serverAddress,
		serverPort: 25565,
		nextState
	})
}

/** Runs `fn` against a proxy of its own and always shuts it down. */
async function withProxy(
	config: ConfigInput,
	fn: (proxy: PortcullisProxy, port: number) => Promise<void>
): Promise<void> {
	const { proxy, port } = await startProxy(config)
	try {
		await fn(proxy, port)
	} finally {
		await proxy.shutdown()
	}
}

describe('Portcullis E2E: virtual host routing', () => {
	let proxy: PortcullisProxy
	let backend: Backend
	let port: number
	let closedConnections: Array<{ info: ConnectionInfo; outcome: ConnectionOutcome }>

	beforeAll(async () => {
		// 后端回显收到的所有数据
		backend = await startBackendServer((data, socket) => {
			socket.write(data)
		})
		const deadPort = await getFreePort()

		const started = await startProxy({
			settings: { ratelimit: 0, handshake_timeout: 1000, connect_timeout: 1000 },
			endpoints: [
				{
					hostname: TEST_CONSTANTS.TEST_HOST,
					origin: `${TEST_CONSTANTS.LOCALHOST}:${backend.port}`
				},
				{
					hostname: TEST_CONSTANTS.STATUS_HOST,
					motd: 'Epic server 2',
					message: 'Sorry this server is not available'
				},
				{
					hostname: 'offline.example.com',
					origin: `${TEST_CONSTANTS.LOCALHOST}:${deadPort}`
				}
			]
		})
		proxy = started.proxy
		port = started.port
		proxy.setEventHandlers({
			onConnectionClosed: (_conn, info, outcome) => {
				closedConnections.push({ info, outcome })
			}
		})
	})

	beforeEach(() => {
		closedConnections = []
	})

	afterAll(async () => {
		await proxy?.shutdown()
		await backend?.close()
	})

	test('forwards the handshake and pipelined login start byte for byte', async () => {
		const sent = Buffer.concat([
			handshake(TEST_CONSTANTS.TEST_HOST, 'login'),
			createLoginStartPacket(TEST_CONSTANTS.TEST_USERNAME)
		])
		let echoed = 0

		const result = await runClient(port, [sent], {
			onData: (chunk, client) => {
				echoed += chunk.length
				if (echoed >= sent.length) client.end()
			}
		})
		await proxy.idle()

		expect(result.data.equals(sent)).toBe(true)
		expect(backend.received[backend.received.length - 1].equals(sent)).toBe(true)
		expect(closedConnections).toHaveLength(1)
		const [{ info, outcome }] = closedConnections
		expect(info.host).toBe(TEST_CONSTANTS.TEST_HOST)
		expect(info.protocol).toBe(TEST_CONSTANTS.TEST_PROTOCOL_VERSION)
		expect(outcome.state === 'relayed' && outcome.result.bytesUp).toBe(sent.length)
		expect(outcome.state === 'relayed' && outcome.result.bytesDown).toBe(sent.length)
	})

	test('answers status and ping for an endpoint without origin', async () => {
		const payload = Buffer.from([1, 2, 3, 4, 5, 6, 7, 8])
		const result = await runClient(port, [
			handshake(TEST_CONSTANTS.STATUS_HOST, 'status'),
			createStatusRequest(),
			createPingPacket(payload)
		])

		const frames = splitFrames(result.data)
		expect(frames.map(([id]) => id)).toEqual([0x00, 0x01])
		expect(readJsonFrame(frames[0][1])).toEqual({
			version: { name: '1.20.4', protocol: TEST_CONSTANTS.TEST_PROTOCOL_VERSION },
			players: { max: 0, online: 0, sample: [] },
			description: 'Epic server 2',
			enforcesSecureChat: false
		})
		expect(frames[1][1].equals(payload)).toBe(true)

		await proxy.idle()
		expect(closedConnections.map(c => c.outcome)).toEqual([
			{ state: 'responded', reply: 'status' }
		])
	})

	test('disconnects logins to an endpoint without origin', async () => {
		const result = await runClient(port, [
			handshake(TEST_CONSTANTS.STATUS_HOST, 'login'),
			createLoginStartPacket(TEST_CONSTANTS.TEST_USERNAME)
		])

		await proxy.idle()

		const frames = splitFrames(result.data)
		expect(frames).toHaveLength(1)
		expect(frames[0][0]).toBe(0x00)
		expect(readString(frames[0][1], 0)[0]).toBe(
			'{"text":"Sorry this server is not available"}'
		)
		expect(closedConnections.map(c => c.outcome)).toEqual([
			{ state: 'responded', reply: 'disconnect' }
		])
	})

	test('ignores Forge markers in the server address', async () => {
		const sent = handshake(`${TEST_CONSTANTS.TEST_HOST}\0FML3\0`, 'login')
		let echoed = 0
		const result = await runClient(port, [sent], {
			onData: (chunk, client) => {
				echoed += chunk.length
				if (echoed >= sent.length) client.end()
			}
		})
		await proxy.idle()
		expect(result.data.equals(sent)).toBe(true)
	})

	test('closes silently on an unknown host', async () => {
		const result = await runClient(port, [handshake('unknown.example.com', 'login')])
		await proxy.idle()

		expect(result.data.length).toBe(0)
		expect(closedConnections.map(c => c.outcome)).toEqual([
			{ state: 'rejected', reason: 'RoutingMiss' }
		])
	})

	test('is case-sensitive about hostnames', async () => {
		const result = await runClient(port, [
			handshake(TEST_CONSTANTS.TEST_HOST.toUpperCase(), 'login')
		])
		await proxy.idle()
		expect(result.data.length).toBe(0)
	})

	test('closes the client when the origin is unreachable', async () => {
		const result = await runClient(port, [handshake('offline.example.com', 'login')])
		await proxy.idle()

		expect(result.data.length).toBe(0)
		expect(closedConnections.map(c => c.outcome)).toEqual([
			{ state: 'rejected', reason: 'DialError' }
		])
	})

	test('closes on a legacy server list ping', async () => {
		const result = await runClient(port, [Buffer.from([0xfe, 0x01])])
		await proxy.idle()

		expect(result.data.length).toBe(0)
		expect(closedConnections.map(c => c.outcome)).toEqual([
			{ state: 'rejected', reason: 'LegacyPing' }
		])
	})

	test('counts connections in the metrics', async () => {
		const before = proxy.getMetrics()
		await runClient(port, [handshake('unknown.example.com', 'status')])
		await proxy.idle()
		const after = proxy.getMetrics()

		expect(after.connections.total).toBe(before.connections.total + 1)
		expect(after.connections.rejected).toBe(before.connections.rejected + 1)
		expect(after.connections.active).toBe(0)
		expect(after.guard.active).toBe(0)
	})
})

describe('Portcullis E2E: abuse limits', () => {
	test('drops blocklisted addresses without a byte', async () => {
		await withProxy(
			{
				endpoints: [{ hostname: TEST_CONSTANTS.STATUS_HOST }],
				blocklist: [TEST_CONSTANTS.LOCALHOST]
			},
			async (proxy, port) => {
				const result = await runClient(port, [
					handshake(TEST_CONSTANTS.STATUS_HOST, 'status'),
					createStatusRequest()
				])
				await proxy.idle()

				expect(result.data.length).toBe(0)
				expect(proxy.getMetrics().guard.rejected.Blocked).toBe(1)
				expect(proxy.getMetrics().connections.rejected).toBe(1)
			}
		)
	})

	test('rate limits repeated connections from one address', async () => {
		await withProxy(
			{
				settings: { ratelimit: 2, ratelimit_window: 60_000 },
				endpoints: [{ hostname: TEST_CONSTANTS.STATUS_HOST, message: 'bye' }]
			},
			async (proxy, port) => {
				const login = [handshake(TEST_CONSTANTS.STATUS_HOST, 'login')]
				const first = await runClient(port, login)
				const second = await runClient(port, login)
				const third = await runClient(port, login)
				await proxy.idle()

				expect(splitFrames(first.data)).toHaveLength(1)
				expect(splitFrames(second.data)).toHaveLength(1)
				expect(third.data.length).toBe(0)
				expect(proxy.getMetrics().guard.rejected.RateLimited).toBe(1)
			}
		)
	})

	test('holds the address slot until a replied client is gone', async () => {
		await withProxy(
			{
				settings: { handshake_timeout: 300 },
				endpoints: [{ hostname: TEST_CONSTANTS.STATUS_HOST, message: 'bye' }]
			},
			async (proxy, port) => {
				// Never sends its own FIN, so only the linger timer closes it
				const client = connect({ port, host: TEST_CONSTANTS.LOCALHOST, allowHalfOpen: true })
				client.on('error', () => client.destroy())
				client.on('data', () => {})
				const ended = new Promise<void>(resolve => client.once('end', () => resolve()))
				client.write(handshake(TEST_CONSTANTS.STATUS_HOST, 'login'))

				await ended
				expect(proxy.getMetrics().guard.active).toBe(1)

				await proxy.idle()
				expect(proxy.getMetrics().guard.active).toBe(0)
				client.destroy()
			}
		)
	})

	test('closes clients that never send a handshake', async () => {
		await withProxy(
			{
				settings: { handshake_timeout: 200 },
				endpoints: [{ hostname: TEST_CONSTANTS.STATUS_HOST }]
			},
			async (proxy, port) => {
				const outcomes: ConnectionOutcome[] = []
				proxy.setEventHandlers({
					onConnectionClosed: (_conn, _info, outcome) => outcomes.push(outcome)
				})

				const startedAt = Date.now()
				const result = await runClient(port, [])
				await proxy.idle()

				expect(Date.now() - startedAt).toBeGreaterThanOrEqual(150)
				expect(result.data.length).toBe(0)
				expect(outcomes).toEqual([{ state: 'rejected', reason: 'Timeout' }])
			}
		)
	})

	test('shutdown closes relayed connections', async () => {
		const backend = await startBackendServer()
		try {
			await withProxy(
				{
					endpoints: [
						{
							hostname: TEST_CONSTANTS.TEST_HOST,
							origin: `${TEST_CONSTANTS.LOCALHOST}:${backend.port}`
						}
					]
				},
				async (proxy, port) => {
					const client = runClient(port, [handshake(TEST_CONSTANTS.TEST_HOST, 'login')])

					// Relaying once the origin has the handshake
					while (backend.received.length === 0 || backend.received[0].length === 0) {
						await sleep(10)
					}

					expect(proxy.getConnectionCount()).toBe(1)
					await proxy.shutdown()
					await client
					expect(proxy.getConnectionCount()).toBe(0)
				}
			)
		} finally {
			await backend.close()
		}
	})
})
