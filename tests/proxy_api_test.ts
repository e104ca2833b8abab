import { describe, test, expect, beforeAll, afterAll } from 'vitest'
import { encodeHandshake } from '../src/handshake'
import { Portcullis, type Listener, type PortcullisProxy } from '../src/portcullis'
import { silentLogger } from '../src/logger'
import type { ConnectionOutcome } from '../src/supervisor'
import {
	startBackendServer,
	runClient,
	sleep,
	TEST_CONSTANTS,
	type Backend
} from './helpers'

describe('Portcullis.simpleRoutes', () => {
	test('maps hostnames to origins', () => {
		expect(
			Portcullis.simpleRoutes({
				'a.example.com': '10.0.0.1:25566',
				'b.example.com': 'backend.internal'
			})
		).toEqual([
			{ hostname: 'a.example.com', origin: '10.0.0.1:25566' },
			{ hostname: 'b.example.com', origin: 'backend.internal' }
		])
	})
})

describe('PortcullisProxy connection registry', () => {
	let backend: Backend
	let proxy: PortcullisProxy
	let listener: Listener
	const started: number[] = []
	const stopped: number[] = []
	const outcomes: ConnectionOutcome[] = []

	beforeAll(async () => {
		backend = await startBackendServer()
		proxy = Portcullis.createProxy(
			{
				settings: { host: TEST_CONSTANTS.LOCALHOST, listen: 0 },
				endpoints: Portcullis.simpleRoutes({
					[TEST_CONSTANTS.TEST_HOST]: `${TEST_CONSTANTS.LOCALHOST}:${backend.port}`
				})
			},
			{ logger: silentLogger }
		)
		proxy.setEventHandlers({
			onListenerStarted: l => started.push(l.id),
			onListenerStopped: l => stopped.push(l.id),
			onConnectionClosed: (_conn, _info, outcome) => outcomes.push(outcome)
		})
		listener = await proxy.listen()
	})

	afterAll(async () => {
		await proxy.shutdown()
		await backend.close()
	})

	test('tracks a relayed connection until it is disconnected', async () => {
		const client = runClient(listener.address().port, [
			encodeHandshake({
				protocolVersion: TEST_CONSTANTS.TEST_PROTOCOL_VERSION,
				serverAddress: TEST_CONSTANTS.TEST_HOST,
				serverPort: 25565,
				nextState: 'login'
			})
		])
		while (backend.received.length === 0 || backend.received[0].length === 0) {
			await sleep(10)
		}

		const [conn] = proxy.getConnections()
		expect(proxy.getConnectionCount()).toBe(1)
		expect(conn.host).toBe(TEST_CONSTANTS.TEST_HOST)
		expect(conn.protocol).toBe(TEST_CONSTANTS.TEST_PROTOCOL_VERSION)
		expect(conn.state).toBe('relaying')
		expect(conn.isActive()).toBe(true)
		expect(conn.getDurationString()).toMatch(/^\d+s$/)
		expect(proxy.getConnection(conn.id)).toBe(conn)
		expect(proxy.getConnectionsByHost(TEST_CONSTANTS.TEST_HOST)).toEqual([conn])
		expect(proxy.getConnectionsByIp(TEST_CONSTANTS.LOCALHOST)).toEqual([conn])
		expect(proxy.getConnectionsByIp('192.0.2.1')).toEqual([])

		expect(proxy.disconnectIp(TEST_CONSTANTS.LOCALHOST)).toBe(1)
		await client
		await proxy.idle()

		expect(conn.isActive()).toBe(false)
		expect(proxy.getConnectionCount()).toBe(0)
		expect(outcomes).toHaveLength(1)
		expect(outcomes[0].state === 'relayed' && outcomes[0].result.reason).toBe('aborted')
		expect(proxy.getMetrics().connections.relayed).toBe(1)
	})

	test('stops listeners one by one', async () => {
		const extra = await proxy.listen({ port: 0 })
		expect(proxy.getListeners()).toHaveLength(2)
		expect(started).toEqual([listener.id, extra.id])

		await extra.stop()
		expect(extra.isListening()).toBe(false)
		expect(stopped).toEqual([extra.id])
		expect(proxy.getListeners()).toEqual([listener])
	})
})
