import { createServer, connect } from 'net'
import type { Socket, Server } from 'net'
import { Portcullis, type PortcullisProxy } from '../src/portcullis'
import type { ConfigInput } from '../src/config'
import { silentLogger } from '../src/logger'
import { framePacket, readVarInt, writeString } from '../src/protocol'

// ===== 协议工具函数 =====

export { writeVarInt, writeString } from '../src/protocol'

export function readString(buffer: Buffer, offset: number): [string, number] {
	const prefix = readVarInt(buffer, offset)
	if (!prefix) throw new Error('Buffer underflow while reading String')
	const [len, lenBytes] = prefix
	const start = offset + lenBytes
	const end = start + len
	if (end > buffer.length) {
		throw new Error('Buffer underflow while reading String')
	}
	return [buffer.toString('utf8', start, end), lenBytes + len]
}

export function createLoginStartPacket(username: string): Buffer {
	return framePacket(0x00, writeString(username))
}

export function createStatusRequest(): Buffer {
	// Status request packet: length=1, packetId=0x00
	return Buffer.from([0x01, 0x00])
}

export function createPingPacket(payload: Buffer): Buffer {
	return framePacket(0x01, payload)
}

/** Splits a server reply into `[packetId, body]` frames. */
export function splitFrames(data: Buffer): Array<[number, Buffer]> {
	const frames: Array<[number, Buffer]> = []
	let offset = 0
	while (offset < data.length) {
		const length = readVarInt(data, offset)
		if (!length) throw new Error('Truncated frame length')
		const start = offset + length[1]
		const end = start + length[0]
		const id = readVarInt(data, start)
		if (!id || end > data.length) throw new Error('Truncated frame')
		frames.push([id[0], data.subarray(start + id[1], end)])
		offset = end
	}
	return frames
}

/** JSON string payload of a status-response or login-disconnect frame. */
export function readJsonFrame(body: Buffer): unknown {
	const [json] = readString(body, 0)
	return JSON.parse(json)
}

// ===== 测试常量 =====
export const TEST_CONSTANTS = {
	LOCALHOST: '127.0.0.1',
	TEST_HOST: 'server1.example.com',
	STATUS_HOST: 'server2.example.com',
	TEST_USERNAME: 'portcullis_test',
	TEST_PROTOCOL_VERSION: 765
}

// ===== 模拟后端服务器 =====
export interface Backend {
	readonly server: Server
	readonly port: number
	/** Every byte each backend connection received, in accept order */
	readonly received: Buffer[]
	readonly connections: Socket[]
	close(): Promise<void>
}

export function startBackendServer(
	onData?: (data: Buffer, socket: Socket) => void
): Promise<Backend> {
	const received: Buffer[] = []
	const connections: Socket[] = []
	const server = createServer(socket => {
		const index = received.push(Buffer.alloc(0)) - 1
		connections.push(socket)
		socket.on('data', data => {
			received[index] = Buffer.concat([received[index], data])
			onData?.(data, socket)
		})
		socket.on('error', () => socket.destroy())
	})

	return new Promise((resolve, reject) => {
		server.once('error', reject)
		server.listen(0, TEST_CONSTANTS.LOCALHOST, () => {
			const address = server.address()
			if (address === null || typeof address === 'string') {
				reject(new Error('Backend is not bound to a TCP port'))
				return
			}
			const { port } = address
			resolve({
				server,
				port,
				received,
				connections,
				close: () =>
					new Promise<void>(done => {
						connections.forEach(s => s.destroy())
						server.close(() => done())
					})
			})
		})
	})
}

// ===== 代理 =====
export async function startProxy(
	config: ConfigInput
): Promise<{ proxy: PortcullisProxy; port: number }> {
	const proxy = Portcullis.createProxy(
		{
			...config,
			settings: { host: TEST_CONSTANTS.LOCALHOST, listen: 0, ...config.settings }
		},
		{ logger: silentLogger }
	)
	const listener = await proxy.listen()
	return { proxy, port: listener.address().port }
}

// ===== 模拟客户端 =====
export interface ClientResult {
	/** Everything the proxy wrote before the connection closed */
	readonly data: Buffer
	readonly error?: Error
}

/**
 * Connects, writes `payloads` in order (one write each) and resolves with
 * what came back once the socket closes.
 */
export function runClient(
	port: number,
	payloads: Buffer[],
	options: { onData?: (data: Buffer, client: Socket) => void } = {}
): Promise<ClientResult> {
	return new Promise(resolve => {
		let data = Buffer.alloc(0)
		let error: Error | undefined
		const client = connect(port, TEST_CONSTANTS.LOCALHOST, () => {
			for (const payload of payloads) client.write(payload)
		})
		client.on('data', chunk => {
			data = Buffer.concat([data, chunk])
			options.onData?.(chunk, client)
		})
		client.on('error', err => {
			error = err
		})
		client.on('close', () => resolve({ data, error }))
	})
}

/** A loopback port with nothing listening on it. */
export async function getFreePort(): Promise<number> {
	const server = createServer()
	await new Promise<void>(resolve => server.listen(0, TEST_CONSTANTS.LOCALHOST, resolve))
	const address = server.address()
	await new Promise<void>(resolve => server.close(() => resolve()))
	if (address === null || typeof address === 'string') {
		throw new Error('Probe server is not bound to a TCP port')
	}
	return address.port
}

export function sleep(ms: number): Promise<void> {
	return new Promise(resolve => setTimeout(resolve, ms))
}
