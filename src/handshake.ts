import { ParseError } from './errors'
import {
	MAX_ADDRESS_BYTES,
	PacketReader,
	framePacket,
	readFrame,
	writeString,
	writeUShort,
	writeVarInt
} from './protocol'

export const HANDSHAKE_PACKET_ID = 0x00
export const LEGACY_PING_PREFIX = 0xfe
// 1.6 clients follow `FE 01` with a MC|PingHost plugin message
const LEGACY_PING_PAYLOAD = 0x01
const LEGACY_PLUGIN_MESSAGE = 0xfa

export type NextState = 'status' | 'login'

export interface Handshake {
	readonly protocolVersion: number
	readonly serverAddress: string
	readonly serverPort: number
	readonly nextState: NextState
}

export interface HandshakeLimits {
	/** Most bytes held while the handshake is incomplete (`client_buffer_size`) */
	readonly bufferSize: number
	/** Most non-handshake packets skipped before giving up (`client_packets_limit`) */
	readonly packetsLimit: number
}

export type DecodeStep =
	| { readonly kind: 'pending' }
	| {
			readonly kind: 'handshake'
			readonly handshake: Handshake
			/** The handshake frame exactly as the client sent it */
			readonly frame: Buffer
			/** Bytes the client pipelined after the handshake */
			readonly rest: Buffer
	  }
	| { readonly kind: 'error'; readonly error: ParseError }

const PENDING: DecodeStep = { kind: 'pending' }

/**
 * Incremental handshake parser. Feed it chunks as they arrive; it settles
 * exactly once, on a handshake or on a parse error, and keeps returning
 * that outcome afterwards.
 */
export class HandshakeDecoder {
	private buffer: Buffer = Buffer.alloc(0)
	private skippedPackets = 0
	private settled: DecodeStep | undefined

	constructor(private readonly limits: HandshakeLimits) {}

	get buffered(): number {
		return this.buffer.length
	}

	push(chunk: Buffer): DecodeStep {
		if (this.settled) return this.settled
		try {
			return this.advance(chunk)
		} catch (e) {
			if (e instanceof ParseError) return this.settle({ kind: 'error', error: e })
			throw e
		}
	}

	private advance(chunk: Buffer): DecodeStep {
		if (this.buffer.length + chunk.length > this.limits.bufferSize) {
			throw new ParseError(
				'BufferExceeded',
				`${this.buffer.length + chunk.length} B > ${this.limits.bufferSize} B`
			)
		}
		this.buffer =
			this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk])

		if (this.skippedPackets === 0) {
			if (isLegacyPing(this.buffer)) throw new ParseError('LegacyPing')
			// `FE 01` also opens a 254-byte modern frame; wait for the packet id
			if (isLegacyPrefix(this.buffer)) return PENDING
		}

		for (;;) {
			const frame = readFrame(this.buffer, this.limits.bufferSize)
			if (!frame) return PENDING

			if (frame.id !== HANDSHAKE_PACKET_ID) {
				this.skippedPackets++
				if (this.skippedPackets > this.limits.packetsLimit) {
					throw new ParseError(
						'PacketBudgetExceeded',
						`${this.skippedPackets} packets before handshake`
					)
				}
				this.buffer = this.buffer.subarray(frame.raw.length)
				continue
			}

			const handshake = parseHandshakeBody(frame.body)
			// Copies: the backend write may outlive whatever buffer the chunk came from
			return this.settle({
				kind: 'handshake',
				handshake,
				frame: Buffer.from(frame.raw),
				rest: Buffer.from(this.buffer.subarray(frame.raw.length))
			})
		}
	}

	/**
	 * Settles a decoder that ran out of time. Pre-1.6 clients send `FE` or
	 * `FE 01` and then wait, so a dangling legacy prefix is a legacy ping.
	 */
	expire(detail: string): ParseError {
		if (this.settled?.kind === 'error') return this.settled.error
		const error =
			this.skippedPackets === 0 && isLegacyPrefix(this.buffer)
				? new ParseError('LegacyPing', 'no payload after the legacy prefix')
				: new ParseError('Timeout', detail)
		this.settle({ kind: 'error', error })
		return error
	}

	private settle(step: DecodeStep): DecodeStep {
		this.settled = step
		this.buffer = Buffer.alloc(0)
		return step
	}
}

function isLegacyPrefix(buffer: Buffer): boolean {
	return (
		buffer[0] === LEGACY_PING_PREFIX &&
		(buffer.length === 1 || (buffer.length === 2 && buffer[1] === LEGACY_PING_PAYLOAD))
	)
}

function isLegacyPing(buffer: Buffer): boolean {
	return (
		buffer.length >= 3 &&
		buffer[0] === LEGACY_PING_PREFIX &&
		buffer[1] === LEGACY_PING_PAYLOAD &&
		buffer[2] === LEGACY_PLUGIN_MESSAGE
	)
}

export function parseHandshakeBody(body: Buffer): Handshake {
	const reader = new PacketReader(body)
	const protocolVersion = reader.readVarInt('protocol_version')
	const serverAddress = reader.readString('server_address', MAX_ADDRESS_BYTES)
	const serverPort = reader.readUShort('server_port')
	const state = reader.readVarInt('next_state')

	let nextState: NextState
	switch (state) {
		case 1:
			nextState = 'status'
			break
		case 2:
			nextState = 'login'
			break
		default:
			throw new ParseError('UnknownNextState', `next_state=${state}`)
	}

	return { protocolVersion, serverAddress, serverPort, nextState }
}

export function encodeHandshake(handshake: Handshake): Buffer {
	return framePacket(
		HANDSHAKE_PACKET_ID,
		writeVarInt(handshake.protocolVersion),
		writeString(handshake.serverAddress),
		writeUShort(handshake.serverPort),
		writeVarInt(handshake.nextState === 'status' ? 1 : 2)
	)
}
