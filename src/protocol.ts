// Minecraft 协议帧原语
// https://wiki.vg/Protocol#Data_types

import { ParseError } from './errors'

export const SEGMENT_BITS = 0x7f
export const CONTINUE_BIT = 0x80
export const VARINT_MAX_BYTES = 5
export const MAX_ADDRESS_BYTES = 255

// ===== 编码 =====

export function writeVarInt(value: number): Buffer {
	const bytes: number[] = []
	do {
		let temp = value & SEGMENT_BITS
		value >>>= 7
		if (value !== 0) temp |= CONTINUE_BIT
		bytes.push(temp)
	} while (value !== 0)
	return Buffer.from(bytes)
}

export function writeString(str: string): Buffer {
	const strBuf = Buffer.from(str, 'utf8')
	return Buffer.concat([writeVarInt(strBuf.length), strBuf])
}

export function writeUShort(value: number): Buffer {
	const buf = Buffer.alloc(2)
	buf.writeUInt16BE(value & 0xffff, 0)
	return buf
}

/** Prefixes `packetId` and every part with the frame length. */
export function framePacket(packetId: number, ...parts: Buffer[]): Buffer {
	const data = Buffer.concat([writeVarInt(packetId), ...parts])
	return Buffer.concat([writeVarInt(data.length), data])
}

// ===== 解码 =====

/**
 * Reads a 32-bit VarInt at `offset`.
 * Returns `undefined` while the buffer ends before the last byte, so callers
 * can wait for more input; a sixth continuation byte is never waited for.
 */
export function readVarInt(
	buffer: Buffer,
	offset: number
): [number, number] | undefined {
	let numRead = 0
	let result = 0
	let read: number
	do {
		if (numRead >= VARINT_MAX_BYTES) {
			throw new ParseError('MalformedVarInt', 'VarInt is too big')
		}
		if (offset + numRead >= buffer.length) {
			return undefined
		}
		read = buffer[offset + numRead]
		result |= (read & SEGMENT_BITS) << (7 * numRead)
		numRead++
	} while ((read & CONTINUE_BIT) !== 0)
	return [result | 0, numRead]
}

export interface Frame {
	readonly id: number
	/** Payload after the packet id */
	readonly body: Buffer
	/** The whole frame, length prefix included, as received */
	readonly raw: Buffer
}

/**
 * Splits one length-prefixed frame off the front of `buffer`.
 * `maxLength` bounds the declared length so a hostile prefix never makes
 * the caller wait for (or buffer) more than it is willing to hold.
 */
export function readFrame(buffer: Buffer, maxLength: number): Frame | undefined {
	const prefix = readVarInt(buffer, 0)
	if (!prefix) return undefined
	const [length, prefixSize] = prefix
	if (length <= 0) {
		throw new ParseError('MalformedPacket', `invalid frame length ${length}`)
	}
	if (length > maxLength) {
		throw new ParseError(
			'BufferExceeded',
			`frame of ${length} B exceeds ${maxLength} B`
		)
	}
	const end = prefixSize + length
	if (buffer.length < end) return undefined

	const data = buffer.subarray(prefixSize, end)
	const id = readVarInt(data, 0)
	if (!id) {
		throw new ParseError('MalformedPacket', 'truncated packet id')
	}
	return {
		id: id[0],
		body: data.subarray(id[1]),
		raw: buffer.subarray(0, end)
	}
}

/** Cursor over a complete packet body; any short read is a malformed packet. */
export class PacketReader {
	private cursor = 0

	constructor(private readonly data: Buffer) {}

	get remaining(): number {
		return this.data.length - this.cursor
	}

	readVarInt(field: string): number {
		const res = readVarInt(this.data, this.cursor)
		if (!res) throw new ParseError('MalformedPacket', `truncated ${field}`)
		this.cursor += res[1]
		return res[0]
	}

	readString(field: string, maxBytes: number): string {
		const length = this.readVarInt(field)
		if (length < 0) {
			throw new ParseError('MalformedPacket', `negative ${field} length`)
		}
		if (length > maxBytes) {
			throw new ParseError(
				'StringTooLong',
				`${field} is ${length} B, limit ${maxBytes} B`
			)
		}
		if (this.remaining < length) {
			throw new ParseError('MalformedPacket', `truncated ${field}`)
		}
		const str = this.data.toString('utf8', this.cursor, this.cursor + length)
		this.cursor += length
		return str
	}

	readUShort(field: string): number {
		if (this.remaining < 2) {
			throw new ParseError('MalformedPacket', `truncated ${field}`)
		}
		const value = this.data.readUInt16BE(this.cursor)
		this.cursor += 2
		return value
	}

	readBytes(field: string, length: number): Buffer {
		if (this.remaining < length) {
			throw new ParseError('MalformedPacket', `truncated ${field}`)
		}
		const bytes = this.data.subarray(this.cursor, this.cursor + length)
		this.cursor += length
		return bytes
	}
}

export function bytesAsHex(data: Buffer, limit: number = data.length): string {
	const shown = data.subarray(0, Math.max(0, limit))
	const hex = Array.from(shown, b => b.toString(16).padStart(2, '0')).join(' ')
	return shown.length < data.length
		? `${hex} ... (+${data.length - shown.length} B)`
		: hex
}
