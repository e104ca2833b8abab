// MOTD 与断开消息的构建
// 没有 origin 的端点由代理自己回应状态查询和登录请求

import { z } from 'zod'
import { ParseError } from './errors'
import { framePacket, readFrame, writeString } from './protocol'
import type { StatusTemplate } from './router'

export const STATUS_REQUEST_ID = 0x00
export const STATUS_RESPONSE_ID = 0x00
export const PING_ID = 0x01
export const PONG_ID = 0x01
export const LOGIN_DISCONNECT_ID = 0x00
const PING_PAYLOAD_BYTES = 8

// 文本组件类型定义
export type ChatComponent =
	| string
	| {
			text: string
			bold?: boolean
			italic?: boolean
			underlined?: boolean
			strikethrough?: boolean
			obfuscated?: boolean
			color?: string
			insertion?: string
			extra?: ChatComponent[]
	  }

export const Component: z.ZodType<ChatComponent> = z.union([
	z.string(),
	z.object({
		text: z.string(),
		bold: z.boolean().optional(),
		italic: z.boolean().optional(),
		underlined: z.boolean().optional(),
		strikethrough: z.boolean().optional(),
		obfuscated: z.boolean().optional(),
		color: z.string().optional(),
		insertion: z.string().optional(),
		extra: z.array(z.lazy(() => Component)).optional()
	})
])

// 状态响应 Schema 定义
export const StatusSchema = z.object({
	version: z.object({
		name: z.string(),
		protocol: z.number().int()
	}),
	players: z.object({
		max: z.number().int(),
		online: z.number().int(),
		sample: z.array(z.object({ name: z.string(), id: z.string() }))
	}),
	description: Component,
	favicon: z.string().optional(),
	enforcesSecureChat: z.boolean()
})

export type StatusType = z.infer<typeof StatusSchema>

// 代理不跟踪后端玩家数量，因此固定报告 0/0
export const buildStatus = (
	template: StatusTemplate,
	protocol: number
): StatusType =>
	StatusSchema.parse({
		version: { name: template.versionName, protocol },
		players: { max: 0, online: 0, sample: [] },
		description: template.motd,
		favicon: template.favicon,
		enforcesSecureChat: false
	})

export function synthesizeStatus(
	protocolVersion: number,
	template: StatusTemplate
): Buffer {
	const json = JSON.stringify(buildStatus(template, protocolVersion))
	return framePacket(STATUS_RESPONSE_ID, writeString(json))
}

export function synthesizeDisconnect(message: string): Buffer {
	const json = JSON.stringify({ text: message })
	return framePacket(LOGIN_DISCONNECT_ID, writeString(json))
}

export function synthesizePong(payload: Buffer): Buffer {
	return framePacket(PONG_ID, payload)
}

export type ResponderStep =
	| {
			readonly kind: 'reply'
			readonly packets: ReadonlyArray<Buffer>
			/** The exchange is over; close once the packets are flushed */
			readonly done: boolean
	  }
	| { readonly kind: 'error'; readonly error: ParseError }

/**
 * Status-state exchange after the handshake: answers the status request
 * with the prepared response, echoes the ping, then it is done.
 */
export class StatusResponder {
	private buffer: Buffer = Buffer.alloc(0)
	private statusSent = false
	private finished = false

	constructor(
		private readonly response: Buffer,
		private readonly bufferSize: number
	) {}

	/** Whether the status response has been handed out */
	get answered(): boolean {
		return this.statusSent
	}

	push(chunk: Buffer): ResponderStep {
		if (this.finished) return { kind: 'reply', packets: [], done: true }
		try {
			return this.advance(chunk)
		} catch (e) {
			if (e instanceof ParseError) {
				this.finished = true
				return { kind: 'error', error: e }
			}
			throw e
		}
	}

	private advance(chunk: Buffer): ResponderStep {
		if (this.buffer.length + chunk.length > this.bufferSize) {
			throw new ParseError(
				'BufferExceeded',
				`${this.buffer.length + chunk.length} B > ${this.bufferSize} B`
			)
		}
		this.buffer =
			this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk])

		const packets: Buffer[] = []
		for (;;) {
			const frame = readFrame(this.buffer, this.bufferSize)
			if (!frame) return { kind: 'reply', packets, done: false }
			this.buffer = this.buffer.subarray(frame.raw.length)

			if (frame.id === STATUS_REQUEST_ID && !this.statusSent) {
				this.statusSent = true
				packets.push(this.response)
				continue
			}
			if (frame.id === PING_ID && frame.body.length === PING_PAYLOAD_BYTES) {
				packets.push(synthesizePong(frame.body))
				this.finished = true
				return { kind: 'reply', packets, done: true }
			}
			throw new ParseError(
				'MalformedPacket',
				`unexpected packet 0x${frame.id.toString(16)} in status state`
			)
		}
	}
}
