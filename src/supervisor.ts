import type { Socket } from 'net'
import { v4 as uuidv4 } from 'uuid'
import type { ProxySettings } from './config'
import { DialError } from './errors'
import type { AbuseRejection, ParseError, ParseErrorCode } from './errors'
import type { AbuseGuard } from './guard'
import { normalizeIp } from './guard'
import { HandshakeDecoder, type Handshake } from './handshake'
import { inspectBuffer, type Logger } from './logger'
import { StatusResponder, synthesizeDisconnect, synthesizeStatus } from './motd'
import { closeAfterFlush, dialOrigin, relay, whenClosed, type RelayResult } from './relay'
import { formatOrigin, type Endpoint, type RouteTable } from './router'

export type ConnectionState =
	| 'accepted'
	| 'guarded'
	| 'handshaking'
	| 'relaying'
	| 'responding'
	| 'rejected'
	| 'closed'

export type RejectionReason =
	| AbuseRejection
	| ParseErrorCode
	| 'NoAddress'
	| 'RoutingMiss'
	| 'DialError'
	| 'Internal'

export type ConnectionOutcome =
	| { readonly state: 'rejected'; readonly reason: RejectionReason }
	| { readonly state: 'relayed'; readonly result: RelayResult }
	| { readonly state: 'responded'; readonly reply: 'status' | 'disconnect' }
	/** The client hung up before a decision was reached */
	| { readonly state: 'abandoned' }

/** Everything known about one client connection, for its lifetime only. */
export class ConnectionContext {
	readonly id = uuidv4()
	readonly acceptedAt = Date.now()
	state: ConnectionState = 'accepted'
	handshake?: Handshake
	endpoint?: Endpoint
	private readonly controller = new AbortController()

	constructor(
		readonly socket: Socket,
		readonly ip: string
	) {}

	get signal(): AbortSignal {
		return this.controller.signal
	}

	/** Cancels whatever the connection is waiting on and drops the socket. */
	abort(): void {
		if (!this.controller.signal.aborted) this.controller.abort()
		this.socket.destroy()
	}

	getDuration(): number {
		return Date.now() - this.acceptedAt
	}
}

export interface SupervisorHooks {
	onOpen?: (context: ConnectionContext) => void
	onClose?: (context: ConnectionContext, outcome: ConnectionOutcome) => void
}

type HandshakeRead =
	| {
			readonly kind: 'handshake'
			readonly handshake: Handshake
			readonly frame: Buffer
			readonly rest: Buffer
	  }
	| { readonly kind: 'error'; readonly error: ParseError }
	| { readonly kind: 'abandoned' }

/**
 * Per-connection pipeline: guard → handshake → route → relay or respond.
 * `handle` never rejects, and every admitted connection is released from
 * the guard exactly once, whichever way it ends.
 */
export class ConnectionSupervisor {
	constructor(
		private readonly settings: ProxySettings,
		private readonly guard: AbuseGuard,
		private readonly routes: RouteTable,
		private readonly logger: Logger,
		private readonly hooks: SupervisorHooks = {}
	) {}

	async handle(socket: Socket): Promise<ConnectionOutcome> {
		const address = socket.remoteAddress
		if (!address) {
			socket.resetAndDestroy()
			return { state: 'rejected', reason: 'NoAddress' }
		}

		const ip = normalizeIp(address)
		const admission = this.guard.admit(ip)
		if (!admission.admitted) {
			this.logger.debug(
				{ ip, event: 'admission', outcome: 'rejected', reason: admission.reason },
				'connection refused by guard'
			)
			socket.resetAndDestroy()
			return { state: 'rejected', reason: admission.reason }
		}

		const context = new ConnectionContext(socket, ip)
		const log = this.logger.child({ conn: context.id, ip })
		context.state = 'guarded'
		socket.setNoDelay(true)
		socket.on('error', err =>
			log.debug({ event: 'socket', err: err.message }, 'client socket error')
		)
		socket.once('close', () => context.abort())
		log.info({ event: 'admission', outcome: 'admitted' }, 'peer connected')
		this.hooks.onOpen?.(context)

		let outcome: ConnectionOutcome = { state: 'rejected', reason: 'Internal' }
		try {
			outcome = await this.process(context, log)
		} catch (e) {
			log.error({ err: e, event: 'internal' }, 'connection handler failed')
			outcome = { state: 'rejected', reason: 'Internal' }
		} finally {
			if (outcome.state === 'rejected') context.state = 'rejected'
			if (outcome.state === 'rejected' || outcome.state === 'abandoned') {
				socket.destroy()
			} else {
				closeAfterFlush(socket, this.settings.handshakeTimeout)
			}
			// The address keeps its slot until the socket is really gone
			await whenClosed(socket)
			this.guard.release(ip)
			context.state = 'closed'
			log.info(
				{ event: 'closed', outcome: describe(outcome), duration: context.getDuration() },
				'peer disconnected'
			)
			this.hooks.onClose?.(context, outcome)
		}
		return outcome
	}

	private async process(
		context: ConnectionContext,
		log: Logger
	): Promise<ConnectionOutcome> {
		context.state = 'handshaking'
		const read = await this.readHandshake(context)
		if (read.kind === 'abandoned') return { state: 'abandoned' }
		if (read.kind === 'error') {
			log.debug(
				{ event: 'handshake', outcome: 'rejected', reason: read.error.code },
				read.error.message
			)
			return { state: 'rejected', reason: read.error.code }
		}

		const { handshake } = read
		context.handshake = handshake
		log.trace(
			{
				event: 'handshake',
				frame: inspectBuffer(read.frame, this.settings.logInspectBufferLimit)
			},
			'handshake frame'
		)

		const endpoint = this.routes.resolve(handshake.serverAddress)
		if (!endpoint) {
			log.debug(
				{
					event: 'route',
					outcome: 'rejected',
					reason: 'RoutingMiss',
					host: handshake.serverAddress
				},
				'unknown virtual host'
			)
			return { state: 'rejected', reason: 'RoutingMiss' }
		}
		context.endpoint = endpoint

		const { action } = endpoint
		log.debug(
			{
				event: 'route',
				host: endpoint.hostname,
				protocol: handshake.protocolVersion,
				nextState: handshake.nextState,
				action: action.kind === 'proxy' ? formatOrigin(action.origin) : action.kind
			},
			'route resolved'
		)

		switch (action.kind) {
			case 'proxy':
				return this.forward(context, log, action.origin, [read.frame, read.rest])
			case 'respond':
				context.state = 'responding'
				if (handshake.nextState === 'login') {
					await endWith(
						context.socket,
						synthesizeDisconnect(action.message),
						this.settings.handshakeTimeout
					)
					return { state: 'responded', reply: 'disconnect' }
				}
				return this.respondStatus(
					context,
					log,
					synthesizeStatus(handshake.protocolVersion, action.status),
					read.rest
				)
		}
	}

	private readHandshake(context: ConnectionContext): Promise<HandshakeRead> {
		const { socket, signal } = context
		const decoder = new HandshakeDecoder({
			bufferSize: this.settings.clientBufferSize,
			packetsLimit: this.settings.clientPacketsLimit
		})
		// Measured from acceptance, not from the first byte
		const remaining =
			this.settings.handshakeTimeout - (Date.now() - context.acceptedAt)

		return new Promise(resolve => {
			const settle = (result: HandshakeRead) => {
				clearTimeout(timer)
				socket.off('data', onData)
				socket.off('end', onGone)
				socket.off('error', onGone)
				signal.removeEventListener('abort', onGone)
				socket.pause()
				resolve(result)
			}
			const onData = (chunk: Buffer) => {
				const step = decoder.push(chunk)
				if (step.kind !== 'pending') settle(step)
			}
			const onGone = () => settle({ kind: 'abandoned' })
			const timer = setTimeout(
				() =>
					settle({
						kind: 'error',
						error: decoder.expire(
							`no handshake after ${this.settings.handshakeTimeout} ms`
						)
					}),
				Math.max(0, remaining)
			)

			if (signal.aborted) {
				onGone()
				return
			}
			socket.on('data', onData)
			socket.once('end', onGone)
			socket.once('error', onGone)
			signal.addEventListener('abort', onGone, { once: true })
			socket.resume()
		})
	}

	private async forward(
		context: ConnectionContext,
		log: Logger,
		origin: { host: string; port: number },
		initial: Buffer[]
	): Promise<ConnectionOutcome> {
		const { socket, signal } = context
		let backend: Socket
		try {
			backend = await dialOrigin(origin, {
				timeout: this.settings.connectTimeout,
				signal
			})
		} catch (e) {
			if (!(e instanceof DialError)) throw e
			if (e.reason === 'aborted') return { state: 'abandoned' }
			log.warn(
				{ event: 'dial', outcome: 'failed', origin: e.origin, reason: e.reason },
				e.message
			)
			return { state: 'rejected', reason: 'DialError' }
		}

		context.state = 'relaying'
		log.debug({ event: 'dial', outcome: 'connected', origin: formatOrigin(origin) }, 'relaying')
		const result = await relay({
			client: socket,
			backend,
			initial,
			clientBufferSize: this.settings.clientBufferSize,
			backendBufferSize: this.settings.backendBufferSize,
			linger: this.settings.handshakeTimeout,
			signal
		})

		const fields = {
			event: 'relay',
			outcome: result.reason,
			bytesUp: result.bytesUp,
			bytesDown: result.bytesDown
		}
		if (result.error) {
			log.warn({ ...fields, err: result.error }, 'relay failed')
		} else {
			log.debug(fields, 'relay finished')
		}
		return { state: 'relayed', result }
	}

	private respondStatus(
		context: ConnectionContext,
		log: Logger,
		response: Buffer,
		pipelined: Buffer
	): Promise<ConnectionOutcome> {
		const { socket, signal } = context
		const responder = new StatusResponder(response, this.settings.clientBufferSize)

		return new Promise(resolve => {
			let settled = false
			const settle = (outcome: ConnectionOutcome) => {
				if (settled) return
				settled = true
				clearTimeout(timer)
				socket.off('data', onData)
				socket.off('end', onGone)
				socket.off('error', onGone)
				signal.removeEventListener('abort', onGone)
				resolve(outcome)
			}
			const onData = (chunk: Buffer) => {
				const step = responder.push(chunk)
				if (step.kind === 'error') {
					log.debug(
						{ event: 'status', outcome: 'rejected', reason: step.error.code },
						step.error.message
					)
					settle({ state: 'rejected', reason: step.error.code })
					return
				}
				for (const packet of step.packets) socket.write(packet)
				if (step.done) {
					settle({ state: 'responded', reply: 'status' })
					closeAfterFlush(socket, this.settings.handshakeTimeout)
				}
			}
			const onGone = () =>
				settle(
					responder.answered
						? { state: 'responded', reply: 'status' }
						: { state: 'abandoned' }
				)
			// The status exchange gets a fresh handshake-length budget
			const timer = setTimeout(() => {
				settle(
					responder.answered
						? { state: 'responded', reply: 'status' }
						: { state: 'rejected', reason: 'Timeout' }
				)
				socket.destroy()
			}, this.settings.handshakeTimeout)

			if (signal.aborted) {
				onGone()
				return
			}
			socket.on('data', onData)
			socket.once('end', onGone)
			socket.once('error', onGone)
			signal.addEventListener('abort', onGone, { once: true })
			if (pipelined.length > 0) onData(pipelined)
			if (!settled) socket.resume()
		})
	}
}

/** Half-closes after `data` is flushed; destroys if the peer lingers. */
function endWith(socket: Socket, data: Buffer, linger: number): Promise<void> {
	return new Promise(resolve => {
		// Drain whatever else arrives so the peer's FIN is seen
		socket.resume()
		socket.end(data, () => resolve())
		socket.once('close', () => resolve())
		closeAfterFlush(socket, linger)
	})
}

export function describe(outcome: ConnectionOutcome): string {
	switch (outcome.state) {
		case 'rejected':
			return `rejected:${outcome.reason}`
		case 'relayed':
			return `relayed:${outcome.result.reason}`
		case 'responded':
			return `responded:${outcome.reply}`
		case 'abandoned':
			return 'abandoned'
	}
}
