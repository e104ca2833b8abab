import { connect } from 'net'
import type { Socket } from 'net'
import { DialError } from './errors'
import type { RelayTermination } from './errors'
import { formatOrigin, type OriginAddress } from './router'

export interface DialOptions {
	readonly timeout: number
	readonly signal?: AbortSignal
}

/** Opens a TCP connection to the origin, bounded by `timeout` and `signal`. */
export function dialOrigin(
	origin: OriginAddress,
	options: DialOptions
): Promise<Socket> {
	const label = formatOrigin(origin)
	return new Promise((resolve, reject) => {
		if (options.signal?.aborted) {
			reject(new DialError(label, 'aborted'))
			return
		}

		const socket = connect({ host: origin.host, port: origin.port })
		socket.setNoDelay(true)

		const fail = (error: DialError) => {
			cleanup()
			socket.destroy()
			reject(error)
		}
		const onConnect = () => {
			cleanup()
			resolve(socket)
		}
		const onError = (err: Error) => fail(new DialError(label, 'refused', err))
		const onAbort = () => fail(new DialError(label, 'aborted'))
		const timer = setTimeout(
			() => fail(new DialError(label, 'timeout')),
			options.timeout
		)

		function cleanup() {
			clearTimeout(timer)
			socket.off('connect', onConnect)
			socket.off('error', onError)
			options.signal?.removeEventListener('abort', onAbort)
		}

		socket.once('connect', onConnect)
		socket.once('error', onError)
		options.signal?.addEventListener('abort', onAbort, { once: true })
	})
}

export interface RelayOptions {
	readonly client: Socket
	readonly backend: Socket
	/** Bytes already taken from the client, replayed to the backend first */
	readonly initial: ReadonlyArray<Buffer>
	/** Pending client → backend bytes before the client is paused */
	readonly clientBufferSize: number
	/** Pending backend → client bytes before the backend is paused */
	readonly backendBufferSize: number
	/** How long a half-closed socket may take to flush before it is destroyed */
	readonly linger: number
	readonly signal?: AbortSignal
}

export interface RelayResult {
	readonly reason: RelayTermination
	readonly bytesUp: number
	readonly bytesDown: number
	/** Set when a socket failed while its peer was still open */
	readonly error?: Error
}

/**
 * Byte-transparent pipe between client and backend. Either side ending,
 * failing or the signal aborting tears down both; the promise never rejects.
 */
export function relay(options: RelayOptions): Promise<RelayResult> {
	const { client, backend, signal } = options
	let bytesUp = 0
	let bytesDown = 0

	return new Promise(resolve => {
		let finished = false

		const pump = (
			source: Socket,
			target: Socket,
			limit: number,
			count: (n: number) => void
		) => {
			return (chunk: Buffer) => {
				count(chunk.length)
				target.write(chunk)
				if (target.writableLength >= limit && !source.isPaused()) {
					source.pause()
					target.once('drain', () => {
						if (!finished) source.resume()
					})
				}
			}
		}

		const onUpstream = pump(
			client,
			backend,
			options.clientBufferSize,
			n => (bytesUp += n)
		)
		const onDownstream = pump(
			backend,
			client,
			options.backendBufferSize,
			n => (bytesDown += n)
		)
		const onClientClosed = () => finish('client-closed')
		const onBackendClosed = () => finish('backend-closed')
		// A read-side error is an ordinary hang-up; a write failure towards a
		// peer that is still readable is not.
		const onClientError = (err: Error) =>
			finish('client-error', backend.readable ? err : undefined)
		const onBackendError = (err: Error) =>
			finish('backend-error', client.readable ? err : undefined)
		const onAbort = () => finish('aborted')

		const detach = () => {
			client.off('data', onUpstream)
			client.off('end', onClientClosed)
			client.off('close', onClientClosed)
			client.off('error', onClientError)
			backend.off('data', onDownstream)
			backend.off('end', onBackendClosed)
			backend.off('close', onBackendClosed)
			backend.off('error', onBackendError)
			signal?.removeEventListener('abort', onAbort)
		}

		function finish(reason: RelayTermination, error?: Error) {
			if (finished) return
			finished = true
			detach()
			// Both sockets are being torn down; later errors carry no news
			client.on('error', ignore)
			backend.on('error', ignore)

			if (error || reason === 'aborted') {
				client.destroy()
				backend.destroy()
			} else {
				// Flush what the closing side sent last (e.g. a kick message)
				closeAfterFlush(client, options.linger)
				closeAfterFlush(backend, options.linger)
			}
			resolve({ reason, bytesUp, bytesDown, error })
		}

		if (signal?.aborted) {
			finish('aborted')
			return
		}

		client.on('data', onUpstream)
		client.on('end', onClientClosed)
		client.on('close', onClientClosed)
		client.on('error', onClientError)
		backend.on('data', onDownstream)
		backend.on('end', onBackendClosed)
		backend.on('close', onBackendClosed)
		backend.on('error', onBackendError)
		signal?.addEventListener('abort', onAbort, { once: true })

		for (const chunk of options.initial) {
			if (chunk.length === 0) continue
			bytesUp += chunk.length
			backend.write(chunk)
		}
		// The supervisor pauses the client while the origin is being dialed
		client.resume()
	})
}

/**
 * Half-closes `socket` and destroys it once flushed, or after `linger` ms
 * if the peer stops reading.
 */
export function closeAfterFlush(socket: Socket, linger: number): void {
	if (socket.destroyed) return
	const timer = setTimeout(() => socket.destroy(), linger)
	timer.unref()
	socket.once('close', () => clearTimeout(timer))
	if (socket.writableEnded) return
	socket.end(() => socket.destroy())
}

/** Resolves once `socket` has emitted `close`. */
export function whenClosed(socket: Socket): Promise<void> {
	return new Promise(resolve => {
		if (socket.closed) resolve()
		else socket.once('close', () => resolve())
	})
}

function ignore(): void {}
