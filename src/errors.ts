// ===== Error taxonomy =====
// None of these reach the client: every one of them ends in a closed socket.

export type AbuseRejection =
	| 'Blocked'
	| 'GlobalLimit'
	| 'ConcurrencyLimit'
	| 'RateLimited'

export type ParseErrorCode =
	| 'MalformedVarInt'
	| 'MalformedPacket'
	| 'StringTooLong'
	| 'UnknownNextState'
	| 'BufferExceeded'
	| 'PacketBudgetExceeded'
	| 'Timeout'
	| 'LegacyPing'

export class ParseError extends Error {
	constructor(
		public readonly code: ParseErrorCode,
		detail?: string
	) {
		super(detail ? `${code}: ${detail}` : code)
		this.name = 'ParseError'
	}
}

export class DialError extends Error {
	constructor(
		public readonly origin: string,
		public readonly reason: 'timeout' | 'refused' | 'aborted',
		cause?: unknown
	) {
		super(`Unable to reach origin ${origin}: ${reason}`, { cause })
		this.name = 'DialError'
	}
}

export class ConfigError extends Error {
	constructor(message: string) {
		super(`Invalid configuration: ${message}`)
		this.name = 'ConfigError'
	}
}

// Why a relay ended; only write failures are worth more than a debug line
export type RelayTermination =
	| 'client-closed'
	| 'backend-closed'
	| 'client-error'
	| 'backend-error'
	| 'aborted'
