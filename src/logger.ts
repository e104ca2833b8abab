import pino from 'pino'
import type { LogLevel } from './config'
import { bytesAsHex } from './protocol'

export type Logger = pino.Logger

const LEVELS: Record<LogLevel, pino.LevelWithSilent> = {
	none: 'silent',
	connection: 'info',
	verbose: 'debug',
	debug: 'trace'
}

export interface LoggerOptions {
	readonly level: LogLevel
	/** Human-readable output through pino-pretty instead of JSON lines */
	readonly pretty?: boolean
}

export function createLogger(options: LoggerOptions): Logger {
	return pino({
		name: 'portcullis',
		level: LEVELS[options.level],
		transport: options.pretty
			? {
					target: 'pino-pretty',
					options: {
						colorize: true,
						translateTime: 'SYS:standard',
						ignore: 'pid,hostname'
					}
				}
			: undefined,
		formatters: {
			level: label => {
				return { level: label }
			}
		}
	})
}

export const silentLogger: Logger = pino({ level: 'silent' })

/** Hex excerpt of a payload, cut at `log_inspect_buffer_limit` bytes. */
export function inspectBuffer(data: Buffer, limit: number): string {
	return bytesAsHex(data, limit)
}
