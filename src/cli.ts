#!/usr/bin/env node
/**
 * Portcullis CLI
 * Loads a YAML config, starts one listener and keeps running until SIGINT/SIGTERM.
 *
 * config.yaml example:
 *
 *   settings:
 *     listen: 25565
 *     handshake_timeout: 5000
 *     ratelimit: 10
 *   endpoints:
 *     - hostname: server1.example.com
 *       origin: 192.168.0.100:25565
 *     - hostname: server2.example.com
 *       motd: Epic server 2
 *       message: Sorry this server is not available
 *   blocklist:
 *     - 203.0.113.7
 */

import yargs from 'yargs/yargs'
import { hideBin } from 'yargs/helpers'
import { LOG_LEVELS, loadConfig, type Config, type LogLevel } from './config'
import { createLogger } from './logger'
import { PortcullisProxy } from './portcullis'
import { formatOrigin } from './router'

// ==== Color helpers (ANSI) ====
const colors = {
	gray: (s: string) => `\x1b[90m${s}\x1b[0m`,
	red: (s: string) => `\x1b[31m${s}\x1b[0m`,
	green: (s: string) => `\x1b[32m${s}\x1b[0m`,
	yellow: (s: string) => `\x1b[33m${s}\x1b[0m`,
	bold: (s: string) => `\x1b[1m${s}\x1b[0m`
}

interface CliOverrides {
	listen?: number
	host?: string
	log?: LogLevel
}

export function applyOverrides(config: Config, overrides: CliOverrides): Config {
	return {
		...config,
		settings: {
			...config.settings,
			listen: overrides.listen ?? config.settings.listen,
			host: overrides.host ?? config.settings.host,
			log: overrides.log ?? config.settings.log
		}
	}
}

async function main() {
	const argv = await yargs(hideBin(process.argv))
		.scriptName('portcullis')
		.usage('$0 [options]')
		.option('config', {
			alias: 'c',
			type: 'string',
			default: './config.yaml',
			desc: 'YAML config file'
		})
		.option('listen', {
			alias: 'l',
			type: 'number',
			desc: 'TCP port to listen on (overrides settings.listen)'
		})
		.option('host', {
			type: 'string',
			desc: 'Bind address (overrides settings.host)'
		})
		.option('log', {
			type: 'string',
			choices: LOG_LEVELS,
			desc: 'Log level (overrides settings.log)'
		})
		.option('metrics-interval', {
			alias: 'm',
			type: 'number',
			default: 0,
			desc: 'Metrics print interval seconds (0=off, default 0)'
		})
		.option('quiet', {
			alias: 'q',
			type: 'boolean',
			desc: 'Quiet mode (no periodic metrics)'
		})
		.help()
		.alias('h', 'help')
		.example('$0 -c ./config.yaml -l 25565', 'Start with a config file')
		.strict()
		.parse()

	const loaded = await loadConfig(argv.config)
	const config = applyOverrides(loaded, {
		listen: argv.listen,
		host: argv.host,
		log: LOG_LEVELS.find(level => level === argv.log)
	})

	const logger = createLogger({
		level: config.settings.log,
		pretty: process.stdout.isTTY
	})
	const proxy = new PortcullisProxy(config, { logger })

	for (const endpoint of proxy.routes.endpoints) {
		const { action } = endpoint
		const target =
			action.kind === 'proxy' ? formatOrigin(action.origin) : '(status/disconnect)'
		console.log(colors.gray(`[route] ${endpoint.hostname} -> ${target}`))
	}
	if (config.blocklist.length > 0) {
		console.log(colors.gray(`[guard] ${config.blocklist.length} blocked address(es)`))
	}

	const listener = await proxy.listen()
	const bound = listener.address()
	console.log(colors.green(`✔ Listening ${listener.config.host}:${bound.port}`))

	let metricsTimer: ReturnType<typeof setInterval> | undefined
	const intervalSec = argv['metrics-interval']
	if (!argv.quiet && intervalSec > 0) {
		metricsTimer = setInterval(() => {
			const m = proxy.getMetrics()
			console.log(
				colors.bold(
					colors.gray(
						`[metrics] active=${m.connections.active} total=${m.connections.total} rejected=${m.connections.rejected} totalBytesSent=${m.traffic.totalBytesSent} totalBytesReceived=${m.traffic.totalBytesReceived}`
					)
				)
			)
		}, intervalSec * 1000)
	}

	const shutdown = async () => {
		console.log(colors.yellow('\nShutting down...'))
		if (metricsTimer) clearInterval(metricsTimer)
		await proxy.shutdown()
		process.exit(0)
	}
	const onSignal = () => {
		shutdown().catch(err => {
			console.error(colors.red(`Shutdown failed: ${err}`))
			process.exit(1)
		})
	}
	process.on('SIGINT', onSignal)
	process.on('SIGTERM', onSignal)
}

if (require.main === module) {
	main().catch(err => {
		console.error(
			colors.red(`Failed to start: ${err instanceof Error ? err.message : err}`)
		)
		process.exit(1)
	})
}
