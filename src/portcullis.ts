// Portcullis: Minecraft 虚拟主机代理核心
import { createServer } from 'net'
import type { AddressInfo, Server, Socket } from 'net'
import { defineConfig, type Config, type ConfigInput } from './config'
import { AbuseGuard, type GuardStats } from './guard'
import { createLogger, type Logger } from './logger'
import { RouteTable, type RouteStats } from './router'
import {
	ConnectionSupervisor,
	type ConnectionContext,
	type ConnectionOutcome
} from './supervisor'

// ===== 核心类型定义 =====
export interface ListenerConfig {
	readonly host: string
	readonly port: number
}

export interface GlobalMetrics {
	readonly connections: {
		readonly total: number
		readonly active: number
		readonly relayed: number
		readonly responded: number
		readonly rejected: number
	}
	readonly traffic: {
		readonly totalBytesSent: number
		readonly totalBytesReceived: number
	}
	readonly guard: GuardStats
	readonly routes: RouteStats
}

// ===== 连接信息接口 =====
export interface ConnectionInfo {
	readonly id: string
	readonly ip: string
	readonly host: string | undefined
	readonly protocol: number | undefined
	readonly startAt: Date
}

export type ConnectionOpenedHandler = (connection: Connection) => void
export type ConnectionClosedHandler = (
	connection: Connection,
	info: ConnectionInfo,
	outcome: ConnectionOutcome
) => void

// ===== 连接类 =====
export class Connection {
	readonly id: string
	readonly ip: string
	readonly startAt: Date

	constructor(private readonly context: ConnectionContext) {
		this.id = context.id
		this.ip = context.ip
		this.startAt = new Date(context.acceptedAt)
	}

	/** Virtual host from the handshake, once it has arrived */
	get host(): string | undefined {
		return this.context.handshake?.serverAddress
	}

	get protocol(): number | undefined {
		return this.context.handshake?.protocolVersion
	}

	get state(): ConnectionContext['state'] {
		return this.context.state
	}

	info(): ConnectionInfo {
		return {
			id: this.id,
			ip: this.ip,
			host: this.host,
			protocol: this.protocol,
			startAt: this.startAt
		}
	}

	disconnect(): void {
		this.context.abort()
	}

	isActive(): boolean {
		return this.context.state !== 'closed'
	}

	getDuration(): number {
		return this.context.getDuration()
	}

	getDurationString(): string {
		const duration = this.getDuration()
		const seconds = Math.floor(duration / 1000)
		const minutes = Math.floor(seconds / 60)
		const hours = Math.floor(minutes / 60)

		if (hours > 0) {
			return `${hours}h ${minutes % 60}m ${seconds % 60}s`
		} else if (minutes > 0) {
			return `${minutes}m ${seconds % 60}s`
		} else {
			return `${seconds}s`
		}
	}
}

// ===== 监听器类 =====
export class Listener {
	constructor(
		private readonly proxy: PortcullisProxy,
		readonly id: number,
		readonly config: ListenerConfig,
		readonly server: Server
	) {}

	/** Bound address; differs from `config.port` when port 0 was asked for */
	address(): AddressInfo {
		const address = this.server.address()
		if (address === null || typeof address === 'string') {
			throw new Error(`Listener ${this.id} is not bound to a TCP port`)
		}
		return address
	}

	async stop(): Promise<void> {
		await this.proxy.stopListener(this.id)
	}

	isListening(): boolean {
		return this.server.listening
	}
}

// ===== 事件处理器配置 =====
export interface EventHandlers {
	onConnectionOpened?: ConnectionOpenedHandler
	onConnectionClosed?: ConnectionClosedHandler
	onListenerStarted?: (listener: Listener) => void
	onListenerStopped?: (listener: Listener) => void
	onError?: (error: Error) => void
}

export interface ProxyOptions {
	readonly logger?: Logger
	/** Clock for the abuse guard's sliding window */
	readonly now?: () => number
}

// ===== 主代理类 =====
export class PortcullisProxy {
	readonly config: Config
	readonly guard: AbuseGuard
	readonly routes: RouteTable
	readonly logger: Logger

	private readonly supervisor: ConnectionSupervisor
	private readonly connections = new Map<string, Connection>()
	private readonly listeners = new Map<number, Listener>()
	private readonly pending = new Set<Promise<ConnectionOutcome>>()
	private eventHandlers: EventHandlers = {}
	private nextListenerId = 1
	private sweepInterval: ReturnType<typeof setInterval> | null = null
	private shutdownInProgress = false

	private totals = {
		accepted: 0,
		relayed: 0,
		responded: 0,
		rejected: 0,
		bytesSent: 0,
		bytesReceived: 0
	}

	constructor(config: Config, options: ProxyOptions = {}) {
		this.config = config
		const { settings } = config
		this.logger = options.logger ?? createLogger({ level: settings.log })
		this.guard = new AbuseGuard(
			{
				window: settings.ratelimitWindow,
				rateLimit: settings.ratelimit,
				concurrentLimit: settings.concurrentLimit,
				clientsLimit: settings.clientsLimit
			},
			config.blocklist,
			options.now
		)
		this.routes = new RouteTable(config.endpoints, settings.cacheSize)
		this.supervisor = new ConnectionSupervisor(
			settings,
			this.guard,
			this.routes,
			this.logger,
			{
				onOpen: context => this.handleOpen(context),
				onClose: (context, outcome) => this.handleClose(context, outcome)
			}
		)
	}

	// ===== 配置方法 =====
	setEventHandlers(handlers: EventHandlers): this {
		this.eventHandlers = handlers
		return this
	}

	// ===== 监听器管理 =====
	listen(config: Partial<ListenerConfig> = {}): Promise<Listener> {
		const listenerConfig: ListenerConfig = {
			host: config.host ?? this.config.settings.host,
			port: config.port ?? this.config.settings.listen
		}
		const server = createServer({ noDelay: true }, socket => this.accept(socket))

		return new Promise((resolve, reject) => {
			server.once('error', reject)
			server.listen(listenerConfig.port, listenerConfig.host, () => {
				server.off('error', reject)
				server.on('error', err => this.reportError(err))

				const listener = new Listener(
					this,
					this.nextListenerId++,
					listenerConfig,
					server
				)
				this.listeners.set(listener.id, listener)
				this.startSweeping()
				this.logger.info(
					{ event: 'listen', host: listenerConfig.host, port: listener.address().port },
					'listening'
				)
				this.eventHandlers.onListenerStarted?.(listener)
				resolve(listener)
			})
		})
	}

	getListeners(): ReadonlyArray<Listener> {
		return Array.from(this.listeners.values())
	}

	async stopListener(listenerId: number): Promise<void> {
		const listener = this.listeners.get(listenerId)
		if (!listener) return
		this.listeners.delete(listenerId)
		await new Promise<void>(resolve => listener.server.close(() => resolve()))
		if (this.listeners.size === 0) this.stopSweeping()
		this.eventHandlers.onListenerStopped?.(listener)
	}

	async stopAllListeners(): Promise<void> {
		await Promise.all(
			Array.from(this.listeners.keys()).map(id => this.stopListener(id))
		)
	}

	// ===== 连接管理 =====
	getConnections(): ReadonlyArray<Connection> {
		return Array.from(this.connections.values())
	}

	getConnection(id: string): Connection | undefined {
		return this.connections.get(id)
	}

	getConnectionsByIp(ip: string): ReadonlyArray<Connection> {
		return this.getConnections().filter(conn => conn.ip === ip)
	}

	getConnectionsByHost(host: string): ReadonlyArray<Connection> {
		return this.getConnections().filter(conn => conn.host === host)
	}

	disconnectAll(): number {
		const connections = this.getConnections()
		connections.forEach(conn => conn.disconnect())
		return connections.length
	}

	disconnectIp(ip: string): number {
		const connections = this.getConnectionsByIp(ip)
		connections.forEach(conn => conn.disconnect())
		return connections.length
	}

	getConnectionCount(): number {
		return this.connections.size
	}

	// ===== 统计信息 =====
	getMetrics(): GlobalMetrics {
		return {
			connections: {
				total: this.totals.accepted,
				active: this.connections.size,
				relayed: this.totals.relayed,
				responded: this.totals.responded,
				rejected: this.totals.rejected
			},
			traffic: {
				totalBytesSent: this.totals.bytesSent,
				totalBytesReceived: this.totals.bytesReceived
			},
			guard: this.guard.stats(),
			routes: this.routes.stats()
		}
	}

	// ===== 生命周期 =====
	async shutdown(): Promise<void> {
		if (this.shutdownInProgress) {
			return
		}
		this.shutdownInProgress = true

		const stopping = this.stopAllListeners()
		this.disconnectAll()
		await stopping
		await Promise.all(this.pending)
		this.stopSweeping()

		this.shutdownInProgress = false
	}

	/** Settles once every connection accepted so far has been handled. */
	async idle(): Promise<void> {
		while (this.pending.size > 0) {
			await Promise.all(this.pending)
		}
	}

	// ===== 内部方法 =====
	private accept(socket: Socket): void {
		this.totals.accepted++
		const task = this.supervisor.handle(socket)
		this.pending.add(task)
		task
			.then(outcome => this.record(outcome))
			.catch(err => this.reportError(err))
			.finally(() => this.pending.delete(task))
	}

	private record(outcome: ConnectionOutcome): void {
		switch (outcome.state) {
			case 'relayed':
				this.totals.relayed++
				this.totals.bytesReceived += outcome.result.bytesUp
				this.totals.bytesSent += outcome.result.bytesDown
				break
			case 'responded':
				this.totals.responded++
				break
			case 'rejected':
				this.totals.rejected++
				break
			case 'abandoned':
				break
		}
	}

	private handleOpen(context: ConnectionContext): void {
		const connection = new Connection(context)
		this.connections.set(connection.id, connection)
		this.eventHandlers.onConnectionOpened?.(connection)
	}

	private handleClose(
		context: ConnectionContext,
		outcome: ConnectionOutcome
	): void {
		const connection = this.connections.get(context.id)
		if (!connection) return
		this.connections.delete(context.id)
		this.eventHandlers.onConnectionClosed?.(connection, connection.info(), outcome)
	}

	private reportError(err: unknown): void {
		const error = err instanceof Error ? err : new Error(String(err))
		this.logger.error({ err: error }, 'proxy error')
		this.eventHandlers.onError?.(error)
	}

	private startSweeping(): void {
		if (this.sweepInterval) {
			return
		}
		this.sweepInterval = setInterval(() => {
			this.guard.sweep()
		}, this.config.settings.ratelimitWindow)
		this.sweepInterval.unref()
	}

	private stopSweeping(): void {
		if (this.sweepInterval) {
			clearInterval(this.sweepInterval)
			this.sweepInterval = null
		}
	}
}

// ===== 工具函数命名空间 =====
export namespace Portcullis {
	export function createProxy(
		config: ConfigInput,
		options?: ProxyOptions
	): PortcullisProxy {
		return new PortcullisProxy(defineConfig(config), options)
	}

	// 便利工厂函数：hostname -> origin 的最简配置
	export function simpleRoutes(
		routes: Record<string, string>
	): NonNullable<ConfigInput['endpoints']> {
		return Object.entries(routes).map(([hostname, origin]) => ({
			hostname,
			origin
		}))
	}
}

export { defineConfig, loadConfig, parseConfig } from './config'
export type { Config, ConfigInput, ProxySettings } from './config'
export type { ConnectionOutcome } from './supervisor'
export type { Endpoint, EndpointAction, OriginAddress } from './router'
