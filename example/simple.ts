/**
 * 简单代理示例
 *
 * 两个虚拟主机：一个转发到本地后端，一个只回应 MOTD 并拒绝登录。
 * 演示连接事件、指标监控与优雅关闭。
 *
 * 运行方式：
 * ```bash
 * npm run build && node dist/example/simple.js
 * ```
 */

import { Portcullis, type Connection, type ConnectionInfo } from '../src/portcullis'
import { createLogger } from '../src/logger'

// 配置
const PROXY_HOST = '0.0.0.0'
const PROXY_PORT = 25565
const BACKEND = '127.0.0.1:25566'

async function main() {
	console.log('🌍 启动 Portcullis 简单代理示例')
	console.log('='.repeat(50))

	const proxy = Portcullis.createProxy(
		{
			settings: {
				host: PROXY_HOST,
				listen: PROXY_PORT,
				ratelimit: 10,
				concurrent_limit: 3
			},
			endpoints: [
				...Portcullis.simpleRoutes({ 'play.example.com': BACKEND }),
				{
					hostname: 'maintenance.example.com',
					motd: '§e§l维护中 §r\n§7请稍后再来',
					message: '§c服务器维护中，请稍后重新连接'
				}
			]
		},
		{ logger: createLogger({ level: 'verbose', pretty: true }) }
	)

	proxy.setEventHandlers({
		onConnectionOpened: (connection: Connection) => {
			console.log(`✅ [连接建立] ${connection.id} ${connection.ip}`)
		},

		onConnectionClosed: (connection: Connection, info: ConnectionInfo, outcome) => {
			console.log(`❌ [连接关闭] ${info.id}`)
			console.log(`   IP: ${info.ip}`)
			console.log(`   主机: ${info.host ?? '(无握手)'}`)
			console.log(`   持续时间: ${connection.getDurationString()}`)
			if (outcome.state === 'relayed') {
				const { bytesUp, bytesDown } = outcome.result
				console.log(
					`   流量: ↑${(bytesUp / 1024).toFixed(1)}KB ↓${(bytesDown / 1024).toFixed(1)}KB`
				)
			} else {
				console.log(`   结果: ${outcome.state}`)
			}
		},

		onListenerStarted: listener => {
			console.log(`🚀 [监听器启动] ${listener.config.host}:${listener.config.port} (ID: ${listener.id})`)
		},

		onListenerStopped: listener => {
			console.log(`🛑 [监听器停止] ID: ${listener.id}`)
		},

		onError: (error: Error) => {
			console.error(`🚨 [代理错误] ${error.message}`)
		}
	})

	await proxy.listen()
	console.log(`🎯 play.example.com 将转发到: ${BACKEND}`)

	// ===== 监控循环 =====
	const monitorInterval = setInterval(() => {
		const metrics = proxy.getMetrics()
		console.log('\n📊 === 服务器状态 ===')
		console.log(
			`连接数: ${metrics.connections.active} | 累计: ${metrics.connections.total} | 拒绝: ${metrics.connections.rejected}`
		)
		console.log(
			`总流量: ↑${(metrics.traffic.totalBytesReceived / 1024 / 1024).toFixed(2)}MB ↓${(metrics.traffic.totalBytesSent / 1024 / 1024).toFixed(2)}MB`
		)
		console.log(
			`路由缓存: ${metrics.routes.cached}/${metrics.routes.endpoints} 命中 ${metrics.routes.hits}`
		)

		for (const conn of proxy.getConnections()) {
			console.log(`  [${conn.id}] ${conn.ip} -> ${conn.host ?? '?'} (${conn.getDurationString()})`)
		}
	}, 15000)

	console.log('🎮 代理服务器已就绪！按 Ctrl+C 停止服务器')

	// ===== 优雅关闭 =====
	process.on('SIGINT', () => {
		console.log('\n🛑 正在关闭代理...')
		clearInterval(monitorInterval)
		proxy
			.shutdown()
			.then(() => {
				console.log('✅ 代理已完全关闭')
				process.exit(0)
			})
			.catch(err => {
				console.error('❌ 关闭失败:', err)
				process.exit(1)
			})
	})
}

if (require.main === module) {
	main().catch(error => {
		console.error('❌ 启动失败:', error)
		process.exit(1)
	})
}

export { main }
