/**
 * @entry Server 模块
 *
 * - createApp(ctx): Express app（/health, /api/build）
 * - startServer(options): 读取配置并监听
 */

export { createApp, startServer, SERVER_VERSION, type ServerOptions, type RunningServer } from './createServer.js'
export { registerRoutes, type RouteContext } from './routes.js'
export { buildRequestSchema, toBuildTask, type BuildRequest } from './buildRequest.js'
