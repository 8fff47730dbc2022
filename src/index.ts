/**
 * @entry artifact-verifier 库入口
 *
 * - checks: 自由文本检查的分类与评估
 * - validation: 静态 / 线上校验与编排
 * - notify: 回调通知（退避重试状态机）
 * - task: 单任务流程与后台执行器
 * - server: 构建请求接收服务
 */

export * from './types/index.js'
export * from './shared/index.js'
export * from './config/index.js'
export * from './evidence/index.js'
export * from './checks/index.js'
export * from './http/index.js'
export * from './validation/index.js'
export * from './notify/index.js'
export * from './task/index.js'
export * from './server/index.js'
