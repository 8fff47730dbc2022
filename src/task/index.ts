/**
 * @entry Task 任务处理模块
 *
 * - processTask(): 单任务全流程（生成 → 校验 → 发布 → 线上校验 → 通知）
 * - createTaskRunner(): 后台并发执行，支持取消
 */

export {
  processTask,
  type TaskDeps,
  type TaskSettings,
  type TaskOutcome,
} from './processTask.js'
export {
  createTaskRunner,
  type TaskRunner,
  type TaskRunnerOptions,
  type RunnerStatus,
} from './createTaskRunner.js'
export { settingsFromConfig } from './settings.js'
