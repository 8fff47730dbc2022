/**
 * @entry Validation 校验模块
 *
 * - validateStatic(): 固定结构断言
 * - validateLive(): 线上页面校验
 * - runPrePublishValidation()/completeValidation()/runValidation(): 编排，永不抛出
 * - formatValidationLog(): 日志契约格式
 */

export { validateStatic, missingFilesResult, REQUIRED_FILES, NO_FILES_ERROR } from './staticValidator.js'
export { validateLive, NO_RESPONSE_STATUS, type LiveValidationOptions } from './liveValidator.js'
export {
  runPrePublishValidation,
  completeValidation,
  runValidation,
  type PrePublishInput,
  type PrePublishReport,
  type ValidationInput,
  type LiveValidationDeps,
  type ValidationOptions,
} from './runValidation.js'
export {
  BANNER,
  STAGE_NAMES,
  formatStageHeader,
  formatCheckLine,
  formatChecksSummary,
  formatStaticSection,
  formatChecksSection,
  formatLiveSection,
  formatCompletion,
  formatValidationLog,
} from './formatReport.js'
