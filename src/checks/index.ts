/**
 * @entry Checks 检查匹配模块
 *
 * 自由文本检查 → 分类（有序规则）→ 分派到对应评估器 → CheckResult
 */

export {
  CLASSIFICATION_RULES,
  classifyCheck,
  extractElementId,
  extractRequestedVersion,
} from './classifyCheck.js'
export {
  matchCheck,
  validateChecks,
  summarizeChecks,
  selectLiveChecks,
  evaluateLiveChecks,
} from './matchCheck.js'
export { EVALUATORS, type Evaluator, type Verdict } from './evaluators/index.js'
