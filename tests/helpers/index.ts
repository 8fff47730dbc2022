/**
 * @entry 测试辅助工具统一导出
 *
 * - artifact: 示例产物、任务、部署信息
 * - fakes: HttpClient / Scheduler / Generator / Publisher 替身
 */

export {
  BOOTSTRAP_URL,
  INDEX_HTML,
  LICENSE,
  README,
  SAMPLE_CHECKS,
  SAMPLE_DEPLOYMENT,
  sampleArtifact,
  sampleTask,
  withoutFile,
} from './artifact.js'

export {
  FakeHttpClient,
  FakeScheduler,
  postStatus,
  postFailure,
  staticGenerator,
  failingGenerator,
  staticPublisher,
  failingPublisher,
  createRecordingLogger,
  createDeferred,
  abortableScheduler,
  type Deferred,
  type RecordingLogger,
  type RecordedPost,
  type PostReply,
  type RecordingPublisher,
} from './fakes.js'
