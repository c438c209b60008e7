/**
 * Remote task lifecycle: submission and polling
 * @module volcengine-video-jobs/tasks
 */

export {
  MISSING_RESULT,
  TaskStatus,
  type StatusTable,
  type TaskHandle,
  type PendingTaskHandle,
  type FailureDetails,
  type PollOutcome,
  type TaskFamily,
} from './types.js';

export {
  VISUAL_STATUS_TABLE,
  ARK_STATUS_TABLE,
  normalizeStatus,
  isTerminalStatus,
  readPath,
} from './status.js';

export {
  VisualResponseSchema,
  ArkTaskResponseSchema,
  type VisualResponse,
  type ArkTaskResponse,
  parseVisualResponse,
  parseArkTaskResponse,
  buildActionUrl,
  arkTasksUrl,
  isSubjectDetected,
  createVisualFamily,
  createSubjectFamily,
  createVideoFamily,
  createArkFamily,
  type VisualFamilyOptions,
  OMNIHUMAN_SUBJECT_REQ_KEY,
  OMNIHUMAN_VIDEO_REQ_KEY,
} from './families.js';

export {
  SignedTaskSubmitter,
  TokenTaskSubmitter,
  type SignedTaskSubmitterOptions,
  type TokenTaskSubmitterOptions,
  type ResolvedResultExtractor,
} from './submitter.js';

export { TaskPoller, type PollOptions, type TaskPollerOptions } from './poller.js';
