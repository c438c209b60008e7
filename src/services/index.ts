/**
 * Job services
 * @module volcengine-video-jobs/services
 */

export type {
  JobStage,
  JobResult,
  VideoArtifact,
  SeedanceModel,
  SeedanceResolution,
  SeedanceDuration,
  SeedanceRequest,
  SubjectIdentificationRequest,
  SubjectIdentification,
  OmniHumanVideoRequest,
} from './types.js';

export { SEEDANCE_MODELS, SEEDANCE_RESOLUTIONS, SEEDANCE_DURATIONS } from './types.js';

export { BaseService, describePollOutcome, type ServiceContext, type UnsuccessfulPoll } from './base.js';

export {
  SeedanceService,
  parseSeedanceParams,
  formatSeedancePrompt,
  buildSeedanceContent,
  type SeedanceParams,
} from './seedance.js';

export { OmniHumanService, extractSubjectId, extractVideoUrl } from './omnihuman.js';
