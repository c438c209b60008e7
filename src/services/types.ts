/**
 * Job request and result types
 * @module volcengine-video-jobs/services/types
 */

import type { MediaSource } from '../media/index.js';

/**
 * Pipeline stage a job failed in
 */
export type JobStage = 'upload' | 'submission' | 'polling' | 'download';

/**
 * Outcome of a whole job. Configuration and signing problems are thrown
 * instead, since retrying the job cannot fix them.
 */
export type JobResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly stage: JobStage; readonly error: string };

/**
 * A generated video on disk
 */
export interface VideoArtifact {
  /** Remote task ID; absent when the service answered synchronously */
  readonly taskId?: string;
  readonly videoUrl: string;
  readonly path: string;
  readonly bytesWritten: number;
  /** Status checks made before the task finished */
  readonly attempts: number;
}

export const SEEDANCE_MODELS = [
  'doubao-seedance-1-0-pro-250528',
  'doubao-seedance-1-0-lite-i2v-250428',
] as const;

export type SeedanceModel = (typeof SEEDANCE_MODELS)[number];

export const SEEDANCE_RESOLUTIONS = ['480p', '720p', '1080p'] as const;

export type SeedanceResolution = (typeof SEEDANCE_RESOLUTIONS)[number];

export const SEEDANCE_DURATIONS = ['5s', '10s'] as const;

export type SeedanceDuration = (typeof SEEDANCE_DURATIONS)[number];

/**
 * Image-to-video request for the bearer-token service
 */
export interface SeedanceRequest {
  /** First frame */
  image: MediaSource;
  /** Optional last frame */
  endFrame?: MediaSource;
  prompt?: string;
  /** @default "doubao-seedance-1-0-pro-250528" */
  model?: SeedanceModel;
  /** @default "1080p" */
  resolution?: SeedanceResolution;
  /** @default "5s" */
  duration?: SeedanceDuration;
  /** @default false */
  cameraFixed?: boolean;
  /** Negative values leave the seed unset. @default -1 */
  seed?: number;
  /** Tag the frames with `role: "start"` / `role: "end"` */
  frameRoles?: boolean;
  signal?: AbortSignal;
}

export interface SubjectIdentificationRequest {
  image: MediaSource;
  signal?: AbortSignal;
}

export interface SubjectIdentification {
  readonly subjectId: string;
  readonly attempts: number;
}

export interface OmniHumanVideoRequest {
  image: MediaSource;
  audio: MediaSource;
  signal?: AbortSignal;
}
