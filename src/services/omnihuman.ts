/**
 * OmniHuman subject identification and video generation on the signed
 * service
 * @module volcengine-video-jobs/services/omnihuman
 */

import { v4 as uuidv4 } from 'uuid';
import { requireKeyPair } from '../auth/index.js';
import { RequestSigner } from '../signing/index.js';
import {
  MISSING_RESULT,
  OMNIHUMAN_SUBJECT_REQ_KEY,
  OMNIHUMAN_VIDEO_REQ_KEY,
  SignedTaskSubmitter,
  createSubjectFamily,
  createVideoFamily,
  parseVisualResponse,
  type PollOutcome,
  type TaskFamily,
  type TaskHandle,
} from '../tasks/index.js';
import { BaseService } from './base.js';
import type {
  JobResult,
  OmniHumanVideoRequest,
  SubjectIdentification,
  SubjectIdentificationRequest,
  VideoArtifact,
} from './types.js';

/**
 * Synchronous `subject_id`, at the top level or under `data`
 */
export function extractSubjectId(body: unknown): string | undefined {
  const response = parseVisualResponse(body);
  return response?.subject_id || response?.data?.subject_id || undefined;
}

/**
 * Synchronous `video_url`, at the top level or under `data`
 */
export function extractVideoUrl(body: unknown): string | undefined {
  const response = parseVisualResponse(body);
  return response?.video_url || response?.data?.video_url || undefined;
}

interface SignedTask<T> {
  readonly signer: RequestSigner;
  readonly payload: Record<string, unknown>;
  readonly extractResolved: (body: unknown) => T | undefined;
  readonly family: TaskFamily<T>;
  /** Error reported when the task succeeds without a usable result */
  readonly missingResult?: string;
}

interface CompletedTask<T> {
  readonly taskId?: string;
  readonly result: T;
  readonly attempts: number;
}

export class OmniHumanService extends BaseService {
  private createSigner(): RequestSigner {
    const { visual } = this.context.config;
    return new RequestSigner({
      credentials: requireKeyPair(this.context.credentials),
      region: visual.region,
      service: visual.service,
      clock: this.context.clock,
    });
  }

  /**
   * Identify the human subject in an image. The returned subject ID is the
   * task ID of the identification task.
   *
   * @throws {ConfigurationError} If the key pair is missing
   * @throws {SigningError} If a request cannot be signed
   */
  async identifySubject(request: SubjectIdentificationRequest): Promise<JobResult<SubjectIdentification>> {
    const signer = this.createSigner();

    const image = await this.resolveMedia(request.image, 'omnihuman_subject');
    if (!image.ok) return image;

    const completed = await this.runTask(
      {
        signer,
        payload: { req_key: OMNIHUMAN_SUBJECT_REQ_KEY, image_url: image.value },
        extractResolved: extractSubjectId,
        family: createSubjectFamily(this.context.config.visual, signer),
        missingResult: 'No human subject detected in the image',
      },
      request.signal
    );
    if (!completed.ok) return completed;

    const { result: subjectId, attempts } = completed.value;
    this.logger.info('Subject identified', { subjectId });
    return { ok: true, value: { subjectId, attempts } };
  }

  /**
   * Generate a talking-head video from a subject image and an audio track,
   * downloaded to `{outputDir}/omnihuman/omnihuman_video_{uuid}.mp4`.
   *
   * @throws {ConfigurationError} If the key pair is missing
   * @throws {SigningError} If a request cannot be signed
   */
  async generateVideo(request: OmniHumanVideoRequest): Promise<JobResult<VideoArtifact>> {
    const signer = this.createSigner();
    const { signal } = request;

    const image = await this.resolveMedia(request.image, 'omnihuman_subject');
    if (!image.ok) return image;

    const audio = await this.resolveMedia(request.audio, 'omnihuman_audio');
    if (!audio.ok) return audio;

    const completed = await this.runTask(
      {
        signer,
        payload: { req_key: OMNIHUMAN_VIDEO_REQ_KEY, image_url: image.value, audio_url: audio.value },
        extractResolved: extractVideoUrl,
        family: createVideoFamily(this.context.config.visual, signer),
      },
      signal
    );
    if (!completed.ok) return completed;

    const { taskId, result: videoUrl, attempts } = completed.value;
    const saved = await this.saveVideo(videoUrl, 'omnihuman', `omnihuman_video_${uuidv4()}.mp4`, signal);
    if (!saved.ok) return saved;

    return {
      ok: true,
      value: { taskId, videoUrl, attempts, ...saved.value },
    };
  }

  /**
   * Submit a signed task and follow it to a result
   */
  private async runTask<T>(task: SignedTask<T>, signal?: AbortSignal): Promise<JobResult<CompletedTask<T>>> {
    const submitter = new SignedTaskSubmitter({
      transport: this.context.transport,
      signer: task.signer,
      config: this.context.config.visual,
      logger: this.logger,
    });

    let handle: TaskHandle<T>;
    try {
      handle = await submitter.submit(task.payload, task.extractResolved, signal);
    } catch (error) {
      return this.fail('submission', error);
    }

    const taskId = handle.kind === 'pending' ? handle.taskId : undefined;

    let outcome: PollOutcome<T>;
    try {
      outcome = await this.context.poller.awaitHandle(task.family, handle, { signal });
    } catch (error) {
      return this.fail('polling', error);
    }

    if (outcome.outcome === 'failed' && outcome.code === MISSING_RESULT && task.missingResult) {
      this.logger.error(task.missingResult, { taskId });
      return { ok: false, stage: 'polling', error: task.missingResult };
    }
    if (outcome.outcome !== 'succeeded') {
      return this.pollFailure(taskId ?? 'unknown', outcome);
    }

    return { ok: true, value: { taskId, result: outcome.result, attempts: outcome.attempts } };
  }
}
