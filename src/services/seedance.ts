/**
 * Seedance image-to-video jobs on the bearer-token service
 * @module volcengine-video-jobs/services/seedance
 */

import { z } from 'zod';
import { requireBearer } from '../auth/index.js';
import { ConfigurationError } from '../errors/index.js';
import { TokenTaskSubmitter, createArkFamily } from '../tasks/index.js';
import { BaseService } from './base.js';
import {
  SEEDANCE_DURATIONS,
  SEEDANCE_MODELS,
  SEEDANCE_RESOLUTIONS,
  type JobResult,
  type SeedanceRequest,
  type VideoArtifact,
} from './types.js';

/**
 * Zod schema for the generation parameters, with defaults applied.
 */
const SeedanceParamsSchema = z.object({
  model: z.enum(SEEDANCE_MODELS).default('doubao-seedance-1-0-pro-250528'),
  prompt: z.string().default(''),
  resolution: z.enum(SEEDANCE_RESOLUTIONS).default('1080p'),
  duration: z.enum(SEEDANCE_DURATIONS).default('5s'),
  cameraFixed: z.boolean().default(false),
  seed: z.number().int().max(2147483647).default(-1),
});

export type SeedanceParams = z.infer<typeof SeedanceParamsSchema>;

/**
 * Validate generation parameters and apply defaults
 *
 * @throws {ConfigurationError} If a parameter is outside its allowed values
 */
export function parseSeedanceParams(request: Partial<SeedanceParams>): SeedanceParams {
  const result = SeedanceParamsSchema.safeParse({
    model: request.model,
    prompt: request.prompt,
    resolution: request.resolution,
    duration: request.duration,
    cameraFixed: request.cameraFixed,
    seed: request.seed,
  });

  if (!result.success) {
    const issue = result.error.issues[0];
    const paramName = issue ? issue.path.join('.') : 'request';
    throw ConfigurationError.invalidConfig(
      paramName,
      `Invalid Seedance parameter ${paramName}: ${issue?.message ?? 'invalid value'}`
    );
  }
  return result.data;
}

/**
 * Prompt text with the generation flags appended:
 * `{prompt} --resolution {r} --duration {n} --camerafixed {bool} [--seed {s}]`
 */
export function formatSeedancePrompt(params: SeedanceParams): string {
  const seconds = params.duration.replace('s', '');
  const seed = params.seed >= 0 ? ` --seed ${params.seed}` : '';
  return `${params.prompt} --resolution ${params.resolution} --duration ${seconds} --camerafixed ${params.cameraFixed}${seed}`.trim();
}

interface ContentPart {
  type: 'text' | 'image_url';
  text?: string;
  image_url?: { url: string };
  role?: 'start' | 'end';
}

/**
 * Request body content: the prompt, the first frame and the optional last frame
 */
export function buildSeedanceContent(
  prompt: string,
  firstFrameUrl: string,
  endFrameUrl?: string,
  frameRoles: boolean = false
): ContentPart[] {
  const content: ContentPart[] = [
    { type: 'text', text: prompt },
    {
      type: 'image_url',
      image_url: { url: firstFrameUrl },
      ...(frameRoles ? { role: 'start' as const } : {}),
    },
  ];

  if (endFrameUrl !== undefined) {
    content.push({
      type: 'image_url',
      image_url: { url: endFrameUrl },
      ...(frameRoles ? { role: 'end' as const } : {}),
    });
  }

  return content;
}

export class SeedanceService extends BaseService {
  /**
   * Generate a video from a first frame (and optional last frame).
   *
   * Publishes local frames, submits the task, polls it and downloads the
   * result to `{outputDir}/seedance/seedance_output_{taskId}.mp4`.
   *
   * @throws {ConfigurationError} If the bearer token is missing or a
   *   parameter is invalid
   */
  async generate(request: SeedanceRequest): Promise<JobResult<VideoArtifact>> {
    const credentials = requireBearer(this.context.credentials);
    const params = parseSeedanceParams(request);
    const { signal } = request;

    const firstFrame = await this.resolveMedia(request.image, 'seedance_first_frame');
    if (!firstFrame.ok) return firstFrame;

    let endFrameUrl: string | undefined;
    if (request.endFrame) {
      const endFrame = await this.resolveMedia(request.endFrame, 'seedance_end_frame');
      if (!endFrame.ok) return endFrame;
      endFrameUrl = endFrame.value;
    }

    const prompt = formatSeedancePrompt(params);
    this.logger.info('Submitting Seedance job', { model: params.model, prompt });

    const submitter = new TokenTaskSubmitter({
      transport: this.context.transport,
      credentials,
      config: this.context.config.ark,
      logger: this.logger,
    });

    let taskId: string;
    try {
      const handle = await submitter.submit(
        {
          model: params.model,
          content: buildSeedanceContent(prompt, firstFrame.value, endFrameUrl, request.frameRoles),
        },
        signal
      );
      taskId = handle.taskId;
    } catch (error) {
      return this.fail('submission', error);
    }

    const family = createArkFamily(this.context.config.ark, credentials);
    let videoUrl: string;
    let attempts: number;
    try {
      const outcome = await this.context.poller.poll(family, taskId, { signal });
      if (outcome.outcome !== 'succeeded') {
        return this.pollFailure(taskId, outcome);
      }
      videoUrl = outcome.result;
      attempts = outcome.attempts;
    } catch (error) {
      return this.fail('polling', error);
    }

    const saved = await this.saveVideo(videoUrl, 'seedance', `seedance_output_${taskId}.mp4`, signal);
    if (!saved.ok) return saved;

    return {
      ok: true,
      value: { taskId, videoUrl, attempts, ...saved.value },
    };
  }
}
