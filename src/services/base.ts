/**
 * Base Service Class
 *
 * Shared plumbing of the job services: media publishing, failure reporting
 * and downloads.
 *
 * @module volcengine-video-jobs/services/base
 */

import { join } from 'node:path';
import type { Credentials } from '../auth/index.js';
import type { NormalizedVideoGenConfig } from '../config/index.js';
import type { ArtifactDownloader } from '../download/index.js';
import { ConfigurationError, SigningError, describeError } from '../errors/index.js';
import type { MediaHost, MediaSource } from '../media/index.js';
import { logError, type Logger } from '../observability/index.js';
import type { PollOutcome, TaskPoller } from '../tasks/index.js';
import type { HttpTransport } from '../transport/index.js';
import type { JobResult, JobStage } from './types.js';

/**
 * Everything a job service needs, wired by the client
 */
export interface ServiceContext {
  readonly config: NormalizedVideoGenConfig;
  readonly credentials: Credentials;
  readonly transport: HttpTransport;
  readonly poller: TaskPoller;
  readonly downloader: ArtifactDownloader;
  readonly logger: Logger;
  readonly mediaHost?: MediaHost;
  /** Time source for request signing */
  readonly clock?: () => Date;
}

export type UnsuccessfulPoll = Exclude<PollOutcome<unknown>, { outcome: 'succeeded' }>;

export function describePollOutcome(taskId: string, outcome: UnsuccessfulPoll): string {
  switch (outcome.outcome) {
    case 'failed':
      return `Task ${taskId} failed: ${outcome.reason}`;
    case 'timeout':
      return `Task ${taskId} did not finish after ${outcome.attempts} attempts`;
    case 'cancelled':
      return `Task ${taskId} was cancelled after ${outcome.attempts} attempts`;
  }
}

export abstract class BaseService {
  protected readonly context: ServiceContext;

  constructor(context: ServiceContext) {
    this.context = context;
  }

  protected get logger(): Logger {
    return this.context.logger;
  }

  /**
   * Turn an error into a failed job result. Configuration and signing errors
   * are rethrown.
   */
  protected fail(stage: JobStage, error: unknown): JobResult<never> {
    if (error instanceof ConfigurationError || error instanceof SigningError) {
      throw error;
    }
    logError(this.logger, stage, error);
    return { ok: false, stage, error: describeError(error) };
  }

  /**
   * Failed job result for a poll loop that did not succeed
   */
  protected pollFailure(taskId: string, outcome: UnsuccessfulPoll): JobResult<never> {
    this.logger.error('Job polling did not succeed', { taskId, outcome: outcome.outcome });
    return { ok: false, stage: 'polling', error: describePollOutcome(taskId, outcome) };
  }

  /**
   * Resolve a media input to a URL, publishing local files
   */
  protected async resolveMedia(source: MediaSource, namePrefix: string): Promise<JobResult<string>> {
    if ('url' in source) {
      return { ok: true, value: source.url };
    }

    const mediaHost = this.context.mediaHost;
    if (!mediaHost) {
      throw ConfigurationError.invalidConfig(
        'imgbbApiKey',
        'A media host is required to publish local files; configure imgbbApiKey or pass URLs'
      );
    }

    try {
      return { ok: true, value: await mediaHost.publish(source.path, namePrefix) };
    } catch (error) {
      return this.fail('upload', error);
    }
  }

  /**
   * Download a finished video below the output directory
   */
  protected async saveVideo(
    videoUrl: string,
    subdirectory: string,
    fileName: string,
    signal?: AbortSignal
  ): Promise<JobResult<{ path: string; bytesWritten: number }>> {
    const destination = join(this.context.config.outputDir, subdirectory, fileName);
    const result = await this.context.downloader.download(videoUrl, destination, signal);
    if (!result.ok) {
      return this.fail('download', result.error);
    }
    return { ok: true, value: { path: result.path, bytesWritten: result.bytesWritten } };
  }
}
