/**
 * Poll loop shared by every task family
 * @module volcengine-video-jobs/tasks/poller
 */

import type { PollingConfig } from '../config/index.js';
import { SigningError, TransientPollError, describeError, isVideoGenError } from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import {
  bodyText,
  getRequestId,
  isSuccessResponse,
  type HttpRequest,
  type HttpTransport,
} from '../transport/index.js';
import { isTerminalStatus, normalizeStatus, readPath } from './status.js';
import {
  MISSING_RESULT,
  TaskStatus,
  type PollOutcome,
  type TaskFamily,
  type TaskHandle,
} from './types.js';

export interface PollOptions {
  /** Overrides the configured attempt budget */
  maxAttempts?: number;
  /** Overrides the configured delay between attempts */
  intervalMs?: number;
  /** Cancels the loop before the next attempt or during a delay */
  signal?: AbortSignal;
}

export interface TaskPollerOptions {
  transport: HttpTransport;
  polling: PollingConfig;
  logger: Logger;
}

/**
 * Follows a remote task until it succeeds, fails, runs out of attempts or is
 * cancelled.
 */
export class TaskPoller {
  private readonly transport: HttpTransport;
  private readonly polling: PollingConfig;
  private readonly logger: Logger;

  constructor(options: TaskPollerOptions) {
    this.transport = options.transport;
    this.polling = options.polling;
    this.logger = options.logger;
  }

  /**
   * Resolve a submission handle: resolved handles succeed immediately with
   * zero attempts, pending handles are polled.
   */
  async awaitHandle<T>(
    family: TaskFamily<T>,
    handle: TaskHandle<T>,
    options: PollOptions = {}
  ): Promise<PollOutcome<T>> {
    if (handle.kind === 'resolved') {
      return { outcome: 'succeeded', result: handle.result, attempts: 0 };
    }
    return this.poll(family, handle.taskId, options);
  }

  /**
   * Poll a task.
   *
   * Each attempt builds a fresh request. Failed status checks are logged and
   * the loop continues; only a SigningError ends it early.
   *
   * @throws {SigningError} If a status request cannot be signed
   */
  async poll<T>(
    family: TaskFamily<T>,
    taskId: string,
    options: PollOptions = {}
  ): Promise<PollOutcome<T>> {
    const maxAttempts = options.maxAttempts ?? this.polling.maxAttempts;
    const intervalMs = options.intervalMs ?? this.polling.intervalMs;
    const signal = options.signal;

    this.logger.info('Polling task', { family: family.name, taskId, maxAttempts, intervalMs });

    let lastStatus: TaskStatus | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (signal?.aborted) {
        return this.cancelled(family, taskId, attempt - 1);
      }

      const request = family.buildStatusRequest(taskId);

      let body: unknown;
      try {
        body = await this.checkStatus({ ...request, signal });
      } catch (error) {
        if (error instanceof SigningError) {
          throw error;
        }
        if (signal?.aborted) {
          return this.cancelled(family, taskId, attempt);
        }
        this.logger.warn('Status check failed', {
          family: family.name,
          taskId,
          attempt,
          error: describeError(error),
        });
        if (attempt < maxAttempts && !(await this.sleep(intervalMs, signal))) {
          return this.cancelled(family, taskId, attempt);
        }
        continue;
      }

      const rawStatus = readPath(body, family.statusPath);
      const status = normalizeStatus(family.statusTable, rawStatus);
      const context = {
        family: family.name,
        taskId,
        attempt,
        status: rawStatus,
        progress: family.extractProgress(body),
      };

      if (status !== lastStatus) {
        this.logger.info('Task status changed', context);
      } else {
        this.logger.debug('Task status', context);
      }
      lastStatus = status;

      if (isTerminalStatus(status)) {
        return status === TaskStatus.Succeeded
          ? this.settleSucceeded(family, taskId, body, rawStatus, attempt)
          : this.settleFailed(family, taskId, body, attempt);
      }

      if (status === TaskStatus.Unknown) {
        this.logger.warn('Unrecognised task status', { family: family.name, taskId, status: rawStatus });
      }

      if (attempt < maxAttempts && !(await this.sleep(intervalMs, signal))) {
        return this.cancelled(family, taskId, attempt);
      }
    }

    this.logger.warn('Task polling timed out', { family: family.name, taskId, attempts: maxAttempts });
    return { outcome: 'timeout', attempts: maxAttempts, lastStatus };
  }

  private settleSucceeded<T>(
    family: TaskFamily<T>,
    taskId: string,
    body: unknown,
    rawStatus: unknown,
    attempt: number
  ): PollOutcome<T> {
    const result = family.extractResult(body, taskId);
    if (result === undefined) {
      this.logger.error('Task succeeded without a result', { family: family.name, taskId });
      return {
        outcome: 'failed',
        reason: 'missing result',
        code: MISSING_RESULT,
        attempts: attempt,
        details: { status: rawStatus },
      };
    }
    return { outcome: 'succeeded', result, attempts: attempt };
  }

  private settleFailed<T>(
    family: TaskFamily<T>,
    taskId: string,
    body: unknown,
    attempt: number
  ): PollOutcome<T> {
    const failure = family.extractFailure(body);
    this.logger.error('Task failed', {
      family: family.name,
      taskId,
      attempt,
      reason: failure.reason,
      code: failure.code,
      details: failure.details,
    });
    return { outcome: 'failed', attempts: attempt, ...failure };
  }

  /**
   * One status check: the parsed JSON body of a 2xx response
   */
  private async checkStatus(request: HttpRequest): Promise<unknown> {
    let text: string;
    try {
      const response = await this.transport.send(request);
      text = bodyText(response);
      if (!isSuccessResponse(response)) {
        throw new TransientPollError({
          message: `Status check failed with HTTP ${response.status}`,
          code: 'POLL_HTTP_ERROR',
          status: response.status,
          requestId: getRequestId(response.headers),
          details: { body: text.slice(0, 500) },
        });
      }
    } catch (error) {
      if (error instanceof TransientPollError) {
        throw error;
      }
      throw new TransientPollError({
        message: `Status check failed: ${error instanceof Error ? error.message : String(error)}`,
        code: 'POLL_TRANSPORT_ERROR',
        status: isVideoGenError(error) ? error.status : undefined,
        cause: error,
      });
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new TransientPollError({
        message: 'Status response was not valid JSON',
        code: 'POLL_INVALID_BODY',
        details: { body: text.slice(0, 500) },
        cause: error,
      });
    }
  }

  private cancelled<T>(family: TaskFamily<T>, taskId: string, attempts: number): PollOutcome<T> {
    this.logger.info('Task polling cancelled', { family: family.name, taskId, attempts });
    return { outcome: 'cancelled', attempts };
  }

  /**
   * Wait between attempts. Resolves false when the signal fires first.
   */
  private sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) {
      return Promise.resolve(false);
    }
    if (ms <= 0) {
      return Promise.resolve(true);
    }

    return new Promise((resolve) => {
      const onAbort = (): void => {
        clearTimeout(timer);
        resolve(false);
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve(true);
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
