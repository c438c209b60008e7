/**
 * Task submission for the signed and bearer-token services
 * @module volcengine-video-jobs/tasks/submitter
 */

import type { BearerCredentials } from '../auth/index.js';
import type { ArkServiceConfig, VisualServiceConfig } from '../config/index.js';
import { SubmissionError, isVideoGenError } from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import type { RequestSigner } from '../signing/index.js';
import {
  bodyText,
  getRequestId,
  isSuccessResponse,
  type HttpRequest,
  type HttpTransport,
} from '../transport/index.js';
import {
  arkTasksUrl,
  buildActionUrl,
  parseArkTaskResponse,
  parseVisualResponse,
} from './families.js';
import type { PendingTaskHandle, TaskHandle } from './types.js';

/**
 * Pulls a synchronous result out of a submission response
 */
export type ResolvedResultExtractor<T> = (body: unknown) => T | undefined;

/**
 * Send a submission and parse its JSON body. Transport failures, non-2xx
 * statuses and unparseable bodies all become SubmissionErrors.
 */
async function sendSubmission(
  transport: HttpTransport,
  request: HttpRequest
): Promise<unknown> {
  let text: string;
  try {
    const response = await transport.send(request);
    text = bodyText(response);
    if (!isSuccessResponse(response)) {
      throw SubmissionError.rejected(response.status, text, getRequestId(response.headers));
    }
  } catch (error) {
    if (error instanceof SubmissionError) {
      throw error;
    }
    throw new SubmissionError({
      message: `Task submission failed: ${error instanceof Error ? error.message : String(error)}`,
      code: 'SUBMISSION_FAILED',
      status: isVideoGenError(error) ? error.status : undefined,
      cause: error,
    });
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new SubmissionError({
      message: 'Task submission response was not valid JSON',
      code: 'INVALID_RESPONSE_BODY',
      details: { body: text.slice(0, 500) },
      cause: error,
    });
  }
}

export interface SignedTaskSubmitterOptions {
  transport: HttpTransport;
  signer: RequestSigner;
  config: VisualServiceConfig;
  logger: Logger;
}

/**
 * Submits jobs to the keyed-hash signed service
 */
export class SignedTaskSubmitter {
  private readonly transport: HttpTransport;
  private readonly signer: RequestSigner;
  private readonly config: VisualServiceConfig;
  private readonly logger: Logger;

  constructor(options: SignedTaskSubmitterOptions) {
    this.transport = options.transport;
    this.signer = options.signer;
    this.config = options.config;
    this.logger = options.logger;
  }

  /**
   * POST the payload to the submit action, signed.
   *
   * A `task_id` (top level or under `data`) yields a pending handle; otherwise
   * `extractResolved` is asked for a synchronous result.
   *
   * @throws {SigningError} If the request cannot be signed
   * @throws {SubmissionError} If the service rejects the job or the response
   *   carries neither a task ID nor a result
   */
  async submit<T>(
    payload: Record<string, unknown>,
    extractResolved: ResolvedResultExtractor<T>,
    signal?: AbortSignal
  ): Promise<TaskHandle<T>> {
    const url = buildActionUrl(this.config, this.config.submitAction);
    const body = JSON.stringify(payload);
    const signed = this.signer.sign({ method: 'POST', url, headers: {}, body });

    this.logger.debug('Submitting signed task', { url, reqKey: payload['req_key'] });

    const responseBody = await sendSubmission(this.transport, {
      method: 'POST',
      url,
      headers: signed.headers,
      body,
      signal,
    });

    const response = parseVisualResponse(responseBody);
    const taskId = response?.task_id || response?.data?.task_id;
    if (taskId) {
      this.logger.info('Task created', { taskId });
      return { kind: 'pending', taskId };
    }

    const result = extractResolved(responseBody);
    if (result !== undefined) {
      this.logger.info('Task resolved synchronously');
      return { kind: 'resolved', result };
    }

    throw SubmissionError.missingIdentifier(responseBody);
  }
}

export interface TokenTaskSubmitterOptions {
  transport: HttpTransport;
  credentials: BearerCredentials;
  config: ArkServiceConfig;
  logger: Logger;
}

/**
 * Submits jobs to the bearer-token service
 */
export class TokenTaskSubmitter {
  private readonly transport: HttpTransport;
  private readonly credentials: BearerCredentials;
  private readonly config: ArkServiceConfig;
  private readonly logger: Logger;

  constructor(options: TokenTaskSubmitterOptions) {
    this.transport = options.transport;
    this.credentials = options.credentials;
    this.config = options.config;
    this.logger = options.logger;
  }

  /**
   * POST the payload to the task collection; the response `id` is the task ID.
   *
   * @throws {SubmissionError} If the service rejects the job or returns no ID
   */
  async submit(payload: Record<string, unknown>, signal?: AbortSignal): Promise<PendingTaskHandle> {
    const url = arkTasksUrl(this.config);

    this.logger.debug('Submitting task', { url, model: payload['model'] });

    const responseBody = await sendSubmission(this.transport, {
      method: 'POST',
      url,
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.credentials.token.expose()}`,
      },
      body: JSON.stringify(payload),
      signal,
    });

    const taskId = parseArkTaskResponse(responseBody)?.id;
    if (!taskId) {
      throw SubmissionError.missingIdentifier(responseBody);
    }

    this.logger.info('Task created', { taskId });
    return { kind: 'pending', taskId };
  }
}
