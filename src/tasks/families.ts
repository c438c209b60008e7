/**
 * Task family descriptors for the signed (visual) and bearer-token (ark)
 * services
 * @module volcengine-video-jobs/tasks/families
 */

import { z } from 'zod';
import type { BearerCredentials } from '../auth/index.js';
import type { ArkServiceConfig, VisualServiceConfig } from '../config/index.js';
import type { RequestSigner } from '../signing/index.js';
import type { HttpRequest } from '../transport/index.js';
import { ARK_STATUS_TABLE, VISUAL_STATUS_TABLE } from './status.js';
import type { FailureDetails, TaskFamily } from './types.js';

// ============================================================================
// Response Schemas
// ============================================================================

/**
 * Zod schema for the `data` object of signed-service responses.
 */
const VisualDataSchema = z
  .object({
    task_id: z.string().optional(),
    status: z.string().optional(),
    video_url: z.string().optional(),
    resp_data: z.string().optional(),
    subject_id: z.string().optional(),
  })
  .passthrough();

/**
 * Zod schema for signed-service responses (submission and status).
 */
export const VisualResponseSchema = z
  .object({
    code: z.number().optional(),
    message: z.string().optional(),
    request_id: z.string().optional(),
    task_id: z.string().optional(),
    video_url: z.string().optional(),
    subject_id: z.string().optional(),
    data: VisualDataSchema.nullable().optional(),
  })
  .passthrough();

export type VisualResponse = z.infer<typeof VisualResponseSchema>;

/**
 * Zod schema for the decoded `resp_data` of subject identification.
 */
const SubjectDetectionSchema = z.object({ status: z.number() }).passthrough();

/**
 * Zod schema for bearer-token task responses (submission and status).
 */
export const ArkTaskResponseSchema = z
  .object({
    id: z.string().optional(),
    model: z.string().optional(),
    status: z.string().optional(),
    progress: z.number().optional(),
    content: z
      .object({ video_url: z.string().optional() })
      .passthrough()
      .nullable()
      .optional(),
    error: z
      .object({ code: z.string().optional(), message: z.string().optional() })
      .passthrough()
      .nullable()
      .optional(),
    failure_reason: z.string().optional(),
  })
  .passthrough();

export type ArkTaskResponse = z.infer<typeof ArkTaskResponseSchema>;

/**
 * Parse a signed-service body; undefined when it does not match
 */
export function parseVisualResponse(body: unknown): VisualResponse | undefined {
  const result = VisualResponseSchema.safeParse(body);
  return result.success ? result.data : undefined;
}

/**
 * Parse a bearer-token task body; undefined when it does not match
 */
export function parseArkTaskResponse(body: unknown): ArkTaskResponse | undefined {
  const result = ArkTaskResponseSchema.safeParse(body);
  return result.success ? result.data : undefined;
}

// ============================================================================
// Signed (visual) family
// ============================================================================

/**
 * Build `{endpoint}?Action={action}&Version={version}`
 */
export function buildActionUrl(config: VisualServiceConfig, action: string): string {
  const query = new URLSearchParams({ Action: action, Version: config.version });
  return `${config.endpoint}?${query.toString()}`;
}

/**
 * Whether a decoded `resp_data` reports a detected subject (`status == 1`)
 */
export function isSubjectDetected(respData: string | undefined): boolean {
  if (!respData) {
    return false;
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(respData);
  } catch {
    return false;
  }

  const result = SubjectDetectionSchema.safeParse(decoded);
  return result.success && result.data.status === 1;
}

export interface VisualFamilyOptions<T> {
  name: string;
  reqKey: string;
  config: VisualServiceConfig;
  signer: RequestSigner;
  extractResult(data: z.infer<typeof VisualDataSchema>, taskId: string): T | undefined;
}

function visualFailure(body: unknown): FailureDetails {
  const response = parseVisualResponse(body);
  return {
    reason: response?.message || `task ${response?.data?.status ?? 'failed'}`,
    code: response?.code !== undefined ? String(response.code) : undefined,
    details: {
      status: response?.data?.status,
      requestId: response?.request_id,
    },
  };
}

/**
 * Signed family: status is checked with a POST to the result action, signed
 * again with a fresh timestamp on every attempt.
 */
export function createVisualFamily<T>(options: VisualFamilyOptions<T>): TaskFamily<T> {
  const url = buildActionUrl(options.config, options.config.resultAction);

  return {
    name: options.name,
    statusPath: ['data', 'status'],
    statusTable: VISUAL_STATUS_TABLE,

    buildStatusRequest(taskId: string): HttpRequest {
      const body = JSON.stringify({ req_key: options.reqKey, task_id: taskId });
      const signed = options.signer.sign({ method: 'POST', url, headers: {}, body });
      return { method: 'POST', url, headers: signed.headers, body };
    },

    extractResult(body: unknown, taskId: string): T | undefined {
      const data = parseVisualResponse(body)?.data;
      return data ? options.extractResult(data, taskId) : undefined;
    },

    extractFailure: visualFailure,

    extractProgress(): number | undefined {
      return undefined;
    },
  };
}

export const OMNIHUMAN_SUBJECT_REQ_KEY = 'realman_avatar_picture_create_role_omni';
export const OMNIHUMAN_VIDEO_REQ_KEY = 'realman_avatar_picture_omni_v2';

/**
 * Subject identification: the subject ID is the task ID, valid only when the
 * service detected a subject in the image
 */
export function createSubjectFamily(
  config: VisualServiceConfig,
  signer: RequestSigner
): TaskFamily<string> {
  return createVisualFamily({
    name: 'omnihuman-subject',
    reqKey: OMNIHUMAN_SUBJECT_REQ_KEY,
    config,
    signer,
    extractResult: (data, taskId) => (isSubjectDetected(data.resp_data) ? taskId : undefined),
  });
}

/**
 * Video generation: the result is the remote video URL
 */
export function createVideoFamily(
  config: VisualServiceConfig,
  signer: RequestSigner
): TaskFamily<string> {
  return createVisualFamily({
    name: 'omnihuman-video',
    reqKey: OMNIHUMAN_VIDEO_REQ_KEY,
    config,
    signer,
    extractResult: (data) => data.video_url || undefined,
  });
}

// ============================================================================
// Bearer-token (ark) family
// ============================================================================

export function arkTasksUrl(config: ArkServiceConfig): string {
  return `${config.endpoint}/contents/generations/tasks`;
}

/**
 * Bearer-token family: status is a GET on the task resource
 */
export function createArkFamily(
  config: ArkServiceConfig,
  credentials: BearerCredentials
): TaskFamily<string> {
  const tasksUrl = arkTasksUrl(config);

  return {
    name: 'seedance',
    statusPath: ['status'],
    statusTable: ARK_STATUS_TABLE,

    buildStatusRequest(taskId: string): HttpRequest {
      return {
        method: 'GET',
        url: `${tasksUrl}/${encodeURIComponent(taskId)}`,
        headers: { Authorization: `Bearer ${credentials.token.expose()}` },
      };
    },

    extractResult(body: unknown): string | undefined {
      return parseArkTaskResponse(body)?.content?.video_url || undefined;
    },

    extractFailure(body: unknown): FailureDetails {
      const response = parseArkTaskResponse(body);
      return {
        reason:
          response?.failure_reason || response?.error?.message || `task ${response?.status ?? 'failed'}`,
        code: response?.error?.code,
        details: {
          status: response?.status,
          error: response?.error ?? undefined,
        },
      };
    },

    extractProgress(body: unknown): number | undefined {
      return parseArkTaskResponse(body)?.progress;
    },
  };
}
