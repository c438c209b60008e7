/**
 * Task lifecycle types shared by the submitter and the poller
 * @module volcengine-video-jobs/tasks/types
 */

import type { HttpRequest } from '../transport/index.js';

/**
 * Normalized task status. Each service family maps its own vocabulary onto
 * this closed set.
 */
export const TaskStatus = {
  Queued: 'queued',
  Running: 'running',
  Succeeded: 'succeeded',
  Failed: 'failed',
  Unknown: 'unknown',
} as const;

export type TaskStatus = (typeof TaskStatus)[keyof typeof TaskStatus];

/**
 * Raw status string → normalized status
 */
export type StatusTable = Readonly<Record<string, TaskStatus>>;

/**
 * Result of a submission: either the service answered synchronously with the
 * result, or it created a remote task that has to be polled.
 */
export type TaskHandle<T> =
  | { readonly kind: 'resolved'; readonly result: T }
  | { readonly kind: 'pending'; readonly taskId: string };

export type PendingTaskHandle = Extract<TaskHandle<unknown>, { kind: 'pending' }>;

/**
 * Diagnostic fields of a failed task
 */
export interface FailureDetails {
  readonly reason: string;
  readonly code?: string;
  readonly details?: Record<string, unknown>;
}

/**
 * Failure code of a task that reported success without a usable result
 */
export const MISSING_RESULT = 'MISSING_RESULT';

/**
 * Terminal outcome of a poll loop. Timeout and remote failure are values,
 * not exceptions.
 */
export type PollOutcome<T> =
  | { readonly outcome: 'succeeded'; readonly result: T; readonly attempts: number }
  | ({ readonly outcome: 'failed'; readonly attempts: number } & FailureDetails)
  | { readonly outcome: 'timeout'; readonly attempts: number; readonly lastStatus?: TaskStatus }
  | { readonly outcome: 'cancelled'; readonly attempts: number };

/**
 * Describes how to check one family of remote tasks.
 *
 * The poll loop is the same for every family; everything that differs
 * (request shape, authentication, status vocabulary, where the result lives)
 * is supplied here.
 */
export interface TaskFamily<T> {
  /** Family name used in log lines */
  readonly name: string;

  /** Path of the raw status inside the response body */
  readonly statusPath: readonly string[];

  readonly statusTable: StatusTable;

  /**
   * Build a fresh status request. Called once per attempt; signed families
   * sign here with the current time. A SigningError thrown here ends the loop.
   */
  buildStatusRequest(taskId: string): HttpRequest;

  /** Result of a succeeded task, or undefined when the body lacks it */
  extractResult(body: unknown, taskId: string): T | undefined;

  extractFailure(body: unknown): FailureDetails;

  /** Completion percentage, when the family reports one */
  extractProgress(body: unknown): number | undefined;
}
