/**
 * Status vocabularies of the two service families
 * @module volcengine-video-jobs/tasks/status
 */

import { TaskStatus, type StatusTable } from './types.js';

/**
 * Signed (visual) service statuses, found at `data.status`
 */
export const VISUAL_STATUS_TABLE: StatusTable = {
  in_queue: TaskStatus.Queued,
  generating: TaskStatus.Running,
  done: TaskStatus.Succeeded,
  failed: TaskStatus.Failed,
  not_found: TaskStatus.Failed,
  expired: TaskStatus.Failed,
};

/**
 * Bearer-token (ark) service statuses, found at `status`
 */
export const ARK_STATUS_TABLE: StatusTable = {
  queued: TaskStatus.Queued,
  pending: TaskStatus.Queued,
  running: TaskStatus.Running,
  processing: TaskStatus.Running,
  succeeded: TaskStatus.Succeeded,
  failed: TaskStatus.Failed,
  cancelled: TaskStatus.Failed,
};

/**
 * Map a raw status onto the closed set; anything unrecognised is `unknown`
 */
export function normalizeStatus(table: StatusTable, raw: unknown): TaskStatus {
  if (typeof raw !== 'string' || !Object.hasOwn(table, raw)) {
    return TaskStatus.Unknown;
  }
  return table[raw] ?? TaskStatus.Unknown;
}

export function isTerminalStatus(status: TaskStatus): boolean {
  return status === TaskStatus.Succeeded || status === TaskStatus.Failed;
}

/**
 * Walk a property path through parsed JSON
 */
export function readPath(body: unknown, path: readonly string[]): unknown {
  let current: unknown = body;
  for (const key of path) {
    if (typeof current !== 'object' || current === null || Array.isArray(current)) {
      return undefined;
    }
    current = Object.getOwnPropertyDescriptor(current, key)?.value;
  }
  return current;
}
