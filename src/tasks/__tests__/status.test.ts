import { describe, it, expect } from 'vitest';
import {
  ARK_STATUS_TABLE,
  VISUAL_STATUS_TABLE,
  isTerminalStatus,
  normalizeStatus,
  readPath,
} from '../status.js';

describe('normalizeStatus', () => {
  it.each([
    ['in_queue', 'queued'],
    ['generating', 'running'],
    ['done', 'succeeded'],
    ['failed', 'failed'],
    ['not_found', 'failed'],
    ['expired', 'failed'],
  ])('should map visual status %s to %s', (raw, expected) => {
    expect(normalizeStatus(VISUAL_STATUS_TABLE, raw)).toBe(expected);
  });

  it.each([
    ['queued', 'queued'],
    ['pending', 'queued'],
    ['running', 'running'],
    ['processing', 'running'],
    ['succeeded', 'succeeded'],
    ['failed', 'failed'],
    ['cancelled', 'failed'],
  ])('should map ark status %s to %s', (raw, expected) => {
    expect(normalizeStatus(ARK_STATUS_TABLE, raw)).toBe(expected);
  });

  it('should map anything else to unknown', () => {
    expect(normalizeStatus(ARK_STATUS_TABLE, 'done')).toBe('unknown');
    expect(normalizeStatus(ARK_STATUS_TABLE, 'toString')).toBe('unknown');
    expect(normalizeStatus(ARK_STATUS_TABLE, undefined)).toBe('unknown');
    expect(normalizeStatus(ARK_STATUS_TABLE, 3)).toBe('unknown');
  });
});

describe('isTerminalStatus', () => {
  it('should treat only succeeded and failed as terminal', () => {
    expect(isTerminalStatus('succeeded')).toBe(true);
    expect(isTerminalStatus('failed')).toBe(true);
    expect(isTerminalStatus('running')).toBe(false);
    expect(isTerminalStatus('unknown')).toBe(false);
  });
});

describe('readPath', () => {
  it('should follow nested objects', () => {
    expect(readPath({ data: { status: 'done' } }, ['data', 'status'])).toBe('done');
  });

  it('should return undefined through missing or non-object values', () => {
    expect(readPath({ data: null }, ['data', 'status'])).toBeUndefined();
    expect(readPath({ data: 'x' }, ['data', 'status'])).toBeUndefined();
    expect(readPath([], ['0'])).toBeUndefined();
  });
});
