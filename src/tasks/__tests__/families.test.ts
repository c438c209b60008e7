import { describe, it, expect } from 'vitest';
import {
  OMNIHUMAN_VIDEO_REQ_KEY,
  arkTasksUrl,
  buildActionUrl,
  createArkFamily,
  isSubjectDetected,
  parseArkTaskResponse,
  parseVisualResponse,
} from '../families.js';
import { SecretString } from '../../auth/index.js';
import { DEFAULT_VISUAL_CONFIG } from '../../config/index.js';

describe('buildActionUrl', () => {
  it('should add the action and version as query parameters', () => {
    expect(buildActionUrl(DEFAULT_VISUAL_CONFIG, 'CVSubmitTask')).toBe(
      'https://visual.volcengineapi.com?Action=CVSubmitTask&Version=2022-08-31'
    );
  });
});

describe('arkTasksUrl', () => {
  it('should append the tasks path', () => {
    expect(arkTasksUrl({ endpoint: 'https://ark.example.com/api/v3' })).toBe(
      'https://ark.example.com/api/v3/contents/generations/tasks'
    );
  });
});

describe('isSubjectDetected', () => {
  it.each([
    ['{"status":1}', true],
    ['{"status":0}', false],
    ['{"status":"1"}', false],
    ['not json', false],
    ['', false],
    [undefined, false],
  ])('should read %s as %s', (respData, expected) => {
    expect(isSubjectDetected(respData)).toBe(expected);
  });
});

describe('response parsing', () => {
  it('should keep unknown fields of a signed response', () => {
    const parsed = parseVisualResponse({ code: 10000, data: { status: 'done', extra: 1 } });

    expect(parsed?.data).toEqual({ status: 'done', extra: 1 });
  });

  it('should reject a signed response with mistyped fields', () => {
    expect(parseVisualResponse({ code: 'ok' })).toBeUndefined();
    expect(parseVisualResponse('text')).toBeUndefined();
  });

  it('should accept a null error on a task response', () => {
    expect(parseArkTaskResponse({ id: 'cgt-1', error: null })?.id).toBe('cgt-1');
  });
});

describe('createArkFamily', () => {
  const family = createArkFamily(
    { endpoint: 'https://ark.example.com/api/v3' },
    { token: new SecretString('test-token') }
  );

  it('should escape the task ID in the status URL', () => {
    expect(family.buildStatusRequest('a/b').url).toBe(
      'https://ark.example.com/api/v3/contents/generations/tasks/a%2Fb'
    );
  });

  it('should fall back to the error message for the failure reason', () => {
    expect(
      family.extractFailure({ status: 'failed', error: { code: 'E1', message: 'quota exceeded' } })
    ).toMatchObject({ reason: 'quota exceeded', code: 'E1' });
  });

  it('should describe a failure with no reason by its status', () => {
    expect(family.extractFailure({ status: 'cancelled' }).reason).toBe('task cancelled');
  });

  it('should report progress', () => {
    expect(family.extractProgress({ status: 'running', progress: 55 })).toBe(55);
    expect(family.extractProgress({ status: 'running' })).toBeUndefined();
  });
});

describe('request keys', () => {
  it('should use the video generation request key', () => {
    expect(OMNIHUMAN_VIDEO_REQ_KEY).toBe('realman_avatar_picture_omni_v2');
  });
});
