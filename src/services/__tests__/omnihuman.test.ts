/**
 * Tests for OmniHuman jobs
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { mkdtemp, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { extractSubjectId, extractVideoUrl } from '../omnihuman.js';
import { createClient } from '../../client/index.js';
import { ConfigurationError } from '../../errors/index.js';
import {
  createMockHttpTransport,
  createMockLogger,
  jsonResponse,
  sentJson,
  sentRequest,
  streamResponse,
  type MockHttpTransport,
} from '../../__mocks__/index.js';

const IMAGE_URL = 'https://media.example.com/portrait.png';
const AUDIO_URL = 'https://media.example.com/voice.mp3';
const VIDEO_URL = 'https://cdn.example.com/omnihuman.mp4';

describe('extractSubjectId', () => {
  it('should read the subject ID at the top level or under data', () => {
    expect(extractSubjectId({ subject_id: 'subj-1' })).toBe('subj-1');
    expect(extractSubjectId({ data: { subject_id: 'subj-2' } })).toBe('subj-2');
    expect(extractSubjectId({ data: {} })).toBeUndefined();
  });
});

describe('extractVideoUrl', () => {
  it('should read the video URL at the top level or under data', () => {
    expect(extractVideoUrl({ video_url: VIDEO_URL })).toBe(VIDEO_URL);
    expect(extractVideoUrl({ data: { video_url: VIDEO_URL } })).toBe(VIDEO_URL);
    expect(extractVideoUrl({ data: { video_url: '' } })).toBeUndefined();
  });
});

describe('OmniHumanService', () => {
  let dir: string;
  let transport: MockHttpTransport;

  function client(keyPair: boolean = true, publish?: (path: string, prefix?: string) => Promise<string>) {
    return createClient(
      {
        ...(keyPair ? { accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' } : {}),
        outputDir: dir,
        polling: { maxAttempts: 3, intervalMs: 0 },
      },
      {
        transport,
        logger: createMockLogger(),
        clock: () => new Date('2024-01-15T08:30:00Z'),
        mediaHost: publish ? { publish } : undefined,
      }
    );
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'video-jobs-omnihuman-'));
    transport = createMockHttpTransport();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('identifySubject', () => {
    it('should use the identification task ID as the subject ID', async () => {
      transport.send
        .mockResolvedValueOnce(jsonResponse({ code: 10000, data: { task_id: 'task-9' } }))
        .mockResolvedValueOnce(jsonResponse({ code: 10000, data: { status: 'in_queue' } }))
        .mockResolvedValueOnce(
          jsonResponse({ code: 10000, data: { status: 'done', resp_data: '{"status":1}' } })
        );

      const result = await client().omnihuman.identifySubject({ image: { url: IMAGE_URL } });

      expect(result).toEqual({ ok: true, value: { subjectId: 'task-9', attempts: 2 } });
      expect(sentRequest(transport, 0).url).toBe(
        'https://visual.volcengineapi.com?Action=CVSubmitTask&Version=2022-08-31'
      );
      expect(sentRequest(transport, 0).headers['X-Date']).toBe('20240115T083000Z');
      expect(sentJson(transport, 0)).toEqual({
        req_key: 'realman_avatar_picture_create_role_omni',
        image_url: IMAGE_URL,
      });
      expect(sentJson(transport, 1)).toEqual({
        req_key: 'realman_avatar_picture_create_role_omni',
        task_id: 'task-9',
      });
    });

    it('should accept a subject ID returned with the submission', async () => {
      transport.send.mockResolvedValueOnce(jsonResponse({ code: 10000, data: { subject_id: 'subj-1' } }));

      const result = await client().omnihuman.identifySubject({ image: { url: IMAGE_URL } });

      expect(result).toEqual({ ok: true, value: { subjectId: 'subj-1', attempts: 0 } });
      expect(transport.send).toHaveBeenCalledTimes(1);
    });

    it('should fail when no subject is detected', async () => {
      transport.send
        .mockResolvedValueOnce(jsonResponse({ code: 10000, data: { task_id: 'task-9' } }))
        .mockResolvedValueOnce(
          jsonResponse({ code: 10000, data: { status: 'done', resp_data: '{"status":0}' } })
        );

      const result = await client().omnihuman.identifySubject({ image: { url: IMAGE_URL } });

      expect(result).toEqual({
        ok: false,
        stage: 'polling',
        error: 'No human subject detected in the image',
      });
    });

    it('should report a remote failure whose message reads like a missing result', async () => {
      transport.send
        .mockResolvedValueOnce(jsonResponse({ code: 10000, data: { task_id: 'task-9' } }))
        .mockResolvedValueOnce(
          jsonResponse({ code: 50500, message: 'missing result', data: { status: 'failed' } })
        );

      const result = await client().omnihuman.identifySubject({ image: { url: IMAGE_URL } });

      expect(result).toEqual({ ok: false, stage: 'polling', error: 'Task task-9 failed: missing result' });
    });

    it('should throw when the key pair is missing', async () => {
      const error = await client(false)
        .omnihuman.identifySubject({ image: { url: IMAGE_URL } })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ code: 'MISSING_KEY_PAIR' });
      expect(transport.send).not.toHaveBeenCalled();
    });
  });

  describe('generateVideo', () => {
    it('should submit, poll and download a video', async () => {
      transport.send
        .mockResolvedValueOnce(jsonResponse({ code: 10000, data: { task_id: 'task-123' } }))
        .mockResolvedValueOnce(
          jsonResponse({ code: 10000, data: { status: 'done', video_url: VIDEO_URL } })
        );
      transport.sendStreaming.mockResolvedValueOnce(streamResponse([new Uint8Array(32)]));

      const result = await client().omnihuman.generateVideo({
        image: { url: IMAGE_URL },
        audio: { url: AUDIO_URL },
      });

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value).toMatchObject({
          taskId: 'task-123',
          videoUrl: VIDEO_URL,
          attempts: 1,
          bytesWritten: 32,
        });
        expect(result.value.path).toMatch(/omnihuman[\\/]omnihuman_video_[0-9a-f-]{36}\.mp4$/);
      }
      expect(sentJson(transport, 0)).toEqual({
        req_key: 'realman_avatar_picture_omni_v2',
        image_url: IMAGE_URL,
        audio_url: AUDIO_URL,
      });
      expect(await readdir(join(dir, 'omnihuman'))).toHaveLength(1);
    });

    it('should skip polling when the video is returned with the submission', async () => {
      transport.send.mockResolvedValueOnce(jsonResponse({ code: 10000, data: { video_url: VIDEO_URL } }));
      transport.sendStreaming.mockResolvedValueOnce(streamResponse([new Uint8Array(8)]));

      const result = await client().omnihuman.generateVideo({
        image: { url: IMAGE_URL },
        audio: { url: AUDIO_URL },
      });

      expect(result).toMatchObject({ ok: true, value: { videoUrl: VIDEO_URL, attempts: 0 } });
      expect(result.ok && result.value.taskId).toBeUndefined();
      expect(transport.send).toHaveBeenCalledTimes(1);
    });

    it('should publish local image and audio files', async () => {
      const publish = vi.fn(async (_path: string, prefix?: string) => `https://media.example.com/${prefix}`);
      transport.send.mockResolvedValueOnce(jsonResponse({ code: 10000, data: { video_url: VIDEO_URL } }));
      transport.sendStreaming.mockResolvedValueOnce(streamResponse([new Uint8Array(8)]));

      await client(true, publish).omnihuman.generateVideo({
        image: { path: '/media/portrait.png' },
        audio: { path: '/media/voice.mp3' },
      });

      expect(publish.mock.calls).toEqual([
        ['/media/portrait.png', 'omnihuman_subject'],
        ['/media/voice.mp3', 'omnihuman_audio'],
      ]);
    });

    it('should report a failed task at the polling stage', async () => {
      transport.send
        .mockResolvedValueOnce(jsonResponse({ code: 10000, data: { task_id: 'task-123' } }))
        .mockResolvedValueOnce(
          jsonResponse({ code: 50411, message: 'audio too long', data: { status: 'failed' } })
        );

      const result = await client().omnihuman.generateVideo({
        image: { url: IMAGE_URL },
        audio: { url: AUDIO_URL },
      });

      expect(result).toEqual({ ok: false, stage: 'polling', error: 'Task task-123 failed: audio too long' });
    });
  });
});
