/**
 * Tests for signed and token task submission
 */

import { beforeEach, describe, it, expect } from 'vitest';
import { SignedTaskSubmitter, TokenTaskSubmitter } from '../submitter.js';
import { SecretString } from '../../auth/index.js';
import { DEFAULT_VISUAL_CONFIG } from '../../config/index.js';
import { NetworkError, SubmissionError } from '../../errors/index.js';
import { RequestSigner } from '../../signing/index.js';
import { extractSubjectId } from '../../services/omnihuman.js';
import {
  createMockHttpTransport,
  createMockLogger,
  jsonResponse,
  sentRequest,
  sentJson,
  textResponse,
  type MockHttpTransport,
} from '../../__mocks__/index.js';

const SUBJECT_PAYLOAD = {
  req_key: 'realman_avatar_picture_create_role_omni',
  image_url: 'https://example.com/subject.png',
};

describe('SignedTaskSubmitter', () => {
  let transport: MockHttpTransport;
  let submitter: SignedTaskSubmitter;

  beforeEach(() => {
    transport = createMockHttpTransport();
    submitter = new SignedTaskSubmitter({
      transport,
      signer: new RequestSigner({
        credentials: {
          accessKeyId: 'test-access-key',
          secretAccessKey: new SecretString('test-secret'),
        },
        clock: () => new Date('2024-01-15T08:30:00Z'),
      }),
      config: DEFAULT_VISUAL_CONFIG,
      logger: createMockLogger(),
    });
  });

  it('should send a signed POST to the submit action', async () => {
    transport.send.mockResolvedValueOnce(jsonResponse({ code: 10000, data: { task_id: 'task-123' } }));

    const handle = await submitter.submit(SUBJECT_PAYLOAD, extractSubjectId);

    expect(handle).toEqual({ kind: 'pending', taskId: 'task-123' });
    const request = sentRequest(transport, 0);
    expect(request.method).toBe('POST');
    expect(request.url).toBe(
      'https://visual.volcengineapi.com?Action=CVSubmitTask&Version=2022-08-31'
    );
    expect(request.body).toBe(
      '{"req_key":"realman_avatar_picture_create_role_omni","image_url":"https://example.com/subject.png"}'
    );
    expect(request.headers['Authorization']).toBe(
      'HMAC-SHA256 Credential=test-access-key/20240115/cn-north-1/cv/request, ' +
        'SignedHeaders=content-type;host;x-date, ' +
        'Signature=ddce3ec616026fe9d5977c998dd53f0afc521475b62a3af5fbdfbbe2a77bc3c5'
    );
  });

  it('should accept a top-level task_id', async () => {
    transport.send.mockResolvedValueOnce(jsonResponse({ task_id: 'task-456' }));

    const handle = await submitter.submit(SUBJECT_PAYLOAD, extractSubjectId);

    expect(handle).toEqual({ kind: 'pending', taskId: 'task-456' });
  });

  it('should return a synchronous result', async () => {
    transport.send.mockResolvedValueOnce(jsonResponse({ subject_id: 'subject-789' }));

    const handle = await submitter.submit(SUBJECT_PAYLOAD, extractSubjectId);

    expect(handle).toEqual({ kind: 'resolved', result: 'subject-789' });
  });

  it('should reject a body with neither task ID nor result', async () => {
    transport.send.mockResolvedValueOnce(jsonResponse({ code: 10000, data: {} }));

    await expect(submitter.submit(SUBJECT_PAYLOAD, extractSubjectId)).rejects.toMatchObject({
      name: 'SubmissionError',
      code: 'MISSING_TASK_ID',
    });
  });

  it('should reject a non-2xx response', async () => {
    transport.send.mockResolvedValueOnce(
      textResponse('{"code":50400,"message":"Access Denied"}', 400, { 'x-tt-logid': 'log-1' })
    );

    const error = await submitter.submit(SUBJECT_PAYLOAD, extractSubjectId).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SubmissionError);
    expect(error).toMatchObject({ code: 'SUBMISSION_REJECTED', status: 400, requestId: 'log-1' });
  });

  it('should wrap transport failures', async () => {
    transport.send.mockRejectedValueOnce(NetworkError.connectionReset());

    await expect(submitter.submit(SUBJECT_PAYLOAD, extractSubjectId)).rejects.toMatchObject({
      name: 'SubmissionError',
      code: 'SUBMISSION_FAILED',
    });
  });

  it('should reject an unparseable body', async () => {
    transport.send.mockResolvedValueOnce(textResponse('<html>gateway</html>'));

    await expect(submitter.submit(SUBJECT_PAYLOAD, extractSubjectId)).rejects.toMatchObject({
      code: 'INVALID_RESPONSE_BODY',
    });
  });
});

describe('TokenTaskSubmitter', () => {
  let transport: MockHttpTransport;
  let submitter: TokenTaskSubmitter;

  beforeEach(() => {
    transport = createMockHttpTransport();
    submitter = new TokenTaskSubmitter({
      transport,
      credentials: { token: new SecretString('test-token') },
      config: { endpoint: 'https://ark.example.com/api/v3' },
      logger: createMockLogger(),
    });
  });

  it('should POST with a bearer token and return the task ID', async () => {
    transport.send.mockResolvedValueOnce(jsonResponse({ id: 'cgt-001' }));

    const handle = await submitter.submit({ model: 'doubao-seedance-1-0-pro-250528', content: [] });

    expect(handle).toEqual({ kind: 'pending', taskId: 'cgt-001' });
    const request = sentRequest(transport, 0);
    expect(request.url).toBe('https://ark.example.com/api/v3/contents/generations/tasks');
    expect(request.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-token',
    });
    expect(sentJson(transport, 0)).toEqual({ model: 'doubao-seedance-1-0-pro-250528', content: [] });
  });

  it('should reject a response without an id', async () => {
    transport.send.mockResolvedValueOnce(jsonResponse({ error: { message: 'bad model' } }));

    await expect(submitter.submit({ model: 'x' })).rejects.toMatchObject({
      code: 'MISSING_TASK_ID',
    });
  });
});
