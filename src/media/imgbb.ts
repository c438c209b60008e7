/**
 * ImgBB media host
 * @module volcengine-video-jobs/media/imgbb
 */

import { readFile } from 'node:fs/promises';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { SecretString } from '../auth/index.js';
import { UploadError, describeError } from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import { bodyText, isSuccessResponse, type HttpTransport } from '../transport/index.js';
import type { MediaHost } from './types.js';

export const IMGBB_UPLOAD_URL = 'https://api.imgbb.com/1/upload';

/**
 * Zod schema for the upload response.
 */
const ImgbbResponseSchema = z
  .object({
    success: z.boolean().optional(),
    status: z.number().optional(),
    data: z.object({ url: z.string().optional() }).passthrough().nullable().optional(),
    error: z.object({ message: z.string().optional() }).passthrough().nullable().optional(),
  })
  .passthrough();

export interface ImgbbMediaHostOptions {
  apiKey: SecretString;
  transport: HttpTransport;
  logger: Logger;
  uploadUrl?: string;
}

/**
 * Publishes files by uploading them base64-encoded. ImgBB takes audio
 * files through the same `image` field.
 */
export class ImgbbMediaHost implements MediaHost {
  private readonly apiKey: SecretString;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly uploadUrl: string;

  constructor(options: ImgbbMediaHostOptions) {
    this.apiKey = options.apiKey;
    this.transport = options.transport;
    this.logger = options.logger;
    this.uploadUrl = options.uploadUrl ?? IMGBB_UPLOAD_URL;
  }

  async publish(path: string, namePrefix: string = 'upload'): Promise<string> {
    let contents: Buffer;
    try {
      contents = await readFile(path);
    } catch (error) {
      throw new UploadError({
        message: `Cannot read media file: ${path}`,
        code: 'MEDIA_FILE_UNREADABLE',
        details: { path },
        cause: error,
      });
    }

    const form = new URLSearchParams({
      key: this.apiKey.expose(),
      image: contents.toString('base64'),
      name: `${namePrefix}_${uuidv4()}`,
    });

    let text: string;
    let status: number;
    try {
      const response = await this.transport.send({
        method: 'POST',
        url: this.uploadUrl,
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: form.toString(),
      });
      text = bodyText(response);
      status = response.status;
      if (!isSuccessResponse(response)) {
        throw new UploadError({
          message: `Media upload failed with HTTP ${status}`,
          code: 'UPLOAD_REJECTED',
          status,
          details: { body: text.slice(0, 500) },
        });
      }
    } catch (error) {
      if (error instanceof UploadError) {
        throw error;
      }
      throw new UploadError({
        message: `Media upload failed: ${describeError(error)}`,
        code: 'UPLOAD_FAILED',
        cause: error,
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new UploadError({
        message: 'Media upload response was not valid JSON',
        code: 'INVALID_RESPONSE_BODY',
        status,
        cause: error,
      });
    }

    const result = ImgbbResponseSchema.safeParse(parsed);
    const url = result.success ? result.data.data?.url : undefined;
    if (!result.success || !result.data.success || !url) {
      const message = result.success ? result.data.error?.message : undefined;
      throw new UploadError({
        message: `Media upload was not accepted: ${message ?? 'no URL returned'}`,
        code: 'UPLOAD_NOT_ACCEPTED',
        status,
      });
    }

    this.logger.info('Media published', { path, url });
    return url;
  }
}
