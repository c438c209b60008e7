/**
 * Streaming artifact download
 * @module volcengine-video-jobs/download/downloader
 */

import { mkdir, open, rename, rm } from 'node:fs/promises';
import { dirname } from 'node:path';
import {
  ConfigurationError,
  DownloadError,
  describeError,
  isVideoGenError,
} from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import {
  getContentLength,
  isSuccessResponse,
  type HttpTransport,
} from '../transport/index.js';

/**
 * Largest chunk written in one call
 */
export const DOWNLOAD_CHUNK_SIZE = 8192;

export type DownloadResult =
  | { readonly ok: true; readonly path: string; readonly bytesWritten: number }
  | { readonly ok: false; readonly error: DownloadError };

export interface ArtifactDownloaderOptions {
  transport: HttpTransport;
  logger: Logger;
  chunkSize?: number;
}

/**
 * Split incoming chunks so that no write exceeds `size` bytes
 */
export async function* rechunk(
  source: AsyncIterable<Uint8Array>,
  size: number
): AsyncGenerator<Uint8Array> {
  for await (const chunk of source) {
    for (let offset = 0; offset < chunk.length; offset += size) {
      yield chunk.subarray(offset, Math.min(offset + size, chunk.length));
    }
  }
}

/**
 * Downloads a finished video to disk.
 *
 * Bytes go to `{dest}.part` and the file is renamed into place once complete.
 * When the response declares a Content-Length, the written size must match.
 * A failed download leaves no file behind.
 */
export class ArtifactDownloader {
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly chunkSize: number;

  constructor(options: ArtifactDownloaderOptions) {
    this.transport = options.transport;
    this.logger = options.logger;
    this.chunkSize = options.chunkSize ?? DOWNLOAD_CHUNK_SIZE;

    if (!Number.isInteger(this.chunkSize) || this.chunkSize < 1) {
      throw ConfigurationError.invalidConfig(
        'chunkSize',
        `chunkSize must be a positive integer, got ${this.chunkSize}`
      );
    }
  }

  async download(url: string, destination: string, signal?: AbortSignal): Promise<DownloadResult> {
    const partialPath = `${destination}.part`;

    this.logger.info('Downloading artifact', { destination });

    try {
      const bytesWritten = await this.streamToFile(url, partialPath, signal);
      await rename(partialPath, destination);

      this.logger.info('Artifact downloaded', { destination, bytesWritten });
      return { ok: true, path: destination, bytesWritten };
    } catch (error) {
      await this.removePartial(partialPath);

      const downloadError =
        error instanceof DownloadError
          ? error
          : new DownloadError({
              message: `Artifact download failed: ${describeError(error)}`,
              code: 'DOWNLOAD_FAILED',
              status: isVideoGenError(error) ? error.status : undefined,
              cause: error,
            });

      this.logger.error('Artifact download failed', {
        destination,
        error: downloadError.message,
      });
      return { ok: false, error: downloadError };
    }
  }

  private async streamToFile(url: string, path: string, signal?: AbortSignal): Promise<number> {
    const response = await this.transport.sendStreaming({
      method: 'GET',
      url,
      headers: {},
      signal,
    });

    if (!isSuccessResponse(response)) {
      await response.discard();
      throw DownloadError.httpStatus(response.status, url);
    }

    const expectedSize = getContentLength(response.headers);

    await mkdir(dirname(path), { recursive: true });
    const file = await open(path, 'w');

    let bytesWritten = 0;
    try {
      for await (const chunk of rechunk(response.body, this.chunkSize)) {
        await file.write(chunk);
        bytesWritten += chunk.length;
      }
    } finally {
      await file.close();
    }

    if (expectedSize !== undefined && expectedSize !== bytesWritten) {
      throw DownloadError.incompleteBody(expectedSize, bytesWritten);
    }

    return bytesWritten;
  }

  private async removePartial(path: string): Promise<void> {
    try {
      await rm(path, { force: true });
    } catch (error) {
      this.logger.warn('Partial download could not be removed', {
        path,
        error: describeError(error),
      });
    }
  }
}
