/**
 * Factory functions for creating clients
 * @module volcengine-video-jobs/client
 */

import {
  ChainCredentialsProvider,
  KeyFileCredentialsProvider,
  StaticCredentialsProvider,
  type Credentials,
  type CredentialsProvider,
  type KeyFileLocations,
} from '../auth/index.js';
import {
  createConfigFromEnv,
  normalizeConfig,
  type NormalizedVideoGenConfig,
  type VideoGenConfig,
} from '../config/index.js';
import { ArtifactDownloader } from '../download/index.js';
import { ImgbbMediaHost, type MediaHost } from '../media/index.js';
import { ConsoleLogger, type Logger } from '../observability/index.js';
import { TaskPoller } from '../tasks/index.js';
import { createFetchTransport, type HttpTransport } from '../transport/index.js';
import { VideoGenClientImpl } from './client.js';
import type { VideoGenClient } from './interface.js';

/**
 * Dependencies that replace the defaults built from configuration
 */
export interface ClientOptions {
  transport?: HttpTransport;
  logger?: Logger;
  mediaHost?: MediaHost;
  /** Credentials used instead of those in the configuration */
  credentials?: Credentials;
  clock?: () => Date;
}

function buildClient(config: NormalizedVideoGenConfig, options: ClientOptions): VideoGenClient {
  const transport = options.transport ?? createFetchTransport(config.timeout);
  const logger = options.logger ?? new ConsoleLogger(config.logLevel);

  const mediaHost =
    options.mediaHost ??
    (config.imgbbApiKey
      ? new ImgbbMediaHost({ apiKey: config.imgbbApiKey, transport, logger })
      : undefined);

  return new VideoGenClientImpl({
    config,
    credentials: options.credentials ?? config.credentials,
    transport,
    logger,
    mediaHost,
    clock: options.clock,
    poller: new TaskPoller({ transport, polling: config.polling, logger }),
    downloader: new ArtifactDownloader({ transport, logger }),
  });
}

/**
 * Creates a client from a configuration object
 *
 * @throws {ConfigurationError} If configuration is invalid
 *
 * @example
 * ```typescript
 * const client = createClient({
 *   accessKeyId: 'my-access-key',
 *   secretAccessKey: 'my-secret-key',
 *   polling: { maxAttempts: 120, intervalMs: 3000 },
 * });
 * ```
 */
export function createClient(config: VideoGenConfig = {}, options: ClientOptions = {}): VideoGenClient {
  return buildClient(normalizeConfig(config), options);
}

export interface EnvClientOptions extends Omit<ClientOptions, 'credentials'> {
  env?: NodeJS.ProcessEnv;
  /** Key files consulted for credentials the environment does not provide */
  keyFiles?: KeyFileLocations;
}

/**
 * Creates a client from environment variables, falling back to key files
 * for missing credentials
 *
 * @throws {ConfigurationError} If a variable is invalid or a key file cannot be read
 */
export async function createClientFromEnv(options: EnvClientOptions = {}): Promise<VideoGenClient> {
  const config = createConfigFromEnv(options.env);

  const providers: CredentialsProvider[] = [new StaticCredentialsProvider(config.credentials)];
  if (options.keyFiles) {
    providers.push(new KeyFileCredentialsProvider(options.keyFiles));
  }
  const credentials = await new ChainCredentialsProvider(providers).getCredentials();

  return buildClient(config, { ...options, credentials });
}
