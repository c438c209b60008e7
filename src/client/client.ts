/**
 * Main client implementation
 * @module volcengine-video-jobs/client
 */

import type { NormalizedVideoGenConfig } from '../config/index.js';
import { OmniHumanService, SeedanceService, type ServiceContext } from '../services/index.js';
import type { HttpTransport } from '../transport/index.js';
import type { OmniHumanApi, SeedanceApi, VideoGenClient } from './interface.js';

/**
 * Main client implementation
 *
 * Each service shares the context wired by the factory. The client owns the
 * transport and releases it on close().
 */
export class VideoGenClientImpl implements VideoGenClient {
  readonly seedance: SeedanceApi;

  readonly omnihuman: OmniHumanApi;

  private readonly context: ServiceContext;

  private closed = false;

  constructor(context: ServiceContext) {
    this.context = context;
    this.seedance = new SeedanceService(context);
    this.omnihuman = new OmniHumanService(context);
  }

  /**
   * Closes the client and releases all resources
   *
   * @throws {Error} If the client is already closed
   */
  async close(): Promise<void> {
    if (this.closed) {
      throw new Error('Client is already closed');
    }

    this.closed = true;
    await this.context.transport.close();
  }

  /**
   * @internal
   */
  getConfig(): NormalizedVideoGenConfig {
    return this.context.config;
  }

  /**
   * @internal
   */
  getTransport(): HttpTransport {
    return this.context.transport;
  }

  isClosed(): boolean {
    return this.closed;
  }
}
