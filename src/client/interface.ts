/**
 * Client interface
 * @module volcengine-video-jobs/client
 */

import type {
  JobResult,
  OmniHumanVideoRequest,
  SeedanceRequest,
  SubjectIdentification,
  SubjectIdentificationRequest,
  VideoArtifact,
} from '../services/index.js';

/**
 * Seedance image-to-video jobs
 */
export interface SeedanceApi {
  generate(request: SeedanceRequest): Promise<JobResult<VideoArtifact>>;
}

/**
 * OmniHuman subject identification and video generation
 */
export interface OmniHumanApi {
  identifySubject(request: SubjectIdentificationRequest): Promise<JobResult<SubjectIdentification>>;
  generateVideo(request: OmniHumanVideoRequest): Promise<JobResult<VideoArtifact>>;
}

/**
 * Video generation client
 *
 * @example
 * ```typescript
 * const client = createClient({ apiKey: 'my-api-key' });
 *
 * try {
 *   const result = await client.seedance.generate({
 *     image: { url: 'https://example.com/first-frame.png' },
 *     prompt: 'clouds drifting over the city',
 *   });
 *   if (result.ok) {
 *     console.log(result.value.path);
 *   }
 * } finally {
 *   await client.close();
 * }
 * ```
 */
export interface VideoGenClient {
  readonly seedance: SeedanceApi;
  readonly omnihuman: OmniHumanApi;

  /**
   * Closes the client and releases the transport
   */
  close(): Promise<void>;
}
