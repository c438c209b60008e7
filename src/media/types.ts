/**
 * Makes local media files reachable by the remote services, which only
 * accept public URLs.
 */
export interface MediaHost {
  /**
   * Upload a local file and return its public URL.
   *
   * @param path - Local file path
   * @param namePrefix - Prefix of the uploaded file's name
   * @throws {UploadError} If the file cannot be read or the host rejects it
   */
  publish(path: string, namePrefix?: string): Promise<string>;
}

/**
 * Media input of a job: a URL the service can fetch, or a local file that is
 * published first
 */
export type MediaSource = { readonly url: string } | { readonly path: string };
