export {
  ArtifactDownloader,
  DOWNLOAD_CHUNK_SIZE,
  rechunk,
  type ArtifactDownloaderOptions,
  type DownloadResult,
} from './downloader.js';
