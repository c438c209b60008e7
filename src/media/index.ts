export type { MediaHost, MediaSource } from './types.js';
export { ImgbbMediaHost, IMGBB_UPLOAD_URL, type ImgbbMediaHostOptions } from './imgbb.js';
