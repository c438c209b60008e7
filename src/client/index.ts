export type { VideoGenClient, SeedanceApi, OmniHumanApi } from './interface.js';
export { VideoGenClientImpl } from './client.js';
export {
  createClient,
  createClientFromEnv,
  type ClientOptions,
  type EnvClientOptions,
} from './factory.js';
