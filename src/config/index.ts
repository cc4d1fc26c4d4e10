export { ConfigInstanceResolver, DEFAULT_CONFIG_PATH } from './instance-resolver.js';
export type { ConfigResolverOptions } from './instance-resolver.js';
export { loadServerConfig, generateSessionId } from './server-config.js';
export type { ServerConfig, ServerMode } from './server-config.js';
