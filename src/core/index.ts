export { Router, MATCHER_SETTINGS } from './router.js';
export type { RouterOptions } from './router.js';
export { McpConnection, createTransport } from './connection.js';
export type { ClientInfo } from './connection.js';
export { ToolMatcher, ToolIndexSchema, cosineSimilarity, combineScores } from './matcher.js';
export type { ToolIndex } from './matcher.js';
export { OpenAIEmbedder } from './embeddings.js';
export { ToolGateway, ROUTE_TOOLS, EXECUTE_TOOL, LIST_SERVERS } from './gateway.js';
export type { GatewayRouter } from './gateway.js';
export {
  loadRouterConfig,
  parseRouterConfig,
  buildRegistry,
  resolveRuntimeSettings,
  transportOf,
  ServerConfigSchema,
  RouterConfigSchema,
  DEFAULT_EMBEDDING_BASE_URL,
  DEFAULT_EMBEDDING_MODEL,
  LEGACY_ENV_NAMES,
} from './config.js';
export type { ServerConfig, RouterConfig, RouterConfigInput, RuntimeSettings } from './config.js';
export * from './errors.js';
export type * from './types.js';
