/**
 * drydotai - Dry.ai 结构化数据服务的 Node.js 客户端
 */

export {
  SpaceClient,
  createClient,
  createClientFromConfig,
} from './client/space-client.js';
export type { ClientDependencies, CreateClientOptions } from './client/space-client.js';

export { Space } from './client/space.js';
export { Item, ItemType, Folder } from './client/item.js';
export type { SearchOptions } from './client/item.js';
export { SearchResults } from './client/search-results.js';
export { CrudApi } from './client/crud-api.js';
export type { ItemLookup, ItemPage } from './client/crud-api.js';
export { toFieldValue, parseFieldDefinitions } from './client/fields.js';

export { AuthSession } from './auth/auth-session.js';
export type { AuthSessionOptions } from './auth/auth-session.js';
export { TokenStore } from './auth/token-store.js';

export { HttpTransport } from './transport/http-transport.js';
export type { FetchLike, HttpMethod, HttpTransportOptions, RequestOptions } from './transport/http-transport.js';

export { loadConfig } from './config/config-manager.js';
export type { LoadConfigOptions } from './config/config-manager.js';

export {
  DryAIError,
  HttpError,
  ConfigError,
  ValidationError,
  AuthError,
  NotFoundError,
  RateLimitError,
  RemoteError,
  TimeoutError,
  InvalidStateError,
} from './core/errors.js';

export { setLogLevel, createChildLogger } from './core/logger.js';

export * from './types/index.js';
