/**
 * 类型定义统一导出
 */

export {
  ConfigSchema,
  DEFAULT_SERVER,
} from './config.js';

export type {
  Config,
  ConfigInput,
} from './config.js';

export type {
  ItemKind,
  ItemSnapshot,
  ItemsResponse,
  ItemResponse,
  ErrorPayload,
  FieldKind,
  FieldDefinition,
  FieldValue,
  SpaceRole,
  RoleAssignment,
} from './item.js';

export type {
  PendingChallenge,
  Credential,
  CodeProvider,
} from './auth.js';
