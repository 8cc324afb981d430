/**
 * @transcript-sync/core
 *
 * Incremental sync engine for local conversation logs, plus the
 * configuration, credential and API collaborators the CLI wires into it.
 */

// Sync engine
export * from "./sync/index.js";

// Message wire schemas
export {
  ContentPartSchema,
  StructuredRecordSchema,
  LegacyRecordSchema,
} from "./schema/message.js";
export type {
  Message,
  ContentPart,
  StructuredRecord,
  LegacyRecord,
} from "./schema/message.js";

// Configuration
export {
  SyncConfigSchema,
  ConfigFileSchema,
  CONFIG_KEYS,
  CONFIG_DIR_NAME,
  CONFIG_FILE_NAME,
  DEFAULT_API_ENDPOINT,
  createDefaultConfig,
  applyEnvOverrides,
  loadConfig,
  saveConfig,
  getConfigDir,
  getConfigFile,
  isConfigKey,
  parseConfigValue,
} from "./config/config.js";
export type {
  SyncConfig,
  ConfigFile,
  ConfigKey,
  ConfigEnvironment,
} from "./config/config.js";

// Credentials
export {
  StoredCredentialsSchema,
  CREDENTIALS_FILE_NAME,
  TOKEN_ENV_VAR,
  createFileTokenStore,
  createCredentialProvider,
  getCredentialsFile,
  isExpired,
} from "./auth/credentials.js";
export type {
  StoredCredentials,
  TokenStore,
  CredentialProvider,
  CredentialProviderOptions,
} from "./auth/credentials.js";

// Remote API
export {
  createApiClient,
  abortableSleep,
  backoffMs,
  HttpError,
  ApiMessageSchema,
  SyncResponseSchema,
  ConversationSchema,
  ConversationsListResponseSchema,
} from "./api/client.js";
export type {
  ApiClient,
  ApiClientOptions,
  ApiMessage,
  SyncRequest,
  SyncResponse,
  Conversation,
  ConversationsListResponse,
  TokenProvider,
  Sleep,
} from "./api/client.js";
