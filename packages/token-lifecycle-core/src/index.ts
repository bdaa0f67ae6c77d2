// ===================== CORE EXPORTS =====================

// Main service
export { TokenManager, TokenManagerFactory } from "./core/service";
export type { TokenManagerDependencies } from "./core/service";

// Interfaces, errors, constants
export * from "./core/interfaces";

// Codec
export { OpaqueTokenCodec, defaultCodec } from "./core/codec";

// Scope authorization
export { authorize, createScopeGate } from "./core/scopes";
export type { ScopeGate, ScopeSet } from "./core/scopes";

// Validation
export { TokenInputValidator } from "./core/validators";
export { tokenRecordSchema, parseTokenRecord } from "./core/record.schema";

// Configuration
export {
  envValidationSchema,
  loadTokenManagerConfig,
  DEFAULT_STORE_PREFIX,
} from "./config/env.validation";
export type { TokenEnv, LoadedTokenConfig } from "./config/env.validation";

// Stores
export {
  InMemoryTokenStore,
  createMemoryStore,
} from "./adapters/memory.adapter";
export type { InMemoryStoreOptions } from "./adapters/memory.adapter";
