import "reflect-metadata";

// ===================== MODULE EXPORTS =====================

export { TokenLifecycleModule } from "./token-lifecycle.module";

// ===================== INTERFACES =====================

export type {
  TokenLifecycleModuleOptions,
  TokenLifecycleModuleAsyncOptions,
  TokenAwareRequest,
} from "./interfaces";

// ===================== GUARDS & DECORATORS =====================

export { BearerTokenGuard } from "./guards/bearer-token.guard";
export { ScopesGuard } from "./guards/scopes.guard";
export { InjectTokenManager, RequireScopes, CurrentToken } from "./decorators";
export { extractBearerToken } from "./bearer";

// ===================== CONSTANTS =====================

export {
  TOKEN_MANAGER_MODULE_OPTIONS,
  TOKEN_MANAGER,
  REQUIRED_SCOPES_KEY,
} from "./constants";

// ===================== RE-EXPORTS FROM CORE =====================

export type {
  ITokenStore,
  TokenEventHandler,
  TokenManagerConfig,
  TokenPair,
  ValidatedToken,
} from "@tokenward/core";

export {
  TokenManager,
  InvalidTokenError,
  TokenStoreError,
  TokenValidationError,
  createMemoryStore,
  InMemoryTokenStore,
  authorize,
} from "@tokenward/core";
