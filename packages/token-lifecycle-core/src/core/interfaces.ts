// ===================== BASE INTERFACES =====================

export type TokenKind = "access" | "refresh";

export const TOKEN_TYPE = "Bearer";

export interface TokenRecord {
  /** SHA-256 digest of the raw token, used as the storage key */
  digest: string;
  userId: string;
  /** Deduplicated, sorted */
  scopes: string[];
  kind: TokenKind;
  /** Epoch milliseconds */
  issuedAt: number;
  /** Epoch milliseconds, `issuedAt + ttl * 1000` */
  expiresAt: number;
  /** Digest of the opposite-kind token minted in the same generation */
  linkedDigest?: string;
  generation: number;
  /** Lineage shared by every generation of one login */
  sessionId: string;
}

/**
 * Wire shape handed to clients. Only raw secrets leave the manager, never digests.
 */
export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  /** Access token lifetime in seconds */
  expiresIn: number;
  tokenType: typeof TOKEN_TYPE;
}

export interface ValidatedToken {
  userId: string;
  scopes: string[];
  kind: TokenKind;
  issuedAt: number;
  expiresAt: number;
}

// ===================== STORE INTERFACE =====================

export interface ITokenStore {
  /**
   * Saves record under key, replacing any prior value. The key becomes
   * inaccessible after `ttl` seconds.
   */
  put(key: string, record: TokenRecord, ttl: number): Promise<void>;

  /**
   * Gets record by key
   * @returns TokenRecord or null if key not found or expired
   */
  get(key: string): Promise<TokenRecord | null>;

  /**
   * Deletes key. Absent keys are not an error.
   * @returns true when a live record was removed by this call
   */
  delete(key: string): Promise<boolean>;

  /**
   * Checks store health
   */
  health(): Promise<boolean>;
}

// ===================== CODEC INTERFACE =====================

export interface ITokenCodec {
  /**
   * Produces a fresh unguessable URL-safe secret carrying no claims
   */
  newSecret(): string;

  /**
   * One-way, deterministic storage key for a raw token
   */
  digest(rawToken: string): string;

  /**
   * Cheap shape check run before any store lookup
   */
  isWellFormed(rawToken: string): boolean;
}

// ===================== EVENT HANDLER INTERFACE =====================

/**
 * Notified after the store writes of an operation succeed. Dispatch does not
 * block: the operation returns without waiting for handlers to settle, and a
 * rejected handler is logged, never rethrown.
 */
export interface TokenEventHandler {
  /**
   * Called when a new pair is written by generateToken
   */
  onTokenIssued?(access: TokenRecord, refresh: TokenRecord): Promise<void>;

  /**
   * Called when a refresh token was consumed and replaced
   */
  onTokenRefreshed?(
    previous: TokenRecord,
    access: TokenRecord,
    refresh: TokenRecord
  ): Promise<void>;

  /**
   * Called when a revocation removed a live record
   */
  onTokenRevoked?(digest: string): Promise<void>;
}

// ===================== CONFIGURATION =====================

export interface TokenManagerConfig {
  /**
   * Access token TTL in seconds (1 hour)
   */
  accessTtl: number;

  /**
   * Refresh token TTL in seconds (24 hours)
   */
  refreshTtl: number;

  /**
   * Enable event handlers
   */
  enableEvents: boolean;
}

export const DEFAULT_CONFIG: TokenManagerConfig = Object.freeze({
  accessTtl: 60 * 60, // 1 hour in seconds
  refreshTtl: 24 * 60 * 60, // 24 hours in seconds
  enableEvents: true,
});

export type TokenStoreConfig =
  | { type: "memory" }
  | { type: "redis"; url: string; keyPrefix: string };

// ===================== ERROR CLASSES =====================

export abstract class TokenLifecycleError extends Error {
  abstract readonly code: string;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;

    // For proper instanceof in TypeScript
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      stack: this.stack,
    };
  }
}

export class TokenValidationError extends TokenLifecycleError {
  readonly code = "VALIDATION_ERROR";

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Validation failed: ${message}`, context);
  }
}

/**
 * Absent, expired, revoked, malformed and wrong-kind tokens all raise this
 * same error with the same message.
 */
export class InvalidTokenError extends TokenLifecycleError {
  readonly code = "INVALID_TOKEN";

  constructor() {
    super("Invalid token");
  }
}

export class TokenStoreError extends TokenLifecycleError {
  readonly code: string = "STORE_FAILURE";

  constructor(
    operation: string,
    originalError: Error,
    context?: Record<string, unknown>
  ) {
    super(`Store operation '${operation}' failed: ${originalError.message}`, {
      ...context,
      operation,
      originalError: originalError.message,
    });
  }
}

export class TokenStoreConnectionError extends TokenStoreError {
  readonly code: string = "STORE_CONNECTION_ERROR";
}

// ===================== UTILITY TYPES =====================

export type TokenOperation =
  | "generate"
  | "validate"
  | "refresh"
  | "revoke"
  | "health";
