import { Logger, LoggerService } from "@nestjs/common";
import { v4 as uuidv4 } from "uuid";
import { defaultCodec } from "./codec";
import {
  ITokenCodec,
  ITokenStore,
  InvalidTokenError,
  TokenEventHandler,
  TokenLifecycleError,
  TokenManagerConfig,
  TokenOperation,
  TokenPair,
  TokenRecord,
  TokenStoreError,
  TOKEN_TYPE,
  ValidatedToken,
  DEFAULT_CONFIG,
} from "./interfaces";
import { ScopeSet } from "./scopes";
import { TokenInputValidator } from "./validators";

export interface TokenManagerDependencies {
  codec?: ITokenCodec;
  logger?: LoggerService;
  eventHandlers?: TokenEventHandler[];
}

interface IssuedPair {
  pair: TokenPair;
  access: TokenRecord;
  refresh: TokenRecord;
}

const shortDigest = (digest: string): string => digest.substring(0, 8);

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

/**
 * Issues, validates, rotates and revokes opaque token pairs.
 *
 * Holds no token state of its own: every call goes to the store, so managers
 * sharing one store observe each other's rotations and revocations at once.
 * Managers over separate `InMemoryTokenStore` instances never do.
 *
 * Failures are reported through three error classes:
 * - `TokenValidationError` for bad configuration or arguments
 * - `InvalidTokenError` for any token that must not be honoured, with no reason
 * - `TokenStoreError` when the store could not answer; never retried here
 */
export class TokenManager {
  private readonly eventHandlers: TokenEventHandler[] = [];
  private readonly config: TokenManagerConfig;
  private readonly codec: ITokenCodec;
  private readonly logger: LoggerService;
  private readonly validator = new TokenInputValidator();

  constructor(
    private readonly store: ITokenStore,
    config: Partial<TokenManagerConfig> = {},
    dependencies: TokenManagerDependencies = {}
  ) {
    this.config = Object.freeze({ ...DEFAULT_CONFIG, ...config });
    this.validator.validateConfig(this.config);

    this.codec = dependencies.codec ?? defaultCodec;
    this.logger = dependencies.logger ?? new Logger(TokenManager.name);
    dependencies.eventHandlers?.forEach((handler) =>
      this.registerEventHandler(handler)
    );
  }

  registerEventHandler(handler: TokenEventHandler): void {
    this.eventHandlers.push(handler);
  }

  unregisterEventHandler(handler: TokenEventHandler): void {
    const index = this.eventHandlers.indexOf(handler);
    if (index !== -1) {
      this.eventHandlers.splice(index, 1);
    }
  }

  /**
   * Mints a new access/refresh pair at generation 1 of a new session.
   */
  async generateToken(
    userId: string,
    scopes: ScopeSet = []
  ): Promise<TokenPair> {
    const validUserId = this.validator.validateUserId(userId);
    const validScopes = this.validator.validateScopes(scopes);

    return this.executeOperation("generate", async () => {
      const issued = await this.issuePair(
        validUserId,
        validScopes,
        uuidv4(),
        1
      );

      this.logger.debug?.(
        `Issued token pair for user '${validUserId}' (session ${issued.access.sessionId})`
      );

      this.notifyEventHandlers("onTokenIssued", (handler) =>
        handler.onTokenIssued?.(issued.access, issued.refresh)
      );

      return issued.pair;
    });
  }

  /**
   * Resolves a raw token of either kind. Callers decide whether a refresh
   * token is acceptable where they expect an access token.
   * @throws InvalidTokenError
   */
  async validateToken(rawToken: string): Promise<ValidatedToken> {
    return this.executeOperation("validate", async () => {
      const record = await this.lookup(rawToken);
      if (!record) {
        throw new InvalidTokenError();
      }

      return {
        userId: record.userId,
        scopes: [...record.scopes],
        kind: record.kind,
        issuedAt: record.issuedAt,
        expiresAt: record.expiresAt,
      };
    });
  }

  /**
   * Consumes a refresh token and replaces the whole pair. The previous access
   * token dies with it even if its own TTL has not run out.
   *
   * Single use: of several concurrent calls with the same token only the one
   * whose delete removes the record succeeds, the rest get InvalidTokenError.
   * @throws InvalidTokenError
   */
  async refreshToken(rawRefreshToken: string): Promise<TokenPair> {
    return this.executeOperation("refresh", async () => {
      const record = await this.lookup(rawRefreshToken);
      if (!record) {
        throw new InvalidTokenError();
      }

      if (record.kind !== "refresh") {
        this.logger.warn(
          `Refresh attempted with an access token (${shortDigest(record.digest)})`
        );
        throw new InvalidTokenError();
      }

      const consumed = await this.store.delete(record.digest);
      if (!consumed) {
        this.logger.warn(
          `Refresh token ${shortDigest(record.digest)} was consumed concurrently`
        );
        throw new InvalidTokenError();
      }

      if (record.linkedDigest) {
        await this.store.delete(record.linkedDigest);
      }

      const issued = await this.issuePair(
        record.userId,
        record.scopes,
        record.sessionId,
        record.generation + 1
      );

      this.logger.debug?.(
        `Rotated session ${record.sessionId} to generation ${issued.access.generation}`
      );

      this.notifyEventHandlers("onTokenRefreshed", (handler) =>
        handler.onTokenRefreshed?.(record, issued.access, issued.refresh)
      );

      return issued.pair;
    });
  }

  /**
   * Deletes the record of one token. Does not touch the paired token; use
   * `revokeSession` to end both. Unknown, expired and malformed tokens are a
   * no-op.
   */
  async revokeToken(rawToken: string): Promise<void> {
    return this.executeOperation("revoke", async () => {
      if (!this.codec.isWellFormed(rawToken)) {
        return;
      }

      await this.removeRecord(this.codec.digest(rawToken));
    });
  }

  /**
   * Deletes the presented token and the token paired with it.
   */
  async revokeSession(rawToken: string): Promise<void> {
    return this.executeOperation("revoke", async () => {
      if (!this.codec.isWellFormed(rawToken)) {
        return;
      }

      const digest = this.codec.digest(rawToken);
      const record = await this.store.get(digest);

      await this.removeRecord(digest);

      if (record?.linkedDigest) {
        await this.removeRecord(record.linkedDigest);
      }
    });
  }

  async getHealthStatus(): Promise<boolean> {
    try {
      return await this.executeOperation("health", () => this.store.health());
    } catch {
      return false;
    }
  }

  getConfig(): Readonly<TokenManagerConfig> {
    return this.config;
  }

  getRegisteredEventHandlers(): readonly TokenEventHandler[] {
    return [...this.eventHandlers];
  }

  // ===================== PRIVATE METHODS =====================

  /**
   * Single store read. Expiry is re-checked here because store eviction is
   * best-effort.
   */
  private async lookup(rawToken: string): Promise<TokenRecord | null> {
    if (!this.codec.isWellFormed(rawToken)) {
      return null;
    }

    const digest = this.codec.digest(rawToken);
    const record = await this.store.get(digest);

    if (!record || record.digest !== digest) {
      return null;
    }

    if (record.expiresAt <= Date.now()) {
      return null;
    }

    return record;
  }

  private async issuePair(
    userId: string,
    scopes: string[],
    sessionId: string,
    generation: number
  ): Promise<IssuedPair> {
    const { accessTtl, refreshTtl } = this.config;

    const accessToken = this.codec.newSecret();
    const refreshToken = this.codec.newSecret();
    const accessDigest = this.codec.digest(accessToken);
    const refreshDigest = this.codec.digest(refreshToken);
    const issuedAt = Date.now();

    const access: TokenRecord = {
      digest: accessDigest,
      userId,
      scopes: [...scopes],
      kind: "access",
      issuedAt,
      expiresAt: issuedAt + accessTtl * 1000,
      linkedDigest: refreshDigest,
      generation,
      sessionId,
    };

    const refresh: TokenRecord = {
      digest: refreshDigest,
      userId,
      scopes: [...scopes],
      kind: "refresh",
      issuedAt,
      expiresAt: issuedAt + refreshTtl * 1000,
      linkedDigest: accessDigest,
      generation,
      sessionId,
    };

    await this.store.put(accessDigest, access, accessTtl);

    try {
      await this.store.put(refreshDigest, refresh, refreshTtl);
    } catch (error) {
      // An access token without its refresh half must not stay usable
      await this.store.delete(accessDigest).catch((cleanupError: unknown) => {
        this.logger.warn(
          `Could not remove orphaned access token ${shortDigest(accessDigest)}: ${toError(cleanupError).message}`
        );
      });
      throw error;
    }

    return {
      pair: {
        accessToken,
        refreshToken,
        expiresIn: accessTtl,
        tokenType: TOKEN_TYPE,
      },
      access,
      refresh,
    };
  }

  private async removeRecord(digest: string): Promise<void> {
    const removed = await this.store.delete(digest);
    if (!removed) {
      return;
    }

    this.logger.debug?.(`Revoked token ${shortDigest(digest)}`);

    this.notifyEventHandlers("onTokenRevoked", (handler) =>
      handler.onTokenRevoked?.(digest)
    );
  }

  private async executeOperation<R>(
    operation: TokenOperation,
    fn: () => Promise<R>
  ): Promise<R> {
    try {
      return await fn();
    } catch (error) {
      if (
        error instanceof TokenLifecycleError &&
        !(error instanceof TokenStoreError)
      ) {
        throw error;
      }

      const storeError =
        error instanceof TokenStoreError
          ? error
          : new TokenStoreError(operation, toError(error));

      this.logger.error(`Token ${operation} failed: ${storeError.message}`);
      throw storeError;
    }
  }

  /**
   * Starts every handler and returns at once; the operation does not wait for
   * them. Rejections are logged.
   */
  private notifyEventHandlers(
    event: keyof TokenEventHandler,
    invoke: (handler: TokenEventHandler) => Promise<void> | undefined
  ): void {
    if (!this.config.enableEvents) {
      return;
    }

    for (const handler of this.eventHandlers) {
      void Promise.resolve()
        .then(() => invoke(handler))
        .catch((error: unknown) => {
          this.logger.error(
            `Error in event handler during '${event}': ${toError(error).message}`
          );
        });
    }
  }
}

export class TokenManagerFactory {
  static create(
    store: ITokenStore,
    config: Partial<TokenManagerConfig> = {},
    eventHandlers: TokenEventHandler[] = []
  ): TokenManager {
    return new TokenManager(store, config, { eventHandlers });
  }

  static createDefault(store: ITokenStore): TokenManager {
    return new TokenManager(store, DEFAULT_CONFIG);
  }
}
