import { TokenManagerConfig, TokenValidationError } from "./interfaces";

const MAX_USER_ID_LENGTH = 255;
const MAX_SCOPE_LENGTH = 256;
const MAX_SCOPES = 128;
const MAX_TTL = 365 * 24 * 60 * 60; // 1 year in seconds

export class TokenInputValidator {
  validateConfig(config: TokenManagerConfig): void {
    this.validateTtl("accessTtl", config.accessTtl);
    this.validateTtl("refreshTtl", config.refreshTtl);

    if (typeof config.enableEvents !== "boolean") {
      throw new TokenValidationError("enableEvents must be a boolean");
    }
  }

  validateUserId(userId: unknown): string {
    if (typeof userId !== "string") {
      throw new TokenValidationError("userId must be a non-empty string");
    }

    if (userId.trim().length === 0) {
      throw new TokenValidationError("userId cannot be empty");
    }

    if (userId.length > MAX_USER_ID_LENGTH) {
      throw new TokenValidationError(
        `userId too long (maximum ${MAX_USER_ID_LENGTH} characters)`,
        {
          userIdLength: userId.length,
          maxLength: MAX_USER_ID_LENGTH,
        }
      );
    }

    return userId;
  }

  /**
   * Checks every scope and returns them deduplicated and sorted.
   * Takes an array or a set; a bare string is refused rather than split.
   */
  validateScopes(scopes: unknown): string[] {
    const unique = new Set<string>();

    for (const scope of this.toScopeList(scopes)) {
      unique.add(this.validateScope(scope));
    }

    if (unique.size > MAX_SCOPES) {
      throw new TokenValidationError(
        `Too many scopes (maximum ${MAX_SCOPES})`,
        {
          scopeCount: unique.size,
          maxScopes: MAX_SCOPES,
        }
      );
    }

    return Array.from(unique).sort();
  }

  private toScopeList(scopes: unknown): unknown[] {
    if (Array.isArray(scopes)) {
      return scopes;
    }

    if (scopes instanceof Set) {
      return Array.from(scopes);
    }

    throw new TokenValidationError(
      "scopes must be an array or a set of strings",
      { scopesType: typeof scopes }
    );
  }

  private validateScope(scope: unknown): string {
    if (typeof scope !== "string" || scope.length === 0) {
      throw new TokenValidationError("Scope must be a non-empty string");
    }

    if (/\s/.test(scope)) {
      throw new TokenValidationError("Scope cannot contain whitespace", {
        scope,
      });
    }

    if (scope.length > MAX_SCOPE_LENGTH) {
      throw new TokenValidationError(
        `Scope too long (maximum ${MAX_SCOPE_LENGTH} characters)`,
        {
          scopeLength: scope.length,
        }
      );
    }

    return scope;
  }

  private validateTtl(name: string, ttl: unknown): void {
    if (typeof ttl !== "number" || !Number.isInteger(ttl) || ttl <= 0) {
      throw new TokenValidationError(
        `${name} must be a positive integer (seconds)`,
        { [name]: ttl }
      );
    }

    if (ttl > MAX_TTL) {
      throw new TokenValidationError(`${name} too large (maximum 1 year)`, {
        [name]: ttl,
        maxTtl: MAX_TTL,
        ttlDays: Math.round(ttl / (24 * 60 * 60)),
      });
    }
  }
}
