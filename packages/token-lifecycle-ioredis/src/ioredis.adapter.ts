import {
  DEFAULT_STORE_PREFIX,
  ITokenStore,
  TokenRecord,
  TokenStoreConnectionError,
  TokenStoreError,
  parseTokenRecord,
} from "@tokenward/core";
import { Logger } from "@nestjs/common";
import { Redis, Cluster } from "ioredis";

export interface IoredisStoreOptions {
  keyPrefix?: string;
}

export const DEFAULT_PREFIX = DEFAULT_STORE_PREFIX;

const CONNECTION_CODES = [
  "ECONNREFUSED",
  "ENOTFOUND",
  "ECONNRESET",
  "ENETUNREACH",
  "EHOSTUNREACH",
  "ETIMEDOUT",
];

/**
 * Redis-backed store. Expiry is delegated to Redis (`SET ... EX`).
 *
 * `DEL` is atomic per key, so the single-use refresh guarantee holds across
 * every manager sharing the same Redis. The delete-then-recreate sequence of
 * a rotation is not transactional: a concurrent validation in between sees the
 * old token as invalid.
 */
export class IoredisTokenStore implements ITokenStore {
  private readonly logger = new Logger(IoredisTokenStore.name);
  private readonly keyPrefix: string;

  constructor(
    private readonly redis: Redis | Cluster,
    options: IoredisStoreOptions = {}
  ) {
    this.keyPrefix = options.keyPrefix || DEFAULT_PREFIX;
  }

  async put(key: string, record: TokenRecord, ttl: number): Promise<void> {
    try {
      await this.redis.set(
        this.getTokenKey(key),
        JSON.stringify(record),
        "EX",
        ttl
      );
    } catch (error) {
      throw this.toStoreError("put", error, key);
    }
  }

  async get(key: string): Promise<TokenRecord | null> {
    let data: string | null;

    try {
      data = await this.redis.get(this.getTokenKey(key));
    } catch (error) {
      throw this.toStoreError("get", error, key);
    }

    if (data === null) {
      return null;
    }

    try {
      return parseTokenRecord(JSON.parse(data));
    } catch (parseError) {
      this.logger.error(`Unreadable token record under ${this.shortKey(key)}`);
      throw new TokenStoreError("get", this.toError(parseError), {
        key: this.shortKey(key),
      });
    }
  }

  async delete(key: string): Promise<boolean> {
    try {
      const removed = await this.redis.del(this.getTokenKey(key));
      return removed > 0;
    } catch (error) {
      throw this.toStoreError("delete", error, key);
    }
  }

  async health(): Promise<boolean> {
    try {
      const result = await this.redis.ping();
      return result === "PONG";
    } catch {
      return false;
    }
  }

  /**
   * Closes the underlying connection
   */
  async close(): Promise<void> {
    try {
      await this.redis.quit();
    } catch (error) {
      this.logger.warn(
        `Redis quit failed, disconnecting: ${this.toError(error).message}`
      );
      this.redis.disconnect();
    }
  }

  getTokenKey(key: string): string {
    return `${this.keyPrefix}:${key}`;
  }

  // ===================== PRIVATE METHODS =====================

  private toStoreError(
    operation: string,
    error: unknown,
    key: string
  ): TokenStoreError {
    const cause = this.toError(error);
    const context = { key: this.shortKey(key) };

    if (this.isConnectionError(cause)) {
      return new TokenStoreConnectionError(operation, cause, context);
    }

    return new TokenStoreError(operation, cause, context);
  }

  private toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
  }

  private shortKey(key: string): string {
    return key.substring(0, 8) + "...";
  }

  private isConnectionError(error: Error): boolean {
    if (
      "code" in error &&
      typeof error.code === "string" &&
      CONNECTION_CODES.includes(error.code)
    ) {
      return true;
    }

    const msg = error.message.toLowerCase();
    return (
      msg.includes("connection") ||
      msg.includes("connect") ||
      msg.includes("timeout")
    );
  }
}
