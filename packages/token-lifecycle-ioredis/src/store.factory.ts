import {
  ITokenStore,
  TokenStoreConfig,
  createMemoryStore,
} from "@tokenward/core";
import { Redis } from "ioredis";
import { IoredisTokenStore } from "./ioredis.adapter";

/**
 * Builds the store named by configuration. The Redis client connects lazily,
 * on its first command.
 */
export function createTokenStore(config: TokenStoreConfig): ITokenStore {
  switch (config.type) {
    case "memory":
      return createMemoryStore();
    case "redis":
      return new IoredisTokenStore(
        new Redis(config.url, { lazyConnect: true }),
        { keyPrefix: config.keyPrefix }
      );
  }
}
