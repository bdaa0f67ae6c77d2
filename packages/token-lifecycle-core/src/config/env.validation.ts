import * as Joi from "joi";
import {
  DEFAULT_CONFIG,
  TokenManagerConfig,
  TokenStoreConfig,
  TokenValidationError,
} from "../core/interfaces";

export const DEFAULT_STORE_PREFIX = "tokenward";

const MAX_TTL_SECONDS = 365 * 24 * 60 * 60;

export interface TokenEnv {
  TOKEN_ACCESS_TTL_SECONDS: number;
  TOKEN_REFRESH_TTL_SECONDS: number;
  TOKEN_STORE: "memory" | "redis";
  REDIS_URL?: string;
  TOKEN_STORE_PREFIX: string;
  TOKEN_EVENTS_ENABLED: boolean;
}

export interface LoadedTokenConfig {
  manager: TokenManagerConfig;
  store: TokenStoreConfig;
}

export const envValidationSchema = Joi.object<TokenEnv>({
  TOKEN_ACCESS_TTL_SECONDS: Joi.number()
    .integer()
    .positive()
    .max(MAX_TTL_SECONDS)
    .default(DEFAULT_CONFIG.accessTtl),
  TOKEN_REFRESH_TTL_SECONDS: Joi.number()
    .integer()
    .positive()
    .max(MAX_TTL_SECONDS)
    .default(DEFAULT_CONFIG.refreshTtl),
  TOKEN_STORE: Joi.string().valid("memory", "redis").default("memory"),
  REDIS_URL: Joi.string()
    .uri({ scheme: ["redis", "rediss"] })
    .when("TOKEN_STORE", { is: "redis", then: Joi.required() }),
  TOKEN_STORE_PREFIX: Joi.string().default(DEFAULT_STORE_PREFIX),
  TOKEN_EVENTS_ENABLED: Joi.boolean().default(DEFAULT_CONFIG.enableEvents),
}).unknown(true);

/**
 * Reads token settings from environment variables
 * @throws TokenValidationError listing every problem found
 */
export function loadTokenManagerConfig(
  env: NodeJS.ProcessEnv = process.env
): LoadedTokenConfig {
  const { value, error } = envValidationSchema.validate(env, {
    abortEarly: false,
    convert: true,
  });

  if (error) {
    throw new TokenValidationError(
      error.details.map((detail) => detail.message).join("; "),
      { keys: error.details.map((detail) => detail.path.join(".")) }
    );
  }

  const manager: TokenManagerConfig = {
    accessTtl: value.TOKEN_ACCESS_TTL_SECONDS,
    refreshTtl: value.TOKEN_REFRESH_TTL_SECONDS,
    enableEvents: value.TOKEN_EVENTS_ENABLED,
  };

  if (value.TOKEN_STORE === "redis" && value.REDIS_URL) {
    return {
      manager,
      store: {
        type: "redis",
        url: value.REDIS_URL,
        keyPrefix: value.TOKEN_STORE_PREFIX,
      },
    };
  }

  return { manager, store: { type: "memory" } };
}
