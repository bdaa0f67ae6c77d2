import {
  ITokenStore,
  TokenEventHandler,
  TokenManagerConfig,
  ValidatedToken,
} from "@tokenward/core";
import { FactoryProvider, ModuleMetadata } from "@nestjs/common";

export interface TokenLifecycleModuleOptions {
  /**
   * Token manager configuration
   */
  config?: Partial<TokenManagerConfig>;

  /**
   * Store factory function, in-memory store when omitted
   */
  storeFactory?: () => ITokenStore | Promise<ITokenStore>;

  /**
   * Global module flag
   */
  global?: boolean;

  /**
   * event handlers
   */
  eventHandlers?: TokenEventHandler[];
}

export interface TokenLifecycleModuleAsyncOptions
  extends Pick<ModuleMetadata, "imports"> {
  /**
   * Global module flag
   */
  global?: boolean;

  /**
   * Factory function to create options
   */
  useFactory: FactoryProvider<TokenLifecycleModuleOptions>["useFactory"];

  /**
   * Dependencies to inject
   */
  inject?: FactoryProvider["inject"];
}

/**
 * Request shape the guards read from and write to
 */
export interface TokenAwareRequest {
  headers: Record<string, string | string[] | undefined>;
  token?: ValidatedToken;
}
