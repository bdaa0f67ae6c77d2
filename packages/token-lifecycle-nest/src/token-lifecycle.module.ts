import { DynamicModule, Module, Provider } from "@nestjs/common";
import {
  TokenManager,
  TokenManagerFactory,
  createMemoryStore,
} from "@tokenward/core";
import {
  TokenLifecycleModuleOptions,
  TokenLifecycleModuleAsyncOptions,
} from "./interfaces";
import { TOKEN_MANAGER_MODULE_OPTIONS, TOKEN_MANAGER } from "./constants";
import { BearerTokenGuard } from "./guards/bearer-token.guard";
import { ScopesGuard } from "./guards/scopes.guard";

const EXPORTS = [TOKEN_MANAGER, BearerTokenGuard, ScopesGuard];

@Module({})
export class TokenLifecycleModule {
  /**
   * Register module with static options
   */
  static forRoot(options: TokenLifecycleModuleOptions = {}): DynamicModule {
    return {
      module: TokenLifecycleModule,
      global: options.global,
      providers: [
        {
          provide: TOKEN_MANAGER_MODULE_OPTIONS,
          useValue: options,
        },
        ...this.createProviders(),
      ],
      exports: EXPORTS,
    };
  }

  /**
   * Register module with async options
   */
  static forRootAsync(options: TokenLifecycleModuleAsyncOptions): DynamicModule {
    return {
      module: TokenLifecycleModule,
      global: options.global,
      imports: options.imports || [],
      providers: [
        {
          provide: TOKEN_MANAGER_MODULE_OPTIONS,
          useFactory: options.useFactory,
          inject: options.inject || [],
        },
        ...this.createProviders(),
      ],
      exports: EXPORTS,
    };
  }

  private static createProviders(): Provider[] {
    return [
      {
        provide: TOKEN_MANAGER,
        useFactory: async (
          moduleOptions: TokenLifecycleModuleOptions
        ): Promise<TokenManager> => {
          const store = moduleOptions.storeFactory
            ? await moduleOptions.storeFactory()
            : createMemoryStore();

          return TokenManagerFactory.create(
            store,
            moduleOptions.config ?? {},
            moduleOptions.eventHandlers ?? []
          );
        },
        inject: [TOKEN_MANAGER_MODULE_OPTIONS],
      },
      BearerTokenGuard,
      ScopesGuard,
    ];
  }
}
