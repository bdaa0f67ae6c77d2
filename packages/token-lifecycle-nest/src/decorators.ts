import {
  ExecutionContext,
  Inject,
  SetMetadata,
  createParamDecorator,
} from "@nestjs/common";
import { ValidatedToken } from "@tokenward/core";
import { REQUIRED_SCOPES_KEY, TOKEN_MANAGER } from "./constants";
import { TokenAwareRequest } from "./interfaces";

/**
 * Inject token manager
 */
export const InjectTokenManager = () => Inject(TOKEN_MANAGER);

/**
 * Route or controller needs every listed scope. Checked by ScopesGuard.
 */
export const RequireScopes = (...scopes: string[]) =>
  SetMetadata(REQUIRED_SCOPES_KEY, scopes);

/**
 * The token BearerTokenGuard attached to the request
 */
export const CurrentToken = createParamDecorator(
  (_data: unknown, context: ExecutionContext): ValidatedToken | undefined =>
    context.switchToHttp().getRequest<TokenAwareRequest>().token
);
