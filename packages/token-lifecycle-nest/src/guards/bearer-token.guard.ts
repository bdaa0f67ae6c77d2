import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
  ServiceUnavailableException,
  UnauthorizedException,
} from "@nestjs/common";
import { InvalidTokenError, TokenManager, TokenStoreError } from "@tokenward/core";
import { extractBearerToken } from "../bearer";
import { InjectTokenManager } from "../decorators";
import { TokenAwareRequest } from "../interfaces";

/**
 * Admits requests carrying a live access token and attaches the validated
 * token to `request.token`.
 */
@Injectable()
export class BearerTokenGuard implements CanActivate {
  private readonly logger = new Logger(BearerTokenGuard.name);

  constructor(@InjectTokenManager() private readonly tokens: TokenManager) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<TokenAwareRequest>();
    const rawToken = extractBearerToken(request.headers["authorization"]);

    if (!rawToken) {
      throw new UnauthorizedException("Missing bearer token");
    }

    try {
      const token = await this.tokens.validateToken(rawToken);

      if (token.kind !== "access") {
        throw new InvalidTokenError();
      }

      request.token = token;
      return true;
    } catch (error) {
      if (error instanceof InvalidTokenError) {
        throw new UnauthorizedException("Invalid token");
      }

      if (error instanceof TokenStoreError) {
        this.logger.error(`Token store unavailable: ${error.message}`);
        throw new ServiceUnavailableException();
      }

      throw error;
    }
  }
}
