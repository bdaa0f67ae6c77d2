import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Injectable,
} from "@nestjs/common";
import { Reflector } from "@nestjs/core";
import { authorize } from "@tokenward/core";
import { REQUIRED_SCOPES_KEY } from "../constants";
import { TokenAwareRequest } from "../interfaces";

@Injectable()
export class ScopesGuard implements CanActivate {
  constructor(private readonly reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const required = this.reflector.getAllAndOverride<string[] | undefined>(
      REQUIRED_SCOPES_KEY,
      [context.getHandler(), context.getClass()]
    );

    if (!required || required.length === 0) {
      return true;
    }

    const { token } = context.switchToHttp().getRequest<TokenAwareRequest>();

    if (!token) {
      throw new ForbiddenException("Token not authenticated");
    }

    if (!authorize(token.scopes, required)) {
      throw new ForbiddenException(
        `Token does not have required scopes: [${required.join(", ")}]`
      );
    }

    return true;
  }
}
