import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from "@nestjs/common";
import type { Request } from "express";

import { ConfigService } from "../config/config.service";

/** Requires `x-api-key` on every route except /health, but only once CONTROL_API_KEY is set. */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  constructor(private readonly configService: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const req = context.switchToHttp().getRequest<Request>();
    const path = req.path ?? req.url;

    if (path === "/health") {
      return true;
    }

    const expected = this.configService.get().controlApiKey;
    if (!expected) {
      return true;
    }

    const apiKey = req.header("x-api-key");
    if (!apiKey) {
      throw new UnauthorizedException("Missing x-api-key header.");
    }

    if (apiKey !== expected) {
      throw new UnauthorizedException("Invalid API key.");
    }

    return true;
  }
}
