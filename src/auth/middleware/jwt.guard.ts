import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import type { Request } from 'express';
import { AuthenticationError } from '../../common/errors/application.errors';

export interface ClientClaims {
  sub: string;
  iat?: number;
  exp?: number;
}

export type AuthenticatedRequest = Request & { clientId?: string };

/** Accepts the bearer tokens minted by AuthService. */
@Injectable()
export class JwtGuard implements CanActivate {
  constructor(private readonly jwt: JwtService) {}

  async canActivate(ctx: ExecutionContext): Promise<boolean> {
    const req = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = this.extractToken(req);
    if (!token) throw new AuthenticationError('Missing bearer token');

    let claims: ClientClaims;
    try {
      claims = await this.jwt.verifyAsync<ClientClaims>(token);
    } catch (err) {
      throw new AuthenticationError('Invalid or expired token', {
        reason: err instanceof Error ? err.name : 'unknown',
      });
    }
    if (typeof claims.sub !== 'string' || !claims.sub) {
      throw new AuthenticationError('Invalid or expired token');
    }

    req.clientId = claims.sub;
    return true;
  }

  private extractToken(req: Request): string | undefined {
    const auth = req.headers.authorization;
    if (auth?.startsWith('Bearer ')) {
      return auth.slice('Bearer '.length).trim() || undefined;
    }
    return undefined;
  }
}
