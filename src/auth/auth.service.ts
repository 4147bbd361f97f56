import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { AuthenticationError } from '../common/errors/application.errors';
import { secureCompare } from '../common/utils/secure-compare';
import { requireString } from '../config/config.helpers';
import { TokenRequestDto } from './dto/token-request.dto';
import type { ClientClaims } from './middleware/jwt.guard';

export const TOKEN_TTL_SECONDS = 86_400;

export interface TokenResponse {
  access_token: string;
  token_type: 'Bearer';
  expires_in: number;
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);
  private readonly clientId: string;
  private readonly clientSecret: string;

  constructor(
    cfg: ConfigService,
    private readonly jwt: JwtService,
  ) {
    this.clientId = requireString(cfg, 'CLIENT_ID');
    this.clientSecret = requireString(cfg, 'CLIENT_SECRET');
  }

  // Client-credentials grant: both values compared in constant time
  async issueToken(dto: TokenRequestDto): Promise<TokenResponse> {
    const idOk = secureCompare(this.clientId, dto.client_id);
    const secretOk = secureCompare(this.clientSecret, dto.client_secret);
    if (!idOk || !secretOk) {
      this.logger.warn(
        `[token] rejected client_id=${dto.client_id.slice(0, 10)}`,
      );
      throw new AuthenticationError('Invalid client credentials');
    }

    const claims: ClientClaims = { sub: dto.client_id };
    const accessToken = await this.jwt.signAsync(claims);
    this.logger.log(`[token] issued client_id=${dto.client_id}`);

    return {
      access_token: accessToken,
      token_type: 'Bearer',
      expires_in: TOKEN_TTL_SECONDS,
    };
  }
}
