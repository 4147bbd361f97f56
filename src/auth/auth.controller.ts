import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { AuthService, TokenResponse } from './auth.service';
import { TokenRequestDto } from './dto/token-request.dto';

@Controller('integration/box/1.0')
export class AuthController {
  constructor(private readonly auth: AuthService) {}

  @Post('token')
  @HttpCode(HttpStatus.OK)
  token(@Body() dto: TokenRequestDto): Promise<TokenResponse> {
    return this.auth.issueToken(dto);
  }
}
