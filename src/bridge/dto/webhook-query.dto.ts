import { IsOptional, IsString, Length, MaxLength } from 'class-validator';

export class WebhookQueryDto {
  @IsString()
  @Length(1, 128)
  signature!: string;

  @IsString()
  @Length(1, 20)
  timestamp!: string;

  @IsString()
  @Length(1, 128)
  nonce!: string;

  // Encrypted mode only
  @IsOptional()
  @IsString()
  @MaxLength(128)
  msg_signature?: string;

  @IsOptional()
  @IsString()
  @MaxLength(128)
  openid?: string;

  @IsOptional()
  @IsString()
  @MaxLength(16)
  encrypt_type?: string;
}

export class EchoQueryDto extends WebhookQueryDto {
  @IsString()
  @Length(1, 128)
  echostr!: string;
}
