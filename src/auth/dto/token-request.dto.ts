import { Equals, IsNotEmpty, IsString, MaxLength } from 'class-validator';

/** OAuth2 client-credentials grant as sent by CXone. */
export class TokenRequestDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(256)
  client_id!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(256)
  client_secret!: string;

  @Equals('client_credentials', {
    message: 'grant_type must be client_credentials',
  })
  grant_type!: string;
}
