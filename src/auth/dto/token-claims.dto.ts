import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsString,
  Min,
  ValidateIf,
} from 'class-validator';
import {
  TOKEN_KINDS,
  TOKEN_TYPES,
  TokenKind,
  TokenType,
} from '../shared/interfaces/token-claims.interface';

/** Shape check for a verified JWT payload before it becomes `TokenClaims`. */
export class TokenClaimsDto {
  @IsString()
  @IsNotEmpty()
  sub!: string;

  @IsIn(TOKEN_KINDS)
  kind!: TokenKind;

  @IsIn(TOKEN_TYPES)
  type!: TokenType;

  @IsString()
  @IsNotEmpty()
  sessionId!: string;

  @IsInt()
  @Min(0)
  iat!: number;

  @IsInt()
  @Min(0)
  exp!: number;

  @ValidateIf((claims: TokenClaimsDto) => claims.kind === 'impersonation')
  @IsString()
  @IsNotEmpty()
  adminId?: string;
}
