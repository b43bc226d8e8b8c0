import {
  IsString,
  IsNotEmpty,
  IsOptional,
  IsEnum,
  IsObject,
  IsInt,
  IsBoolean,
  Min,
  Max,
  Length,
  Matches,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform, Type } from 'class-transformer';
import { queryBoolean } from './query-boolean';
import {
  AuthorizationStatus,
  Protocol,
  VerificationStatus,
} from '../../core/domain/enums';

/**
 * DTO for submitting a credential
 */
export class CreateAuthorizationDto {
  @ApiProperty({
    description: 'Credential protocol',
    enum: Protocol,
    example: Protocol.ACP,
  })
  @IsNotEmpty()
  @IsString()
  protocol!: string;

  @ApiProperty({
    description:
      'Protocol payload: { vc_jwt } for AP2, the token object for ACP',
    example: {
      token_id: 'acp_tok_001',
      psp_id: 'psp-demo',
      merchant_id: 'merchant-demo',
      max_amount: '1000.00',
      currency: 'USD',
      expires_at: '2030-01-01T00:00:00Z',
      constraints: {},
      signature: '<hmac-sha256 hex>',
    },
  })
  @IsObject()
  payload!: Record<string, unknown>;

  @ApiPropertyOptional({
    description: 'User or system submitting the credential',
    example: 'checkout-service',
  })
  @IsOptional()
  @IsString()
  createdBy?: string;
}

/**
 * DTO for revoking an authorization
 */
export class RevokeAuthorizationDto {
  @ApiProperty({
    description: 'Why the authorization is revoked',
    example: 'Customer withdrew consent',
    minLength: 1,
    maxLength: 1000,
  })
  @IsNotEmpty()
  @IsString()
  @Length(1, 1000)
  reason!: string;

  @ApiPropertyOptional({
    description: 'Additional context stored on the audit event',
  })
  @IsOptional()
  @IsObject()
  metadata?: Record<string, unknown>;
}

/**
 * DTO for recording a usage against an authorization
 */
export class RecordUsageDto {
  @ApiPropertyOptional({
    description: 'Amount used, as a decimal string',
    example: '125.50',
  })
  @IsOptional()
  @IsString()
  @Matches(/^\d+(\.\d{1,2})?$/, {
    message: 'amount must be a decimal with at most two fraction digits',
  })
  amount?: string;

  @ApiPropertyOptional({
    description: 'ISO 4217 currency code',
    example: 'USD',
    pattern: '^[A-Z]{3}$',
  })
  @IsOptional()
  @IsString()
  @Matches(/^[A-Z]{3}$/, {
    message: 'currency must be a valid 3-letter ISO 4217 code',
  })
  currency?: string;

  @ApiPropertyOptional({ example: 'txn_123' })
  @IsOptional()
  @IsString()
  transactionId?: string;

  @ApiPropertyOptional({ example: 'merchant-demo' })
  @IsOptional()
  @IsString()
  merchantId?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsObject()
  metadata?: Record<string, unknown>;
}

/**
 * DTO for soft deletion
 */
export class DeleteAuthorizationDto {
  @ApiPropertyOptional({
    description: 'Days to keep the record before it is purged',
    minimum: 1,
    maximum: 3650,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(3650)
  retentionDays?: number;
}

/**
 * DTO for listing authorizations
 */
export class ListAuthorizationsDto {
  @ApiPropertyOptional({ enum: Protocol })
  @IsOptional()
  @IsEnum(Protocol)
  protocol?: Protocol;

  @ApiPropertyOptional({ enum: AuthorizationStatus })
  @IsOptional()
  @IsEnum(AuthorizationStatus)
  status?: AuthorizationStatus;

  @ApiPropertyOptional({ enum: VerificationStatus })
  @IsOptional()
  @IsEnum(VerificationStatus)
  verificationStatus?: VerificationStatus;

  @ApiPropertyOptional({ description: 'Issuer DID or PSP id' })
  @IsOptional()
  @IsString()
  issuer?: string;

  @ApiPropertyOptional({ description: 'Subject DID or merchant id' })
  @IsOptional()
  @IsString()
  subject?: string;

  @ApiPropertyOptional({ default: false })
  @IsOptional()
  @Transform(queryBoolean)
  @IsBoolean()
  includeDeleted?: boolean;

  @ApiPropertyOptional({ default: 1, minimum: 1 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  page?: number = 1;

  @ApiPropertyOptional({ default: 50, minimum: 1, maximum: 500 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(500)
  limit?: number = 50;
}

/**
 * DTO for reading a single authorization
 */
export class GetAuthorizationDto {
  @ApiPropertyOptional({
    description: 'Return the record even if it was soft-deleted',
    default: false,
  })
  @IsOptional()
  @Transform(queryBoolean)
  @IsBoolean()
  includeDeleted?: boolean;
}
