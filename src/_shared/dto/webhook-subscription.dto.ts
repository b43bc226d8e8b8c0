import {
  IsString,
  IsNotEmpty,
  IsOptional,
  IsArray,
  ArrayNotEmpty,
  IsUrl,
  IsInt,
  IsBoolean,
  Min,
  Max,
  Length,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform, Type } from 'class-transformer';
import { queryBoolean } from './query-boolean';
import { WebhookEventType } from '../../core/domain/enums';

/**
 * DTO for registering a webhook subscription
 */
export class RegisterWebhookDto {
  @ApiProperty({ example: 'Order service', minLength: 1, maxLength: 255 })
  @IsNotEmpty()
  @IsString()
  @Length(1, 255)
  name!: string;

  @ApiProperty({ example: 'https://example.com/hooks/authorizations' })
  @IsUrl({ protocols: ['http', 'https'], require_tld: false })
  url!: string;

  @ApiProperty({
    description: 'Event types to receive',
    enum: WebhookEventType,
    isArray: true,
    example: [WebhookEventType.AUTHORIZATION_REVOKED],
  })
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  events!: string[];

  @ApiPropertyOptional({
    description: 'Signing secret; generated when omitted',
  })
  @IsOptional()
  @IsString()
  @Length(16, 255)
  secret?: string;

  @ApiPropertyOptional({ default: 3, minimum: 1, maximum: 10 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(10)
  maxRetries?: number;

  @ApiPropertyOptional({ default: 60, minimum: 1, maximum: 3600 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(3600)
  retryDelaySeconds?: number;

  @ApiPropertyOptional({ default: 30, minimum: 1, maximum: 60 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(60)
  timeoutSeconds?: number;
}

/**
 * DTO for updating a webhook subscription
 */
export class UpdateWebhookDto {
  @ApiPropertyOptional({ minLength: 1, maxLength: 255 })
  @IsOptional()
  @IsString()
  @Length(1, 255)
  name?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsUrl({ protocols: ['http', 'https'], require_tld: false })
  url?: string;

  @ApiPropertyOptional({ enum: WebhookEventType, isArray: true })
  @IsOptional()
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  events?: string[];

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @Length(16, 255)
  secret?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsBoolean()
  isActive?: boolean;

  @ApiPropertyOptional({ minimum: 1, maximum: 10 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(10)
  maxRetries?: number;

  @ApiPropertyOptional({ minimum: 1, maximum: 3600 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(3600)
  retryDelaySeconds?: number;

  @ApiPropertyOptional({ minimum: 1, maximum: 60 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(60)
  timeoutSeconds?: number;
}

/**
 * DTO for listing deliveries of a webhook
 */
export class ListDeliveriesDto {
  @ApiPropertyOptional()
  @IsOptional()
  @Transform(queryBoolean)
  @IsBoolean()
  isDelivered?: boolean;

  @ApiPropertyOptional({ description: 'Only deliveries that gave up' })
  @IsOptional()
  @Transform(queryBoolean)
  @IsBoolean()
  failed?: boolean;
}

/**
 * Response DTO for inbound protocol webhooks
 */
export class InboundWebhookResponseDto {
  @ApiProperty({ enum: ['processed', 'already_processed'], example: 'processed' })
  status!: 'processed' | 'already_processed';

  @ApiProperty({ example: true })
  success!: boolean;

  @ApiProperty({
    enum: ['processed', 'already_processed', 'rejected', 'failed'],
    example: 'processed',
  })
  outcome!: string;

  @ApiPropertyOptional({ example: 'evt_001' })
  eventId?: string | null;

  @ApiPropertyOptional()
  authorizationId?: string | null;

  @ApiPropertyOptional({ example: 'REVOKED' })
  authorizationStatus?: string | null;

  @ApiPropertyOptional({ example: 'Inbound event processed' })
  message?: string;
}
