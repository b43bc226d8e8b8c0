import {
  Controller,
  Post,
  Param,
  Body,
  Headers,
  HttpCode,
  HttpStatus,
  BadRequestException,
  InternalServerErrorException,
  UseInterceptors,
  Inject,
  Logger,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { RawBodyInterceptor } from '../interceptors/raw-body.interceptor';
import type { InboundProcessingResult, InboundWebhookProcessor } from '../../../core';
import { ApiAcpWebhookEndpoint } from '../../../_shared/swagger/decorators';
import { InboundWebhookResponseDto } from '../../../_shared/dto';
import { INBOUND_WEBHOOK_PROCESSOR } from '../constants';
import { toHttpException } from '../http-errors';

const OUTCOME_MESSAGES: Record<InboundProcessingResult['outcome'], string> = {
  processed: 'Event applied to authorization',
  already_processed: 'Event was already processed',
  rejected: 'Event rejected',
  failed: 'Event processing failed',
};

/**
 * ACP Webhook Controller
 *
 * Receives token lifecycle events from payment service providers. The body is
 * taken raw so the HMAC signature can be checked over the exact bytes.
 */
@ApiTags('Ingest')
@Controller('protocols/acp/webhooks')
export class AcpWebhookController {
  private readonly logger = new Logger(AcpWebhookController.name);

  constructor(
    @Inject(INBOUND_WEBHOOK_PROCESSOR)
    private readonly processor: InboundWebhookProcessor,
  ) {}

  @Post(':tenantId')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(RawBodyInterceptor)
  @ApiAcpWebhookEndpoint()
  async handleWebhook(
    @Param('tenantId') tenantId: string,
    @Body() rawBody: Buffer,
    @Headers() headers: Record<string, string>,
  ): Promise<InboundWebhookResponseDto> {
    if (!Buffer.isBuffer(rawBody) || rawBody.length === 0) {
      throw new BadRequestException('Webhook body is required');
    }

    const result = await this.processor.process(tenantId, rawBody, headers);

    if (!result.success) {
      this.logger.warn(
        `ACP webhook for tenant ${tenantId} ${result.outcome}: ${result.error?.message ?? 'unknown error'}`,
      );
      if (result.error) {
        throw toHttpException(result.error);
      }
      throw new InternalServerErrorException(OUTCOME_MESSAGES[result.outcome]);
    }

    this.logger.log(
      `ACP webhook ${result.eventId ?? 'unknown'} for tenant ${tenantId}: ${result.outcome}`,
    );

    return {
      status: result.outcome === 'already_processed' ? 'already_processed' : 'processed',
      success: true,
      outcome: result.outcome,
      eventId: result.eventId,
      authorizationId: result.authorizationId,
      authorizationStatus: result.authorizationStatus,
      message: OUTCOME_MESSAGES[result.outcome],
    };
  }
}
