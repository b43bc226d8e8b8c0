import {
  Controller,
  Get,
  Post,
  Patch,
  Delete,
  Param,
  Query,
  Body,
  HttpCode,
  HttpStatus,
  Inject,
  ParseUUIDPipe,
} from '@nestjs/common';
import { ApiHeader, ApiTags } from '@nestjs/swagger';
import type { JsonObject, WebhookSubscriptionService } from '../../../core';
import {
  ApiRegisterWebhook,
  ApiUpdateWebhook,
  ApiGetWebhook,
  ApiDeactivateWebhook,
  ApiListDeliveries,
} from '../../../_shared/swagger/decorators';
import { RegisterWebhookDto, UpdateWebhookDto, ListDeliveriesDto } from '../../../_shared/dto';
import { TENANT_HEADER, WEBHOOK_SUBSCRIPTION_SERVICE } from '../constants';
import { TenantId } from '../decorators/request-context.decorator';
import { withHttpErrors } from '../http-errors';

/**
 * Outbound webhook subscriptions. The signing secret is only returned on
 * registration.
 */
@ApiTags('Webhooks')
@ApiHeader({ name: TENANT_HEADER, required: true })
@Controller('webhooks')
export class WebhookSubscriptionController {
  constructor(
    @Inject(WEBHOOK_SUBSCRIPTION_SERVICE)
    private readonly subscriptions: WebhookSubscriptionService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiRegisterWebhook()
  async register(
    @TenantId() tenantId: string,
    @Body() dto: RegisterWebhookDto,
  ): Promise<JsonObject> {
    const webhook = await withHttpErrors(() =>
      this.subscriptions.register({ ...dto, tenantId }),
    );
    return { ...webhook.toPlainObject(), secret: webhook.secret };
  }

  @Get()
  @ApiGetWebhook({ list: true })
  async list(@TenantId() tenantId: string): Promise<JsonObject[]> {
    const webhooks = await this.subscriptions.list(tenantId);
    return webhooks.map((webhook) => webhook.toPlainObject());
  }

  @Get(':id')
  @ApiGetWebhook()
  async get(
    @TenantId() tenantId: string,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<JsonObject> {
    const webhook = await withHttpErrors(() => this.subscriptions.get(tenantId, id));
    return webhook.toPlainObject();
  }

  @Patch(':id')
  @ApiUpdateWebhook()
  async update(
    @TenantId() tenantId: string,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateWebhookDto,
  ): Promise<JsonObject> {
    const webhook = await withHttpErrors(() => this.subscriptions.update(tenantId, id, dto));
    return webhook.toPlainObject();
  }

  @Delete(':id')
  @ApiDeactivateWebhook()
  async deactivate(
    @TenantId() tenantId: string,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<JsonObject> {
    const webhook = await withHttpErrors(() => this.subscriptions.deactivate(tenantId, id));
    return webhook.toPlainObject();
  }

  @Get(':id/deliveries')
  @ApiListDeliveries()
  async deliveries(
    @TenantId() tenantId: string,
    @Param('id', ParseUUIDPipe) id: string,
    @Query() query: ListDeliveriesDto,
  ): Promise<JsonObject[]> {
    const deliveries = await withHttpErrors(() =>
      this.subscriptions.listDeliveries(tenantId, id, query),
    );
    return deliveries.map((delivery) => delivery.toPlainObject());
  }
}
