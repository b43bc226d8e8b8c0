import {
  Controller,
  Get,
  Post,
  Param,
  Query,
  HttpCode,
  HttpStatus,
  Inject,
  ParseUUIDPipe,
} from '@nestjs/common';
import { ApiHeader, ApiTags } from '@nestjs/swagger';
import type { AlertService, JsonObject } from '../../../core';
import { ApiListAlerts, ApiUpdateAlert } from '../../../_shared/swagger/decorators';
import { ListAlertsDto } from '../../../_shared/dto';
import { ALERT_SERVICE, TENANT_HEADER } from '../constants';
import { TenantId } from '../decorators/request-context.decorator';
import { withHttpErrors } from '../http-errors';

@ApiTags('Alerts')
@ApiHeader({ name: TENANT_HEADER, required: true })
@Controller('alerts')
export class AlertController {
  constructor(
    @Inject(ALERT_SERVICE)
    private readonly alertService: AlertService,
  ) {}

  @Get()
  @ApiListAlerts()
  async list(
    @TenantId() tenantId: string,
    @Query() query: ListAlertsDto,
  ): Promise<JsonObject[]> {
    const alerts = await this.alertService.list({ ...query, tenantId });
    return alerts.map((alert) => alert.toPlainObject());
  }

  @Post(':id/read')
  @HttpCode(HttpStatus.OK)
  @ApiUpdateAlert('read')
  async markRead(
    @TenantId() tenantId: string,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<JsonObject> {
    const alert = await withHttpErrors(() => this.alertService.markRead(tenantId, id));
    return alert.toPlainObject();
  }

  @Post(':id/resolve')
  @HttpCode(HttpStatus.OK)
  @ApiUpdateAlert('resolve')
  async resolve(
    @TenantId() tenantId: string,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<JsonObject> {
    const alert = await withHttpErrors(() => this.alertService.resolve(tenantId, id));
    return alert.toPlainObject();
  }
}
