import {
  Controller,
  Get,
  Post,
  Delete,
  Param,
  Query,
  Body,
  HttpCode,
  HttpStatus,
  Inject,
  Logger,
  ParseUUIDPipe,
} from '@nestjs/common';
import { ApiHeader, ApiTags } from '@nestjs/swagger';
import {
  AuthorizationService,
  EvidenceBundle,
  EvidenceService,
  JsonObject,
  PaginatedResult,
  RequestContext,
} from '../../../core';
import {
  ApiCreateAuthorization,
  ApiGetAuthorization,
  ApiListAuthorizations,
  ApiRevokeAuthorization,
  ApiVerifyAuthorization,
  ApiRecordUsage,
  ApiDeleteAuthorization,
  ApiAuditTrail,
  ApiExportEvidence,
} from '../../../_shared/swagger/decorators';
import {
  CreateAuthorizationDto,
  RevokeAuthorizationDto,
  RecordUsageDto,
  DeleteAuthorizationDto,
  ListAuthorizationsDto,
  GetAuthorizationDto,
} from '../../../_shared/dto';
import { AUTHORIZATION_SERVICE, EVIDENCE_SERVICE, TENANT_HEADER } from '../constants';
import { AuditContext, TenantId } from '../decorators/request-context.decorator';
import { withHttpErrors } from '../http-errors';

/**
 * Authorization Controller
 * Credential intake, lifecycle commands and evidence
 */
@ApiTags('Authorizations')
@ApiHeader({ name: TENANT_HEADER, required: true })
@Controller('authorizations')
export class AuthorizationController {
  private readonly logger = new Logger(AuthorizationController.name);

  constructor(
    @Inject(AUTHORIZATION_SERVICE)
    private readonly authorizationService: AuthorizationService,
    @Inject(EVIDENCE_SERVICE)
    private readonly evidenceService: EvidenceService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiCreateAuthorization()
  async create(
    @TenantId() tenantId: string,
    @AuditContext() context: RequestContext,
    @Body() dto: CreateAuthorizationDto,
  ): Promise<JsonObject> {
    this.logger.log(`Submitting ${dto.protocol} credential for tenant ${tenantId}`);

    const authorization = await withHttpErrors(() =>
      this.authorizationService.create(
        {
          protocol: dto.protocol,
          tenantId,
          payload: dto.payload,
          createdBy: dto.createdBy ?? null,
        },
        context,
      ),
    );
    return authorization.toPlainObject();
  }

  @Get()
  @ApiListAuthorizations()
  async list(
    @TenantId() tenantId: string,
    @Query() query: ListAuthorizationsDto,
  ): Promise<PaginatedResult<JsonObject>> {
    const { page = 1, limit = 50, ...filter } = query;
    const result = await this.authorizationService.list({ ...filter, tenantId }, { page, limit });
    return { ...result, items: result.items.map((a) => a.toPlainObject()) };
  }

  @Get(':id')
  @ApiGetAuthorization()
  async get(
    @TenantId() tenantId: string,
    @Param('id', ParseUUIDPipe) id: string,
    @Query() query: GetAuthorizationDto,
  ): Promise<JsonObject> {
    const authorization = await withHttpErrors(() =>
      this.authorizationService.require(tenantId, id, query.includeDeleted === true),
    );
    return authorization.toPlainObject();
  }

  @Post(':id/revoke')
  @HttpCode(HttpStatus.OK)
  @ApiRevokeAuthorization()
  async revoke(
    @TenantId() tenantId: string,
    @AuditContext() context: RequestContext,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: RevokeAuthorizationDto,
  ): Promise<JsonObject> {
    const authorization = await withHttpErrors(() =>
      this.authorizationService.revoke(tenantId, id, dto.reason, {
        ...context,
        metadata: dto.metadata,
      }),
    );
    return authorization.toPlainObject();
  }

  @Post(':id/verify')
  @HttpCode(HttpStatus.OK)
  @ApiVerifyAuthorization()
  async verify(
    @TenantId() tenantId: string,
    @AuditContext() context: RequestContext,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<JsonObject> {
    const authorization = await withHttpErrors(() =>
      this.authorizationService.reverify(tenantId, id, context),
    );
    return authorization.toPlainObject();
  }

  @Post(':id/usage')
  @HttpCode(HttpStatus.CREATED)
  @ApiRecordUsage()
  async recordUsage(
    @TenantId() tenantId: string,
    @AuditContext() context: RequestContext,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: RecordUsageDto,
  ): Promise<JsonObject> {
    const result = await withHttpErrors(() =>
      this.authorizationService.recordUsage(
        tenantId,
        id,
        {
          amount: dto.amount,
          currency: dto.currency,
          transactionId: dto.transactionId,
          merchantId: dto.merchantId,
          metadata: dto.metadata,
        },
        context,
      ),
    );
    return {
      authorization: result.authorization.toPlainObject(),
      audit_event: result.auditEvent.toPlainObject(),
      exceeds_limit: result.exceedsLimit,
    };
  }

  @Delete(':id')
  @ApiDeleteAuthorization()
  async remove(
    @TenantId() tenantId: string,
    @AuditContext() context: RequestContext,
    @Param('id', ParseUUIDPipe) id: string,
    @Query() query: DeleteAuthorizationDto,
  ): Promise<JsonObject> {
    const authorization = await withHttpErrors(() =>
      this.authorizationService.softDelete(tenantId, id, {
        ...context,
        retentionDays: query.retentionDays,
      }),
    );
    return authorization.toPlainObject();
  }

  @Get(':id/audit')
  @ApiAuditTrail()
  async auditTrail(
    @TenantId() tenantId: string,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<JsonObject[]> {
    const events = await withHttpErrors(() =>
      this.authorizationService.getAuditTrail(tenantId, id),
    );
    return events.map((event) => event.toPlainObject());
  }

  @Get(':id/evidence')
  @ApiExportEvidence()
  async evidence(
    @TenantId() tenantId: string,
    @AuditContext() context: RequestContext,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<EvidenceBundle> {
    return withHttpErrors(() => this.evidenceService.export(tenantId, id, context));
  }
}
