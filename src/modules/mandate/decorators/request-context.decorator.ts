import { BadRequestException, ExecutionContext, createParamDecorator } from '@nestjs/common';
import type { Request } from 'express';
import type { RequestContext } from '../../../core';
import { TENANT_HEADER } from '../constants';

const ACTOR_HEADER = 'x-actor';

function headerValue(request: Request, name: string): string | undefined {
  const value = request.headers[name];
  const first = Array.isArray(value) ? value[0] : value;
  const trimmed = first?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Tenant id from the x-tenant-id header; requests without one are rejected
 */
export const TenantId = createParamDecorator((_data: unknown, ctx: ExecutionContext): string => {
  const request = ctx.switchToHttp().getRequest<Request>();
  const tenantId = headerValue(request, TENANT_HEADER);
  if (!tenantId) {
    throw new BadRequestException(`Missing ${TENANT_HEADER} header`);
  }
  return tenantId;
});

/**
 * Actor, client ip and user agent for audit events
 */
export const AuditContext = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): RequestContext => {
    const request = ctx.switchToHttp().getRequest<Request>();
    return {
      actor: headerValue(request, ACTOR_HEADER),
      ip: request.ip ?? null,
      userAgent: headerValue(request, 'user-agent') ?? null,
    };
  },
);
