import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiParam } from '@nestjs/swagger';

const idParam = () => ApiParam({ name: 'id', description: 'Authorization id', format: 'uuid' });

/**
 * Swagger decorator for submitting credentials
 */
export const ApiCreateAuthorization = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Submit a credential',
      description:
        'Normalizes an AP2 JWT-VC or ACP token, verifies it against the truststore and stores the authorization. A failed verification is stored, not rejected.',
    }),
    ApiResponse({ status: 201, description: 'Authorization stored' }),
    ApiResponse({ status: 400, description: 'Malformed payload or unsupported protocol' }),
    ApiResponse({ status: 422, description: 'Credential already expired' }),
  );
};

export const ApiGetAuthorization = () => {
  return applyDecorators(
    ApiOperation({ summary: 'Get an authorization' }),
    idParam(),
    ApiResponse({ status: 200, description: 'Authorization' }),
    ApiResponse({ status: 404, description: 'Authorization not found' }),
  );
};

export const ApiListAuthorizations = () => {
  return applyDecorators(
    ApiOperation({ summary: 'List authorizations of the tenant' }),
    ApiResponse({
      status: 200,
      description: 'Page of authorizations',
      schema: {
        type: 'object',
        properties: {
          items: { type: 'array', items: { type: 'object' } },
          total: { type: 'number' },
          page: { type: 'number' },
          limit: { type: 'number' },
          totalPages: { type: 'number' },
        },
      },
    }),
  );
};

export const ApiRevokeAuthorization = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Revoke an authorization',
      description: 'REVOKED is terminal; a second revoke is rejected',
    }),
    idParam(),
    ApiResponse({ status: 200, description: 'Authorization revoked' }),
    ApiResponse({ status: 404, description: 'Authorization not found' }),
    ApiResponse({ status: 409, description: 'Already revoked' }),
  );
};

export const ApiVerifyAuthorization = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Re-run verification',
      description: 'Verifies the stored raw payload against the current truststore',
    }),
    idParam(),
    ApiResponse({ status: 200, description: 'Verification fields updated' }),
    ApiResponse({ status: 404, description: 'Authorization not found' }),
  );
};

export const ApiRecordUsage = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Record a usage',
      description: 'Audited only; the status never changes and overruns are flagged',
    }),
    idParam(),
    ApiResponse({ status: 201, description: 'Usage recorded' }),
    ApiResponse({ status: 404, description: 'Authorization not found' }),
  );
};

export const ApiDeleteAuthorization = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Soft delete an authorization',
      description: 'Hidden from reads and purged after the retention window',
    }),
    idParam(),
    ApiResponse({ status: 200, description: 'Authorization soft-deleted' }),
    ApiResponse({ status: 404, description: 'Authorization not found' }),
  );
};

export const ApiAuditTrail = () => {
  return applyDecorators(
    ApiOperation({ summary: 'Chronological audit trail' }),
    idParam(),
    ApiResponse({ status: 200, description: 'Audit events, oldest first' }),
    ApiResponse({ status: 404, description: 'Authorization not found' }),
  );
};

export const ApiExportEvidence = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Export the evidence bundle',
      description:
        'Raw credential, verification result, audit trail and deliveries, with file contents ready for archiving',
    }),
    idParam(),
    ApiResponse({ status: 200, description: 'Evidence bundle' }),
    ApiResponse({ status: 404, description: 'Authorization not found' }),
  );
};
