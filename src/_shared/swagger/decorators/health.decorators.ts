import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse } from '@nestjs/swagger';

export const ApiHealthCheck = () => {
  return applyDecorators(
    ApiOperation({ summary: 'Liveness check with process uptime' }),
    ApiResponse({ status: 200, description: 'Process is up' }),
  );
};

export const ApiReadinessCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Readiness of the authorization store and inbound pipeline',
      description: 'status is not_ready while the store fails its health query',
    }),
    ApiResponse({ status: 200, description: 'ready or not_ready' }),
  );
};

export const ApiServiceStatistics = () => {
  return applyDecorators(
    ApiOperation({ summary: 'Row counts, pipeline stages and runtime memory' }),
    ApiResponse({ status: 200, description: 'Statistics' }),
  );
};
