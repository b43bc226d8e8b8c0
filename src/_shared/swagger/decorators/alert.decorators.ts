import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiParam } from '@nestjs/swagger';

export const ApiListAlerts = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'List alerts of the tenant',
      description: 'Newest first; exhausted webhook deliveries show up here',
    }),
    ApiResponse({ status: 200, description: 'Alerts' }),
  );
};

export const ApiUpdateAlert = (action: 'read' | 'resolve') => {
  return applyDecorators(
    ApiOperation({
      summary: action === 'read' ? 'Mark an alert as read' : 'Resolve an alert',
    }),
    ApiParam({ name: 'id', description: 'Alert id' }),
    ApiResponse({ status: 200, description: 'Alert updated' }),
    ApiResponse({ status: 404, description: 'Alert not found' }),
  );
};
