import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiParam, ApiBody, ApiHeader } from '@nestjs/swagger';
import { WebhookEventType } from '../../../core/domain/enums';

/**
 * Swagger decorator for the inbound ACP webhook endpoint
 */
export const ApiAcpWebhookEndpoint = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Receive ACP protocol webhook',
      description:
        'Receives token.used and token.revoked events from a PSP. The signature covers the raw body. Redelivered events return already_processed.',
    }),
    ApiParam({
      name: 'tenantId',
      description: 'Tenant the PSP delivers for',
      example: 'tenant-demo',
      required: true,
    }),
    ApiHeader({
      name: 'x-acp-signature',
      description: 'Hex HMAC-SHA256 of the raw body with the tenant secret',
      required: true,
    }),
    ApiBody({
      description: 'ACP event envelope',
      required: true,
      schema: {
        type: 'object',
        required: ['event_id', 'event_type', 'timestamp', 'data'],
        example: {
          event_id: 'evt_001',
          event_type: 'token.revoked',
          timestamp: '2030-01-01T00:00:00Z',
          data: {
            token_id: 'acp_tok_001',
            reason: 'Customer request',
          },
        },
      },
    }),
    ApiResponse({
      status: 200,
      description: 'Event processed, or already processed earlier',
    }),
    ApiResponse({ status: 400, description: 'Malformed event body' }),
    ApiResponse({ status: 401, description: 'Missing or invalid signature' }),
    ApiResponse({ status: 403, description: 'PSP not on the allowlist' }),
    ApiResponse({ status: 404, description: 'No authorization for token_id' }),
    ApiResponse({ status: 422, description: 'Unsupported event type' }),
  );
};

/**
 * Swagger decorator for registering webhook subscriptions
 */
export const ApiRegisterWebhook = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Register a webhook subscription',
      description:
        'Subscribes a URL to lifecycle events. Deliveries are signed with HMAC-SHA256 in X-Webhook-Signature.',
    }),
    ApiResponse({
      status: 201,
      description: 'Subscription created; the secret is returned once',
    }),
    ApiResponse({ status: 400, description: 'Invalid URL, events or retry settings' }),
  );
};

export const ApiUpdateWebhook = () => {
  return applyDecorators(
    ApiOperation({ summary: 'Update a webhook subscription' }),
    ApiParam({ name: 'id', description: 'Webhook id' }),
    ApiResponse({ status: 200, description: 'Subscription updated' }),
    ApiResponse({ status: 404, description: 'Webhook not found' }),
  );
};

export const ApiGetWebhook = (options?: { list?: boolean }) => {
  if (options?.list) {
    return applyDecorators(
      ApiOperation({ summary: 'List webhook subscriptions of the tenant' }),
      ApiResponse({ status: 200, description: 'Subscriptions, secrets omitted' }),
    );
  }
  return applyDecorators(
    ApiOperation({ summary: 'Get a webhook subscription' }),
    ApiParam({ name: 'id', description: 'Webhook id' }),
    ApiResponse({ status: 200, description: 'Subscription, secret omitted' }),
    ApiResponse({ status: 404, description: 'Webhook not found' }),
  );
};

export const ApiDeactivateWebhook = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Deactivate a webhook subscription',
      description: 'Stops new deliveries and cancels pending retries; history is kept',
    }),
    ApiParam({ name: 'id', description: 'Webhook id' }),
    ApiResponse({ status: 200, description: 'Subscription deactivated' }),
    ApiResponse({ status: 404, description: 'Webhook not found' }),
  );
};

export const ApiListDeliveries = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'List deliveries of a webhook',
      description: `Delivery attempts for events such as ${WebhookEventType.AUTHORIZATION_REVOKED}`,
    }),
    ApiParam({ name: 'id', description: 'Webhook id' }),
    ApiResponse({ status: 200, description: 'Delivery records' }),
    ApiResponse({ status: 404, description: 'Webhook not found' }),
  );
};
