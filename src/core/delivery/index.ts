export * from './types';
export { WebhookSigner } from './webhook-signer';
export { FetchWebhookTransport } from './fetch-webhook.transport';
export { WebhookDispatcher } from './webhook-dispatcher';
