import {
  DeliveryTransportError,
  WebhookRequest,
  WebhookResponse,
  WebhookTransport,
} from './types';

/**
 * WebhookTransport over the runtime's fetch with an AbortController deadline
 */
export class FetchWebhookTransport implements WebhookTransport {
  constructor(private readonly fetchImpl: typeof fetch = fetch) {}

  async send(request: WebhookRequest): Promise<WebhookResponse> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await this.fetchImpl(request.url, {
        method: 'POST',
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
        redirect: 'manual',
      });
      return { statusCode: response.status, body: await response.text() };
    } catch (error) {
      const timedOut = controller.signal.aborted;
      throw new DeliveryTransportError(
        timedOut
          ? `Request timed out after ${request.timeoutMs}ms`
          : `Request error: ${error instanceof Error ? error.message : String(error)}`,
        request.url,
        timedOut,
      );
    } finally {
      clearTimeout(timer);
    }
  }
}
