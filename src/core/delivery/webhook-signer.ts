import { createHmac, timingSafeEqual } from 'crypto';

const SIGNATURE_PREFIX = 'sha256=';

/**
 * HMAC-SHA256 signing over exact payload bytes.
 * Used for outbound deliveries, inbound protocol webhooks and ACP token signatures.
 */
export class WebhookSigner {
  /**
   * Hex digest of the payload under the secret
   */
  static sign(payload: string | Buffer, secret: string): string {
    return createHmac('sha256', secret).update(payload).digest('hex');
  }

  /**
   * Header value form: "sha256=<hex>"
   */
  static signatureHeader(payload: string | Buffer, secret: string): string {
    return `${SIGNATURE_PREFIX}${WebhookSigner.sign(payload, secret)}`;
  }

  /**
   * Verify a hex signature (optionally "sha256="-prefixed) against any of
   * the secrets; comparison is constant-time
   */
  static verify(
    payload: string | Buffer,
    signature: string,
    secrets: string | string[],
  ): boolean {
    const provided = signature.trim().toLowerCase().startsWith(SIGNATURE_PREFIX)
      ? signature.trim().slice(SIGNATURE_PREFIX.length)
      : signature.trim();

    if (!/^[0-9a-fA-F]+$/.test(provided)) {
      return false;
    }
    const providedBuffer = Buffer.from(provided.toLowerCase(), 'hex');

    for (const secret of Array.isArray(secrets) ? secrets : [secrets]) {
      const expectedBuffer = Buffer.from(WebhookSigner.sign(payload, secret), 'hex');
      if (
        expectedBuffer.length === providedBuffer.length &&
        timingSafeEqual(expectedBuffer, providedBuffer)
      ) {
        return true;
      }
    }
    return false;
  }
}
