import { createHmac } from 'crypto';
import { WebhookSigner, canonicalJson } from '../../src';

describe('WebhookSigner', () => {
  const payload = '{"event":"authorization.revoked"}';

  it('should produce the hex HMAC-SHA256 of the payload', () => {
    const expected = createHmac('sha256', 'test-secret').update(payload).digest('hex');

    expect(WebhookSigner.sign(payload, 'test-secret')).toBe(expected);
    expect(WebhookSigner.sign(Buffer.from(payload), 'test-secret')).toBe(expected);
    expect(WebhookSigner.signatureHeader(payload, 'test-secret')).toBe(`sha256=${expected}`);
  });

  it('should verify bare and prefixed signatures', () => {
    const signature = WebhookSigner.sign(payload, 'test-secret');

    expect(WebhookSigner.verify(payload, signature, 'test-secret')).toBe(true);
    expect(WebhookSigner.verify(payload, `sha256=${signature}`, 'test-secret')).toBe(true);
    expect(WebhookSigner.verify(payload, `SHA256=${signature.toUpperCase()}`, 'test-secret')).toBe(true);
  });

  it('should try every secret during rotation', () => {
    const signature = WebhookSigner.signatureHeader(payload, 'old-secret');

    expect(WebhookSigner.verify(payload, signature, ['new-secret', 'old-secret'])).toBe(true);
    expect(WebhookSigner.verify(payload, signature, ['new-secret'])).toBe(false);
  });

  it('should reject altered payloads and malformed signatures', () => {
    const signature = WebhookSigner.sign(payload, 'test-secret');

    expect(WebhookSigner.verify(`${payload} `, signature, 'test-secret')).toBe(false);
    expect(WebhookSigner.verify(payload, signature.slice(0, 10), 'test-secret')).toBe(false);
    expect(WebhookSigner.verify(payload, 'sha256=not-hex', 'test-secret')).toBe(false);
    expect(WebhookSigner.verify(payload, '', 'test-secret')).toBe(false);
    expect(WebhookSigner.verify(payload, signature, [])).toBe(false);
  });
});

describe('canonicalJson', () => {
  it('should sort keys at every depth and keep array order', () => {
    expect(canonicalJson({ b: 1, a: { d: [{ z: 1, y: 2 }], c: null } })).toBe(
      '{"a":{"c":null,"d":[{"y":2,"z":1}]},"b":1}',
    );
  });

  it('should serialize dates as ISO strings', () => {
    expect(canonicalJson({ at: new Date('2026-01-01T00:00:00.000Z') })).toBe(
      '{"at":"2026-01-01T00:00:00.000Z"}',
    );
  });
});
