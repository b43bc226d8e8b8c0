import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  NotFoundException,
  UnauthorizedException,
  UnprocessableEntityException,
} from '@nestjs/common';
import {
  AlreadyRevokedError,
  AuthorizationNotFoundError,
  AuthorizationStatus,
  ExpiredCredentialError,
  InboundSignatureError,
  InvalidTransitionError,
  MalformedCredentialError,
  PipelineError,
  PspNotAllowedError,
  UnsupportedEventTypeError,
  WebhookValidationError,
  toHttpException,
  withHttpErrors,
} from '../../src';

describe('toHttpException', () => {
  it.each([
    [new MalformedCredentialError('ACP token has no token_id'), BadRequestException],
    [new WebhookValidationError('url must be an http(s) URL', 'url'), BadRequestException],
    [new AuthorizationNotFoundError('Authorization auth-1 not found', 'auth-1'), NotFoundException],
    [new AlreadyRevokedError('Authorization auth-1 is already revoked', 'auth-1', null), ConflictException],
    [
      new InvalidTransitionError('blocked', AuthorizationStatus.EXPIRED, AuthorizationStatus.VALID),
      ConflictException,
    ],
    [new ExpiredCredentialError('expired', new Date(0)), UnprocessableEntityException],
    [new UnsupportedEventTypeError('Unsupported event type: token.paused', 'token.paused'), UnprocessableEntityException],
    [new InboundSignatureError('Invalid X-ACP-Signature', 'tenant-a'), UnauthorizedException],
    [new PspNotAllowedError('PSP psp-x is not allowed', 'psp-x', ['psp-test']), ForbiddenException],
  ])('should map %p', (error, expected) => {
    const mapped = toHttpException(error);

    expect(mapped).toBeInstanceOf(expected);
    expect(mapped).toMatchObject({ message: error.message });
  });

  it('should unwrap pipeline errors to their cause', () => {
    const pipelineError = new PipelineError(
      'Stage signature-verification failed',
      'signature-verification',
      {
        tenantId: 'tenant-a',
        rawBody: Buffer.from('{}'),
        headers: {},
        receivedAt: new Date(0),
        processingId: 'proc-1',
        metadata: {},
      },
      new InboundSignatureError('Missing X-ACP-Signature header', 'tenant-a'),
    );

    expect(toHttpException(pipelineError)).toBeInstanceOf(UnauthorizedException);
  });

  it('should pass unknown errors through unchanged', () => {
    const error = new Error('database down');

    expect(toHttpException(error)).toBe(error);
    expect(toHttpException('text')).toBe('text');
  });
});

describe('withHttpErrors', () => {
  it('should return the result of successful work', async () => {
    await expect(withHttpErrors(async () => 42)).resolves.toBe(42);
  });

  it('should rethrow domain errors as HTTP exceptions', async () => {
    await expect(
      withHttpErrors(async () => {
        throw new AuthorizationNotFoundError('Authorization auth-9 not found', 'auth-9');
      }),
    ).rejects.toThrow(new NotFoundException('Authorization auth-9 not found'));
  });
});
