import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  HttpException,
  NotFoundException,
  UnauthorizedException,
  UnprocessableEntityException,
} from '@nestjs/common';
import {
  MalformedCredentialError,
  UnsupportedProtocolError,
  AmountFormatError,
  WebhookValidationError,
  AuthorizationNotFoundError,
  WebhookNotFoundError,
  AlertNotFoundError,
  AlreadyRevokedError,
  InvalidTransitionError,
  ExpiredCredentialError,
  InboundSignatureError,
  InboundPayloadError,
  UnsupportedEventTypeError,
  PspNotAllowedError,
  PipelineError,
} from '../../core';

/**
 * Translate a domain error into the matching Nest HttpException.
 * Anything unrecognised is returned unchanged and surfaces as a 500.
 */
export function toHttpException(error: unknown): unknown {
  if (error instanceof HttpException || !(error instanceof Error)) {
    return error;
  }
  if (error instanceof PipelineError && error.cause) {
    return toHttpException(error.cause);
  }

  if (
    error instanceof MalformedCredentialError ||
    error instanceof UnsupportedProtocolError ||
    error instanceof AmountFormatError ||
    error instanceof WebhookValidationError ||
    error instanceof InboundPayloadError
  ) {
    return new BadRequestException(error.message);
  }
  if (
    error instanceof AuthorizationNotFoundError ||
    error instanceof WebhookNotFoundError ||
    error instanceof AlertNotFoundError
  ) {
    return new NotFoundException(error.message);
  }
  if (error instanceof AlreadyRevokedError || error instanceof InvalidTransitionError) {
    return new ConflictException(error.message);
  }
  if (error instanceof ExpiredCredentialError || error instanceof UnsupportedEventTypeError) {
    return new UnprocessableEntityException(error.message);
  }
  if (error instanceof InboundSignatureError) {
    return new UnauthorizedException(error.message);
  }
  if (error instanceof PspNotAllowedError) {
    return new ForbiddenException(error.message);
  }

  return error;
}

/**
 * Run controller work, rethrowing domain errors as HttpExceptions
 */
export async function withHttpErrors<T>(work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (error) {
    throw toHttpException(error);
  }
}
