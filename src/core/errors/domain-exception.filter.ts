import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
} from '@nestjs/common';
import { Response } from 'express';
import { logger } from '../logger/logger.config';
import {
  SubscriptionDomainError,
  SubscriptionErrorCode,
} from './subscription.errors';

const STATUS_BY_CODE: Record<SubscriptionErrorCode, HttpStatus> = {
  invalid_signature: HttpStatus.UNAUTHORIZED,
  malformed_payload: HttpStatus.BAD_REQUEST,
  invalid_transition: HttpStatus.CONFLICT,
  duplicate_event: HttpStatus.OK,
  provider_unavailable: HttpStatus.SERVICE_UNAVAILABLE,
  membership_sync_failed: HttpStatus.BAD_GATEWAY,
  concurrent_modification: HttpStatus.SERVICE_UNAVAILABLE,
  subscription_not_found: HttpStatus.NOT_FOUND,
  subscription_conflict: HttpStatus.CONFLICT,
  plan_not_found: HttpStatus.NOT_FOUND,
  unknown_subscription: HttpStatus.CONFLICT,
};

export const httpStatusForDomainError = (
  error: SubscriptionDomainError,
): HttpStatus => STATUS_BY_CODE[error.code];

@Catch(SubscriptionDomainError)
export class DomainExceptionFilter implements ExceptionFilter {
  private readonly logger = logger();

  catch(exception: SubscriptionDomainError, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();
    const status = httpStatusForDomainError(exception);

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.warn(
        { code: exception.code, error: exception.message },
        'Request failed with transient domain error',
      );
    }

    const body: Record<string, unknown> = {
      statusCode: status,
      error: exception.code,
      message: exception.message,
    };
    if (exception.transient) {
      response.setHeader('Retry-After', '5');
    }

    response.status(status).json(body);
  }
}
