import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus } from '@nestjs/common';
import type { Response } from 'express';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import type { CorrelatedRequest } from '../../shared/logging/correlation-id.middleware';
import {
  SigningServiceError,
  type SigningServiceErrorCode,
} from '../../domain/errors/signing-service.errors';

export const HTTP_STATUS_BY_ERROR_CODE: Record<SigningServiceErrorCode, HttpStatus> = {
  VALIDATION_ERROR: HttpStatus.BAD_REQUEST,
  NOT_FOUND: HttpStatus.NOT_FOUND,
  STAGING_ERROR: HttpStatus.INTERNAL_SERVER_ERROR,
  SERVICE_BUSY: HttpStatus.SERVICE_UNAVAILABLE,
  SIGNING_TIMEOUT: HttpStatus.INTERNAL_SERVER_ERROR,
  SIGNING_TOOL_FAILURE: HttpStatus.INTERNAL_SERVER_ERROR,
  SIGNING_INVOCATION_ERROR: HttpStatus.INTERNAL_SERVER_ERROR,
  INTEGRITY_ERROR: HttpStatus.INTERNAL_SERVER_ERROR,
  ARTIFACT_NOT_READY: HttpStatus.CONFLICT,
  ARTIFACT_MISSING: HttpStatus.NOT_FOUND,
  STATE_CONFLICT: HttpStatus.CONFLICT,
};

export interface ErrorResponseBody {
  statusCode: number;
  error: SigningServiceErrorCode;
  message: string;
  [detail: string]: unknown;
}

export function toErrorResponse(exception: SigningServiceError): ErrorResponseBody {
  return {
    ...exception.details,
    statusCode: HTTP_STATUS_BY_ERROR_CODE[exception.code],
    error: exception.code,
    message: exception.message,
  };
}

/**
 * Renders domain errors as `{ statusCode, error, message, ...details }`.
 * Anything else falls through to Nest's default handling. Log lines carry the
 * request's correlation id.
 */
@Catch(SigningServiceError)
export class SigningServiceExceptionFilter implements ExceptionFilter {
  constructor(private readonly logger: PinoLoggerService) {
    this.logger.setContext(SigningServiceExceptionFilter.name);
  }

  catch(exception: SigningServiceError, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const request = http.getRequest<CorrelatedRequest>();
    const response = http.getResponse<Response>();
    const body = toErrorResponse(exception);

    const logger = request.correlationId
      ? this.logger.withCorrelationId(request.correlationId)
      : this.logger;
    const entry = { code: exception.code, statusCode: body.statusCode };

    if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      logger.error(entry, exception.message);
    } else {
      logger.debug(entry, exception.message);
    }

    response.status(body.statusCode).json(body);
  }
}
