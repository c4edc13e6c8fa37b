import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { Response } from 'express';
import { BettingError, BettingErrorCode } from '../errors/betting.errors';

const STATUS_BY_CODE: Record<BettingErrorCode, HttpStatus> = {
  DEADLINE_PASSED: HttpStatus.CONFLICT,
  DEADLINE_LOCKED: HttpStatus.CONFLICT,
  INVALID_DEADLINE: HttpStatus.BAD_REQUEST,
  INVALID_PREDICTION: HttpStatus.BAD_REQUEST,
  INVALID_RESULT: HttpStatus.BAD_REQUEST,
  NOT_GROUP_MEMBER: HttpStatus.FORBIDDEN,
  RESULT_ALREADY_FINAL: HttpStatus.CONFLICT,
  RESULT_NOT_FINAL: HttpStatus.CONFLICT,
  MATCH_NOT_FOUND: HttpStatus.NOT_FOUND,
  MATCH_CANCELLED: HttpStatus.CONFLICT,
  PREDICTIONS_OPEN: HttpStatus.CONFLICT,
  CONCURRENT_MODIFICATION: HttpStatus.CONFLICT,
  SCORING_INVARIANT_VIOLATION: HttpStatus.INTERNAL_SERVER_ERROR,
};

/**
 * Maps domain errors to HTTP responses carrying the error code and its context.
 */
@Catch(BettingError)
export class BettingExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(BettingExceptionFilter.name);

  catch(exception: BettingError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const status = STATUS_BY_CODE[exception.code];

    if (status === HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(`${exception.code}: ${exception.message}`, exception.stack);
      response.status(status).json({ statusCode: status, error: exception.code });
      return;
    }

    response.status(status).json({
      statusCode: status,
      error: exception.code,
      message: exception.message,
      context: exception.context,
    });
  }
}

export function httpStatusFor(error: BettingError): HttpStatus {
  return STATUS_BY_CODE[error.code];
}
