import { HttpException, HttpStatus } from '@nestjs/common';
import { DataProviderError, DataProviderErrorKind, errorMessage, TradingError, TradingErrorCode } from './trading.errors';

const STATUS_BY_CODE: Record<TradingErrorCode, HttpStatus> = {
  [TradingErrorCode.INSUFFICIENT_DATA]: HttpStatus.UNPROCESSABLE_ENTITY,
  [TradingErrorCode.INVALID_QUOTE]: HttpStatus.UNPROCESSABLE_ENTITY,
  [TradingErrorCode.INSUFFICIENT_FUNDS]: HttpStatus.CONFLICT,
  [TradingErrorCode.INSUFFICIENT_HOLDINGS]: HttpStatus.CONFLICT,
  [TradingErrorCode.INVALID_TRANSACTION]: HttpStatus.BAD_REQUEST,
  [TradingErrorCode.DATA_PROVIDER]: HttpStatus.BAD_GATEWAY,
  [TradingErrorCode.CONFIGURATION]: HttpStatus.BAD_REQUEST,
  [TradingErrorCode.MONITOR_STATE]: HttpStatus.CONFLICT,
};

const STATUS_BY_PROVIDER_KIND: Record<DataProviderErrorKind, HttpStatus> = {
  [DataProviderErrorKind.RATE_LIMITED]: HttpStatus.TOO_MANY_REQUESTS,
  [DataProviderErrorKind.AUTH_FAILED]: HttpStatus.BAD_GATEWAY,
  [DataProviderErrorKind.NOT_FOUND]: HttpStatus.NOT_FOUND,
  [DataProviderErrorKind.NETWORK]: HttpStatus.BAD_GATEWAY,
  [DataProviderErrorKind.MALFORMED]: HttpStatus.BAD_GATEWAY,
};

export function httpStatusFor(error: unknown): number {
  if (error instanceof HttpException) {
    return error.getStatus();
  }
  if (error instanceof DataProviderError) {
    return STATUS_BY_PROVIDER_KIND[error.kind];
  }
  if (error instanceof TradingError) {
    return STATUS_BY_CODE[error.code];
  }
  return HttpStatus.INTERNAL_SERVER_ERROR;
}

/**
 * Failure response in the API's { success, message } shape, with the status for the error kind
 */
export function toHttpException(error: unknown, prefix?: string): HttpException {
  const message = prefix ? `${prefix}: ${errorMessage(error)}` : errorMessage(error);
  const body: Record<string, unknown> = { success: false, message };

  if (error instanceof TradingError) {
    body.code = error.code;
  }
  if (error instanceof DataProviderError) {
    body.kind = error.kind;
    if (error.retryAfterMs !== undefined) {
      body.retryAfterMs = error.retryAfterMs;
    }
  }

  return new HttpException(body, httpStatusFor(error), { cause: error });
}
