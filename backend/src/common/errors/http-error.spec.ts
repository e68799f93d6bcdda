import { HttpStatus } from '@nestjs/common';
import { httpStatusFor, toHttpException } from './http-error';
import {
  ConfigurationError,
  DataProviderError,
  DataProviderErrorKind,
  InsufficientDataError,
  InsufficientFundsError,
  InvalidQuoteError,
  InvalidTransactionError,
  MonitorStateError,
} from './trading.errors';

describe('httpStatusFor', () => {
  it.each([
    [new InsufficientDataError('RSI', 15, 3), HttpStatus.UNPROCESSABLE_ENTITY],
    [new InvalidQuoteError('EUR/USD', 1.1, 1.09), HttpStatus.UNPROCESSABLE_ENTITY],
    [new InsufficientFundsError('USD', 500, 100), HttpStatus.CONFLICT],
    [new InvalidTransactionError('amount must be positive'), HttpStatus.BAD_REQUEST],
    [new ConfigurationError(['interval must be at least 1 second (got 0)']), HttpStatus.BAD_REQUEST],
    [new MonitorStateError('not sleeping'), HttpStatus.CONFLICT],
    [new DataProviderError(DataProviderErrorKind.RATE_LIMITED, 'slow down'), HttpStatus.TOO_MANY_REQUESTS],
    [new DataProviderError(DataProviderErrorKind.AUTH_FAILED, 'bad key'), HttpStatus.BAD_GATEWAY],
    [new DataProviderError(DataProviderErrorKind.NOT_FOUND, 'no such pair'), HttpStatus.NOT_FOUND],
    [new DataProviderError(DataProviderErrorKind.NETWORK, 'timeout'), HttpStatus.BAD_GATEWAY],
    [new DataProviderError(DataProviderErrorKind.MALFORMED, 'missing field'), HttpStatus.BAD_GATEWAY],
    [new Error('boom'), HttpStatus.INTERNAL_SERVER_ERROR],
  ])('maps %s', (error, status) => {
    expect(httpStatusFor(error)).toBe(status);
  });
});

describe('toHttpException', () => {
  it('carries the code, provider kind and retry hint in the body', () => {
    const error = new DataProviderError(DataProviderErrorKind.RATE_LIMITED, 'slow down', 'EUR/USD', 60000);

    const exception = toHttpException(error, 'Quote failed');

    expect(exception.getStatus()).toBe(429);
    expect(exception.getResponse()).toEqual({
      success: false,
      message: 'Quote failed: slow down',
      code: 'DATA_PROVIDER',
      kind: 'RateLimited',
      retryAfterMs: 60000,
    });
  });

  it('reports unknown errors as 500 without a code', () => {
    const exception = toHttpException('plain failure');

    expect(exception.getStatus()).toBe(500);
    expect(exception.getResponse()).toEqual({ success: false, message: 'plain failure' });
  });
});
