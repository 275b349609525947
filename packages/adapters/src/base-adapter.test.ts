import { describe, it, expect } from 'vitest';
import {
  AppError,
  ConfigError,
  TimeoutError,
  UpstreamError,
  UnauthorizedError,
} from '@northstar/shared';
import { BaseAdapter, type APIErrorLike, type ErrorTypeConfig } from './base-adapter';

class TestAdapter extends BaseAdapter {
  protected readonly errorConfig: ErrorTypeConfig = {
    isAPIError: (error: unknown): error is APIErrorLike =>
      error instanceof Error && 'status' in error,
    isTimeoutError: (error: unknown): boolean => error === 'timeout',
  };

  protected fromStatus(error: APIErrorLike & { status: number }): AppError {
    if (error.status === 401) return new UnauthorizedError(error.message);
    return new UpstreamError(error.message, { status: error.status });
  }

  protected fromTimeout(message: string): AppError {
    return new TimeoutError(message);
  }

  protected fromUnknown(message: string, cause: unknown): AppError {
    return new UpstreamError(message, { cause });
  }

  public map(error: unknown): AppError {
    return this.mapError(error);
  }
}

describe('BaseAdapter.mapError', () => {
  const adapter = new TestAdapter();

  it('passes AppErrors through unchanged', () => {
    const original = new ConfigError('bad');
    expect(adapter.map(original)).toBe(original);
  });

  it('routes status errors to fromStatus', () => {
    const err = adapter.map(Object.assign(new Error('Bad credentials'), { status: 401 }));
    expect(err).toBeInstanceOf(UnauthorizedError);

    const other = adapter.map(Object.assign(new Error('server'), { status: 500 }));
    expect(other).toBeInstanceOf(UpstreamError);
    expect(other).toMatchObject({ status: 500, message: 'server' });
  });

  it('routes timeouts to fromTimeout', () => {
    expect(adapter.map('timeout')).toBeInstanceOf(TimeoutError);
  });

  it('treats API errors without a status as unknown', () => {
    const cause = Object.assign(new Error('connection reset'), { status: undefined });
    const err = adapter.map(cause);
    expect(err).toBeInstanceOf(UpstreamError);
    expect(err.cause).toBe(cause);
  });

  it('stringifies non-Error values', () => {
    expect(adapter.map(123).message).toBe('123');
  });
});
