import { CallHandler } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { lastValueFrom, of, throwError } from 'rxjs';
import { DomainErrorCode, NotFoundError } from '@domain/errors/domain.errors';
import { LoggingInterceptor } from './logging.interceptor';
import { ILoggerPort } from './logger.port';

describe('LoggingInterceptor', () => {
  let logger: Pick<jest.Mocked<ILoggerPort>, 'debug' | 'info' | 'warn'>;
  let interceptor: LoggingInterceptor;
  const context = new ExecutionContextHost([
    { method: 'GET', url: '/api/resumes' },
    { statusCode: 200 },
  ]);

  beforeEach(() => {
    logger = { debug: jest.fn(), info: jest.fn(), warn: jest.fn() };
    interceptor = new LoggingInterceptor({
      ...logger,
      error: jest.fn(),
      fatal: jest.fn(),
      verbose: jest.fn(),
      log: jest.fn(),
      setLevel: jest.fn(),
      getLevel: jest.fn(),
    });
  });

  it('should log completed requests with their status', async () => {
    const next: CallHandler<string> = { handle: () => of('ok') };

    await expect(lastValueFrom(interceptor.intercept(context, next))).resolves.toBe('ok');

    expect(logger.debug).toHaveBeenCalledWith('Request received', 'HTTP', {
      method: 'GET',
      url: '/api/resumes',
    });
    expect(logger.info).toHaveBeenCalledWith(
      'Request completed',
      'HTTP',
      expect.objectContaining({ method: 'GET', url: '/api/resumes', statusCode: 200 })
    );
  });

  it('should log and rethrow failures', async () => {
    const error = new NotFoundError(DomainErrorCode.RESUME_NOT_FOUND, 'resume not found');
    const next: CallHandler<string> = { handle: () => throwError(() => error) };

    await expect(lastValueFrom(interceptor.intercept(context, next))).rejects.toBe(error);

    expect(logger.warn).toHaveBeenCalledWith(
      'Request failed',
      'HTTP',
      expect.objectContaining({ code: 'RESUME_NOT_FOUND', reason: 'resume not found' })
    );
    expect(logger.info).not.toHaveBeenCalled();
  });
});
