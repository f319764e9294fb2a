import { CallHandler, ExecutionContext, Inject, Injectable, NestInterceptor } from '@nestjs/common';
import { Observable, throwError } from 'rxjs';
import { catchError, tap } from 'rxjs/operators';
import { isDomainError } from '@domain/errors/domain.errors';
import { getErrorInfo } from '../../common/error-assertions';
import { ILoggerPort } from './logger.port';

interface RequestLike {
  method: string;
  url: string;
}

const CONTEXT = 'HTTP';

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  constructor(@Inject('ILoggerPort') private readonly logger: ILoggerPort) {}

  intercept<T>(context: ExecutionContext, next: CallHandler<T>): Observable<T> {
    const { method, url } = context.switchToHttp().getRequest<RequestLike>();
    const startTime = Date.now();

    this.logger.debug('Request received', CONTEXT, { method, url });

    return next.handle().pipe(
      tap(() => {
        this.logger.info('Request completed', CONTEXT, {
          method,
          url,
          statusCode: context.switchToHttp().getResponse<{ statusCode?: number }>().statusCode,
          duration: Date.now() - startTime,
        });
      }),
      catchError((error: unknown) => {
        // The exception filter logs server-side failures with their stack.
        this.logger.warn('Request failed', CONTEXT, {
          method,
          url,
          code: isDomainError(error) ? error.code : undefined,
          reason: getErrorInfo(error).message,
          duration: Date.now() - startTime,
        });
        return throwError(() => error);
      })
    );
  }
}
