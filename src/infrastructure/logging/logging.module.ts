import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { RequestContextService } from './request-context.service';
import { RequestContextMiddleware } from './request-context.middleware';
import { WinstonLoggerAdapter } from './winston-logger.adapter';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    RequestContextService,
    RequestContextMiddleware,
    WinstonLoggerAdapter,
    {
      provide: 'ILoggerPort',
      useExisting: WinstonLoggerAdapter,
    },
  ],
  exports: ['ILoggerPort', WinstonLoggerAdapter, RequestContextService, RequestContextMiddleware],
})
export class LoggingModule {}
