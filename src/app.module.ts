import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER, APP_INTERCEPTOR } from '@nestjs/core';
import aiConfig from './config/ai.config';
import databaseConfig from './config/database.config';
import tailoringConfig from './config/tailoring.config';
import { HealthModule } from './health/health.module';
import { DomainErrorFilter } from './infrastructure/common/domain-error.filter';
import { DatabaseModule } from './infrastructure/database/database.module';
import { LoggingInterceptor } from './infrastructure/logging/logging.interceptor';
import { LoggingModule } from './infrastructure/logging/logging.module';
import { RequestContextMiddleware } from './infrastructure/logging/request-context.middleware';
import { ResumesModule } from './infrastructure/resumes/resumes.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      load: [aiConfig, tailoringConfig, databaseConfig],
    }),
    LoggingModule,
    DatabaseModule.forRoot(),
    HealthModule,
    ResumesModule,
  ],
  providers: [
    {
      provide: APP_INTERCEPTOR,
      useClass: LoggingInterceptor,
    },
    {
      provide: APP_FILTER,
      useClass: DomainErrorFilter,
    },
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(RequestContextMiddleware).forRoutes('*');
  }
}
