import { DynamicModule, Module, Provider } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { MongooseModule } from '@nestjs/mongoose';
import databaseConfig from '@config/database.config';
import { boolFromEnv } from '@config/env.util';
import { ILoggerPort } from '../logging/logger.port';
import { InMemoryProfileRepository } from '../adapters/in-memory-profile.repository';
import { InMemoryResumeRepository } from '../adapters/in-memory-resume.repository';
import { MongoDbProfileRepository } from '../repositories/mongodb-profile.repository';
import { MongoDbResumeRepository } from '../repositories/mongodb-resume.repository';
import { applyProfileSeed, loadProfileSeed } from './profile-seed';
import {
  BULLET_MODEL,
  BulletSchema,
  EXPERIENCE_MODEL,
  ExperienceSchema,
  RESUME_MODEL,
  ResumeSchema,
  SKILL_MODEL,
  SkillSchema,
  USER_MODEL,
  UserSchema,
} from './schemas';

const REPOSITORY_TOKENS = ['IResumeRepository', 'IProfileRepository'];

/**
 * Binds the repository ports to MongoDB, or to in-process maps when
 * USE_IN_MEMORY_DB=true.
 */
@Module({})
export class DatabaseModule {
  static forRoot(): DynamicModule {
    return boolFromEnv('USE_IN_MEMORY_DB', false) ? this.inMemory() : this.mongo();
  }

  private static mongo(): DynamicModule {
    return {
      module: DatabaseModule,
      global: true,
      imports: [
        MongooseModule.forRootAsync({
          imports: [ConfigModule.forFeature(databaseConfig)],
          useFactory: (config: ConfigType<typeof databaseConfig>) => ({
            uri: config.uri,
            ...config.options,
          }),
          inject: [databaseConfig.KEY],
        }),
        MongooseModule.forFeature([
          { name: RESUME_MODEL, schema: ResumeSchema },
          { name: USER_MODEL, schema: UserSchema },
          { name: EXPERIENCE_MODEL, schema: ExperienceSchema },
          { name: BULLET_MODEL, schema: BulletSchema },
          { name: SKILL_MODEL, schema: SkillSchema },
        ]),
      ],
      providers: [
        { provide: 'IResumeRepository', useClass: MongoDbResumeRepository },
        { provide: 'IProfileRepository', useClass: MongoDbProfileRepository },
      ],
      exports: REPOSITORY_TOKENS,
    };
  }

  private static inMemory(): DynamicModule {
    const providers: Provider[] = [
      { provide: 'IResumeRepository', useClass: InMemoryResumeRepository },
      {
        provide: 'IProfileRepository',
        useFactory: async (config: ConfigType<typeof databaseConfig>, logger: ILoggerPort) => {
          const repository = new InMemoryProfileRepository();
          if (config.seedFile) {
            await applyProfileSeed(repository, loadProfileSeed(config.seedFile));
            logger.info('Profile seed loaded', DatabaseModule.name, { file: config.seedFile });
          }
          return repository;
        },
        inject: [databaseConfig.KEY, 'ILoggerPort'],
      },
    ];
    return {
      module: DatabaseModule,
      global: true,
      imports: [ConfigModule.forFeature(databaseConfig)],
      providers,
      exports: REPOSITORY_TOKENS,
    };
  }
}
