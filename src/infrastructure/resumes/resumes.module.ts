import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import tailoringConfig from '@config/tailoring.config';
import { CreateResumeUseCase } from '@application/use-cases/create-resume.use-case';
import { DeleteBulletUseCase } from '@application/use-cases/delete-bullet.use-case';
import { DeleteResumeUseCase } from '@application/use-cases/delete-resume.use-case';
import { GetResumeUseCase } from '@application/use-cases/get-resume.use-case';
import { ListResumesUseCase } from '@application/use-cases/list-resumes.use-case';
import { TailorResumeUseCase } from '@application/use-cases/tailor-resume.use-case';
import { UpdateResumeStatusUseCase } from '@application/use-cases/update-resume-status.use-case';
import { AiModule } from '../ai/ai.module';
import { BulletsController } from './bullets.controller';
import { ResumesController } from './resumes.controller';

// Repositories come from the global DatabaseModule.
@Module({
  imports: [AiModule, ConfigModule.forFeature(tailoringConfig)],
  controllers: [ResumesController, BulletsController],
  providers: [
    CreateResumeUseCase,
    ListResumesUseCase,
    TailorResumeUseCase,
    UpdateResumeStatusUseCase,
    GetResumeUseCase,
    DeleteResumeUseCase,
    DeleteBulletUseCase,
  ],
})
export class ResumesModule {}
