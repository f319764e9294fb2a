import { Inject, Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { Resume } from '@domain/entities/resume.entity';
import { DomainErrorCode, NotFoundError } from '@domain/errors/domain.errors';
import { ILoggerPort } from '@infrastructure/logging/logger.port';
import { IProfileRepository } from '../ports/profile-repository.port';
import { IResumeRepository } from '../ports/resume-repository.port';

export interface CreateResumeInput {
  userId: string;
  jobDescription: string;
  jobTitle?: string;
  companyName?: string;
  jobUrl?: string;
  /** Defaults to the user's preferred language. */
  targetLanguage?: string;
}

@Injectable()
export class CreateResumeUseCase {
  constructor(
    @Inject('IResumeRepository')
    private readonly resumeRepository: IResumeRepository,
    @Inject('IProfileRepository')
    private readonly profileRepository: IProfileRepository,
    @Inject('ILoggerPort')
    private readonly logger: ILoggerPort
  ) {}

  async execute(input: CreateResumeInput): Promise<Resume> {
    const user = await this.profileRepository.findUserById(input.userId);
    if (!user) {
      throw new NotFoundError(DomainErrorCode.USER_NOT_FOUND, 'user not found');
    }

    const resume = Resume.create({
      id: uuidv4(),
      userId: user.id,
      jobDescription: input.jobDescription,
      jobTitle: input.jobTitle,
      companyName: input.companyName,
      jobUrl: input.jobUrl,
      targetLanguage: input.targetLanguage || user.preferredLanguage,
    });
    await this.resumeRepository.save(resume);

    this.logger.info('Resume draft created', CreateResumeUseCase.name, {
      resumeId: resume.id,
      userId: user.id,
    });
    return resume;
  }
}
