import { Inject, Injectable } from '@nestjs/common';
import { DomainErrorCode, NotFoundError } from '@domain/errors/domain.errors';
import { ILoggerPort } from '@infrastructure/logging/logger.port';
import { IResumeRepository } from '../ports/resume-repository.port';

@Injectable()
export class DeleteResumeUseCase {
  constructor(
    @Inject('IResumeRepository')
    private readonly resumeRepository: IResumeRepository,
    @Inject('ILoggerPort')
    private readonly logger: ILoggerPort
  ) {}

  async execute(input: { resumeId: string; userId: string }): Promise<void> {
    const resume = await this.resumeRepository.findById(input.resumeId);
    if (!resume || resume.userId !== input.userId) {
      throw new NotFoundError(DomainErrorCode.RESUME_NOT_FOUND, 'resume not found');
    }

    // a concurrent delete may have won the race
    if (!(await this.resumeRepository.delete(resume.id))) {
      throw new NotFoundError(DomainErrorCode.RESUME_NOT_FOUND, 'resume not found');
    }
    this.logger.info('Resume deleted', DeleteResumeUseCase.name, {
      resumeId: resume.id,
      status: resume.status,
    });
  }
}
