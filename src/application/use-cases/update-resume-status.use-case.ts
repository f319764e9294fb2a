import { Inject, Injectable } from '@nestjs/common';
import { Resume } from '@domain/entities/resume.entity';
import { DomainErrorCode, NotFoundError } from '@domain/errors/domain.errors';
import { ILoggerPort } from '@infrastructure/logging/logger.port';
import { IResumeRepository } from '../ports/resume-repository.port';

export interface UpdateResumeStatusInput {
  resumeId: string;
  userId: string;
  status: string;
  /** Replaces the notes when given; an empty string clears them. */
  notes?: string;
}

@Injectable()
export class UpdateResumeStatusUseCase {
  constructor(
    @Inject('IResumeRepository')
    private readonly resumeRepository: IResumeRepository,
    @Inject('ILoggerPort')
    private readonly logger: ILoggerPort
  ) {}

  async execute(input: UpdateResumeStatusInput): Promise<Resume> {
    const resume = await this.resumeRepository.findById(input.resumeId);
    if (!resume || resume.userId !== input.userId) {
      throw new NotFoundError(DomainErrorCode.RESUME_NOT_FOUND, 'resume not found');
    }

    const from = resume.status;
    resume.transitionStatus(input.status);
    if (input.notes !== undefined) resume.setNotes(input.notes);
    await this.resumeRepository.save(resume);

    this.logger.info('Resume status changed', UpdateResumeStatusUseCase.name, {
      resumeId: resume.id,
      from,
      to: resume.status,
    });
    return resume;
  }
}
