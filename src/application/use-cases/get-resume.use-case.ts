import { Inject, Injectable } from '@nestjs/common';
import { Resume } from '@domain/entities/resume.entity';
import { DomainErrorCode, NotFoundError } from '@domain/errors/domain.errors';
import { IResumeRepository } from '../ports/resume-repository.port';

/** A resume owned by someone else is reported as missing. */
@Injectable()
export class GetResumeUseCase {
  constructor(
    @Inject('IResumeRepository')
    private readonly resumeRepository: IResumeRepository
  ) {}

  async execute(input: { resumeId: string; userId: string }): Promise<Resume> {
    const resume = await this.resumeRepository.findById(input.resumeId);
    if (!resume || resume.userId !== input.userId) {
      throw new NotFoundError(DomainErrorCode.RESUME_NOT_FOUND, 'resume not found');
    }
    return resume;
  }
}
