import { Inject, Injectable } from '@nestjs/common';
import { DomainErrorCode, NotFoundError } from '@domain/errors/domain.errors';
import { ILoggerPort } from '@infrastructure/logging/logger.port';
import { IProfileRepository } from '../ports/profile-repository.port';
import { IResumeRepository } from '../ports/resume-repository.port';

const PAGE_SIZE = 100;

export interface DeleteBulletResult {
  bulletId: string;
  /** Ids of the resumes whose selection lost the bullet. */
  updatedResumeIds: string[];
}

/**
 * Deletes a bullet the caller owns and drops it from every resume selection
 * of that user.
 */
@Injectable()
export class DeleteBulletUseCase {
  constructor(
    @Inject('IProfileRepository')
    private readonly profileRepository: IProfileRepository,
    @Inject('IResumeRepository')
    private readonly resumeRepository: IResumeRepository,
    @Inject('ILoggerPort')
    private readonly logger: ILoggerPort
  ) {}

  async execute(input: { bulletId: string; userId: string }): Promise<DeleteBulletResult> {
    const found = await this.profileRepository.findBulletById(input.bulletId);
    if (!found || found.experience.userId !== input.userId) {
      throw new NotFoundError(DomainErrorCode.BULLET_NOT_FOUND, 'bullet not found');
    }

    await this.profileRepository.deleteBullet(input.bulletId);

    const updatedResumeIds: string[] = [];
    for (let offset = 0; ; offset += PAGE_SIZE) {
      const page = await this.resumeRepository.findByUserId(input.userId, {
        limit: PAGE_SIZE,
        offset,
      });
      for (const resume of page.items) {
        if (resume.removeSelectedBullet(input.bulletId)) {
          await this.resumeRepository.save(resume);
          updatedResumeIds.push(resume.id);
        }
      }
      if (offset + PAGE_SIZE >= page.total) break;
    }

    this.logger.info('Bullet deleted', DeleteBulletUseCase.name, {
      bulletId: input.bulletId,
      updatedResumes: updatedResumeIds.length,
    });
    return { bulletId: input.bulletId, updatedResumeIds };
  }
}
