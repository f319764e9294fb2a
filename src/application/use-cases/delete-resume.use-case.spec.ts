import { Resume } from '@domain/entities/resume.entity';
import { DomainErrorCode } from '@domain/errors/domain.errors';
import { InMemoryResumeRepository } from '@infrastructure/adapters/in-memory-resume.repository';
import { ILoggerPort } from '@infrastructure/logging/logger.port';
import { DeleteResumeUseCase } from './delete-resume.use-case';

describe('DeleteResumeUseCase', () => {
  let repository: InMemoryResumeRepository;
  let logger: jest.Mocked<ILoggerPort>;
  let useCase: DeleteResumeUseCase;

  beforeEach(async () => {
    repository = new InMemoryResumeRepository();
    await repository.save(
      Resume.create({ id: 'resume-1', userId: 'user-1', jobDescription: 'Go engineer' })
    );
    logger = {
      debug: jest.fn(),
      info: jest.fn(),
      warn: jest.fn(),
      error: jest.fn(),
      fatal: jest.fn(),
      verbose: jest.fn(),
      log: jest.fn(),
      setLevel: jest.fn(),
      getLevel: jest.fn(),
    };
    useCase = new DeleteResumeUseCase(repository, logger);
  });

  it('should delete a resume the caller owns', async () => {
    await useCase.execute({ resumeId: 'resume-1', userId: 'user-1' });

    expect(await repository.findById('resume-1')).toBeNull();
    expect(logger.info).toHaveBeenCalledWith('Resume deleted', 'DeleteResumeUseCase', {
      resumeId: 'resume-1',
      status: 'draft',
    });
  });

  it("should keep another user's resume and report it as not found", async () => {
    await expect(
      useCase.execute({ resumeId: 'resume-1', userId: 'user-2' })
    ).rejects.toMatchObject({ code: DomainErrorCode.RESUME_NOT_FOUND });

    expect(await repository.findById('resume-1')).not.toBeNull();
  });

  it('should report a resume that is already gone', async () => {
    await useCase.execute({ resumeId: 'resume-1', userId: 'user-1' });

    await expect(
      useCase.execute({ resumeId: 'resume-1', userId: 'user-1' })
    ).rejects.toThrow('resume not found');
  });
});
