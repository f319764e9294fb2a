import { Resume } from '@domain/entities/resume.entity';
import { DomainErrorCode } from '@domain/errors/domain.errors';
import { InMemoryResumeRepository } from '@infrastructure/adapters/in-memory-resume.repository';
import { GetResumeUseCase } from './get-resume.use-case';

describe('GetResumeUseCase', () => {
  let repository: InMemoryResumeRepository;
  let useCase: GetResumeUseCase;

  beforeEach(async () => {
    repository = new InMemoryResumeRepository();
    await repository.save(
      Resume.create({
        id: 'resume-1',
        userId: 'user-1',
        jobDescription: 'Go engineer',
        jobTitle: 'Backend Engineer',
      })
    );
    useCase = new GetResumeUseCase(repository);
  });

  it('should return a resume the caller owns', async () => {
    const resume = await useCase.execute({ resumeId: 'resume-1', userId: 'user-1' });

    expect(resume.id).toBe('resume-1');
    expect(resume.jobTitle).toBe('Backend Engineer');
  });

  it("should report another user's resume as not found", async () => {
    await expect(
      useCase.execute({ resumeId: 'resume-1', userId: 'user-2' })
    ).rejects.toMatchObject({ code: DomainErrorCode.RESUME_NOT_FOUND });
  });

  it('should report a missing resume', async () => {
    await expect(
      useCase.execute({ resumeId: 'resume-9', userId: 'user-1' })
    ).rejects.toThrow('resume not found');
  });
});
