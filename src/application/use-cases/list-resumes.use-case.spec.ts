import { Resume } from '@domain/entities/resume.entity';
import { DomainErrorCode } from '@domain/errors/domain.errors';
import { ResumeStatus } from '@domain/types/profile.types';
import { IResumeRepository } from '../ports/resume-repository.port';
import { ListResumesUseCase } from './list-resumes.use-case';

describe('ListResumesUseCase', () => {
  let resumeRepository: jest.Mocked<IResumeRepository>;
  let useCase: ListResumesUseCase;

  beforeEach(() => {
    const resume = Resume.create({ id: 'resume-1', userId: 'user-1', jobDescription: 'Go' });
    resumeRepository = {
      findById: jest.fn(),
      findByUserId: jest.fn().mockResolvedValue({ items: [resume], total: 1 }),
      save: jest.fn(),
      delete: jest.fn(),
    };
    useCase = new ListResumesUseCase(resumeRepository);
  });

  it('should default to the first fifty resumes', async () => {
    const page = await useCase.execute({ userId: 'user-1' });

    expect(page.total).toBe(1);
    expect(resumeRepository.findByUserId).toHaveBeenCalledWith('user-1', {
      limit: 50,
      offset: 0,
      status: undefined,
    });
  });

  it('should normalise the status filter', async () => {
    await useCase.execute({ userId: 'user-1', status: 'GENERATED', limit: 10, offset: 20 });

    expect(resumeRepository.findByUserId).toHaveBeenCalledWith('user-1', {
      limit: 10,
      offset: 20,
      status: ResumeStatus.GENERATED,
    });
  });

  it('should reject out of range paging', async () => {
    await expect(useCase.execute({ userId: 'user-1', limit: 0, offset: -1 })).rejects.toThrow(
      'multiple validation errors: limit: must be an integer between 1 and 100; ' +
        'offset: must be a non-negative integer'
    );
    expect(resumeRepository.findByUserId).not.toHaveBeenCalled();
  });

  it('should reject an unknown status filter', async () => {
    await expect(useCase.execute({ userId: 'user-1', status: 'archived' })).rejects.toMatchObject({
      code: DomainErrorCode.INVALID_RESUME_STATUS,
    });
  });
});
