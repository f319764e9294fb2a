import { Test, TestingModule } from '@nestjs/testing';
import { CreateResumeUseCase } from '@application/use-cases/create-resume.use-case';
import { DeleteResumeUseCase } from '@application/use-cases/delete-resume.use-case';
import { GetResumeUseCase } from '@application/use-cases/get-resume.use-case';
import { ListResumesUseCase } from '@application/use-cases/list-resumes.use-case';
import { TailorResumeUseCase } from '@application/use-cases/tailor-resume.use-case';
import { UpdateResumeStatusUseCase } from '@application/use-cases/update-resume-status.use-case';
import { Resume } from '@domain/entities/resume.entity';
import { DomainErrorCode, NotFoundError } from '@domain/errors/domain.errors';
import { ExperienceType, ResumeStatus } from '@domain/types/profile.types';
import { ResumesController } from './resumes.controller';

describe('ResumesController', () => {
  let controller: ResumesController;
  let resume: Resume;
  let createResume: Pick<jest.Mocked<CreateResumeUseCase>, 'execute'>;
  let listResumes: Pick<jest.Mocked<ListResumesUseCase>, 'execute'>;
  let tailorResume: Pick<jest.Mocked<TailorResumeUseCase>, 'execute'>;
  let updateResumeStatus: Pick<jest.Mocked<UpdateResumeStatusUseCase>, 'execute'>;
  let getResume: Pick<jest.Mocked<GetResumeUseCase>, 'execute'>;
  let deleteResume: Pick<jest.Mocked<DeleteResumeUseCase>, 'execute'>;

  beforeEach(async () => {
    resume = Resume.create({
      id: 'resume-1',
      userId: 'user-1',
      jobDescription: 'Backend role working with Go',
      jobTitle: 'Backend Engineer',
      companyName: 'Acme',
    });
    createResume = { execute: jest.fn().mockResolvedValue(resume) };
    listResumes = { execute: jest.fn().mockResolvedValue({ items: [resume], total: 1 }) };
    tailorResume = { execute: jest.fn().mockResolvedValue(resume) };
    updateResumeStatus = { execute: jest.fn().mockResolvedValue(resume) };
    getResume = { execute: jest.fn().mockResolvedValue(resume) };
    deleteResume = { execute: jest.fn().mockResolvedValue(undefined) };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [ResumesController],
      providers: [
        { provide: CreateResumeUseCase, useValue: createResume },
        { provide: ListResumesUseCase, useValue: listResumes },
        { provide: TailorResumeUseCase, useValue: tailorResume },
        { provide: UpdateResumeStatusUseCase, useValue: updateResumeStatus },
        { provide: GetResumeUseCase, useValue: getResume },
        { provide: DeleteResumeUseCase, useValue: deleteResume },
      ],
    }).compile();

    controller = module.get<ResumesController>(ResumesController);
  });

  describe('create', () => {
    it('should create a draft for the caller', async () => {
      const result = await controller.create('user-1', {
        jobDescription: 'Backend role working with Go',
        jobTitle: 'Backend Engineer',
        companyName: 'Acme',
      });

      expect(createResume.execute).toHaveBeenCalledWith({
        userId: 'user-1',
        jobDescription: 'Backend role working with Go',
        jobTitle: 'Backend Engineer',
        companyName: 'Acme',
      });
      expect(result).toMatchObject({
        id: 'resume-1',
        jobDisplayName: 'Backend Engineer at Acme',
        status: ResumeStatus.DRAFT,
        targetLanguage: 'en',
        score: 0,
        selectedBulletIds: [],
        createdAt: resume.createdAt.toISOString(),
      });
    });
  });

  describe('list', () => {
    it('should apply the default page when none is given', async () => {
      const result = await controller.list('user-1', {});

      expect(listResumes.execute).toHaveBeenCalledWith({
        userId: 'user-1',
        status: undefined,
        limit: 50,
        offset: 0,
      });
      expect(result.total).toBe(1);
      expect(result.limit).toBe(50);
      expect(result.offset).toBe(0);
      expect(result.items.map((item) => item.id)).toEqual(['resume-1']);
    });

    it('should forward the status filter and page', async () => {
      await controller.list('user-1', { status: ResumeStatus.GENERATED, limit: 10, offset: 20 });

      expect(listResumes.execute).toHaveBeenCalledWith({
        userId: 'user-1',
        status: ResumeStatus.GENERATED,
        limit: 10,
        offset: 20,
      });
    });
  });

  describe('get', () => {
    it('should return a resume the caller owns', async () => {
      const result = await controller.get('user-1', 'resume-1');

      expect(result.id).toBe('resume-1');
      expect(getResume.execute).toHaveBeenCalledWith({ resumeId: 'resume-1', userId: 'user-1' });
    });

    it('should propagate a missing resume', async () => {
      getResume.execute.mockRejectedValue(
        new NotFoundError(DomainErrorCode.RESUME_NOT_FOUND, 'resume not found')
      );

      await expect(controller.get('user-2', 'resume-1')).rejects.toMatchObject({
        code: DomainErrorCode.RESUME_NOT_FOUND,
      });
    });
  });

  describe('remove', () => {
    it('should delete the resume for the caller', async () => {
      await expect(controller.remove('user-1', 'resume-1')).resolves.toBeUndefined();

      expect(deleteResume.execute).toHaveBeenCalledWith({
        resumeId: 'resume-1',
        userId: 'user-1',
      });
    });
  });

  describe('tailor', () => {
    it('should run the pipeline with the options and the disconnect signal', async () => {
      const signal = new AbortController().signal;
      const options = { maxBullets: 5, experienceTypes: [ExperienceType.WORK] };

      const result = await controller.tailor('user-1', 'resume-1', options, signal);

      expect(tailorResume.execute).toHaveBeenCalledWith({
        resumeId: 'resume-1',
        userId: 'user-1',
        options,
        signal,
      });
      expect(result.id).toBe('resume-1');
    });
  });

  describe('updateStatus', () => {
    it('should forward the status change', async () => {
      await controller.updateStatus('user-1', 'resume-1', {
        status: ResumeStatus.REVIEWED,
        notes: 'ready to send',
      });

      expect(updateResumeStatus.execute).toHaveBeenCalledWith({
        resumeId: 'resume-1',
        userId: 'user-1',
        status: ResumeStatus.REVIEWED,
        notes: 'ready to send',
      });
    });
  });
});
