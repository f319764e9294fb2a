import { Test, TestingModule } from '@nestjs/testing';
import { getModelToken } from '@nestjs/mongoose';
import { Resume } from '@domain/entities/resume.entity';
import { ResumeStatus } from '@domain/types/profile.types';
import { RESUME_MODEL, ResumeDocument } from '../database/schemas';
import { MongoDbResumeRepository } from './mongodb-resume.repository';

function chain<T>(result: T) {
  const query = {
    sort: jest.fn(),
    skip: jest.fn(),
    limit: jest.fn(),
    exec: jest.fn().mockResolvedValue(result),
  };
  query.sort.mockReturnValue(query);
  query.skip.mockReturnValue(query);
  query.limit.mockReturnValue(query);
  return query;
}

const storedDoc: ResumeDocument = {
  id: 'resume-1',
  userId: 'user-1',
  jobDescription: 'Go engineer',
  jobTitle: 'Backend Engineer',
  targetLanguage: 'pt-br',
  selectedBulletIds: ['b1', 'b2'],
  score: 77,
  status: 'generated',
  createdAt: new Date('2024-05-01T10:00:00Z'),
  updatedAt: new Date('2024-05-02T10:00:00Z'),
};

describe('MongoDbResumeRepository', () => {
  let repository: MongoDbResumeRepository;
  let mockModel: {
    findOne: jest.Mock;
    find: jest.Mock;
    countDocuments: jest.Mock;
    findOneAndUpdate: jest.Mock;
    deleteOne: jest.Mock;
  };

  beforeEach(async () => {
    mockModel = {
      findOne: jest.fn(),
      find: jest.fn(),
      countDocuments: jest.fn(),
      findOneAndUpdate: jest.fn().mockResolvedValue({}),
      deleteOne: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MongoDbResumeRepository,
        { provide: getModelToken(RESUME_MODEL), useValue: mockModel },
      ],
    }).compile();

    repository = module.get<MongoDbResumeRepository>(MongoDbResumeRepository);
  });

  describe('save', () => {
    it('should upsert the resume snapshot by id', async () => {
      const resume = Resume.create({ id: 'resume-1', userId: 'user-1', jobDescription: 'Go' });
      resume.selectBullets(['b1']);

      await repository.save(resume);

      expect(mockModel.findOneAndUpdate).toHaveBeenCalledWith(
        { id: 'resume-1' },
        expect.objectContaining({
          id: 'resume-1',
          userId: 'user-1',
          status: 'draft',
          selectedBulletIds: ['b1'],
          score: 0,
        }),
        { upsert: true, new: true }
      );
    });
  });

  describe('findById', () => {
    it('should restore the aggregate from its document', async () => {
      mockModel.findOne.mockReturnValue(chain(storedDoc));

      const resume = await repository.findById('resume-1');

      expect(mockModel.findOne).toHaveBeenCalledWith({ id: 'resume-1' });
      expect(resume?.status).toBe(ResumeStatus.GENERATED);
      expect(resume?.score.value).toBe(77);
      expect(resume?.selectedBulletIds).toEqual(['b1', 'b2']);
      expect(resume?.jobDisplayName).toBe('Backend Engineer');
    });

    it('should return null when the resume does not exist', async () => {
      mockModel.findOne.mockReturnValue(chain(null));

      expect(await repository.findById('missing')).toBeNull();
    });
  });

  describe('findByUserId', () => {
    it('should page newest first and filter by status', async () => {
      const query = chain([storedDoc]);
      mockModel.find.mockReturnValue(query);
      mockModel.countDocuments.mockReturnValue(chain(3));

      const page = await repository.findByUserId('user-1', {
        limit: 1,
        offset: 2,
        status: ResumeStatus.GENERATED,
      });

      expect(page.total).toBe(3);
      expect(page.items.map((r) => r.id)).toEqual(['resume-1']);
      expect(mockModel.find).toHaveBeenCalledWith({ userId: 'user-1', status: 'generated' });
      expect(query.sort).toHaveBeenCalledWith({ createdAt: -1 });
      expect(query.skip).toHaveBeenCalledWith(2);
      expect(query.limit).toHaveBeenCalledWith(1);
    });
  });

  describe('delete', () => {
    it('should report whether a document was removed', async () => {
      mockModel.deleteOne.mockReturnValue(chain({ deletedCount: 1 }));

      expect(await repository.delete('resume-1')).toBe(true);
      expect(mockModel.deleteOne).toHaveBeenCalledWith({ id: 'resume-1' });
    });
  });
});
