import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import {
  IResumeRepository,
  ResumeListQuery,
  ResumePage,
} from '@application/ports/resume-repository.port';
import { Resume } from '@domain/entities/resume.entity';
import { RESUME_MODEL, ResumeDocument } from '../database/schemas';

@Injectable()
export class MongoDbResumeRepository implements IResumeRepository {
  constructor(
    @InjectModel(RESUME_MODEL)
    private readonly resumeModel: Model<ResumeDocument>
  ) {}

  async findById(id: string): Promise<Resume | null> {
    const doc = await this.resumeModel.findOne({ id }).exec();
    if (!doc) return null;
    return this.mapToEntity(doc);
  }

  async findByUserId(userId: string, query: ResumeListQuery): Promise<ResumePage> {
    const filter = query.status ? { userId, status: query.status } : { userId };
    const [docs, total] = await Promise.all([
      this.resumeModel
        .find(filter)
        .sort({ createdAt: -1 })
        .skip(query.offset)
        .limit(query.limit)
        .exec(),
      this.resumeModel.countDocuments(filter).exec(),
    ]);
    return { items: docs.map((doc) => this.mapToEntity(doc)), total };
  }

  async save(resume: Resume): Promise<void> {
    await this.resumeModel.findOneAndUpdate({ id: resume.id }, resume.toSnapshot(), {
      upsert: true,
      new: true,
    });
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.resumeModel.deleteOne({ id }).exec();
    return result.deletedCount > 0;
  }

  private mapToEntity(doc: ResumeDocument): Resume {
    return Resume.restore({
      id: doc.id,
      userId: doc.userId,
      jobDescription: doc.jobDescription,
      jobTitle: doc.jobTitle,
      companyName: doc.companyName,
      jobUrl: doc.jobUrl,
      targetLanguage: doc.targetLanguage,
      selectedBulletIds: [...doc.selectedBulletIds],
      generatedContent: doc.generatedContent,
      pdfUrl: doc.pdfUrl,
      score: doc.score,
      notes: doc.notes,
      status: doc.status,
      createdAt: doc.createdAt,
      updatedAt: doc.updatedAt,
    });
  }
}
