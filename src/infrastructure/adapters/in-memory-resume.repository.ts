import { Injectable } from '@nestjs/common';
import {
  IResumeRepository,
  ResumeListQuery,
  ResumePage,
} from '@application/ports/resume-repository.port';
import { Resume, ResumeSnapshot } from '@domain/entities/resume.entity';

/**
 * Keeps snapshots rather than live aggregates, so callers only see changes
 * they have saved.
 */
@Injectable()
export class InMemoryResumeRepository implements IResumeRepository {
  private readonly resumes = new Map<string, ResumeSnapshot>();

  async findById(id: string): Promise<Resume | null> {
    const snapshot = this.resumes.get(id);
    return snapshot ? Resume.restore(structuredClone(snapshot)) : null;
  }

  async findByUserId(userId: string, query: ResumeListQuery): Promise<ResumePage> {
    const matching = [...this.resumes.values()]
      .filter((r) => r.userId === userId && (!query.status || r.status === query.status))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
    return {
      items: matching
        .slice(query.offset, query.offset + query.limit)
        .map((snapshot) => Resume.restore(structuredClone(snapshot))),
      total: matching.length,
    };
  }

  async save(resume: Resume): Promise<void> {
    this.resumes.set(resume.id, structuredClone(resume.toSnapshot()));
  }

  async delete(id: string): Promise<boolean> {
    return this.resumes.delete(id);
  }
}
