import { Resume } from '@domain/entities/resume.entity';
import { ResumeStatus } from '@domain/types/profile.types';

export interface ResumeListQuery {
  limit: number;
  offset: number;
  status?: ResumeStatus;
}

export interface ResumePage {
  items: Resume[];
  total: number;
}

export interface IResumeRepository {
  findById(id: string): Promise<Resume | null>;
  /** Newest first. */
  findByUserId(userId: string, query: ResumeListQuery): Promise<ResumePage>;
  /** Insert or replace by id. */
  save(resume: Resume): Promise<void>;
  delete(id: string): Promise<boolean>;
}
