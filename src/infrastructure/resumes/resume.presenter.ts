import { Resume, ResumeSnapshot } from '@domain/entities/resume.entity';

export interface ResumeResponse extends Omit<ResumeSnapshot, 'createdAt' | 'updatedAt'> {
  jobDisplayName: string;
  createdAt: string;
  updatedAt: string;
}

export interface ResumeListResponse {
  items: ResumeResponse[];
  total: number;
  limit: number;
  offset: number;
}

export function toResumeResponse(resume: Resume): ResumeResponse {
  const snapshot = resume.toSnapshot();
  return {
    ...snapshot,
    jobDisplayName: resume.jobDisplayName,
    createdAt: snapshot.createdAt.toISOString(),
    updatedAt: snapshot.updatedAt.toISOString(),
  };
}
