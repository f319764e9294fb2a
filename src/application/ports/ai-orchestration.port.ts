import { Bullet } from '@domain/entities/bullet.entity';
import { ResumeContent, TailoredBullet } from '@domain/entities/resume-content';
import { Skill } from '@domain/entities/skill.entity';
import { User } from '@domain/entities/user.entity';
import { TargetLanguage } from '@domain/types/profile.types';
import { MatchScore } from '@domain/value-objects/scores';

/**
 * Per-call context. The signal aborts the backend request and any pending
 * retry sleep.
 */
export interface AiCallContext {
  signal?: AbortSignal;
}

export interface AnalyzeJobRequest {
  jobDescription: string;
  targetLanguage: TargetLanguage;
}

export interface JobAnalysis {
  title: string;
  company: string;
  requiredSkills: string[];
  preferredSkills: string[];
  keywords: string[];
  seniorityLevel: string;
  yearsExperience?: number;
  summary: string;
}

export interface SelectBulletsRequest {
  jobAnalysis: JobAnalysis;
  availableBullets: readonly Bullet[];
  maxBullets: number;
  targetLanguage: TargetLanguage;
}

/** Ids are untrusted: callers must intersect them with the candidates they sent. */
export interface BulletSelection {
  selectedBulletIds: string[];
  reasoning: string;
}

export interface TailorBulletRequest {
  bullet: Bullet;
  jobAnalysis: JobAnalysis;
  targetLanguage: TargetLanguage;
  style: string;
}

export interface TailoredBulletResult {
  originalId: string;
  tailoredContent: string;
  keywords: string[];
}

export interface GenerateSummaryRequest {
  user: User;
  jobAnalysis: JobAnalysis;
  selectedBullets: readonly TailoredBullet[];
  targetLanguage: TargetLanguage;
}

export interface SummaryResult {
  summary: string;
}

export interface ScoreMatchRequest {
  jobAnalysis: JobAnalysis;
  resume: ResumeContent;
  userSkills: readonly Skill[];
}

/**
 * Language-model capabilities used by the tailoring pipeline. Implementations
 * retry transient failures themselves and surface either a validated result,
 * `AiServiceUnavailableError`, `MalformedAiOutputError` or
 * `RequestCancelledError`.
 */
export interface IAiOrchestrationPort {
  analyzeJob(request: AnalyzeJobRequest, context?: AiCallContext): Promise<JobAnalysis>;
  selectBullets(request: SelectBulletsRequest, context?: AiCallContext): Promise<BulletSelection>;
  tailorBullet(
    request: TailorBulletRequest,
    context?: AiCallContext
  ): Promise<TailoredBulletResult>;
  generateSummary(request: GenerateSummaryRequest, context?: AiCallContext): Promise<SummaryResult>;
  scoreMatch(request: ScoreMatchRequest, context?: AiCallContext): Promise<MatchScore>;
}
