import {
  DomainErrorCode,
  InvalidStatusTransitionError,
  ValidationError,
  ValidationErrors,
} from '../errors/domain.errors';
import { assertTransition, canGenerate, parseResumeStatus } from '../services/resume-status-machine';
import { isTargetLanguage, ResumeStatus, TargetLanguage } from '../types/profile.types';
import { MatchScore } from '../value-objects/scores';
import { ResumeContent } from './resume-content';

export interface CreateResumeProps {
  id: string;
  userId: string;
  jobDescription: string;
  jobTitle?: string;
  companyName?: string;
  jobUrl?: string;
  targetLanguage?: TargetLanguage | string;
}

/** Plain persisted shape of a resume. */
export interface ResumeSnapshot {
  id: string;
  userId: string;
  jobDescription: string;
  jobTitle?: string;
  companyName?: string;
  jobUrl?: string;
  targetLanguage: string;
  selectedBulletIds: string[];
  generatedContent?: ResumeContent;
  pdfUrl?: string;
  score: number;
  notes?: string;
  status: string;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Resume aggregate. Status only moves along the edges of the status machine,
 * and the job description never changes after creation.
 */
export class Resume {
  jobTitle?: string;
  companyName?: string;
  jobUrl?: string;
  pdfUrl?: string;
  notes?: string;

  private _selectedBulletIds: string[] = [];
  private _generatedContent?: ResumeContent;
  private _score: MatchScore = MatchScore.zero();
  private _status: ResumeStatus = ResumeStatus.DRAFT;

  private constructor(
    readonly id: string,
    readonly userId: string,
    readonly jobDescription: string,
    readonly targetLanguage: TargetLanguage,
    readonly createdAt: Date,
    public updatedAt: Date
  ) {}

  static create(props: CreateResumeProps): Resume {
    const language = Resume.validate(props);
    const now = new Date();
    const resume = new Resume(
      props.id,
      props.userId,
      props.jobDescription.trim(),
      language,
      now,
      now
    );
    resume.jobTitle = props.jobTitle || undefined;
    resume.companyName = props.companyName || undefined;
    resume.jobUrl = props.jobUrl || undefined;
    return resume;
  }

  static restore(snapshot: ResumeSnapshot): Resume {
    const language = Resume.validate(snapshot);
    const resume = new Resume(
      snapshot.id,
      snapshot.userId,
      snapshot.jobDescription,
      language,
      snapshot.createdAt,
      snapshot.updatedAt
    );
    resume.jobTitle = snapshot.jobTitle || undefined;
    resume.companyName = snapshot.companyName || undefined;
    resume.jobUrl = snapshot.jobUrl || undefined;
    resume.pdfUrl = snapshot.pdfUrl || undefined;
    resume.notes = snapshot.notes || undefined;
    resume._selectedBulletIds = [...new Set(snapshot.selectedBulletIds)];
    resume._generatedContent = snapshot.generatedContent;
    resume._score = MatchScore.create(snapshot.score);
    resume._status = parseResumeStatus(snapshot.status);
    return resume;
  }

  get status(): ResumeStatus {
    return this._status;
  }

  get score(): MatchScore {
    return this._score;
  }

  get selectedBulletIds(): readonly string[] {
    return this._selectedBulletIds;
  }

  get generatedContent(): ResumeContent | undefined {
    return this._generatedContent;
  }

  get jobDisplayName(): string {
    if (this.jobTitle && this.companyName) return `${this.jobTitle} at ${this.companyName}`;
    if (this.jobTitle) return this.jobTitle;
    if (this.companyName) return `Position at ${this.companyName}`;
    return 'Untitled Resume';
  }

  /** Only non-empty values overwrite. */
  setJobDetails(title?: string, company?: string, url?: string): void {
    if (title) this.jobTitle = title;
    if (company) this.companyName = company;
    if (url) this.jobUrl = url;
    this.touch();
  }

  selectBullets(bulletIds: readonly string[]): void {
    this._selectedBulletIds = [...new Set(bulletIds)];
    this.touch();
  }

  addSelectedBullet(bulletId: string): void {
    if (this._selectedBulletIds.includes(bulletId)) return;
    this._selectedBulletIds.push(bulletId);
    this.touch();
  }

  removeSelectedBullet(bulletId: string): boolean {
    const index = this._selectedBulletIds.indexOf(bulletId);
    if (index === -1) return false;
    this._selectedBulletIds.splice(index, 1);
    this.touch();
    return true;
  }

  /** Stores tailoring output and moves the resume to `generated`. */
  setGeneratedContent(content: ResumeContent): void {
    if (!canGenerate(this._status)) {
      throw new InvalidStatusTransitionError(this._status, ResumeStatus.GENERATED);
    }
    this._generatedContent = content;
    this._status = ResumeStatus.GENERATED;
    this.touch();
  }

  setScore(score: MatchScore | number): void {
    this._score = typeof score === 'number' ? MatchScore.create(score) : score;
    this.touch();
  }

  transitionStatus(next: ResumeStatus | string): void {
    const target = parseResumeStatus(next);
    assertTransition(this._status, target);
    this._status = target;
    this.touch();
  }

  setNotes(notes: string | undefined): void {
    this.notes = notes || undefined;
    this.touch();
  }

  isGenerated(): boolean {
    return this._status === ResumeStatus.GENERATED || this._status === ResumeStatus.REVIEWED;
  }

  isSubmitted(): boolean {
    return [
      ResumeStatus.SUBMITTED,
      ResumeStatus.INTERVIEW,
      ResumeStatus.REJECTED,
      ResumeStatus.ACCEPTED,
    ].includes(this._status);
  }

  canGeneratePdf(): boolean {
    return this._generatedContent !== undefined && this.isGenerated();
  }

  toSnapshot(): ResumeSnapshot {
    return {
      id: this.id,
      userId: this.userId,
      jobDescription: this.jobDescription,
      jobTitle: this.jobTitle,
      companyName: this.companyName,
      jobUrl: this.jobUrl,
      targetLanguage: this.targetLanguage,
      selectedBulletIds: [...this._selectedBulletIds],
      generatedContent: this._generatedContent,
      pdfUrl: this.pdfUrl,
      score: this._score.value,
      notes: this.notes,
      status: this._status,
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
    };
  }

  private touch(): void {
    this.updatedAt = new Date();
  }

  private static validate(props: {
    id: string;
    userId: string;
    jobDescription: string;
    targetLanguage?: string;
  }): TargetLanguage {
    const errors = new ValidationErrors();
    if (!props.id) errors.addFieldError('id', 'resume ID is required');
    if (!props.userId) errors.addFieldError('userId', 'user ID is required');
    errors.throwIfAny();
    if (!props.jobDescription.trim()) {
      throw new ValidationError(
        DomainErrorCode.EMPTY_JOB_DESCRIPTION,
        'job description cannot be empty',
        'jobDescription'
      );
    }
    const language = props.targetLanguage || TargetLanguage.EN;
    if (!isTargetLanguage(language)) {
      throw new ValidationError(
        DomainErrorCode.INVALID_LANGUAGE_CODE,
        "must be 'en' or 'pt-br'",
        'targetLanguage'
      );
    }
    return language;
  }
}
