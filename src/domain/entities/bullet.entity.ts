import { DomainErrorCode, ValidationError, ValidationErrors } from '../errors/domain.errors';
import { ImpactScore } from '../value-objects/scores';

export interface BulletProps {
  id: string;
  experienceId: string;
  content: string;
  impactScore?: ImpactScore;
  keywords?: string[];
  metadata?: Record<string, unknown>;
  displayOrder?: number;
  createdAt?: Date;
  updatedAt?: Date;
}

/**
 * One atomic achievement or responsibility statement. Bullets are the unit the
 * tailoring pipeline selects and rewrites.
 */
export class Bullet {
  readonly id: string;
  experienceId: string;
  metadata: Record<string, unknown>;
  displayOrder: number;
  readonly createdAt: Date;
  updatedAt: Date;

  private _content: string;
  private _impactScore: ImpactScore;
  private _keywords: string[] = [];

  constructor(props: BulletProps) {
    const errors = new ValidationErrors();
    if (!props.id) errors.addFieldError('id', 'bullet ID is required');
    if (!props.experienceId) errors.addFieldError('experienceId', 'experience ID is required');
    errors.throwIfAny();

    this.id = props.id;
    this.experienceId = props.experienceId;
    this._content = Bullet.cleanContent(props.content);
    this._impactScore = props.impactScore ?? ImpactScore.default();
    for (const keyword of props.keywords ?? []) this.pushKeyword(keyword);
    this.metadata = { ...(props.metadata ?? {}) };
    this.displayOrder = props.displayOrder ?? 0;
    this.createdAt = props.createdAt ?? new Date();
    this.updatedAt = props.updatedAt ?? this.createdAt;
  }

  get content(): string {
    return this._content;
  }

  get impactScore(): ImpactScore {
    return this._impactScore;
  }

  get keywords(): readonly string[] {
    return this._keywords;
  }

  updateContent(content: string): void {
    this._content = Bullet.cleanContent(content);
    this.touch();
  }

  setImpactScore(score: number): void {
    this._impactScore = ImpactScore.create(score);
    this.touch();
  }

  setKeywords(keywords: string[]): void {
    this._keywords = [];
    for (const keyword of keywords) this.pushKeyword(keyword);
    this.touch();
  }

  addKeyword(keyword: string): void {
    if (this.pushKeyword(keyword)) this.touch();
  }

  hasKeyword(keyword: string): boolean {
    return this._keywords.includes(keyword);
  }

  isHighImpact(): boolean {
    return this._impactScore.value >= 70;
  }

  isLowImpact(): boolean {
    return this._impactScore.value < 40;
  }

  private pushKeyword(keyword: string): boolean {
    const trimmed = keyword.trim();
    if (!trimmed || this._keywords.includes(trimmed)) return false;
    this._keywords.push(trimmed);
    return true;
  }

  private touch(): void {
    this.updatedAt = new Date();
  }

  private static cleanContent(content: string): string {
    const trimmed = content.trim();
    if (!trimmed) {
      throw new ValidationError(
        DomainErrorCode.EMPTY_BULLET_CONTENT,
        'bullet content cannot be empty',
        'content'
      );
    }
    return trimmed;
  }
}
