import { DomainErrorCode, ValidationError, ValidationErrors } from '../errors/domain.errors';
import { ExperienceType, isExperienceType } from '../types/profile.types';
import { CalendarDate } from '../value-objects/calendar-date';
import { Bullet } from './bullet.entity';

export interface ExperienceProps {
  id: string;
  userId: string;
  type: ExperienceType | string;
  title: string;
  organization: string;
  startDate: CalendarDate;
  endDate?: CalendarDate;
  isCurrent?: boolean;
  location?: string;
  description?: string;
  url?: string;
  metadata?: Record<string, unknown>;
  displayOrder?: number;
  bullets?: Bullet[];
  createdAt?: Date;
  updatedAt?: Date;
}

export class Experience {
  readonly id: string;
  readonly userId: string;
  readonly type: ExperienceType;
  title: string;
  organization: string;
  location?: string;
  description?: string;
  url?: string;
  metadata: Record<string, unknown>;
  displayOrder: number;
  readonly createdAt: Date;
  updatedAt: Date;

  private _startDate: CalendarDate;
  private _endDate?: CalendarDate;
  private _isCurrent: boolean;
  private _bullets: Bullet[] = [];

  constructor(props: ExperienceProps) {
    const errors = new ValidationErrors();
    if (!props.id) errors.addFieldError('id', 'experience ID is required');
    if (!props.userId) errors.addFieldError('userId', 'user ID is required');
    if (!props.title.trim()) errors.addFieldError('title', 'title is required');
    if (!props.organization.trim()) {
      errors.addFieldError('organization', 'organization is required');
    }
    if (props.startDate.isZero()) errors.addFieldError('startDate', 'start date is required');
    errors.throwIfAny();

    if (!isExperienceType(props.type)) {
      throw new ValidationError(
        DomainErrorCode.INVALID_EXPERIENCE_TYPE,
        `invalid experience type "${props.type}"`,
        'type'
      );
    }
    const endDate = props.endDate && !props.endDate.isZero() ? props.endDate : undefined;
    Experience.assertRange(props.startDate, endDate);
    if (props.isCurrent && endDate) {
      throw new ValidationError(
        DomainErrorCode.CURRENT_WITH_END_DATE,
        'current experience cannot have an end date',
        'isCurrent'
      );
    }

    this.id = props.id;
    this.userId = props.userId;
    this.type = props.type;
    this.title = props.title.trim();
    this.organization = props.organization.trim();
    this.location = props.location;
    this.description = props.description;
    this.url = props.url;
    this._startDate = props.startDate;
    this._endDate = endDate;
    this._isCurrent = props.isCurrent ?? false;
    this.metadata = { ...(props.metadata ?? {}) };
    this.displayOrder = props.displayOrder ?? 0;
    this.createdAt = props.createdAt ?? new Date();
    this.updatedAt = props.updatedAt ?? this.createdAt;
    for (const bullet of props.bullets ?? []) this.attach(bullet);
  }

  get startDate(): CalendarDate {
    return this._startDate;
  }

  get endDate(): CalendarDate | undefined {
    return this._endDate;
  }

  get isCurrent(): boolean {
    return this._isCurrent;
  }

  get bullets(): readonly Bullet[] {
    return this._bullets;
  }

  /** Setting a real end date ends the experience; passing undefined reopens the range. */
  setEndDate(endDate: CalendarDate | undefined): void {
    const value = endDate && !endDate.isZero() ? endDate : undefined;
    Experience.assertRange(this._startDate, value);
    this._endDate = value;
    if (value) this._isCurrent = false;
    this.touch();
  }

  markAsCurrent(): void {
    this._isCurrent = true;
    this._endDate = undefined;
    this.touch();
  }

  addBullet(bullet: Bullet): void {
    this.attach(bullet);
    this.touch();
  }

  removeBullet(bulletId: string): boolean {
    const index = this._bullets.findIndex((b) => b.id === bulletId);
    if (index === -1) return false;
    this._bullets.splice(index, 1);
    this.touch();
    return true;
  }

  /** Whole months between start and end; -1 while ongoing. */
  durationInMonths(): number {
    if (this._isCurrent || !this._endDate) return -1;
    return Math.max(0, this._startDate.monthsUntil(this._endDate));
  }

  private attach(bullet: Bullet): void {
    bullet.experienceId = this.id;
    this._bullets.push(bullet);
  }

  private touch(): void {
    this.updatedAt = new Date();
  }

  private static assertRange(start: CalendarDate, end: CalendarDate | undefined): void {
    if (end && end.isBefore(start)) {
      throw new ValidationError(
        DomainErrorCode.INVALID_DATE_RANGE,
        'end date must not be before start date',
        'endDate'
      );
    }
  }
}
