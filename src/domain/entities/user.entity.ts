import { DomainErrorCode, ValidationError } from '../errors/domain.errors';
import { isTargetLanguage, TargetLanguage } from '../types/profile.types';

export interface UserProps {
  id: string;
  name?: string;
  email?: string;
  headline?: string;
  summary?: string;
  location?: string;
  preferredLanguage?: TargetLanguage | string;
  createdAt?: Date;
  updatedAt?: Date;
}

export class User {
  readonly id: string;
  name?: string;
  email?: string;
  headline?: string;
  summary?: string;
  location?: string;
  readonly preferredLanguage: TargetLanguage;
  readonly createdAt: Date;
  updatedAt: Date;

  constructor(props: UserProps) {
    if (!props.id) {
      throw new ValidationError(DomainErrorCode.REQUIRED_FIELD, 'user ID is required', 'id');
    }
    const language = props.preferredLanguage ?? TargetLanguage.EN;
    if (!isTargetLanguage(language)) {
      throw new ValidationError(
        DomainErrorCode.INVALID_LANGUAGE_CODE,
        "must be 'en' or 'pt-br'",
        'preferredLanguage'
      );
    }
    this.id = props.id;
    this.name = props.name || undefined;
    this.email = props.email || undefined;
    this.headline = props.headline || undefined;
    this.summary = props.summary || undefined;
    this.location = props.location || undefined;
    this.preferredLanguage = language;
    this.createdAt = props.createdAt ?? new Date();
    this.updatedAt = props.updatedAt ?? this.createdAt;
  }

  get displayName(): string {
    return this.name || this.email || 'Anonymous User';
  }

  setName(name: string): void {
    this.name = name || undefined;
    this.updatedAt = new Date();
  }

  setEmail(email: string): void {
    this.email = email || undefined;
    this.updatedAt = new Date();
  }
}
