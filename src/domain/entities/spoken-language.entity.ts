import { DomainErrorCode, ValidationError } from '../errors/domain.errors';
import { isLanguageProficiency, LanguageProficiency } from '../types/profile.types';

export class SpokenLanguage {
  readonly language: string;
  readonly proficiency: LanguageProficiency;

  constructor(
    readonly id: string,
    readonly userId: string,
    language: string,
    proficiency: LanguageProficiency | string,
    public displayOrder = 0,
    readonly createdAt: Date = new Date()
  ) {
    if (!language.trim()) {
      throw new ValidationError(DomainErrorCode.REQUIRED_FIELD, 'language is required', 'language');
    }
    if (!isLanguageProficiency(proficiency)) {
      throw new ValidationError(
        DomainErrorCode.INVALID_LANGUAGE_PROFICIENCY,
        `invalid language proficiency "${proficiency}"`,
        'proficiency'
      );
    }
    this.language = language.trim();
    this.proficiency = proficiency;
  }

  isNative(): boolean {
    return this.proficiency === LanguageProficiency.NATIVE;
  }

  isFluent(): boolean {
    return (
      this.proficiency === LanguageProficiency.NATIVE ||
      this.proficiency === LanguageProficiency.FLUENT
    );
  }
}
