import { DomainErrorCode, ValidationError } from '../errors/domain.errors';

const MIN_SCORE = 0;
const MAX_SCORE = 100;

function assertBounded(
  value: number,
  code: DomainErrorCode,
  field: string,
  label: string,
): void {
  if (!Number.isInteger(value) || value < MIN_SCORE || value > MAX_SCORE) {
    throw new ValidationError(
      code,
      `${label} must be an integer between ${MIN_SCORE} and ${MAX_SCORE}`,
      field,
    );
  }
}

/**
 * Shared behaviour of the 0-100 scores. Subclasses keep their constructors
 * private so the validating factory is the only way in.
 */
abstract class BoundedScore {
  protected constructor(readonly value: number) {}

  toNumber(): number {
    return this.value;
  }

  toJSON(): number {
    return this.value;
  }

  toString(): string {
    return String(this.value);
  }

  equals(other: BoundedScore): boolean {
    return this.constructor === other.constructor && this.value === other.value;
  }
}

export class ImpactScore extends BoundedScore {
  static readonly DEFAULT = 50;

  private constructor(value: number) {
    super(value);
  }

  static create(value: number): ImpactScore {
    assertBounded(value, DomainErrorCode.INVALID_IMPACT_SCORE, 'impactScore', 'impact score');
    return new ImpactScore(value);
  }

  static default(): ImpactScore {
    return new ImpactScore(ImpactScore.DEFAULT);
  }
}

export class ProficiencyLevel extends BoundedScore {
  static readonly DEFAULT = 50;

  private constructor(value: number) {
    super(value);
  }

  static create(value: number): ProficiencyLevel {
    assertBounded(
      value,
      DomainErrorCode.INVALID_PROFICIENCY_LEVEL,
      'proficiencyLevel',
      'proficiency level',
    );
    return new ProficiencyLevel(value);
  }

  static default(): ProficiencyLevel {
    return new ProficiencyLevel(ProficiencyLevel.DEFAULT);
  }
}

export class MatchScore extends BoundedScore {
  private constructor(value: number) {
    super(value);
  }

  static create(value: number): MatchScore {
    assertBounded(value, DomainErrorCode.INVALID_MATCH_SCORE, 'score', 'match score');
    return new MatchScore(value);
  }

  static zero(): MatchScore {
    return new MatchScore(MIN_SCORE);
  }
}
