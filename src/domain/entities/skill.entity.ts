import { DomainErrorCode, ValidationError } from '../errors/domain.errors';
import { ProficiencyLevel } from '../value-objects/scores';

export interface SkillProps {
  id: string;
  userId: string;
  name: string;
  category?: string;
  proficiencyLevel?: ProficiencyLevel;
  yearsOfExperience?: number;
  isHighlighted?: boolean;
  displayOrder?: number;
  createdAt?: Date;
}

export class Skill {
  readonly id: string;
  readonly userId: string;
  readonly name: string;
  category?: string;
  isHighlighted: boolean;
  displayOrder: number;
  readonly createdAt: Date;

  private _proficiencyLevel: ProficiencyLevel;
  private _yearsOfExperience?: number;

  constructor(props: SkillProps) {
    const name = props.name.trim();
    if (!name) {
      throw new ValidationError(DomainErrorCode.EMPTY_SKILL_NAME, 'skill name cannot be empty', 'name');
    }
    this.id = props.id;
    this.userId = props.userId;
    this.name = name;
    this.category = props.category || undefined;
    this._proficiencyLevel = props.proficiencyLevel ?? ProficiencyLevel.default();
    this.setYearsOfExperience(props.yearsOfExperience);
    this.isHighlighted = props.isHighlighted ?? false;
    this.displayOrder = props.displayOrder ?? 0;
    this.createdAt = props.createdAt ?? new Date();
  }

  get proficiencyLevel(): ProficiencyLevel {
    return this._proficiencyLevel;
  }

  get yearsOfExperience(): number | undefined {
    return this._yearsOfExperience;
  }

  setProficiency(level: number): void {
    this._proficiencyLevel = ProficiencyLevel.create(level);
  }

  setYearsOfExperience(years: number | undefined): void {
    if (years !== undefined && (!Number.isFinite(years) || years < 0)) {
      throw new ValidationError(
        DomainErrorCode.VALIDATION_FAILED,
        'years of experience cannot be negative',
        'yearsOfExperience'
      );
    }
    this._yearsOfExperience = years;
  }

  highlight(): void {
    this.isHighlighted = true;
  }

  unhighlight(): void {
    this.isHighlighted = false;
  }

  isExpert(): boolean {
    return this._proficiencyLevel.value >= 80;
  }

  isBeginner(): boolean {
    return this._proficiencyLevel.value < 30;
  }
}
