export enum ExperienceType {
  WORK = 'work',
  EDUCATION = 'education',
  CERTIFICATION = 'certification',
  PROJECT = 'project',
  FREELANCE = 'freelance',
  VOLUNTEER = 'volunteer',
  OPEN_SOURCE = 'open_source',
  HACKATHON = 'hackathon',
  SIDE_PROJECT = 'side_project',
  EVENT_ORGANIZATION = 'event_organization',
  PUBLICATION = 'publication',
  AWARD = 'award',
}

export enum LanguageProficiency {
  NATIVE = 'native',
  FLUENT = 'fluent',
  ADVANCED = 'advanced',
  INTERMEDIATE = 'intermediate',
  BASIC = 'basic',
}

export enum ResumeStatus {
  DRAFT = 'draft',
  GENERATED = 'generated',
  REVIEWED = 'reviewed',
  SUBMITTED = 'submitted',
  INTERVIEW = 'interview',
  REJECTED = 'rejected',
  ACCEPTED = 'accepted',
}

export enum TargetLanguage {
  EN = 'en',
  PT_BR = 'pt-br',
}

const EXPERIENCE_TYPES: ReadonlySet<string> = new Set(Object.values(ExperienceType));
const LANGUAGE_PROFICIENCIES: ReadonlySet<string> = new Set(
  Object.values(LanguageProficiency)
);
const TARGET_LANGUAGES: ReadonlySet<string> = new Set(Object.values(TargetLanguage));
const RESUME_STATUSES: ReadonlySet<string> = new Set(Object.values(ResumeStatus));

export function isExperienceType(value: string): value is ExperienceType {
  return EXPERIENCE_TYPES.has(value);
}

export function isLanguageProficiency(value: string): value is LanguageProficiency {
  return LANGUAGE_PROFICIENCIES.has(value);
}

export function isTargetLanguage(value: string): value is TargetLanguage {
  return TARGET_LANGUAGES.has(value);
}

export function isResumeStatus(value: string): value is ResumeStatus {
  return RESUME_STATUSES.has(value);
}
