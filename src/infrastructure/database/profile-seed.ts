import { readFileSync } from 'fs';
import { JSONSchemaType } from 'ajv';
import { IProfileRepository } from '@application/ports/profile-repository.port';
import { compileSchema } from '@application/services/structured-output';
import { Bullet } from '@domain/entities/bullet.entity';
import { Experience } from '@domain/entities/experience.entity';
import { Skill } from '@domain/entities/skill.entity';
import { User } from '@domain/entities/user.entity';
import { CalendarDate } from '@domain/value-objects/calendar-date';
import { ImpactScore, ProficiencyLevel } from '@domain/value-objects/scores';

export interface BulletSeed {
  id: string;
  content: string;
  impactScore?: number | null;
  keywords?: string[] | null;
  displayOrder?: number | null;
}

export interface ExperienceSeed {
  id: string;
  userId: string;
  type: string;
  title: string;
  organization: string;
  startDate: string;
  endDate?: string | null;
  isCurrent?: boolean | null;
  displayOrder?: number | null;
  bullets: BulletSeed[];
}

export interface SkillSeed {
  id: string;
  userId: string;
  name: string;
  category?: string | null;
  proficiencyLevel?: number | null;
  yearsOfExperience?: number | null;
  isHighlighted?: boolean | null;
  displayOrder?: number | null;
}

export interface UserSeed {
  id: string;
  name?: string | null;
  email?: string | null;
  headline?: string | null;
  summary?: string | null;
  preferredLanguage?: string | null;
}

export interface ProfileSeed {
  users: UserSeed[];
  experiences: ExperienceSeed[];
  skills: SkillSeed[];
}

const optionalString = { type: 'string', nullable: true } as const;
const optionalInteger = { type: 'integer', nullable: true } as const;

const profileSeedSchema: JSONSchemaType<ProfileSeed> = {
  type: 'object',
  properties: {
    users: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          id: { type: 'string', minLength: 1 },
          name: optionalString,
          email: optionalString,
          headline: optionalString,
          summary: optionalString,
          preferredLanguage: optionalString,
        },
        required: ['id'],
      },
    },
    experiences: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          id: { type: 'string', minLength: 1 },
          userId: { type: 'string', minLength: 1 },
          type: { type: 'string' },
          title: { type: 'string' },
          organization: { type: 'string' },
          startDate: { type: 'string' },
          endDate: optionalString,
          isCurrent: { type: 'boolean', nullable: true },
          displayOrder: optionalInteger,
          bullets: {
            type: 'array',
            items: {
              type: 'object',
              properties: {
                id: { type: 'string', minLength: 1 },
                content: { type: 'string' },
                impactScore: optionalInteger,
                keywords: { type: 'array', items: { type: 'string' }, nullable: true },
                displayOrder: optionalInteger,
              },
              required: ['id', 'content'],
            },
          },
        },
        required: ['id', 'userId', 'type', 'title', 'organization', 'startDate', 'bullets'],
      },
    },
    skills: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          id: { type: 'string', minLength: 1 },
          userId: { type: 'string', minLength: 1 },
          name: { type: 'string' },
          category: optionalString,
          proficiencyLevel: optionalInteger,
          yearsOfExperience: { type: 'number', nullable: true },
          isHighlighted: { type: 'boolean', nullable: true },
          displayOrder: optionalInteger,
        },
        required: ['id', 'userId', 'name'],
      },
    },
  },
  required: ['users', 'experiences', 'skills'],
};

const validateSeed = compileSchema(profileSeedSchema);

export function parseProfileSeed(json: string, source = 'profile seed'): ProfileSeed {
  const value: unknown = JSON.parse(json);
  if (!validateSeed(value)) {
    const problems = (validateSeed.errors ?? [])
      .map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
      .join('; ');
    throw new Error(`${source} is invalid: ${problems}`);
  }
  return value;
}

export function loadProfileSeed(path: string): ProfileSeed {
  return parseProfileSeed(readFileSync(path, 'utf8'), path);
}

/** Builds entities from the seed, so domain validation applies, then stores them. */
export async function applyProfileSeed(
  repository: IProfileRepository,
  seed: ProfileSeed
): Promise<void> {
  for (const user of seed.users) {
    await repository.saveUser(
      new User({
        id: user.id,
        name: user.name ?? undefined,
        email: user.email ?? undefined,
        headline: user.headline ?? undefined,
        summary: user.summary ?? undefined,
        preferredLanguage: user.preferredLanguage ?? undefined,
      })
    );
  }

  for (const experience of seed.experiences) {
    await repository.saveExperience(
      new Experience({
        id: experience.id,
        userId: experience.userId,
        type: experience.type,
        title: experience.title,
        organization: experience.organization,
        startDate: CalendarDate.parse(experience.startDate),
        endDate: experience.endDate ? CalendarDate.parse(experience.endDate) : undefined,
        isCurrent: experience.isCurrent ?? false,
        displayOrder: experience.displayOrder ?? 0,
        bullets: experience.bullets.map(
          (bullet) =>
            new Bullet({
              id: bullet.id,
              experienceId: experience.id,
              content: bullet.content,
              impactScore:
                bullet.impactScore == null ? undefined : ImpactScore.create(bullet.impactScore),
              keywords: bullet.keywords ?? [],
              displayOrder: bullet.displayOrder ?? 0,
            })
        ),
      })
    );
  }

  for (const skill of seed.skills) {
    await repository.saveSkill(
      new Skill({
        id: skill.id,
        userId: skill.userId,
        name: skill.name,
        category: skill.category ?? undefined,
        proficiencyLevel:
          skill.proficiencyLevel == null
            ? undefined
            : ProficiencyLevel.create(skill.proficiencyLevel),
        yearsOfExperience: skill.yearsOfExperience ?? undefined,
        isHighlighted: skill.isHighlighted ?? false,
        displayOrder: skill.displayOrder ?? 0,
      })
    );
  }
}
