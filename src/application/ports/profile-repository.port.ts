import { Bullet } from '@domain/entities/bullet.entity';
import { Experience } from '@domain/entities/experience.entity';
import { Skill } from '@domain/entities/skill.entity';
import { User } from '@domain/entities/user.entity';

/**
 * Read/write access to a user's profile: the user, their experiences with
 * owned bullets, and their skills.
 */
export interface IProfileRepository {
  findUserById(id: string): Promise<User | null>;
  /** Ordered by experience display order. */
  findExperiencesWithBullets(userId: string): Promise<Experience[]>;
  /** Ordered by display order. */
  findSkills(userId: string): Promise<Skill[]>;
  findBulletById(id: string): Promise<{ bullet: Bullet; experience: Experience } | null>;
  deleteBullet(id: string): Promise<boolean>;
  saveUser(user: User): Promise<void>;
  saveExperience(experience: Experience): Promise<void>;
  saveSkill(skill: Skill): Promise<void>;
}
