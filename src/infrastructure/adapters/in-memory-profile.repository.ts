import { Injectable } from '@nestjs/common';
import { IProfileRepository } from '@application/ports/profile-repository.port';
import { Bullet } from '@domain/entities/bullet.entity';
import { Experience } from '@domain/entities/experience.entity';
import { Skill } from '@domain/entities/skill.entity';
import { User } from '@domain/entities/user.entity';

const byDisplayOrder = (a: { displayOrder: number }, b: { displayOrder: number }) =>
  a.displayOrder - b.displayOrder;

@Injectable()
export class InMemoryProfileRepository implements IProfileRepository {
  private readonly users = new Map<string, User>();
  private readonly experiences = new Map<string, Experience>();
  private readonly skills = new Map<string, Skill>();

  async findUserById(id: string): Promise<User | null> {
    return this.users.get(id) ?? null;
  }

  async findExperiencesWithBullets(userId: string): Promise<Experience[]> {
    return [...this.experiences.values()]
      .filter((e) => e.userId === userId)
      .sort(byDisplayOrder);
  }

  async findSkills(userId: string): Promise<Skill[]> {
    return [...this.skills.values()].filter((s) => s.userId === userId).sort(byDisplayOrder);
  }

  async findBulletById(id: string): Promise<{ bullet: Bullet; experience: Experience } | null> {
    for (const experience of this.experiences.values()) {
      const bullet = experience.bullets.find((b) => b.id === id);
      if (bullet) return { bullet, experience };
    }
    return null;
  }

  async deleteBullet(id: string): Promise<boolean> {
    for (const experience of this.experiences.values()) {
      if (experience.removeBullet(id)) return true;
    }
    return false;
  }

  async saveUser(user: User): Promise<void> {
    this.users.set(user.id, user);
  }

  async saveExperience(experience: Experience): Promise<void> {
    this.experiences.set(experience.id, experience);
  }

  async saveSkill(skill: Skill): Promise<void> {
    this.skills.set(skill.id, skill);
  }
}
