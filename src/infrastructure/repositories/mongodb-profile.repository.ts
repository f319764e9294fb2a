import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { IProfileRepository } from '@application/ports/profile-repository.port';
import { Bullet } from '@domain/entities/bullet.entity';
import { Experience } from '@domain/entities/experience.entity';
import { Skill } from '@domain/entities/skill.entity';
import { User } from '@domain/entities/user.entity';
import { CalendarDate } from '@domain/value-objects/calendar-date';
import { ImpactScore, ProficiencyLevel } from '@domain/value-objects/scores';
import {
  BULLET_MODEL,
  BulletDocument,
  EXPERIENCE_MODEL,
  ExperienceDocument,
  SKILL_MODEL,
  SkillDocument,
  USER_MODEL,
  UserDocument,
} from '../database/schemas';

/**
 * Profile storage. Bullets live in their own collection keyed by
 * `experienceId`; saving an experience rewrites its bullet set.
 */
@Injectable()
export class MongoDbProfileRepository implements IProfileRepository {
  constructor(
    @InjectModel(USER_MODEL) private readonly userModel: Model<UserDocument>,
    @InjectModel(EXPERIENCE_MODEL) private readonly experienceModel: Model<ExperienceDocument>,
    @InjectModel(BULLET_MODEL) private readonly bulletModel: Model<BulletDocument>,
    @InjectModel(SKILL_MODEL) private readonly skillModel: Model<SkillDocument>
  ) {}

  async findUserById(id: string): Promise<User | null> {
    const doc = await this.userModel.findOne({ id }).exec();
    return doc ? this.mapUser(doc) : null;
  }

  async findExperiencesWithBullets(userId: string): Promise<Experience[]> {
    const experiences = await this.experienceModel
      .find({ userId })
      .sort({ displayOrder: 1 })
      .exec();
    if (experiences.length === 0) return [];

    const bullets = await this.bulletModel
      .find({ experienceId: { $in: experiences.map((e) => e.id) } })
      .sort({ displayOrder: 1 })
      .exec();
    const byExperience = new Map<string, BulletDocument[]>();
    for (const bullet of bullets) {
      const list = byExperience.get(bullet.experienceId) ?? [];
      list.push(bullet);
      byExperience.set(bullet.experienceId, list);
    }

    return experiences.map((doc) => this.mapExperience(doc, byExperience.get(doc.id) ?? []));
  }

  async findSkills(userId: string): Promise<Skill[]> {
    const docs = await this.skillModel.find({ userId }).sort({ displayOrder: 1 }).exec();
    return docs.map((doc) => this.mapSkill(doc));
  }

  async findBulletById(id: string): Promise<{ bullet: Bullet; experience: Experience } | null> {
    const bulletDoc = await this.bulletModel.findOne({ id }).exec();
    if (!bulletDoc) return null;
    const experienceDoc = await this.experienceModel
      .findOne({ id: bulletDoc.experienceId })
      .exec();
    if (!experienceDoc) return null;

    const siblings = await this.bulletModel
      .find({ experienceId: experienceDoc.id })
      .sort({ displayOrder: 1 })
      .exec();
    const experience = this.mapExperience(experienceDoc, siblings);
    const bullet = experience.bullets.find((b) => b.id === id);
    return bullet ? { bullet, experience } : null;
  }

  async deleteBullet(id: string): Promise<boolean> {
    const result = await this.bulletModel.deleteOne({ id }).exec();
    return result.deletedCount > 0;
  }

  async saveUser(user: User): Promise<void> {
    const doc: UserDocument = {
      id: user.id,
      name: user.name,
      email: user.email,
      headline: user.headline,
      summary: user.summary,
      location: user.location,
      preferredLanguage: user.preferredLanguage,
      createdAt: user.createdAt,
      updatedAt: user.updatedAt,
    };
    await this.userModel.findOneAndUpdate({ id: user.id }, doc, { upsert: true, new: true });
  }

  async saveExperience(experience: Experience): Promise<void> {
    const doc: ExperienceDocument = {
      id: experience.id,
      userId: experience.userId,
      type: experience.type,
      title: experience.title,
      organization: experience.organization,
      location: experience.location,
      description: experience.description,
      url: experience.url,
      startDate: experience.startDate.toString(),
      endDate: experience.endDate?.toString(),
      isCurrent: experience.isCurrent,
      metadata: experience.metadata,
      displayOrder: experience.displayOrder,
      createdAt: experience.createdAt,
      updatedAt: experience.updatedAt,
    };
    await this.experienceModel.findOneAndUpdate({ id: experience.id }, doc, {
      upsert: true,
      new: true,
    });

    const bulletIds = experience.bullets.map((b) => b.id);
    await this.bulletModel
      .deleteMany({ experienceId: experience.id, id: { $nin: bulletIds } })
      .exec();
    await Promise.all(
      experience.bullets.map((bullet) =>
        this.bulletModel.findOneAndUpdate({ id: bullet.id }, this.bulletDocument(bullet), {
          upsert: true,
          new: true,
        })
      )
    );
  }

  async saveSkill(skill: Skill): Promise<void> {
    const doc: SkillDocument = {
      id: skill.id,
      userId: skill.userId,
      name: skill.name,
      category: skill.category,
      proficiencyLevel: skill.proficiencyLevel.value,
      yearsOfExperience: skill.yearsOfExperience,
      isHighlighted: skill.isHighlighted,
      displayOrder: skill.displayOrder,
      createdAt: skill.createdAt,
    };
    await this.skillModel.findOneAndUpdate({ id: skill.id }, doc, { upsert: true, new: true });
  }

  private bulletDocument(bullet: Bullet): BulletDocument {
    return {
      id: bullet.id,
      experienceId: bullet.experienceId,
      content: bullet.content,
      impactScore: bullet.impactScore.value,
      keywords: [...bullet.keywords],
      metadata: bullet.metadata,
      displayOrder: bullet.displayOrder,
      createdAt: bullet.createdAt,
      updatedAt: bullet.updatedAt,
    };
  }

  private mapUser(doc: UserDocument): User {
    return new User({
      id: doc.id,
      name: doc.name,
      email: doc.email,
      headline: doc.headline,
      summary: doc.summary,
      location: doc.location,
      preferredLanguage: doc.preferredLanguage,
      createdAt: doc.createdAt,
      updatedAt: doc.updatedAt,
    });
  }

  private mapExperience(doc: ExperienceDocument, bullets: readonly BulletDocument[]): Experience {
    return new Experience({
      id: doc.id,
      userId: doc.userId,
      type: doc.type,
      title: doc.title,
      organization: doc.organization,
      location: doc.location,
      description: doc.description,
      url: doc.url,
      startDate: CalendarDate.parse(doc.startDate),
      endDate: doc.endDate ? CalendarDate.parse(doc.endDate) : undefined,
      isCurrent: doc.isCurrent,
      metadata: doc.metadata,
      displayOrder: doc.displayOrder,
      createdAt: doc.createdAt,
      updatedAt: doc.updatedAt,
      bullets: bullets.map((bullet) => this.mapBullet(bullet)),
    });
  }

  private mapBullet(doc: BulletDocument): Bullet {
    return new Bullet({
      id: doc.id,
      experienceId: doc.experienceId,
      content: doc.content,
      impactScore: ImpactScore.create(doc.impactScore),
      keywords: [...doc.keywords],
      metadata: doc.metadata,
      displayOrder: doc.displayOrder,
      createdAt: doc.createdAt,
      updatedAt: doc.updatedAt,
    });
  }

  private mapSkill(doc: SkillDocument): Skill {
    return new Skill({
      id: doc.id,
      userId: doc.userId,
      name: doc.name,
      category: doc.category,
      proficiencyLevel: ProficiencyLevel.create(doc.proficiencyLevel),
      yearsOfExperience: doc.yearsOfExperience,
      isHighlighted: doc.isHighlighted,
      displayOrder: doc.displayOrder,
      createdAt: doc.createdAt,
    });
  }
}
