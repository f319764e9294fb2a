import { Bullet } from '@domain/entities/bullet.entity';
import { Experience } from '@domain/entities/experience.entity';
import { Skill } from '@domain/entities/skill.entity';
import { ExperienceType } from '@domain/types/profile.types';
import { CalendarDate } from '@domain/value-objects/calendar-date';
import { InMemoryProfileRepository } from './in-memory-profile.repository';

function experience(id: string, userId: string, displayOrder: number, bulletIds: string[]) {
  return new Experience({
    id,
    userId,
    type: ExperienceType.PROJECT,
    title: `Project ${id}`,
    organization: 'Self',
    startDate: CalendarDate.of(2022, 1, 1),
    displayOrder,
    bullets: bulletIds.map(
      (bulletId) => new Bullet({ id: bulletId, experienceId: id, content: `Did ${bulletId}` })
    ),
  });
}

describe('InMemoryProfileRepository', () => {
  let repository: InMemoryProfileRepository;

  beforeEach(async () => {
    repository = new InMemoryProfileRepository();
    await repository.saveExperience(experience('exp-2', 'user-1', 1, ['b3']));
    await repository.saveExperience(experience('exp-1', 'user-1', 0, ['b1', 'b2']));
    await repository.saveExperience(experience('exp-9', 'user-2', 0, ['b9']));
  });

  it('should return only the user experiences in display order', async () => {
    const result = await repository.findExperiencesWithBullets('user-1');

    expect(result.map((e) => e.id)).toEqual(['exp-1', 'exp-2']);
  });

  it('should sort skills by display order', async () => {
    await repository.saveSkill(
      new Skill({ id: 's2', userId: 'user-1', name: 'Go', displayOrder: 2 })
    );
    await repository.saveSkill(
      new Skill({ id: 's1', userId: 'user-1', name: 'SQL', displayOrder: 1 })
    );

    const skills = await repository.findSkills('user-1');

    expect(skills.map((s) => s.name)).toEqual(['SQL', 'Go']);
  });

  it('should locate and delete a bullet', async () => {
    const found = await repository.findBulletById('b2');
    expect(found?.experience.id).toBe('exp-1');

    expect(await repository.deleteBullet('b2')).toBe(true);
    expect(await repository.findBulletById('b2')).toBeNull();
    expect(await repository.deleteBullet('b2')).toBe(false);
  });
});
