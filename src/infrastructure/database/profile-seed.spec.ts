import { join } from 'path';
import { InMemoryProfileRepository } from '../adapters/in-memory-profile.repository';
import { applyProfileSeed, loadProfileSeed, parseProfileSeed } from './profile-seed';

describe('profile seed', () => {
  it('should load the bundled fixture into a profile repository', async () => {
    const seed = loadProfileSeed(join(__dirname, '../../../fixtures/profile.seed.json'));
    const repository = new InMemoryProfileRepository();

    await applyProfileSeed(repository, seed);

    const user = await repository.findUserById('demo-user');
    expect(user?.displayName).toBe('Sam Rivera');
    const experiences = await repository.findExperiencesWithBullets('demo-user');
    expect(experiences.map((e) => e.id)).toEqual(['exp-platform', 'exp-design']);
    expect(experiences[0].bullets.map((b) => b.impactScore.value)).toEqual([85, 70]);
    expect(experiences[1].endDate?.toString()).toBe('2020-12-31');
    const skills = await repository.findSkills('demo-user');
    expect(skills.map((s) => s.name)).toEqual(['Go', 'PostgreSQL', 'Photoshop']);
  });

  it('should name the offending path when the file does not match the schema', () => {
    expect(() =>
      parseProfileSeed('{"users": [{"name": "x"}], "experiences": [], "skills": []}', 'seed.json')
    ).toThrow("seed.json is invalid: /users/0 must have required property 'id'");
  });

  it('should apply domain validation to seeded entities', async () => {
    const seed = parseProfileSeed(
      JSON.stringify({
        users: [],
        experiences: [],
        skills: [{ id: 's1', userId: 'u1', name: 'Go', proficiencyLevel: 140 }],
      })
    );

    await expect(applyProfileSeed(new InMemoryProfileRepository(), seed)).rejects.toThrow(
      'proficiencyLevel: proficiency level must be an integer between 0 and 100'
    );
  });
});
