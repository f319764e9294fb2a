import { ValidationError } from '../errors/domain.errors';
import { ImpactScore } from '../value-objects/scores';
import { Bullet } from './bullet.entity';

describe('Bullet', () => {
  const build = (overrides: Partial<ConstructorParameters<typeof Bullet>[0]> = {}) =>
    new Bullet({
      id: 'bullet-1',
      experienceId: 'exp-1',
      content: 'Cut p95 latency by 40% by introducing a read-through cache',
      ...overrides,
    });

  it('should default impact score to 50 with no keywords', () => {
    const bullet = build();
    expect(bullet.impactScore.value).toBe(50);
    expect(bullet.keywords).toEqual([]);
    expect(bullet.displayOrder).toBe(0);
  });

  it('should reject blank content', () => {
    expect(() => build({ content: '   ' })).toThrow(ValidationError);
    expect(() => build({ content: '' })).toThrow('content: bullet content cannot be empty');
  });

  it('should require identity and owning experience', () => {
    expect(() => build({ id: '', experienceId: '' })).toThrow(
      'multiple validation errors: id: bullet ID is required; experienceId: experience ID is required'
    );
  });

  it('should keep keywords as an ordered set', () => {
    const bullet = build({ keywords: ['Go', 'Redis', 'Go'] });
    bullet.addKeyword('PostgreSQL');
    bullet.addKeyword('Redis');
    expect(bullet.keywords).toEqual(['Go', 'Redis', 'PostgreSQL']);
    expect(bullet.hasKeyword('Redis')).toBe(true);
    expect(bullet.hasKeyword('Kafka')).toBe(false);
  });

  it('should classify impact', () => {
    expect(build({ impactScore: ImpactScore.create(70) }).isHighImpact()).toBe(true);
    expect(build({ impactScore: ImpactScore.create(69) }).isHighImpact()).toBe(false);
    expect(build({ impactScore: ImpactScore.create(39) }).isLowImpact()).toBe(true);
    expect(build({ impactScore: ImpactScore.create(40) }).isLowImpact()).toBe(false);
  });

  it('should validate score updates and bump updatedAt', () => {
    const bullet = build({ createdAt: new Date('2024-01-01T00:00:00Z') });
    bullet.setImpactScore(90);
    expect(bullet.impactScore.value).toBe(90);
    expect(bullet.updatedAt.getTime()).toBeGreaterThan(bullet.createdAt.getTime());

    expect(() => bullet.setImpactScore(101)).toThrow(
      'impactScore: impact score must be an integer between 0 and 100'
    );
    expect(bullet.impactScore.value).toBe(90);
  });

  it('should trim content on update', () => {
    const bullet = build();
    bullet.updateContent('  Shipped the billing service  ');
    expect(bullet.content).toBe('Shipped the billing service');
  });
});
