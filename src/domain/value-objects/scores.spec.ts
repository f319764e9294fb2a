import { DomainErrorCode, ValidationError } from '../errors/domain.errors';
import { ImpactScore, MatchScore, ProficiencyLevel } from './scores';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('bounded scores', () => {
  const factories = [
    ['ImpactScore', (v: number) => ImpactScore.create(v), DomainErrorCode.INVALID_IMPACT_SCORE],
    [
      'ProficiencyLevel',
      (v: number) => ProficiencyLevel.create(v),
      DomainErrorCode.INVALID_PROFICIENCY_LEVEL,
    ],
    ['MatchScore', (v: number) => MatchScore.create(v), DomainErrorCode.INVALID_MATCH_SCORE],
  ] as const;

  describe.each(factories)('%s', (_name, create, code) => {
    it('should accept every integer from 0 to 100', () => {
      for (let value = 0; value <= 100; value++) {
        expect(create(value).value).toBe(value);
      }
    });

    it.each([-1, 101, -100, 1000])('should reject %d', (value) => {
      const error = captureError(() => create(value));
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ kind: 'validation', code });
    });

    it('should reject non-integers', () => {
      expect(() => create(42.5)).toThrow(ValidationError);
      expect(() => create(Number.NaN)).toThrow(ValidationError);
    });
  });

  it('should attribute the error to the field', () => {
    expect(() => ImpactScore.create(150)).toThrow(
      'impactScore: impact score must be an integer between 0 and 100'
    );
  });

  it('should default impact and proficiency to 50 and match score to 0', () => {
    expect(ImpactScore.default().value).toBe(50);
    expect(ProficiencyLevel.default().value).toBe(50);
    expect(MatchScore.zero().value).toBe(0);
  });

  it('should serialize as a bare number', () => {
    expect(JSON.stringify({ score: MatchScore.create(85) })).toBe('{"score":85}');
  });

  it('should compare by type and value', () => {
    expect(MatchScore.create(10).equals(MatchScore.create(10))).toBe(true);
    expect(MatchScore.create(10).equals(ImpactScore.create(10))).toBe(false);
  });
});
