import { DomainErrorCode, InvalidStatusTransitionError } from '../errors/domain.errors';
import { ResumeStatus, TargetLanguage } from '../types/profile.types';
import { MatchScore } from '../value-objects/scores';
import { Resume } from './resume.entity';
import { ResumeContent } from './resume-content';

const content: ResumeContent = {
  summary: 'Backend engineer with a decade of distributed systems work.',
  experiences: [],
  skills: ['Go'],
};

describe('Resume', () => {
  let resume: Resume;

  beforeEach(() => {
    resume = Resume.create({
      id: 'resume-1',
      userId: 'user-1',
      jobDescription: '  Senior Go Engineer  ',
    });
  });

  it('should start as an english draft with a zero score', () => {
    expect(resume.status).toBe(ResumeStatus.DRAFT);
    expect(resume.targetLanguage).toBe(TargetLanguage.EN);
    expect(resume.score.value).toBe(0);
    expect(resume.jobDescription).toBe('Senior Go Engineer');
    expect(resume.selectedBulletIds).toEqual([]);
  });

  it('should reject an empty job description', () => {
    expect(() =>
      Resume.create({ id: 'r', userId: 'u', jobDescription: ' ' })
    ).toThrow('jobDescription: job description cannot be empty');
  });

  it('should reject an unsupported target language', () => {
    try {
      Resume.create({ id: 'r', userId: 'u', jobDescription: 'x', targetLanguage: 'fr' });
      throw new Error('not rejected');
    } catch (error) {
      expect(error).toMatchObject({ code: DomainErrorCode.INVALID_LANGUAGE_CODE });
    }
  });

  it('should move to generated when content is set', () => {
    resume.setGeneratedContent(content);
    expect(resume.status).toBe(ResumeStatus.GENERATED);
    expect(resume.generatedContent).toBe(content);

    resume.setGeneratedContent({ ...content, summary: 'again' });
    expect(resume.status).toBe(ResumeStatus.GENERATED);
  });

  it('should refuse to regenerate once reviewed and keep its state', () => {
    resume.setGeneratedContent(content);
    resume.transitionStatus(ResumeStatus.REVIEWED);

    expect(() => resume.setGeneratedContent({ ...content, summary: 'new' })).toThrow(
      InvalidStatusTransitionError
    );
    expect(resume.status).toBe(ResumeStatus.REVIEWED);
    expect(resume.generatedContent?.summary).toBe(content.summary);
  });

  it('should leave the status unchanged on an illegal transition', () => {
    expect(() => resume.transitionStatus(ResumeStatus.ACCEPTED)).toThrow(
      InvalidStatusTransitionError
    );
    expect(() => resume.transitionStatus('archived')).toThrow('invalid resume status "archived"');
    expect(resume.status).toBe(ResumeStatus.DRAFT);
  });

  it('should de-duplicate the bullet selection', () => {
    resume.selectBullets(['b1', 'b2', 'b1']);
    resume.addSelectedBullet('b2');
    resume.addSelectedBullet('b3');
    expect(resume.selectedBulletIds).toEqual(['b1', 'b2', 'b3']);
    expect(resume.removeSelectedBullet('b2')).toBe(true);
    expect(resume.removeSelectedBullet('b2')).toBe(false);
    expect(resume.selectedBulletIds).toEqual(['b1', 'b3']);
  });

  it('should validate numeric scores', () => {
    resume.setScore(MatchScore.create(77));
    expect(resume.score.value).toBe(77);
    expect(() => resume.setScore(120)).toThrow('score: match score must be an integer between 0 and 100');
    expect(resume.score.value).toBe(77);
  });

  it.each([
    ['Go Engineer', 'Acme', 'Go Engineer at Acme'],
    ['Go Engineer', undefined, 'Go Engineer'],
    [undefined, 'Acme', 'Position at Acme'],
    [undefined, undefined, 'Untitled Resume'],
  ])('should display %p / %p as %p', (title, company, expected) => {
    resume.setJobDetails(title, company);
    expect(resume.jobDisplayName).toBe(expected);
  });

  it('should only allow pdf export for generated or reviewed content', () => {
    expect(resume.canGeneratePdf()).toBe(false);
    resume.setGeneratedContent(content);
    expect(resume.canGeneratePdf()).toBe(true);
    resume.transitionStatus(ResumeStatus.REVIEWED);
    resume.transitionStatus(ResumeStatus.SUBMITTED);
    expect(resume.canGeneratePdf()).toBe(false);
    expect(resume.isSubmitted()).toBe(true);
  });

  it('should round-trip through a snapshot', () => {
    resume.setJobDetails('Go Engineer', 'Acme', 'https://jobs.example.com/1');
    resume.selectBullets(['b1']);
    resume.setGeneratedContent(content);
    resume.setScore(64);
    resume.setNotes('ping recruiter');

    const restored = Resume.restore(resume.toSnapshot());

    expect(restored.toSnapshot()).toEqual(resume.toSnapshot());
    expect(restored.status).toBe(ResumeStatus.GENERATED);
  });

  it('should reject a snapshot with an unknown status', () => {
    const snapshot = { ...resume.toSnapshot(), status: 'archived' };
    expect(() => Resume.restore(snapshot)).toThrow('invalid resume status "archived"');
  });
});
