import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import tailoringConfig from '@config/tailoring.config';
import { Bullet } from '@domain/entities/bullet.entity';
import { Experience } from '@domain/entities/experience.entity';
import { Resume } from '@domain/entities/resume.entity';
import {
  ResumeAnalysis,
  ResumeContent,
  TailoredBullet,
  TailoredExperience,
} from '@domain/entities/resume-content';
import { Skill } from '@domain/entities/skill.entity';
import {
  DomainErrorCode,
  InvalidStatusTransitionError,
  isDomainError,
  MalformedAiOutputError,
  NoBulletsAvailableError,
  NotFoundError,
  RequestCancelledError,
  ValidationErrors,
} from '@domain/errors/domain.errors';
import { canGenerate } from '@domain/services/resume-status-machine';
import { ExperienceType, isExperienceType, ResumeStatus } from '@domain/types/profile.types';
import { ILoggerPort } from '@infrastructure/logging/logger.port';
import { IAiOrchestrationPort, JobAnalysis } from '../ports/ai-orchestration.port';
import { IProfileRepository } from '../ports/profile-repository.port';
import { IResumeRepository } from '../ports/resume-repository.port';
import { mapWithConcurrency } from '../services/semaphore';

export interface TailorResumeOptions {
  maxBullets?: number;
  maxBulletsPerExperience?: number;
  experienceTypes?: Array<ExperienceType | string>;
  skillsToHighlight?: string[];
  style?: string;
}

export interface TailorResumeInput {
  resumeId: string;
  /** When set, the resume must belong to this user. */
  userId?: string;
  options?: TailorResumeOptions;
  signal?: AbortSignal;
}

interface Candidate {
  bullet: Bullet;
  experience: Experience;
}

const CONTEXT = 'TailorResumeUseCase';

/**
 * Runs the tailoring pipeline against one resume:
 * analyze → select → tailor → summarize → score, then stores the result.
 *
 * Nothing on the resume changes until every backend call has succeeded, so a
 * failed run leaves the stored resume exactly as it was.
 */
@Injectable()
export class TailorResumeUseCase {
  constructor(
    @Inject('IResumeRepository')
    private readonly resumeRepository: IResumeRepository,
    @Inject('IProfileRepository')
    private readonly profileRepository: IProfileRepository,
    @Inject('IAiOrchestrationPort')
    private readonly ai: IAiOrchestrationPort,
    @Inject('ILoggerPort')
    private readonly logger: ILoggerPort,
    @Inject(tailoringConfig.KEY)
    private readonly settings: ConfigType<typeof tailoringConfig>
  ) {}

  async execute(input: TailorResumeInput): Promise<Resume> {
    try {
      return await this.run(input);
    } catch (error) {
      this.logger.error('Resume tailoring failed', error, CONTEXT, {
        resumeId: input.resumeId,
        code: isDomainError(error) ? error.code : 'UNEXPECTED',
      });
      throw error;
    }
  }

  /**
   * Backend calls get a run-scoped signal that follows the caller's and is
   * also aborted on the first failure, so sibling calls stop with the run.
   */
  private async run(input: TailorResumeInput): Promise<Resume> {
    const controller = new AbortController();
    const callerSignal = input.signal;
    const forwardAbort = () => controller.abort(callerSignal?.reason);
    if (callerSignal?.aborted) forwardAbort();
    else callerSignal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      return await this.pipeline(input, controller.signal);
    } catch (error) {
      controller.abort(error);
      throw error;
    } finally {
      callerSignal?.removeEventListener('abort', forwardAbort);
    }
  }

  private async pipeline(input: TailorResumeInput, signal: AbortSignal): Promise<Resume> {
    const options = input.options ?? {};
    const maxBullets = options.maxBullets ?? this.settings.defaultMaxBullets;
    const style = options.style?.trim() || this.settings.defaultStyle;
    const experienceTypes = this.validateOptions(options, maxBullets);

    const resume = await this.resumeRepository.findById(input.resumeId);
    if (!resume || (input.userId !== undefined && resume.userId !== input.userId)) {
      throw new NotFoundError(DomainErrorCode.RESUME_NOT_FOUND, 'resume not found');
    }
    if (!canGenerate(resume.status)) {
      throw new InvalidStatusTransitionError(resume.status, ResumeStatus.GENERATED);
    }

    const [user, experiences, skills] = await Promise.all([
      this.profileRepository.findUserById(resume.userId),
      this.profileRepository.findExperiencesWithBullets(resume.userId),
      this.profileRepository.findSkills(resume.userId),
    ]);
    if (!user) {
      throw new NotFoundError(DomainErrorCode.USER_NOT_FOUND, 'user not found');
    }

    const orderedExperiences = [...experiences].sort((a, b) => a.displayOrder - b.displayOrder);
    const candidates = this.collectCandidates(orderedExperiences, experienceTypes);
    if (candidates.length === 0) {
      throw new NoBulletsAvailableError();
    }
    this.logger.debug('Collected candidate bullets', CONTEXT, {
      resumeId: resume.id,
      candidates: candidates.length,
    });

    const language = resume.targetLanguage;
    const analysis = await this.ai.analyzeJob(
      { jobDescription: resume.jobDescription, targetLanguage: language },
      { signal }
    );
    this.logger.debug('Job analyzed', CONTEXT, {
      resumeId: resume.id,
      requiredSkills: analysis.requiredSkills.length,
      keywords: analysis.keywords.length,
    });

    const selection = await this.ai.selectBullets(
      {
        jobAnalysis: analysis,
        availableBullets: candidates.map((c) => c.bullet),
        maxBullets,
        targetLanguage: language,
      },
      { signal }
    );
    const selected = this.filterSelection(
      selection.selectedBulletIds,
      candidates,
      maxBullets,
      options.maxBulletsPerExperience
    );
    if (selected.length === 0) {
      throw new MalformedAiOutputError('bullet selection contained no known bullet ids');
    }
    this.logger.debug('Bullets selected', CONTEXT, {
      resumeId: resume.id,
      returned: selection.selectedBulletIds.length,
      kept: selected.length,
    });

    const tailoredResults = await mapWithConcurrency(
      selected,
      this.settings.concurrency,
      (candidate) =>
        this.ai.tailorBullet(
          { bullet: candidate.bullet, jobAnalysis: analysis, targetLanguage: language, style },
          { signal }
        )
    );
    const tailored: TailoredBullet[] = selected.map((candidate, index) => ({
      bulletId: candidate.bullet.id,
      originalContent: candidate.bullet.content,
      tailoredContent: tailoredResults[index].tailoredContent,
      keywords: tailoredResults[index].keywords,
    }));
    this.logger.debug('Bullets tailored', CONTEXT, { resumeId: resume.id, count: tailored.length });

    const { summary } = await this.ai.generateSummary(
      { user, jobAnalysis: analysis, selectedBullets: tailored, targetLanguage: language },
      { signal }
    );

    const surfacedSkills = this.surfaceSkills(skills, options.skillsToHighlight ?? []);
    const content: ResumeContent = {
      summary,
      experiences: this.groupByExperience(orderedExperiences, selected, tailored),
      skills: surfacedSkills,
    };
    content.analysis = this.analyze(analysis, content);

    const score = await this.ai.scoreMatch(
      { jobAnalysis: analysis, resume: content, userSkills: skills },
      { signal }
    );
    this.logger.debug('Resume scored', CONTEXT, { resumeId: resume.id, score: score.value });

    if (signal.aborted) {
      throw new RequestCancelledError(signal.reason);
    }

    resume.setJobDetails(
      resume.jobTitle ? undefined : analysis.title,
      resume.companyName ? undefined : analysis.company
    );
    resume.selectBullets(selected.map((c) => c.bullet.id));
    resume.setGeneratedContent(content);
    resume.setScore(score);
    await this.resumeRepository.save(resume);

    this.logger.info('Resume tailored', CONTEXT, {
      resumeId: resume.id,
      bullets: selected.length,
      score: score.value,
    });
    return resume;
  }

  private validateOptions(
    options: TailorResumeOptions,
    maxBullets: number
  ): Set<ExperienceType> | undefined {
    const errors = new ValidationErrors();
    if (!Number.isInteger(maxBullets) || maxBullets < 1) {
      errors.addFieldError('maxBullets', 'must be a positive integer');
    }
    const perExperience = options.maxBulletsPerExperience;
    if (perExperience !== undefined && (!Number.isInteger(perExperience) || perExperience < 1)) {
      errors.addFieldError('maxBulletsPerExperience', 'must be a positive integer');
    }

    let types: Set<ExperienceType> | undefined;
    if (options.experienceTypes && options.experienceTypes.length > 0) {
      types = new Set();
      for (const type of options.experienceTypes) {
        if (isExperienceType(type)) types.add(type);
        else errors.addFieldError('experienceTypes', `unknown experience type "${type}"`);
      }
    }
    errors.throwIfAny();
    return types;
  }

  private collectCandidates(
    experiences: readonly Experience[],
    types: Set<ExperienceType> | undefined
  ): Candidate[] {
    return experiences
      .filter((experience) => !types || types.has(experience.type))
      .flatMap((experience) =>
        [...experience.bullets]
          .sort((a, b) => a.displayOrder - b.displayOrder)
          .map((bullet) => ({ bullet, experience }))
      );
  }

  /**
   * Keeps only ids that were offered as candidates, in the order returned,
   * without repeats, within the per-experience and overall caps.
   */
  private filterSelection(
    ids: readonly string[],
    candidates: readonly Candidate[],
    maxBullets: number,
    maxPerExperience: number | undefined
  ): Candidate[] {
    const byId = new Map(candidates.map((c) => [c.bullet.id, c]));
    const perExperience = new Map<string, number>();
    const kept: Candidate[] = [];
    const seen = new Set<string>();

    for (const id of ids) {
      if (kept.length >= maxBullets) break;
      const candidate = byId.get(id);
      if (!candidate || seen.has(id)) continue;
      seen.add(id);

      const experienceId = candidate.experience.id;
      const used = perExperience.get(experienceId) ?? 0;
      if (maxPerExperience !== undefined && used >= maxPerExperience) continue;
      perExperience.set(experienceId, used + 1);
      kept.push(candidate);
    }
    return kept;
  }

  private groupByExperience(
    experiences: readonly Experience[],
    selected: readonly Candidate[],
    tailored: readonly TailoredBullet[]
  ): TailoredExperience[] {
    const bulletsByExperience = new Map<string, TailoredBullet[]>();
    selected.forEach((candidate, index) => {
      const list = bulletsByExperience.get(candidate.experience.id) ?? [];
      list.push(tailored[index]);
      bulletsByExperience.set(candidate.experience.id, list);
    });

    return experiences.flatMap((experience) => {
      const bullets = bulletsByExperience.get(experience.id);
      if (!bullets) return [];
      return [
        {
          experienceId: experience.id,
          title: experience.title,
          organization: experience.organization,
          startDate: experience.startDate.toString(),
          endDate: experience.endDate?.toString(),
          isCurrent: experience.isCurrent,
          bullets,
        },
      ];
    });
  }

  /** Requested skills first, then highlighted ones, then the rest by display order. */
  private surfaceSkills(skills: readonly Skill[], requested: readonly string[]): string[] {
    const ordered = [...skills].sort((a, b) => a.displayOrder - b.displayOrder);
    const byName = new Map<string, Skill>();
    for (const skill of ordered) {
      const key = skill.name.toLowerCase();
      if (!byName.has(key)) byName.set(key, skill);
    }

    const result: Skill[] = [];
    const push = (skill: Skill | undefined) => {
      if (skill && !result.includes(skill)) result.push(skill);
    };
    requested.forEach((name) => push(byName.get(name.trim().toLowerCase())));
    ordered.filter((skill) => skill.isHighlighted).forEach(push);
    ordered.forEach(push);
    return result.map((skill) => skill.name);
  }

  private analyze(analysis: JobAnalysis, content: ResumeContent): ResumeAnalysis {
    const haystack = [
      content.summary,
      ...content.experiences.flatMap((e) => e.bullets.map((b) => b.tailoredContent)),
      ...content.skills,
    ]
      .join('\n')
      .toLowerCase();

    const terms = uniqueCaseInsensitive([...analysis.requiredSkills, ...analysis.keywords]);
    const matchedKeywords = terms.filter((term) => containsTerm(haystack, term));
    const missingKeywords = terms.filter((term) => !containsTerm(haystack, term));

    const required = uniqueCaseInsensitive(analysis.requiredSkills);
    const strengthAreas = required.filter((skill) => containsTerm(haystack, skill));
    const improvementAreas = required.filter((skill) => !containsTerm(haystack, skill));
    const recommendations = improvementAreas.map(
      (skill) => `Add an achievement that shows hands-on ${skill} experience`
    );
    const preferredMissing = uniqueCaseInsensitive(analysis.preferredSkills).filter(
      (skill) => !containsTerm(haystack, skill)
    );
    if (preferredMissing.length > 0) {
      recommendations.push(`Consider mentioning: ${preferredMissing.join(', ')}`);
    }

    return { matchedKeywords, missingKeywords, recommendations, strengthAreas, improvementAreas };
  }
}

function uniqueCaseInsensitive(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const trimmed = value.trim();
    const key = trimmed.toLowerCase();
    if (!trimmed || seen.has(key)) continue;
    seen.add(key);
    result.push(trimmed);
  }
  return result;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Whole-term, case-insensitive match; `haystack` is already lower-cased. */
function containsTerm(haystack: string, term: string): boolean {
  const pattern = new RegExp(`(^|[^a-z0-9])${escapeRegExp(term.toLowerCase())}($|[^a-z0-9])`);
  return pattern.test(haystack);
}
