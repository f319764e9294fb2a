import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { ChatGroq } from '@langchain/groq';
import { HumanMessage, MessageContent } from '@langchain/core/messages';
import { ValidateFunction } from 'ajv';
import aiConfig from '@config/ai.config';
import {
  AiCallContext,
  AnalyzeJobRequest,
  BulletSelection,
  GenerateSummaryRequest,
  IAiOrchestrationPort,
  JobAnalysis,
  ScoreMatchRequest,
  SelectBulletsRequest,
  SummaryResult,
  TailorBulletRequest,
  TailoredBulletResult,
} from '@application/ports/ai-orchestration.port';
import {
  callWithRetry,
  createRetryPolicy,
  RetryPolicy,
} from '@application/services/resilient-call';
import { decodeStructured } from '@application/services/structured-output';
import {
  AiServiceUnavailableError,
  MalformedAiOutputError,
  RequestCancelledError,
} from '@domain/errors/domain.errors';
import { MatchScore } from '@domain/value-objects/scores';
import { ILoggerPort } from '../logging/logger.port';
import { getErrorInfo } from '../../common/error-assertions';
import {
  validateBulletSelection,
  validateJobAnalysis,
  validateMatchScore,
  validateSummary,
  validateTailoredBullet,
} from './ai-output.schemas';
import {
  analyzeJobPrompt,
  scoreMatchPrompt,
  selectBulletsPrompt,
  summaryPrompt,
  tailorBulletPrompt,
} from './groq-prompts';

type AiOperation =
  | 'analyzeJob'
  | 'selectBullets'
  | 'tailorBullet'
  | 'generateSummary'
  | 'scoreMatch';

interface OperationProfile {
  model: 'analysis' | 'generation';
  temperature: number;
  label: string;
}

const OPERATIONS: Record<AiOperation, OperationProfile> = {
  analyzeJob: { model: 'analysis', temperature: 0.3, label: 'job analysis' },
  selectBullets: { model: 'analysis', temperature: 0.3, label: 'bullet selection' },
  tailorBullet: { model: 'generation', temperature: 0.7, label: 'tailored bullet' },
  generateSummary: { model: 'generation', temperature: 0.8, label: 'summary' },
  scoreMatch: { model: 'analysis', temperature: 0.2, label: 'match score' },
};

const CONTEXT = 'GroqAiOrchestrationAdapter';

/**
 * Groq-backed implementation of the AI port. LangChain's own retries are
 * disabled; transient failures are retried here so that backoff, cancellation
 * and logging follow the configured policy.
 */
@Injectable()
export class GroqAiOrchestrationAdapter implements IAiOrchestrationPort {
  private readonly models = new Map<AiOperation, ChatGroq>();
  private readonly retryPolicy: RetryPolicy;

  constructor(
    @Inject(aiConfig.KEY)
    private readonly config: ConfigType<typeof aiConfig>,
    @Inject('ILoggerPort')
    private readonly logger: ILoggerPort
  ) {
    this.retryPolicy = createRetryPolicy({
      maxRetries: config.maxRetries,
      baseDelayMs: config.retryBaseDelayMs,
    });
    if (!config.apiKey) {
      this.logger.warn('GROQ_API_KEY is not set; AI calls will fail', CONTEXT);
    }
  }

  async analyzeJob(request: AnalyzeJobRequest, context?: AiCallContext): Promise<JobAnalysis> {
    const output = await this.run(
      'analyzeJob',
      analyzeJobPrompt(request.jobDescription),
      validateJobAnalysis,
      context
    );
    return {
      title: output.title.trim(),
      company: output.company?.trim() ?? '',
      requiredSkills: output.required_skills,
      preferredSkills: output.preferred_skills ?? [],
      keywords: output.keywords,
      seniorityLevel: output.seniority_level ?? '',
      yearsExperience: output.years_experience ?? undefined,
      summary: output.summary ?? '',
    };
  }

  async selectBullets(
    request: SelectBulletsRequest,
    context?: AiCallContext
  ): Promise<BulletSelection> {
    const output = await this.run(
      'selectBullets',
      selectBulletsPrompt(request),
      validateBulletSelection,
      context
    );
    return {
      selectedBulletIds: output.selected_bullet_ids,
      reasoning: output.reasoning ?? '',
    };
  }

  async tailorBullet(
    request: TailorBulletRequest,
    context?: AiCallContext
  ): Promise<TailoredBulletResult> {
    const output = await this.run(
      'tailorBullet',
      tailorBulletPrompt(request),
      validateTailoredBullet,
      context
    );
    return {
      originalId: request.bullet.id,
      tailoredContent: output.tailored_content.trim(),
      keywords: output.keywords ?? [],
    };
  }

  async generateSummary(
    request: GenerateSummaryRequest,
    context?: AiCallContext
  ): Promise<SummaryResult> {
    const output = await this.run(
      'generateSummary',
      summaryPrompt(request),
      validateSummary,
      context
    );
    return { summary: output.summary.trim() };
  }

  async scoreMatch(request: ScoreMatchRequest, context?: AiCallContext): Promise<MatchScore> {
    const output = await this.run(
      'scoreMatch',
      scoreMatchPrompt(request),
      validateMatchScore,
      context
    );
    return MatchScore.create(output.score);
  }

  private async run<T>(
    operation: AiOperation,
    prompt: string,
    validate: ValidateFunction<T>,
    context: AiCallContext = {}
  ): Promise<T> {
    const raw = await this.complete(operation, prompt, context.signal);
    try {
      return decodeStructured(raw, validate, OPERATIONS[operation].label);
    } catch (error) {
      if (error instanceof MalformedAiOutputError) {
        this.logger.warn('Unparseable model response', CONTEXT, {
          operation,
          reason: error.message,
          preview: raw.slice(0, 200),
        });
      }
      throw error;
    }
  }

  /** One chat completion, retried on transient failures. */
  private async complete(
    operation: AiOperation,
    prompt: string,
    signal: AbortSignal | undefined
  ): Promise<string> {
    const started = Date.now();
    try {
      const text = await callWithRetry(
        async () => {
          const message = await this.model(operation).invoke([new HumanMessage(prompt)], {
            signal,
            timeout: this.config.requestTimeoutMs,
          });
          return messageText(message.content);
        },
        this.retryPolicy,
        {
          signal,
          onRetry: ({ retry, delayMs, error }) =>
            this.logger.warn('Retrying Groq call', CONTEXT, {
              operation,
              retry,
              delayMs,
              reason: getErrorInfo(error).message,
            }),
        }
      );
      this.logger.debug('Groq call completed', CONTEXT, {
        operation,
        durationMs: Date.now() - started,
      });
      return text;
    } catch (error) {
      if (error instanceof RequestCancelledError) throw error;
      this.logger.error('Groq call failed', error, CONTEXT, { operation });
      throw new AiServiceUnavailableError(operation, error);
    }
  }

  private model(operation: AiOperation): ChatGroq {
    const cached = this.models.get(operation);
    if (cached) return cached;

    const profile = OPERATIONS[operation];
    const model = new ChatGroq({
      apiKey: this.config.apiKey,
      model:
        profile.model === 'analysis' ? this.config.analysisModel : this.config.generationModel,
      temperature: profile.temperature,
      maxTokens: this.config.maxTokens,
      maxRetries: 0,
    });
    this.models.set(operation, model);
    return model;
  }
}

function messageText(content: MessageContent): string {
  if (typeof content === 'string') return content;
  return content
    .map((part) => ('text' in part && typeof part.text === 'string' ? part.text : ''))
    .join('');
}
