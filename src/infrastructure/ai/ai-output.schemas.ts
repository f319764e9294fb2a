import { JSONSchemaType } from 'ajv';
import { compileSchema } from '@application/services/structured-output';

/** Raw model output shapes; keys follow the JSON requested in the prompts. */

export interface JobAnalysisOutput {
  title: string;
  company?: string | null;
  required_skills: string[];
  preferred_skills?: string[] | null;
  keywords: string[];
  seniority_level?: string | null;
  years_experience?: number | null;
  summary?: string | null;
}

export interface BulletSelectionOutput {
  selected_bullet_ids: string[];
  reasoning?: string | null;
}

export interface TailoredBulletOutput {
  tailored_content: string;
  keywords?: string[] | null;
}

export interface SummaryOutput {
  summary: string;
}

export interface MatchScoreOutput {
  score: number;
  explanation?: string | null;
}

const stringList = { type: 'array', items: { type: 'string' } } as const;

const jobAnalysisSchema: JSONSchemaType<JobAnalysisOutput> = {
  type: 'object',
  properties: {
    title: { type: 'string' },
    company: { type: 'string', nullable: true },
    required_skills: stringList,
    preferred_skills: { ...stringList, nullable: true },
    keywords: stringList,
    seniority_level: { type: 'string', nullable: true },
    years_experience: { type: 'integer', minimum: 0, nullable: true },
    summary: { type: 'string', nullable: true },
  },
  required: ['title', 'required_skills', 'keywords'],
};

const bulletSelectionSchema: JSONSchemaType<BulletSelectionOutput> = {
  type: 'object',
  properties: {
    selected_bullet_ids: stringList,
    reasoning: { type: 'string', nullable: true },
  },
  required: ['selected_bullet_ids'],
};

const tailoredBulletSchema: JSONSchemaType<TailoredBulletOutput> = {
  type: 'object',
  properties: {
    tailored_content: { type: 'string', minLength: 1 },
    keywords: { ...stringList, nullable: true },
  },
  required: ['tailored_content'],
};

const summarySchema: JSONSchemaType<SummaryOutput> = {
  type: 'object',
  properties: {
    summary: { type: 'string', minLength: 1 },
  },
  required: ['summary'],
};

const matchScoreSchema: JSONSchemaType<MatchScoreOutput> = {
  type: 'object',
  properties: {
    score: { type: 'integer', minimum: 0, maximum: 100 },
    explanation: { type: 'string', nullable: true },
  },
  required: ['score'],
};

export const validateJobAnalysis = compileSchema(jobAnalysisSchema);
export const validateBulletSelection = compileSchema(bulletSelectionSchema);
export const validateTailoredBullet = compileSchema(tailoredBulletSchema);
export const validateSummary = compileSchema(summarySchema);
export const validateMatchScore = compileSchema(matchScoreSchema);
