import { Schema } from 'mongoose';
import { ResumeContent } from '@domain/entities/resume-content';

export const RESUME_MODEL = 'Resume';
export const USER_MODEL = 'User';
export const EXPERIENCE_MODEL = 'Experience';
export const BULLET_MODEL = 'Bullet';
export const SKILL_MODEL = 'Skill';

export interface ResumeDocument {
  id: string;
  userId: string;
  jobDescription: string;
  jobTitle?: string;
  companyName?: string;
  jobUrl?: string;
  targetLanguage: string;
  selectedBulletIds: string[];
  generatedContent?: ResumeContent;
  pdfUrl?: string;
  score: number;
  notes?: string;
  status: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface UserDocument {
  id: string;
  name?: string;
  email?: string;
  headline?: string;
  summary?: string;
  location?: string;
  preferredLanguage: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface ExperienceDocument {
  id: string;
  userId: string;
  type: string;
  title: string;
  organization: string;
  location?: string;
  description?: string;
  url?: string;
  /** YYYY-MM-DD */
  startDate: string;
  endDate?: string;
  isCurrent: boolean;
  metadata: Record<string, unknown>;
  displayOrder: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface BulletDocument {
  id: string;
  experienceId: string;
  content: string;
  impactScore: number;
  keywords: string[];
  metadata: Record<string, unknown>;
  displayOrder: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface SkillDocument {
  id: string;
  userId: string;
  name: string;
  category?: string;
  proficiencyLevel: number;
  yearsOfExperience?: number;
  isHighlighted: boolean;
  displayOrder: number;
  createdAt: Date;
}

export const ResumeSchema = new Schema(
  {
    id: { type: String, required: true, unique: true },
    userId: { type: String, required: true, index: true },
    jobDescription: { type: String, required: true },
    jobTitle: { type: String },
    companyName: { type: String },
    jobUrl: { type: String },
    targetLanguage: { type: String, required: true },
    selectedBulletIds: { type: [String], default: [] },
    generatedContent: { type: Schema.Types.Mixed },
    pdfUrl: { type: String },
    score: { type: Number, default: 0 },
    notes: { type: String },
    status: { type: String, required: true },
    createdAt: { type: Date, required: true },
    updatedAt: { type: Date, required: true },
  },
  { collection: 'resumes' }
);
ResumeSchema.index({ userId: 1, createdAt: -1 });

export const UserSchema = new Schema(
  {
    id: { type: String, required: true, unique: true },
    name: { type: String },
    email: { type: String },
    headline: { type: String },
    summary: { type: String },
    location: { type: String },
    preferredLanguage: { type: String, required: true },
    createdAt: { type: Date, required: true },
    updatedAt: { type: Date, required: true },
  },
  { collection: 'users' }
);

export const ExperienceSchema = new Schema(
  {
    id: { type: String, required: true, unique: true },
    userId: { type: String, required: true, index: true },
    type: { type: String, required: true },
    title: { type: String, required: true },
    organization: { type: String, required: true },
    location: { type: String },
    description: { type: String },
    url: { type: String },
    startDate: { type: String, required: true },
    endDate: { type: String },
    isCurrent: { type: Boolean, default: false },
    metadata: { type: Schema.Types.Mixed, default: {} },
    displayOrder: { type: Number, default: 0 },
    createdAt: { type: Date, required: true },
    updatedAt: { type: Date, required: true },
  },
  { collection: 'experiences' }
);

export const BulletSchema = new Schema(
  {
    id: { type: String, required: true, unique: true },
    experienceId: { type: String, required: true, index: true },
    content: { type: String, required: true },
    impactScore: { type: Number, default: 50 },
    keywords: { type: [String], default: [] },
    metadata: { type: Schema.Types.Mixed, default: {} },
    displayOrder: { type: Number, default: 0 },
    createdAt: { type: Date, required: true },
    updatedAt: { type: Date, required: true },
  },
  { collection: 'bullets' }
);

export const SkillSchema = new Schema(
  {
    id: { type: String, required: true, unique: true },
    userId: { type: String, required: true, index: true },
    name: { type: String, required: true },
    category: { type: String },
    proficiencyLevel: { type: Number, default: 50 },
    yearsOfExperience: { type: Number },
    isHighlighted: { type: Boolean, default: false },
    displayOrder: { type: Number, default: 0 },
    createdAt: { type: Date, required: true },
  },
  { collection: 'skills' }
);
