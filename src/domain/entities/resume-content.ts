/**
 * Output of a tailoring run, stored on the resume as a plain value.
 */
export interface ResumeContent {
  summary: string;
  experiences: TailoredExperience[];
  skills: string[];
  analysis?: ResumeAnalysis;
}

export interface TailoredExperience {
  experienceId: string;
  title: string;
  organization: string;
  /** YYYY-MM-DD */
  startDate: string;
  endDate?: string;
  isCurrent: boolean;
  bullets: TailoredBullet[];
}

export interface TailoredBullet {
  bulletId: string;
  originalContent: string;
  tailoredContent: string;
  keywords: string[];
}

export interface ResumeAnalysis {
  matchedKeywords: string[];
  missingKeywords: string[];
  recommendations: string[];
  strengthAreas: string[];
  improvementAreas: string[];
}
