import { User } from '@domain/entities/user.entity';
import {
  GenerateSummaryRequest,
  ScoreMatchRequest,
  SelectBulletsRequest,
  TailorBulletRequest,
} from '@application/ports/ai-orchestration.port';
import { TargetLanguage } from '@domain/types/profile.types';

const LANGUAGE_NAMES: Record<TargetLanguage, string> = {
  [TargetLanguage.EN]: 'English',
  [TargetLanguage.PT_BR]: 'Brazilian Portuguese',
};

const JSON_ONLY = 'IMPORTANT: Respond ONLY with valid JSON. Do not include any text outside the JSON.';

export function languageName(language: TargetLanguage): string {
  return LANGUAGE_NAMES[language];
}

function list(values: readonly string[]): string {
  return values.length > 0 ? values.join(', ') : 'none listed';
}

export function analyzeJobPrompt(jobDescription: string): string {
  return `Analyze the following job description and extract key information.

Job Description:
${jobDescription}

Provide a JSON response with the following structure:
{
  "title": "extracted job title",
  "company": "company name if found",
  "required_skills": ["list", "of", "required", "skills"],
  "preferred_skills": ["list", "of", "nice-to-have", "skills"],
  "keywords": ["important", "keywords", "from", "description"],
  "seniority_level": "junior/mid/senior/lead/executive",
  "years_experience": null or number,
  "summary": "brief 2-3 sentence summary of the role"
}

${JSON_ONLY}`;
}

export function selectBulletsPrompt(request: SelectBulletsRequest): string {
  const { jobAnalysis: job } = request;
  const bullets = request.availableBullets
    .map((bullet, index) => `${index + 1}. [ID: ${bullet.id}] ${bullet.content}`)
    .join('\n');

  return `You are an expert resume consultant. Select the most relevant experience bullets for this job.

JOB REQUIREMENTS:
- Title: ${job.title}
- Company: ${job.company}
- Required Skills: ${list(job.requiredSkills)}
- Preferred Skills: ${list(job.preferredSkills)}
- Keywords: ${list(job.keywords)}
- Summary: ${job.summary}

AVAILABLE BULLETS:
${bullets}

Select up to ${request.maxBullets} bullets that best match this job. Prioritize:
1. Direct skill matches
2. Quantifiable achievements
3. Relevant industry experience
4. Leadership/impact indicators

RULES:
1. Use only IDs from the list above.
2. Return ONLY the final JSON object, with no drafts or reasoning outside it.
3. If no bullet matches perfectly, select the closest ones and explain why in "reasoning".

Respond with JSON:
{
  "selected_bullet_ids": ["id1", "id2"],
  "reasoning": "Brief explanation of the selection strategy"
}`;
}

export function tailorBulletPrompt(request: TailorBulletRequest): string {
  const { jobAnalysis: job } = request;

  return `You are an expert resume writer. Optimize one experience bullet for the target job.

ORIGINAL BULLET:
${request.bullet.content}

TARGET CONTEXT:
- Job Title: ${job.title}
- Required Skills: ${list(job.requiredSkills)}
- Keywords: ${list(job.keywords)}

INSTRUCTIONS:
1. Fix grammar and clarity problems in the original.
2. Make sure the bullet states a concrete action and a measurable result. If it already does, keep it close to the original.
3. Weave in at most 3-5 of the keywords, and only where they fit naturally.
4. Never invent technologies, employers, numbers or achievements that the original does not support.
5. Write strictly in ${languageName(request.targetLanguage)}, with a ${request.style} tone.

Apply **bold** markdown to at most 3-5 high-value terms: technologies, metrics and strong action verbs.

Respond with JSON:
{
  "tailored_content": "The optimized bullet with **markdown** highlights",
  "keywords": ["keywords", "used"]
}

${JSON_ONLY}`;
}

export function summaryPrompt(request: GenerateSummaryRequest): string {
  const { jobAnalysis: job, user } = request;
  const achievements = request.selectedBullets
    .map((bullet) => `- ${bullet.tailoredContent}`)
    .join('\n');

  return `Generate a professional summary for a resume application.

CANDIDATE INFO:
${candidate(user)}

KEY ACHIEVEMENTS (selected for this job):
${achievements}

TARGET JOB:
- Title: ${job.title}
- Company: ${job.company}
- Required Skills: ${list(job.requiredSkills)}
- Summary: ${job.summary}

Write a compelling 3-4 sentence professional summary that:
1. Highlights relevant experience and skills
2. Incorporates the key achievements
3. Aligns with the target job requirements
4. Uses confident, professional language
5. Is written in ${languageName(request.targetLanguage)}

Apply **bold** markdown to at most 4-6 terms: years of experience, technical domains, core competencies or notable metrics.

Respond with JSON:
{
  "summary": "the generated professional summary"
}

${JSON_ONLY}`;
}

function candidate(user: User): string {
  return [
    `- Name: ${user.name || 'Professional'}`,
    `- Headline: ${user.headline ?? ''}`,
    `- Current Summary: ${user.summary ?? ''}`,
  ].join('\n');
}

export function scoreMatchPrompt(request: ScoreMatchRequest): string {
  const { jobAnalysis: job, resume } = request;
  const skills = request.userSkills
    .map((skill) => `- ${skill.name} (proficiency: ${skill.proficiencyLevel.value}%)`)
    .join('\n');
  const experiences = resume.experiences
    .map((experience) =>
      [
        `${experience.title} at ${experience.organization}:`,
        ...experience.bullets.map((bullet) => `  - ${bullet.tailoredContent}`),
      ].join('\n')
    )
    .join('\n');

  return `Score how well this resume matches the job requirements.

JOB REQUIREMENTS:
- Title: ${job.title}
- Required Skills: ${list(job.requiredSkills)}
- Preferred Skills: ${list(job.preferredSkills)}
- Years Experience: ${job.yearsExperience ?? 'not specified'}
- Summary: ${job.summary}

CANDIDATE SKILLS:
${skills}

RESUME CONTENT:
Summary: ${resume.summary}

${experiences}

Score the match from 0 to 100 using these weights:
1. Skill alignment (40%)
2. Experience relevance (30%)
3. Seniority fit (15%)
4. Keyword coverage (15%)

Respond with JSON:
{
  "score": 85,
  "breakdown": { "skills": 90, "experience": 80, "seniority": 85, "keywords": 75 },
  "explanation": "Brief explanation of the score"
}

${JSON_ONLY}`;
}
