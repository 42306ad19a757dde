/**
 * Content Generator
 *
 * Resume and cover-letter content generation on top of a TextGenerator.
 * Every method resolves to a GeneratorOutcome and never throws: input
 * problems, provider failures and unexpected exceptions all come back as a
 * short message the UI can show as-is.
 */

import { ErrorHandler } from '../errors';
import {
  buildCoverLetterPrompt,
  buildExperiencePrompt,
  buildProjectPrompt,
  buildQualityAnalysisPrompt,
  buildSkillsPrompt,
  buildSummaryPrompt,
  mergeSkills,
  parseBulletPoints,
  parseSkillList,
  sanitizeGeneratedText,
  TextGenerator
} from '../llm';
import { loggers } from '../logging';
import type { EducationEntry, ExperienceEntry, ProjectEntry, ResumeSnapshot } from '../types';
import {
  CoverLetterContext,
  CoverLetterRequest,
  ExperienceBulletsRequest,
  GeneratorOutcome,
  OptimizedField,
  ProjectDescriptionRequest,
  ResumeOptimization,
  SkillSuggestionRequest,
  SummaryRequest
} from './types';

export const INPUT_MESSAGES = {
  targetRole: 'Please enter a target job role first.',
  responsibilities: 'Please enter basic responsibilities first.',
  projectDescription: 'Please enter a basic project description first.',
  jobTitle: 'Please enter the job title first.'
} as const;

const EMPTY_CONTENT_MESSAGE = 'An error occurred: the model returned no content';

/** Summaries shorter than this are regenerated by optimizeResume */
export const MIN_SUMMARY_LENGTH = 50;

const MAX_BULLETS = 5;

function isBlank(value: string | undefined | null): boolean {
  return !value || !value.trim();
}

function optional(value: string | undefined | null): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function describeEducation(entry: EducationEntry | undefined): string | undefined {
  if (!entry) return undefined;
  const degree = [entry.degree, entry.field].map(optional).filter(Boolean).join(' in ');
  const description = optional([degree, entry.institution].map(optional).filter(Boolean).join(', '));
  if (description && entry.status) {
    return `${description} (${entry.status})`;
  }
  return description;
}

function describeDuration(entry: ExperienceEntry): string | undefined {
  const end = entry.current ? 'Present' : entry.endDate;
  return optional([entry.startDate, end].map(optional).filter(Boolean).join(' - '));
}

function condenseExperience(entry: ExperienceEntry): string {
  const heading = [entry.jobTitle, entry.company].map(optional).filter(Boolean).join(' at ');
  const bullets = entry.bulletPoints.map(optional).filter(Boolean).slice(0, 2);
  const detail = bullets.length > 0 ? bullets.join('; ') : optional(entry.responsibilities);
  return detail ? `${heading}: ${detail}` : heading;
}

function condenseProject(project: ProjectEntry): string {
  const title = project.title.trim();
  const technologies = optional(project.technologies);
  const heading = technologies ? `${title} (${technologies})` : title;
  const description = optional(project.enhancedDescription) ?? optional(project.description);
  return description ? `${heading}: ${description}` : heading;
}

function nonEmptyList(items: string[]): string[] | undefined {
  const kept = items.filter(item => item.trim().length > 0);
  return kept.length > 0 ? kept : undefined;
}

/**
 * Distill the parts of a resume a cover letter draws on: contact details,
 * merged skills, the two most recent positions and projects, and the most
 * recent education entry.
 */
export function extractCoverLetterContext(snapshot: ResumeSnapshot): CoverLetterContext {
  const { personal } = snapshot;
  const contact = [personal.email, personal.phone, personal.location].map(optional).filter(Boolean).join(' | ');
  const skills = mergeSkills(snapshot.technicalSkills, snapshot.softSkills).join(', ');

  return {
    candidateName: optional(personal.name),
    contact: optional(contact),
    targetRole: optional(snapshot.targetRole),
    summary: optional(snapshot.summary),
    skills: optional(skills),
    experience: nonEmptyList(snapshot.experienceList.slice(0, 2).map(condenseExperience)),
    education: describeEducation(snapshot.educationList[0]),
    projects: nonEmptyList(snapshot.projectsList.slice(0, 2).map(condenseProject))
  };
}

export class ContentGenerator {
  constructor(private readonly client: TextGenerator) {}

  getProviderName(): string {
    return this.client.getProviderName();
  }

  async generateSummary(request: SummaryRequest): Promise<GeneratorOutcome<string>> {
    return this.guard('generateSummary', async () => {
      if (isBlank(request.targetRole)) {
        return { success: false, error: INPUT_MESSAGES.targetRole };
      }
      return this.generateText(buildSummaryPrompt({ ...request, targetRole: request.targetRole.trim() }));
    });
  }

  /**
   * Rewrite free-text responsibilities as at most five bullet points.
   * Works the same on entries that already have bullets.
   */
  async generateExperienceBullets(request: ExperienceBulletsRequest): Promise<GeneratorOutcome<string[]>> {
    return this.guard('generateExperienceBullets', async () => {
      if (isBlank(request.responsibilities)) {
        return { success: false, error: INPUT_MESSAGES.responsibilities };
      }

      const result = await this.client.generateWithRetry(buildExperiencePrompt(request));
      if (!result.ok) {
        return { success: false, error: result.failure.message };
      }

      const bullets = parseBulletPoints(result.text, MAX_BULLETS);
      if (bullets.length === 0) {
        return { success: false, error: EMPTY_CONTENT_MESSAGE };
      }
      return { success: true, content: bullets };
    });
  }

  async enhanceProjectDescription(request: ProjectDescriptionRequest): Promise<GeneratorOutcome<string>> {
    return this.guard('enhanceProjectDescription', async () => {
      if (isBlank(request.description)) {
        return { success: false, error: INPUT_MESSAGES.projectDescription };
      }
      return this.generateText(buildProjectPrompt(request));
    });
  }

  /**
   * Suggestions may overlap current skills; callers merge with `mergeSkills`.
   */
  async suggestSkills(request: SkillSuggestionRequest): Promise<GeneratorOutcome<string[]>> {
    return this.guard('suggestSkills', async () => {
      if (isBlank(request.targetRole)) {
        return { success: false, error: INPUT_MESSAGES.targetRole };
      }

      const result = await this.client.generateWithRetry(buildSkillsPrompt(request));
      if (!result.ok) {
        return { success: false, error: result.failure.message };
      }

      const skills = parseSkillList(result.text);
      if (skills.length === 0) {
        return { success: false, error: EMPTY_CONTENT_MESSAGE };
      }
      return { success: true, content: skills };
    });
  }

  async analyzeResumeQuality(snapshot: ResumeSnapshot): Promise<GeneratorOutcome<string>> {
    return this.guard('analyzeResumeQuality', () => this.generateText(buildQualityAnalysisPrompt(snapshot)));
  }

  /**
   * Regenerate every AI-assisted field of a resume for its target role, one
   * request at a time. The input is left untouched.
   */
  async optimizeResume(snapshot: ResumeSnapshot): Promise<GeneratorOutcome<ResumeOptimization>> {
    return this.guard('optimizeResume', async () => {
      const targetRole = optional(snapshot.targetRole);
      if (!targetRole) {
        return { success: false, error: INPUT_MESSAGES.targetRole };
      }

      const optimization: ResumeOptimization = { failures: {} };
      let succeeded = 0;
      const recordFailure = (field: OptimizedField, error: string): void => {
        if (!optimization.failures[field]) {
          optimization.failures[field] = error;
        }
      };

      const currentSummary = snapshot.summary?.trim() ?? '';
      if (currentSummary.length < MIN_SUMMARY_LENGTH) {
        const summary = await this.generateSummary({
          targetRole,
          name: optional(snapshot.personal.name),
          experienceYears: snapshot.experienceYears,
          keySkills: optional(snapshot.technicalSkills.join(', ')),
          education: describeEducation(snapshot.educationList[0]),
          existingSummary: optional(currentSummary)
        });
        if (summary.success) {
          optimization.summary = summary.content;
          succeeded++;
        } else {
          recordFailure('summary', summary.error);
        }
      }

      let experienceChanged = false;
      const experienceList: ExperienceEntry[] = [];
      for (const entry of snapshot.experienceList) {
        const responsibilities = optional(entry.responsibilities);
        if (!responsibilities) {
          experienceList.push({ ...entry, bulletPoints: [...entry.bulletPoints] });
          continue;
        }

        const bullets = await this.generateExperienceBullets({
          jobTitle: entry.jobTitle,
          company: entry.company,
          duration: describeDuration(entry),
          responsibilities,
          existingBullets: nonEmptyList(entry.bulletPoints)
        });
        if (bullets.success) {
          experienceList.push({ ...entry, bulletPoints: bullets.content });
          experienceChanged = true;
          succeeded++;
        } else {
          experienceList.push({ ...entry, bulletPoints: [...entry.bulletPoints] });
          recordFailure('experienceList', bullets.error);
        }
      }
      if (experienceChanged) {
        optimization.experienceList = experienceList;
      }

      let projectsChanged = false;
      const projectsList: ProjectEntry[] = [];
      for (const project of snapshot.projectsList) {
        const description = optional(project.description);
        if (!description) {
          projectsList.push({ ...project });
          continue;
        }

        const enhanced = await this.enhanceProjectDescription({
          title: project.title,
          technologies: optional(project.technologies),
          duration: optional(project.duration),
          description
        });
        if (enhanced.success) {
          projectsList.push({ ...project, enhancedDescription: enhanced.content });
          projectsChanged = true;
          succeeded++;
        } else {
          projectsList.push({ ...project });
          recordFailure('projectsList', enhanced.error);
        }
      }
      if (projectsChanged) {
        optimization.projectsList = projectsList;
      }

      const skills = await this.suggestSkills({ targetRole, currentSkills: snapshot.technicalSkills });
      if (skills.success) {
        optimization.suggestedSkills = skills.content;
        succeeded++;
      } else {
        recordFailure('suggestedSkills', skills.error);
      }

      const failed = Object.values(optimization.failures);
      if (succeeded === 0 && failed.length > 0) {
        return { success: false, error: failed[0] ?? EMPTY_CONTENT_MESSAGE };
      }

      loggers.generation.info(
        { succeeded, failedFields: Object.keys(optimization.failures) },
        'Resume optimization finished'
      );
      return { success: true, content: optimization };
    });
  }

  async generateCoverLetter(request: CoverLetterRequest): Promise<GeneratorOutcome<string>> {
    return this.guard('generateCoverLetter', async () => {
      if (isBlank(request.jobTitle)) {
        return { success: false, error: INPUT_MESSAGES.jobTitle };
      }

      const context = request.resume ? extractCoverLetterContext(request.resume) : {};
      return this.generateText(buildCoverLetterPrompt({
        ...context,
        jobTitle: request.jobTitle.trim(),
        companyName: request.companyName,
        jobDescription: request.jobDescription,
        additionalNotes: request.additionalNotes
      }));
    });
  }

  private async generateText(prompt: string): Promise<GeneratorOutcome<string>> {
    const result = await this.client.generateWithRetry(prompt);
    if (!result.ok) {
      return { success: false, error: result.failure.message };
    }

    const text = sanitizeGeneratedText(result.text);
    if (!text) {
      return { success: false, error: EMPTY_CONTENT_MESSAGE };
    }
    return { success: true, content: text };
  }

  /**
   * Convert anything thrown by `action` into an "Unexpected error" outcome
   */
  private async guard<T>(
    operation: string,
    action: () => Promise<GeneratorOutcome<T>>
  ): Promise<GeneratorOutcome<T>> {
    try {
      return await action();
    } catch (error) {
      const appError = ErrorHandler.createUnexpectedError(error, { operation });
      ErrorHandler.logError(appError);
      return { success: false, error: appError.userMessage };
    }
  }
}
