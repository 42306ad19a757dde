/**
 * Generation Types
 */

import type { ExperienceEntry, ProjectEntry, ResumeSnapshot } from '../types';

/**
 * Outcome of a generator call. Failures carry a short human-readable message.
 */
export type GeneratorOutcome<T> =
  | { success: true; content: T }
  | { success: false; error: string };

export interface SummaryRequest {
  targetRole: string;
  experienceYears?: number;
  existingSummary?: string;
  name?: string;
  keySkills?: string;
  education?: string;
}

export interface ExperienceBulletsRequest {
  jobTitle: string;
  company: string;
  duration?: string;
  responsibilities: string;
  existingBullets?: string[];
}

export interface ProjectDescriptionRequest {
  title: string;
  technologies?: string;
  duration?: string;
  description: string;
}

export interface SkillSuggestionRequest {
  targetRole: string;
  currentSkills: string[];
}

export interface CoverLetterRequest {
  jobTitle: string;
  companyName?: string;
  jobDescription?: string;
  additionalNotes?: string;
  resume?: ResumeSnapshot;
}

/**
 * Prompt context distilled from a resume for cover-letter generation.
 * Every part is optional; absent parts are left out of the prompt.
 */
export interface CoverLetterContext {
  candidateName?: string;
  contact?: string;
  targetRole?: string;
  summary?: string;
  skills?: string;
  experience?: string[];
  education?: string;
  projects?: string[];
}

export type OptimizedField = 'summary' | 'experienceList' | 'projectsList' | 'suggestedSkills';

/**
 * Fields produced by a whole-resume optimization pass. Only fields that were
 * regenerated successfully are present; `failures` names the ones that failed.
 */
export interface ResumeOptimization {
  summary?: string;
  experienceList?: ExperienceEntry[];
  projectsList?: ProjectEntry[];
  suggestedSkills?: string[];
  failures: Partial<Record<OptimizedField, string>>;
}
