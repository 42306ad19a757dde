/**
 * LLM Prompts
 *
 * Prompt templates for resume content generation. Every builder is a pure
 * function: task statement, a context block of "- Label: value" lines,
 * numbered requirements, and a plain-text output contract.
 */

import type { ResumeSnapshot } from '../types';

export type ContextValue = string | number | string[] | null | undefined;

export type ContextField = [label: string, value: ContextValue];

export const PLAIN_TEXT_CONTRACT =
  'Use plain text only. Do not use markdown, asterisks, underscores, bullet symbols, emoji or other special characters.';

const MAX_JOB_DESCRIPTION_LENGTH = 3000;
const MAX_CONTEXT_ENTRY_LENGTH = 400;

/**
 * Normalize line endings and trim
 */
export function escapePromptText(text: string): string {
  return text
    .replace(/\r\n/g, '\n')
    .replace(/\r/g, '\n')
    .trim();
}

/**
 * Truncate text to a maximum length while preserving word boundaries
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }

  const truncated = text.substring(0, maxLength);
  const lastSpace = truncated.lastIndexOf(' ');

  if (lastSpace > 0) {
    return truncated.substring(0, lastSpace) + '...';
  }

  return truncated + '...';
}

export function formatList(items: string[], numbered: boolean = false): string {
  if (numbered) {
    return items.map((item, i) => `${i + 1}. ${item}`).join('\n');
  }
  return items.map(item => `- ${item}`).join('\n');
}

/**
 * Render context lines, dropping absent and blank values. Numbers are kept,
 * zero included; list values are joined with "; ".
 */
export function formatContext(fields: ContextField[]): string {
  const lines: string[] = [];

  for (const [label, value] of fields) {
    if (value === null || value === undefined) continue;

    if (typeof value === 'number') {
      if (Number.isFinite(value)) lines.push(`- ${label}: ${value}`);
      continue;
    }

    const text = Array.isArray(value)
      ? value.map(escapePromptText).filter(Boolean).join('; ')
      : escapePromptText(value);
    if (text) lines.push(`- ${label}: ${text}`);
  }

  return lines.join('\n');
}

/**
 * Assemble a prompt from its four parts. An empty context block is left out.
 */
export function buildStructuredPrompt(
  task: string,
  context: ContextField[],
  instructions: string[],
  outputFormat: string
): string {
  let prompt = `${task}\n\n`;

  const contextBlock = formatContext(context);
  if (contextBlock) {
    prompt += `CONTEXT:\n${contextBlock}\n\n`;
  }

  if (instructions.length > 0) {
    prompt += `REQUIREMENTS:\n${formatList(instructions, true)}\n\n`;
  }

  prompt += `OUTPUT FORMAT:\n${outputFormat}\n${PLAIN_TEXT_CONTRACT}`;

  return prompt;
}

// ============================================================================
// Prompt inputs
// ============================================================================

export interface SummaryPromptInput {
  targetRole: string;
  experienceYears?: number;
  name?: string;
  keySkills?: string;
  education?: string;
  existingSummary?: string;
}

export interface ExperiencePromptInput {
  jobTitle: string;
  company: string;
  duration?: string;
  responsibilities: string;
  existingBullets?: string[];
}

export interface ProjectPromptInput {
  title: string;
  technologies?: string;
  duration?: string;
  description: string;
}

export interface SkillsPromptInput {
  targetRole: string;
  currentSkills: string[];
  industry?: string;
}

export interface CoverLetterPromptInput {
  jobTitle: string;
  companyName?: string;
  jobDescription?: string;
  additionalNotes?: string;
  candidateName?: string;
  contact?: string;
  targetRole?: string;
  summary?: string;
  skills?: string;
  experience?: string[];
  education?: string;
  projects?: string[];
}

// ============================================================================
// Builders
// ============================================================================

export function buildSummaryPrompt(input: SummaryPromptInput): string {
  const revising = Boolean(input.existingSummary && input.existingSummary.trim());

  const instructions = [
    'Write 2-3 sentences, 50-70 words in total',
    'Lead with the strongest qualification for the target role',
    'Write in implied first person without pronouns',
    'Mention only skills and facts present in the context'
  ];
  if (revising) {
    instructions.push('Keep the facts of the existing summary and sharpen its wording');
  }

  return buildStructuredPrompt(
    revising
      ? `Revise the professional summary of a resume targeting the role "${input.targetRole}".`
      : `Write a professional summary for a resume targeting the role "${input.targetRole}".`,
    [
      ['Target role', input.targetRole],
      ['Name', input.name],
      ['Years of experience', input.experienceYears],
      ['Key skills', input.keySkills],
      ['Education', input.education],
      ['Existing summary', input.existingSummary]
    ],
    instructions,
    'Return only the summary as a single paragraph.'
  );
}

export function buildExperiencePrompt(input: ExperiencePromptInput): string {
  const instructions = [
    'Write 3-5 bullet points',
    'Start each bullet with a strong action verb',
    'Quantify impact where the responsibilities support it, and invent no numbers',
    'Keep each bullet under 25 words'
  ];
  if (input.existingBullets && input.existingBullets.length > 0) {
    instructions.push('Improve on the existing bullet points instead of repeating them');
  }

  return buildStructuredPrompt(
    `Write resume bullet points for the position "${input.jobTitle}"${input.company ? ` at ${input.company}` : ''}.`,
    [
      ['Job title', input.jobTitle],
      ['Company', input.company],
      ['Duration', input.duration],
      ['Responsibilities', input.responsibilities],
      ['Existing bullet points', input.existingBullets]
    ],
    instructions,
    'Return one bullet point per line, with no bullet characters, numbering or blank lines.'
  );
}

export function buildProjectPrompt(input: ProjectPromptInput): string {
  return buildStructuredPrompt(
    `Rewrite the description of the project "${input.title}" for a resume.`,
    [
      ['Project', input.title],
      ['Technologies', input.technologies],
      ['Duration', input.duration],
      ['Description', input.description]
    ],
    [
      'Write 2-3 sentences, 40-60 words in total',
      'Say what was built, with which technologies, and what it achieved',
      'Start with an action verb'
    ],
    'Return only the description as a single paragraph.'
  );
}

export function buildSkillsPrompt(input: SkillsPromptInput): string {
  return buildStructuredPrompt(
    `Suggest additional skills for a resume targeting the role "${input.targetRole}".`,
    [
      ['Target role', input.targetRole],
      ['Current skills', input.currentSkills.join(', ')],
      ['Industry', input.industry]
    ],
    [
      'Suggest 5-8 skills relevant to the target role',
      'Do not repeat any of the current skills',
      'Prefer specific tools and methods over generic traits'
    ],
    'Return the skills on a single line, separated by commas.'
  );
}

function describeExperience(snapshot: ResumeSnapshot): string[] {
  return snapshot.experienceList.map(entry => {
    const heading = [entry.jobTitle, entry.company].filter(Boolean).join(' at ');
    const detail = entry.bulletPoints.length > 0
      ? entry.bulletPoints.join('; ')
      : entry.responsibilities ?? '';
    return truncateText(detail ? `${heading}: ${detail}` : heading, MAX_CONTEXT_ENTRY_LENGTH);
  });
}

export function buildQualityAnalysisPrompt(snapshot: ResumeSnapshot): string {
  return buildStructuredPrompt(
    'Review the resume below and assess its quality.',
    [
      ['Target role', snapshot.targetRole],
      ['Years of experience', snapshot.experienceYears],
      ['Summary', snapshot.summary],
      ['Technical skills', snapshot.technicalSkills.join(', ')],
      ['Soft skills', snapshot.softSkills.join(', ')],
      ['Experience', describeExperience(snapshot)],
      ['Education', snapshot.educationList.map(entry =>
        [entry.degree, entry.field, entry.institution].filter(Boolean).join(', '))],
      ['Projects', snapshot.projectsList.map(project =>
        truncateText(`${project.title}: ${project.enhancedDescription ?? project.description ?? ''}`, MAX_CONTEXT_ENTRY_LENGTH))],
      ['Certifications', snapshot.certifications]
    ],
    [
      'Rate the overall strength of the resume from 1 to 10',
      'List its main strengths',
      'List specific improvements',
      'List keywords an applicant tracking system would expect for the target role that are missing'
    ],
    'Return a report with the headings RATING, STRENGTHS, IMPROVEMENTS and ATS KEYWORDS, one item per line under each heading, each item starting with a hyphen.'
  );
}

export function buildCoverLetterPrompt(input: CoverLetterPromptInput): string {
  const company = input.companyName && input.companyName.trim() ? input.companyName.trim() : undefined;

  return buildStructuredPrompt(
    `Write a cover letter for the position "${input.jobTitle}"${company ? ` at ${company}` : ''}.`,
    [
      ['Position', input.jobTitle],
      ['Company', company],
      ['Job description', input.jobDescription && truncateText(input.jobDescription, MAX_JOB_DESCRIPTION_LENGTH)],
      ['Candidate name', input.candidateName],
      ['Contact', input.contact],
      ['Target role', input.targetRole],
      ['Professional summary', input.summary],
      ['Skills', input.skills],
      ['Experience', input.experience],
      ['Education', input.education],
      ['Projects', input.projects],
      ['Additional notes', input.additionalNotes]
    ],
    [
      'Write 3-4 paragraphs, 300-400 words in total',
      'Open with genuine interest in the position',
      'Connect the candidate experience and projects to the job',
      'Close with a confident call to action',
      'Do not include a salutation, a signature, addresses or a date'
    ],
    'Return only the body of the letter, with paragraphs separated by a blank line.'
  );
}
