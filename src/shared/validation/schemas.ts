/**
 * Validation Schemas
 *
 * Zod schemas for resume snapshots, stored records, the export document and
 * the generation request bodies accepted by the API.
 */

import { z } from 'zod';
import type {
  EducationEntry,
  ExperienceEntry,
  PersonalInfo,
  ProjectEntry,
  ResumeSnapshot
} from '../types';

/**
 * Split a comma-separated skills string into trimmed, non-empty entries
 */
export function splitSkills(value: string): string[] {
  return value.split(',').map(skill => skill.trim()).filter(Boolean);
}

// ============================================================================
// Field validators
// ============================================================================

export const EmailSchema = z.string().regex(
  /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/,
  'Invalid email format'
);

/**
 * 10-15 digits with an optional leading +, ignoring spaces, dashes and parentheses
 */
export const PhoneSchema = z.string().refine(
  (phone) => /^\+?[0-9]{10,15}$/.test(phone.replace(/[\s\-()]/g, '')),
  'Invalid phone number format'
);

export const UrlSchema = z.string().regex(
  /^https?:\/\/[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}.*$/,
  'Invalid URL format'
);

export const LinkedInSchema = z.string().regex(
  /^https?:\/\/(www\.)?linkedin\.com\/in\/[a-zA-Z0-9-]+\/?$/,
  'Invalid LinkedIn URL format'
);

// ============================================================================
// Resume snapshot
// ============================================================================

/**
 * Accepts either a list of skills or the comma-separated form the UI text field produces
 */
export const SkillListSchema = z
  .union([z.array(z.string()), z.string().transform(splitSkills)])
  .default([]);

export const PersonalInfoSchema: z.ZodType<PersonalInfo, z.ZodTypeDef, unknown> = z.object({
  name: z.string().default(''),
  email: z.string().default(''),
  phone: z.string().default(''),
  location: z.string().default(''),
  linkedin: z.string().optional(),
  portfolio: z.string().optional()
});

export const ExperienceEntrySchema: z.ZodType<ExperienceEntry, z.ZodTypeDef, unknown> = z.object({
  jobTitle: z.string().default(''),
  company: z.string().default(''),
  location: z.string().optional(),
  startDate: z.string().optional(),
  endDate: z.string().optional(),
  current: z.boolean().optional(),
  responsibilities: z.string().optional(),
  bulletPoints: z.array(z.string()).default([])
});

export const EducationEntrySchema: z.ZodType<EducationEntry, z.ZodTypeDef, unknown> = z.object({
  degree: z.string().default(''),
  field: z.string().optional(),
  institution: z.string().default(''),
  startYear: z.string().optional(),
  endYear: z.string().optional(),
  status: z.enum(['Completed', 'Pursuing']).optional(),
  grade: z.string().optional()
});

export const ProjectEntrySchema: z.ZodType<ProjectEntry, z.ZodTypeDef, unknown> = z.object({
  title: z.string().default(''),
  technologies: z.string().optional(),
  duration: z.string().optional(),
  description: z.string().optional(),
  enhancedDescription: z.string().optional(),
  link: z.string().optional()
});

export const ResumeSnapshotSchema: z.ZodType<ResumeSnapshot, z.ZodTypeDef, unknown> = z.object({
  personal: PersonalInfoSchema.default({}),
  targetRole: z.string().optional(),
  experienceYears: z.number().min(0, 'Experience years cannot be negative').optional(),
  summary: z.string().optional(),
  technicalSkills: SkillListSchema,
  softSkills: SkillListSchema,
  experienceList: z.array(ExperienceEntrySchema).default([]),
  educationList: z.array(EducationEntrySchema).default([]),
  projectsList: z.array(ProjectEntrySchema).default([]),
  certifications: z.array(z.string()).default([])
});

// ============================================================================
// Store inputs and export document
// ============================================================================

export const RecordIdSchema = z.coerce.number().int().positive();

/**
 * Any ISO 8601 timestamp, normalized to UTC with millisecond precision so
 * stored timestamps sort correctly as text
 */
const TimestampSchema = z
  .string()
  .datetime({ offset: true })
  .transform(value => new Date(value).toISOString());

export const SaveResumeInputSchema = z.object({
  id: RecordIdSchema.optional(),
  name: z.string().trim().min(1, 'Resume name is required'),
  targetRole: z.string().nullable().optional(),
  data: ResumeSnapshotSchema
});

export const SaveCoverLetterInputSchema = z.object({
  id: RecordIdSchema.optional(),
  resumeId: RecordIdSchema.nullable().optional(),
  companyName: z.string().default(''),
  jobTitle: z.string().trim().min(1, 'Job title is required'),
  content: z.string().trim().min(1, 'Cover letter content is required')
});

export const ResumeRecordSchema = z.object({
  id: z.number().int().positive(),
  name: z.string(),
  targetRole: z.string().nullable(),
  data: z.unknown().refine(value => value !== undefined, 'Resume data is required'),
  createdAt: TimestampSchema,
  updatedAt: TimestampSchema
});

export const CoverLetterRecordSchema = z.object({
  id: z.number().int().positive(),
  resumeId: z.number().int().positive().nullable(),
  companyName: z.string(),
  jobTitle: z.string(),
  content: z.string(),
  createdAt: TimestampSchema,
  updatedAt: TimestampSchema
});

export const ExportDocumentSchema = z.object({
  exportDate: TimestampSchema,
  resumes: z.array(ResumeRecordSchema).default([]),
  coverLetters: z.array(CoverLetterRecordSchema).default([])
});

// ============================================================================
// Generation requests
// ============================================================================

export const SummaryRequestSchema = z.object({
  targetRole: z.string().default(''),
  experienceYears: z.number().min(0).optional(),
  existingSummary: z.string().optional(),
  name: z.string().optional(),
  keySkills: z.string().optional(),
  education: z.string().optional()
});

export const BulletsRequestSchema = z.object({
  jobTitle: z.string().default(''),
  company: z.string().default(''),
  duration: z.string().optional(),
  responsibilities: z.string().default(''),
  existingBullets: z.array(z.string()).optional()
});

export const ProjectRequestSchema = z.object({
  title: z.string().default(''),
  technologies: z.string().optional(),
  duration: z.string().optional(),
  description: z.string().default('')
});

export const SkillsRequestSchema = z.object({
  targetRole: z.string().default(''),
  currentSkills: SkillListSchema
});

export const CoverLetterRequestSchema = z.object({
  jobTitle: z.string().default(''),
  companyName: z.string().optional(),
  jobDescription: z.string().optional(),
  additionalNotes: z.string().optional(),
  resumeId: RecordIdSchema.optional(),
  resume: ResumeSnapshotSchema.optional()
});
