/**
 * Resume Types
 *
 * The resume snapshot handed over by the form layer, and the records the
 * store keeps for resumes and cover letters.
 */

/**
 * Contact block at the top of a resume
 */
export interface PersonalInfo {
  name: string;
  email: string;
  phone: string;
  location: string;
  linkedin?: string;
  portfolio?: string;
}

export interface ExperienceEntry {
  jobTitle: string;
  company: string;
  location?: string;
  startDate?: string;
  endDate?: string;
  current?: boolean;
  /** Free-text responsibilities typed by the user, the input for bullet generation */
  responsibilities?: string;
  bulletPoints: string[];
}

export type EducationStatus = 'Completed' | 'Pursuing';

export interface EducationEntry {
  degree: string;
  field?: string;
  institution: string;
  startYear?: string;
  endYear?: string;
  status?: EducationStatus;
  grade?: string;
}

export interface ProjectEntry {
  title: string;
  technologies?: string;
  duration?: string;
  description?: string;
  enhancedDescription?: string;
  link?: string;
}

/**
 * Complete structured career data at a point in time.
 * Lists are ordered most recent first.
 */
export interface ResumeSnapshot {
  personal: PersonalInfo;
  targetRole?: string;
  experienceYears?: number;
  summary?: string;
  technicalSkills: string[];
  softSkills: string[];
  experienceList: ExperienceEntry[];
  educationList: EducationEntry[];
  projectsList: ProjectEntry[];
  certifications: string[];
}

// ============================================================================
// Stored records
// ============================================================================

/**
 * Resume record without its data blob, as returned by list operations
 */
export interface ResumeSummary {
  id: number;
  name: string;
  targetRole: string | null;
  createdAt: string;
  updatedAt: string;
}

/**
 * Full resume record. The store treats `data` as opaque JSON; callers
 * validate it into a ResumeSnapshot where they need the structure.
 */
export interface ResumeRecord extends ResumeSummary {
  data: unknown;
}

export interface CoverLetterRecord {
  id: number;
  /** Weak link to the resume that informed the letter */
  resumeId: number | null;
  companyName: string;
  jobTitle: string;
  content: string;
  createdAt: string;
  updatedAt: string;
}

export interface SaveResumeInput {
  id?: number;
  name: string;
  targetRole?: string | null;
  data: unknown;
}

export interface SaveCoverLetterInput {
  id?: number;
  resumeId?: number | null;
  companyName: string;
  jobTitle: string;
  content: string;
}

/**
 * Full backup of the store, serialized to a single JSON document
 */
export interface ExportDocument {
  exportDate: string;
  resumes: ResumeRecord[];
  coverLetters: CoverLetterRecord[];
}

/**
 * Build an empty snapshot, useful as a starting point for forms and tests
 */
export function createEmptySnapshot(): ResumeSnapshot {
  return {
    personal: { name: '', email: '', phone: '', location: '' },
    technicalSkills: [],
    softSkills: [],
    experienceList: [],
    educationList: [],
    projectsList: [],
    certifications: []
  };
}
