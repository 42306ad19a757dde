/**
 * Tests for validation schemas and validators
 */

import { describe, it, expect } from 'vitest';
import { AppError, ErrorCategory } from '../../shared/errors';
import { createEmptySnapshot } from '../../shared/types';
import {
  ExportDocumentSchema,
  parseResumeSnapshot,
  RecordIdSchema,
  ResumeSnapshotSchema,
  SaveResumeInputSchema,
  SkillsRequestSchema,
  splitSkills,
  validatePersonalInfo,
  validateResumeSnapshot
} from '../../shared/validation';

describe('ResumeSnapshotSchema', () => {
  it('should fill an empty object with defaults', () => {
    expect(ResumeSnapshotSchema.parse({})).toEqual(createEmptySnapshot());
  });

  it('should accept comma-separated skills', () => {
    const snapshot = parseResumeSnapshot({ technicalSkills: 'Python, SQL ,, Excel', softSkills: ['Teamwork'] });

    expect(snapshot.technicalSkills).toEqual(['Python', 'SQL', 'Excel']);
    expect(snapshot.softSkills).toEqual(['Teamwork']);
  });

  it('should report invalid fields with their path', () => {
    let caught: unknown;
    try {
      parseResumeSnapshot({ experienceYears: -1 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(AppError);
    if (caught instanceof AppError) {
      expect(caught.category).toBe(ErrorCategory.VALIDATION);
      expect(caught.userMessage).toBe('Invalid resume data: experienceYears: Experience years cannot be negative');
    }
  });

  it('should summarize validation results', () => {
    expect(validateResumeSnapshot({ experienceList: [{ bulletPoints: 'not a list' }] })).toEqual({
      isValid: false,
      errors: [{ field: 'experienceList.0.bulletPoints', message: 'Expected array, received string' }]
    });
    expect(validateResumeSnapshot({})).toEqual({ isValid: true, errors: [] });
  });
});

describe('validatePersonalInfo', () => {
  it('should accept a complete contact block', () => {
    expect(validatePersonalInfo({
      name: 'Jane Doe',
      email: 'jane@example.com',
      phone: '+1 (555) 123-4567',
      location: 'Austin, TX',
      linkedin: 'https://www.linkedin.com/in/jane-doe',
      portfolio: 'https://jane.example.com'
    })).toEqual({ isValid: true, errors: [] });
  });

  it('should report missing and malformed fields', () => {
    expect(validatePersonalInfo({
      name: ' ',
      email: 'jane@example.com',
      phone: '123',
      location: 'Austin',
      linkedin: 'https://example.com/jane'
    })).toEqual({
      isValid: false,
      errors: [
        { field: 'name', message: 'name is required' },
        { field: 'phone', message: 'Invalid phone number format' },
        { field: 'linkedin', message: 'Invalid LinkedIn URL format' }
      ]
    });
  });

  it('should flag a malformed email', () => {
    const result = validatePersonalInfo({ name: 'Jane', email: 'jane.example.com', phone: '5551234567', location: 'Austin' });

    expect(result.errors).toEqual([{ field: 'email', message: 'Invalid email format' }]);
  });
});

describe('request and record schemas', () => {
  it('should coerce positive integer ids', () => {
    expect(RecordIdSchema.parse('12')).toBe(12);
    expect(RecordIdSchema.safeParse('0').success).toBe(false);
    expect(RecordIdSchema.safeParse('abc').success).toBe(false);
  });

  it('should require a resume name', () => {
    expect(SaveResumeInputSchema.safeParse({ name: '   ', data: {} }).success).toBe(false);
    expect(SaveResumeInputSchema.parse({ name: ' Main ', data: {} }).name).toBe('Main');
  });

  it('should default skill request lists', () => {
    expect(SkillsRequestSchema.parse({})).toEqual({ targetRole: '', currentSkills: [] });
  });

  it('should require ISO timestamps in export documents', () => {
    expect(ExportDocumentSchema.safeParse({ exportDate: '2024-01-01T00:00:00.000Z' }).success).toBe(true);
    expect(ExportDocumentSchema.safeParse({ exportDate: 'yesterday' }).success).toBe(false);
  });

  it('should split skills', () => {
    expect(splitSkills(' a, b ,,c ')).toEqual(['a', 'b', 'c']);
  });
});
