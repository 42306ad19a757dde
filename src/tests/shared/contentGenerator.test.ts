/**
 * Tests for the content generators, driven by a scripted TextGenerator
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ErrorCategory, ErrorHandler } from '../../shared/errors';
import { ContentGenerator, extractCoverLetterContext, INPUT_MESSAGES } from '../../shared/generation';
import { failure, FAILURE_MESSAGES, GenerationResult, TextGenerator } from '../../shared/llm';
import { createEmptySnapshot, ResumeSnapshot } from '../../shared/types';

const NO_CONTENT = 'An error occurred: the model returned no content';

function ok(text: string): GenerationResult {
  return { ok: true, text, provider: 'anthropic', model: 'test-model' };
}

class ScriptedGenerator implements TextGenerator {
  readonly prompts: string[] = [];

  constructor(private readonly respond: (prompt: string) => GenerationResult) {}

  async generateContent(prompt: string): Promise<GenerationResult> {
    return this.generateWithRetry(prompt);
  }

  async generateWithRetry(prompt: string): Promise<GenerationResult> {
    this.prompts.push(prompt);
    return this.respond(prompt);
  }

  getProviderName(): string {
    return 'Scripted';
  }
}

/**
 * Answers by prompt type, the way a real model would
 */
function byPromptType(prompt: string): GenerationResult {
  if (prompt.startsWith('Write a professional summary')) return ok('Analyst who turns raw data into decisions.');
  if (prompt.startsWith('Write resume bullet points')) return ok('- Built an internal reporting tool\n- Automated weekly metrics\n- Cut report turnaround from days to hours');
  if (prompt.startsWith('Rewrite the description')) return ok('Developed a **Python** script for X.');
  if (prompt.startsWith('Suggest additional skills')) return ok('SQL, Tableau');
  return ok('Generic answer');
}

function analystSnapshot(): ResumeSnapshot {
  const snapshot = createEmptySnapshot();
  snapshot.personal.name = 'Jane Doe';
  snapshot.targetRole = 'Data Analyst';
  snapshot.experienceList = [
    { jobTitle: 'Analyst', company: 'Acme', responsibilities: 'built internal tool', bulletPoints: [] }
  ];
  snapshot.projectsList = [{ title: 'Automation', description: 'a script for X' }];
  return snapshot;
}

describe('ContentGenerator', () => {
  beforeEach(() => {
    ErrorHandler.clearLogs();
  });

  describe('single-field generation', () => {
    it('should require a target role for the summary without calling the provider', async () => {
      const client = new ScriptedGenerator(byPromptType);
      const generator = new ContentGenerator(client);

      expect(await generator.generateSummary({ targetRole: '  ' })).toEqual({
        success: false,
        error: 'Please enter a target job role first.'
      });
      expect(client.prompts).toEqual([]);
    });

    it('should return the sanitized summary', async () => {
      const generator = new ContentGenerator(new ScriptedGenerator(() => ok('  **Results-driven** analyst with 5 years of experience.  ')));

      expect(await generator.generateSummary({ targetRole: 'Data Analyst' })).toEqual({
        success: true,
        content: 'Results-driven analyst with 5 years of experience.'
      });
    });

    it('should pass provider failure messages through', async () => {
      const generator = new ContentGenerator(new ScriptedGenerator(() => failure('rate_limited', FAILURE_MESSAGES.rateLimited)));

      expect(await generator.generateSummary({ targetRole: 'Data Analyst' })).toEqual({
        success: false,
        error: 'Rate limit exceeded. Please wait a moment and try again.'
      });
    });

    it('should convert exceptions into an unexpected error outcome', async () => {
      const generator = new ContentGenerator(new ScriptedGenerator(() => {
        throw new Error('socket hang up');
      }));

      expect(await generator.analyzeResumeQuality(createEmptySnapshot())).toEqual({
        success: false,
        error: 'Unexpected error: socket hang up'
      });
      const logs = ErrorHandler.getLogs();
      expect(logs).toHaveLength(1);
      expect(logs[0].category).toBe(ErrorCategory.UNEXPECTED);
      expect(logs[0].context).toEqual({ operation: 'analyzeResumeQuality' });
    });

    it('should require responsibilities for bullets', async () => {
      const generator = new ContentGenerator(new ScriptedGenerator(byPromptType));

      expect(await generator.generateExperienceBullets({ jobTitle: 'Analyst', company: 'Acme', responsibilities: '' }))
        .toEqual({ success: false, error: INPUT_MESSAGES.responsibilities });
    });

    it('should parse generated bullets', async () => {
      const generator = new ContentGenerator(new ScriptedGenerator(() => ok('- Built X\n- Cut Y by 10%')));

      expect(await generator.generateExperienceBullets({ jobTitle: 'Analyst', company: 'Acme', responsibilities: 'reports' }))
        .toEqual({ success: true, content: ['Built X', 'Cut Y by 10%'] });
    });

    it('should fail when no bullet can be parsed', async () => {
      const generator = new ContentGenerator(new ScriptedGenerator(() => ok('***')));

      expect(await generator.generateExperienceBullets({ jobTitle: 'Analyst', company: 'Acme', responsibilities: 'reports' }))
        .toEqual({ success: false, error: NO_CONTENT });
    });

    it('should require a project description', async () => {
      const generator = new ContentGenerator(new ScriptedGenerator(byPromptType));

      expect(await generator.enhanceProjectDescription({ title: 'Automation', description: ' ' }))
        .toEqual({ success: false, error: 'Please enter a basic project description first.' });
    });

    it('should return de-duplicated skill suggestions', async () => {
      const generator = new ContentGenerator(new ScriptedGenerator(() => ok('Python, SQL, python')));

      expect(await generator.suggestSkills({ targetRole: 'Data Analyst', currentSkills: ['Excel'] }))
        .toEqual({ success: true, content: ['Python', 'SQL'] });
    });
  });

  describe('optimizeResume', () => {
    it('should regenerate every eligible field in order', async () => {
      const client = new ScriptedGenerator(byPromptType);
      const generator = new ContentGenerator(client);
      const snapshot = analystSnapshot();

      const outcome = await generator.optimizeResume(snapshot);

      expect(outcome).toEqual({
        success: true,
        content: {
          summary: 'Analyst who turns raw data into decisions.',
          experienceList: [{
            jobTitle: 'Analyst',
            company: 'Acme',
            responsibilities: 'built internal tool',
            bulletPoints: [
              'Built an internal reporting tool',
              'Automated weekly metrics',
              'Cut report turnaround from days to hours'
            ]
          }],
          projectsList: [{
            title: 'Automation',
            description: 'a script for X',
            enhancedDescription: 'Developed a Python script for X.'
          }],
          suggestedSkills: ['SQL', 'Tableau'],
          failures: {}
        }
      });
      if (outcome.success) {
        const bullets = outcome.content.experienceList?.[0]?.bulletPoints ?? [];
        expect(bullets.length).toBeGreaterThanOrEqual(3);
        expect(bullets.length).toBeLessThanOrEqual(5);
        expect(outcome.content.suggestedSkills?.length).toBeGreaterThan(0);
      }
      expect(client.prompts.map(prompt => prompt.split('\n')[0])).toEqual([
        'Write a professional summary for a resume targeting the role "Data Analyst".',
        'Write resume bullet points for the position "Analyst" at Acme.',
        'Rewrite the description of the project "Automation" for a resume.',
        'Suggest additional skills for a resume targeting the role "Data Analyst".'
      ]);
    });

    it('should leave its input untouched', async () => {
      const generator = new ContentGenerator(new ScriptedGenerator(byPromptType));
      const snapshot = analystSnapshot();
      const before = structuredClone(snapshot);

      await generator.optimizeResume(snapshot);

      expect(snapshot).toEqual(before);
    });

    it('should keep a summary of 50 characters or more', async () => {
      const client = new ScriptedGenerator(byPromptType);
      const snapshot = analystSnapshot();
      snapshot.summary = 'Data analyst with five years of experience in retail reporting.';

      const outcome = await new ContentGenerator(client).optimizeResume(snapshot);

      expect(outcome.success && outcome.content.summary).toBeUndefined();
      expect(client.prompts).toHaveLength(3);
    });

    it('should record failed fields and return the rest', async () => {
      const generator = new ContentGenerator(new ScriptedGenerator((prompt) =>
        prompt.startsWith('Suggest additional skills')
          ? failure('rate_limited', FAILURE_MESSAGES.rateLimited)
          : byPromptType(prompt)
      ));

      const outcome = await generator.optimizeResume(analystSnapshot());

      expect(outcome.success).toBe(true);
      if (outcome.success) {
        expect(outcome.content.suggestedSkills).toBeUndefined();
        expect(outcome.content.summary).toBe('Analyst who turns raw data into decisions.');
        expect(outcome.content.failures).toEqual({ suggestedSkills: FAILURE_MESSAGES.rateLimited });
      }
    });

    it('should fail when every field fails', async () => {
      const generator = new ContentGenerator(new ScriptedGenerator(() =>
        failure('invalid_request', FAILURE_MESSAGES.invalidApiKey)
      ));

      expect(await generator.optimizeResume(analystSnapshot())).toEqual({
        success: false,
        error: 'Invalid API key. Please check your configuration.'
      });
    });

    it('should require a target role', async () => {
      const client = new ScriptedGenerator(byPromptType);
      const snapshot = analystSnapshot();
      snapshot.targetRole = '';

      expect(await new ContentGenerator(client).optimizeResume(snapshot))
        .toEqual({ success: false, error: INPUT_MESSAGES.targetRole });
      expect(client.prompts).toEqual([]);
    });
  });

  describe('cover letters', () => {
    function candidate(): ResumeSnapshot {
      const snapshot = createEmptySnapshot();
      snapshot.personal = { name: 'Jane Doe', email: 'jane@example.com', phone: '', location: 'Austin, TX' };
      snapshot.targetRole = 'Data Analyst';
      snapshot.technicalSkills = ['Python', 'SQL'];
      snapshot.softSkills = ['Communication', 'sql'];
      snapshot.experienceList = [
        { jobTitle: 'Data Analyst', company: 'Acme', bulletPoints: ['Built dashboards', 'Cut report time 40%', 'Third bullet'] },
        { jobTitle: 'Intern', company: 'Beta', bulletPoints: [], responsibilities: 'Cleaned data' },
        { jobTitle: 'Clerk', company: 'Gamma', bulletPoints: ['Filed records'] }
      ];
      snapshot.educationList = [
        { degree: 'BSc', field: 'Statistics', institution: 'State University' },
        { degree: 'Diploma', institution: 'City High School' }
      ];
      snapshot.projectsList = [
        { title: 'Churn Model', technologies: 'Python', description: 'Predicted churn' },
        { title: 'Scraper' },
        { title: 'Third Project', description: 'Not included' }
      ];
      return snapshot;
    }

    it('should condense the top two experiences and projects', () => {
      expect(extractCoverLetterContext(candidate())).toEqual({
        candidateName: 'Jane Doe',
        contact: 'jane@example.com | Austin, TX',
        targetRole: 'Data Analyst',
        summary: undefined,
        skills: 'Python, SQL, Communication',
        experience: [
          'Data Analyst at Acme: Built dashboards; Cut report time 40%',
          'Intern at Beta: Cleaned data'
        ],
        education: 'BSc in Statistics, State University',
        projects: ['Churn Model (Python): Predicted churn', 'Scraper']
      });
    });

    it('should mark the education of a current student', () => {
      const snapshot = candidate();
      snapshot.educationList[0].status = 'Pursuing';

      expect(extractCoverLetterContext(snapshot).education).toBe('BSc in Statistics, State University (Pursuing)');
    });

    it('should omit every part of an empty resume', () => {
      expect(extractCoverLetterContext(createEmptySnapshot())).toEqual({
        candidateName: undefined,
        contact: undefined,
        targetRole: undefined,
        summary: undefined,
        skills: undefined,
        experience: undefined,
        education: undefined,
        projects: undefined
      });
    });

    it('should require a job title', async () => {
      const generator = new ContentGenerator(new ScriptedGenerator(byPromptType));

      expect(await generator.generateCoverLetter({ jobTitle: '' }))
        .toEqual({ success: false, error: 'Please enter the job title first.' });
    });

    it('should put the resume context into the prompt', async () => {
      const client = new ScriptedGenerator(() => ok('I am excited to apply…'));
      const generator = new ContentGenerator(client);

      const outcome = await generator.generateCoverLetter({
        jobTitle: 'Senior Analyst',
        companyName: 'Globex',
        resume: candidate()
      });

      expect(outcome).toEqual({ success: true, content: 'I am excited to apply...' });
      const prompt = client.prompts[0];
      expect(prompt.startsWith('Write a cover letter for the position "Senior Analyst" at Globex.')).toBe(true);
      expect(prompt).toContain('- Candidate name: Jane Doe');
      expect(prompt).toContain('- Experience: Data Analyst at Acme: Built dashboards; Cut report time 40%; Intern at Beta: Cleaned data');
      expect(prompt).not.toContain('Clerk');
      expect(prompt).not.toContain('Third Project');
    });
  });
});
