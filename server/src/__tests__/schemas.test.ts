import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { sectionResultSchema } from '../agents/schemas/section-schemas.js';
import { JobExtractionSchema } from '../agents/schemas/job-schemas.js';
import { ResumeDocumentSchema, mediaUrls } from '../agents/schemas/resume-schemas.js';
import { RESUME_JSON, rt } from './helpers/fakes.js';

describe('sectionResultSchema', () => {
  const schema = sectionResultSchema(z.array(z.string()));

  it('passes relevant data through', () => {
    expect(schema.parse({ is_relevant: true, data: ['a'] })).toEqual({ is_relevant: true, data: ['a'] });
  });

  it('discards data supplied with an irrelevant verdict', () => {
    expect(schema.parse({ is_relevant: false, data: ['a'] })).toEqual({ is_relevant: false, data: null });
  });

  it('rejects a relevant verdict without data', () => {
    const result = schema.safeParse({ is_relevant: true, data: null });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['data']);
    }
  });

  it('reports nested data issues under the data path', () => {
    const result = schema.safeParse({ is_relevant: true, data: ['ok', 7] });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['data', 1]);
    }
  });

  it('rejects an irrelevant verdict for always-relevant sections', () => {
    const always = sectionResultSchema(z.string(), { alwaysRelevant: true });
    const result = always.safeParse({ is_relevant: false, data: null });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['is_relevant']);
    }
  });

  it('rejects a missing verdict', () => {
    expect(schema.safeParse({ data: ['a'] }).success).toBe(false);
  });
});

describe('JobExtractionSchema', () => {
  it('drops data when the content is noise', () => {
    expect(JobExtractionSchema.parse({ is_noise_only: true, data: { job_title: 'x' } })).toEqual({
      is_noise_only: true,
      data: null,
    });
  });

  it('requires data for a real posting', () => {
    expect(JobExtractionSchema.safeParse({ is_noise_only: false, data: null }).success).toBe(false);
  });

  it('normalizes missing lists to empty arrays', () => {
    const parsed = JobExtractionSchema.parse({ is_noise_only: false, data: { job_title: 'Engineer', keywords: null } });
    expect(parsed).toEqual({
      is_noise_only: false,
      data: {
        job_title: 'Engineer',
        required_qualifications: [],
        preferred_qualifications: [],
        job_duties_and_responsibilities: [],
        keywords: [],
      },
    });
  });
});

describe('ResumeDocumentSchema', () => {
  it('accepts a full resume and keeps link urls', () => {
    const resume = ResumeDocumentSchema.parse(RESUME_JSON);
    expect(resume.work_experience[0]?.description[0]?.segments[1]).toEqual({
      type: 'link',
      text: 'the API',
      url: 'https://initech.example/api',
    });
  });

  it('defaults absent sections to empty lists', () => {
    const resume = ResumeDocumentSchema.parse({ personal_info: { name: rt('Sam') } });
    expect(resume.work_experience).toEqual([]);
    expect(resume.custom_sections).toEqual([]);
    expect(resume.keywords).toEqual([]);
  });

  it('requires a name', () => {
    expect(ResumeDocumentSchema.safeParse({ personal_info: {} }).success).toBe(false);
  });

  it('lists media urls that are present', () => {
    const resume = ResumeDocumentSchema.parse(RESUME_JSON);
    expect(mediaUrls(resume.personal_info)).toEqual(['https://github.example/alex']);
  });
});
