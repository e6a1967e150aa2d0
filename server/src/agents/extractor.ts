/**
 * Structured Extractor: turns raw resume markdown and job posting text into
 * validated documents through schema-constrained completion calls.
 *
 * Resume extractions are cached by content; job postings are always
 * extracted fresh and classified for noise before anything else happens.
 */

import {
  ExtractionFailureError,
  InvalidInputError,
  NoiseContentError,
  errorMessage,
} from '../lib/errors.js';
import defaultLogger, { type Logger } from '../lib/logger.js';
import type { JobScraper } from '../lib/job-scraper.js';
import type { ResponseShape, StructuredCompletion } from '../lib/structured-completion.js';
import { extractionCacheKey, type ResumeExtractionCache } from './extraction-cache.js';
import type { ProgressSink } from './progress.js';
import {
  JOB_EXTRACTION_EXAMPLE,
  JOB_EXTRACTION_PROMPT,
  RESUME_DOCUMENT_EXAMPLE,
  RESUME_EXTRACTION_PROMPT,
} from './prompts.js';
import { plainText } from './rich-text.js';
import { JobExtractionSchema, type JobDocument, type JobExtraction } from './schemas/job-schemas.js';
import { ResumeDocumentSchema, type ResumeDocument } from './schemas/resume-schemas.js';

export const MAX_JOB_TEXT_CHARS = 50_000;

const RESUME_SHAPE: ResponseShape<ResumeDocument> = {
  name: 'resume_extraction',
  schema: ResumeDocumentSchema,
  example: RESUME_DOCUMENT_EXAMPLE,
};

const JOB_SHAPE: ResponseShape<JobExtraction> = {
  name: 'job_extraction',
  schema: JobExtractionSchema,
  example: JOB_EXTRACTION_EXAMPLE,
};

export interface JobSource {
  url?: string;
  text?: string;
}

export interface ResumeExtraction {
  document: ResumeDocument;
  cacheHit: boolean;
}

export interface StructuredExtractorDeps {
  completion: StructuredCompletion;
  cache?: ResumeExtractionCache;
  scraper?: JobScraper;
  notify?: ProgressSink;
  logger?: Logger;
}

/** True when extraction found neither a name nor any section content. */
export function isEmptyResume(resume: ResumeDocument): boolean {
  return (
    plainText(resume.personal_info.name).trim() === '' &&
    plainText(resume.summary).trim() === '' &&
    resume.work_experience.length === 0 &&
    resume.education.length === 0 &&
    resume.skill_sections.length === 0 &&
    resume.projects.length === 0 &&
    resume.certifications.length === 0 &&
    resume.achievements.length === 0 &&
    resume.research_works.length === 0 &&
    resume.custom_sections.length === 0
  );
}

export class StructuredExtractor {
  private readonly completion: StructuredCompletion;
  private readonly cache?: ResumeExtractionCache;
  private readonly scraper?: JobScraper;
  private readonly notify: ProgressSink;
  private readonly log: Logger;

  constructor(deps: StructuredExtractorDeps) {
    this.completion = deps.completion;
    this.cache = deps.cache;
    this.scraper = deps.scraper;
    this.notify = deps.notify ?? (() => undefined);
    this.log = deps.logger ?? defaultLogger;
  }

  async extractResume(markdown: string): Promise<ResumeDocument> {
    const { document } = await this.loadResume(markdown);
    return document;
  }

  /** Like `extractResume`, also reporting whether the cache answered. */
  async loadResume(markdown: string): Promise<ResumeExtraction> {
    if (!markdown.trim()) {
      throw new InvalidInputError('Resume text is empty; nothing to extract.');
    }

    const key = extractionCacheKey(markdown, this.completion.model);
    const cached = this.cache?.get(key);
    if (cached) {
      this.log.info({ cacheKey: key.slice(0, 12) }, 'Resume extraction cache hit');
      this.notify('Resume details loaded from cache');
      return { document: cached, cacheHit: true };
    }

    this.notify('Extracting resume details');
    let document: ResumeDocument;
    try {
      document = await this.completion.complete({
        system: RESUME_EXTRACTION_PROMPT,
        user: `<resume>\n${markdown}\n</resume>`,
        shape: RESUME_SHAPE,
      });
    } catch (err) {
      throw new ExtractionFailureError('resume', `Resume extraction failed: ${errorMessage(err)}`, { cause: err });
    }

    if (isEmptyResume(document)) {
      throw new ExtractionFailureError('resume', 'Resume extraction found no recognizable resume content.');
    }

    this.cache?.set(key, document);
    this.log.info({ cacheKey: key.slice(0, 12) }, 'Resume extraction cached');
    return { document, cacheHit: false };
  }

  async extractJob(source: JobSource): Promise<JobDocument> {
    const text = await this.resolveJobText(source);

    if (text.length > MAX_JOB_TEXT_CHARS) {
      this.log.warn({ chars: text.length, limit: MAX_JOB_TEXT_CHARS }, 'Job text truncated before extraction');
    }
    this.notify('Extracting job details');
    let extraction: JobExtraction;
    try {
      extraction = await this.completion.complete({
        system: JOB_EXTRACTION_PROMPT,
        user: `<job_description>\n${text.slice(0, MAX_JOB_TEXT_CHARS)}\n</job_description>`,
        shape: JOB_SHAPE,
      });
    } catch (err) {
      throw new ExtractionFailureError('job', `Job extraction failed: ${errorMessage(err)}`, { cause: err });
    }

    if (extraction.is_noise_only) {
      this.log.warn({ chars: text.length }, 'Job content classified as noise');
      throw new NoiseContentError();
    }
    this.log.info(
      { jobTitle: extraction.data.job_title ?? null, keywords: extraction.data.keywords.length },
      'Job details extracted',
    );
    return extraction.data;
  }

  private async resolveJobText(source: JobSource): Promise<string> {
    const text = source.text?.trim();
    if (text) return text;

    const url = source.url?.trim();
    if (!url) {
      throw new InvalidInputError('Provide either a job URL or the job description text.');
    }
    if (!this.scraper) {
      throw new InvalidInputError('A job URL was given but no scraper is configured; paste the job text instead.');
    }
    this.notify('Fetching job posting');
    return this.scraper.fetchText(url);
  }
}
