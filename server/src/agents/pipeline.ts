/**
 * Pipeline Orchestrator
 *
 * Linear run: validate input, extract the job (failing fast on noise),
 * extract the resume (cache-checked), tailor sections concurrently, assemble
 * and render. The orchestrator makes no model calls of its own.
 *
 * The extraction cache is opened once per run and closed in `finally`,
 * whatever the outcome.
 */

import { randomUUID } from 'node:crypto';
import path from 'node:path';
import { SECTION_CONCURRENCY } from '../lib/config.js';
import { InvalidInputError, RenderingFailureError, TailorError, errorMessage } from '../lib/errors.js';
import type { JobScraper } from '../lib/job-scraper.js';
import { createRunLogger, type Logger } from '../lib/logger.js';
import type { StructuredCompletion } from '../lib/structured-completion.js';
import type { TailoredResume } from './assembler.js';
import { openExtractionCache, type ResumeExtractionCache } from './extraction-cache.js';
import { StructuredExtractor } from './extractor.js';
import { createProgressNotifier, type ProgressSink } from './progress.js';
import type { RenderedResume, ResumeRenderer } from './renderer.js';
import { SectionTailoringScheduler, type SectionOutcome } from './section-tailor.js';

export const CACHE_DIR_NAME = '.resume_cache';

export interface TailorRunInput {
  resume_text: string;
  job_url?: string;
  job_text?: string;
  output_dir: string;
  /** Defaults to `<output_dir>/.resume_cache`; runs pointed at one directory share entries. */
  cache_dir?: string;
  concurrency_limit?: number;
  run_id?: string;
}

export interface TailorRunDeps {
  completion: StructuredCompletion;
  scraper: JobScraper;
  renderer: ResumeRenderer;
  progress?: ProgressSink;
  logger?: Logger;
  openCache?: (cacheDir: string) => ResumeExtractionCache;
  sectionTimeoutMs?: number;
}

type RunStage = 'job_extraction' | 'resume_extraction' | 'tailoring' | 'rendering';

export interface TailorRunResult {
  run_id: string;
  tailored_resume: TailoredResume;
  artifact_path: string;
  source_path: string;
  cache_hit: boolean;
  sections: SectionOutcome[];
  failed_sections: string[];
  stage_timings_ms: Partial<Record<RunStage, number>>;
}

function validateInput(input: TailorRunInput): void {
  if (!input.job_url?.trim() && !input.job_text?.trim()) {
    throw new InvalidInputError('Provide either a job URL or the job description text.');
  }
  if (!input.resume_text?.trim()) {
    throw new InvalidInputError('Resume text is empty; nothing to tailor.');
  }
  if (!input.output_dir?.trim()) {
    throw new InvalidInputError('An output directory is required.');
  }
  const limit = input.concurrency_limit;
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
    throw new InvalidInputError(`Concurrency limit must be a positive integer, got ${limit}.`);
  }
}

export async function runTailorPipeline(input: TailorRunInput, deps: TailorRunDeps): Promise<TailorRunResult> {
  const runId = input.run_id ?? randomUUID();
  const log = deps.logger ?? createRunLogger(runId);
  const notify = createProgressNotifier(deps.progress, log);

  validateInput(input);

  const stageTimingsMs: TailorRunResult['stage_timings_ms'] = {};
  const stageStart = new Map<RunStage, number>();
  const markStageStart = (stage: RunStage) => stageStart.set(stage, Date.now());
  const markStageEnd = (stage: RunStage) => {
    const start = stageStart.get(stage);
    if (start !== undefined) stageTimingsMs[stage] = Date.now() - start;
  };

  const cacheDir = input.cache_dir ?? path.join(input.output_dir, CACHE_DIR_NAME);
  const cache = (deps.openCache ?? openExtractionCache)(cacheDir);

  try {
    notify('Starting resume tailoring');
    const extractor = new StructuredExtractor({
      completion: deps.completion,
      cache,
      scraper: deps.scraper,
      notify,
      logger: log,
    });

    // ─── Stage 1: Job extraction ─────────────────────────────────
    markStageStart('job_extraction');
    const job = await extractor.extractJob({ url: input.job_url, text: input.job_text });
    markStageEnd('job_extraction');

    // ─── Stage 2: Resume extraction ──────────────────────────────
    markStageStart('resume_extraction');
    const { document: resume, cacheHit } = await extractor.loadResume(input.resume_text);
    markStageEnd('resume_extraction');

    // ─── Stage 3: Section tailoring ──────────────────────────────
    markStageStart('tailoring');
    const scheduler = new SectionTailoringScheduler({
      completion: deps.completion,
      notify,
      logger: log,
      sectionTimeoutMs: deps.sectionTimeoutMs,
    });
    const { tailored_resume, sections } = await scheduler.tailor(
      resume,
      job,
      input.concurrency_limit ?? SECTION_CONCURRENCY,
    );
    markStageEnd('tailoring');

    // ─── Stage 4: Rendering ──────────────────────────────────────
    markStageStart('rendering');
    notify('Rendering tailored resume');
    let rendered: RenderedResume;
    try {
      rendered = await deps.renderer.render(tailored_resume, input.output_dir);
    } catch (err) {
      throw new RenderingFailureError(`Rendering failed: ${errorMessage(err)}`, { cause: err });
    }
    markStageEnd('rendering');

    const failedSections = sections.filter((s) => s.status === 'failed').map((s) => s.section);
    log.info(
      { cacheHit, failedSections, stageTimingsMs, artifactPath: rendered.artifact_path },
      'Tailoring run complete',
    );
    notify(failedSections.length > 0
      ? `Resume tailored (${failedSections.length} section(s) could not be tailored and were omitted)`
      : 'Resume tailored');

    return {
      run_id: runId,
      tailored_resume,
      artifact_path: rendered.artifact_path,
      source_path: rendered.source_path,
      cache_hit: cacheHit,
      sections,
      failed_sections: failedSections,
      stage_timings_ms: stageTimingsMs,
    };
  } catch (err) {
    const code = err instanceof TailorError ? err.code : 'UNEXPECTED';
    log.error({ code, error: errorMessage(err) }, 'Tailoring run failed');
    notify(`Tailoring failed: ${errorMessage(err)}`);
    throw err;
  } finally {
    cache.close();
  }
}
