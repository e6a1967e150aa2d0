/**
 * Section Tailoring Scheduler.
 *
 * Fans out one completion call per non-empty section behind a FIFO admission
 * gate, gives each call its own deadline, and isolates failures: a section
 * that errors, times out or returns unusable data is logged, reported and
 * left out, while every other section proceeds.
 */

import { ConcurrencyLimiter, withTimeout } from '../lib/concurrency.js';
import { SECTION_CONCURRENCY, SECTION_TIMEOUT_MS } from '../lib/config.js';
import { InvalidInputError, SectionTailoringFailureError, errorMessage } from '../lib/errors.js';
import defaultLogger, { type Logger } from '../lib/logger.js';
import type { StructuredCompletion } from '../lib/structured-completion.js';
import {
  assembleTailoredResume,
  type CustomSectionResult,
  type StandardSectionResults,
  type TailoredResume,
} from './assembler.js';
import type { ProgressSink } from './progress.js';
import { SECTION_TAILOR_PROMPT } from './prompts.js';
import { collectLinkUrls, plainText, restrictLinks } from './rich-text.js';
import type { JobDocument } from './schemas/job-schemas.js';
import { mediaUrls, type GenericElement, type GenericSection, type ResumeDocument } from './schemas/resume-schemas.js';
import type { SectionResult } from './schemas/section-schemas.js';
import {
  CUSTOM_SECTION_BRIEF,
  SECTION_REGISTRY,
  STANDARD_SECTION_KINDS,
  sectionResponseShape,
  type SectionBrief,
  type SectionDataMap,
  type StandardSectionDefinition,
  type StandardSectionKind,
} from './section-registry.js';

export type SectionKind = StandardSectionKind | 'custom';

export interface SectionOutcome {
  section: string;
  kind: SectionKind;
  status: 'included' | 'irrelevant' | 'failed';
  error?: string;
  duration_ms: number;
}

export interface TailoringResult {
  tailored_resume: TailoredResume;
  /** Standard sections in registry order, then custom sections. Skipped (empty) sections are not listed. */
  sections: SectionOutcome[];
}

export interface SectionTailoringSchedulerDeps {
  completion: StructuredCompletion;
  notify?: ProgressSink;
  logger?: Logger;
  sectionTimeoutMs?: number;
}

interface SectionUnit<D> {
  name: string;
  label: string;
  kind: SectionKind;
  brief: SectionBrief<D>;
  source: unknown;
  allowedUrls: ReadonlySet<string>;
}

interface UnitRun<D> {
  result: SectionResult<D>;
  outcome: SectionOutcome;
}

const DEFAULT_CUSTOM_SECTION_NAME = 'Custom Section';

/** Suffixes repeated names (`Volunteering`, `Volunteering (2)`) so each is a unique key. */
export function uniqueSectionNames(names: readonly string[]): string[] {
  const seen = new Map<string, number>();
  const taken = new Set(names);
  return names.map((name) => {
    const count = (seen.get(name) ?? 0) + 1;
    seen.set(name, count);
    if (count === 1) return name;
    let suffix = count;
    let candidate = `${name} (${suffix})`;
    while (taken.has(candidate)) {
      suffix += 1;
      candidate = `${name} (${suffix})`;
    }
    taken.add(candidate);
    return candidate;
  });
}

export function buildSectionRequest(label: string, source: unknown, jobContent: string): string {
  return `<section name="${label}">
${JSON.stringify(source, null, 2)}
</section>

<job_description>
${jobContent}
</job_description>`;
}

export class SectionTailoringScheduler {
  private readonly completion: StructuredCompletion;
  private readonly notify: ProgressSink;
  private readonly log: Logger;
  private readonly sectionTimeoutMs: number;

  constructor(deps: SectionTailoringSchedulerDeps) {
    this.completion = deps.completion;
    this.notify = deps.notify ?? (() => undefined);
    this.log = deps.logger ?? defaultLogger;
    this.sectionTimeoutMs = deps.sectionTimeoutMs ?? SECTION_TIMEOUT_MS;
  }

  async tailor(
    resume: ResumeDocument,
    job: JobDocument,
    concurrencyLimit: number = SECTION_CONCURRENCY,
  ): Promise<TailoringResult> {
    if (!resume) throw new InvalidInputError('Resume data is required for tailoring.');
    if (!job) throw new InvalidInputError('Job data is required for tailoring.');
    if (!Number.isInteger(concurrencyLimit) || concurrencyLimit < 1) {
      throw new InvalidInputError(`Concurrency limit must be a positive integer, got ${concurrencyLimit}.`);
    }

    const limiter = new ConcurrencyLimiter(concurrencyLimit);
    const jobContent = JSON.stringify(job, null, 2);
    const standardResults: StandardSectionResults = {};

    const standardRuns: Array<Promise<SectionOutcome>> = [];
    for (const kind of STANDARD_SECTION_KINDS) {
      const run = this.scheduleStandard(kind, resume, jobContent, limiter, standardResults);
      if (run) standardRuns.push(run);
    }

    const customNames = uniqueSectionNames(
      resume.custom_sections.map((section) => plainText(section.section_name).trim() || DEFAULT_CUSTOM_SECTION_NAME),
    );
    const customRuns: Array<Promise<UnitRun<GenericElement[]>>> = [];
    resume.custom_sections.forEach((section, index) => {
      const name = customNames[index] ?? DEFAULT_CUSTOM_SECTION_NAME;
      const run = this.scheduleCustom(name, section, resume, jobContent, limiter);
      if (run) customRuns.push(run);
    });

    this.log.info(
      { sections: standardRuns.length + customRuns.length, concurrencyLimit },
      'Section tailoring started',
    );

    const [standardOutcomes, customResults] = await Promise.all([
      Promise.all(standardRuns),
      Promise.all(customRuns),
    ]);

    const tailored = assembleTailoredResume(
      resume.personal_info,
      standardResults,
      customResults.map((run): CustomSectionResult => ({ name: run.outcome.section, result: run.result })),
    );
    const sections = [...standardOutcomes, ...customResults.map((run) => run.outcome)];
    this.log.info(
      { failed: sections.filter((outcome) => outcome.status === 'failed').map((outcome) => outcome.section) },
      'Section tailoring finished',
    );
    return { tailored_resume: tailored, sections };
  }

  private scheduleStandard<K extends StandardSectionKind>(
    kind: K,
    resume: ResumeDocument,
    jobContent: string,
    limiter: ConcurrencyLimiter,
    results: { [P in K]?: SectionResult<SectionDataMap[P]> },
  ): Promise<SectionOutcome> | null {
    const definition: StandardSectionDefinition<SectionDataMap[K]> = SECTION_REGISTRY[kind];
    const source = definition.source(resume);
    if (source === null) {
      this.log.debug({ section: kind }, 'Section empty; skipped');
      return null;
    }

    const unit: SectionUnit<SectionDataMap[K]> = {
      name: kind,
      label: definition.title,
      kind,
      brief: definition,
      source,
      allowedUrls: allowedLinkUrls(source, resume),
    };
    return this.runUnit(unit, jobContent, limiter).then(({ result, outcome }) => {
      results[kind] = result;
      return outcome;
    });
  }

  private scheduleCustom(
    name: string,
    section: GenericSection,
    resume: ResumeDocument,
    jobContent: string,
    limiter: ConcurrencyLimiter,
  ): Promise<UnitRun<GenericElement[]>> | null {
    if (section.section_detail.length === 0) {
      this.log.debug({ section: name }, 'Custom section empty; skipped');
      return null;
    }
    return this.runUnit(
      {
        name,
        label: name,
        kind: 'custom',
        brief: CUSTOM_SECTION_BRIEF,
        source: section,
        allowedUrls: allowedLinkUrls(section, resume),
      },
      jobContent,
      limiter,
    );
  }

  /** Never rejects: failures come back as an omitted section with a failed outcome. */
  private async runUnit<D>(
    unit: SectionUnit<D>,
    jobContent: string,
    limiter: ConcurrencyLimiter,
  ): Promise<UnitRun<D>> {
    const started = Date.now();
    try {
      const result = await limiter.run(() => this.tailorSection(unit, jobContent));
      const outcome: SectionOutcome = {
        section: unit.name,
        kind: unit.kind,
        status: result.is_relevant ? 'included' : 'irrelevant',
        duration_ms: Date.now() - started,
      };
      this.notify(result.is_relevant
        ? `${unit.label}: tailored`
        : `${unit.label}: not relevant for this job, omitted`);
      return { result, outcome };
    } catch (err) {
      const failure = err instanceof SectionTailoringFailureError
        ? err
        : new SectionTailoringFailureError(unit.name, `${unit.name}: ${errorMessage(err)}`, { cause: err });
      this.log.warn({ section: unit.name, error: failure.message }, 'Section tailoring failed; section omitted');
      this.notify(`${unit.label}: failed, omitted (${failure.message})`);
      return {
        result: { is_relevant: false, data: null },
        outcome: {
          section: unit.name,
          kind: unit.kind,
          status: 'failed',
          error: failure.message,
          duration_ms: Date.now() - started,
        },
      };
    }
  }

  private async tailorSection<D>(unit: SectionUnit<D>, jobContent: string): Promise<SectionResult<D>> {
    this.notify(`Tailoring ${unit.label}`);
    const controller = new AbortController();
    const result = await withTimeout(
      this.completion.complete({
        system: `${SECTION_TAILOR_PROMPT}\n\n## This Section\n\n${unit.brief.guidance}`,
        user: buildSectionRequest(unit.label, unit.source, jobContent),
        shape: sectionResponseShape(`tailor_${unit.kind}`, unit.brief),
        signal: controller.signal,
      }),
      this.sectionTimeoutMs,
      `timed out after ${this.sectionTimeoutMs}ms`,
      () => controller.abort(),
    );
    if (!result.is_relevant) return result;

    const foreign = [...collectLinkUrls(result.data)].filter((url) => !unit.allowedUrls.has(url));
    if (foreign.length === 0) return result;

    this.log.warn({ section: unit.name, urls: foreign }, 'Removed links absent from the section source');
    const restricted = unit.brief.dataSchema.safeParse(restrictLinks(result.data, unit.allowedUrls));
    if (!restricted.success) {
      throw new SectionTailoringFailureError(unit.name, `${unit.name}: tailored data invalid after link check`);
    }
    return { is_relevant: true, data: restricted.data };
  }
}

/**
 * Link targets a tailored section may use: every link in its source, plus
 * the profile URLs when the source is the whole resume.
 */
function allowedLinkUrls(source: unknown, resume: ResumeDocument): Set<string> {
  const allowed = collectLinkUrls(source);
  if (source === resume) {
    for (const url of mediaUrls(resume.personal_info)) allowed.add(url);
  }
  return allowed;
}
