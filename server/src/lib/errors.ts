export type TailorErrorCode =
  | 'INVALID_INPUT'
  | 'NOISE_CONTENT'
  | 'EXTRACTION_FAILURE'
  | 'SECTION_TAILORING_FAILURE'
  | 'RENDERING_FAILURE'
  | 'SCRAPE_FAILURE'
  | 'COMPLETION_FAILURE';

export class TailorError extends Error {
  constructor(
    message: string,
    readonly code: TailorErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TailorError';
  }
}

/** Neither a job URL nor job text was supplied, or the resume text is blank. */
export class InvalidInputError extends TailorError {
  constructor(message: string) {
    super(message, 'INVALID_INPUT');
    this.name = 'InvalidInputError';
  }
}

/** The job text is a bot wall, login gate, consent screen or similar. */
export class NoiseContentError extends TailorError {
  constructor(message = 'The job content was identified as noise (login wall, bot check or consent page) rather than a job posting.') {
    super(message, 'NOISE_CONTENT');
    this.name = 'NoiseContentError';
  }
}

export class ExtractionFailureError extends TailorError {
  constructor(
    readonly document: 'resume' | 'job',
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, 'EXTRACTION_FAILURE', options);
    this.name = 'ExtractionFailureError';
  }
}

/** Isolated to one section; recorded and never thrown out of the scheduler. */
export class SectionTailoringFailureError extends TailorError {
  constructor(
    readonly section: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, 'SECTION_TAILORING_FAILURE', options);
    this.name = 'SectionTailoringFailureError';
  }
}

export class RenderingFailureError extends TailorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'RENDERING_FAILURE', options);
    this.name = 'RenderingFailureError';
  }
}

export class ScrapeError extends TailorError {
  constructor(
    message: string,
    readonly reason: 'request' | 'content' | 'timeout' | 'blocked',
    options?: { cause?: unknown },
  ) {
    super(message, 'SCRAPE_FAILURE', options);
    this.name = 'ScrapeError';
  }
}

/** The completion capability could not produce a conforming response. */
export class CompletionError extends TailorError {
  constructor(
    readonly shape: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, 'COMPLETION_FAILURE', options);
    this.name = 'CompletionError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
