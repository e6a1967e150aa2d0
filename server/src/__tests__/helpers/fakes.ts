import type { ResumeExtractionCache } from '../../agents/extraction-cache.js';
import type { JobScraper } from '../../lib/job-scraper.js';
import type { CompletionRequest, StructuredCompletion } from '../../lib/structured-completion.js';
import { ResumeDocumentSchema, type ResumeDocument } from '../../agents/schemas/resume-schemas.js';
import type { RichText } from '../../agents/rich-text.js';

export interface RecordedCall {
  shape: string;
  system: string;
  user: string;
  signal?: AbortSignal;
}

export type Responder = (call: RecordedCall) => unknown;

/**
 * Completion stand-in: answers each request with the responder's raw value,
 * validated by the request's own schema like the real adapter does.
 */
export class FakeCompletion implements StructuredCompletion {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly respond: Responder, readonly model = 'test-model') {}

  async complete<T>(request: CompletionRequest<T>): Promise<T> {
    const call: RecordedCall = {
      shape: request.shape.name,
      system: request.system,
      user: request.user,
      signal: request.signal,
    };
    this.calls.push(call);
    const raw = await this.respond(call);
    return request.shape.schema.parse(raw);
  }

  shapes(): string[] {
    return this.calls.map((call) => call.shape);
  }
}

export class MemoryCache implements ResumeExtractionCache {
  readonly entries = new Map<string, ResumeDocument>();
  sets = 0;
  closes = 0;

  get(key: string): ResumeDocument | undefined {
    return this.entries.get(key);
  }

  set(key: string, document: ResumeDocument): void {
    this.sets += 1;
    this.entries.set(key, document);
  }

  close(): void {
    this.closes += 1;
  }
}

export class FakeScraper implements JobScraper {
  readonly urls: string[] = [];

  constructor(private readonly text = 'Senior Backend Engineer at Globex. Build TypeScript APIs.') {}

  async fetchText(url: string): Promise<string> {
    this.urls.push(url);
    return this.text;
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ─── Fixtures ─────────────────────────────────────────────────────────

export const rt = (text: string): RichText => ({ segments: [{ type: 'text', text }] });

export const API_URL = 'https://initech.example/api';
export const REPO_URL = 'https://git.example/queue';
export const GITHUB_URL = 'https://github.example/alex';

export const WORK_EXPERIENCE_JSON = [
  {
    role: rt('Engineer'),
    company: rt('Initech'),
    location: null,
    date_description: rt('2020 - 2024'),
    description: [
      { segments: [{ type: 'text', text: 'Built ' }, { type: 'link', text: 'the API', url: API_URL }] },
    ],
  },
];

export const EDUCATION_JSON = [{ degree: rt('BSc Computing'), university: rt('Tech U'), courses: [] }];

export const SKILLS_JSON = [{ name: rt('Languages'), skills: [rt('TypeScript'), rt('Go')] }];

export const PROJECTS_JSON = [
  {
    name: rt('Queue'),
    link: { type: 'link', text: 'repo', url: REPO_URL },
    resources: [],
    description: [rt('A durable job queue')],
  },
];

export const VOLUNTEERING_JSON = [{ title: rt('Mentor'), description: [rt('Weekly sessions')] }];

export const RESUME_JSON = {
  personal_info: {
    name: rt('Alex Rivera'),
    location: rt('Lisbon'),
    phone: null,
    email: rt('alex@example.com'),
    media: { github: GITHUB_URL, linkedin: null },
  },
  summary: rt('Backend engineer.'),
  work_experience: WORK_EXPERIENCE_JSON,
  education: EDUCATION_JSON,
  skill_sections: SKILLS_JSON,
  projects: PROJECTS_JSON,
  certifications: [],
  achievements: [],
  research_works: [],
  custom_sections: [{ section_name: rt('Volunteering'), section_detail: VOLUNTEERING_JSON }],
  keywords: ['TypeScript'],
};

export const JOB_DATA_JSON = {
  job_title: 'Backend Engineer',
  company_name: 'Globex',
  location: null,
  required_qualifications: ['TypeScript'],
  preferred_qualifications: [],
  job_duties_and_responsibilities: ['Build APIs'],
  keywords: ['TypeScript'],
};

export const JOB_JSON = { is_noise_only: false, data: JOB_DATA_JSON };

export function resumeDocument(): ResumeDocument {
  return ResumeDocumentSchema.parse(RESUME_JSON);
}

const SECTION_SOURCES: Record<string, unknown> = {
  work_experience: WORK_EXPERIENCE_JSON,
  education: EDUCATION_JSON,
  skill_sections: SKILLS_JSON,
  projects: PROJECTS_JSON,
  custom: VOLUNTEERING_JSON,
};

/** Tailoring answer that keeps each section as it was; the summary gets new text. */
export function echoSection(call: RecordedCall): unknown {
  const kind = call.shape.replace(/^tailor_/, '');
  if (kind === 'summary') return { is_relevant: true, data: rt('Tailored summary') };
  return { is_relevant: true, data: SECTION_SOURCES[kind] ?? null };
}

/** Answers extraction with the fixtures and tailoring with `echoSection`. */
export function defaultResponder(call: RecordedCall): unknown {
  if (call.shape === 'job_extraction') return JOB_JSON;
  if (call.shape === 'resume_extraction') return RESUME_JSON;
  return echoSection(call);
}
