/**
 * Process-wide settings, read from the environment once at startup.
 */

function envInt(key: string, fallback: number, min = 1): number {
  const parsed = Number.parseInt(process.env[key] ?? '', 10);
  return Number.isFinite(parsed) && parsed >= min ? parsed : fallback;
}

function envString(key: string, fallback: string): string {
  const val = process.env[key]?.trim();
  return val ? val : fallback;
}

export const PORT = envInt('PORT', 3001);

/** Root directory for per-run artifacts and the shared extraction cache. */
export const TAILOR_OUTPUT_DIR = envString('TAILOR_OUTPUT_DIR', './output');

/** Maximum simultaneous section tailoring calls. */
export const SECTION_CONCURRENCY = envInt('SECTION_CONCURRENCY', 3);

/** Wall-clock deadline for one section's completion call. */
export const SECTION_TIMEOUT_MS = envInt('SECTION_TIMEOUT_MS', 120_000);

/** Re-prompts allowed when a model response fails schema validation. */
export const LLM_REPAIR_ATTEMPTS = envInt('LLM_REPAIR_ATTEMPTS', 2, 0);

/** Per-request timeout for the OpenAI-compatible provider. */
export const LLM_TIMEOUT_MS = envInt('LLM_TIMEOUT_MS', 180_000);

export const MAX_TOKENS = envInt('MAX_TOKENS', 8192);

export const SCRAPE_TIMEOUT_MS = envInt('SCRAPE_TIMEOUT_MS', 15_000);

export type ProviderName = 'anthropic' | 'openai-compatible';

export function getProviderName(): ProviderName {
  const configured = process.env.LLM_PROVIDER?.toLowerCase();
  if (configured === 'anthropic' || configured === 'openai-compatible') return configured;
  return process.env.OPENAI_COMPAT_API_KEY ? 'openai-compatible' : 'anthropic';
}

export function isLlmKeyPresent(): boolean {
  return getProviderName() === 'openai-compatible'
    ? Boolean(process.env.OPENAI_COMPAT_API_KEY)
    : Boolean(process.env.ANTHROPIC_API_KEY);
}

/** Largest accepted POST /api/tailor body. */
export const MAX_TAILOR_BODY_BYTES = envInt('MAX_TAILOR_BODY_BYTES', 512_000);

export const ALLOWED_ORIGINS: string[] = process.env.ALLOWED_ORIGINS
  ? process.env.ALLOWED_ORIGINS.split(',').map((origin) => origin.trim()).filter(Boolean)
  : process.env.NODE_ENV === 'production'
    ? []
    : ['http://localhost:5173'];
