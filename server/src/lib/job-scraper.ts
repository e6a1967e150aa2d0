import { lookup } from 'node:dns/promises';
import { isIP } from 'node:net';
import { ScrapeError } from './errors.js';
import { SCRAPE_TIMEOUT_MS } from './config.js';

/**
 * Turns a job-posting URL into raw text for extraction.
 */
export interface JobScraper {
  fetchText(url: string): Promise<string>;
}

const MAX_REDIRECTS = 3;
const MAX_FETCH_BYTES = 2_000_000;
const MIN_TEXT_CHARS = 200;
const MAX_TEXT_CHARS = 50_000;

function isPrivateIPv4(ip: string): boolean {
  const parts = ip.split('.').map((p) => Number.parseInt(p, 10));
  if (parts.length !== 4 || parts.some((p) => Number.isNaN(p) || p < 0 || p > 255)) return true;
  const [a, b] = parts;
  if (a === 0) return true; // 0.0.0.0/8
  if (a === 10) return true; // 10.0.0.0/8
  if (a === 127) return true; // loopback
  if (a === 169 && b === 254) return true; // link-local / metadata
  if (a === 172 && b >= 16 && b <= 31) return true; // 172.16/12
  if (a === 192 && b === 168) return true; // 192.168/16
  return false;
}

function isPrivateIPv6(ip: string): boolean {
  const normalized = ip.trim().toLowerCase();
  if (!normalized) return true;
  if (normalized === '::' || normalized === '::1') return true;
  if (normalized.startsWith('::ffff:')) {
    return isPrivateIPv4(normalized.replace(/^::ffff:/, ''));
  }
  // Unique local (fc00::/7) and link-local (fe80::/10)
  if (normalized.startsWith('fc') || normalized.startsWith('fd')) return true;
  return /^fe[89ab]/.test(normalized);
}

function bareHost(hostname: string): string {
  return hostname.trim().toLowerCase().replace(/^\[|\]$/g, '');
}

export function isPrivateHost(hostname: string): boolean {
  const host = bareHost(hostname);
  if (!host) return true;
  if (host === 'localhost' || host.endsWith('.localhost') || host.endsWith('.local')) return true;
  const ipVersion = isIP(host);
  if (ipVersion === 4) return isPrivateIPv4(host);
  if (ipVersion === 6) return isPrivateIPv6(host);
  return false;
}

function decodeHtmlEntities(input: string): string {
  return input
    .replace(/&nbsp;|&#160;/gi, ' ')
    .replace(/&amp;/gi, '&')
    .replace(/&quot;/gi, '"')
    .replace(/&#39;/gi, "'")
    .replace(/&lt;/gi, '<')
    .replace(/&gt;/gi, '>');
}

export function extractVisibleTextFromHtml(html: string): string {
  const noScripts = html
    .replace(/<head\b[^>]*>[\s\S]*?<\/head>/gi, ' ')
    .replace(/<(script|style|noscript|template|svg)\b[^>]*>[\s\S]*?<\/\1>/gi, ' ');
  const withLineBreaks = noScripts
    .replace(/<li\b[^>]*>/gi, '\n- ')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/(p|div|li|h1|h2|h3|h4|h5|h6|tr|ul|ol|section|article)>/gi, '\n');
  const withoutTags = withLineBreaks.replace(/<[^>]+>/g, ' ');
  return decodeHtmlEntities(withoutTags)
    .replace(/[ \t]+/g, ' ')
    .replace(/ *\n */g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export type HostLookup = (hostname: string) => Promise<string[]>;

async function dnsLookup(hostname: string): Promise<string[]> {
  const records = await lookup(hostname, { all: true, verbatim: true });
  return records.map((record) => record.address);
}

export interface HttpJobScraperOptions {
  timeoutMs?: number;
  lookupHost?: HostLookup;
}

/**
 * Fetches a job page over http(s), refusing private hosts (including public
 * names that resolve to private addresses) and following a bounded number of
 * redirects, then reduces the HTML to visible text.
 */
export class HttpJobScraper implements JobScraper {
  private readonly timeoutMs: number;
  private readonly lookupHost: HostLookup;

  constructor(options: HttpJobScraperOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? SCRAPE_TIMEOUT_MS;
    this.lookupHost = options.lookupHost ?? dnsLookup;
  }

  async fetchText(rawUrl: string): Promise<string> {
    let currentUrl: URL;
    try {
      currentUrl = new URL(rawUrl.trim());
    } catch {
      throw new ScrapeError('Invalid job URL. Please paste the job description text instead.', 'request');
    }

    for (let redirects = 0; redirects <= MAX_REDIRECTS; redirects += 1) {
      if (!['http:', 'https:'].includes(currentUrl.protocol)) {
        throw new ScrapeError('Only http/https job URLs are supported.', 'blocked');
      }
      await this.assertPublicHost(currentUrl.hostname);

      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

      try {
        const res = await fetch(currentUrl.toString(), {
          method: 'GET',
          headers: {
            'User-Agent': 'Mozilla/5.0 (compatible; ResumeTailor/1.0; +job-description-fetch)',
            'Accept': 'text/html, text/plain;q=0.9, */*;q=0.1',
            'Accept-Language': 'en-US,en;q=0.9',
          },
          redirect: 'manual',
          signal: controller.signal,
        });

        if ([301, 302, 303, 307, 308].includes(res.status)) {
          const location = res.headers.get('location');
          if (!location) {
            throw new ScrapeError('Job URL redirect did not include a location.', 'request');
          }
          try {
            currentUrl = new URL(location, currentUrl);
          } catch {
            throw new ScrapeError('Job URL redirect target is invalid.', 'request');
          }
          continue;
        }

        if (!res.ok) {
          throw new ScrapeError(`Failed to fetch job URL (${res.status}). Please paste the job description text instead.`, 'request');
        }

        const contentType = res.headers.get('content-type')?.toLowerCase() ?? '';
        if (contentType && !contentType.includes('text/html') && !contentType.includes('text/plain')) {
          throw new ScrapeError('Job URL did not return an HTML or text page.', 'content');
        }
        const body = await res.text();
        if (body.length > MAX_FETCH_BYTES) {
          throw new ScrapeError('Job URL content is too large. Please paste the job description text directly.', 'content');
        }
        const text = contentType.includes('text/plain') ? body.trim() : extractVisibleTextFromHtml(body);
        if (text.length < MIN_TEXT_CHARS) {
          throw new ScrapeError('Could not extract enough job description text from the URL. Please paste it directly.', 'content');
        }
        return text.slice(0, MAX_TEXT_CHARS);
      } catch (err) {
        if (err instanceof ScrapeError) throw err;
        if (controller.signal.aborted) {
          throw new ScrapeError('Fetching job URL timed out. Please paste the job description text directly.', 'timeout', { cause: err });
        }
        throw new ScrapeError(`Unable to fetch job URL: ${err instanceof Error ? err.message : String(err)}`, 'request', { cause: err });
      } finally {
        clearTimeout(timeout);
      }
    }

    throw new ScrapeError('Job URL redirected too many times. Please paste the job description text directly.', 'request');
  }

  private async assertPublicHost(rawHostname: string): Promise<void> {
    const hostname = bareHost(rawHostname);
    if (isPrivateHost(hostname)) {
      throw new ScrapeError('This URL host is not allowed. Please paste the job description text directly.', 'blocked');
    }
    if (isIP(hostname) !== 0) return;

    let addresses: string[];
    try {
      addresses = await this.lookupHost(hostname);
    } catch (err) {
      throw new ScrapeError('Unable to resolve job URL host.', 'request', { cause: err });
    }
    if (addresses.length === 0 || addresses.some((address) => isPrivateHost(address))) {
      throw new ScrapeError('This URL host is not allowed. Please paste the job description text directly.', 'blocked');
    }
  }
}
