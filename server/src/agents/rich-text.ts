/**
 * Rich Text: an ordered list of plain and linked segments. Link targets must
 * survive every stage untouched, so every consumer below switches on the
 * segment tag exhaustively.
 */

import { z } from 'zod';

export const TextSegmentSchema = z.object({
  type: z.literal('text'),
  text: z.string(),
});

export const LinkSegmentSchema = z.object({
  type: z.literal('link'),
  text: z.string(),
  url: z.string().min(1),
});

export const SegmentSchema = z.discriminatedUnion('type', [TextSegmentSchema, LinkSegmentSchema]);

// Models occasionally collapse a rich text value to a bare string or a bare
// segment list; both are accepted and normalized.
export const RichTextSchema = z.preprocess(
  (value) => {
    if (typeof value === 'string') return { segments: [{ type: 'text', text: value }] };
    if (Array.isArray(value)) return { segments: value };
    return value;
  },
  z.object({ segments: z.array(SegmentSchema) }),
);

export type TextSegment = z.infer<typeof TextSegmentSchema>;
export type LinkSegment = z.infer<typeof LinkSegmentSchema>;
export type Segment = z.infer<typeof SegmentSchema>;
export type RichText = z.infer<typeof RichTextSchema>;

export function text(value: string): TextSegment {
  return { type: 'text', text: value };
}

export function link(value: string, url: string): LinkSegment {
  return { type: 'link', text: value, url };
}

export function richText(...segments: Array<Segment | string>): RichText {
  return {
    segments: segments.map((segment) => (typeof segment === 'string' ? text(segment) : segment)),
  };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled rich text segment: ${JSON.stringify(value)}`);
}

export function plainText(value: RichText | null | undefined): string {
  if (!value) return '';
  return value.segments
    .map((segment) => {
      switch (segment.type) {
        case 'text':
          return segment.text;
        case 'link':
          return segment.text;
        default:
          return assertNever(segment);
      }
    })
    .join('');
}

function escapeMarkdown(value: string): string {
  return value.replace(/([\\`*_[\]])/g, '\\$1');
}

export function richTextToMarkdown(value: RichText | null | undefined): string {
  if (!value) return '';
  return value.segments
    .map((segment) => {
      switch (segment.type) {
        case 'text':
          return escapeMarkdown(segment.text);
        case 'link':
          return `[${escapeMarkdown(segment.text || segment.url)}](${segment.url.replace(/\)/g, '%29')})`;
        default:
          return assertNever(segment);
      }
    })
    .join('');
}

// ─── Link provenance ─────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asLinkSegment(value: unknown): LinkSegment | null {
  const parsed = LinkSegmentSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

/**
 * Every link URL found anywhere inside a structured value, whether inside a
 * rich text or as a standalone link field.
 */
export function collectLinkUrls(value: unknown, into: Set<string> = new Set()): Set<string> {
  if (Array.isArray(value)) {
    for (const item of value) collectLinkUrls(item, into);
    return into;
  }
  if (!isRecord(value)) return into;

  const asLink = asLinkSegment(value);
  if (asLink) {
    into.add(asLink.url);
    return into;
  }
  for (const child of Object.values(value)) collectLinkUrls(child, into);
  return into;
}

function restrictSegment(segment: unknown, allowed: ReadonlySet<string>): unknown {
  const asLink = asLinkSegment(segment);
  if (asLink && !allowed.has(asLink.url)) return text(asLink.text);
  return segment;
}

/**
 * Copy of `value` in which no link points outside `allowed`. Inside a rich
 * text an unknown link is demoted to plain text (its wording is kept);
 * a standalone link field becomes null and a link list drops the entry.
 * Links whose URL is allowed are returned unchanged.
 */
export function restrictLinks(value: unknown, allowed: ReadonlySet<string>): unknown {
  if (Array.isArray(value)) {
    return value
      .filter((item) => {
        const asLink = asLinkSegment(item);
        return !asLink || allowed.has(asLink.url);
      })
      .map((item) => restrictLinks(item, allowed));
  }
  if (!isRecord(value)) return value;

  const asLink = asLinkSegment(value);
  if (asLink) return allowed.has(asLink.url) ? value : null;

  const out: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value)) {
    out[key] = key === 'segments' && Array.isArray(child)
      ? child.map((segment) => restrictSegment(segment, allowed))
      : restrictLinks(child, allowed);
  }
  return out;
}
