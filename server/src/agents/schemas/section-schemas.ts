/**
 * Section Result envelope returned by every section tailoring call.
 *
 * `{ is_relevant: true, data }` replaces the section with `data`;
 * `{ is_relevant: false }` drops it. Data supplied alongside an irrelevant
 * verdict is discarded.
 */

import { z } from 'zod';

export type SectionResult<T> =
  | { is_relevant: true; data: T }
  | { is_relevant: false; data: null };

export interface SectionResultOptions {
  /** Reject `is_relevant: false` (the section must always be produced). */
  alwaysRelevant?: boolean;
}

const SectionEnvelopeSchema = z.object({
  is_relevant: z.boolean(),
  data: z.unknown(),
});

export function sectionResultSchema<T>(
  dataSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: SectionResultOptions = {},
): z.ZodType<SectionResult<T>, z.ZodTypeDef, unknown> {
  return SectionEnvelopeSchema.transform((envelope, ctx): SectionResult<T> => {
    if (!envelope.is_relevant) {
      if (options.alwaysRelevant) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'this section is always relevant; is_relevant must be true',
          path: ['is_relevant'],
        });
        return z.NEVER;
      }
      return { is_relevant: false, data: null };
    }

    if (envelope.data === undefined || envelope.data === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'data is required when is_relevant is true',
        path: ['data'],
      });
      return z.NEVER;
    }

    const parsed = dataSchema.safeParse(envelope.data);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: issue.message,
          path: ['data', ...issue.path],
        });
      }
      return z.NEVER;
    }
    return { is_relevant: true, data: parsed.data };
  });
}
