/**
 * Zod schemas for the structured job posting.
 *
 * The model first classifies whether the posting text is noise (an error
 * page, a login wall, a cookie banner). The envelope is normalized so that a
 * noise verdict never carries data and a real posting always does.
 */

import { z } from 'zod';
import { listOf } from './resume-schemas.js';

export const JobDocumentSchema = z.object({
  job_title: z.string().nullish(),
  company_name: z.string().nullish(),
  location: z.string().nullish(),
  required_qualifications: listOf(z.string()),
  preferred_qualifications: listOf(z.string()),
  job_duties_and_responsibilities: listOf(z.string()),
  keywords: listOf(z.string()),
});

export type JobDocument = z.infer<typeof JobDocumentSchema>;

export type JobExtraction =
  | { is_noise_only: true; data: null }
  | { is_noise_only: false; data: JobDocument };

export const JobExtractionSchema = z
  .object({
    is_noise_only: z.boolean(),
    data: JobDocumentSchema.nullish(),
  })
  .transform((value, ctx): JobExtraction => {
    if (value.is_noise_only) return { is_noise_only: true, data: null };
    if (!value.data) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'data is required when is_noise_only is false',
        path: ['data'],
      });
      return z.NEVER;
    }
    return { is_noise_only: false, data: value.data };
  });
