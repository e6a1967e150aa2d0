/**
 * Zod schemas for the structured resume produced by extraction.
 *
 * Optional scalar fields accept null or absence; list fields accept null or
 * absence and normalize to an empty list, so downstream code only ever sees
 * arrays.
 */

import { z } from 'zod';
import { LinkSegmentSchema, RichTextSchema } from '../rich-text.js';

export function listOf<T extends z.ZodTypeAny>(item: T) {
  return z.preprocess((value) => value ?? [], z.array(item));
}

const OptionalRichText = RichTextSchema.nullish();

// ─── personal_info ────────────────────────────────────────────────────

export const MediaSchema = z.object({
  portfolio: z.string().nullish(),
  linkedin: z.string().nullish(),
  github: z.string().nullish(),
  medium: z.string().nullish(),
  devpost: z.string().nullish(),
});

export const PersonalInfoSchema = z.object({
  name: RichTextSchema,
  location: OptionalRichText,
  phone: OptionalRichText,
  email: OptionalRichText,
  media: MediaSchema.nullish(),
});

export type Media = z.infer<typeof MediaSchema>;
export type PersonalInfo = z.infer<typeof PersonalInfoSchema>;

// ─── section entries ──────────────────────────────────────────────────

export const ExperienceSchema = z.object({
  role: RichTextSchema,
  company: RichTextSchema,
  location: OptionalRichText,
  date_description: OptionalRichText,
  description: listOf(RichTextSchema),
});

export const EducationSchema = z.object({
  degree: RichTextSchema,
  university: RichTextSchema,
  location: OptionalRichText,
  grade: OptionalRichText,
  date_description: OptionalRichText,
  courses: listOf(RichTextSchema),
});

export const ProjectSchema = z.object({
  name: RichTextSchema,
  type: OptionalRichText,
  link: LinkSegmentSchema.nullish(),
  resources: listOf(LinkSegmentSchema),
  date_description: OptionalRichText,
  description: listOf(RichTextSchema),
});

export const SkillSectionSchema = z.object({
  name: RichTextSchema,
  skills: listOf(RichTextSchema),
});

export const CertificationSchema = z.object({
  certificate_info: RichTextSchema,
  date: OptionalRichText,
});

export const AchievementSchema = z.object({
  name: RichTextSchema,
  issued_by: OptionalRichText,
  date: OptionalRichText,
  description: listOf(RichTextSchema),
});

export const ResearchWorkSchema = z.object({
  title: RichTextSchema,
  publication: OptionalRichText,
  date_description: OptionalRichText,
  link: LinkSegmentSchema.nullish(),
  description: listOf(RichTextSchema),
});

export const GenericElementSchema = z.object({
  title: RichTextSchema,
  subtitle: OptionalRichText,
  date_description: OptionalRichText,
  description: listOf(RichTextSchema),
});

export const GenericSectionSchema = z.object({
  section_name: RichTextSchema,
  section_detail: listOf(GenericElementSchema),
});

export type Experience = z.infer<typeof ExperienceSchema>;
export type Education = z.infer<typeof EducationSchema>;
export type Project = z.infer<typeof ProjectSchema>;
export type SkillSection = z.infer<typeof SkillSectionSchema>;
export type Certification = z.infer<typeof CertificationSchema>;
export type Achievement = z.infer<typeof AchievementSchema>;
export type ResearchWork = z.infer<typeof ResearchWorkSchema>;
export type GenericElement = z.infer<typeof GenericElementSchema>;
export type GenericSection = z.infer<typeof GenericSectionSchema>;

// ─── whole document ───────────────────────────────────────────────────

export const ResumeDocumentSchema = z.object({
  personal_info: PersonalInfoSchema,
  summary: OptionalRichText,
  work_experience: listOf(ExperienceSchema),
  education: listOf(EducationSchema),
  skill_sections: listOf(SkillSectionSchema),
  projects: listOf(ProjectSchema),
  certifications: listOf(CertificationSchema),
  achievements: listOf(AchievementSchema),
  research_works: listOf(ResearchWorkSchema),
  custom_sections: listOf(GenericSectionSchema),
  keywords: listOf(z.string()),
});

export type ResumeDocument = z.infer<typeof ResumeDocumentSchema>;

/** URLs listed under personal_info.media. */
export function mediaUrls(info: PersonalInfo): string[] {
  const media = info.media;
  if (!media) return [];
  return [media.portfolio, media.linkedin, media.github, media.medium, media.devpost]
    .filter((url): url is string => typeof url === 'string' && url.length > 0);
}
