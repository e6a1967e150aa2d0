/**
 * Closed registry of the standard resume sections that are tailored
 * independently. Each entry carries the section's data schema, prompt
 * guidance and output template, and knows how to slice its source content
 * out of a Resume Document. Custom sections share one definition.
 *
 * `personal_info` and `keywords` are never tailored.
 */

import { z } from 'zod';
import { RichTextSchema, type RichText } from './rich-text.js';
import {
  AchievementSchema,
  CertificationSchema,
  EducationSchema,
  ExperienceSchema,
  GenericElementSchema,
  ProjectSchema,
  ResearchWorkSchema,
  SkillSectionSchema,
  type Achievement,
  type Certification,
  type Education,
  type Experience,
  type GenericElement,
  type Project,
  type ResearchWork,
  type ResumeDocument,
  type SkillSection,
} from './schemas/resume-schemas.js';
import { sectionResultSchema, type SectionResult } from './schemas/section-schemas.js';
import type { ResponseShape } from '../lib/structured-completion.js';
import {
  ACHIEVEMENTS_EXAMPLE,
  CERTIFICATIONS_EXAMPLE,
  EDUCATION_EXAMPLE,
  EXPERIENCE_EXAMPLE,
  GENERIC_ELEMENTS_EXAMPLE,
  PROJECTS_EXAMPLE,
  RESEARCH_WORKS_EXAMPLE,
  RICH_TEXT_EXAMPLE,
  SECTION_GUIDANCE,
  SKILL_SECTIONS_EXAMPLE,
  sectionResultExample,
} from './prompts.js';

export interface SectionDataMap {
  summary: RichText;
  work_experience: Experience[];
  education: Education[];
  skill_sections: SkillSection[];
  projects: Project[];
  certifications: Certification[];
  achievements: Achievement[];
  research_works: ResearchWork[];
}

export type StandardSectionKind = keyof SectionDataMap;

/** Tailoring and output order. */
export const STANDARD_SECTION_KINDS = [
  'summary',
  'work_experience',
  'education',
  'skill_sections',
  'projects',
  'certifications',
  'achievements',
  'research_works',
] as const satisfies readonly StandardSectionKind[];

export interface SectionBrief<D> {
  title: string;
  guidance: string;
  dataSchema: z.ZodType<D, z.ZodTypeDef, unknown>;
  /** JSON template for `data`. */
  example: string;
  alwaysRelevant: boolean;
}

export interface StandardSectionDefinition<D> extends SectionBrief<D> {
  /**
   * Content sent to the model for this section, or null when the resume has
   * nothing to tailor. Link provenance is checked against the same value.
   */
  source(resume: ResumeDocument): unknown;
}

function nonEmpty<T>(items: T[]): T[] | null {
  return items.length > 0 ? items : null;
}

export const SECTION_REGISTRY: { [K in StandardSectionKind]: StandardSectionDefinition<SectionDataMap[K]> } = {
  summary: {
    title: 'Summary',
    guidance: SECTION_GUIDANCE.summary,
    dataSchema: RichTextSchema,
    example: RICH_TEXT_EXAMPLE,
    alwaysRelevant: true,
    // The summary is written from the whole resume, even when none exists yet.
    source: (resume) => resume,
  },
  work_experience: {
    title: 'Work Experience',
    guidance: SECTION_GUIDANCE.work_experience,
    dataSchema: z.array(ExperienceSchema),
    example: EXPERIENCE_EXAMPLE,
    alwaysRelevant: false,
    source: (resume) => nonEmpty(resume.work_experience),
  },
  education: {
    title: 'Education',
    guidance: SECTION_GUIDANCE.education,
    dataSchema: z.array(EducationSchema),
    example: EDUCATION_EXAMPLE,
    alwaysRelevant: false,
    source: (resume) => nonEmpty(resume.education),
  },
  skill_sections: {
    title: 'Skills',
    guidance: SECTION_GUIDANCE.skill_sections,
    dataSchema: z.array(SkillSectionSchema),
    example: SKILL_SECTIONS_EXAMPLE,
    alwaysRelevant: false,
    source: (resume) => nonEmpty(resume.skill_sections),
  },
  projects: {
    title: 'Projects',
    guidance: SECTION_GUIDANCE.projects,
    dataSchema: z.array(ProjectSchema),
    example: PROJECTS_EXAMPLE,
    alwaysRelevant: false,
    source: (resume) => nonEmpty(resume.projects),
  },
  certifications: {
    title: 'Certifications',
    guidance: SECTION_GUIDANCE.certifications,
    dataSchema: z.array(CertificationSchema),
    example: CERTIFICATIONS_EXAMPLE,
    alwaysRelevant: false,
    source: (resume) => nonEmpty(resume.certifications),
  },
  achievements: {
    title: 'Achievements',
    guidance: SECTION_GUIDANCE.achievements,
    dataSchema: z.array(AchievementSchema),
    example: ACHIEVEMENTS_EXAMPLE,
    alwaysRelevant: false,
    source: (resume) => nonEmpty(resume.achievements),
  },
  research_works: {
    title: 'Research Work',
    guidance: SECTION_GUIDANCE.research_works,
    dataSchema: z.array(ResearchWorkSchema),
    example: RESEARCH_WORKS_EXAMPLE,
    alwaysRelevant: false,
    source: (resume) => nonEmpty(resume.research_works),
  },
};

export const CUSTOM_SECTION_BRIEF: SectionBrief<GenericElement[]> = {
  title: 'Custom Section',
  guidance: SECTION_GUIDANCE.custom,
  dataSchema: z.array(GenericElementSchema),
  example: GENERIC_ELEMENTS_EXAMPLE,
  alwaysRelevant: false,
};

export function sectionResponseShape<D>(name: string, brief: SectionBrief<D>): ResponseShape<SectionResult<D>> {
  return {
    name,
    schema: sectionResultSchema(brief.dataSchema, { alwaysRelevant: brief.alwaysRelevant }),
    example: sectionResultExample(brief.example),
  };
}
