import type { GenericElement, PersonalInfo } from './schemas/resume-schemas.js';
import type { SectionResult } from './schemas/section-schemas.js';
import { STANDARD_SECTION_KINDS, type SectionDataMap, type StandardSectionKind } from './section-registry.js';

/** One optional result slot per standard section; absent means never tailored. */
export type StandardSectionResults = {
  [K in StandardSectionKind]?: SectionResult<SectionDataMap[K]>;
};

export interface CustomSectionResult {
  name: string;
  result: SectionResult<GenericElement[]>;
}

export type TailoredSections = Partial<SectionDataMap>;

export interface TailoredResume extends TailoredSections {
  personal_info: PersonalInfo;
  custom_sections: Record<string, GenericElement[]>;
}

function copyRelevant<K extends StandardSectionKind>(
  kind: K,
  results: StandardSectionResults,
  into: TailoredSections,
): void {
  const result: SectionResult<SectionDataMap[K]> | undefined = results[kind];
  if (result?.is_relevant) into[kind] = result.data;
}

/**
 * Builds the tailored document: personal info verbatim, then every relevant
 * standard section under its own key in registry order, then relevant custom
 * sections in the order given. Irrelevant and failed sections are absent.
 */
export function assembleTailoredResume(
  personalInfo: PersonalInfo,
  sectionResults: StandardSectionResults,
  customSectionResults: readonly CustomSectionResult[],
): TailoredResume {
  const sections: TailoredSections = {};
  for (const kind of STANDARD_SECTION_KINDS) {
    copyRelevant(kind, sectionResults, sections);
  }

  // fromEntries defines own properties, so a section named "__proto__" survives.
  const custom: Record<string, GenericElement[]> = Object.fromEntries(
    customSectionResults.flatMap(({ name, result }) => (result.is_relevant ? [[name, result.data] as const] : [])),
  );

  return { personal_info: personalInfo, ...sections, custom_sections: custom };
}
