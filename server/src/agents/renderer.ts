/**
 * Rendering capability. The bundled renderer writes the tailored resume as
 * markdown (links kept as `[text](url)`) next to its JSON source.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import type { TailoredResume } from './assembler.js';
import { richTextToMarkdown, type LinkSegment, type RichText } from './rich-text.js';
import type { GenericElement, Media } from './schemas/resume-schemas.js';
import { SECTION_REGISTRY } from './section-registry.js';

export interface RenderedResume {
  artifact_path: string;
  source_path: string;
}

export interface ResumeRenderer {
  render(resume: TailoredResume, outputDir: string): Promise<RenderedResume>;
}

export const MARKDOWN_FILE_NAME = 'tailored_resume.md';
export const JSON_FILE_NAME = 'tailored_resume.json';

const SEPARATOR = ' · ';

function md(value: RichText | null | undefined): string {
  return richTextToMarkdown(value).trim();
}

function linkMd(value: LinkSegment | null | undefined): string {
  return value ? richTextToMarkdown({ segments: [value] }) : '';
}

function joinPresent(parts: string[], separator = SEPARATOR): string {
  return parts.filter((part) => part.length > 0).join(separator);
}

function bullets(items: RichText[]): string[] {
  return items.map((item) => `- ${md(item)}`).filter((line) => line !== '- ');
}

function entry(heading: string, meta: string, body: string[]): string[] {
  const lines = [`### ${heading}`];
  if (meta) lines.push(`*${meta}*`);
  if (body.length > 0) lines.push('', ...body);
  lines.push('');
  return lines;
}

const MEDIA_LABELS: Array<[keyof Media, string]> = [
  ['portfolio', 'Portfolio'],
  ['linkedin', 'LinkedIn'],
  ['github', 'GitHub'],
  ['medium', 'Medium'],
  ['devpost', 'Devpost'],
];

function headerLines(resume: TailoredResume): string[] {
  const info = resume.personal_info;
  const details: string[] = [];
  const contact = joinPresent([md(info.location), md(info.phone), md(info.email)]);
  if (contact) details.push(contact);
  const media = info.media;
  if (media) {
    const links = joinPresent(
      MEDIA_LABELS.map(([key, label]) => {
        const url = media[key];
        return url ? `[${label}](${url})` : '';
      }),
    );
    if (links) details.push(links);
  }
  return details.length > 0
    ? [`# ${md(info.name)}`, '', ...details, '']
    : [`# ${md(info.name)}`, ''];
}

function genericElementLines(element: GenericElement): string[] {
  return entry(
    joinPresent([md(element.title), md(element.subtitle)], ', '),
    md(element.date_description),
    bullets(element.description),
  );
}

/** Markdown rendering of a tailored resume, sections in registry order. */
export function renderResumeMarkdown(resume: TailoredResume): string {
  const lines = headerLines(resume);
  const section = (title: string, body: string[]) => {
    if (body.length > 0) lines.push(`## ${title}`, '', ...body);
  };

  if (resume.summary) section(SECTION_REGISTRY.summary.title, [md(resume.summary), '']);

  section(SECTION_REGISTRY.work_experience.title, (resume.work_experience ?? []).flatMap((item) => entry(
    joinPresent([md(item.role), md(item.company)], ', '),
    joinPresent([md(item.location), md(item.date_description)]),
    bullets(item.description),
  )));

  section(SECTION_REGISTRY.education.title, (resume.education ?? []).flatMap((item) => entry(
    joinPresent([md(item.degree), md(item.university)], ', '),
    joinPresent([md(item.location), md(item.grade), md(item.date_description)]),
    item.courses.length > 0 ? [`Courses: ${item.courses.map(md).join(', ')}`] : [],
  )));

  section(SECTION_REGISTRY.skill_sections.title, [
    ...(resume.skill_sections ?? []).map((item) => `- **${md(item.name)}**: ${item.skills.map(md).join(', ')}`),
    ...(resume.skill_sections?.length ? [''] : []),
  ]);

  section(SECTION_REGISTRY.projects.title, (resume.projects ?? []).flatMap((item) => entry(
    joinPresent([md(item.name), md(item.type)], ', '),
    joinPresent([linkMd(item.link), ...item.resources.map(linkMd), md(item.date_description)]),
    bullets(item.description),
  )));

  section(SECTION_REGISTRY.certifications.title, [
    ...(resume.certifications ?? []).map((item) =>
      `- ${joinPresent([md(item.certificate_info), md(item.date)])}`),
    ...(resume.certifications?.length ? [''] : []),
  ]);

  section(SECTION_REGISTRY.achievements.title, (resume.achievements ?? []).flatMap((item) => entry(
    md(item.name),
    joinPresent([md(item.issued_by), md(item.date)]),
    bullets(item.description),
  )));

  section(SECTION_REGISTRY.research_works.title, (resume.research_works ?? []).flatMap((item) => entry(
    md(item.title),
    joinPresent([md(item.publication), linkMd(item.link), md(item.date_description)]),
    bullets(item.description),
  )));

  for (const [name, elements] of Object.entries(resume.custom_sections)) {
    section(name, elements.flatMap(genericElementLines));
  }

  return `${lines.join('\n').trimEnd()}\n`;
}

export class MarkdownResumeRenderer implements ResumeRenderer {
  async render(resume: TailoredResume, outputDir: string): Promise<RenderedResume> {
    await fs.mkdir(outputDir, { recursive: true });
    const artifactPath = path.join(outputDir, MARKDOWN_FILE_NAME);
    const sourcePath = path.join(outputDir, JSON_FILE_NAME);
    await fs.writeFile(sourcePath, `${JSON.stringify(resume, null, 2)}\n`, 'utf8');
    await fs.writeFile(artifactPath, renderResumeMarkdown(resume), 'utf8');
    return { artifact_path: artifactPath, source_path: sourcePath };
  }
}
