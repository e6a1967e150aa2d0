/**
 * Prompts and JSON output templates for extraction and section tailoring.
 *
 * The templates are appended to the system prompt by the structured
 * completion adapter, so they show field names and nesting only; the zod
 * schemas remain the authority on what is accepted.
 */

// ─── Output templates ─────────────────────────────────────────────────

const RT = (sample: string) => `{ "segments": [{ "type": "text", "text": "${sample}" }] }`;
const RT_LINKED = (sample: string, url: string) =>
  `{ "segments": [{ "type": "text", "text": "${sample} " }, { "type": "link", "text": "demo", "url": "${url}" }] }`;
const LINK = (label: string, url: string) => `{ "type": "link", "text": "${label}", "url": "${url}" }`;

export const RICH_TEXT_EXAMPLE = RT_LINKED('Shipped the billing service', 'https://example.com/demo');

export const EXPERIENCE_EXAMPLE = `[
  {
    "role": ${RT('Backend Engineer')},
    "company": ${RT('Acme Corp')},
    "location": ${RT('Remote')},
    "date_description": ${RT('Jan 2021 - Present')},
    "description": [${RICH_TEXT_EXAMPLE}]
  }
]`;

export const EDUCATION_EXAMPLE = `[
  {
    "degree": ${RT('B.Sc. Computer Science')},
    "university": ${RT('State University')},
    "location": null,
    "grade": ${RT('GPA 3.8')},
    "date_description": ${RT('2016 - 2020')},
    "courses": [${RT('Distributed Systems')}]
  }
]`;

export const SKILL_SECTIONS_EXAMPLE = `[
  {
    "name": ${RT('Languages')},
    "skills": [${RT('TypeScript')}, ${RT('SQL')}]
  }
]`;

export const PROJECTS_EXAMPLE = `[
  {
    "name": ${RT('Rate limiter')},
    "type": ${RT('Open source')},
    "link": ${LINK('GitHub', 'https://example.com/repo')},
    "resources": [${LINK('Write-up', 'https://example.com/post')}],
    "date_description": ${RT('2023')},
    "description": [${RT('Built a token bucket limiter used by three services')}]
  }
]`;

export const CERTIFICATIONS_EXAMPLE = `[
  {
    "certificate_info": ${RT('Cloud Practitioner')},
    "date": ${RT('2022')}
  }
]`;

export const ACHIEVEMENTS_EXAMPLE = `[
  {
    "name": ${RT('Hackathon winner')},
    "issued_by": ${RT('City Tech Week')},
    "date": ${RT('2021')},
    "description": [${RT('Led a team of four to first place')}]
  }
]`;

export const RESEARCH_WORKS_EXAMPLE = `[
  {
    "title": ${RT('Caching strategies for edge workloads')},
    "publication": ${RT('Workshop proceedings')},
    "date_description": ${RT('2020')},
    "link": ${LINK('Paper', 'https://example.com/paper')},
    "description": [${RT('Measured hit ratios across four eviction policies')}]
  }
]`;

export const GENERIC_ELEMENTS_EXAMPLE = `[
  {
    "title": ${RT('Mentor')},
    "subtitle": ${RT('Code Club')},
    "date_description": ${RT('2019 - 2022')},
    "description": [${RT('Ran weekly sessions for twenty students')}]
  }
]`;

export const RESUME_DOCUMENT_EXAMPLE = `{
  "personal_info": {
    "name": ${RT('Jane Doe')},
    "location": ${RT('Springfield')},
    "phone": ${RT('+1 555 0100')},
    "email": ${RT('jane@example.com')},
    "media": { "portfolio": null, "linkedin": "https://example.com/in/jane", "github": null, "medium": null, "devpost": null }
  },
  "summary": ${RT('Backend engineer focused on payments')},
  "work_experience": ${EXPERIENCE_EXAMPLE},
  "education": ${EDUCATION_EXAMPLE},
  "skill_sections": ${SKILL_SECTIONS_EXAMPLE},
  "projects": ${PROJECTS_EXAMPLE},
  "certifications": ${CERTIFICATIONS_EXAMPLE},
  "achievements": ${ACHIEVEMENTS_EXAMPLE},
  "research_works": ${RESEARCH_WORKS_EXAMPLE},
  "custom_sections": [
    { "section_name": ${RT('Volunteering')}, "section_detail": ${GENERIC_ELEMENTS_EXAMPLE} }
  ],
  "keywords": ["payments", "TypeScript"]
}`;

export const JOB_EXTRACTION_EXAMPLE = `{
  "is_noise_only": false,
  "data": {
    "job_title": "Senior Backend Engineer",
    "company_name": "Acme Corp",
    "location": "Remote",
    "required_qualifications": ["5+ years building web services"],
    "preferred_qualifications": ["Experience with payments"],
    "job_duties_and_responsibilities": ["Own the billing API"],
    "keywords": ["TypeScript", "PostgreSQL"]
  }
}`;

export function sectionResultExample(dataExample: string): string {
  return `{
  "is_relevant": true,
  "data": ${dataExample}
}

When the section adds nothing for this job:
{ "is_relevant": false, "data": null }`;
}

// ─── Extraction ───────────────────────────────────────────────────────

export const RESUME_EXTRACTION_PROMPT = `You are a resume parser. You convert a resume, already converted to markdown text, into structured JSON.

## Rich Text

Every human-readable field is Rich Text: an object with an ordered "segments" array. A segment is either plain text ({ "type": "text", "text": ... }) or a hyperlink ({ "type": "link", "text": ..., "url": ... }).

- A markdown link [anchor](url) becomes one link segment with the anchor as "text" and the url copied character for character
- Surrounding words stay in text segments, in their original order
- Never invent a link that the resume does not contain

## How to Work

1. Identify the sections of the resume (contact details, summary, experience, education, skills, projects, certifications, achievements, research, anything else)
2. Extract each entry with its dates, titles, organizations and bullet points
3. Sections that do not fit a standard field go to "custom_sections", keeping their heading as "section_name"
4. Collect the candidate's most prominent skills and technologies into "keywords" as plain strings
5. Use null for a missing single value and [] for a missing list. Do not guess

## Rules

- Copy wording faithfully; fix nothing and embellish nothing
- Keep bullet points in their original order
- Keep date text as written (e.g. "Jan 2021 - Present")`;

export const JOB_EXTRACTION_PROMPT = `You analyze scraped or pasted text that is supposed to contain a job posting.

## Step 1: Noise Check

Decide whether the text actually describes a job. Set "is_noise_only" to true when it is only a login wall, an access-denied or bot-check page, a cookie banner, an error page, or otherwise carries no job information. In that case "data" must be null.

## Step 2: Extraction

When "is_noise_only" is false, fill "data":
- "job_title", "company_name", "location": as stated, or null
- "required_qualifications", "preferred_qualifications", "job_duties_and_responsibilities": short items, one requirement or duty each
- "keywords": the skills, tools and domain terms a resume should mention

Only record what the posting states or clearly implies. A missing list is []. Never invent details.`;

// ─── Section tailoring ────────────────────────────────────────────────

export const SECTION_TAILOR_PROMPT = `You are an expert resume writer tailoring ONE section of a candidate's resume to a specific job posting.

## Your Workflow

1. **Relevance**: Decide whether this section adds value for this job. Set "is_relevant" accordingly
2. **Tailor**: If relevant, rewrite the section's data to foreground what matches the job's requirements, duties and keywords. If not, set "data" to null
3. **Order**: Put the strongest matches first. Drop an entry only when it clearly does not belong on a resume for this job

## Non-Negotiable Rules

- **Truthfulness**: Use only facts present in the section content. Never invent employers, titles, dates, metrics, tools or credentials
- **Links**: Keep every link segment whose url appears in the section content, with the url copied exactly. Never create a link to a url that is not in the section content
- **Shape**: Return the section's data in exactly the same structure it was given
- **Style**: Active voice, concise, no filler, impeccable spelling and grammar`;

export const SECTION_GUIDANCE = {
  summary: `This is the Summary section. It is always relevant: "is_relevant" must be true.

- Draw on the WHOLE resume (experience, projects, skills, education, certifications, achievements, keywords), not only an existing summary
- Two to three sentences: the candidate's strongest match for this role, their top skill, and the measurable impact they bring
- No generic objectives such as "seeking a challenging role"`,

  work_experience: `This is the Work Experience section.

- Rewrite bullets around the job's duties and requirements; quantify impact where the content supports it
- Each bullet reads as "did X by doing Y, resulting in Z", with a strong action verb
- Keep role, company, location and dates unchanged`,

  education: `This is the Education section.

- Keep degrees, institutions, grades and dates unchanged
- List the courses that matter most for this job first; drop unrelated ones`,

  skill_sections: `This is the Skills section.

- Keep skill groups, ordering groups and skills by relevance to the job
- Only list skills already present in the content`,

  projects: `This is the Projects section.

- Rewrite bullets to emphasize the technologies and outcomes this job asks for
- Keep project names, links, resources and dates unchanged`,

  certifications: `This is the Certifications section.

- Keep certifications relevant to the job, most relevant first
- Do not alter certificate names or dates`,

  achievements: `This is the Achievements section.

- Keep achievements that demonstrate qualities the job asks for, most impressive first`,

  research_works: `This is the Research Work section.

- Emphasize methods and findings related to the job; keep titles, publications and links unchanged`,

  custom: `This is a custom section from the candidate's resume.

- Keep its entries' titles and dates unchanged and emphasize what relates to the job`,
} as const;
