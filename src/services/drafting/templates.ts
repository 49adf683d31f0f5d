import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { createLogger } from '../../utils/logger.js';
import type { UserType } from '../scoring/types.js';

const logger = createLogger('drafting:templates');

const DEFAULT_TEMPLATES_PATH = fileURLToPath(new URL('../../../config/response-templates.json', import.meta.url));

const TemplateSchema = z.object({
  id: z.string().min(1),
  triggers: z.array(z.string()),
  paragraphs: z.array(z.string()).min(1),
});

const TemplateLibrarySchema = z
  .object({
    topicKeywords: z.array(z.string().min(1)),
    templates: z.object({
      parent: z.array(TemplateSchema).min(1),
      teacher: z.array(TemplateSchema).min(1),
      therapist: z.array(TemplateSchema).min(1),
    }),
    resources: z.record(z.string()),
    resourcesByKeyword: z.record(z.array(z.string())),
    defaultResources: z.array(z.string()).length(2),
    features: z.record(z.string()),
    featuresByKeyword: z.record(z.string()),
    defaultFeature: z.string(),
  })
  .superRefine((lib, ctx) => {
    const resourceIds = [...lib.defaultResources, ...Object.values(lib.resourcesByKeyword).flat()];
    for (const id of resourceIds) {
      if (!(id in lib.resources)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown resource id: ${id}` });
      }
    }
    for (const id of [lib.defaultFeature, ...Object.values(lib.featuresByKeyword)]) {
      if (!(id in lib.features)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown feature id: ${id}` });
      }
    }
  });

export type ResponseTemplate = z.infer<typeof TemplateSchema>;
export type TemplateLibrary = z.infer<typeof TemplateLibrarySchema>;
export type TemplatedUserType = keyof TemplateLibrary['templates'];

let cached: TemplateLibrary | null = null;

export function parseTemplateLibrary(input: unknown): TemplateLibrary {
  return TemplateLibrarySchema.parse(input);
}

export function loadTemplateLibrary(path: string = DEFAULT_TEMPLATES_PATH): TemplateLibrary {
  if (path === DEFAULT_TEMPLATES_PATH && cached) return cached;

  const library = parseTemplateLibrary(JSON.parse(readFileSync(path, 'utf-8')));
  logger.debug('Response templates loaded', { path });

  if (path === DEFAULT_TEMPLATES_PATH) cached = library;
  return library;
}

export function isTemplatedUserType(userType: UserType): userType is TemplatedUserType {
  return userType === 'parent' || userType === 'teacher' || userType === 'therapist';
}

// ---------------------------------------------------------------------------
// Selection
// ---------------------------------------------------------------------------

/** Topic keywords present in the text, in library order. */
export function extractTopicKeywords(library: TemplateLibrary, text: string): string[] {
  const lower = text.toLowerCase();
  return library.topicKeywords.filter((keyword) => lower.includes(keyword));
}

/** First template whose triggers overlap the keywords, else the user type's first template. */
export function selectTemplate(
  library: TemplateLibrary,
  userType: TemplatedUserType,
  keywords: readonly string[],
): ResponseTemplate {
  const candidates = library.templates[userType];
  const matched = candidates.find((template) => template.triggers.some((t) => keywords.includes(t)));
  return matched ?? candidates[0];
}

export function selectResources(library: TemplateLibrary, keywords: readonly string[]): [string, string] {
  const ids: string[] = [];
  for (const keyword of keywords) {
    for (const id of library.resourcesByKeyword[keyword] ?? []) {
      if (!ids.includes(id)) ids.push(id);
    }
  }
  for (const id of library.defaultResources) {
    if (ids.length >= 2) break;
    if (!ids.includes(id)) ids.push(id);
  }
  return [library.resources[ids[0]], library.resources[ids[1]]];
}

export function selectFeature(library: TemplateLibrary, keywords: readonly string[]): string {
  const hit = keywords.find((keyword) => keyword in library.featuresByKeyword);
  const id = hit ? library.featuresByKeyword[hit] : library.defaultFeature;
  return library.features[id];
}

export function childPronoun(text: string): string {
  const lower = text.toLowerCase();
  if (/\b(he|him|his)\b/.test(lower)) return 'him';
  if (/\b(she|her|hers)\b/.test(lower)) return 'her';
  return 'them';
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

/** Fills `{name}` placeholders. Returns null if the template names a variable that wasn't supplied. */
export function fillTemplate(template: ResponseTemplate, vars: Record<string, string>): string | null {
  const missing: string[] = [];
  const body = template.paragraphs.join('\n\n').replace(/\{(\w+)\}/g, (whole, name: string) => {
    const value = vars[name];
    if (value === undefined) {
      missing.push(name);
      return whole;
    }
    return value;
  });

  if (missing.length > 0) {
    logger.warn('Template references unknown placeholders', { template: template.id, missing });
    return null;
  }
  return body.trim();
}
