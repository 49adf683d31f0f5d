import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('scoring:term-tables');

const DEFAULT_TABLES_PATH = fileURLToPath(new URL('../../../config/term-tables.json', import.meta.url));

const WeightTable = z.record(z.string().min(1), z.number().positive());

const TermTablesSchema = z.object({
  highValueTerms: WeightTable,
  mediumValueTerms: WeightTable,
  problemIndicators: WeightTable,
  urgencyTerms: WeightTable,
  userTypeIndicators: z.object({
    parent: z.array(z.string().min(1)),
    teacher: z.array(z.string().min(1)),
    therapist: z.array(z.string().min(1)),
    administrator: z.array(z.string().min(1)),
  }),
  agePatterns: z.array(z.string().min(1)),
  competitorTerms: z.array(z.string().min(1)),
});

export type TermTablesInput = z.infer<typeof TermTablesSchema>;

/**
 * A phrase from a term table with its matcher compiled once.
 * Lower-case phrases are plain substring tests on the lower-cased text.
 * Phrases with an upper-case letter are acronyms ("IEP", "OT") and only
 * match as whole words, otherwise "ot" would hit "not" and "got".
 *
 * A verbatim substring test of "IEP" against lower-cased text never
 * matches, so those entries would contribute nothing. Here they do: a post
 * mentioning an IEP scores 2 higher, and "OT" or "SLP" count toward the
 * therapist user type.
 */
export interface Term {
  readonly phrase: string;
  readonly weight: number;
  matches(lowerText: string): boolean;
}

export interface TermTables {
  readonly highValue: readonly Term[];
  readonly mediumValue: readonly Term[];
  readonly problemIndicators: readonly Term[];
  readonly urgency: readonly Term[];
  readonly userTypeIndicators: Readonly<Record<'parent' | 'teacher' | 'therapist' | 'administrator', readonly Term[]>>;
  readonly agePatterns: readonly RegExp[];
  readonly competitors: readonly Term[];
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function compileTerm(phrase: string, weight = 1): Term {
  const lower = phrase.toLowerCase();
  if (lower === phrase) {
    return Object.freeze({ phrase, weight, matches: (text: string) => text.includes(lower) });
  }
  const pattern = new RegExp(`\\b${escapeRegExp(lower)}\\b`);
  return Object.freeze({ phrase, weight, matches: (text: string) => pattern.test(text) });
}

function compileWeighted(table: Record<string, number>): readonly Term[] {
  return Object.freeze(Object.entries(table).map(([phrase, weight]) => compileTerm(phrase, weight)));
}

function compileList(phrases: string[]): readonly Term[] {
  return Object.freeze(phrases.map((phrase) => compileTerm(phrase)));
}

export function compileTermTables(input: unknown): TermTables {
  const parsed = TermTablesSchema.parse(input);
  return Object.freeze({
    highValue: compileWeighted(parsed.highValueTerms),
    mediumValue: compileWeighted(parsed.mediumValueTerms),
    problemIndicators: compileWeighted(parsed.problemIndicators),
    urgency: compileWeighted(parsed.urgencyTerms),
    userTypeIndicators: Object.freeze({
      parent: compileList(parsed.userTypeIndicators.parent),
      teacher: compileList(parsed.userTypeIndicators.teacher),
      therapist: compileList(parsed.userTypeIndicators.therapist),
      administrator: compileList(parsed.userTypeIndicators.administrator),
    }),
    agePatterns: Object.freeze(parsed.agePatterns.map((p) => new RegExp(p))),
    competitors: compileList(parsed.competitorTerms),
  });
}

let cached: TermTables | null = null;

export function loadTermTables(path: string = DEFAULT_TABLES_PATH): TermTables {
  if (path === DEFAULT_TABLES_PATH && cached) return cached;

  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  const tables = compileTermTables(raw);
  logger.debug('Term tables loaded', {
    path,
    highValue: tables.highValue.length,
    mediumValue: tables.mediumValue.length,
    problemIndicators: tables.problemIndicators.length,
  });

  if (path === DEFAULT_TABLES_PATH) cached = tables;
  return tables;
}
