import { USER_TYPES, type UserType } from './types.js';

const USER_TYPE_SYNONYMS: Readonly<Record<string, UserType>> = {
  educator: 'teacher',
  admin: 'administrator',
  principal: 'administrator',
  slp: 'therapist',
  ot: 'therapist',
  speech: 'therapist',
  occupational: 'therapist',
  'speech therapist': 'therapist',
  'speech-language pathologist': 'therapist',
  'occupational therapist': 'therapist',
  mom: 'parent',
  dad: 'parent',
  guardian: 'parent',
  caregiver: 'parent',
};

function isUserType(value: string): value is UserType {
  return USER_TYPES.some((type) => type === value);
}

function singularize(word: string): string {
  if (word.length > 3 && word.endsWith('ies')) return `${word.slice(0, -3)}y`;
  if (word.length > 2 && word.endsWith('s') && !word.endsWith('ss')) return word.slice(0, -1);
  return word;
}

/**
 * Map free text ("Teachers", "SLP", "principal") onto a user type.
 * Anything unrecognised becomes `other`.
 */
export function normalizeUserType(raw: string | null | undefined): UserType {
  if (!raw) return 'other';
  const cleaned = raw.trim().toLowerCase().replace(/[^a-z\s-]/g, ' ').replace(/\s+/g, ' ').trim();
  if (!cleaned) return 'other';

  const singular = cleaned.split(' ').map(singularize).join(' ');
  for (const candidate of [cleaned, singular]) {
    const synonym = USER_TYPE_SYNONYMS[candidate];
    if (synonym) return synonym;
    if (isUserType(candidate)) return candidate;
  }

  // "parent of a 4 year old", "special ed teacher": take the first word that resolves
  for (const word of singular.split(' ')) {
    const synonym = USER_TYPE_SYNONYMS[word];
    if (synonym) return synonym;
    if (isUserType(word) && word !== 'other') return word;
  }
  return 'other';
}
