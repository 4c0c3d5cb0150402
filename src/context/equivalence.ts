import { nameTokens, namesEqual, namesMatch } from '../types/knowledge.js';

/**
 * Decides whether a newly asserted attribute value agrees with the recorded one.
 * `attribute` is the normalized attribute key when known.
 */
export type EquivalenceRule = (recorded: string, proposed: string, attribute?: string) => boolean;

const LEADING_ARTICLE = /^(the|a|an)\s+/;

export function normalizeValue(value: string): string {
  return nameTokens(value).join(' ').replace(LEADING_ARTICLE, '');
}

/** Case, whitespace, punctuation and a leading article are ignored. */
export const normalizedTextRule: EquivalenceRule = (recorded, proposed) =>
  normalizeValue(recorded) === normalizeValue(proposed);

function looksLikeProperName(value: string): boolean {
  const words = value.trim().split(/\s+/).filter(Boolean);
  return words.length > 0 && words.every((word) => /^[\p{Lu}\p{Lt}]/u.test(word));
}

// Attribute words whose values name a person
const PERSON_ATTRIBUTE_WORDS = new Set([
  'name', 'mentor', 'father', 'mother', 'parent', 'spouse', 'wife', 'husband', 'partner',
  'sibling', 'brother', 'sister', 'friend', 'rival', 'enemy', 'employer', 'boss', 'master',
  'owner', 'lover', 'ally', 'child', 'son', 'daughter',
]);

function namesPerson(attribute: string): boolean {
  return attribute
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .toLowerCase()
    .split(/[^a-z]+/)
    .some((word) => PERSON_ATTRIBUTE_WORDS.has(word));
}

/**
 * "Dr. Smith" and "Smith" agree for any attribute. A shortened name ("Alice"
 * for "Alice Moreau") only agrees where the attribute names a person, so
 * "York" never matches "New York". Differing honorifics never agree.
 */
export const nameAliasRule: EquivalenceRule = (recorded, proposed, attribute) => {
  if (!looksLikeProperName(recorded) || !looksLikeProperName(proposed)) return false;
  if (namesEqual(recorded, proposed)) return true;
  return attribute !== undefined && namesPerson(attribute) && namesMatch(recorded, proposed);
};

export const DEFAULT_EQUIVALENCE_RULES: readonly EquivalenceRule[] = [normalizedTextRule, nameAliasRule];

export function valuesEquivalent(
  recorded: string,
  proposed: string,
  rules: readonly EquivalenceRule[] = DEFAULT_EQUIVALENCE_RULES,
  attribute?: string
): boolean {
  return rules.some((rule) => rule(recorded, proposed, attribute));
}
