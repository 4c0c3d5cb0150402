import { describe, expect, it } from 'vitest';
import { nameAliasRule, valuesEquivalent } from './equivalence.js';

describe('valuesEquivalent', () => {
  it('ignores case, punctuation and a leading article', () => {
    expect(valuesEquivalent('The Blue', 'blue')).toBe(true);
    expect(valuesEquivalent('grey-green.', 'Grey-green')).toBe(true);
  });

  it('drops honorifics when comparing names', () => {
    expect(valuesEquivalent('Dr. Smith', 'Smith', undefined, 'mentor')).toBe(true);
    expect(valuesEquivalent('Doctor Smith', 'Dr. Smith', undefined, 'hometown')).toBe(true);
  });

  it('accepts a shortened name only for attributes that name a person', () => {
    expect(valuesEquivalent('Alice Moreau', 'Alice', undefined, 'mentor')).toBe(true);
    expect(valuesEquivalent('Alice Moreau', 'Alice', undefined, 'motherName')).toBe(true);
    expect(valuesEquivalent('New York', 'York', undefined, 'hometown')).toBe(false);
    expect(valuesEquivalent('New York', 'York')).toBe(false);
  });

  it('keeps values that differ by a word apart', () => {
    expect(valuesEquivalent('Blue', 'Dark Blue', undefined, 'eyeColor')).toBe(false);
    expect(valuesEquivalent('Blue', 'Dark Blue')).toBe(false);
  });

  it('keeps names with different honorifics apart', () => {
    expect(valuesEquivalent('Lord Byron', 'Lady Byron', undefined, 'spouse')).toBe(false);
    expect(nameAliasRule('Lord Byron', 'Lady Byron')).toBe(false);
  });
});
