import { describe, it, expect } from 'vitest';
import { isSameBuilding, normalizeAddress, splitAddress } from '../services/address-match.ts';

describe('normalizeAddress', () => {
  it('lowercases, trims and strips street prefixes', () => {
    expect(normalizeAddress('  רחוב   הרצל 10 ')).toBe('הרצל 10');
    expect(normalizeAddress("שד' רוטשילד 5")).toBe('רוטשילד 5');
    expect(normalizeAddress('Herzl St 10')).toBe('herzl st 10');
  });
});

describe('splitAddress', () => {
  it('takes the first token with a digit as the house number', () => {
    expect(splitAddress('הרצל 10 חולון')).toEqual({ street: 'הרצל חולון', number: '10' });
  });

  it('returns no number for a single token', () => {
    expect(splitAddress('הרצל')).toEqual({ street: 'הרצל', number: '' });
  });
});

describe('isSameBuilding', () => {
  it('matches equal addresses after normalization', () => {
    expect(isSameBuilding('רחוב הרצל 10', 'הרצל 10')).toBe(true);
  });

  it('matches street and number in a different order', () => {
    expect(isSameBuilding('10 הרצל', 'הרצל 10')).toBe(true);
  });

  it('matches when one address contains the other', () => {
    expect(isSameBuilding('דיזנגוף 50א תל אביב', 'דיזנגוף 50א')).toBe(true);
  });

  it('does not match a different house number', () => {
    expect(isSameBuilding('דיזנגוף 50א', 'דיזנגוף 50ב')).toBe(false);
    expect(isSameBuilding('הרצל 10', 'הרצל 3')).toBe(false);
  });

  it('does not match empty addresses', () => {
    expect(isSameBuilding('הרצל 10', '   ')).toBe(false);
  });
});
