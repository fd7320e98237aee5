/**
 * address-match.ts — Same-building heuristic
 *
 * Decides whether a street-level deal sits in the building that was searched for.
 * Matching is pluggable: the aggregator takes any AddressMatcher, this module
 * supplies the default token heuristic.
 */

export type AddressMatcher = (searchAddress: string, candidateAddress: string) => boolean;

// Street-type prefixes dropped before comparison (street, boulevard and their abbreviations)
const PREFIX_TOKENS = new Set(["רח'", 'רחוב', "שד'", 'שדרות']);

/** Lowercase, trim, drop street-type prefix tokens, collapse whitespace */
export function normalizeAddress(address: string): string {
  return address
    .toLowerCase()
    .split(/\s+/)
    .filter(token => token && !PREFIX_TOKENS.has(token))
    .join(' ');
}

interface AddressParts {
  street: string;
  number: string;
}

/**
 * Split a normalized address into street name and house number.
 * The number is the first token containing a digit; every other token is the street.
 */
export function splitAddress(normalized: string): AddressParts {
  const tokens = normalized.split(' ').filter(Boolean);
  if (tokens.length < 2) return { street: normalized, number: '' };
  const idx = tokens.findIndex(t => /\d/.test(t));
  if (idx === -1) return { street: normalized, number: '' };
  return {
    street: tokens.filter((_, i) => i !== idx).join(' '),
    number: tokens[idx],
  };
}

export const isSameBuilding: AddressMatcher = (searchAddress, candidateAddress) => {
  const a = normalizeAddress(searchAddress);
  const b = normalizeAddress(candidateAddress);
  if (!a || !b) return false;
  if (a === b) return true;

  const pa = splitAddress(a);
  const pb = splitAddress(b);
  if (pa.street && pb.street && pa.number && pb.number && pa.street === pb.street && pa.number === pb.number) {
    return true;
  }

  return a.length > 5 && b.length > 5 && (a.includes(b) || b.includes(a));
};
