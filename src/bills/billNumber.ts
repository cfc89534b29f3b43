/**
 * Bill Number Normalization
 *
 * Tracker exports write bill numbers by hand, so the same bill can show up
 * as "S.B.0009", "SB 9" or "s.b. 9". LegiScan keys bills by a compact
 * letters+number form, which is what this module produces:
 *
 *   'S.350'                -> 'S350'
 *   'H.B.158'              -> 'HB158'
 *   'S.F.473'              -> 'SF473'
 *   'L.D. 1134 (S.P. 461)' -> 'LD1134'
 *   'H.B. 229'             -> 'HB229'
 *   'H.C.R.2042'           -> 'HCR2042'
 *   'S.B.0009'             -> 'SB9'
 */

// Maine: 'L.D. 1134 (S.P. 461)'. The parenthetical is the companion
// chamber's paper number and must not be merged into the key.
const LEGISLATIVE_DOCUMENT_PATTERN = /^L\.D\.?\s*(\d+)/;

const PARENTHETICAL_PATTERN = /\(.*?\)/g;

const PREFIX_AND_NUMBER_PATTERN = /^([A-Z]+)0*(\d+)/;

/**
 * Normalize a raw bill name to its canonical identifier.
 *
 * Returns null only for a missing value. Input that does not look like
 * a bill number is returned uppercased with periods, whitespace and
 * parentheticals removed.
 */
export function normalizeBillNumber(billName: string | null): string | null {
  if (billName === null) {
    return null;
  }

  const ldMatch = LEGISLATIVE_DOCUMENT_PATTERN.exec(billName);
  if (ldMatch) {
    return `LD${ldMatch[1].replace(/^0+(?=\d)/, '')}`;
  }

  let normalized = billName
    .toUpperCase()
    .replace(PARENTHETICAL_PATTERN, '')
    .replace(/\./g, '')
    .replace(/\s+/g, '');

  const match = PREFIX_AND_NUMBER_PATTERN.exec(normalized);
  if (match) {
    const [, prefix, number] = match;
    normalized = `${prefix}${number}`;
  }

  return normalized.trim();
}
