/**
 * Upper-cases the first letter of every word and lower-cases the rest. A word
 * starts after any character that is not a letter, so "o'connor" becomes
 * "O'Connor" and "st. ives" becomes "St. Ives". No other normalisation is
 * applied because suburb names are matched exactly against reference data.
 */
export const toTitleCase = (value: string): string =>
  value
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_, boundary: string, letter: string) =>
      `${boundary}${letter.toUpperCase()}`
    );

export const normalizeSuburb = (value: string): string => toTitleCase(value.trim());

/** Postcodes are opaque keys: no padding and no format checks. */
export const normalizePostcode = (value: string): string => value.trim();

export const toOptionalText = (value: string | null | undefined): string | null => {
  if (value === null || value === undefined) {
    return null;
  }

  const trimmed = value.trim();
  return trimmed ? trimmed : null;
};
