const TURKISH_FOLD: Record<string, string> = {
  ç: 'c',
  Ç: 'c',
  ğ: 'g',
  Ğ: 'g',
  ı: 'i',
  I: 'i',
  İ: 'i',
  ö: 'o',
  Ö: 'o',
  ş: 's',
  Ş: 's',
  ü: 'u',
  Ü: 'u',
};

/**
 * Case- and diacritic-insensitive form of a label: Turkish letters folded to
 * ASCII, lower-cased, separators (`_ - / .`) and repeated whitespace collapsed
 * to single spaces. Used for header matching, aliases and refund markers.
 */
export function normalizeText(value: string): string {
  let folded = '';
  for (const char of value.replace(/^\uFEFF/, '')) {
    folded += TURKISH_FOLD[char] ?? char;
  }
  return folded
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[_\-/. ]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function containsNormalized(haystack: string, needle: string): boolean {
  const normalizedNeedle = normalizeText(needle);
  return normalizedNeedle.length > 0 && normalizeText(haystack).includes(normalizedNeedle);
}
