/**
 * Removes every leading and trailing occurrence of `glyph`.
 */
export function trimGlyph(input: string, glyph: string): string {
  let start = 0;
  let end = input.length;
  while (start < end && input.startsWith(glyph, start)) start += glyph.length;
  while (end - glyph.length >= start && input.endsWith(glyph, end)) end -= glyph.length;
  return input.slice(start, end);
}

/**
 * Normalization for text input.
 * - Uppercases letters (scripts without case are left as they are)
 * - Replaces each whitespace run with the separator
 * - Trims separators at both ends
 */
export function normalizeText(input: string, separator: string): string {
  const s = input.toUpperCase().replace(/\s+/g, () => separator);
  return trimGlyph(s, separator);
}

/**
 * Splits normalized text into encode units: each code point, with the
 * separator kept whole as a unit of its own.
 */
export function splitUnits(text: string, separator: string): string[] {
  if (!text) return [];
  return text.split(separator).flatMap((word, i) => (i === 0 ? [...word] : [separator, ...word]));
}

/**
 * Normalizes morse input and splits it into per-character units.
 * - Replaces each whitespace run with the separator
 * - Trims separators at both ends
 * - Drops the empty units repeated separators leave behind
 */
export function splitMorse(input: string, separator: string): string[] {
  const s = trimGlyph(input.replace(/\s+/g, () => separator), separator);
  if (!s) return [];
  return s.split(separator).filter((unit) => unit.length > 0);
}
