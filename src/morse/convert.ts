import type { CharacterSet } from './charsets';
import { normalizeText, splitMorse, splitUnits } from './normalize';
import { resolveOptions, type MorseOptions, type ResolvedOptions } from './options';
import { buildTables, reverseIndexFor, type MergedTableSet } from './tables';

/**
 * Converts Text to Morse.
 * - Letters are separated by the separator glyph (default ' ')
 * - Whitespace between words becomes the space glyph (default '/')
 * - Unknown characters go through the invalid policy (default: echoed)
 */
export function encode(text: string, options: MorseOptions | ResolvedOptions = {}): string {
  const o = resolveOptions(options);
  const tables = buildTables(o);
  const units = splitUnits(normalizeText(text, o.separator), o.separator);

  const symbols: string[] = [];
  for (const unit of units) {
    symbols.push(lookup(tables, unit) ?? o.invalid(unit));
  }
  return symbols.join(o.separator);
}

/**
 * Converts Morse to Text.
 * - Whitespace runs count as one separator
 * - The space glyph decodes to the separator it stood in for
 * - Each pattern resolves to the first set in lookup order that uses it
 * - Unknown sequences go through the invalid policy (default: passed through)
 */
export function decode(morse: string, options: MorseOptions | ResolvedOptions = {}): string {
  const o = resolveOptions(options);
  const index = reverseIndexFor(buildTables(o));

  const letters: string[] = [];
  for (const code of splitMorse(morse, o.separator)) {
    letters.push(index.get(code) ?? o.invalid(code));
  }
  return letters.join('');
}

/**
 * The set a character resolves to when encoding, or undefined when no table
 * has it. `Undefined` means the priority overlay answered.
 */
export function characterSetOf(character: string, options: MorseOptions | ResolvedOptions = {}): CharacterSet | undefined {
  const o = resolveOptions(options);
  const unit = normalizeText(character, o.separator);
  for (const [set, table] of buildTables(o)) {
    if (table.has(unit)) return set;
  }
  return undefined;
}

function lookup(tables: MergedTableSet, unit: string): string | undefined {
  for (const table of tables.values()) {
    const pattern = table.get(unit);
    if (pattern !== undefined) return pattern;
  }
  return undefined;
}
