/**
 * Script tags, in canonical lookup order.
 *
 * `Undefined` is the slot the priority overlay occupies; it never has a base
 * table of its own. The remaining order (Latin, digits and punctuation before
 * every other script) is an arbitrary default kept for compatibility; pass
 * `order` in the options to change it.
 */
export const CHARACTER_SETS = [
  'Undefined',
  'Latin',
  'Numbers',
  'Punctuation',
  'LatinExtended',
  'Cyrillic',
  'Greek',
  'Hebrew',
  'Arabic',
  'Persian',
  'Japanese',
  'Korean',
  'Thai'
] as const;

export type CharacterSet = (typeof CHARACTER_SETS)[number];

export type ConcreteCharacterSet = Exclude<CharacterSet, 'Undefined'>;

export const DEFAULT_ORDER: readonly ConcreteCharacterSet[] = CHARACTER_SETS.filter(
  (set): set is ConcreteCharacterSet => set !== 'Undefined'
);

const KNOWN: ReadonlySet<string> = new Set(CHARACTER_SETS);

export function isCharacterSet(value: string): value is CharacterSet {
  return KNOWN.has(value);
}

/**
 * Completes a caller-supplied order: listed sets first, then every set left
 * out, in canonical order.
 */
export function completeOrder(order: readonly ConcreteCharacterSet[]): ConcreteCharacterSet[] {
  const seen = new Set(order);
  return [...order, ...DEFAULT_ORDER.filter((set) => !seen.has(set))];
}
