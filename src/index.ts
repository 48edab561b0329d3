export { encode, decode, characterSetOf } from './morse/convert';
export { buildTables, buildReverseIndex, type MergedTableSet, type ReverseIndex } from './morse/tables';
export {
  resolveOptions,
  DEFAULT_OPTIONS,
  type MorseOptions,
  type ResolvedOptions,
  type InvalidHandler
} from './morse/options';
export {
  CHARACTER_SETS,
  DEFAULT_ORDER,
  isCharacterSet,
  type CharacterSet,
  type ConcreteCharacterSet
} from './morse/charsets';
export type { CharacterTable } from './morse/mapping';
export { MorseOptionsError } from './morse/errors';
