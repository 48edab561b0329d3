import { z } from 'zod';
import { DEFAULT_ORDER, type ConcreteCharacterSet } from './charsets';
import { FrozenMap } from './frozen-map';
import latin from './data/latin.json';
import numbers from './data/numbers.json';
import punctuation from './data/punctuation.json';
import latinExtended from './data/latin-extended.json';
import cyrillic from './data/cyrillic.json';
import greek from './data/greek.json';
import hebrew from './data/hebrew.json';
import arabic from './data/arabic.json';
import persian from './data/persian.json';
import japanese from './data/japanese.json';
import korean from './data/korean.json';
import thai from './data/thai.json';

/** Character -> pattern, patterns written with 0 for dot and 1 for dash. */
export type CharacterTable = ReadonlyMap<string, string>;

const singleCodePoint = z
  .string()
  .refine((key) => [...key].length === 1, { message: 'table keys must be a single character' });

const tableSchema = z.record(singleCodePoint, z.string().regex(/^[01]+$/, 'patterns use only 0 and 1'));

// Within one table the lowest code point claims a shared pattern first.
function toTable(set: ConcreteCharacterSet, raw: unknown): CharacterTable {
  const parsed = tableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Malformed ${set} table: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
  }
  const entries = Object.entries(parsed.data).sort(([a], [b]) => (a.codePointAt(0) ?? 0) - (b.codePointAt(0) ?? 0));
  return new FrozenMap(entries);
}

const RAW: Record<ConcreteCharacterSet, unknown> = {
  Latin: latin,
  Numbers: numbers,
  Punctuation: punctuation,
  LatinExtended: latinExtended,
  Cyrillic: cyrillic,
  Greek: greek,
  Hebrew: hebrew,
  Arabic: arabic,
  Persian: persian,
  Japanese: japanese,
  Korean: korean,
  Thai: thai
};

export const BASE_TABLES: ReadonlyMap<ConcreteCharacterSet, CharacterTable> = new FrozenMap(
  DEFAULT_ORDER.map((set): [ConcreteCharacterSet, CharacterTable] => [set, toTable(set, RAW[set])])
);
