import type { CharacterSet } from './charsets';
import { FrozenMap } from './frozen-map';
import { BASE_TABLES, type CharacterTable } from './mapping';
import { resolveOptions, type MorseOptions, type ResolvedOptions } from './options';

/** Rendered tables in lookup order; `Undefined` holds the priority overlay. */
export type MergedTableSet = ReadonlyMap<CharacterSet, CharacterTable>;

/** Rendered pattern -> character. */
export type ReverseIndex = ReadonlyMap<string, string>;

const CACHE_LIMIT = 64;
const cache = new Map<string, MergedTableSet>();

function cacheKey(o: ResolvedOptions, overlay: boolean): string {
  return JSON.stringify([o.dot, o.dash, o.space, o.separator, o.priority, o.order, overlay]);
}

function render(table: CharacterTable, o: ResolvedOptions): Map<string, string> {
  const out = new Map<string, string>();
  for (const [char, pattern] of table) {
    out.set(char, pattern.replaceAll('0', o.dot).replaceAll('1', o.dash));
  }
  return out;
}

function build(o: ResolvedOptions, overlay: boolean): MergedTableSet {
  const tables = new Map<CharacterSet, CharacterTable>();
  const priority = o.priority === 'Undefined' ? undefined : BASE_TABLES.get(o.priority);
  if (overlay && priority) {
    tables.set('Undefined', new FrozenMap(render(priority, o)));
  }
  for (const set of o.order) {
    const base = BASE_TABLES.get(set);
    if (!base) continue;
    const rendered = render(base, o);
    // Whitespace in the input reaches the encoder as the separator glyph.
    if (set === 'Latin') rendered.set(o.separator, o.space);
    tables.set(set, new FrozenMap(rendered));
  }
  return new FrozenMap(tables);
}

/**
 * Builds the merged, rendered tables for the given options.
 *
 * With `includePriorityOverlay` the priority set's table is copied under
 * `Undefined` ahead of every concrete set, so it wins encode lookups and
 * reverse-index collisions. Results are cached per distinct glyph, priority
 * and order combination.
 */
export function buildTables(options: MorseOptions | ResolvedOptions = {}, includePriorityOverlay = true): MergedTableSet {
  const o = resolveOptions(options);
  const key = cacheKey(o, includePriorityOverlay);
  const hit = cache.get(key);
  if (hit) return hit;

  const tables = build(o, includePriorityOverlay);
  if (cache.size >= CACHE_LIMIT) {
    const oldest = cache.keys().next();
    if (!oldest.done) cache.delete(oldest.value);
  }
  cache.set(key, tables);
  return tables;
}

/** First writer wins, in the table set's iteration order. */
export function buildReverseIndex(tables: MergedTableSet): ReverseIndex {
  const index = new Map<string, string>();
  for (const table of tables.values()) {
    for (const [char, pattern] of table) {
      if (!index.has(pattern)) index.set(pattern, char);
    }
  }
  return new FrozenMap(index);
}

const indexes = new WeakMap<MergedTableSet, ReverseIndex>();

export function reverseIndexFor(tables: MergedTableSet): ReverseIndex {
  let index = indexes.get(tables);
  if (!index) {
    index = buildReverseIndex(tables);
    indexes.set(tables, index);
  }
  return index;
}

