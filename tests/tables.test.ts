import { describe, it, expect } from 'vitest';
import { buildTables, buildReverseIndex, encode, decode, CHARACTER_SETS, DEFAULT_ORDER } from '../src/index';
import { BASE_TABLES } from '../src/morse/mapping';

describe('base tables', () => {
  it('loads every script', () => {
    expect(BASE_TABLES.get('Latin')?.size).toBe(26);
    expect(BASE_TABLES.get('Numbers')?.size).toBe(10);
    expect(BASE_TABLES.get('Punctuation')?.size).toBe(20);
    expect(BASE_TABLES.get('LatinExtended')?.size).toBe(46);
    expect(BASE_TABLES.get('Cyrillic')?.size).toBe(36);
    expect(BASE_TABLES.get('Japanese')?.size).toBe(55);
    expect(BASE_TABLES.get('Thai')?.size).toBe(52);
  });

  it('stores patterns as 0 and 1', () => {
    for (const table of BASE_TABLES.values()) {
      for (const pattern of table.values()) {
        expect(pattern).toMatch(/^[01]+$/);
      }
    }
  });
});

describe('buildTables', () => {
  it('puts the priority overlay first', () => {
    expect([...buildTables().keys()]).toEqual([...CHARACTER_SETS]);
  });

  it('leaves the overlay out on request', () => {
    expect([...buildTables({}, false).keys()]).toEqual([...DEFAULT_ORDER]);
  });

  it('has no overlay for a priority without a table', () => {
    expect(buildTables({ priority: 'Undefined' }).has('Undefined')).toBe(false);
  });

  it('copies the priority table under Undefined', () => {
    const tables = buildTables({ priority: 'Greek' });
    expect(tables.get('Undefined')?.get('Ω')).toBe('.--');
    expect(tables.get('Undefined')?.get('A')).toBeUndefined();
  });

  it('maps the separator to the space glyph in the Latin table only', () => {
    const tables = buildTables();
    expect(tables.get('Latin')?.get(' ')).toBe('/');
    expect(tables.get('Undefined')?.has(' ')).toBe(false);
    expect(buildTables({ separator: '|', space: '_' }).get('Latin')?.get('|')).toBe('_');
  });

  it('renders patterns into the configured glyphs', () => {
    const tables = buildTables({ dot: '•', dash: '–' });
    expect(tables.get('Numbers')?.get('0')).toBe('–––––');
    expect(tables.get('Latin')?.get('A')).toBe('•–');
  });

  it('follows a custom order', () => {
    const keys = [...buildTables({ priority: 'Undefined', order: ['Thai', 'Korean'] }).keys()];
    expect(keys.slice(0, 3)).toEqual(['Thai', 'Korean', 'Latin']);
  });

  it('hands out read-only tables', () => {
    const tables = buildTables();
    expect(Object.isFrozen(tables)).toBe(true);
    expect(Reflect.get(tables, 'delete')).toBeUndefined();
    expect(Object.getOwnPropertyNames(tables)).toEqual([]);
    for (const table of tables.values()) {
      expect(table).not.toBeInstanceOf(Map);
      expect(Object.isFrozen(table)).toBe(true);
      expect(Reflect.get(table, 'delete')).toBeUndefined();
      expect(Reflect.get(table, 'set')).toBeUndefined();
      expect(Object.getOwnPropertyNames(table)).toEqual([]);
    }
    expect(encode('e')).toBe('.');
    expect(decode('.')).toBe('E');
  });

  it('hands out a read-only reverse index', () => {
    const index = buildReverseIndex(buildTables());
    expect(Object.isFrozen(index)).toBe(true);
    expect(Reflect.get(index, 'set')).toBeUndefined();
  });

  it('caches per glyph and priority combination', () => {
    expect(buildTables()).toBe(buildTables());
    expect(buildTables({ invalid: '#' })).toBe(buildTables());
    expect(buildTables({ priority: 'Greek' })).not.toBe(buildTables());
  });
});

describe('buildReverseIndex', () => {
  it('lets the first set claim a shared pattern', () => {
    const index = buildReverseIndex(buildTables());
    expect(index.get('.-')).toBe('A');
    expect(index.get('..')).toBe('I');
    expect(index.get('/')).toBe(' ');
  });

  it('follows the priority overlay', () => {
    const index = buildReverseIndex(buildTables({ priority: 'Hebrew' }));
    expect(index.get('.-')).toBe('א');
    expect(index.get('-')).toBe('ת');
  });

  it('prefers the lowest code point within one table', () => {
    const index = buildReverseIndex(buildTables({ priority: 'LatinExtended' }));
    expect(index.get('.--.-')).toBe('À');
  });
});
