import { z } from 'zod';
import { CHARACTER_SETS, DEFAULT_ORDER, completeOrder, type CharacterSet, type ConcreteCharacterSet } from './charsets';
import { MorseOptionsError } from './errors';

/** Maps a character (encode) or unit (decode) that has no match to its output. */
export type InvalidHandler = (unresolved: string) => string;

export interface MorseOptions {
  dash?: string;
  dot?: string;
  /** Emitted in place of whitespace between words. */
  space?: string;
  /** Placed between per-character units, and used to split them on decode. */
  separator?: string;
  /** Fixed marker, or a function of the unresolved input. Default: echo it. */
  invalid?: string | InvalidHandler;
  priority?: CharacterSet;
  /** Lookup precedence after the priority set. Unlisted sets follow in canonical order. */
  order?: ConcreteCharacterSet[];
}

export interface ResolvedOptions {
  readonly dash: string;
  readonly dot: string;
  readonly space: string;
  readonly separator: string;
  readonly invalid: InvalidHandler;
  readonly priority: CharacterSet;
  readonly order: readonly ConcreteCharacterSet[];
}

export const DEFAULT_OPTIONS = {
  dash: '-',
  dot: '.',
  space: '/',
  separator: ' ',
  priority: 'Latin',
  order: DEFAULT_ORDER
} as const;

const glyph = (name: string) => z.string().min(1, `${name} must not be empty`);

const concreteSet = z.enum(CHARACTER_SETS).refine((set): set is ConcreteCharacterSet => set !== 'Undefined', {
  message: 'order cannot contain Undefined'
});

const optionsSchema = z
  .object({
    dash: glyph('dash').default(DEFAULT_OPTIONS.dash),
    dot: glyph('dot').default(DEFAULT_OPTIONS.dot),
    space: glyph('space').default(DEFAULT_OPTIONS.space),
    separator: glyph('separator').default(DEFAULT_OPTIONS.separator),
    invalid: z
      .union([glyph('invalid'), z.custom<InvalidHandler>((v) => typeof v === 'function', 'invalid must be a string or function')])
      .optional(),
    priority: z.enum(CHARACTER_SETS).default(DEFAULT_OPTIONS.priority),
    order: z
      .array(concreteSet)
      .refine((order) => new Set(order).size === order.length, { message: 'order must not repeat a set' })
      .optional()
  })
  .superRefine((o, ctx) => {
    const issue = (message: string) => ctx.addIssue({ code: z.ZodIssueCode.custom, message });
    if (o.dot === o.dash) issue('dot and dash must differ');
    if (!o.separator) return;
    for (const [name, value] of [
      ['dot', o.dot],
      ['dash', o.dash],
      ['space', o.space]
    ] as const) {
      if (value === o.separator) issue(`${name} must differ from separator`);
      else if (value.includes(o.separator)) issue(`${name} must not contain separator`);
    }
    if (/\s/.test(o.separator) && /\S/.test(o.separator)) {
      issue('separator must be all whitespace or contain none');
    }
    if (o.space === o.dot || o.space === o.dash) issue('space must differ from dot and dash');
    if (typeof o.invalid === 'string' && o.invalid === o.separator) {
      issue('invalid must differ from separator');
    }
  });

const identity: InvalidHandler = (unresolved) => unresolved;

const resolved = new WeakSet<object>();

export function isResolvedOptions(options: MorseOptions | ResolvedOptions): options is ResolvedOptions {
  return resolved.has(options);
}

/**
 * Fills in defaults and validates glyphs.
 * Throws MorseOptionsError when the glyphs would make the output ambiguous.
 */
export function resolveOptions(options: MorseOptions | ResolvedOptions = {}): ResolvedOptions {
  if (isResolvedOptions(options)) return options;
  const parsed = optionsSchema.safeParse(options);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));
    throw new MorseOptionsError(`Invalid Morse options: ${issues.join('; ')}`, issues);
  }
  const { invalid, order, ...glyphs } = parsed.data;
  let handler: InvalidHandler = identity;
  if (typeof invalid === 'string') {
    const marker = invalid;
    handler = () => marker;
  } else if (invalid) {
    handler = invalid;
  }
  const result: ResolvedOptions = Object.freeze({
    ...glyphs,
    invalid: handler,
    order: Object.freeze(completeOrder(order ?? DEFAULT_ORDER))
  });
  resolved.add(result);
  return result;
}
