import { z } from 'zod';
import { CHARACTER_SETS } from '../morse/charsets';
import { MorseOptionsError } from '../morse/errors';
import { resolveOptions, type ResolvedOptions } from '../morse/options';

export interface RawSettings {
  dot?: string;
  dash?: string;
  space?: string;
  separator?: string;
  invalid?: string;
  priority?: string;
}

const settingsSchema = z.object({
  dot: z.string().optional(),
  dash: z.string().optional(),
  space: z.string().optional(),
  separator: z.string().optional(),
  invalid: z.string().optional(),
  priority: z.enum(CHARACTER_SETS).optional()
});

/**
 * Reads glyph defaults from MORSE_* environment variables; flags win.
 */
export function loadSettings(flags: RawSettings, env: NodeJS.ProcessEnv = process.env): ResolvedOptions {
  const parsed = settingsSchema.safeParse({
    dot: flags.dot ?? env.MORSE_DOT,
    dash: flags.dash ?? env.MORSE_DASH,
    space: flags.space ?? env.MORSE_SPACE,
    separator: flags.separator ?? env.MORSE_SEPARATOR,
    invalid: flags.invalid ?? env.MORSE_INVALID,
    priority: flags.priority ?? env.MORSE_PRIORITY
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new MorseOptionsError(`Invalid settings: ${issues.join('; ')}`, issues);
  }
  return resolveOptions(parsed.data);
}
