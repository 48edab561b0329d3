import { parseArgs } from 'node:util';
import { CHARACTER_SETS } from './morse/charsets';
import { decode, encode } from './morse/convert';
import { MorseOptionsError } from './morse/errors';
import { BASE_TABLES } from './morse/mapping';
import { loadSettings } from './cli/settings';

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  readStdin: () => Promise<string>;
  env: NodeJS.ProcessEnv;
}

const USAGE = `Usage: morse-scripts <encode|decode|sets> [text...] [options]

Options:
  --dot <glyph>         dot glyph (default ".")
  --dash <glyph>        dash glyph (default "-")
  --space <glyph>       word space glyph (default "/")
  --separator <glyph>   character separator (default " ")
  --invalid <glyph>     marker for unknown input (default: echo it)
  --priority <set>      character set looked up first (default Latin)
  -v, --verbose         log the lookup order to stderr
  -h, --help            show this help

Text is read from stdin when none is given.
Environment: MORSE_DOT, MORSE_DASH, MORSE_SPACE, MORSE_SEPARATOR, MORSE_INVALID, MORSE_PRIORITY`;

async function readAll(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: string[] = [];
  stream.setEncoding('utf8');
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
  }
  return chunks.join('');
}

const defaultIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  readStdin: () => readAll(process.stdin),
  env: process.env
};

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      dot: { type: 'string' },
      dash: { type: 'string' },
      space: { type: 'string' },
      separator: { type: 'string' },
      invalid: { type: 'string' },
      priority: { type: 'string' },
      verbose: { type: 'boolean', short: 'v' },
      help: { type: 'boolean', short: 'h' }
    }
  });
}

/**
 * Runs one CLI invocation and resolves to the exit code.
 */
export async function runCli(argv: string[], io: CliIO = defaultIO): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    io.err(error instanceof Error ? error.message : String(error));
    io.err(USAGE);
    return 2;
  }

  const { values, positionals } = parsed;
  const [command, ...words] = positionals;
  if (values.help) {
    io.out(USAGE);
    return 0;
  }
  if (command === 'sets') {
    for (const set of CHARACTER_SETS) {
      const table = set === 'Undefined' ? undefined : BASE_TABLES.get(set);
      io.out(table ? `${set} (${table.size})` : `${set} (priority overlay)`);
    }
    return 0;
  }
  if (command !== 'encode' && command !== 'decode') {
    io.err(command ? `Unknown command: ${command}` : 'Missing command');
    io.err(USAGE);
    return 2;
  }

  try {
    const options = loadSettings(values, io.env);
    if (values.verbose) {
      io.err(`priority ${options.priority}, then ${options.order.join(' > ')}`);
    }
    const input = words.length > 0 ? words.join(' ') : await io.readStdin();
    io.out(command === 'encode' ? encode(input, options) : decode(input, options));
    return 0;
  } catch (error) {
    if (error instanceof MorseOptionsError) {
      io.err(error.message);
      return 1;
    }
    throw error;
  }
}
