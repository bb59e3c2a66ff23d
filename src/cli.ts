import { isLinesError } from './shared/index.js';
import { renderLine } from './lines/render.js';
import type { RenderOptionsInput } from './lines/options.js';
import { mergeRenderOptions } from './lines/options.js';

interface RenderArgs {
  options: RenderOptionsInput;
  identifiers: string[];
}

function parseArgs(argv: string[]): RenderArgs {
  const out: RenderArgs = { options: {}, identifiers: [] };
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index] ?? '';
    if (arg === '--no-math') out.options.mathMode = false;
    else if (arg === '--no-electronic') out.options.suppressElectronic = true;
    else if (arg === '--no-literals') out.options.suppressLiterals = true;
    else if (arg === '--rotational-only') out.options.rotationalOnly = true;
    else if (arg === '--suppress') {
      const keys = argv[++index];
      if (keys === undefined) throw new Error('--suppress needs a comma-separated list of keys');
      out.options.suppressedLabels = [
        ...(out.options.suppressedLabels ?? []),
        ...keys.split(',').map(key => key.trim()).filter(key => key.length > 0),
      ];
    }
    else if (arg === '--help' || arg === '-h') throw new Error('help');
    else if (arg.startsWith('--')) throw new Error(`Unknown arg: ${arg}`);
    else out.identifiers.push(arg);
  }
  return out;
}

function usage(): string {
  return [
    'Usage:',
    '  pdr-lines render [--no-math] [--suppress v,f] [--no-electronic] [--no-literals] [--rotational-only] <identifier...>',
    '  pdr-lines render h2_v0_j2__v0_j0 "h2o_j1_ka1_kc1__j0_ka0_kc0"',
  ].join('\n');
}

/**
 * Print one label per identifier on stdout. Returns the rendered labels so
 * callers other than the binary can reuse the argument handling.
 */
export function runRenderCli(
  argv: string[],
  defaults: RenderOptionsInput = {},
  write: (line: string) => void = line => { process.stdout.write(`${line}\n`); },
): string[] {
  let args: RenderArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    if (message === 'help') {
      console.error(usage());
      return [];
    }
    throw new Error(`${message}\n${usage()}`);
  }

  if (args.identifiers.length === 0) {
    throw new Error(`No identifier given.\n${usage()}`);
  }

  const options = mergeRenderOptions(defaults, args.options);
  const labels: string[] = [];
  for (const identifier of args.identifiers) {
    try {
      labels.push(renderLine(identifier, options));
    } catch (err) {
      if (isLinesError(err)) {
        throw new Error(`${identifier}: [${err.code}] ${err.message}`, { cause: err });
      }
      throw err;
    }
  }
  labels.forEach(label => write(label));
  return labels;
}
