import { Command } from 'commander';
import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { generateCalendar } from './app/generateCalendar';
import { InputError, isCalendarError } from './errors';
import { emitCalendar, formatPreview } from './io/emit';
import { emitCsv } from './io/emitCsv';
import { parseCalendarConfig, validateYear } from './io/parse';
import { formatTimestampToken } from './time';
import type { CalendarConfig } from './types';

export const DEFAULT_OUT = 'AI_pricing_calendar_${year}.csv';
export const DEFAULT_PREVIEW_ROWS = 20;

interface BuildOptions {
  summary: string;
  dispatch: string;
  year?: number;
  out?: string;
  json?: string | boolean;
  markdown?: string | boolean;
  preview?: number;
  config?: string;
  verbose?: boolean;
}

const toNumber = (value: string): number => Number(value);

function loadConfig(path: string | undefined): CalendarConfig {
  if (!path) return {};
  let json: unknown;
  try {
    json = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err) {
    throw new InputError(
      `Unable to read config ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return parseCalendarConfig(json);
}

function writeOutput(path: string, contents: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, contents, 'utf8');
  console.log(`Wrote ${path}`);
}

async function buildAction(opts: BuildOptions): Promise<void> {
  const config = loadConfig(opts.config);
  const year = validateYear(opts.year ?? config.year ?? new Date().getFullYear());
  const preview = opts.preview ?? config.preview ?? DEFAULT_PREVIEW_ROWS;
  if (!Number.isInteger(preview) || preview < 0) {
    throw new InputError(`--preview must be a non-negative integer (got ${preview})`);
  }

  const result = await generateCalendar({
    summaryPath: opts.summary,
    dispatchPath: opts.dispatch,
    year,
    verbose: opts.verbose,
  });

  const runTs = new Date().toISOString();
  const tsToken = formatTimestampToken(runTs);
  const tokenize = (s: string): string =>
    s.replace(/\$\{(year|timestamp)\}/g, (_match: string, key: string) =>
      key === 'year' ? String(year) : tsToken,
    );

  writeOutput(tokenize(opts.out ?? config.out ?? DEFAULT_OUT), emitCsv(result.rows));

  const emitted = emitCalendar(year, result.rows, runTs, {
    markdown: opts.markdown !== undefined,
  });
  if (opts.json !== undefined) {
    if (typeof opts.json === 'string') {
      writeOutput(tokenize(opts.json), emitted.json);
    } else {
      console.log(emitted.json);
    }
  }
  if (emitted.markdown !== undefined) {
    if (typeof opts.markdown === 'string') {
      writeOutput(tokenize(opts.markdown), emitted.markdown);
    } else {
      console.log(emitted.markdown);
    }
  }

  if (preview > 0) {
    console.log(formatPreview(result.rows, preview));
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('pricing-calendar')
    .description(
      'Generate a daily pricing band calendar from a capacity summary and a dispatch report',
    )
    .version('0.1.0')
    .showHelpAfterError();

  program
    .command('build', { isDefault: true })
    .requiredOption('--summary <file>', 'Capacity (TBN) summary, .csv or .xlsx')
    .requiredOption('--dispatch <file>', 'Dispatch report, .csv or .xlsx')
    .option('--year <year>', 'Calendar year (2020-2100)', toNumber)
    .option(
      '--out <file>',
      'Write calendar CSV to this path (default AI_pricing_calendar_${year}.csv)',
    )
    .option('--json [file]', 'Write calendar JSON to this path (or stdout)')
    .option('--markdown [file]', 'Write Markdown band summary to this path (or stdout)')
    .option('--preview <rows>', 'Print the first N calendar rows (0 disables)', toNumber)
    .option('--config <file>', 'JSON config file with year, out and preview')
    .option('--verbose', 'Print monthly totals and dropped-row counts')
    .action(async (opts: BuildOptions) => {
      await buildAction(opts);
    });

  return program;
}

export const program = createProgram();

/** Parse argv with a fresh program, so option values never leak between runs. */
export async function run(argv: readonly string[] = process.argv): Promise<Command> {
  const cli = createProgram();
  await cli.parseAsync([...argv]);
  return cli;
}

/** Exit code for a failed run; errors that are not calendar errors rethrow. */
export function reportError(err: unknown): number {
  if (isCalendarError(err)) {
    console.error(`Error: ${err.message}`);
    return 1;
  }
  throw err;
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  run().catch((err: unknown) => {
    process.exitCode = reportError(err);
  });
}
