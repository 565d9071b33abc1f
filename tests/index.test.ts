import { describe, it, expect, vi, afterEach } from 'vitest';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { existsSync, mkdtempSync, readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { program, reportError, run } from '../src/index';
import { InputError, SchemaError } from '../src/errors';

const __dirname = dirname(fileURLToPath(import.meta.url));
const fixture = (name: string) => join(__dirname, '../fixtures', name);

afterEach(() => {
  vi.restoreAllMocks();
});

function quiet() {
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  return vi.spyOn(console, 'log').mockImplementation(() => {});
}

describe('CLI', () => {
  it('configures the commander program', () => {
    expect(program.name()).toBe('pricing-calendar');
    expect(program.version()).toBe('0.1.0');
    expect(program.commands.map((c) => c.name())).toContain('build');
  });

  it('registers the build options', () => {
    const cmd = program.commands.find((c) => c.name() === 'build');
    const longs = cmd?.options.map((o) => o.long);
    expect(longs).toEqual([
      '--summary',
      '--dispatch',
      '--year',
      '--out',
      '--json',
      '--markdown',
      '--preview',
      '--config',
      '--verbose',
    ]);
    const json = cmd?.options.find((o) => o.long === '--json');
    expect(json?.description).toBe('Write calendar JSON to this path (or stdout)');
  });

  it('writes the calendar CSV and prints a preview', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'pricing-calendar-'));
    const out = join(dir, 'nested', 'calendar.csv');
    const log = quiet();

    await run([
      'node',
      'pricing-calendar',
      'build',
      '--summary',
      fixture('tbn-summary.csv'),
      '--dispatch',
      fixture('dispatch.csv'),
      '--year',
      '2023',
      '--out',
      out,
    ]);

    const lines = readFileSync(out, 'utf8').split('\n');
    expect(lines).toHaveLength(367);
    expect(lines[0]).toBe(
      'Full Date,Formatted Date,Month,Weekday,Season,Coach Pressure,Trips Scheduled,Avg Trip Complexity,Suggested Band,Reason',
    );
    expect(lines[6]).toBe(
      '2023-01-06,January 6,January,Friday,Winter,1.0,1,1.0,C+ (45%),Very active day with high potential',
    );
    expect(lines[7]).toBe(
      '2023-01-07,January 7,January,Saturday,Winter,1.0,1,-1.0,D+ (35%),Mid-level day with moderate complexity',
    );

    expect(log).toHaveBeenCalledTimes(3);
    expect(String(log.mock.calls[0][0])).toContain('Year 2023 | days=365');
    expect(log.mock.calls[1][0]).toBe(`Wrote ${out}`);
    const preview = String(log.mock.calls[2][0]).split('\n');
    expect(preview).toHaveLength(21);
    expect(preview[0].startsWith('Date')).toBe(true);
  });

  it('takes year, preview and output tokens from a config file', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'pricing-calendar-'));
    const log = quiet();

    await run([
      'node',
      'pricing-calendar',
      '--summary',
      fixture('tbn-summary.csv'),
      '--dispatch',
      fixture('dispatch.csv'),
      '--config',
      fixture('calendar.config.json'),
      '--out',
      join(dir, 'calendar-${year}.csv'),
    ]);

    const out = join(dir, 'calendar-2024.csv');
    expect(existsSync(out)).toBe(true);
    expect(readFileSync(out, 'utf8').split('\n')).toHaveLength(368);
    expect(log).toHaveBeenCalledTimes(2);
  });

  it('prints JSON to stdout when --json has no path', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'pricing-calendar-'));
    const log = quiet();

    await run([
      'node',
      'pricing-calendar',
      'build',
      '--summary',
      fixture('tbn-summary.csv'),
      '--dispatch',
      fixture('dispatch.csv'),
      '--year',
      '2023',
      '--out',
      join(dir, 'calendar.csv'),
      '--preview',
      '0',
      '--json',
    ]);

    expect(log).toHaveBeenCalledTimes(3);
    const data = JSON.parse(String(log.mock.calls[2][0]));
    expect(data.year).toBe(2023);
    expect(data.days).toHaveLength(365);
  });

  it('writes a Markdown summary when given a path', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'pricing-calendar-'));
    const md = join(dir, 'summary.md');
    quiet();

    await run([
      'node',
      'pricing-calendar',
      'build',
      '--summary',
      fixture('tbn-summary.csv'),
      '--dispatch',
      fixture('dispatch.csv'),
      '--year',
      '2023',
      '--out',
      join(dir, 'calendar.csv'),
      '--preview',
      '0',
      '--markdown',
      md,
    ]);

    expect(readFileSync(md, 'utf8').split('\n')[0]).toBe('# Pricing Calendar 2023');
  });

  it('aborts without writing output when the dispatch schema is wrong', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'pricing-calendar-'));
    const out = join(dir, 'calendar.csv');
    quiet();

    await expect(
      run([
        'node',
        'pricing-calendar',
        'build',
        '--summary',
        fixture('tbn-summary.csv'),
        '--dispatch',
        fixture('dispatch-missing-column.csv'),
        '--year',
        '2023',
        '--out',
        out,
      ]),
    ).rejects.toThrow(SchemaError);
    expect(existsSync(out)).toBe(false);
  });

  it('rejects an out-of-range year', async () => {
    await expect(
      run([
        'node',
        'pricing-calendar',
        '--summary',
        fixture('tbn-summary.csv'),
        '--dispatch',
        fixture('dispatch.csv'),
        '--year',
        '1999',
      ]),
    ).rejects.toThrow(InputError);
  });
});

describe('reportError', () => {
  it('prints calendar errors as one line and returns an exit code', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    expect(reportError(new SchemaError(['Group Name']))).toBe(1);
    expect(error).toHaveBeenCalledWith(
      'Error: Dispatch report is missing required column(s): Group Name',
    );
  });

  it('rethrows anything else', () => {
    const bug = new TypeError('boom');
    expect(() => reportError(bug)).toThrow(bug);
  });
});
