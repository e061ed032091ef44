import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { LocalDate } from '@js-joda/core';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { generateCalendar, main } from './bin_calendar.js';
import type { FetchFn } from './config/proxy-fetch.js';
import { BinCalendarError, configFileSchema } from './config/schema.js';
import type { BinCalendarConfig } from './config/schema.js';

const today = LocalDate.parse('2024-06-01');

const refuseRow = {
  hso_servicename: 'Refuse',
  hso_nextcollection: '2024-06-03T00:00:00+00:00',
  hso_scheduledescription: 'Monday every other week',
  hso_round: 'R12',
};

function respondWith(body: unknown) {
  return vi.fn<FetchFn>().mockImplementation(async () => new Response(JSON.stringify(body), { status: 200 }));
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (e) {
    return e;
  }
  throw new Error('expected promise to reject');
}

describe('generateCalendar', () => {
  let dir: string;
  let config: BinCalendarConfig;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    dir = await mkdtemp(join(tmpdir(), 'bin-calendar-run-'));
    config = {
      ...configFileSchema.parse({ output: join(dir, 'docs', 'bins.ics'), horizon: 'P28D' }),
      uprn: '100000000001',
    };
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('writes a fortnightly service as two events with evening alarms', async () => {
    const fetchFn = respondWith([refuseRow, refuseRow]);

    const result = await generateCalendar(config, { fetchFn, today });

    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(result.eventCount).toBe(2);
    expect(result.services.map(s => s.name)).toEqual(['Refuse']);
    expect(result.outputPath).toBe(config.output);

    const lines = (await readFile(config.output, 'utf8')).replace(/\r\n[ \t]/g, '').split('\r\n');
    expect(lines.filter(l => l.startsWith('DTSTART'))).toEqual([
      'DTSTART;VALUE=DATE:20240603',
      'DTSTART;VALUE=DATE:20240617',
    ]);
    expect(lines.filter(l => l.startsWith('UID:'))).toEqual([
      'UID:refuse-2024-06-03@bin-calendar',
      'UID:refuse-2024-06-17@bin-calendar',
    ]);
    expect(lines.filter(l => l === 'BEGIN:VALARM')).toHaveLength(2);
    expect(lines).toContain('SUMMARY:🗑️ Refuse (black bin) collection');
  });

  it('produces identical output on a second run with the same data', async () => {
    await generateCalendar(config, { fetchFn: respondWith([refuseRow]), today });
    const first = await readFile(config.output, 'utf8');

    await generateCalendar(config, { fetchFn: respondWith([refuseRow]), today });
    const second = await readFile(config.output, 'utf8');

    expect(second).toBe(first);
  });

  it('leaves the previous file alone when no services come back', async () => {
    await generateCalendar(config, { fetchFn: respondWith([refuseRow]), today });
    const published = await readFile(config.output, 'utf8');

    const error = await captureError(generateCalendar(config, { fetchFn: respondWith({ value: [] }), today }));

    expect(error).toBeInstanceOf(BinCalendarError);
    expect(error).toMatchObject({ type: 'NoCollectionsReturned' });
    expect(await readFile(config.output, 'utf8')).toBe(published);
  });

  it('leaves the previous file alone on an unrecognized frequency', async () => {
    await writeFile(join(dir, 'previous.ics'), 'previous');
    const previous = { ...config, output: join(dir, 'previous.ics') };
    const garden = {
      hso_servicename: 'Garden',
      hso_nextcollection: '2024-06-05',
      hso_scheduledescription: 'monthly',
    };

    const error = await captureError(generateCalendar(previous, { fetchFn: respondWith([refuseRow, garden]), today }));

    expect(error).toMatchObject({ type: 'UnrecognizedFrequency', service: 'Garden' });
    expect(await readFile(previous.output, 'utf8')).toBe('previous');
  });
});

describe('main', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it.each([{}, { UPRN: '' }])('fails with MissingIdentifier before any network call for %o', async (env) => {
    const fetchFn = vi.fn<FetchFn>();

    const error = await captureError(main(env, { fetchFn, today }));

    expect(error).toBeInstanceOf(BinCalendarError);
    expect(error).toMatchObject({ type: 'MissingIdentifier' });
    expect(fetchFn).not.toHaveBeenCalled();
  });
});
