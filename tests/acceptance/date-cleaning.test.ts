import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DateCleaner } from '../../src/DateCleaner.js';
import type { DomainEvent } from '../../src/domain/events/DomainEvents.js';
import { createTableSnapshot, toRows } from '../../src/domain/model/TableSnapshot.js';
import { ConfigError } from '../../src/domain/errors/CleaningErrors.js';
import { testConfigDocument, buildTestConfig } from '../fixtures/config.js';

const ORDERS_CSV = ['订单号,创建时间,settle_date', 'A1,45118,2024年1月2日', 'A2,2024. 1. 4,N/A', 'A3,,2023年2月', ''].join('\n');

describe('Date cleaning end to end', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tidytab-e2e-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeConfig(document: unknown): Promise<string> {
    const path = join(dir, 'date-formats.json');
    await writeFile(path, JSON.stringify(document), 'utf-8');
    return path;
  }

  // ============================================================
  // Configuration
  // ============================================================
  describe('configuration', () => {
    it('should build a cleaner from a configuration file', async () => {
      const cleaner = await DateCleaner.fromConfigFile(await writeConfig(testConfigDocument()));

      expect(cleaner.fields.map((field) => field.name)).toEqual(['创建时间', '结算日期']);
      expect(cleaner.describeFormats().map((rule) => rule.name)).toContain('ideographic_hao');
    });

    it('should fail before touching any file when the configuration is invalid', async () => {
      const path = await writeConfig({ ...testConfigDocument(), outputFormat: '%Y-%Q' });

      await expect(DateCleaner.fromConfigFile(path)).rejects.toBeInstanceOf(ConfigError);
    });
  });

  // ============================================================
  // Files and directories
  // ============================================================
  describe('files', () => {
    it('should clean a single file', async () => {
      const input = join(dir, 'orders.csv');
      await writeFile(input, ORDERS_CSV, 'utf-8');
      const cleaner = new DateCleaner(buildTestConfig({ onParseFailure: 'set_null' }));

      const result = await cleaner.cleanFile(input, join(dir, 'orders.cleaned.csv'));

      expect(await readFile(join(dir, 'orders.cleaned.csv'), 'utf-8')).toBe(
        [
          '订单号,创建时间,settle_date',
          'A1,2023-07-11 00:00:00,2024-01-02',
          'A2,2024-01-04 00:00:00,',
          'A3,,2023-02-01',
          '',
        ].join('\n'),
      );
      expect(result.summary.unparsableValues).toBe(1);
    });

    it('should clean every CSV file of a directory and ignore other files', async () => {
      const inputDir = join(dir, 'in');
      await mkdir(inputDir);
      await writeFile(join(inputDir, 'b.csv'), 'create_time\n45118\n', 'utf-8');
      await writeFile(join(inputDir, 'a.CSV'), 'create_time\n20240102\n', 'utf-8');
      await writeFile(join(inputDir, 'notes.txt'), 'not a table', 'utf-8');
      const cleaner = new DateCleaner(buildTestConfig());
      const events: DomainEvent['type'][] = [];
      cleaner.onAny((event) => events.push(event.type));

      const result = await cleaner.cleanDirectory(inputDir, join(dir, 'out'));

      expect(result.completed.map((file) => file.input)).toEqual([join(inputDir, 'a.CSV'), join(inputDir, 'b.csv')]);
      expect((await readdir(join(dir, 'out'))).sort()).toEqual(['a.CSV', 'b.csv']);
      expect(await readFile(join(dir, 'out', 'b.csv'), 'utf-8')).toBe('create_time\n2023-07-11 00:00:00\n');
      expect(events.filter((type) => type === 'file:completed')).toHaveLength(2);
    });

    it('should isolate a malformed file from the rest of the batch', async () => {
      const inputDir = join(dir, 'in');
      await mkdir(inputDir);
      await writeFile(join(inputDir, 'good.csv'), 'create_time\n45118\n', 'utf-8');
      await mkdir(join(inputDir, 'bad.csv'));
      const cleaner = new DateCleaner(buildTestConfig());

      const result = await cleaner.cleanFiles([join(inputDir, 'bad.csv'), join(inputDir, 'good.csv')], join(dir, 'out'));

      expect(result.failed.map((failure) => failure.file)).toEqual([join(inputDir, 'bad.csv')]);
      expect(result.completed.map((file) => file.input)).toEqual([join(inputDir, 'good.csv')]);
    });

    it('should clean a file path into an existing directory', async () => {
      const input = join(dir, 'orders.csv');
      await writeFile(input, 'create_time\n45118\n', 'utf-8');
      await mkdir(join(dir, 'out'));

      const result = await new DateCleaner(buildTestConfig()).cleanPath(input, join(dir, 'out'));

      expect(result.completed[0]?.output).toBe(join(dir, 'out', 'orders.csv'));
    });

    it('should clean a directory path like cleanDirectory', async () => {
      const inputDir = join(dir, 'in');
      await mkdir(inputDir);
      await writeFile(join(inputDir, 'orders.csv'), 'create_time\n45118\n', 'utf-8');

      const result = await new DateCleaner(buildTestConfig()).cleanPath(inputDir, join(dir, 'out'));

      expect(result.completed.map((file) => file.output)).toEqual([join(dir, 'out', 'orders.csv')]);
    });

    it('should overwrite its input in place when asked to', async () => {
      const input = join(dir, 'orders.csv');
      await writeFile(input, 'create_time\n45118\n', 'utf-8');

      await new DateCleaner(buildTestConfig()).cleanFile(input, input);

      expect(await readFile(input, 'utf-8')).toBe('create_time\n2023-07-11 00:00:00\n');
      expect(await readdir(dir)).toEqual(['orders.csv']);
    });
  });

  // ============================================================
  // File layout
  // ============================================================
  describe('file layout', () => {
    it('should keep blank rows of a single-column file', async () => {
      const input = join(dir, 'orders.csv');
      await writeFile(input, 'create_time\n45118\n\n20240102\n', 'utf-8');

      await new DateCleaner(buildTestConfig()).cleanFile(input, join(dir, 'out.csv'));

      expect(await readFile(join(dir, 'out.csv'), 'utf-8')).toBe(
        'create_time\n2023-07-11 00:00:00\n\n2024-01-02 00:00:00\n',
      );
    });

    it('should write a semicolon-separated file back with semicolons', async () => {
      const input = join(dir, 'orders.csv');
      await writeFile(input, 'id;create_time\nA1;45118\n', 'utf-8');

      await new DateCleaner(buildTestConfig()).cleanFile(input, join(dir, 'out.csv'));

      expect(await readFile(join(dir, 'out.csv'), 'utf-8')).toBe('id;create_time\nA1;2023-07-11 00:00:00\n');
    });
  });

  // ============================================================
  // Options
  // ============================================================
  describe('options', () => {
    it.each([Number.NaN, 0, -1, 1.5])('should reject maxConcurrentFiles of %s', (maxConcurrentFiles) => {
      expect(() => new DateCleaner(buildTestConfig(), { maxConcurrentFiles })).toThrow(
        /^maxConcurrentFiles must be a positive integer/,
      );
    });

    it('should accept a positive integer maxConcurrentFiles', () => {
      expect(() => new DateCleaner(buildTestConfig(), { maxConcurrentFiles: 3 })).not.toThrow();
    });
  });

  // ============================================================
  // Field subsets and shared events
  // ============================================================
  describe('withFields', () => {
    it('should clean only the named fields and share the event bus', () => {
      const cleaner = new DateCleaner(buildTestConfig());
      const events: DomainEvent['type'][] = [];
      cleaner.onAny((event) => events.push(event.type));

      const subset = cleaner.withFields(['结算日期']);
      const { table } = subset.cleanTable(createTableSnapshot(['create_time', 'settle_date'], [['45118', '45118']]));

      expect(subset.fields.map((field) => field.name)).toEqual(['结算日期']);
      expect(toRows(table)).toEqual([['45118', '2023-07-11']]);
      expect(events).toEqual(['table:cleaned']);
    });
  });
});
