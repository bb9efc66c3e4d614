/**
 * Proctor Schedule - End-to-end pipeline tests
 * Tests: workbook on disk → normalized records → calendars → .ics files
 */

import fs from 'fs';
import path from 'path';
import type * as ExcelJS from 'exceljs';
import { DateParseError, EmptyScheduleError, MissingColumnError } from './errors';
import { runPipeline } from './pipeline';
import { clock, day, listFiles, makeTempDir, removeDir, testConfig, writeWorkbook } from '../../test-utils/workbook';

// Three exams across April and May; the April sitting has two proctors
const THREE_ROWS: ExcelJS.CellValue[][] = [
  ['PHYS 1028', day(2026, 5, 4), clock(14, 0), clock(17, 0), 'Dana Ruiz', 'SH-1200'],
  ['CHEM 1301A', day(2026, 4, 28), clock(9, 0), clock(12, 0), 'Avery Chen', 'SH-2355'],
  ['CHEM 1301A', day(2026, 4, 28), clock(9, 0), clock(12, 0), 'Dana Ruiz', 'SH-2355'],
];

const read = (file: string) => fs.readFileSync(file, 'utf-8');
const unfold = (ics: string) => ics.replace(/\r\n /g, '');
const linesStartingWith = (ics: string, prefix: string) => ics.split('\r\n').filter((l) => l.startsWith(prefix));

describe('Proctor Schedule - Pipeline', () => {
  let root: string;
  let input: string;

  beforeEach(() => {
    root = makeTempDir();
    fs.mkdirSync(path.join(root, 'raw'));
    input = path.join(root, 'raw', 'finals.xlsx');
  });

  afterEach(() => removeDir(root));

  const outputFiles = () => [
    ...listFiles(path.join(root, 'interim')),
    ...listFiles(path.join(root, 'processed')),
  ];

  describe('Valid schedules', () => {
    test('1. Prefix is the month of the first exam', async () => {
      await writeWorkbook(input, THREE_ROWS);

      const result = await runPipeline(input, testConfig(root));

      expect(result.prefix).toBe('2026-04');
      expect(result.eventCount).toBe(3);
      expect(result.proctorCount).toBe(2);
      expect(listFiles(path.join(root, 'interim'))).toEqual(['2026-04-schedule.ics']);
      expect(listFiles(path.join(root, 'processed'))).toEqual(['2026-04-Avery Chen.ics', '2026-04-Dana Ruiz.ics']);
    });

    test('2. Aggregate calendar is sorted by start', async () => {
      await writeWorkbook(input, THREE_ROWS);

      await runPipeline(input, testConfig(root));
      const ics = read(path.join(root, 'interim', '2026-04-schedule.ics'));

      expect(linesStartingWith(ics, 'DTSTART')).toEqual([
        'DTSTART:20260428T090000',
        'DTSTART:20260428T090000',
        'DTSTART:20260504T140000',
      ]);
      expect(linesStartingWith(ics, 'SUMMARY')).toEqual([
        'SUMMARY:Proctoring: CHEM 1301A',
        'SUMMARY:Proctoring: CHEM 1301A',
        'SUMMARY:Proctoring: PHYS 1028',
      ]);
    });

    test('3. Proctor calendars together hold exactly the aggregate events', async () => {
      await writeWorkbook(input, THREE_ROWS);

      const { files } = await runPipeline(input, testConfig(root));
      const [aggregate, ...proctors] = files;

      const masterUids = linesStartingWith(read(aggregate), 'UID:').sort();
      const proctorUids = proctors.flatMap((f) => linesStartingWith(read(f), 'UID:')).sort();
      expect(proctorUids).toEqual(masterUids);
      expect(masterUids).toHaveLength(3);
    });

    test('4. Re-running on the same input gives byte-identical files', async () => {
      await writeWorkbook(input, THREE_ROWS);

      const first = await runPipeline(input, testConfig(root));
      const before = first.files.map((f) => fs.readFileSync(f));
      const second = await runPipeline(input, testConfig(root));

      expect(second.files).toEqual(first.files);
      second.files.forEach((f, i) => expect(fs.readFileSync(f).equals(before[i])).toBe(true));
    });

    test('5. Start offset, timezone and building directory from the config', async () => {
      await writeWorkbook(input, THREE_ROWS);
      const buildingsFile = path.join(root, 'buildings.json');
      fs.writeFileSync(
        buildingsFile,
        JSON.stringify([{ abbreviation: 'SH', name: 'Science Hall', address: '100 College Rd' }])
      );

      await runPipeline(
        input,
        testConfig(root, { startOffsetMinutes: 30, timezone: 'America/Toronto', buildingsFile })
      );
      const ics = unfold(read(path.join(root, 'processed', '2026-04-Avery Chen.ics')));

      expect(linesStartingWith(ics, 'DTSTART')).toEqual(['DTSTART;TZID=America/Toronto:20260428T083000']);
      expect(linesStartingWith(ics, 'DTEND')).toEqual(['DTEND;TZID=America/Toronto:20260428T120000']);
      expect(linesStartingWith(ics, 'DESCRIPTION')).toEqual([
        'DESCRIPTION:CHEM 1301A\\nProctors: Avery Chen\\, Dana Ruiz\\nBuilding: Science Hall: 100 College Rd',
      ]);
    });
  });

  describe('Several proctor columns', () => {
    test('6. Each proctor column becomes its own assignment', async () => {
      await writeWorkbook(
        input,
        [
          ['CHEM 1301A', day(2026, 4, 28), clock(9, 0), clock(12, 0), 'SH-2355', 'Avery Chen', 'Dana Ruiz'],
          ['PHYS 1028', day(2026, 5, 4), clock(14, 0), clock(17, 0), 'SH-1200', 'Dana Ruiz', null],
        ],
        ['Exam', 'Date', 'Start time', 'End time', 'Location', 'Proctor 1', 'Proctor 2']
      );

      const result = await runPipeline(input, testConfig(root));

      expect(result.eventCount).toBe(3);
      expect(result.proctorCount).toBe(2);
      expect(listFiles(path.join(root, 'processed'))).toEqual(['2026-04-Avery Chen.ics', '2026-04-Dana Ruiz.ics']);
      const dana = read(path.join(root, 'processed', '2026-04-Dana Ruiz.ics'));
      expect(linesStartingWith(dana, 'SUMMARY')).toEqual([
        'SUMMARY:Proctoring: CHEM 1301A',
        'SUMMARY:Proctoring: PHYS 1028',
      ]);
    });
  });

  describe('Invalid schedules (nothing written)', () => {
    test('7. Free-text date', async () => {
      await writeWorkbook(input, [
        ...THREE_ROWS,
        ['MATH 1600', 'May 6th', clock(19, 0), clock(22, 0), 'Sam Patel', 'SH-3345'],
      ]);

      await expect(runPipeline(input, testConfig(root))).rejects.toBeInstanceOf(DateParseError);
      expect(outputFiles()).toEqual([]);
    });

    test('8. Zero rows', async () => {
      await writeWorkbook(input, []);

      await expect(runPipeline(input, testConfig(root))).rejects.toBeInstanceOf(EmptyScheduleError);
      expect(outputFiles()).toEqual([]);
    });

    test('9. Missing required column', async () => {
      await writeWorkbook(
        input,
        [['CHEM 1301A', day(2026, 4, 28), clock(9, 0), clock(12, 0), 'SH-2355']],
        ['Exam', 'Date', 'Start time', 'End time', 'Location']
      );

      const run = runPipeline(input, testConfig(root));
      await expect(run).rejects.toBeInstanceOf(MissingColumnError);
      await expect(run).rejects.toMatchObject({ columns: ['Proctor'] });
      expect(outputFiles()).toEqual([]);
    });
  });
});
