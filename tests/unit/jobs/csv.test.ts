import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'node:path';
import { loadJobsCsv, parseCoordinate, parseJobsCsv, splitCsvLine } from '@/jobs/csv.js';
import { cleanupWorkspace, makeWorkspace, writeFixture } from '../../helpers/tempfs.js';

const FIXTURE =
  'title,longitude,latitude\nNurse,3.5,6.5\nbad,row\nChef,abc,1\nChef,1,xyz\n\nDriver, -1.25 , 2e1\n';

describe('parseCoordinate', () => {
  it('接受十进制与科学计数法', () => {
    expect(parseCoordinate('3.5')).toBe(3.5);
    expect(parseCoordinate(' -1.25 ')).toBe(-1.25);
    expect(parseCoordinate('+3')).toBe(3);
    expect(parseCoordinate('.5')).toBe(0.5);
    expect(parseCoordinate('2e1')).toBe(20);
  });

  it('拒绝非数字、空串与溢出', () => {
    expect(parseCoordinate('')).toBeNull();
    expect(parseCoordinate('abc')).toBeNull();
    expect(parseCoordinate('1e')).toBeNull();
    expect(parseCoordinate('Infinity')).toBeNull();
    expect(parseCoordinate('0x10')).toBeNull();
    expect(parseCoordinate('1e400')).toBeNull();
  });
});

describe('splitCsvLine', () => {
  it('按逗号拆分并保留空字段', () => {
    expect(splitCsvLine('a,,c')).toEqual(['a', '', 'c']);
  });

  it('支持双引号字段与转义', () => {
    expect(splitCsvLine('"Cook, Senior",1,2')).toEqual(['Cook, Senior', '1', '2']);
    expect(splitCsvLine('a,"b ""x""",c')).toEqual(['a', 'b "x"', 'c']);
  });
});

describe('parseJobsCsv', () => {
  it('识别表头并跳过非法行', () => {
    const parsed = parseJobsCsv(FIXTURE);
    expect(parsed.headerDetected).toBe(true);
    expect(parsed.jobs).toEqual([
      { title: 'Nurse', location: { longitude: 3.5, latitude: 6.5 } },
      { title: 'Driver', location: { longitude: -1.25, latitude: 20 } },
    ]);
    expect(parsed.skipped).toEqual([
      { line: 3, reason: 'column_count' },
      { line: 4, reason: 'invalid_longitude' },
      { line: 5, reason: 'invalid_latitude' },
    ]);
  });

  it('首行为数据时不视为表头', () => {
    const parsed = parseJobsCsv('Nurse,1,2\r\nChef,3,4');
    expect(parsed.headerDetected).toBe(false);
    expect(parsed.jobs.map((j) => j.title)).toEqual(['Nurse', 'Chef']);
  });

  it('列数不为 3 的首行按数据行处理', () => {
    const parsed = parseJobsCsv('only,two\nNurse,1,2');
    expect(parsed.headerDetected).toBe(false);
    expect(parsed.skipped).toEqual([{ line: 1, reason: 'column_count' }]);
    expect(parsed.jobs).toHaveLength(1);
  });

  it('空文本得到空结果', () => {
    expect(parseJobsCsv('\n\n')).toEqual({ jobs: [], skipped: [], headerDetected: false });
  });
});

describe('loadJobsCsv', () => {
  let workspace: string;

  beforeEach(async () => {
    workspace = await makeWorkspace('csv');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await cleanupWorkspace(workspace);
  });

  it('读取文件并逐行警告被跳过的行', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const file = await writeFixture(workspace, 'jobs.csv', FIXTURE);

    const parsed = await loadJobsCsv(file);
    expect(parsed.jobs).toHaveLength(2);
    expect(warn).toHaveBeenCalledTimes(3);
    expect(warn).toHaveBeenNthCalledWith(1, `[jobradius] ${file}:3 已跳过（column_count）`);
  });

  it('文件不存在时给出包含路径的错误', async () => {
    const missing = join(workspace, 'missing.csv');
    await expect(loadJobsCsv(missing)).rejects.toThrow(`无法读取职位数据文件 ${missing}`);
  });
});
