/**
 * 职位 CSV 解析
 *
 * 每行格式为 `title,longitude,latitude`。首行第二或第三列不是数字时视为表头；
 * 列数不为 3 或坐标无法解析的行被跳过并记录原因。
 */

import { promises as fs } from 'node:fs';

import { createJob } from '../spatial/types.js';
import type { Job } from '../spatial/types.js';
import { logWarn } from '../utils/log.js';

export type SkipReason = 'column_count' | 'invalid_longitude' | 'invalid_latitude';

export interface SkippedRow {
  /** 从 1 开始的行号 */
  line: number;
  reason: SkipReason;
}

export interface ParsedJobs {
  jobs: Job[];
  skipped: SkippedRow[];
  headerDetected: boolean;
}

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function parseCoordinate(text: string): number | null {
  const trimmed = text.trim();
  if (!NUMBER_PATTERN.test(trimmed)) return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/**
 * 拆分单行 CSV，支持双引号字段与 "" 转义
 */
export function splitCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (inQuotes) {
      if (ch === '"') {
        if (line[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      fields.push(current);
      current = '';
    } else {
      current += ch;
    }
  }

  fields.push(current);
  return fields;
}

function isHeader(fields: string[]): boolean {
  if (fields.length !== 3) return false;
  return parseCoordinate(fields[1]) === null || parseCoordinate(fields[2]) === null;
}

export function parseJobsCsv(text: string): ParsedJobs {
  const jobs: Job[] = [];
  const skipped: SkippedRow[] = [];
  let headerDetected = false;
  let seenRow = false;

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i];
    if (raw.trim() === '') continue;
    const line = i + 1;
    const fields = splitCsvLine(raw);

    if (!seenRow) {
      seenRow = true;
      if (isHeader(fields)) {
        headerDetected = true;
        continue;
      }
    }

    if (fields.length !== 3) {
      skipped.push({ line, reason: 'column_count' });
      continue;
    }

    const longitude = parseCoordinate(fields[1]);
    if (longitude === null) {
      skipped.push({ line, reason: 'invalid_longitude' });
      continue;
    }
    const latitude = parseCoordinate(fields[2]);
    if (latitude === null) {
      skipped.push({ line, reason: 'invalid_latitude' });
      continue;
    }

    jobs.push(createJob(fields[0].trim(), longitude, latitude));
  }

  return { jobs, skipped, headerDetected };
}

/**
 * 读取并解析 CSV 文件，跳过的行逐条输出警告
 */
export async function loadJobsCsv(filePath: string): Promise<ParsedJobs> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new Error(`无法读取职位数据文件 ${filePath}: ${reason}`, { cause: e });
  }

  const parsed = parseJobsCsv(text);
  for (const row of parsed.skipped) {
    logWarn(`${filePath}:${row.line} 已跳过（${row.reason}）`);
  }
  return parsed;
}
