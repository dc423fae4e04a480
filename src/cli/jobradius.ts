#!/usr/bin/env node
/**
 * jobradius 命令行工具
 *
 * 加载职位 CSV 后执行半径查询、名称查询与索引检查，结果以 JSON 输出
 */

import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { Command, InvalidArgumentError } from 'commander';

import { JobStore } from '../jobs/jobStore.js';
import type { JobStoreOptions } from '../jobs/jobStore.js';
import { logError } from '../utils/log.js';

interface CommonOptions {
  file?: string;
  pretty?: boolean;
  maxFanout?: number;
  radiusDefault?: number;
}

interface LocationOptions extends CommonOptions {
  lat: number;
  lon: number;
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`不是合法数字: ${value}`);
  }
  return parsed;
}

function parseInteger(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`不是合法整数: ${value}`);
  }
  return parsed;
}

function print(value: unknown, pretty?: boolean): void {
  console.log(pretty ? JSON.stringify(value, null, 2) : JSON.stringify(value));
}

async function openStore(options: CommonOptions): Promise<JobStore> {
  const file = options.file ?? process.env.JOBRADIUS_DATA_FILE;
  if (!file) {
    throw new Error('缺少数据文件：请使用 --file 或设置 JOBRADIUS_DATA_FILE');
  }
  const storeOptions: JobStoreOptions = { cacheSize: 0 };
  if (options.maxFanout !== undefined) storeOptions.maxFanout = options.maxFanout;
  if (options.radiusDefault !== undefined) storeOptions.defaultRadiusKm = options.radiusDefault;
  return JobStore.open(file, storeOptions);
}

function withCommonOptions(command: Command): Command {
  return command
    .option('-f, --file <path>', '职位 CSV 文件（默认读取 JOBRADIUS_DATA_FILE）')
    .option('--max-fanout <n>', '节点最大扇出', parseInteger)
    .option('--radius-default <km>', '默认查询半径（千米）', parseNumber)
    .option('--pretty', '格式化 JSON 输出');
}

/**
 * 创建 jobradius CLI 程序
 */
export function createJobRadiusCLI(): Command {
  const program = new Command();

  program.name('jobradius').description('按地理位置查找职位').version('1.0.0');

  withCommonOptions(
    program
      .command('nearby')
      .description('查找指定位置半径内的职位')
      .requiredOption('--lat <latitude>', '纬度', parseNumber)
      .requiredOption('--lon <longitude>', '经度', parseNumber)
      .option('-r, --radius <km>', '半径（千米），0 表示使用默认半径', parseNumber, 0),
  ).action(async (options: LocationOptions & { radius: number }) => {
    const store = await openStore(options);
    const jobs = await store.findJobsNearby(
      { longitude: options.lon, latitude: options.lat },
      options.radius,
    );
    print(jobs, options.pretty);
  });

  withCommonOptions(
    program
      .command('search')
      .description('在默认半径内按职位名称查找')
      .requiredOption('-t, --title <title>', '职位名称（大小写不敏感）')
      .requiredOption('--lat <latitude>', '纬度', parseNumber)
      .requiredOption('--lon <longitude>', '经度', parseNumber),
  ).action(async (options: LocationOptions & { title: string }) => {
    const store = await openStore(options);
    const jobs = await store.searchJobsByTitleAndLocation(options.title, {
      longitude: options.lon,
      latitude: options.lat,
    });
    print(jobs, options.pretty);
  });

  withCommonOptions(program.command('titles').description('列出职位名称及对应职位')).action(
    async (options: CommonOptions) => {
      const store = await openStore(options);
      print(store.titleJobs(), options.pretty);
    },
  );

  withCommonOptions(program.command('stats').description('输出索引统计信息')).action(
    async (options: CommonOptions) => {
      const store = await openStore(options);
      print(await store.stats(), options.pretty);
    },
  );

  withCommonOptions(program.command('check').description('校验索引结构不变量')).action(
    async (options: CommonOptions) => {
      const store = await openStore(options);
      const result = await store.check();
      print(result, options.pretty);
      if (!result.ok) {
        process.exitCode = 1;
      }
    },
  );

  return program;
}

// CLI程序入口
const entry = process.argv[1];
if (entry !== undefined && resolve(entry) === fileURLToPath(import.meta.url)) {
  createJobRadiusCLI()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      logError('命令执行失败:', error);
      process.exit(1);
    });
}
