import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { JobStore, DEFAULT_RADIUS_KM } from '@/jobs/jobStore.js';
import { EmptyInputError } from '@/spatial/errors.js';
import { createJob } from '@/spatial/types.js';
import type { Job } from '@/spatial/types.js';
import { resetWarnings } from '@/utils/log.js';
import { cleanupWorkspace, makeWorkspace, writeFixture } from '../../helpers/tempfs.js';
import { titlesOf } from '../../helpers/jobs.js';

const ORIGIN = { longitude: 0, latitude: 0 };

// 与原点的距离：A ≈ 3.34km，B ≈ 11.12km，C = 0
function sampleJobs(): Job[] {
  return [createJob('A', 0.03, 0), createJob('B', 0.1, 0), createJob('C', 0, 0)];
}

describe('JobStore 职位数据访问', () => {
  beforeEach(() => {
    resetWarnings();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('空集合无法创建', () => {
    expect(() => JobStore.fromJobs([])).toThrow(EmptyInputError);
  });

  it('校验选项', () => {
    expect(() => JobStore.fromJobs(sampleJobs(), { defaultRadiusKm: 0 })).toThrow(
      'defaultRadiusKm 须为正数',
    );
    expect(() => JobStore.fromJobs(sampleJobs(), { cacheSize: -1 })).toThrow(
      'cacheSize 须为非负整数',
    );
    expect(() => JobStore.fromJobs(sampleJobs(), { maxFanout: 1 })).toThrow(TypeError);
  });

  it('半径为 0 时使用默认半径并只警告一次', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const store = JobStore.fromJobs(sampleJobs());

    expect(titlesOf(await store.findJobsNearby(ORIGIN))).toEqual(['A', 'C']);
    expect(titlesOf(await store.findJobsNearby(ORIGIN, 0))).toEqual(['A', 'C']);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(`[jobradius] 未指定半径，使用默认半径 ${DEFAULT_RADIUS_KM}km`);
  });

  it('中心坐标非法时返回空结果', async () => {
    const store = JobStore.fromJobs([createJob('A', 0, 0), createJob('C', 50, 50)]);
    expect(await store.findJobsNearby({ longitude: 0, latitude: Number.NaN }, 1)).toEqual([]);
    expect(await store.searchJobsByTitleAndLocation('a', { longitude: Infinity, latitude: 0 })).toEqual(
      [],
    );
  });

  it('显式半径', async () => {
    const store = JobStore.fromJobs(sampleJobs());
    expect(titlesOf(await store.findJobsNearby(ORIGIN, 20))).toEqual(['A', 'B', 'C']);
    expect(await store.findJobsNearby({ longitude: 90, latitude: 45 }, 20)).toEqual([]);
  });

  it('按名称查找大小写不敏感', () => {
    const store = JobStore.fromJobs([...sampleJobs(), createJob('a', 10, 10)]);
    expect(store.searchJobsByTitle('a').map((j) => j.location)).toEqual([
      { longitude: 0.03, latitude: 0 },
      { longitude: 10, latitude: 10 },
    ]);
    expect(store.searchJobsByTitle('nobody')).toEqual([]);
    expect(Object.keys(store.titleJobs()).sort()).toEqual(['a', 'b', 'c']);
  });

  it('名称 + 位置查询使用默认半径', async () => {
    const store = JobStore.fromJobs(sampleJobs());
    expect(await store.searchJobsByTitleAndLocation('b', ORIGIN)).toEqual([]);

    const wide = JobStore.fromJobs(sampleJobs(), { defaultRadiusKm: 20 });
    expect((await wide.searchJobsByTitleAndLocation('b', ORIGIN)).map((j) => j.title)).toEqual([
      'B',
    ]);
  });

  it('新增职位后缓存失效', async () => {
    const store = JobStore.fromJobs(sampleJobs());
    expect(titlesOf(await store.findJobsNearby(ORIGIN, 4))).toEqual(['A', 'C']);

    await store.addJob(createJob('D', 0, 0.01));
    expect(titlesOf(await store.findJobsNearby(ORIGIN, 4))).toEqual(['A', 'C', 'D']);
    expect(store.searchJobsByTitle('d')).toHaveLength(1);

    const stats = await store.stats();
    expect(stats.jobs).toBe(4);
    expect(stats.titles).toBe(4);
    expect(stats.index.size).toBe(4);
    expect(await store.check()).toEqual({ ok: true, errors: [] });
  });

  it('返回结果的副本，调用方修改不影响缓存', async () => {
    const store = JobStore.fromJobs(sampleJobs());
    const first = await store.findJobsNearby(ORIGIN, 4);
    first.length = 0;
    expect(await store.findJobsNearby(ORIGIN, 4)).toHaveLength(2);
  });

  it('关闭缓存时结果不变', async () => {
    const store = JobStore.fromJobs(sampleJobs(), { cacheSize: 0 });
    expect(titlesOf(await store.findJobsNearby(ORIGIN, 4))).toEqual(['A', 'C']);
    expect(titlesOf(await store.findJobsNearby(ORIGIN, 4))).toEqual(['A', 'C']);
  });

  it('拒绝坐标无效的职位', async () => {
    const store = JobStore.fromJobs(sampleJobs());
    await expect(store.addJob(createJob('bad', Number.NaN, 0))).rejects.toThrow(
      '职位「bad」的坐标无效',
    );
    expect((await store.stats()).jobs).toBe(3);
  });
});

describe('JobStore.open', () => {
  let workspace: string;

  beforeEach(async () => {
    workspace = await makeWorkspace('store');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await cleanupWorkspace(workspace);
  });

  it('从 CSV 文件加载', async () => {
    const info = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const file = await writeFixture(
      workspace,
      'jobs.csv',
      'title,longitude,latitude\nNurse,0,0\nChef,0.02,0\nbroken\n',
    );

    const store = await JobStore.open(file);
    expect(titlesOf(await store.findJobsNearby(ORIGIN, 5))).toEqual(['Chef', 'Nurse']);
    expect(info).toHaveBeenCalledWith(`[jobradius] 已从 ${file} 加载 2 条职位，跳过 1 行`);
  });

  it('文件中没有有效职位时抛出 EmptyInputError', async () => {
    const file = await writeFixture(workspace, 'empty.csv', 'title,longitude,latitude\n');
    await expect(JobStore.open(file)).rejects.toBeInstanceOf(EmptyInputError);
  });
});
