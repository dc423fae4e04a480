import { createJob } from '@/spatial/types.js';
import type { Job } from '@/spatial/types.js';

/**
 * 可复现的伪随机数生成器（mulberry32）
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * 在给定经纬度范围内生成职位，标题按序号唯一
 */
export function randomJobs(
  count: number,
  seed: number,
  bounds: { minLon: number; maxLon: number; minLat: number; maxLat: number },
): Job[] {
  const random = seededRandom(seed);
  const jobs: Job[] = [];
  for (let i = 0; i < count; i++) {
    const longitude = bounds.minLon + random() * (bounds.maxLon - bounds.minLon);
    const latitude = bounds.minLat + random() * (bounds.maxLat - bounds.minLat);
    jobs.push(createJob(`job-${i}`, longitude, latitude));
  }
  return jobs;
}

export function shuffled<T>(items: readonly T[], seed: number): T[] {
  const random = seededRandom(seed);
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

export function titlesOf(jobs: readonly Job[]): string[] {
  return jobs.map((job) => job.title).sort();
}
