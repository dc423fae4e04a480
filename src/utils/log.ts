// 诊断信息统一写入 stderr，stdout 只输出命令结果
const PREFIX = '[jobradius]';
const warned = new Set<string>();

export function logInfo(message: string): void {
  console.error(`${PREFIX} ${message}`);
}

export function logWarn(message: string): void {
  console.warn(`${PREFIX} ${message}`);
}

export function logError(message: string, error?: unknown): void {
  if (error === undefined) {
    console.error(`${PREFIX} ${message}`);
  } else {
    console.error(`${PREFIX} ${message}`, error);
  }
}

/**
 * 同一 key 的警告只输出一次
 */
export function warnOnce(key: string, message: string): void {
  if (warned.has(key)) {
    return;
  }
  warned.add(key);
  logWarn(message);
}

/**
 * 清空已输出记录（测试用）
 */
export function resetWarnings(): void {
  warned.clear();
}
