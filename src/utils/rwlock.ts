/**
 * 进程内读写锁
 *
 * 读者共享、写者独占，按到达顺序排队；队首为写者时后来的读者需等待，
 * 避免写者饥饿。
 */

export type ReleaseLock = () => void;

type LockMode = 'read' | 'write';

interface Waiter {
  mode: LockMode;
  grant: () => void;
}

export class ReadWriteLock {
  private readers = 0;
  private writer = false;
  private readonly queue: Waiter[] = [];

  get activeReaders(): number {
    return this.readers;
  }

  get isWriteLocked(): boolean {
    return this.writer;
  }

  get pending(): number {
    return this.queue.length;
  }

  acquireRead(): Promise<ReleaseLock> {
    if (!this.writer && this.queue.length === 0) {
      this.readers++;
      return Promise.resolve(this.releaser('read'));
    }
    return this.enqueue('read');
  }

  acquireWrite(): Promise<ReleaseLock> {
    if (!this.writer && this.readers === 0 && this.queue.length === 0) {
      this.writer = true;
      return Promise.resolve(this.releaser('write'));
    }
    return this.enqueue('write');
  }

  async withRead<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireRead();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  async withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireWrite();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private enqueue(mode: LockMode): Promise<ReleaseLock> {
    return new Promise<ReleaseLock>((resolve) => {
      this.queue.push({ mode, grant: () => resolve(this.releaser(mode)) });
    });
  }

  private releaser(mode: LockMode): ReleaseLock {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      if (mode === 'read') {
        this.readers--;
      } else {
        this.writer = false;
      }
      this.drain();
    };
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const next = this.queue[0];
      if (next.mode === 'write') {
        if (this.writer || this.readers > 0) return;
        this.queue.shift();
        this.writer = true;
        next.grant();
        return;
      }
      if (this.writer) return;
      this.queue.shift();
      this.readers++;
      next.grant();
    }
  }
}
