// src/core/pool.ts
import pLimit from 'p-limit';

/**
 * Fixed upper bound on simultaneously running tasks. A slot is taken when the
 * task starts and released when its promise settles, whether it resolved or
 * rejected.
 */
export class ConcurrencyPool {
  readonly name: string;
  readonly size: number;
  private limit: ReturnType<typeof pLimit>;

  constructor(name: string, size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`${name} pool size must be a positive integer, got ${size}`);
    }
    this.name = name;
    this.size = size;
    this.limit = pLimit(size);
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    return this.limit(task);
  }

  get active(): number {
    return this.limit.activeCount;
  }

  get pending(): number {
    return this.limit.pendingCount;
  }
}

export interface FetchPools {
  links: ConcurrencyPool;
  images: ConcurrencyPool;
}

export function createFetchPools(linkConcurrency: number, imageConcurrency: number): FetchPools {
  return {
    links: new ConcurrencyPool('link', linkConcurrency),
    images: new ConcurrencyPool('image', imageConcurrency),
  };
}
