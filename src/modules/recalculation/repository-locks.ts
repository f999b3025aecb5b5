import { Injectable } from '@nestjs/common';
import pLimit from 'p-limit';

type Limit = ReturnType<typeof pLimit>;

/**
 * One single-slot queue per repository. Sync passes and recalculation for the
 * same repository run one after another; different repositories do not wait
 * on each other.
 */
@Injectable()
export class RepositoryLocks {
  private readonly queues = new Map<number, Limit>();

  run<T>(repositoryId: number, task: () => Promise<T>): Promise<T> {
    let queue = this.queues.get(repositoryId);
    if (!queue) {
      queue = pLimit(1);
      this.queues.set(repositoryId, queue);
    }
    return queue(task);
  }

  /** Holds every listed repository at once, acquired in ascending id order. */
  runAll<T>(repositoryIds: readonly number[], task: () => Promise<T>): Promise<T> {
    const ids = [...new Set(repositoryIds)].sort((a, b) => a - b);
    const acquire = (index: number): Promise<T> =>
      index >= ids.length ? task() : this.run(ids[index], () => acquire(index + 1));
    return acquire(0);
  }
}
