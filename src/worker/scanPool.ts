import os from 'os';
import type { DetectorRunner } from '../detector.js';

type Task = {
  filePath: string;
  resolve: (stdout: string) => void;
  reject: (e: unknown) => void;
};

export function defaultPoolSize(): number {
  return Math.max(1, os.availableParallelism());
}

/**
 * Bounded pool for detector runs. Callers submit a file path and await the
 * detector's stdout; at most `size` runs are in flight and the rest queue in
 * submission order.
 */
export class ScanPool {
  readonly size: number;
  private running = 0;
  private queue: Task[] = [];
  private completed = 0;
  private peak = 0;

  constructor(
    private readonly runner: DetectorRunner,
    size: number = defaultPoolSize(),
  ) {
    this.size = Math.max(1, Math.floor(size));
  }

  submit(filePath: string): Promise<string> {
    return new Promise((resolve, reject) => {
      this.queue.push({ filePath, resolve, reject });
      this.pump();
    });
  }

  private pump() {
    while (this.running < this.size && this.queue.length) {
      const task = this.queue.shift();
      if (!task) break;
      this.running++;
      this.peak = Math.max(this.peak, this.running);
      void this.execute(task);
    }
  }

  private async execute(task: Task) {
    try {
      task.resolve(await this.runner(task.filePath));
    } catch (e) {
      task.reject(e);
    } finally {
      this.running--;
      this.completed++;
      this.pump();
    }
  }

  stats() {
    return { size: this.size, running: this.running, queued: this.queue.length, completed: this.completed, peak: this.peak };
  }
}
