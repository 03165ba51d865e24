import { priorityRank } from '../types/index.js';
import type { Priority } from '../types/index.js';

/** One dispatch of one node for one task lane (the main line or a fan-out branch). */
export interface DispatchJob {
  taskId: string;
  nodeId: string;
  priority: Priority;
  attempt: number;
  branch?: string;
}

interface Queued {
  job: DispatchJob;
  seq: number;
}

/**
 * Ready jobs ordered by priority (critical first), FIFO within a priority.
 */
export class ReadyQueue {
  private items: Queued[] = [];
  private seq = 0;

  push(job: DispatchJob): void {
    const entry = { job, seq: this.seq++ };
    const rank = priorityRank(job.priority);
    let i = this.items.length;
    while (i > 0 && priorityRank(this.items[i - 1].job.priority) < rank) i--;
    this.items.splice(i, 0, entry);
  }

  /** Put back a job that could not be placed, ahead of later arrivals of the same priority. */
  requeue(job: DispatchJob, seq: number): void {
    const rank = priorityRank(job.priority);
    let i = 0;
    while (
      i < this.items.length &&
      (priorityRank(this.items[i].job.priority) > rank ||
        (priorityRank(this.items[i].job.priority) === rank && this.items[i].seq < seq))
    ) {
      i++;
    }
    this.items.splice(i, 0, { job, seq });
  }

  /** Remove and return every queued job in dispatch order. */
  drain(): Array<{ job: DispatchJob; seq: number }> {
    const out = this.items;
    this.items = [];
    return out;
  }

  /** Drop queued jobs for a task, e.g. after cancellation. */
  removeTask(taskId: string): number {
    const before = this.items.length;
    this.items = this.items.filter((q) => q.job.taskId !== taskId);
    return before - this.items.length;
  }

  peekAll(): DispatchJob[] {
    return this.items.map((q) => q.job);
  }

  get size(): number {
    return this.items.length;
  }
}
