/**
 * Bounded job history, ordered by start time. Entries are appended once and
 * replaced in place as the job progresses; they are never reordered.
 */

import { isTerminal, type Job } from '../types';

export class JobHistory {
  private jobs: Job[] = [];

  constructor(private readonly maxEntries: number) {}

  /**
   * Append a new job, evicting the oldest terminal job when full.
   * Running jobs are never evicted.
   */
  add(job: Job): void {
    this.jobs.push(job);
    while (this.jobs.length > this.maxEntries) {
      const index = this.jobs.findIndex(entry => isTerminal(entry.state));
      if (index === -1) break;
      this.jobs.splice(index, 1);
    }
  }

  get(id: string): Job | undefined {
    return this.jobs.find(job => job.id === id);
  }

  /**
   * Most recent first.
   */
  list(limit: number = this.maxEntries): Job[] {
    return this.jobs.slice().reverse().slice(0, Math.max(0, limit));
  }

  active(): Job[] {
    return this.jobs.filter(job => !isTerminal(job.state));
  }

  /**
   * Drop terminal jobs that ended before `now - retentionMs`.
   */
  prune(now: number, retentionMs: number): number {
    const horizon = now - retentionMs;
    const before = this.jobs.length;
    this.jobs = this.jobs.filter(
      job => !isTerminal(job.state) || Date.parse(job.endTime ?? job.startTime) >= horizon
    );
    return before - this.jobs.length;
  }

  get size(): number {
    return this.jobs.length;
  }
}
