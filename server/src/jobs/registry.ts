export type SyncJobState = {
  userId: string;
  full: boolean;
  startedAt: number;
};

/**
 * Sync cycles for one account must not overlap: the store has a single writer.
 * Each app instance keeps its own registry of running cycles.
 */
export class SyncRegistry {
  private readonly running = new Map<string, SyncJobState>();

  /** Claims the account, or returns null when a cycle is already running for it. */
  begin(userId: string, full: boolean, nowMs: number = Date.now()): SyncJobState | null {
    if (this.running.has(userId)) return null;
    const job: SyncJobState = { userId, full, startedAt: nowMs };
    this.running.set(userId, job);
    return job;
  }

  end(job: SyncJobState): void {
    if (this.running.get(job.userId) === job) this.running.delete(job.userId);
  }

  current(userId: string): SyncJobState | null {
    return this.running.get(userId) ?? null;
  }
}
