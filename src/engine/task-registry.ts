/**
 * Process-scoped registry of in-flight task identifiers.
 *
 * Admission is a single synchronous check-and-set on the event loop, so two
 * requests for the same task can never both observe "not in flight".
 */

/** Liveness marker for an admitted run. */
export interface TaskLease {
  runId: string;
  acquiredAt: string;
}

export class TaskRegistry {
  private readonly leases = new Map<string, TaskLease>();

  /** Register `runId` as the owner of `taskId`. Returns false if another run holds it. */
  tryAcquire(taskId: string, runId: string): boolean {
    if (this.leases.has(taskId)) {
      return false;
    }
    this.leases.set(taskId, { runId, acquiredAt: new Date().toISOString() });
    return true;
  }

  /** Release the task if `runId` owns it. Returns whether a lease was removed. */
  release(taskId: string, runId: string): boolean {
    const lease = this.leases.get(taskId);
    if (!lease || lease.runId !== runId) {
      return false;
    }
    this.leases.delete(taskId);
    return true;
  }

  isInFlight(taskId: string): boolean {
    return this.leases.has(taskId);
  }

  getLease(taskId: string): TaskLease | undefined {
    const lease = this.leases.get(taskId);
    return lease ? { ...lease } : undefined;
  }

  inFlightCount(): number {
    return this.leases.size;
  }
}
