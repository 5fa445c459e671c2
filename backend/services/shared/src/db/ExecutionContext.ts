// backend/services/shared/src/db/ExecutionContext.ts
/**
 * Purpose:
 * - Identity + liveness of the runtime a connection and its lock belong to.
 * - A Node process has a single event loop, so the context is explicit: a
 *   generation counter and a closed flag that the host drives.
 *
 * Lifecycle:
 * - renew(): a new generation begins (e.g., serverless invocation whose
 *   process state may be stale). Handles and locks from older generations
 *   are discarded on next use.
 * - close(): the runtime is going away (shutdown). No new connections are
 *   opened until renew().
 */

export interface ExecutionContextSnapshot {
  readonly id: number;
  readonly closed: boolean;
}

export interface IExecutionContext {
  snapshot(): ExecutionContextSnapshot;
}

export class ExecutionContext implements IExecutionContext {
  private generation = 1;
  private closed = false;

  public snapshot(): ExecutionContextSnapshot {
    return { id: this.generation, closed: this.closed };
  }

  public renew(): number {
    this.generation += 1;
    this.closed = false;
    return this.generation;
  }

  public close(): void {
    this.closed = true;
  }
}
