import type { CertificateCreationRequest } from '../types/request.js';

/**
 * Re-delivery of requests that cannot be handled yet. The host decides when;
 * the orchestrator only asks.
 */
export interface Scheduler {
  defer(request: CertificateCreationRequest): void;
}

/**
 * Keeps at most one pending request per correlation id: a newer request for
 * the same id supersedes the deferred one.
 */
export class InMemoryScheduler implements Scheduler {
  private readonly pending = new Map<string, CertificateCreationRequest>();

  defer(request: CertificateCreationRequest): void {
    this.pending.delete(request.correlationId);
    this.pending.set(request.correlationId, request);
  }

  /** Drop a deferred request, e.g. when its relation goes away. */
  cancel(correlationId: string): boolean {
    return this.pending.delete(correlationId);
  }

  get size(): number {
    return this.pending.size;
  }

  peek(): CertificateCreationRequest[] {
    return [...this.pending.values()];
  }

  /**
   * Hand every pending request to `handler` once, in deferral order.
   * Requests the handler defers again are kept for the next round.
   */
  async redeliver(handler: (request: CertificateCreationRequest) => Promise<unknown>): Promise<number> {
    const batch = [...this.pending.values()];
    this.pending.clear();
    for (const request of batch) {
      await handler(request);
    }
    return batch.length;
  }
}
