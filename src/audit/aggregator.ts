/**
 * Per-namespace deduplication of resolved controllers.
 */

import { WORKLOAD_KINDS, type ResolvedController, type WorkloadKind } from "../types.js";

/**
 * One keyed collection per workload kind, keyed by controller name. Many pods
 * behind one controller produce a single entry; the first observation wins.
 *
 * Owned by a single namespace scan and never shared across scans.
 */
export class ControllerAggregator {
  private readonly byKind = new Map<WorkloadKind, Map<string, ResolvedController>>();

  /** Returns `true` when the controller had not been seen before. */
  observe(controller: ResolvedController): boolean {
    const bucket = this.bucket(controller.kind);
    if (bucket.has(controller.name)) return false;
    bucket.set(controller.name, controller);
    return true;
  }

  has(kind: WorkloadKind, name: string): boolean {
    return this.bucket(kind).has(name);
  }

  size(kind?: WorkloadKind): number {
    if (kind) return this.bucket(kind).size;
    let total = 0;
    for (const bucket of this.byKind.values()) total += bucket.size;
    return total;
  }

  /**
   * Yield every unique controller once and empty the collections.
   * Kinds follow WORKLOAD_KINDS; within a kind, first-seen order.
   */
  *drainAll(): Generator<ResolvedController> {
    for (const kind of WORKLOAD_KINDS) {
      const bucket = this.bucket(kind);
      const entries = [...bucket.values()];
      bucket.clear();
      yield* entries;
    }
  }

  private bucket(kind: WorkloadKind): Map<string, ResolvedController> {
    let bucket = this.byKind.get(kind);
    if (!bucket) {
      bucket = new Map();
      this.byKind.set(kind, bucket);
    }
    return bucket;
  }
}
