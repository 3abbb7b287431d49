/**
 * Resource Scope
 *
 * Collects release callbacks as resources are acquired and runs them in
 * reverse order. A release that throws is logged and the rest still run.
 */

type Entry = {
  label: string;
  release: () => void;
};

export class ResourceScope {
  private readonly entries: Entry[] = [];

  /**
   * Register a resource for release and hand it back.
   */
  adopt<T>(label: string, resource: T, release: (resource: T) => void): T {
    this.entries.push({ label, release: () => release(resource) });
    return resource;
  }

  /** Number of resources still held */
  get size(): number {
    return this.entries.length;
  }

  /**
   * Release everything held, newest first. Safe to call more than once.
   */
  releaseAll(): void {
    let entry = this.entries.pop();
    while (entry) {
      try {
        entry.release();
      } catch (err) {
        console.error(`[Resources] Failed to release ${entry.label}:`, err);
      }
      entry = this.entries.pop();
    }
  }
}
