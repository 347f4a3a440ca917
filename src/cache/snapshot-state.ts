import type { CachedSnapshot } from '../types/mirror.js';

function freezeSnapshot(snapshot: CachedSnapshot): Readonly<CachedSnapshot> {
  for (const result of snapshot.batch.results) Object.freeze(result);
  Object.freeze(snapshot.batch.results);
  Object.freeze(snapshot.batch);
  return Object.freeze(snapshot);
}

/**
 * Last published snapshot held in process memory. One writer replaces the
 * whole value; readers get the frozen reference and never the cell.
 */
export class SnapshotState {
  private snapshot: Readonly<CachedSnapshot> | null = null;

  current(): Readonly<CachedSnapshot> | null {
    return this.snapshot;
  }

  replace(next: CachedSnapshot): Readonly<CachedSnapshot> {
    const frozen = freezeSnapshot(structuredClone(next));
    this.snapshot = frozen;
    return frozen;
  }
}
