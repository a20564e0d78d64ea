import { NFPError } from '../errors/nesting.errors';
import { NfpKey, NfpResult } from '../models/nesting.types';

/**
 * Per-run NFP memo.
 *
 * The promise of a computation is stored before it settles, so concurrent
 * lookups of a missing key share one computation. A hit returns the same
 * promise, hence the same result object. NFPError outcomes are remembered;
 * any other failure evicts the entry so a later lookup retries.
 */
export class NfpCache {
  private readonly entries = new Map<string, Promise<NfpResult>>();
  private computed = 0;

  static key(key: NfpKey): string {
    return `${key.stationaryId}:${key.stationaryRotation}-${key.orbitingId}:${key.orbitingRotation}-${key.mode}`;
  }

  resolve(key: NfpKey, compute: () => Promise<NfpResult>): Promise<NfpResult> {
    const id = NfpCache.key(key);
    const cached = this.entries.get(id);
    if (cached) {
      return cached;
    }

    this.computed++;
    const pending = Promise.resolve()
      .then(compute)
      .catch((error: unknown) => {
        if (!(error instanceof NFPError)) {
          this.entries.delete(id);
        }
        throw error;
      });
    this.entries.set(id, pending);
    return pending;
  }

  has(key: NfpKey): boolean {
    return this.entries.has(NfpCache.key(key));
  }

  /** Number of computations started, hits excluded. */
  get computations(): number {
    return this.computed;
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
