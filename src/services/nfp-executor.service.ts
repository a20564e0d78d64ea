import { NfpRequest, NfpResult } from '../models/nesting.types';
import { computeNFP } from './nfp-calculator.service';
import { NfpWorkerPool } from './nfp-worker-pool.service';

/**
 * Runs NFP computations, in-process or elsewhere.
 */
export interface NfpExecutor {
  compute(request: NfpRequest): Promise<NfpResult>;
  close(): Promise<void>;
}

export class InlineNfpExecutor implements NfpExecutor {
  async compute(request: NfpRequest): Promise<NfpResult> {
    return computeNFP(
      request.stationary,
      request.orbiting,
      request.stationaryRotation,
      request.orbitingRotation,
      request.mode
    );
  }

  async close(): Promise<void> {
    // nothing to release
  }
}

/**
 * `workers` threads, or the calling thread when 0.
 */
export function createNfpExecutor(workers: number): NfpExecutor {
  return workers > 0 ? new NfpWorkerPool(workers) : new InlineNfpExecutor();
}
