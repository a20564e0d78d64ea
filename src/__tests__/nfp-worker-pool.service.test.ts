import type { Worker } from 'worker_threads';
import { NfpRequest } from '../models/nesting.types';
import { NfpWorkerPool } from '../services/nfp-worker-pool.service';
import { rectangle } from './helpers/shape-generator.helper';

// every Worker the pool starts, in spawn order
const mockSpawned: Worker[] = [];

jest.mock('worker_threads', () => {
  const actual = jest.requireActual<typeof import('worker_threads')>('worker_threads');
  class TrackedWorker extends actual.Worker {
    constructor(...args: ConstructorParameters<typeof actual.Worker>) {
      super(...args);
      mockSpawned.push(this);
    }
  }
  return { ...actual, Worker: TrackedWorker };
});

const request: NfpRequest = {
  stationary: rectangle(20, 10),
  orbiting: rectangle(10, 10),
  stationaryRotation: 0,
  orbitingRotation: 0,
  mode: 'outer'
};

describe('NfpWorkerPool worker restarts', () => {
  let pool: NfpWorkerPool;

  beforeEach(() => {
    mockSpawned.length = 0;
    pool = new NfpWorkerPool(1);
  });

  afterEach(async () => {
    await pool.close();
  });

  it('replaces a stopped worker and keeps answering', async () => {
    const before = await pool.compute(request);
    await mockSpawned[0].terminate();

    expect(mockSpawned).toHaveLength(2);
    expect(pool.size).toBe(1);
    await expect(pool.compute(request)).resolves.toEqual(before);
  }, 30000);

  it('rejects the requests a stopped worker still held', async () => {
    const outcome = expect(pool.compute(request)).rejects.toThrow('NFP worker 0 stopped');
    await mockSpawned[0].terminate();

    await outcome;
    await expect(pool.compute(request)).resolves.toMatchObject({ innerFit: null });
  }, 30000);
});
