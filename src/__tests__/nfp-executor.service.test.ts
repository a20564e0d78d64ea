import { NFPError } from '../errors/nesting.errors';
import { NfpRequest } from '../models/nesting.types';
import { InlineNfpExecutor, createNfpExecutor } from '../services/nfp-executor.service';
import { NfpWorkerPool } from '../services/nfp-worker-pool.service';
import { rectangle } from './helpers/shape-generator.helper';

const outerRequest: NfpRequest = {
  stationary: rectangle(20, 10),
  orbiting: rectangle(10, 10),
  stationaryRotation: 0,
  orbitingRotation: 0,
  mode: 'outer'
};

const oversizedRequest: NfpRequest = {
  stationary: rectangle(100, 50),
  orbiting: rectangle(120, 10),
  stationaryRotation: 0,
  orbitingRotation: 0,
  mode: 'inner'
};

describe('NFP executors', () => {
  it('creates an inline executor for zero workers', async () => {
    const executor = createNfpExecutor(0);

    expect(executor).toBeInstanceOf(InlineNfpExecutor);
    await executor.close();
  });

  it('computes in-process', async () => {
    const result = await new InlineNfpExecutor().compute(outerRequest);

    expect(result.noFit).toHaveLength(1);
    expect(result.noFit[0]).toHaveLength(4);
  });

  it('rejects with NFPError in-process', async () => {
    await expect(new InlineNfpExecutor().compute(oversizedRequest)).rejects.toThrow(NFPError);
  });

  describe('NfpWorkerPool', () => {
    let pool: NfpWorkerPool;

    beforeAll(() => {
      pool = new NfpWorkerPool(2);
    });

    afterAll(async () => {
      await pool.close();
    });

    it('returns the same result as the inline executor', async () => {
      const [fromWorker, inline] = await Promise.all([
        pool.compute(outerRequest),
        new InlineNfpExecutor().compute(outerRequest)
      ]);

      expect(fromWorker).toEqual(inline);
    }, 30000);

    it('rehydrates NFPError from the worker', async () => {
      await expect(pool.compute(oversizedRequest)).rejects.toBeInstanceOf(NFPError);
    }, 30000);

    it('refuses work after closing', async () => {
      const closed = new NfpWorkerPool(1);
      await closed.close();

      await expect(closed.compute(outerRequest)).rejects.toThrow('NFP worker pool is closed');
    });
  });
});
