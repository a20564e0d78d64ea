import { NFPError } from '../errors/nesting.errors';
import { NfpKey, NfpResult } from '../models/nesting.types';
import { NfpCache } from '../services/nfp-cache.service';

const key = (overrides: Partial<NfpKey> = {}): NfpKey => ({
  stationaryId: 'a',
  stationaryRotation: 0,
  orbitingId: 'b',
  orbitingRotation: 90,
  mode: 'outer',
  ...overrides
});

const result = (): NfpResult => ({
  innerFit: null,
  noFit: [
    [
      { x: 0, y: 0 },
      { x: 1, y: 0 },
      { x: 1, y: 1 }
    ]
  ]
});

describe('NfpCache', () => {
  let cache: NfpCache;

  beforeEach(() => {
    cache = new NfpCache();
  });

  it('formats keys from ids, rotations and mode', () => {
    expect(NfpCache.key(key())).toBe('a:0-b:90-outer');
  });

  it('computes a key once and returns the same result object on a hit', async () => {
    const compute = jest.fn(async () => result());

    const first = await cache.resolve(key(), compute);
    const second = await cache.resolve(key(), compute);

    expect(second).toBe(first);
    expect(compute).toHaveBeenCalledTimes(1);
    expect(cache.computations).toBe(1);
    expect(cache.size).toBe(1);
  });

  it('shares one computation between concurrent misses', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });
    const compute = jest.fn(async () => {
      await gate;
      return result();
    });

    const pending = [cache.resolve(key(), compute), cache.resolve(key(), compute), cache.resolve(key(), compute)];
    release();
    const [a, b, c] = await Promise.all(pending);

    expect(compute).toHaveBeenCalledTimes(1);
    expect(b).toBe(a);
    expect(c).toBe(a);
  });

  it('keeps NFP(A, B) and NFP(B, A) apart', async () => {
    const compute = jest.fn(async () => result());

    await cache.resolve(key(), compute);
    await cache.resolve(key({ stationaryId: 'b', orbitingId: 'a' }), compute);
    await cache.resolve(key({ mode: 'inner' }), compute);

    expect(compute).toHaveBeenCalledTimes(3);
    expect(cache.computations).toBe(3);
  });

  it('remembers NFPError outcomes', async () => {
    const compute = jest.fn(async (): Promise<NfpResult> => {
      throw new NFPError('does not fit');
    });

    await expect(cache.resolve(key(), compute)).rejects.toThrow(NFPError);
    await expect(cache.resolve(key(), compute)).rejects.toThrow('does not fit');

    expect(compute).toHaveBeenCalledTimes(1);
    expect(cache.has(key())).toBe(true);
  });

  it('evicts other failures so the next lookup retries', async () => {
    const compute = jest
      .fn<Promise<NfpResult>, []>()
      .mockRejectedValueOnce(new Error('worker crashed'))
      .mockResolvedValueOnce(result());

    await expect(cache.resolve(key(), compute)).rejects.toThrow('worker crashed');
    expect(cache.has(key())).toBe(false);

    await expect(cache.resolve(key(), compute)).resolves.toEqual(result());
    expect(compute).toHaveBeenCalledTimes(2);
    expect(cache.computations).toBe(2);
  });

  it('clears all entries', async () => {
    await cache.resolve(key(), async () => result());
    cache.clear();

    expect(cache.size).toBe(0);
  });
});
