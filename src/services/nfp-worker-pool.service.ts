/**
 * NFP Worker Pool
 * Spreads NFP computations over worker threads
 */
import { Worker } from 'worker_threads';
import path from 'path';
import { deserializeError } from '../errors/nesting.errors';
import { NfpRequest, NfpResult } from '../models/nesting.types';
import { createLogger } from '../utils/logger';
import { NfpWorkerRequest, NfpWorkerResponse } from '../workers/nfp.worker';
import { NfpExecutor } from './nfp-executor.service';

const logger = createLogger('NfpWorkerPool');

interface PendingRequest {
  slot: number;
  resolve: (result: NfpResult) => void;
  reject: (error: Error) => void;
}

export class NfpWorkerPool implements NfpExecutor {
  private readonly workers: Worker[] = [];
  private readonly pending = new Map<number, PendingRequest>();
  private nextRequestId = 0;
  private nextWorker = 0;
  private closed = false;

  constructor(size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`worker pool size must be a positive integer (got ${size})`);
    }
    for (let i = 0; i < size; i++) {
      this.workers.push(this.spawn(i));
    }
    logger.info(`Started ${size} NFP workers`);
  }

  compute(request: NfpRequest): Promise<NfpResult> {
    if (this.closed) {
      return Promise.reject(new Error('NFP worker pool is closed'));
    }

    const id = this.nextRequestId++;
    const slot = this.nextWorker;
    const worker = this.workers[slot];
    this.nextWorker = (this.nextWorker + 1) % this.workers.length;

    return new Promise<NfpResult>((resolve, reject) => {
      this.pending.set(id, { slot, resolve, reject });
      const message: NfpWorkerRequest = { id, request };
      worker.postMessage(message);
    });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.failPending(new Error('NFP worker pool closed'));
    logger.info(`Terminating ${this.workers.length} NFP workers`);
    await Promise.all(this.workers.map(worker => worker.terminate()));
  }

  get size(): number {
    return this.workers.length;
  }

  /**
   * Start the worker for `slot`. A worker that dies while the pool is open
   * fails its own pending requests and is replaced in the same slot.
   */
  private spawn(slot: number): Worker {
    // compiled .js next to compiled services, or .ts sources under ts-node
    const extension = path.extname(__filename);
    const workerPath = path.join(__dirname, '../workers', `nfp.worker${extension}`);
    logger.debug(`Worker ${slot} path: ${workerPath}`);

    const worker = new Worker(workerPath, {
      execArgv: extension === '.ts' ? ['-r', 'ts-node/register'] : [],
      env: extension === '.ts' ? { ...process.env, TS_NODE_TRANSPILE_ONLY: 'true' } : process.env
    });

    worker.on('message', (message: NfpWorkerResponse) => {
      const request = this.pending.get(message.id);
      if (!request) return;
      this.pending.delete(message.id);
      if (message.type === 'result') {
        request.resolve(message.result);
      } else {
        request.reject(deserializeError(message.error));
      }
    });

    worker.on('error', error => {
      logger.error(`Worker ${slot} error:`, error);
      this.failPending(error, slot);
    });

    worker.on('exit', code => {
      if (this.closed) return;
      const error = new Error(`NFP worker ${slot} stopped with exit code ${code}`);
      logger.error(`${error.message}, restarting`);
      this.failPending(error, slot);
      this.workers[slot] = this.spawn(slot);
    });

    return worker;
  }

  private failPending(error: Error, slot?: number): void {
    this.pending.forEach((request, id) => {
      if (slot === undefined || request.slot === slot) {
        this.pending.delete(id);
        request.reject(error);
      }
    });
  }
}
