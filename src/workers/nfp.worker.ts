/**
 * Worker thread computing no-fit and inner-fit polygons
 * Keeps CPU-bound geometry off the main event loop
 */
import { parentPort } from 'worker_threads';
import { SerializedError, serializeError } from '../errors/nesting.errors';
import { NfpRequest, NfpResult } from '../models/nesting.types';
import { computeNFP } from '../services/nfp-calculator.service';

export interface NfpWorkerRequest {
  id: number;
  request: NfpRequest;
}

export interface NfpWorkerResult {
  id: number;
  type: 'result';
  result: NfpResult;
}

export interface NfpWorkerError {
  id: number;
  type: 'error';
  error: SerializedError;
}

export type NfpWorkerResponse = NfpWorkerResult | NfpWorkerError;

const port = parentPort;
if (port) {
  port.on('message', (message: NfpWorkerRequest) => {
    const { id, request } = message;
    let response: NfpWorkerResponse;
    try {
      const result = computeNFP(
        request.stationary,
        request.orbiting,
        request.stationaryRotation,
        request.orbitingRotation,
        request.mode
      );
      response = { id, type: 'result', result };
    } catch (error) {
      response = { id, type: 'error', error: serializeError(error) };
    }
    port.postMessage(response);
  });
}
