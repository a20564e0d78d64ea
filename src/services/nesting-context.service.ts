import { ConfigError, GeometryError } from '../errors/nesting.errors';
import { Point, Polygon } from '../models/geometry.types';
import { Part } from '../models/nesting.types';
import {
  assertPolygon,
  ensureCounterClockwise,
  isConvex,
  offsetPolygon,
  polygonArea,
  simplifyRing
} from './geometry.service';
import { evenlySpacedRotations } from './rotation-config.service';

/** Stationary id of the container in NFP keys. */
export const CONTAINER_ID = '#container';

export interface PartInstance {
  index: number;
  instanceId: string;
  partId: string;
  copy: number;
}

export interface PreparedPart {
  part: Part;
  /** Outline used for fit tests: simplified, then inflated by half the spacing. */
  shape: Polygon;
  /** Area of the original outline. */
  area: number;
  rotations: number[];
}

export interface NestingContext {
  parts: Map<string, PreparedPart>;
  instances: PartInstance[];
  container: Polygon;
  containerArea: number;
  containerConvex: boolean;
  spacing: number;
}

export interface ContextOptions {
  spacing: number;
  rotationCount: number;
  curveTolerance: number;
}

/**
 * One instance per requested copy, ids `<partId>_<copy>` with copies counted
 * from 1.
 */
export function expandInstances(parts: readonly Part[]): PartInstance[] {
  const instances: PartInstance[] = [];
  for (const part of parts) {
    const quantity = part.quantity ?? 1;
    for (let copy = 1; copy <= quantity; copy++) {
      instances.push({ index: instances.length, instanceId: `${part.id}_${copy}`, partId: part.id, copy });
    }
  }
  return instances;
}

function validatePart(part: Part): void {
  if (typeof part.id !== 'string' || part.id.length === 0) {
    throw new ConfigError('parts', 'every part needs a non-empty id');
  }
  if (part.id === CONTAINER_ID) {
    throw new ConfigError('parts', `part id "${CONTAINER_ID}" is reserved`);
  }

  const quantity = part.quantity ?? 1;
  if (!Number.isInteger(quantity) || quantity < 1) {
    throw new ConfigError('quantity', `part "${part.id}" quantity must be an integer >= 1 (got ${quantity})`);
  }

  if (part.rotations !== undefined) {
    if (part.rotations.length === 0 || part.rotations.some(r => !Number.isFinite(r))) {
      throw new ConfigError('rotations', `part "${part.id}" needs at least one finite rotation`);
    }
  }

  assertPolygon(part.polygon, `part "${part.id}"`);
  if (polygonArea(part.polygon) <= 0) {
    throw new GeometryError(`part "${part.id}": polygon has no area`);
  }
}

function prepareShape(polygon: Polygon, options: ContextOptions): Polygon {
  const points: Point[] = ensureCounterClockwise(simplifyRing(polygon.points, options.curveTolerance));
  return offsetPolygon({ points }, options.spacing / 2, 'miter');
}

/**
 * Validate inputs and precompute everything a run reads: instances, fit
 * outlines, areas and allowed rotations.
 */
export function createNestingContext(parts: readonly Part[], container: Polygon, options: ContextOptions): NestingContext {
  if (parts.length === 0) {
    throw new ConfigError('parts', 'at least one part is required');
  }

  assertPolygon(container, 'container');
  const containerArea = polygonArea(container);
  if (containerArea <= 0) {
    throw new GeometryError('container: polygon has no area');
  }

  const defaultRotations = evenlySpacedRotations(options.rotationCount);
  const prepared = new Map<string, PreparedPart>();
  for (const part of parts) {
    validatePart(part);
    if (prepared.has(part.id)) {
      throw new ConfigError('parts', `duplicate part id "${part.id}"`);
    }
    prepared.set(part.id, {
      part,
      shape: prepareShape(part.polygon, options),
      area: polygonArea(part.polygon),
      rotations: part.rotations ? [...part.rotations] : defaultRotations
    });
  }

  return {
    parts: prepared,
    instances: expandInstances(parts),
    container: { points: ensureCounterClockwise(container.points) },
    containerArea,
    containerConvex: isConvex(container.points),
    spacing: options.spacing
  };
}

export function getPreparedPart(context: NestingContext, partId: string): PreparedPart {
  const prepared = context.parts.get(partId);
  if (!prepared) {
    throw new ConfigError('parts', `unknown part id "${partId}"`);
  }
  return prepared;
}
