/**
 * Placement Evaluator
 *
 * Decodes a chromosome into placements with the bottom-left rule: each
 * instance, in chromosome order, goes to the lowest (then leftmost) point of
 * its inner-fit polygon that is not strictly inside the no-fit polygon of
 * any instance already placed.
 */
import { resolveNestingConfig } from '../config/nesting.config';
import { ConfigError, NFPError } from '../errors/nesting.errors';
import { BoundingBox, Point, Polygon, Ring } from '../models/geometry.types';
import {
  Chromosome,
  Fitness,
  NestingResult,
  NfpKey,
  NfpResult,
  Part,
  Placement,
  UnplacedPart
} from '../models/nesting.types';
import { createLogger } from '../utils/logger';
import {
  TOLERANCE,
  classifyPoint,
  getBoundingBox,
  rotatePoints,
  segmentIntersection,
  translatePoints
} from './geometry.service';
import { NfpCache } from './nfp-cache.service';
import { InlineNfpExecutor, NfpExecutor } from './nfp-executor.service';
import { CONTAINER_ID, NestingContext, PreparedPart, createNestingContext, getPreparedPart } from './nesting-context.service';

/** Slack for on-boundary tests on computed coordinates. */
export const PLACEMENT_TOLERANCE = 1e-6;

const logger = createLogger('PlacementEvaluator');

interface PlacedShape {
  prepared: PreparedPart;
  rotation: number;
  offset: Point;
}

/**
 * Lexicographic: fewer unplaced instances first, then less wasted area.
 */
export function compareFitness(a: Fitness, b: Fitness): number {
  if (a.unplaced !== b.unplaced) return a.unplaced - b.unplaced;
  if (Math.abs(a.wastedArea - b.wastedArea) <= PLACEMENT_TOLERANCE) return 0;
  return a.wastedArea - b.wastedArea;
}

function edges(ring: Ring): Array<[Point, Point]> {
  if (ring.length < 2) return [];
  return ring.map((p, i): [Point, Point] => [p, ring[(i + 1) % ring.length]]);
}

function orientation(a: Point, b: Point, c: Point): number {
  return (b.x - a.x) * (c.y - a.y) - (b.y - a.y) * (c.x - a.x);
}

function properlyCrosses(a1: Point, a2: Point, b1: Point, b2: Point): boolean {
  const o1 = orientation(a1, a2, b1);
  const o2 = orientation(a1, a2, b2);
  const o3 = orientation(b1, b2, a1);
  const o4 = orientation(b1, b2, a2);
  return (
    ((o1 > TOLERANCE && o2 < -TOLERANCE) || (o1 < -TOLERANCE && o2 > TOLERANCE)) &&
    ((o3 > TOLERANCE && o4 < -TOLERANCE) || (o3 < -TOLERANCE && o4 > TOLERANCE))
  );
}

export class PlacementEvaluator {
  constructor(
    private readonly context: NestingContext,
    private readonly cache: NfpCache = new NfpCache(),
    private readonly executor: NfpExecutor = new InlineNfpExecutor()
  ) {}

  /**
   * Deterministic for a given chromosome and context.
   */
  async evaluate(chromosome: Chromosome): Promise<NestingResult> {
    this.validateChromosome(chromosome);

    const placed: PlacedShape[] = [];
    const placements: Placement[] = [];
    const unplaced: UnplacedPart[] = [];

    for (let k = 0; k < chromosome.order.length; k++) {
      const instance = this.context.instances[chromosome.order[k]];
      const rotation = chromosome.rotations[k];
      const prepared = getPreparedPart(this.context, instance.partId);

      let innerFit: Ring;
      let noFits: Ring[];
      try {
        innerFit = await this.innerFit(prepared, rotation);
        noFits = (await Promise.all(placed.map(obstacle => this.noFit(obstacle, prepared, rotation)))).flat();
      } catch (error) {
        if (error instanceof NFPError) {
          logger.debug(`${instance.instanceId} at ${rotation}°: ${error.message}`);
          unplaced.push({ instanceId: instance.instanceId, partId: instance.partId, reason: 'NO_VALID_FIT' });
          continue;
        }
        throw error;
      }

      const shape = rotatePoints(prepared.shape.points, rotation);
      const position = this.findPosition(innerFit, noFits, shape);
      if (!position) {
        unplaced.push({ instanceId: instance.instanceId, partId: instance.partId, reason: 'NO_FEASIBLE_POSITION' });
        continue;
      }

      placed.push({ prepared, rotation, offset: position });
      placements.push({
        instanceId: instance.instanceId,
        partId: instance.partId,
        copy: instance.copy,
        rotation,
        x: position.x,
        y: position.y,
        sheetIndex: 0,
        polygon: translatePoints(rotatePoints(prepared.part.polygon.points, rotation), position.x, position.y)
      });
    }

    return this.buildResult(chromosome, placements, unplaced, placed);
  }

  private validateChromosome(chromosome: Chromosome): void {
    const count = this.context.instances.length;
    if (chromosome.order.length !== count || chromosome.rotations.length !== count) {
      throw new ConfigError('chromosome', `expected ${count} genes, got order ${chromosome.order.length} / rotations ${chromosome.rotations.length}`);
    }
    const seen = new Set<number>();
    for (const index of chromosome.order) {
      if (!Number.isInteger(index) || index < 0 || index >= count || seen.has(index)) {
        throw new ConfigError('chromosome', `order is not a permutation of 0..${count - 1}`);
      }
      seen.add(index);
    }
    if (chromosome.rotations.some(r => !Number.isFinite(r))) {
      throw new ConfigError('chromosome', 'rotations must be finite');
    }
  }

  private lookup(key: NfpKey, stationary: Polygon, orbiting: Polygon): Promise<NfpResult> {
    return this.cache.resolve(key, () =>
      this.executor.compute({
        stationary,
        orbiting,
        stationaryRotation: key.stationaryRotation,
        orbitingRotation: key.orbitingRotation,
        mode: key.mode
      })
    );
  }

  private async innerFit(prepared: PreparedPart, rotation: number): Promise<Ring> {
    const result = await this.lookup(
      {
        stationaryId: CONTAINER_ID,
        stationaryRotation: 0,
        orbitingId: prepared.part.id,
        orbitingRotation: rotation,
        mode: 'inner'
      },
      this.context.container,
      prepared.shape
    );
    if (!result.innerFit) {
      throw new NFPError(`no inner-fit polygon for part "${prepared.part.id}"`);
    }
    return result.innerFit;
  }

  private async noFit(obstacle: PlacedShape, prepared: PreparedPart, rotation: number): Promise<Ring[]> {
    const result = await this.lookup(
      {
        stationaryId: obstacle.prepared.part.id,
        stationaryRotation: obstacle.rotation,
        orbitingId: prepared.part.id,
        orbitingRotation: rotation,
        mode: 'outer'
      },
      obstacle.prepared.shape,
      prepared.shape
    );
    return result.noFit.map(loop => translatePoints(loop, obstacle.offset.x, obstacle.offset.y));
  }

  private findPosition(innerFit: Ring, noFits: Ring[], shape: Ring): Point | null {
    let best: Point | null = null;
    for (const candidate of this.candidates(innerFit, noFits, shape)) {
      if (!this.isFeasible(candidate, innerFit, noFits, shape)) continue;
      if (
        best === null ||
        candidate.y < best.y - PLACEMENT_TOLERANCE ||
        (Math.abs(candidate.y - best.y) <= PLACEMENT_TOLERANCE && candidate.x < best.x - PLACEMENT_TOLERANCE)
      ) {
        best = candidate;
      }
    }
    return best;
  }

  /**
   * Candidate offsets in a fixed order, so ties resolve to the first found.
   */
  private candidates(innerFit: Ring, noFits: Ring[], shape: Ring): Point[] {
    const candidates: Point[] = [...innerFit];
    noFits.forEach(loop => candidates.push(...loop));

    const fitEdges = edges(innerFit);
    for (const loop of noFits) {
      for (const [a1, a2] of edges(loop)) {
        for (const [b1, b2] of fitEdges) {
          const hit = segmentIntersection(a1, a2, b1, b2);
          if (hit) candidates.push(hit);
        }
      }
    }

    for (let i = 0; i < noFits.length; i++) {
      for (let j = i + 1; j < noFits.length; j++) {
        for (const [a1, a2] of edges(noFits[i])) {
          for (const [b1, b2] of edges(noFits[j])) {
            const hit = segmentIntersection(a1, a2, b1, b2);
            if (hit) candidates.push(hit);
          }
        }
      }
    }

    if (!this.context.containerConvex) {
      // the inner-fit polygon is the hull's; add vertex-to-vertex contacts with the real outline
      for (const c of this.context.container.points) {
        for (const b of shape) {
          candidates.push({ x: c.x - b.x, y: c.y - b.y });
        }
      }
    }

    return candidates;
  }

  private isFeasible(candidate: Point, innerFit: Ring, noFits: Ring[], shape: Ring): boolean {
    if (classifyPoint(candidate, innerFit, PLACEMENT_TOLERANCE) === 'outside') return false;
    if (noFits.some(loop => classifyPoint(candidate, loop, PLACEMENT_TOLERANCE) === 'inside')) return false;
    return this.context.containerConvex || this.fitsConcaveContainer(translatePoints(shape, candidate.x, candidate.y));
  }

  private fitsConcaveContainer(shape: Ring): boolean {
    const outline = this.context.container.points;
    const shapeEdges = edges(shape);
    for (const [a, b] of shapeEdges) {
      const midpoint = { x: (a.x + b.x) / 2, y: (a.y + b.y) / 2 };
      if (classifyPoint(a, outline, PLACEMENT_TOLERANCE) === 'outside') return false;
      if (classifyPoint(midpoint, outline, PLACEMENT_TOLERANCE) === 'outside') return false;
    }
    for (const [a1, a2] of shapeEdges) {
      for (const [b1, b2] of edges(outline)) {
        if (properlyCrosses(a1, a2, b1, b2)) return false;
      }
    }
    return true;
  }

  private buildResult(
    chromosome: Chromosome,
    placements: Placement[],
    unplaced: UnplacedPart[],
    placed: PlacedShape[]
  ): NestingResult {
    const placedArea = placed.reduce((sum, p) => sum + p.prepared.area, 0);
    const envelope: BoundingBox | null =
      placements.length > 0 ? getBoundingBox(placements.flatMap(p => p.polygon)) : null;
    const wastedArea = envelope
      ? Math.max(0, envelope.width * envelope.height - placedArea)
      : this.context.containerArea;

    return {
      placements,
      unplaced,
      placedArea,
      containerArea: this.context.containerArea,
      utilization: placedArea / this.context.containerArea,
      envelope,
      fitness: { unplaced: unplaced.length, wastedArea },
      chromosome: { order: [...chromosome.order], rotations: [...chromosome.rotations] }
    };
  }
}

/**
 * Evaluate a single chromosome with a private cache and in-process NFPs.
 */
export async function evaluate(
  chromosome: Chromosome,
  parts: readonly Part[],
  container: Polygon,
  spacing: number = 0
): Promise<NestingResult> {
  const config = resolveNestingConfig({ spacing });
  const context = createNestingContext(parts, container, config);
  return new PlacementEvaluator(context).evaluate(chromosome);
}
