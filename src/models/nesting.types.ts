import { BoundingBox, Point, Polygon, Ring } from './geometry.types';

export interface Part {
  id: string;
  polygon: Polygon;
  /** Number of copies to place. Defaults to 1. */
  quantity?: number;
  /** Allowed rotation angles in degrees; overrides the run's evenly spaced set. */
  rotations?: number[];
}

export interface NestingConfig {
  populationSize: number;
  maxGenerations: number;
  rotationCount: number;
  /** Percentage in [0, 100]. */
  mutationRate: number;
  spacing: number;
  tournamentSize: number;
  /** Stop after this many generations without a new best; 0 disables. */
  stallGenerations: number;
  seed?: number;
  /** Simplification tolerance applied to incoming outlines; 0 disables. */
  curveTolerance: number;
  /** NFP worker threads; 0 computes in-process. */
  workers: number;
}

export interface Chromosome {
  /** Permutation of part-instance indices. */
  order: number[];
  /** rotations[k] is the angle applied to instance order[k]. */
  rotations: number[];
}

export interface Placement {
  instanceId: string;
  partId: string;
  copy: number;
  rotation: number;
  /** Translation applied to the part rotated about the origin. */
  x: number;
  y: number;
  sheetIndex: number;
  polygon: Point[];
}

export type UnplacedReason = 'NO_VALID_FIT' | 'NO_FEASIBLE_POSITION';

export interface UnplacedPart {
  instanceId: string;
  partId: string;
  reason: UnplacedReason;
}

export interface Fitness {
  unplaced: number;
  wastedArea: number;
}

export interface NestingResult {
  placements: Placement[];
  unplaced: UnplacedPart[];
  placedArea: number;
  containerArea: number;
  /** placedArea / containerArea, 0..1 */
  utilization: number;
  envelope: BoundingBox | null;
  fitness: Fitness;
  chromosome: Chromosome;
}

export interface GenerationReport {
  generation: number;
  generationBest: Fitness;
  bestSoFar: Fitness;
  bestUtilization: number;
  meanUnplaced: number;
}

export interface SolveResult extends NestingResult {
  generations: number;
  improvements: number;
  history: GenerationReport[];
  nfpComputations: number;
}

export type NfpMode = 'outer' | 'inner';

export interface NfpKey {
  stationaryId: string;
  stationaryRotation: number;
  orbitingId: string;
  orbitingRotation: number;
  mode: NfpMode;
}

export interface NfpResult {
  /** Locus of valid reference positions inside the container (inner mode only). */
  innerFit: Ring | null;
  /** Outer no-fit loops (outer mode only). */
  noFit: Ring[];
}

export interface NfpRequest {
  stationary: Polygon;
  orbiting: Polygon;
  stationaryRotation: number;
  orbitingRotation: number;
  mode: NfpMode;
}
