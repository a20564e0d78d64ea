import { resolveNestingConfig } from '../config/nesting.config';
import { ConfigError, GeometryError } from '../errors/nesting.errors';
import { Polygon } from '../models/geometry.types';
import {
  GenerationReport,
  NestingConfig,
  Part,
  SolveResult,
  UnplacedPart
} from '../models/nesting.types';
import { createLogger } from '../utils/logger';
import { getBoundingBox, polygonArea, rectanglePolygon, rotatePoints } from './geometry.service';
import { solve } from './genetic-solver.service';
import { NfpExecutor } from './nfp-executor.service';
import { evenlySpacedRotations } from './rotation-config.service';

const logger = createLogger('Nesting');

export interface PartQuantity {
  partId: string;
  requested: number;
  placed: number;
}

export interface NestReport {
  result: SolveResult;
  quantities: PartQuantity[];
  totalInstances: number;
  placedInstances: number;
  message: string;
}

export interface SheetResult {
  sheetIndex: number;
  result: SolveResult;
}

export interface MultiSheetResult {
  sheets: SheetResult[];
  /** Placed area over the area of the sheets used, 0..1 */
  totalUtilization: number;
  quantities: PartQuantity[];
  unplaced: UnplacedPart[];
  message: string;
}

export interface SheetDimensions {
  width: number;
  height: number;
  units: string;
}

export interface QuantityAttempt {
  quantity: number;
  placed: number;
}

export interface MaxQuantityResult {
  success: boolean;
  message: string;
  sheet: SheetDimensions;
  estimatedMax: number;
  attemptedQuantity: number;
  actualQuantity: number;
  /** actualQuantity as a percentage of the grid estimate. */
  efficiency: number;
  attempts: QuantityAttempt[];
  result: SolveResult | null;
}

export interface MaxQuantityOptions {
  maxAttempts?: number;
  units?: string;
  config?: Partial<NestingConfig>;
}

export interface SheetSize {
  width: number;
  height: number;
  name?: string;
  units?: string;
}

export interface SheetReportEntry {
  name: string;
  sheet: SheetSize;
  actualQuantity: number;
  estimatedMax: number;
  efficiency: number;
  utilization: number;
  partsPerUnitArea: number;
  sheetArea: number;
  result: MaxQuantityResult;
}

export interface SheetOptimizationReport {
  results: SheetReportEntry[];
  bestSheet: string;
  best: SheetReportEntry;
}

export interface NestingRunOptions {
  onGeneration?: (report: GenerationReport) => void;
}

const MAX_QUANTITY_FACTORS = [1.0, 0.9, 0.8, 0.7, 0.6, 0.5];
const MAX_QUANTITY_PROBES = [1, 2, 4, 8, 16, 32];
const MAX_QUANTITY_PART_ID = 'part';

function countPlaced(result: SolveResult, partId: string): number {
  return result.placements.filter(p => p.partId === partId).length;
}

/**
 * Candidate quantities for a max-quantity search, largest first.
 */
export function maxQuantityCandidates(estimatedMax: number, maxAttempts: number): number[] {
  const quantities: number[] = [];
  for (const factor of MAX_QUANTITY_FACTORS) {
    const quantity = Math.max(1, Math.floor(estimatedMax * factor));
    if (!quantities.includes(quantity)) quantities.push(quantity);
  }
  for (const quantity of MAX_QUANTITY_PROBES) {
    if (!quantities.includes(quantity) && quantity <= estimatedMax) quantities.push(quantity);
  }
  return quantities.sort((a, b) => b - a).slice(0, maxAttempts);
}

export class NestingService {
  constructor(private readonly executor?: NfpExecutor) {}

  createStandardSheet(width: number, height: number): Polygon {
    if (!Number.isFinite(width) || !Number.isFinite(height) || width <= 0 || height <= 0) {
      throw new GeometryError(`sheet dimensions must be positive (got ${width}×${height})`);
    }
    return rectanglePolygon(width, height);
  }

  /**
   * Nest every requested copy onto one container.
   */
  async nest(
    parts: readonly Part[],
    container: Polygon,
    config: Partial<NestingConfig> = {},
    options: NestingRunOptions = {}
  ): Promise<NestReport> {
    const result = await solve(parts, container, config, { executor: this.executor, onGeneration: options.onGeneration });
    const quantities = parts.map(part => ({
      partId: part.id,
      requested: part.quantity ?? 1,
      placed: countPlaced(result, part.id)
    }));
    const totalInstances = quantities.reduce((sum, q) => sum + q.requested, 0);
    const placedInstances = result.placements.length;

    return {
      result,
      quantities,
      totalInstances,
      placedInstances,
      message: `Placed ${placedInstances} out of ${totalInstances} part instances`
    };
  }

  /**
   * Fill sheets one after another with the copies earlier sheets left over.
   * Stops when everything is placed, `maxSheets` is reached, or a sheet
   * takes nothing.
   */
  async nestMultiSheet(
    parts: readonly Part[],
    sheet: Polygon,
    maxSheets: number,
    config: Partial<NestingConfig> = {},
    options: NestingRunOptions = {}
  ): Promise<MultiSheetResult> {
    if (!Number.isInteger(maxSheets) || maxSheets < 1) {
      throw new ConfigError('maxSheets', `must be an integer >= 1 (got ${maxSheets})`);
    }

    // copy numbers still waiting for a sheet, per part
    const remaining = new Map<string, number[]>(
      parts.map(part => [part.id, Array.from({ length: part.quantity ?? 1 }, (_, i) => i + 1)])
    );
    const lastReason = new Map<string, UnplacedPart['reason']>();
    const sheets: SheetResult[] = [];

    for (let sheetIndex = 0; sheetIndex < maxSheets; sheetIndex++) {
      const batch = parts
        .filter(part => (remaining.get(part.id) ?? []).length > 0)
        .map(part => ({ ...part, quantity: (remaining.get(part.id) ?? []).length }));
      if (batch.length === 0) break;

      logger.info(`Sheet ${sheetIndex + 1}: nesting ${batch.reduce((sum, p) => sum + p.quantity, 0)} instances`);
      const result = await solve(batch, sheet, config, { executor: this.executor, onGeneration: options.onGeneration });
      if (result.placements.length === 0) {
        result.unplaced.forEach(u => lastReason.set(u.partId, u.reason));
        logger.info(`Sheet ${sheetIndex + 1}: nothing fits, stopping`);
        break;
      }

      // renumber this run's copies back to the caller's copy numbers
      const placedCopies = new Map<string, Set<number>>();
      const placements = result.placements.map(placement => {
        const copies = remaining.get(placement.partId) ?? [];
        const copy = copies[placement.copy - 1] ?? placement.copy;
        const placed = placedCopies.get(placement.partId) ?? new Set<number>();
        placed.add(copy);
        placedCopies.set(placement.partId, placed);
        return { ...placement, copy, instanceId: `${placement.partId}_${copy}`, sheetIndex };
      });
      placedCopies.forEach((copies, partId) => {
        remaining.set(partId, (remaining.get(partId) ?? []).filter(copy => !copies.has(copy)));
      });
      result.unplaced.forEach(u => lastReason.set(u.partId, u.reason));

      sheets.push({ sheetIndex, result: { ...result, placements } });
    }

    const quantities = parts.map(part => ({
      partId: part.id,
      requested: part.quantity ?? 1,
      placed: (part.quantity ?? 1) - (remaining.get(part.id) ?? []).length
    }));
    const unplaced: UnplacedPart[] = [];
    remaining.forEach((copies, partId) => {
      for (const copy of copies) {
        unplaced.push({ instanceId: `${partId}_${copy}`, partId, reason: lastReason.get(partId) ?? 'NO_FEASIBLE_POSITION' });
      }
    });

    const sheetArea = polygonArea(sheet);
    const placedArea = sheets.reduce((sum, s) => sum + s.result.placedArea, 0);
    const totalUtilization = sheets.length > 0 ? placedArea / (sheetArea * sheets.length) : 0;
    const placedInstances = quantities.reduce((sum, q) => sum + q.placed, 0);
    const totalInstances = quantities.reduce((sum, q) => sum + q.requested, 0);

    return {
      sheets,
      totalUtilization,
      quantities,
      unplaced,
      message: `Placed ${placedInstances} out of ${totalInstances} part instances on ${sheets.length} sheet(s)`
    };
  }

  /**
   * Grid estimate: the best rows × columns count of the part's bounding box
   * (plus spacing) over the allowed rotations.
   */
  estimateMaxQuantity(
    part: Polygon,
    sheetWidth: number,
    sheetHeight: number,
    spacing: number = 0,
    rotations: readonly number[] = [0, 90, 180, 270]
  ): number {
    let best = 0;
    for (const angle of rotations) {
      const bounds = getBoundingBox(rotatePoints(part.points, angle));
      const width = bounds.width + spacing;
      const height = bounds.height + spacing;
      if (width <= 0 || height <= 0 || width > sheetWidth || height > sheetHeight) continue;
      best = Math.max(best, Math.floor(sheetWidth / width) * Math.floor(sheetHeight / height));
    }
    return best;
  }

  /**
   * Nest as many copies of one part as possible on a rectangular sheet, trying
   * descending candidate quantities and stopping at the first that fits
   * completely.
   */
  async nestMaxQuantity(
    part: Polygon,
    sheetWidth: number,
    sheetHeight: number,
    options: MaxQuantityOptions = {}
  ): Promise<MaxQuantityResult> {
    const maxAttempts = options.maxAttempts ?? 3;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new ConfigError('maxAttempts', `must be an integer >= 1 (got ${maxAttempts})`);
    }
    const units = options.units ?? 'mm';
    const config = resolveNestingConfig(options.config);
    const sheet = this.createStandardSheet(sheetWidth, sheetHeight);
    const dimensions: SheetDimensions = { width: sheetWidth, height: sheetHeight, units };

    const estimatedMax = this.estimateMaxQuantity(
      part,
      sheetWidth,
      sheetHeight,
      config.spacing,
      evenlySpacedRotations(config.rotationCount)
    );
    const candidates = maxQuantityCandidates(estimatedMax, maxAttempts);
    logger.info(`Estimated maximum quantity ${estimatedMax}, testing ${candidates.join(', ')}`);

    let best: SolveResult | null = null;
    let bestQuantity = 0;
    let attemptedQuantity = 0;
    const attempts: QuantityAttempt[] = [];

    for (const quantity of candidates) {
      const result = await solve([{ id: MAX_QUANTITY_PART_ID, polygon: part, quantity }], sheet, config, {
        executor: this.executor
      });
      const placed = result.placements.length;
      attempts.push({ quantity, placed });
      logger.info(`Placed ${placed} out of ${quantity}`);

      if (placed > bestQuantity) {
        best = result;
        bestQuantity = placed;
        attemptedQuantity = quantity;
      }
      if (placed === quantity) break;
    }

    if (best === null) {
      return {
        success: false,
        message: 'Could not fit any parts in the sheet',
        sheet: dimensions,
        estimatedMax,
        attemptedQuantity: 0,
        actualQuantity: 0,
        efficiency: 0,
        attempts,
        result: null
      };
    }

    return {
      success: true,
      message: `Nested ${bestQuantity} copies in a ${sheetWidth}×${sheetHeight} ${units} sheet`,
      sheet: dimensions,
      estimatedMax,
      attemptedQuantity,
      actualQuantity: bestQuantity,
      efficiency: estimatedMax > 0 ? (bestQuantity / estimatedMax) * 100 : 0,
      attempts,
      result: best
    };
  }

  /**
   * Run a max-quantity search per sheet size; the best sheet holds the most
   * parts per unit of sheet area.
   */
  async createSheetOptimizationReport(
    part: Polygon,
    sheetSizes: readonly SheetSize[],
    options: Omit<MaxQuantityOptions, 'units'> = {}
  ): Promise<SheetOptimizationReport> {
    if (sheetSizes.length === 0) {
      throw new ConfigError('sheetSizes', 'at least one sheet size is required');
    }

    const results: SheetReportEntry[] = [];
    for (const sheet of sheetSizes) {
      const name = sheet.name ?? `${sheet.width}×${sheet.height}`;
      logger.info(`Testing sheet ${name}`);
      const result = await this.nestMaxQuantity(part, sheet.width, sheet.height, { ...options, units: sheet.units ?? 'mm' });
      const sheetArea = sheet.width * sheet.height;
      results.push({
        name,
        sheet,
        actualQuantity: result.actualQuantity,
        estimatedMax: result.estimatedMax,
        efficiency: result.efficiency,
        utilization: result.result?.utilization ?? 0,
        partsPerUnitArea: sheetArea > 0 ? result.actualQuantity / sheetArea : 0,
        sheetArea,
        result
      });
    }

    const best = results.reduce((a, b) => (b.partsPerUnitArea > a.partsPerUnitArea ? b : a));
    return { results, bestSheet: best.name, best };
  }
}
