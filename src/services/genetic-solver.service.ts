/**
 * Genetic solver over placement order and rotation
 *
 * Each chromosome is decoded by the bottom-left placement evaluator; the
 * population evolves by tournament selection, order crossover and swap /
 * rotation mutation, keeping the single best individual unchanged.
 */
import { resolveNestingConfig } from '../config/nesting.config';
import { Polygon } from '../models/geometry.types';
import {
  Chromosome,
  GenerationReport,
  NestingConfig,
  NestingResult,
  Part,
  SolveResult
} from '../models/nesting.types';
import { createLogger } from '../utils/logger';
import { RandomSource, createSeededRandom, pickRandom, randomInt, shuffleArray } from '../utils/random';
import { NestingContext, createNestingContext, getPreparedPart } from './nesting-context.service';
import { NfpCache } from './nfp-cache.service';
import { NfpExecutor, createNfpExecutor } from './nfp-executor.service';
import { PLACEMENT_TOLERANCE, PlacementEvaluator, compareFitness } from './placement-evaluator.service';

const logger = createLogger('GA');

interface Scored {
  chromosome: Chromosome;
  result: NestingResult;
}

export interface SolveOptions {
  /** Shared executor; when omitted one is created from `config.workers` and closed afterwards. */
  executor?: NfpExecutor;
  /** Overrides the source derived from `config.seed`. */
  random?: RandomSource;
  onGeneration?: (report: GenerationReport) => void;
}

export interface GeneticRun {
  best: NestingResult;
  generations: number;
  improvements: number;
  history: GenerationReport[];
}

function isPerfect(result: NestingResult): boolean {
  return result.fitness.unplaced === 0 && result.fitness.wastedArea <= PLACEMENT_TOLERANCE;
}

export class GeneticSolver {
  constructor(
    private readonly context: NestingContext,
    private readonly config: NestingConfig,
    private readonly evaluator: PlacementEvaluator,
    private readonly random: RandomSource
  ) {}

  async run(onGeneration?: (report: GenerationReport) => void): Promise<GeneticRun> {
    const { populationSize, maxGenerations, stallGenerations } = this.config;
    logger.info(
      `Starting: ${this.context.instances.length} instances, pop=${populationSize}, gen=${maxGenerations}, mutation=${this.config.mutationRate}%`
    );

    let population = this.initialPopulation();
    let best: Scored | null = null;
    let improvements = 0;
    let stale = 0;
    const history: GenerationReport[] = [];

    for (let generation = 1; generation <= maxGenerations; generation++) {
      const results = await Promise.all(population.map(chromosome => this.evaluator.evaluate(chromosome)));
      const scored = population
        .map((chromosome, i): Scored => ({ chromosome, result: results[i] }))
        .sort((a, b) => compareFitness(a.result.fitness, b.result.fitness));

      const generationBest = scored[0];
      if (best === null || compareFitness(generationBest.result.fitness, best.result.fitness) < 0) {
        best = generationBest;
        improvements++;
        stale = 0;
        logger.debug(
          `Gen ${generation}: new best, ${best.result.fitness.unplaced} unplaced, ${(best.result.utilization * 100).toFixed(1)}% utilization`
        );
      } else {
        stale++;
      }

      const report: GenerationReport = {
        generation,
        generationBest: generationBest.result.fitness,
        bestSoFar: best.result.fitness,
        bestUtilization: best.result.utilization,
        meanUnplaced: results.reduce((sum, r) => sum + r.fitness.unplaced, 0) / results.length
      };
      history.push(report);
      onGeneration?.(report);

      if (isPerfect(best.result)) {
        logger.debug(`Gen ${generation}: perfect fit, stopping early`);
        break;
      }
      if (stallGenerations > 0 && stale >= stallGenerations) {
        logger.debug(`Gen ${generation}: no improvement for ${stale} generations, stopping`);
        break;
      }
      if (generation < maxGenerations) {
        population = this.nextGeneration(scored);
      }
    }

    if (best === null) {
      throw new Error('genetic solver ran no generations');
    }

    const final = await this.evaluator.evaluate(best.chromosome);
    logger.info(
      `Complete: ${final.placements.length}/${this.context.instances.length} placed, ${(final.utilization * 100).toFixed(1)}% utilization (${improvements} improvements)`
    );

    return { best: final, generations: history.length, improvements, history };
  }

  /**
   * Largest-first greedy individual, then random ones.
   */
  initialPopulation(): Chromosome[] {
    const instances = this.context.instances;
    const byArea = [...instances].sort(
      (a, b) => getPreparedPart(this.context, b.partId).area - getPreparedPart(this.context, a.partId).area
    );
    const population: Chromosome[] = [
      {
        order: byArea.map(instance => instance.index),
        rotations: byArea.map(instance => getPreparedPart(this.context, instance.partId).rotations[0])
      }
    ];

    while (population.length < this.config.populationSize) {
      const order = shuffleArray(this.random, instances.map(instance => instance.index));
      population.push({ order, rotations: order.map(index => this.randomRotation(index)) });
    }
    return population;
  }

  private randomRotation(instanceIndex: number): number {
    const instance = this.context.instances[instanceIndex];
    return pickRandom(this.random, getPreparedPart(this.context, instance.partId).rotations);
  }

  private nextGeneration(scored: Scored[]): Chromosome[] {
    const elite = scored[0].chromosome;
    const next: Chromosome[] = [{ order: [...elite.order], rotations: [...elite.rotations] }];

    while (next.length < this.config.populationSize) {
      const mother = this.tournamentSelect(scored);
      const father = this.tournamentSelect(scored);
      const [first, second] = this.crossover(mother, father);
      next.push(this.mutate(first));
      if (next.length < this.config.populationSize) {
        next.push(this.mutate(second));
      }
    }
    return next;
  }

  /**
   * `scored` is sorted best first, so the smallest drawn index wins.
   */
  private tournamentSelect(scored: Scored[]): Chromosome {
    let winner = randomInt(this.random, scored.length);
    for (let i = 1; i < this.config.tournamentSize; i++) {
      winner = Math.min(winner, randomInt(this.random, scored.length));
    }
    return scored[winner].chromosome;
  }

  /**
   * Cut-point order crossover: the head of one parent followed by the
   * remaining instances in the other parent's order. Each instance keeps the
   * rotation of either parent.
   */
  crossover(mother: Chromosome, father: Chromosome): [Chromosome, Chromosome] {
    const length = mother.order.length;
    const cut = length > 1 ? 1 + randomInt(this.random, length - 1) : length;

    const rotationOf = (parent: Chromosome) => {
      const map = new Map<number, number>();
      parent.order.forEach((index, k) => map.set(index, parent.rotations[k]));
      return map;
    };
    const motherRotations = rotationOf(mother);
    const fatherRotations = rotationOf(father);

    const child = (head: Chromosome, tail: Chromosome): Chromosome => {
      const order = head.order.slice(0, cut);
      const taken = new Set(order);
      for (const index of tail.order) {
        if (!taken.has(index)) order.push(index);
      }
      const rotations = order.map(index => {
        const source = this.random() < 0.5 ? motherRotations : fatherRotations;
        return source.get(index) ?? this.randomRotation(index);
      });
      return { order, rotations };
    };

    return [child(mother, father), child(father, mother)];
  }

  /**
   * Per position, with `mutationRate` percent probability each: swap with the
   * next position, and resample the rotation.
   */
  mutate(chromosome: Chromosome): Chromosome {
    const order = [...chromosome.order];
    const rotations = [...chromosome.rotations];
    const rate = this.config.mutationRate;

    for (let k = 0; k < order.length; k++) {
      if (k + 1 < order.length && this.random() * 100 < rate) {
        [order[k], order[k + 1]] = [order[k + 1], order[k]];
        [rotations[k], rotations[k + 1]] = [rotations[k + 1], rotations[k]];
      }
      if (this.random() * 100 < rate) {
        rotations[k] = this.randomRotation(order[k]);
      }
    }
    return { order, rotations };
  }
}

/**
 * Run the genetic search and return the best result found.
 *
 * Every part outline is validated before the search starts; invalid geometry
 * or configuration throws. Parts that fit nowhere are reported as unplaced.
 */
export async function solve(
  parts: readonly Part[],
  container: Polygon,
  config: Partial<NestingConfig> = {},
  options: SolveOptions = {}
): Promise<SolveResult> {
  const resolved = resolveNestingConfig(config);
  const context = createNestingContext(parts, container, resolved);
  const random = options.random ?? createSeededRandom(resolved.seed);
  const executor = options.executor ?? createNfpExecutor(resolved.workers);
  const cache = new NfpCache();

  try {
    const evaluator = new PlacementEvaluator(context, cache, executor);
    const solver = new GeneticSolver(context, resolved, evaluator, random);
    const run = await solver.run(options.onGeneration);
    return {
      ...run.best,
      generations: run.generations,
      improvements: run.improvements,
      history: run.history,
      nfpComputations: cache.computations
    };
  } finally {
    if (!options.executor) {
      await executor.close();
    }
  }
}
