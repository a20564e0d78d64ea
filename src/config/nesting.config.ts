import { ConfigError } from '../errors/nesting.errors';
import { NestingConfig } from '../models/nesting.types';

export const DEFAULT_NESTING_CONFIG: Readonly<NestingConfig> = {
  populationSize: 10,
  maxGenerations: 50,
  rotationCount: 4,
  mutationRate: 10,
  spacing: 0,
  tournamentSize: 3,
  stallGenerations: 10,
  curveTolerance: 0,
  workers: 0
};

const CONFIG_KEYS: readonly (keyof NestingConfig)[] = [
  'populationSize',
  'maxGenerations',
  'rotationCount',
  'mutationRate',
  'spacing',
  'tournamentSize',
  'stallGenerations',
  'seed',
  'curveTolerance',
  'workers'
];

function requireInteger(field: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(field, `must be an integer >= ${min} (got ${value})`);
  }
}

function requireFiniteAtLeast(field: string, value: number, min: number): void {
  if (!Number.isFinite(value) || value < min) {
    throw new ConfigError(field, `must be a finite number >= ${min} (got ${value})`);
  }
}

/**
 * Merge a partial configuration over the defaults and validate every field.
 */
export function resolveNestingConfig(config: Partial<NestingConfig> = {}): NestingConfig {
  const resolved: NestingConfig = { ...DEFAULT_NESTING_CONFIG };
  for (const key of CONFIG_KEYS) {
    if (config[key] !== undefined) {
      Object.assign(resolved, { [key]: config[key] });
    }
  }

  requireInteger('populationSize', resolved.populationSize, 1);
  requireInteger('maxGenerations', resolved.maxGenerations, 1);
  requireInteger('rotationCount', resolved.rotationCount, 1);
  requireInteger('tournamentSize', resolved.tournamentSize, 1);
  requireInteger('stallGenerations', resolved.stallGenerations, 0);
  requireInteger('workers', resolved.workers, 0);
  requireFiniteAtLeast('spacing', resolved.spacing, 0);
  requireFiniteAtLeast('curveTolerance', resolved.curveTolerance, 0);

  if (!Number.isFinite(resolved.mutationRate) || resolved.mutationRate < 0 || resolved.mutationRate > 100) {
    throw new ConfigError('mutationRate', `must be within [0, 100] (got ${resolved.mutationRate})`);
  }
  if (resolved.seed !== undefined && !Number.isInteger(resolved.seed)) {
    throw new ConfigError('seed', `must be an integer (got ${resolved.seed})`);
  }

  return resolved;
}

export interface ServerConfig {
  port: number;
  nfpWorkers: number;
  corsOrigins: string[] | '*';
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const port = env.PORT === undefined ? 3001 : Number(env.PORT);
  requireInteger('PORT', port, 0);

  const nfpWorkers = env.NFP_WORKERS === undefined ? 0 : Number(env.NFP_WORKERS);
  requireInteger('NFP_WORKERS', nfpWorkers, 0);

  const origins = env.CORS_ORIGINS?.split(',').map(origin => origin.trim()).filter(Boolean);

  return {
    port,
    nfpWorkers,
    corsOrigins: origins && origins.length > 0 ? origins : '*'
  };
}
