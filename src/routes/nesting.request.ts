/**
 * Request body parsing for the nesting routes.
 * Malformed shapes raise GeometryError, anything else ConfigError.
 */
import { ConfigError, GeometryError } from '../errors/nesting.errors';
import { Point, Polygon } from '../models/geometry.types';
import { NestingConfig, Part } from '../models/nesting.types';
import { createPolygon } from '../services/geometry.service';
import { RotationConfigService } from '../services/rotation-config.service';
import { SheetSize } from '../services/nesting.service';

type Body = Record<string, unknown>;

function isRecord(value: unknown): value is Body {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function requireBody(value: unknown): Body {
  if (!isRecord(value)) {
    throw new ConfigError('body', 'expected a JSON object');
  }
  return value;
}

function parsePoint(value: unknown, field: string): Point {
  if (isRecord(value) && typeof value.x === 'number' && typeof value.y === 'number') {
    return { x: value.x, y: value.y };
  }
  if (Array.isArray(value) && value.length === 2 && typeof value[0] === 'number' && typeof value[1] === 'number') {
    return { x: value[0], y: value[1] };
  }
  throw new GeometryError(`${field}: points must be {x, y} objects or [x, y] pairs`);
}

function parseRing(value: unknown, field: string): Point[] {
  if (!Array.isArray(value)) {
    throw new GeometryError(`${field}: expected an array of points`);
  }
  return value.map(point => parsePoint(point, field));
}

/**
 * Accepts `{ points, holes? }` or a bare point array.
 */
export function parsePolygon(value: unknown, field: string): Polygon {
  if (Array.isArray(value)) {
    return createPolygon(parseRing(value, field));
  }
  if (!isRecord(value)) {
    throw new GeometryError(`${field}: expected a polygon`);
  }
  let holes: Point[][] | undefined;
  if (value.holes !== undefined) {
    if (!Array.isArray(value.holes)) {
      throw new GeometryError(`${field}.holes: expected an array of rings`);
    }
    holes = value.holes.map((hole, index) => parseRing(hole, `${field}.holes[${index}]`));
  }
  return createPolygon(parseRing(value.points, `${field}.points`), holes);
}

function optionalNumber(body: Body, field: string): number | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigError(field, `expected a number (got ${JSON.stringify(value)})`);
  }
  return value;
}

export function requireNumber(body: Body, field: string): number {
  const value = optionalNumber(body, field);
  if (value === undefined) {
    throw new ConfigError(field, 'is required');
  }
  return value;
}

export function optionalString(body: Body, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigError(field, 'expected a string');
  }
  return value;
}

function parseRotations(value: unknown, field: string): number[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || value.some(r => typeof r !== 'number')) {
    throw new ConfigError(field, 'expected an array of angles in degrees');
  }
  return value.filter((r): r is number => typeof r === 'number');
}

export function parsePart(value: unknown, field: string): Part {
  if (!isRecord(value)) {
    throw new ConfigError(field, 'expected a part object');
  }
  if (typeof value.id !== 'string' && typeof value.id !== 'number') {
    throw new ConfigError(`${field}.id`, 'expected a string or number');
  }
  const quantity = optionalNumber(value, 'quantity');
  const rotations = parseRotations(value.rotations, `${field}.rotations`);
  return {
    id: String(value.id),
    polygon: parsePolygon(value.polygon ?? value.points, `${field}.polygon`),
    ...(quantity !== undefined ? { quantity } : {}),
    ...(rotations !== undefined ? { rotations } : {})
  };
}

export function parseParts(value: unknown): Part[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigError('parts', 'expected a non-empty array');
  }
  return value.map((part, index) => parsePart(part, `parts[${index}]`));
}

/**
 * Numeric config fields plus an optional `rotationPreset` name, which sets
 * `rotationCount`.
 */
export function parseConfig(value: unknown): Partial<NestingConfig> {
  if (value === undefined) return {};
  const body = requireBody(value);
  const config: Partial<NestingConfig> = {};
  const numeric: (keyof NestingConfig)[] = [
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
  for (const key of numeric) {
    const parsed = optionalNumber(body, key);
    if (parsed !== undefined) config[key] = parsed;
  }

  const presetName = optionalString(body, 'rotationPreset');
  if (presetName !== undefined) {
    const preset = RotationConfigService.getPresetByName(presetName);
    if (!preset) {
      const known = RotationConfigService.getAllPresets().map(p => p.name);
      throw new ConfigError('rotationPreset', `unknown preset "${presetName}" (expected one of ${known.join(', ')})`);
    }
    config.rotationCount = preset.rotationCount;
  }
  return config;
}

/**
 * `container` polygon, or a `sheet` of `{ width, height }`.
 */
export function parseContainer(body: Body, createSheet: (width: number, height: number) => Polygon): Polygon {
  if (body.container !== undefined) {
    return parsePolygon(body.container, 'container');
  }
  if (isRecord(body.sheet)) {
    return createSheet(requireNumber(body.sheet, 'width'), requireNumber(body.sheet, 'height'));
  }
  throw new ConfigError('container', 'provide a container polygon or a sheet { width, height }');
}

export function parseSheetSizes(value: unknown): SheetSize[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigError('sheetSizes', 'expected a non-empty array');
  }
  return value.map((entry, index) => {
    if (!isRecord(entry)) {
      throw new ConfigError(`sheetSizes[${index}]`, 'expected { width, height }');
    }
    const name = optionalString(entry, 'name');
    const units = optionalString(entry, 'units');
    return {
      width: requireNumber(entry, 'width'),
      height: requireNumber(entry, 'height'),
      ...(name !== undefined ? { name } : {}),
      ...(units !== undefined ? { units } : {})
    };
  });
}
