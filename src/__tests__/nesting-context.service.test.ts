import { ConfigError, GeometryError } from '../errors/nesting.errors';
import { Part } from '../models/nesting.types';
import { getBoundingBox } from '../services/geometry.service';
import { createNestingContext, expandInstances, getPreparedPart } from '../services/nesting-context.service';
import { lShape, rectPart, rectangle } from './helpers/shape-generator.helper';

const options = { spacing: 0, rotationCount: 4, curveTolerance: 0 };

describe('nesting context', () => {
  it('expands quantities into numbered instances', () => {
    const instances = expandInstances([rectPart('a', 10, 10, 2), rectPart('b', 5, 5)]);

    expect(instances).toEqual([
      { index: 0, instanceId: 'a_1', partId: 'a', copy: 1 },
      { index: 1, instanceId: 'a_2', partId: 'a', copy: 2 },
      { index: 2, instanceId: 'b_1', partId: 'b', copy: 1 }
    ]);
  });

  it('inflates fit outlines by half the spacing and keeps the real area', () => {
    const context = createNestingContext([rectPart('a', 10, 10)], rectangle(100, 100), { ...options, spacing: 4 });
    const prepared = getPreparedPart(context, 'a');
    const box = getBoundingBox(prepared.shape.points);

    expect(prepared.area).toBe(100);
    expect(box.minX).toBeCloseTo(-2, 9);
    expect(box.maxX).toBeCloseTo(12, 9);
    expect(context.spacing).toBe(4);
  });

  it('uses evenly spaced rotations unless the part lists its own', () => {
    const context = createNestingContext(
      [rectPart('a', 10, 10), rectPart('b', 10, 10, 1, [45])],
      rectangle(100, 100),
      { ...options, rotationCount: 2 }
    );

    expect(getPreparedPart(context, 'a').rotations).toEqual([0, 180]);
    expect(getPreparedPart(context, 'b').rotations).toEqual([45]);
  });

  it('orients the container counter-clockwise and flags concavity', () => {
    const clockwise = { points: [...lShape(100, 30).points].reverse() };
    const context = createNestingContext([rectPart('a', 10, 10)], clockwise, options);

    expect(context.containerConvex).toBe(false);
    expect(context.containerArea).toBe(5100);
    expect(context.container.points).toHaveLength(6);
  });

  it.each<[string, Part[], string]>([
    ['no parts', [], 'parts'],
    ['duplicate ids', [rectPart('a', 1, 1), rectPart('a', 2, 2)], 'parts'],
    ['zero quantity', [rectPart('a', 1, 1, 0)], 'quantity'],
    ['fractional quantity', [rectPart('a', 1, 1, 1.5)], 'quantity'],
    ['empty rotations', [rectPart('a', 1, 1, 1, [])], 'rotations'],
    ['reserved id', [rectPart('#container', 1, 1)], 'parts']
  ])('rejects %s', (_name, parts, field) => {
    expect(() => createNestingContext(parts, rectangle(100, 100), options)).toThrow(
      expect.objectContaining({ field })
    );
  });

  it('rejects parts without area', () => {
    const flat: Part = {
      id: 'flat',
      polygon: {
        points: [
          { x: 0, y: 0 },
          { x: 5, y: 0 },
          { x: 10, y: 0 }
        ]
      }
    };

    expect(() => createNestingContext([flat], rectangle(100, 100), options)).toThrow(GeometryError);
  });

  it('rejects unknown part ids on lookup', () => {
    const context = createNestingContext([rectPart('a', 10, 10)], rectangle(100, 100), options);

    expect(() => getPreparedPart(context, 'zzz')).toThrow(ConfigError);
  });
});
