import { NFPError } from '../errors/nesting.errors';
import { classifyPoint, signedArea } from '../services/geometry.service';
import { computeNFP } from '../services/nfp-calculator.service';
import { expectSameVertices, generateRandomPolygon, lShape, rectangle, sortedPoints } from './helpers/shape-generator.helper';

describe('NFP calculator', () => {
  describe('no-fit polygon', () => {
    it('is the doubled square for two unit squares', () => {
      const { noFit, innerFit } = computeNFP(rectangle(10, 10), rectangle(10, 10), 0, 0);

      expect(innerFit).toBeNull();
      expect(noFit).toHaveLength(1);
      expectSameVertices(noFit[0], [
        { x: -10, y: -10 },
        { x: 10, y: -10 },
        { x: 10, y: 10 },
        { x: -10, y: 10 }
      ]);
    });

    it('spans both widths for rectangles of different size', () => {
      const [loop] = computeNFP(rectangle(20, 10), rectangle(10, 10), 0, 0).noFit;

      expectSameVertices(loop, [
        { x: -10, y: -10 },
        { x: 20, y: -10 },
        { x: 20, y: 10 },
        { x: -10, y: 10 }
      ]);
      expect(signedArea(loop)).toBeCloseTo(600, 9);
    });

    it('applies the orbiting rotation before tracing', () => {
      const [loop] = computeNFP(rectangle(20, 10), rectangle(20, 10), 0, 90).noFit;

      // B turned a quarter spans x in [-10, 0] and y in [0, 20]
      expectSameVertices(loop, [
        { x: 0, y: -20 },
        { x: 30, y: -20 },
        { x: 30, y: 10 },
        { x: 0, y: 10 }
      ]);
    });

    it('keeps the outer loop of a concave pair', () => {
      const [loop] = computeNFP(lShape(20, 10), rectangle(10, 10), 0, 0).noFit;

      expect(Math.abs(signedArea(loop))).toBeCloseTo(800, 6);
      expect(classifyPoint({ x: 0, y: 0 }, loop)).toBe('inside');
      expect(classifyPoint({ x: 15, y: 15 }, loop)).toBe('outside');
      expect(classifyPoint({ x: 10, y: 10 }, loop, 1e-6)).toBe('boundary');
    });

    it.each([
      ['square', rectangle(10, 10)],
      ['random pentagon', generateRandomPolygon(3, 5, 20, 0)],
      ['random concave polygon', generateRandomPolygon(8, 9, 20, 0.6)]
    ])('excludes the zero offset for a %s against itself', (_name, polygon) => {
      const [loop] = computeNFP(polygon, polygon, 0, 0).noFit;

      expect(classifyPoint({ x: 0, y: 0 }, loop)).toBe('inside');
    });

    it('fails on degenerate input', () => {
      expect(() => computeNFP({ points: [{ x: 0, y: 0 }, { x: 1, y: 0 }] }, rectangle(1, 1), 0, 0)).toThrow(NFPError);
      expect(() =>
        computeNFP(
          {
            points: [
              { x: 0, y: 0 },
              { x: 5, y: 0 },
              { x: 10, y: 0 }
            ]
          },
          rectangle(1, 1),
          0,
          0
        )
      ).toThrow(NFPError);
    });
  });

  describe('inner-fit polygon', () => {
    it('is the container shrunk by the part for a rectangle', () => {
      const { innerFit, noFit } = computeNFP(rectangle(100, 50), rectangle(10, 10), 0, 0, 'inner');

      expect(noFit).toEqual([]);
      expect(innerFit).not.toBeNull();
      expectSameVertices(innerFit ?? [], [
        { x: 0, y: 0 },
        { x: 90, y: 0 },
        { x: 90, y: 40 },
        { x: 0, y: 40 }
      ]);
    });

    it('accounts for the rotation of the part', () => {
      const { innerFit } = computeNFP(rectangle(50, 120), rectangle(100, 20), 0, 90, 'inner');

      expectSameVertices(innerFit ?? [], [
        { x: 20, y: 0 },
        { x: 50, y: 0 },
        { x: 50, y: 20 },
        { x: 20, y: 20 }
      ]);
    });

    it('collapses to a segment when the part spans the container', () => {
      const { innerFit } = computeNFP(rectangle(100, 50), rectangle(100, 10), 0, 0, 'inner');

      expect(sortedPoints(innerFit ?? [])).toEqual([
        { x: 0, y: 0 },
        { x: 0, y: 40 }
      ]);
    });

    it('throws NFPError when the part is larger than the container', () => {
      expect(() => computeNFP(rectangle(100, 50), rectangle(120, 10), 0, 0, 'inner')).toThrow(NFPError);
      expect(() => computeNFP(rectangle(100, 50), rectangle(120, 10), 0, 90, 'inner')).toThrow(NFPError);
    });

    it('stays inside a triangular container', () => {
      const triangle = {
        points: [
          { x: 0, y: 0 },
          { x: 100, y: 0 },
          { x: 0, y: 100 }
        ]
      };
      const { innerFit } = computeNFP(triangle, rectangle(10, 10), 0, 0, 'inner');

      // the square's top-right corner must stay under the hypotenuse x + y = 100
      expectSameVertices(innerFit ?? [], [
        { x: 0, y: 0 },
        { x: 80, y: 0 },
        { x: 0, y: 80 }
      ], 6);
    });
  });
});
