export interface Point {
  readonly x: number;
  readonly y: number;
}

/** Closed ring of vertices; the closing edge is implicit. */
export type Ring = readonly Point[];

export interface Polygon {
  readonly points: Ring;
  readonly holes?: readonly Ring[];
}

export interface BoundingBox {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
  width: number;
  height: number;
}

export type PointLocation = 'inside' | 'outside' | 'boundary';

export type JoinType = 'round' | 'miter' | 'square';
