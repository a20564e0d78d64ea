declare module 'clipper-lib' {
  export interface IntPoint {
    X: number;
    Y: number;
  }

  export type Path = IntPoint[];
  export type Paths = Path[];

  export enum JoinType {
    jtSquare = 0,
    jtRound = 1,
    jtMiter = 2
  }

  export enum EndType {
    etClosedPolygon = 0
  }

  export enum ClipType {
    ctIntersection = 0
  }

  export enum PolyType {
    ptSubject = 0,
    ptClip = 1
  }

  export enum PolyFillType {
    pftNonZero = 1
  }

  export class ClipperOffset {
    constructor(miterLimit?: number, arcTolerance?: number);
    AddPath(path: Path, joinType: JoinType, endType: EndType): void;
    Execute(solution: Paths, delta: number): void;
  }

  export class Clipper {
    constructor();
    AddPath(path: Path, polyType: PolyType, closed: boolean): boolean;
    Execute(clipType: ClipType, solution: Paths, subjFillType: PolyFillType, clipFillType: PolyFillType): boolean;
    static MinkowskiSum(pattern: Path, path: Path, pathIsClosed: boolean): Paths;
  }
}
