import { GeometryError } from '../types/errors.js';
import type { Point } from './point.js';

/**
 * An ordered polyline of points. Immutable; modifications build new lines.
 */
export class Line {
  public readonly points: readonly Point[];

  constructor(points: readonly Point[]) {
    if (points.length < 2) {
      throw new GeometryError('A line needs at least two points', {
        value: points.length,
      });
    }
    this.points = Object.freeze([...points]);
  }

  get length(): number {
    return this.points.length;
  }

  equals(other: Line): boolean {
    return (
      this.points.length === other.points.length &&
      this.points.every((p, i) => {
        const q = other.points[i];
        return q !== undefined && p.equals(q);
      })
    );
  }
}
