import { GeometryError } from '../types/errors.js';

/** Mean Earth radius, in km. */
export const EARTH_RADIUS = 6371.0;

/**
 * A geographical point: longitude and latitude in decimal degrees, depth in
 * km (positive below the surface).
 */
export class Point {
  constructor(
    public readonly longitude: number,
    public readonly latitude: number,
    public readonly depth: number = 0
  ) {
    if (!(depth < EARTH_RADIUS)) {
      throw new GeometryError(
        `The depth must be < than the earth radius (${EARTH_RADIUS.toFixed(1)} km)!`,
        { value: depth }
      );
    }
    if (!(longitude >= -180 && longitude <= 180)) {
      throw new GeometryError(
        `Longitude ${longitude.toFixed(6)} outside range!`,
        { value: longitude }
      );
    }
    if (!(latitude >= -90 && latitude <= 90)) {
      throw new GeometryError(`Latitude ${latitude.toFixed(6)} outside range!`, {
        value: latitude,
      });
    }
  }

  equals(other: Point): boolean {
    return (
      this.longitude === other.longitude &&
      this.latitude === other.latitude &&
      this.depth === other.depth
    );
  }

  toString(): string {
    return `<Latitude=${this.latitude}, Longitude=${this.longitude}, Depth=${this.depth}>`;
  }
}
