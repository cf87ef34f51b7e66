import { InvalidInputError } from './errors';

export interface CoordinatePoint {
  latitude: number;
  longitude: number;
}

export type LatLngTuple = [number, number];

// Key pairs accepted for latitude/longitude in loosely shaped records
const LAT_LNG_KEYS: ReadonlyArray<[string, string]> = [
  ['lat', 'lng'],
  ['Lat', 'Lng'],
  ['latitude', 'longitude'],
  ['Latitude', 'Longitude'],
  ['lat', 'lon'],
  ['Lat', 'Lon']
];

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value);

export class CoordinateTransformService {
  validateCoordinates(coords: CoordinatePoint): boolean {
    const { latitude, longitude } = coords;

    if (!isFiniteNumber(latitude) || !isFiniteNumber(longitude)) {
      return false;
    }

    if (latitude < -90 || latitude > 90) {
      return false;
    }

    if (longitude < -180 || longitude > 180) {
      return false;
    }

    return true;
  }

  /**
   * Reads a coordinate pair from a `[lat, lng]` tuple or from a record carrying one of the
   * usual key pairs. Returns null when a record has no coordinates.
   */
  fromLatLng(arg: unknown): CoordinatePoint | null {
    if (Array.isArray(arg)) {
      const [latitude, longitude] = arg;
      if (isFiniteNumber(latitude) && isFiniteNumber(longitude)) {
        return { latitude, longitude };
      }
      throw new InvalidInputError(`Expected a lat/lng pair of numbers but got [${arg.map((v) => typeof v).join(', ')}]`);
    }

    if (typeof arg === 'object' && arg !== null) {
      const record: Record<string, unknown> = { ...arg };
      for (const [latKey, lngKey] of LAT_LNG_KEYS) {
        const latitude = record[latKey];
        const longitude = record[lngKey];
        if (isFiniteNumber(latitude) && isFiniteNumber(longitude)) {
          return { latitude, longitude };
        }
      }
    }

    return null;
  }

  /** `lat,lng` string as expected by the Google web services. */
  toLatLngString(point: CoordinatePoint): string {
    return `${point.latitude},${point.longitude}`;
  }

  calculateDistance(point1: CoordinatePoint, point2: CoordinatePoint): { meters: number; kilometers: number } {
    const R = 6371e3;
    const φ1 = point1.latitude * Math.PI / 180;
    const φ2 = point2.latitude * Math.PI / 180;
    const Δφ = (point2.latitude - point1.latitude) * Math.PI / 180;
    const Δλ = (point2.longitude - point1.longitude) * Math.PI / 180;

    const a = Math.sin(Δφ/2) * Math.sin(Δφ/2) +
              Math.cos(φ1) * Math.cos(φ2) *
              Math.sin(Δλ/2) * Math.sin(Δλ/2);
    const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1-a));

    const meters = R * c;

    return {
      meters: Math.round(meters * 100) / 100,
      kilometers: Math.round(meters / 10) / 100
    };
  }
}

const coordinateTransformService = new CoordinateTransformService();
export default coordinateTransformService;
