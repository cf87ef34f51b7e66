import coordinateTransform from '../../src/utils/coordinateTransform';
import { InvalidInputError } from '../../src/utils/errors';

describe('CoordinateTransformService', () => {
  describe('validateCoordinates', () => {
    it('should accept coordinates in range', () => {
      expect(coordinateTransform.validateCoordinates({ latitude: 48.8566, longitude: 2.3522 })).toBe(true);
    });

    it('should reject out of range or non-finite values', () => {
      expect(coordinateTransform.validateCoordinates({ latitude: 91, longitude: 0 })).toBe(false);
      expect(coordinateTransform.validateCoordinates({ latitude: 0, longitude: -181 })).toBe(false);
      expect(coordinateTransform.validateCoordinates({ latitude: Number.NaN, longitude: 0 })).toBe(false);
    });
  });

  describe('fromLatLng', () => {
    it('should read a lat/lng tuple', () => {
      expect(coordinateTransform.fromLatLng([48.85, 2.35])).toEqual({ latitude: 48.85, longitude: 2.35 });
    });

    it('should throw on a tuple that is not numeric', () => {
      expect(() => coordinateTransform.fromLatLng(['48.85', 2.35])).toThrow(InvalidInputError);
    });

    it('should read the usual key pairs', () => {
      expect(coordinateTransform.fromLatLng({ lat: 1, lng: 2 })).toEqual({ latitude: 1, longitude: 2 });
      expect(coordinateTransform.fromLatLng({ latitude: 3, longitude: 4 })).toEqual({ latitude: 3, longitude: 4 });
      expect(coordinateTransform.fromLatLng({ Lat: 5, Lon: 6 })).toEqual({ latitude: 5, longitude: 6 });
    });

    it('should return null without coordinates', () => {
      expect(coordinateTransform.fromLatLng({ name: 'Louvre' })).toBeNull();
      expect(coordinateTransform.fromLatLng('48.85,2.35')).toBeNull();
    });
  });

  it('should format a lat,lng string', () => {
    expect(coordinateTransform.toLatLngString({ latitude: 48.85, longitude: 2.35 })).toBe('48.85,2.35');
  });

  describe('calculateDistance', () => {
    it('should measure one degree of latitude', () => {
      const result = coordinateTransform.calculateDistance(
        { latitude: 0, longitude: 0 },
        { latitude: 1, longitude: 0 }
      );
      expect(result.meters).toBe(111194.93);
      expect(result.kilometers).toBe(111.19);
    });

    it('should be zero for the same point', () => {
      const point = { latitude: 48.8566, longitude: 2.3522 };
      expect(coordinateTransform.calculateDistance(point, point).meters).toBe(0);
    });
  });
});
