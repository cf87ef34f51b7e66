import {
  buildMapsUrl,
  deriveAddress,
  parseBusinessDetails,
  parseGeocodeResults,
  parseOpeningHours,
  parsePlaceDetails,
  refineAddress,
  selectBestGeocodeResult,
  selectBestPlace
} from '../../src/services/responseParser';
import { emptyAddressRecord } from '../../src/types/place';
import { UpstreamPayloadError } from '../../src/utils/errors';
import { encodePlusCode } from '../../src/utils/plusCode';
import { RIVOLI_QUERY, museumDetails, museumPlace, rivoliDetails, rivoliGeocodeResult } from '../fixtures/googleMaps';

describe('responseParser', () => {
  describe('selectBestGeocodeResult', () => {
    it('should pick the candidate closest to the query', () => {
      const selection = selectBestGeocodeResult(RIVOLI_QUERY, [
        { formatted_address: '5 Avenue Victor Hugo, Paris' },
        { formatted_address: '10 Rue de Rivoli, Paris' }
      ]);

      expect(selection).toEqual({ index: 1, formattedAddress: '10 Rue de Rivoli, Paris', ratio: 1 });
    });

    it('should report no candidate for an empty list', () => {
      expect(selectBestGeocodeResult(RIVOLI_QUERY, [])).toEqual({ index: -1, formattedAddress: null, ratio: 0 });
    });

    it('should report no candidate when nothing resembles the query', () => {
      expect(selectBestGeocodeResult('zzz', [{ formatted_address: 'abc' }]).index).toBe(-1);
    });
  });

  describe('selectBestPlace', () => {
    it('should fall back to the vicinity', () => {
      const selection = selectBestPlace(RIVOLI_QUERY, [{ vicinity: '10 Rue de Rivoli, Paris' }]);

      expect(selection).toEqual({ index: 0, formattedAddress: null, ratio: 1 });
    });

    it('should score a place without any address as zero', () => {
      expect(selectBestPlace(RIVOLI_QUERY, [{ name: 'Nowhere' }]).index).toBe(-1);
    });
  });

  describe('parseGeocodeResults', () => {
    it('should flatten the best result into the record', () => {
      const record = parseGeocodeResults(RIVOLI_QUERY, [rivoliGeocodeResult()], emptyAddressRecord(), 10);

      expect(record.formattedAddress).toBe('10 Rue de Rivoli, 75004 Paris, France');
      expect(record.confidence).toBe(1);
      expect(record.streetNumber).toBe('10');
      expect(record.street).toBe('Rue de Rivoli');
      expect(record.city).toBe('Paris');
      expect(record.postalCode).toBe('75004');
      expect(record.adminAreaLevel1).toBe('Île-de-France');
      expect(record.adminAreaLevel2).toBe('Département de Paris');
      expect(record.country).toBe('France');
      expect(record.countryCode).toBe('fr');
      expect(record.latitude).toBe(48.8556);
      expect(record.longitude).toBe(2.3601);
      expect(record.locationType).toBe('ROOFTOP');
      expect(record.placeId).toBe('place-rivoli-10');
      expect(record.plusCode).toBe(encodePlusCode(48.8556, 2.3601, 10));
      expect(record.mapsUrl).toBe(
        'https://www.google.com/maps/search/?api=1&query=48.855600%2C2.360100&query_place_id=place-rivoli-10'
      );
    });

    it('should use the first result without a query', () => {
      const record = parseGeocodeResults(null, [rivoliGeocodeResult()], emptyAddressRecord(), 10);

      expect(record.formattedAddress).toBe('10 Rue de Rivoli, 75004 Paris, France');
      expect(record.confidence).toBe(0);
    });

    it('should default a missing location type to NOT_FOUND', () => {
      const result = rivoliGeocodeResult();
      result.geometry = { location: { lat: 48.8556, lng: 2.3601 }, location_type: null };

      expect(parseGeocodeResults(null, [result], emptyAddressRecord(), 10).locationType).toBe('NOT_FOUND');
    });

    it('should keep the fields read before a missing geometry', () => {
      const result = rivoliGeocodeResult();
      delete result.geometry;
      const record = emptyAddressRecord();

      expect(() => parseGeocodeResults(RIVOLI_QUERY, [result], record, 10)).toThrow(UpstreamPayloadError);
      expect(record.formattedAddress).toBe('10 Rue de Rivoli, 75004 Paris, France');
      expect(record.confidence).toBe(1);
      expect(record.city).toBe('Paris');
      expect(record.latitude).toBe(0);
    });

    it('should leave the record untouched for an empty result list', () => {
      expect(parseGeocodeResults(null, [], emptyAddressRecord(), 10)).toEqual(emptyAddressRecord());
    });
  });

  describe('parseOpeningHours', () => {
    it('should join the windows of each day', () => {
      const hours = parseOpeningHours(museumPlace());

      expect(hours).toEqual({
        monday: '09:00-18:00|19:00-22:00',
        tuesday: null,
        wednesday: null,
        thursday: null,
        friday: null,
        saturday: null,
        sunday: '10:00-17:00'
      });
    });

    it('should give null everywhere when opening hours are missing', () => {
      const place = museumPlace();
      delete place.opening_hours;

      expect(parseOpeningHours(place)).toEqual({
        monday: null,
        tuesday: null,
        wednesday: null,
        thursday: null,
        friday: null,
        saturday: null,
        sunday: null
      });
    });

    it('should give null everywhere for a non-establishment', () => {
      const place = { ...museumPlace(), types: ['route'] };

      expect(Object.values(parseOpeningHours(place)).every((value) => value === null)).toBe(true);
    });

    it('should give null everywhere for an unreadable time', () => {
      const place = museumPlace();
      place.opening_hours = { periods: [{ open: { day: 2, time: '9' }, close: { day: 2, time: '1700' } }] };

      expect(parseOpeningHours(place).tuesday).toBeNull();
    });
  });

  describe('parseBusinessDetails', () => {
    it('should read the business fields of an establishment', () => {
      const record = parseBusinessDetails(museumDetails(), emptyAddressRecord());

      expect(record.placeName).toBe('Musée du Louvre');
      expect(record.placeType).toEqual(['museum', 'tourist_attraction', 'establishment']);
      expect(record.placeMainType).toBe('museum');
      expect(record.placeUrl).toBe('https://maps.google.com/?cid=1');
      expect(record.website).toBe('https://museum.example.org/');
      expect(record.phone).toBe('+33 1 00 00 00 00');
      expect(record.monday).toBe('09:00-18:00|19:00-22:00');
    });

    it('should leave contact fields empty for anything else', () => {
      const details = { result: { ...museumPlace(), types: ['route'] } };
      const record = parseBusinessDetails(details, emptyAddressRecord());

      expect(record.placeName).toBe('Musée du Louvre');
      expect(record.website).toBe('');
      expect(record.phone).toBe('');
      expect(record.monday).toBeNull();
    });

    it('should throw without a result', () => {
      expect(() => parseBusinessDetails({ status: 'NOT_FOUND' }, emptyAddressRecord())).toThrow(UpstreamPayloadError);
    });
  });

  describe('parsePlaceDetails', () => {
    it('should force a ROOFTOP location and score the query', () => {
      const record = parsePlaceDetails(RIVOLI_QUERY, rivoliDetails(), emptyAddressRecord(), 10);

      expect(record.locationType).toBe('ROOFTOP');
      expect(record.confidence).toBe(1);
      expect(record.placeName).toBe('10 Rue de Rivoli');
      expect(record.placeMainType).toBe('street_address');
      expect(record.website).toBe('');
    });

    it('should not score without a query', () => {
      expect(parsePlaceDetails(null, museumDetails(), emptyAddressRecord(), 10).confidence).toBe(0);
    });
  });

  describe('address derivation', () => {
    it('should strip the postal code, city and country tail', () => {
      expect(refineAddress({
        formattedAddress: '10 Rue de Rivoli, 75004 Paris, France',
        postalCode: '75004',
        city: 'Paris',
        country: 'France'
      })).toBe('10 Rue de Rivoli');
    });

    it('should derive the street when it is missing', () => {
      const record = {
        ...emptyAddressRecord(),
        formattedAddress: 'Place du Tertre, 75018 Paris, France',
        postalCode: '75018',
        city: 'Paris',
        country: 'France'
      };

      deriveAddress(record);

      expect(record.street).toBe('Place du Tertre');
      expect(record.address).toBe('Place du Tertre');
    });

    it('should join street number and street', () => {
      const record = { ...emptyAddressRecord(), streetNumber: '5', street: 'Avenue Victor Hugo' };

      expect(deriveAddress(record).address).toBe('5 Avenue Victor Hugo');
    });
  });

  it('should build a maps search url', () => {
    expect(buildMapsUrl(1.5, -2.25, 'abc')).toBe(
      'https://www.google.com/maps/search/?api=1&query=1.500000%2C-2.250000&query_place_id=abc'
    );
  });
});
