import {
  applyScores,
  compareWith,
  confidenceOnCity,
  confidenceOnPostalCode,
  locationAccuracy,
  scoreRecord
} from '../../src/services/confidenceScorer';
import { AddressRecord, emptyAddressRecord } from '../../src/types/place';

function parsedRecord(overrides: Partial<AddressRecord> = {}): AddressRecord {
  return {
    ...emptyAddressRecord(),
    formattedAddress: '10 Rue de Rivoli, 75004 Paris, France',
    placeName: 'Musée du Louvre',
    address: '10 Rue de Rivoli',
    city: 'Paris',
    postalCode: '75004',
    country: 'France',
    locationType: 'ROOFTOP',
    ...overrides
  };
}

describe('confidenceScorer', () => {
  describe('scoreRecord', () => {
    it('should score every dimension the hints provide', () => {
      const scores = scoreRecord({
        name: 'Musee du Louvre',
        inputAddress: '10 rue de rivoli',
        inputCity: 'paris',
        inputPostalCode: '75004',
        inputCountry: 'france'
      }, parsedRecord());

      expect(scores).toEqual({
        confidenceOnName: 1,
        confidenceOnAddr: 1,
        confidenceOnCity: 1,
        confidenceOnPostalCode: 1,
        confidenceOnCountry: 1,
        locationAccuracy: 4
      });
    });

    it('should give 0 for absent hints, and 1 for an absent postal code', () => {
      expect(scoreRecord({}, parsedRecord())).toEqual({
        confidenceOnName: 0,
        confidenceOnAddr: 0,
        confidenceOnCity: 0,
        confidenceOnPostalCode: 1,
        confidenceOnCountry: 0,
        locationAccuracy: 4
      });
    });
  });

  describe('confidenceOnCity', () => {
    it('should round the levenshtein ratio', () => {
      expect(confidenceOnCity({ inputCity: 'Pari' }, parsedRecord())).toBe(0.89);
    });

    it('should take the sub-locality when it matches better', () => {
      const record = parsedRecord({ subLocality: 'Montmartre' });

      expect(confidenceOnCity({ inputCity: 'Montmartre' }, record)).toBe(1);
    });
  });

  describe('confidenceOnPostalCode', () => {
    it.each([
      ['75004', '75004', 1],
      ['75001', '75004', 0],
      ['06000', '6000', 1],
      ['SW1A 1AA', 'sw1a 1aa', 1],
      ['75004', '', 0]
    ])('should compare %p with %p', (input, parsed, expected) => {
      expect(confidenceOnPostalCode({ inputPostalCode: input }, parsedRecord({ postalCode: parsed }))).toBe(expected);
    });
  });

  it('should give 1 without an input postal code even when the result has none', () => {
    expect(confidenceOnPostalCode({}, parsedRecord({ postalCode: '' }))).toBe(1);
  });

  describe('locationAccuracy', () => {
    it('should rank the known location types', () => {
      expect(locationAccuracy('NOT_FOUND')).toBe(0);
      expect(locationAccuracy('APPROXIMATE')).toBe(1);
      expect(locationAccuracy('GEOMETRIC_CENTER')).toBe(2);
      expect(locationAccuracy('RANGE_INTERPOLATED')).toBe(3);
      expect(locationAccuracy('ROOFTOP')).toBe(4);
    });

    it('should give -1 for an unknown type', () => {
      expect(locationAccuracy('SOMEWHERE')).toBe(-1);
    });
  });

  it('should write scores into the record', () => {
    const record = parsedRecord();

    applyScores({ inputCity: 'Paris' }, record);

    expect(record.confidenceOnCity).toBe(1);
    expect(record.locationAccuracy).toBe(4);
  });

  describe('compareWith', () => {
    it('should only overwrite the dimensions the reference provides', () => {
      const record = parsedRecord({ confidenceOnName: 0.5, confidence: 0.3 });

      compareWith(record, { inputCity: 'Lyon', inputText: '10 Rue de Rivoli, 75004 Paris, France' });

      expect(record.confidenceOnCity).toBe(0.44);
      expect(record.confidence).toBe(1);
      expect(record.confidenceOnName).toBe(0.5);
    });
  });
});
