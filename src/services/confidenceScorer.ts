/**
 * Confidence Scorer
 * Scores a parsed record against the hints the caller supplied, one dimension at a time.
 */

import { AddressRecord, LocationType, PlaceHints, ReferenceRecord, isLocationType } from '../types/place';
import { roundTo, similarity } from '../utils/stringMetrics';

export const LOCATION_ACCURACY: Readonly<Record<LocationType, number>> = {
  NOT_FOUND: 0,
  APPROXIMATE: 1,
  GEOMETRIC_CENTER: 2,
  RANGE_INTERPOLATED: 3,
  ROOFTOP: 4
};

export type ConfidenceScores = Pick<
  AddressRecord,
  'confidenceOnName' | 'confidenceOnAddr' | 'confidenceOnCity' | 'confidenceOnPostalCode' | 'confidenceOnCountry' | 'locationAccuracy'
>;

const isPresent = (value: string | undefined): value is string => value !== undefined;

export function confidenceOnName(hints: PlaceHints, result: AddressRecord): number {
  return isPresent(hints.name) ? roundTo(similarity(hints.name, result.placeName, true)) : 0;
}

// Addresses are compared in order, without subsequence extraction
export function confidenceOnAddr(hints: PlaceHints, result: AddressRecord): number {
  return isPresent(hints.inputAddress) ? roundTo(similarity(hints.inputAddress, result.address, false)) : 0;
}

export function confidenceOnCity(hints: PlaceHints, result: AddressRecord): number {
  if (!isPresent(hints.inputCity)) {
    return 0;
  }

  return roundTo(Math.max(
    similarity(hints.inputCity, result.city, false),
    similarity(hints.inputCity, result.subLocality, false)
  ));
}

const INTEGER = /^\d+$/;

/**
 * 1 when the postal codes match or no postal code was given, 0 otherwise.
 * Codes that both read as integers compare numerically ("06000" equals "6000").
 */
export function confidenceOnPostalCode(hints: PlaceHints, result: AddressRecord): number {
  if (!isPresent(hints.inputPostalCode)) {
    return 1;
  }

  const input = hints.inputPostalCode.trim();
  const parsed = result.postalCode.trim();

  if (input.length === 0 || parsed.length === 0) {
    return 0;
  }

  if (INTEGER.test(input) && INTEGER.test(parsed)) {
    return parseInt(input, 10) === parseInt(parsed, 10) ? 1 : 0;
  }

  return input.toLowerCase() === parsed.toLowerCase() ? 1 : 0;
}

export function confidenceOnCountry(hints: PlaceHints, result: AddressRecord): number {
  return isPresent(hints.inputCountry) ? roundTo(similarity(hints.inputCountry, result.country, true)) : 0;
}

/** Ordinal rank of a location type, -1 for anything outside the known types. */
export function locationAccuracy(locationType: string): number {
  return isLocationType(locationType) ? LOCATION_ACCURACY[locationType] : -1;
}

export function scoreRecord(hints: PlaceHints, result: AddressRecord): ConfidenceScores {
  return {
    confidenceOnName: confidenceOnName(hints, result),
    confidenceOnAddr: confidenceOnAddr(hints, result),
    confidenceOnCity: confidenceOnCity(hints, result),
    confidenceOnPostalCode: confidenceOnPostalCode(hints, result),
    confidenceOnCountry: confidenceOnCountry(hints, result),
    locationAccuracy: locationAccuracy(result.locationType)
  };
}

/** Writes the dimension scores and location accuracy into the record. */
export function applyScores(hints: PlaceHints, record: AddressRecord): AddressRecord {
  return Object.assign(record, scoreRecord(hints, record));
}

type ComparisonPair = [
  keyof ReferenceRecord,
  'formattedAddress' | 'placeName' | 'address' | 'city' | 'country',
  'confidence' | 'confidenceOnName' | 'confidenceOnAddr' | 'confidenceOnCity' | 'confidenceOnCountry'
];

const COMPARISON_PAIRS: readonly ComparisonPair[] = [
  ['inputText', 'formattedAddress', 'confidence'],
  ['name', 'placeName', 'confidenceOnName'],
  ['inputAddress', 'address', 'confidenceOnAddr'],
  ['inputCity', 'city', 'confidenceOnCity'],
  ['inputCountry', 'country', 'confidenceOnCountry']
];

/**
 * Re-scores a record against an external ground truth. Only the dimensions the reference
 * provides are overwritten.
 */
export function compareWith(record: AddressRecord, reference: ReferenceRecord, lcs = false): AddressRecord {
  for (const [referenceField, resultField, scoreField] of COMPARISON_PAIRS) {
    const expected = reference[referenceField];
    if (expected !== undefined) {
      record[scoreField] = roundTo(similarity(expected, record[resultField], lcs));
    }
  }

  return record;
}
