/**
 * Response Parser
 * Flattens Geocoding API results and Places API details into an AddressRecord.
 *
 * Every parse function writes into the record it is given field by field, so when a payload
 * turns out to be malformed halfway through, the fields read before the failure are kept.
 */

import {
  AddressComponent,
  GeocodeResult,
  Geometry,
  OpeningHoursPoint,
  PlaceData,
  PlaceDetailsResponse
} from '../types/googleMaps';
import { AddressRecord, OpeningHours, WEEKDAYS, Weekday, emptyOpeningHours } from '../types/place';
import { UpstreamPayloadError, errorMessage } from '../utils/errors';
import { encodePlusCode } from '../utils/plusCode';
import { roundTo, similarity } from '../utils/stringMetrics';
import Logger from '../utils/logger';

const logger = Logger.createServiceLogger('ResponseParser');

const MAPS_SEARCH_URL = 'https://www.google.com/maps/search/?api=1';

export interface CandidateSelection {
  /** Index of the best candidate, -1 when none scored above zero. */
  index: number;
  formattedAddress: string | null;
  ratio: number;
}

type ComponentPredicate = (types: string[]) => boolean;

const firstTypeIs = (...wanted: string[]): ComponentPredicate =>
  (types) => types.length > 0 && wanted.includes(types[0]);

const hasAnyType = (...wanted: string[]): ComponentPredicate =>
  (types) => types.some((type) => wanted.includes(type));

// A colloquial area only stands in for the route when no route precedes it
const COMPONENT_PREDICATES = {
  streetNumber: firstTypeIs('street_number'),
  street: firstTypeIs('route', 'colloquial_area'),
  city: hasAnyType('locality', 'postal_town'),
  subLocality: hasAnyType('sublocality'),
  postalCode: firstTypeIs('postal_code'),
  adminAreaLevel2: firstTypeIs('administrative_area_level_2'),
  adminAreaLevel1: firstTypeIs('administrative_area_level_1'),
  country: firstTypeIs('country')
} as const;

function findComponent(components: AddressComponent[], predicate: ComponentPredicate): AddressComponent | undefined {
  return components.find((component) => predicate(component.types ?? []));
}

function longName(components: AddressComponent[], predicate: ComponentPredicate): string {
  return findComponent(components, predicate)?.long_name ?? '';
}

function readComponents(record: AddressRecord, components: AddressComponent[]): void {
  record.streetNumber = longName(components, COMPONENT_PREDICATES.streetNumber);
  record.street = longName(components, COMPONENT_PREDICATES.street);
  record.city = longName(components, COMPONENT_PREDICATES.city);
  record.subLocality = longName(components, COMPONENT_PREDICATES.subLocality);
  record.postalCode = longName(components, COMPONENT_PREDICATES.postalCode);
  record.adminAreaLevel2 = longName(components, COMPONENT_PREDICATES.adminAreaLevel2);
  record.adminAreaLevel1 = longName(components, COMPONENT_PREDICATES.adminAreaLevel1);
  record.country = longName(components, COMPONENT_PREDICATES.country);
  record.countryCode = (findComponent(components, COMPONENT_PREDICATES.country)?.short_name ?? '').toLowerCase();
}

function readLocation(geometry: Geometry | undefined): { lat: number; lng: number } {
  const lat = geometry?.location?.lat;
  const lng = geometry?.location?.lng;

  if (typeof lat !== 'number' || typeof lng !== 'number') {
    throw new UpstreamPayloadError('Candidate has no geometry.location');
  }

  return { lat, lng };
}

export function buildMapsUrl(latitude: number, longitude: number, placeId: string): string {
  return `${MAPS_SEARCH_URL}&query=${latitude.toFixed(6)}%2C${longitude.toFixed(6)}&query_place_id=${placeId}`;
}

function scoreCandidates(query: string, addresses: Array<() => string>): CandidateSelection {
  let index = -1;
  let ratio = 0;

  addresses.forEach((address, k) => {
    let candidate = '';
    try {
      candidate = address();
    } catch (error) {
      logger.debug('Candidate without a comparable address', { index: k, error: errorMessage(error) });
    }

    const score = similarity(query, candidate, true);
    if (score > ratio) {
      ratio = score;
      index = k;
    }
  });

  return { index, formattedAddress: null, ratio: roundTo(ratio) };
}

/** Picks the geocoder candidate whose formatted address is closest to the query. */
export function selectBestGeocodeResult(query: string, results: GeocodeResult[]): CandidateSelection {
  const selection = scoreCandidates(query, results.map((result) => () => result.formatted_address ?? ''));

  return {
    ...selection,
    formattedAddress: selection.index >= 0 ? results[selection.index].formatted_address ?? null : null
  };
}

/** Same as `selectBestGeocodeResult` for place lists, falling back to the vicinity. */
export function selectBestPlace(query: string, places: PlaceData[]): CandidateSelection {
  const selection = scoreCandidates(query, places.map((place) => () => {
    const formatted = place.formatted_address ?? '';
    if (formatted.length > 0) {
      return formatted;
    }
    if (typeof place.vicinity !== 'string') {
      throw new UpstreamPayloadError('Place has neither formatted_address nor vicinity');
    }
    return place.vicinity;
  }));

  return {
    ...selection,
    formattedAddress: selection.index >= 0 ? places[selection.index].formatted_address ?? null : null
  };
}

/**
 * Parses a geocode-style result list. With a query the closest candidate is used and its
 * similarity becomes the record's confidence; without one the first candidate is used.
 */
export function parseGeocodeResults(
  query: string | null,
  results: GeocodeResult[],
  record: AddressRecord,
  codeLength: number
): AddressRecord {
  let index = results.length > 0 ? 0 : -1;

  if (query !== null) {
    const selection = selectBestGeocodeResult(query, results);
    index = selection.index;
    record.formattedAddress = selection.formattedAddress ?? '';
    record.confidence = selection.ratio;
  }

  if (index < 0) {
    return record;
  }

  const candidate = results[index];
  if (query === null) {
    record.formattedAddress = candidate.formatted_address ?? '';
  }

  readComponents(record, candidate.address_components ?? []);

  const { lat, lng } = readLocation(candidate.geometry);
  record.latitude = lat;
  record.longitude = lng;
  record.locationType = candidate.geometry?.location_type ?? 'NOT_FOUND';
  record.placeId = candidate.place_id ?? '';
  record.plusCode = encodePlusCode(lat, lng, codeLength);
  record.mapsUrl = buildMapsUrl(lat, lng, record.placeId);

  return record;
}

const isEstablishment = (place: PlaceData): boolean => (place.types ?? []).includes('establishment');

function toTime(value: string | undefined): string {
  if (typeof value !== 'string' || value.length < 4) {
    throw new UpstreamPayloadError(`Invalid opening hours time: ${String(value)}`);
  }
  return `${value.slice(0, 2)}:${value.slice(-2)}`;
}

function toWeekday(point: OpeningHoursPoint | undefined): Weekday {
  const day = point?.day;
  if (typeof day !== 'number' || !Number.isInteger(day) || day < 0 || day > 7) {
    throw new UpstreamPayloadError(`Invalid opening hours day: ${String(day)}`);
  }
  // Day 0 is Sunday, 1-6 Monday to Saturday
  return WEEKDAYS[(day + 6) % 7];
}

/**
 * Opening windows per weekday for establishments, as `HH:MM-HH:MM` joined by `|`.
 * Days without a period, non-establishments and unreadable payloads give null for every day.
 */
export function parseOpeningHours(place: PlaceData | undefined): OpeningHours {
  const hours = emptyOpeningHours();

  if (place === undefined || !isEstablishment(place)) {
    return hours;
  }

  try {
    const periods = place.opening_hours?.periods;
    if (!Array.isArray(periods)) {
      throw new UpstreamPayloadError('Place has no opening_hours.periods');
    }

    for (const period of periods) {
      const weekday = toWeekday(period.open);
      const window = `${toTime(period.open?.time)}-${toTime(period.close?.time)}`;
      const current = hours[weekday];
      hours[weekday] = current === null ? window : `${current}|${window}`;
    }
  } catch (error) {
    logger.debug('Opening hours unavailable', { placeId: place.place_id, error: errorMessage(error) });
    return emptyOpeningHours();
  }

  return hours;
}

function requireResult(details: PlaceDetailsResponse): PlaceData {
  if (!details.result) {
    throw new UpstreamPayloadError('Place details payload has no result');
  }
  return details.result;
}

/**
 * Business fields of a place: name, categories, Google URL, website, phone and opening hours.
 * URL, website and phone stay empty for anything that is not an establishment.
 */
export function parseBusinessDetails(details: PlaceDetailsResponse, record: AddressRecord): AddressRecord {
  const place = requireResult(details);
  const types = place.types ?? [];
  const establishment = isEstablishment(place);

  record.placeName = place.name ?? '';
  record.placeType = [...types];
  record.placeMainType = types[0] ?? '';
  record.placeUrl = establishment ? place.url ?? '' : '';
  record.website = establishment ? place.website ?? '' : '';
  record.phone = establishment ? place.international_phone_number ?? '' : '';

  Object.assign(record, parseOpeningHours(place));

  return record;
}

/**
 * Parses a place-details payload. The Places API reports no precision, so the location
 * type is always ROOFTOP. With a query, its similarity to the address becomes the confidence.
 */
export function parsePlaceDetails(
  query: string | null,
  details: PlaceDetailsResponse,
  record: AddressRecord,
  codeLength: number
): AddressRecord {
  const place = requireResult(details);

  record.formattedAddress = place.formatted_address ?? '';
  if (query !== null) {
    record.confidence = roundTo(similarity(query, record.formattedAddress, true));
  }

  readComponents(record, place.address_components ?? []);

  const { lat, lng } = readLocation(place.geometry);
  record.latitude = lat;
  record.longitude = lng;
  record.locationType = 'ROOFTOP';
  record.placeId = place.place_id ?? '';
  record.plusCode = encodePlusCode(lat, lng, codeLength);
  record.mapsUrl = buildMapsUrl(lat, lng, record.placeId);

  return parseBusinessDetails(details, record);
}

/** Street left in the formatted address once the `"{postal code} {city}, {country}"` tail is removed. */
export function refineAddress(record: Pick<AddressRecord, 'formattedAddress' | 'postalCode' | 'city' | 'country'>): string {
  const tail = `${record.postalCode} ${record.city}, ${record.country}`.trim();

  return record.formattedAddress.split(tail).join('').trim().replace(/,/g, '');
}

/** Fills `address` from street number and street, deriving the street first when it is missing. */
export function deriveAddress(record: AddressRecord): AddressRecord {
  if (record.street.length === 0) {
    record.street = refineAddress(record);
  }
  record.address = `${record.streetNumber} ${record.street}`.trim();

  return record;
}
