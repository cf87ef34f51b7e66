/**
 * Core record types for the reconciliation engine
 */

import {
  AutocompletePrediction,
  FindPlaceResponse,
  GeocodeResult,
  PlaceDetailsResponse,
  PlacesSearchResponse
} from './googleMaps';

export const LOCATION_TYPES = ['NOT_FOUND', 'APPROXIMATE', 'GEOMETRIC_CENTER', 'RANGE_INTERPOLATED', 'ROOFTOP'] as const;

export type LocationType = typeof LOCATION_TYPES[number];

/** Strategy that produced a record; empty until a stage completes. */
export type ApiUsed =
  | ''
  | 'geocode'
  | 'reverse_geocode'
  | 'autocomplete'
  | 'text_search'
  | 'find_place'
  | 'place_details';

export const WEEKDAYS = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday'] as const;

export type Weekday = typeof WEEKDAYS[number];

/** Pipe-delimited `HH:MM-HH:MM` windows per day, null on closed or unknown days. */
export type OpeningHours = Record<Weekday, string | null>;

export interface AddressRecord extends Record<Weekday, string | null> {
  inputText: string;
  formattedAddress: string;
  streetNumber: string;
  street: string;
  address: string;
  city: string;
  subLocality: string;
  postalCode: string;
  adminAreaLevel1: string;
  adminAreaLevel2: string;
  country: string;
  countryCode: string;
  latitude: number;
  longitude: number;
  /** One of `LOCATION_TYPES`, or the raw value the geocoder sent when it is not a known one. */
  locationType: LocationType | string;
  /** 0-4 rank of `locationType`, -1 when the type is not one of the known ones. */
  locationAccuracy: number;
  placeId: string;
  placeName: string;
  placeType: string[];
  placeMainType: string;
  plusCode: string;
  confidence: number;
  confidenceOnName: number;
  confidenceOnAddr: number;
  confidenceOnCity: number;
  confidenceOnPostalCode: number;
  confidenceOnCountry: number;
  accepted: boolean;
  apiUsed: ApiUsed;
  mapsUrl: string;
  placeUrl: string;
  website: string;
  phone: string;
  /** Metres from the search origin, when the record comes from a nearby search. */
  distance: number | null;
}

/** What the caller knows about the place before geocoding it. */
export interface PlaceHints {
  id?: string;
  externalId?: string;
  name?: string;
  inputText?: string;
  inputAddress?: string;
  inputCity?: string;
  inputPostalCode?: string;
  inputCountry?: string;
}

export type HintField = keyof PlaceHints;

/** Ground truth accepted by `compareWith`. */
export type ReferenceRecord = Pick<PlaceHints, 'inputText' | 'name' | 'inputAddress' | 'inputCity' | 'inputCountry'>;

export interface Thresholds {
  threshold: number;
  thresholdOnName: number;
  thresholdOnAddr: number;
  thresholdOnCity: number;
  /** 0 or 1: gates the exact postal code comparison. */
  thresholdOnPostalCode: number;
}

export type ThresholdName = keyof Thresholds;

/** Raw payloads kept per place, one slot per collaborator call. */
export interface PlaceResponses {
  geocode?: GeocodeResult[];
  reverseGeocode?: GeocodeResult[];
  findPlace?: FindPlaceResponse;
  autocomplete?: AutocompletePrediction[];
  textSearch?: PlacesSearchResponse;
  radar?: PlacesSearchResponse;
  placeDetails?: PlaceDetailsResponse;
}

export interface RadarCandidate {
  placeId: string;
  /** Metres from the search origin. */
  distance: number;
}

export function emptyOpeningHours(): OpeningHours {
  return {
    monday: null,
    tuesday: null,
    wednesday: null,
    thursday: null,
    friday: null,
    saturday: null,
    sunday: null
  };
}

export function emptyAddressRecord(): AddressRecord {
  return {
    inputText: '',
    formattedAddress: '',
    streetNumber: '',
    street: '',
    address: '',
    city: '',
    subLocality: '',
    postalCode: '',
    adminAreaLevel1: '',
    adminAreaLevel2: '',
    country: '',
    countryCode: '',
    latitude: 0,
    longitude: 0,
    locationType: 'NOT_FOUND',
    locationAccuracy: 0,
    placeId: '',
    placeName: '',
    placeType: [],
    placeMainType: '',
    plusCode: '',
    confidence: 0,
    confidenceOnName: 0,
    confidenceOnAddr: 0,
    confidenceOnCity: 0,
    confidenceOnPostalCode: 0,
    confidenceOnCountry: 0,
    accepted: false,
    apiUsed: '',
    mapsUrl: '',
    placeUrl: '',
    website: '',
    phone: '',
    monday: '',
    tuesday: '',
    wednesday: '',
    thursday: '',
    friday: '',
    saturday: '',
    sunday: '',
    distance: null
  };
}

export function isLocationType(value: unknown): value is LocationType {
  return typeof value === 'string' && (LOCATION_TYPES as readonly string[]).includes(value);
}
