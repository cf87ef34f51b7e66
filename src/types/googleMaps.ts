/**
 * Google Maps Platform web service payloads (Geocoding and Places)
 * Only the fields the reconciliation engine reads are described; all of them are optional
 * since upstream shapes vary between endpoints.
 */

import { CoordinatePoint } from '../utils/coordinateTransform';

export interface LatLngLiteral {
  lat?: number;
  lng?: number;
}

export interface AddressComponent {
  long_name?: string;
  short_name?: string;
  types?: string[];
}

export interface Geometry {
  location?: LatLngLiteral;
  location_type?: string | null;
}

export interface GeocodeResult {
  formatted_address?: string;
  address_components?: AddressComponent[];
  geometry?: Geometry;
  place_id?: string;
  types?: string[];
}

export interface OpeningHoursPoint {
  day?: number;
  time?: string;
}

export interface OpeningHoursPeriod {
  open?: OpeningHoursPoint;
  close?: OpeningHoursPoint;
}

export interface PlaceData extends GeocodeResult {
  name?: string;
  vicinity?: string;
  url?: string;
  website?: string;
  international_phone_number?: string;
  opening_hours?: {
    open_now?: boolean;
    periods?: OpeningHoursPeriod[];
  };
}

export interface PlaceDetailsResponse {
  result?: PlaceData;
  status?: string;
}

export interface FindPlaceResponse {
  candidates?: PlaceData[];
  status?: string;
}

export interface PlacesSearchResponse {
  results?: PlaceData[];
  status?: string;
  next_page_token?: string;
}

export interface AutocompletePrediction {
  place_id?: string;
  description?: string;
  types?: string[];
}

/** Component filter sent to the Geocoding API, e.g. `{ country: 'france' }`. */
export type ComponentFilter = Record<string, string>;

export type FindPlaceInputType = 'textquery' | 'phonenumber';

export interface GeocodeParams {
  address: string;
  components?: ComponentFilter | null;
  language?: string;
}

export interface ReverseGeocodeParams {
  latlng: CoordinatePoint;
  language?: string;
}

export interface FindPlaceParams {
  input: string;
  inputType: FindPlaceInputType;
  locationBias?: string;
  language?: string;
}

export interface AutocompleteParams {
  input: string;
  offset?: number;
  language?: string;
}

export interface TextSearchParams {
  query: string;
  location?: CoordinatePoint;
  radius?: number;
  language?: string;
  type?: string;
}

export interface PlaceDetailsParams {
  placeId: string;
  language?: string;
}

export interface NearbySearchParams {
  location: CoordinatePoint;
  radius?: number;
  keyword?: string;
  language?: string;
  type?: string;
}

/**
 * Capability set the reconciliation engine consumes. Every method resolves with the raw
 * upstream payload; geocoding and autocomplete resolve with their result lists.
 */
export interface MapsClient {
  geocode(params: GeocodeParams): Promise<GeocodeResult[]>;
  reverseGeocode(params: ReverseGeocodeParams): Promise<GeocodeResult[]>;
  findPlace(params: FindPlaceParams): Promise<FindPlaceResponse>;
  placesAutocomplete(params: AutocompleteParams): Promise<AutocompletePrediction[]>;
  places(params: TextSearchParams): Promise<PlacesSearchResponse>;
  place(params: PlaceDetailsParams): Promise<PlaceDetailsResponse>;
  placesNearby(params: NearbySearchParams): Promise<PlacesSearchResponse>;
}
