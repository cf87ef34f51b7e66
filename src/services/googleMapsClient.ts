/**
 * Google Maps Platform client
 * Geocoding and Places web services over axios, with an in-memory response cache.
 * One request per call: retries are left to the caller.
 */

import axios, { AxiosInstance } from 'axios';
import NodeCache from 'node-cache';
import { GoogleMapsConfig } from '../config';
import {
  AutocompleteParams,
  AutocompletePrediction,
  ComponentFilter,
  FindPlaceParams,
  FindPlaceResponse,
  GeocodeParams,
  GeocodeResult,
  MapsClient,
  NearbySearchParams,
  PlaceDetailsParams,
  PlaceDetailsResponse,
  PlacesSearchResponse,
  ReverseGeocodeParams,
  TextSearchParams
} from '../types/googleMaps';
import coordinateTransform from '../utils/coordinateTransform';
import { ConfigurationError, MapsApiError, errorMessage } from '../utils/errors';
import Logger from '../utils/logger';

const logger = Logger.createServiceLogger('GoogleMapsClient');

const SUCCESS_STATUSES = ['OK', 'ZERO_RESULTS'];

// Find Place only returns the place id unless fields are requested
const FIND_PLACE_FIELDS = 'place_id,name,formatted_address,geometry,types';

type QueryParams = Record<string, string | number | undefined>;

interface StatusEnvelope {
  status?: string;
  error_message?: string;
}

interface GeocodeEnvelope extends StatusEnvelope {
  results?: GeocodeResult[];
}

interface AutocompleteEnvelope extends StatusEnvelope {
  predictions?: AutocompletePrediction[];
}

export function formatComponents(components: ComponentFilter | null | undefined): string | undefined {
  if (!components) {
    return undefined;
  }

  const parts = Object.entries(components).map(([key, value]) => `${key}:${value}`);
  return parts.length > 0 ? parts.join('|') : undefined;
}

export class GoogleMapsClient implements MapsClient {
  private readonly http: AxiosInstance;
  private readonly cache: NodeCache;

  constructor(settings: GoogleMapsConfig) {
    if (!settings.apiKey) {
      throw new ConfigurationError('GOOGLE_MAPS_API_KEY is not set', 'GOOGLE_MAPS_API_KEY');
    }

    this.http = axios.create({
      baseURL: settings.baseUrl,
      timeout: settings.timeoutMs,
      params: { key: settings.apiKey }
    });

    this.cache = new NodeCache({
      stdTTL: settings.cacheTtlSeconds,
      useClones: false,
      checkperiod: 60
    });
  }

  async geocode(params: GeocodeParams): Promise<GeocodeResult[]> {
    const data = await this.request<GeocodeEnvelope>('/geocode/json', {
      address: params.address,
      components: formatComponents(params.components),
      language: params.language
    });
    return data.results ?? [];
  }

  async reverseGeocode(params: ReverseGeocodeParams): Promise<GeocodeResult[]> {
    const data = await this.request<GeocodeEnvelope>('/geocode/json', {
      latlng: coordinateTransform.toLatLngString(params.latlng),
      language: params.language
    });
    return data.results ?? [];
  }

  findPlace(params: FindPlaceParams): Promise<FindPlaceResponse> {
    return this.request<FindPlaceResponse>('/place/findplacefromtext/json', {
      input: params.input,
      inputtype: params.inputType,
      locationbias: params.locationBias,
      fields: FIND_PLACE_FIELDS,
      language: params.language
    });
  }

  async placesAutocomplete(params: AutocompleteParams): Promise<AutocompletePrediction[]> {
    const data = await this.request<AutocompleteEnvelope>('/place/autocomplete/json', {
      input: params.input,
      offset: params.offset,
      language: params.language
    });
    return data.predictions ?? [];
  }

  places(params: TextSearchParams): Promise<PlacesSearchResponse> {
    return this.request<PlacesSearchResponse>('/place/textsearch/json', {
      query: params.query,
      location: params.location ? coordinateTransform.toLatLngString(params.location) : undefined,
      radius: params.radius,
      language: params.language,
      type: params.type
    });
  }

  place(params: PlaceDetailsParams): Promise<PlaceDetailsResponse> {
    return this.request<PlaceDetailsResponse>('/place/details/json', {
      place_id: params.placeId,
      language: params.language
    });
  }

  placesNearby(params: NearbySearchParams): Promise<PlacesSearchResponse> {
    return this.request<PlacesSearchResponse>('/place/nearbysearch/json', {
      location: coordinateTransform.toLatLngString(params.location),
      radius: params.radius,
      keyword: params.keyword,
      language: params.language,
      type: params.type
    });
  }

  clearCache(): void {
    this.cache.flushAll();
  }

  private async request<T extends StatusEnvelope>(endpoint: string, params: QueryParams): Promise<T> {
    const query = Object.fromEntries(
      Object.entries(params).filter(([, value]) => value !== undefined && value !== '')
    );
    const cacheKey = `${endpoint}:${JSON.stringify(query)}`;

    const cached = this.cache.get<T>(cacheKey);
    if (cached !== undefined) {
      logger.debug('Upstream cache hit', { endpoint });
      return cached;
    }

    const startTime = Date.now();
    let data: T;

    try {
      const response = await this.http.get<T>(endpoint, { params: query });
      data = response.data;
    } catch (error) {
      Logger.logUpstreamCall(endpoint, Date.now() - startTime, 'TRANSPORT_ERROR', query);
      throw new MapsApiError(`Request to ${endpoint} failed: ${errorMessage(error)}`, endpoint);
    }

    const status = data.status ?? 'UNKNOWN';
    Logger.logUpstreamCall(endpoint, Date.now() - startTime, status, query);

    if (!SUCCESS_STATUSES.includes(status)) {
      throw new MapsApiError(
        data.error_message ? `${status}: ${data.error_message}` : `Upstream status ${status}`,
        endpoint,
        status
      );
    }

    this.cache.set(cacheKey, data);
    return data;
  }
}

export default GoogleMapsClient;
