/**
 * Place
 * Accumulates what the geocoding and places strategies find about one input (free text,
 * phone number, place id, coordinates or a set of hints), scores it against the hints and
 * decides whether it can be accepted.
 *
 * Each strategy resolves with the place itself. Failures inside a strategy are logged and
 * leave the record with whatever was parsed before the failure.
 */

import { ComponentFilter, MapsClient } from '../types/googleMaps';
import {
  AddressRecord,
  ApiUsed,
  HintField,
  PlaceHints,
  PlaceResponses,
  RadarCandidate,
  ReferenceRecord,
  Thresholds,
  emptyAddressRecord
} from '../types/place';
import coordinateTransform, { CoordinatePoint, LatLngTuple } from '../utils/coordinateTransform';
import { ConfigurationError, InvalidInputError, errorMessage } from '../utils/errors';
import { DEFAULT_CODE_LENGTH } from '../utils/plusCode';
import { clean, isNumeric, normalize } from '../utils/stringMetrics';
import Logger from '../utils/logger';
import { AcceptanceContext, DEFAULT_THRESHOLDS, ThresholdInput, check, isBetter, resolveThresholds, validateComponents } from './acceptanceEngine';
import { applyScores, compareWith } from './confidenceScorer';
import {
  PipelineContext,
  SearchContext,
  autocompleteStrategy,
  fetchPlaceDetails,
  findPlaceStrategy,
  runCandidateStrategy,
  runStage,
  textSearchStrategy
} from './placePipeline';
import { deriveAddress, parseBusinessDetails, parseGeocodeResults, parsePlaceDetails } from './responseParser';

const logger = Logger.createServiceLogger('Place');

export const DEFAULT_COMPONENTS: Readonly<ComponentFilter> = { country: 'france' };
export const DEFAULT_LANGUAGE = 'fr';

/** Hints, optionally with coordinates under `lat/lng`, `latitude/longitude` or `lat/lon`. */
export type PlaceInput = PlaceHints & {
  lat?: number;
  lng?: number;
  lon?: number;
  latitude?: number;
  longitude?: number;
};

export type PlaceSource = string | LatLngTuple | PlaceInput;

export interface PlaceOptions {
  /** Geocoding API component filter, also enforced by `check()`. Null disables it. */
  components?: ComponentFilter | null;
  language?: string;
  codeLength?: number;
  isBusiness?: boolean;
  client?: MapsClient;
}

export interface StageOptions {
  /** Hint fields the query is built from instead of the input text. */
  fields?: HintField[];
  /** Pre-fetched payloads, used instead of calling the client. */
  response?: PlaceResponses;
}

export interface SearchOptions extends StageOptions {
  location?: CoordinatePoint;
  radius?: number;
  businessType?: string;
}

export interface RadarOptions {
  radius?: number;
  keyword?: string;
  businessType?: string;
  response?: PlaceResponses;
}

export interface DetailsOptions {
  /** Distance in metres to record, typically from `radar()`. */
  distance?: number;
  response?: PlaceResponses;
}

const HINT_FIELDS: readonly HintField[] = [
  'id', 'externalId', 'name', 'inputText', 'inputAddress', 'inputCity', 'inputPostalCode', 'inputCountry'
];

function readHints(input: Record<string, unknown>): PlaceHints {
  const hints: PlaceHints = {};

  for (const field of HINT_FIELDS) {
    const value = input[field];
    if (typeof value === 'string') {
      hints[field] = value;
    } else if (typeof value === 'number' && Number.isFinite(value)) {
      hints[field] = String(value);
    }
  }

  return hints;
}

export class Place {
  private readonly hints: PlaceHints;
  private readonly coordinates: CoordinatePoint | null;
  private readonly components: ComponentFilter | null;
  private readonly language: string;
  private readonly codeLength: number;
  private readonly isBusiness: boolean;
  private readonly client?: MapsClient;
  private currentThresholds: Thresholds = { ...DEFAULT_THRESHOLDS };
  private data: AddressRecord = emptyAddressRecord();

  /** Raw payloads of the last call of each kind. */
  readonly responses: PlaceResponses = {};

  constructor(source: PlaceSource, options: PlaceOptions = {}) {
    if (typeof source === 'string') {
      this.hints = { inputText: source };
      this.coordinates = null;
    } else if (Array.isArray(source)) {
      this.hints = {};
      this.coordinates = coordinateTransform.fromLatLng(source);
    } else if (typeof source === 'object' && source !== null) {
      const input: Record<string, unknown> = { ...source };
      this.hints = readHints(input);
      this.coordinates = coordinateTransform.fromLatLng(input);
    } else {
      throw new InvalidInputError(`Unsupported place input of type ${typeof source}`);
    }

    if (this.coordinates !== null && !coordinateTransform.validateCoordinates(this.coordinates)) {
      throw new InvalidInputError(`Coordinates out of range: ${coordinateTransform.toLatLngString(this.coordinates)}`);
    }

    this.components = options.components === undefined ? { ...DEFAULT_COMPONENTS } : options.components;
    validateComponents(this.components);

    this.language = options.language ?? DEFAULT_LANGUAGE;
    this.codeLength = options.codeLength ?? DEFAULT_CODE_LENGTH;
    this.isBusiness = options.isBusiness ?? false;
    this.client = options.client;

    this.data.inputText = this.hints.inputText ?? '';
  }

  setThresholds(thresholds: ThresholdInput): this {
    this.currentThresholds = resolveThresholds(thresholds, this.currentThresholds);
    return this;
  }

  /**
   * Builds the query from hint fields: present values are joined, folded to ASCII and
   * normalized. The result becomes the input text.
   */
  useFields(fields: HintField[]): this {
    const joined = fields
      .map((field) => this.hints[field])
      .filter((value): value is string => value !== undefined && value.length > 0)
      .join(' ');
    const cleaned = clean(joined);
    const query = cleaned === null ? '' : normalize(cleaned);

    this.hints.inputText = query;
    this.data.inputText = query;
    return this;
  }

  /** Resets every result field, keeping the input text. */
  empty(): this {
    this.data = { ...emptyAddressRecord(), inputText: this.data.inputText };
    return this;
  }

  async geocode(options: StageOptions = {}): Promise<this> {
    const query = this.prepareQuery(options.fields);

    await runStage('geocode', this.data, async (record) => {
      const context = this.context(record, options.response);

      if (isNumeric(query)) {
        await this.geocodePhoneNumber(context, query);
        return;
      }

      const results = options.response?.geocode ?? await this.requireClient().geocode({
        address: query,
        components: this.components,
        language: this.language
      });
      this.responses.geocode = results;

      parseGeocodeResults(query, results, record, this.codeLength);
      deriveAddress(record);

      if (this.isBusiness) {
        const details = await fetchPlaceDetails(context, record.placeId);
        parseBusinessDetails(details, record);
      }

      applyScores(this.hints, record);
      record.apiUsed = 'geocode';
    });

    return this;
  }

  // Numeric queries are phone numbers: find the place, then read its details
  private async geocodePhoneNumber(context: PipelineContext, query: string): Promise<void> {
    const found = context.injected?.findPlace ?? await this.requireClient().findPlace({
      input: query,
      inputType: 'phonenumber',
      language: this.language
    });
    this.responses.findPlace = found;

    const placeId = found.candidates?.[0]?.place_id;
    if (placeId !== undefined) {
      const details = await fetchPlaceDetails(context, placeId);
      parsePlaceDetails(null, details, context.record, this.codeLength);
      deriveAddress(context.record);
    }

    context.record.apiUsed = 'find_place';
  }

  async reverseGeocode(options: Pick<StageOptions, 'response'> = {}): Promise<this> {
    await runStage('reverse_geocode', this.data, async (record) => {
      const context = this.context(record, options.response);

      const results = options.response?.reverseGeocode ?? await this.requireClient().reverseGeocode({
        latlng: this.requireCoordinates(),
        language: this.language
      });
      this.responses.reverseGeocode = results;

      parseGeocodeResults(null, results, record, this.codeLength);
      deriveAddress(record);

      if (this.isBusiness) {
        const details = await fetchPlaceDetails(context, record.placeId);
        parseBusinessDetails(details, record);
      }

      record.apiUsed = 'reverse_geocode';
    });

    return this;
  }

  async autocomplete(options: StageOptions = {}): Promise<this> {
    const query = this.prepareQuery(options.fields);

    await runStage('autocomplete', this.data, (record) =>
      runCandidateStrategy(autocompleteStrategy, this.context(record, options.response), this.searchContext(query, {}))
    );

    return this;
  }

  async textSearch(options: SearchOptions = {}): Promise<this> {
    const query = this.prepareQuery(options.fields);

    await runStage('text_search', this.data, (record) =>
      runCandidateStrategy(textSearchStrategy, this.context(record, options.response), this.searchContext(query, options))
    );

    return this;
  }

  async findPlace(options: SearchOptions = {}): Promise<this> {
    const query = this.prepareQuery(options.fields);

    await runStage('find_place', this.data, (record) =>
      runCandidateStrategy(findPlaceStrategy, this.context(record, options.response), this.searchContext(query, options))
    );

    return this;
  }

  /**
   * Places around this place, with their distance in metres. A textual place is geocoded
   * first to find the search origin. Resolves with an empty list when anything fails.
   */
  async radar(options: RadarOptions = {}): Promise<RadarCandidate[]> {
    try {
      let origin = this.coordinates;

      if (this.data.inputText.length > 0) {
        await this.geocode({ response: options.response });
        origin = this.data.placeId.length > 0
          ? { latitude: this.data.latitude, longitude: this.data.longitude }
          : null;
      }

      if (origin === null) {
        throw new InvalidInputError('No origin to search around');
      }

      const nearby = options.response?.radar ?? await this.requireClient().placesNearby({
        location: origin,
        radius: options.radius,
        keyword: options.keyword,
        language: this.language,
        type: options.businessType
      });
      this.responses.radar = nearby;

      const from = origin;
      return (nearby.results ?? []).map((place) => {
        const location = coordinateTransform.fromLatLng(place.geometry?.location);
        if (location === null || place.place_id === undefined) {
          throw new InvalidInputError('Nearby place without place_id or location');
        }
        return {
          placeId: place.place_id,
          distance: coordinateTransform.calculateDistance(location, from).meters
        };
      });
    } catch (error) {
      logger.warn('Stage failed, no nearby candidates', {
        stage: 'radar',
        inputText: this.data.inputText,
        error: errorMessage(error)
      });
      return [];
    }
  }

  /** Details of the place whose id is the input text. */
  async placeDetails(options: DetailsOptions = {}): Promise<this> {
    await runStage('place_details', this.data, async (record) => {
      const context = this.context(record, options.response);

      const details = await fetchPlaceDetails(context, this.data.inputText);
      parsePlaceDetails(null, details, record, this.codeLength);
      deriveAddress(record);

      if (options.distance !== undefined) {
        record.distance = options.distance;
      }

      record.apiUsed = 'place_details';
    });

    return this;
  }

  /** Re-scores the record against a ground truth record. */
  compareWith(reference: ReferenceRecord, lcs = false): this {
    compareWith(this.data, reference, lcs);
    return this;
  }

  check(): this {
    this.data.accepted = check(this.data, this.acceptanceContext());
    return this;
  }

  /** Whether this place should replace `other`, judged with this place's thresholds. */
  isBetter(other: Place | null | undefined): boolean {
    return isBetter(this.data, other?.data, this.currentThresholds);
  }

  get<K extends keyof AddressRecord>(field: K): AddressRecord[K] {
    return this.data[field];
  }

  get thresholds(): Thresholds {
    return { ...this.currentThresholds };
  }

  get input(): PlaceHints {
    return { ...this.hints };
  }

  get inputText(): string { return this.data.inputText; }
  get formattedAddress(): string { return this.data.formattedAddress; }
  get address(): string { return this.data.address; }
  get streetNumber(): string { return this.data.streetNumber; }
  get street(): string { return this.data.street; }
  get city(): string { return this.data.city; }
  get postalCode(): string { return this.data.postalCode; }
  get country(): string { return this.data.country; }
  get countryCode(): string { return this.data.countryCode; }
  get latitude(): number { return this.data.latitude; }
  get longitude(): number { return this.data.longitude; }
  get locationType(): string { return this.data.locationType; }
  get locationAccuracy(): number { return this.data.locationAccuracy; }
  get placeId(): string { return this.data.placeId; }
  get placeName(): string { return this.data.placeName; }
  get plusCode(): string { return this.data.plusCode; }
  get confidence(): number { return this.data.confidence; }
  get accepted(): boolean { return this.data.accepted; }
  get apiUsed(): ApiUsed { return this.data.apiUsed; }

  toJSON(): AddressRecord {
    return { ...this.data, placeType: [...this.data.placeType] };
  }

  private prepareQuery(fields?: HintField[]): string {
    if (fields !== undefined) {
      this.useFields(fields);
    }
    return this.data.inputText;
  }

  private requireClient(): MapsClient {
    if (this.client === undefined) {
      throw new ConfigurationError('No Maps client configured and no response provided');
    }
    return this.client;
  }

  private requireCoordinates(): CoordinatePoint {
    if (this.coordinates === null) {
      throw new InvalidInputError('Reverse geocoding needs coordinates');
    }
    return this.coordinates;
  }

  private context(record: AddressRecord, injected?: PlaceResponses): PipelineContext {
    return {
      record,
      responses: this.responses,
      injected,
      codeLength: this.codeLength,
      language: this.language,
      client: () => this.requireClient(),
      score: (scored) => {
        applyScores(this.hints, scored);
      }
    };
  }

  private searchContext(query: string, options: Pick<SearchOptions, 'location' | 'radius' | 'businessType'>): SearchContext {
    return {
      query,
      language: this.language,
      location: options.location,
      radius: options.radius,
      businessType: options.businessType
    };
  }

  private acceptanceContext(): AcceptanceContext {
    return {
      thresholds: this.currentThresholds,
      components: this.components,
      inputPostalCode: this.hints.inputPostalCode
    };
  }
}

export default Place;
