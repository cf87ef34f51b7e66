/**
 * Place Pipeline
 * Stage runner shared by every strategy, and the candidate strategies (autocomplete, text
 * search, find place) that search for places, pick one, then parse its details.
 */

import {
  FindPlaceInputType,
  MapsClient,
  PlaceData,
  PlaceDetailsResponse
} from '../types/googleMaps';
import { AddressRecord, ApiUsed, PlaceResponses, emptyAddressRecord } from '../types/place';
import { CoordinatePoint } from '../utils/coordinateTransform';
import { errorMessage } from '../utils/errors';
import { isNumeric } from '../utils/stringMetrics';
import Logger from '../utils/logger';
import { deriveAddress, parsePlaceDetails, selectBestPlace } from './responseParser';

const logger = Logger.createServiceLogger('PlacePipeline');

/**
 * Runs one stage on a fresh record. Errors are logged and the partially filled record is
 * still merged into `target`, key by key.
 */
export async function runStage(
  stage: string,
  target: AddressRecord,
  work: (record: AddressRecord) => Promise<void>
): Promise<AddressRecord> {
  const record: AddressRecord = {
    ...emptyAddressRecord(),
    inputText: target.inputText,
    distance: target.distance
  };

  try {
    await work(record);
  } catch (error) {
    logger.warn('Stage failed, keeping the partial record', {
      stage,
      inputText: target.inputText,
      error: errorMessage(error)
    });
  } finally {
    Object.assign(target, record);
  }

  return target;
}

/** `point:lat,lng` or `circle:radius@lat,lng`, five decimals. */
export function formatLocationBias(location: CoordinatePoint, radius?: number): string {
  const point = `${location.latitude.toFixed(5)},${location.longitude.toFixed(5)}`;

  return radius === undefined ? `point:${point}` : `circle:${Math.round(radius)}@${point}`;
}

export function findPlaceInputType(query: string): FindPlaceInputType {
  return isNumeric(query) ? 'phonenumber' : 'textquery';
}

export interface SearchContext {
  query: string;
  language: string;
  location?: CoordinatePoint;
  radius?: number;
  businessType?: string;
}

/** Everything a stage needs from the place running it. */
export interface PipelineContext {
  record: AddressRecord;
  responses: PlaceResponses;
  injected?: PlaceResponses;
  codeLength: number;
  language: string;
  client(): MapsClient;
  score(record: AddressRecord): void;
}

type CandidateResponseKey = 'autocomplete' | 'textSearch' | 'findPlace';

type Payload<K extends CandidateResponseKey> = NonNullable<PlaceResponses[K]>;

export interface CandidateStrategy<K extends CandidateResponseKey> {
  apiUsed: ApiUsed;
  responseKey: K;
  /** Whether the query is compared with the chosen place's address to set the confidence. */
  parseWithQuery: boolean;
  search(client: MapsClient, context: SearchContext): Promise<Payload<K>>;
  selectPlaceId(payload: Payload<K>, query: string): string | null;
}

// The best scoring place, or the first one when none resembles the query
function pickPlace(places: PlaceData[], query: string): PlaceData | undefined {
  const { index } = selectBestPlace(query, places);
  return index >= 0 ? places[index] : places[0];
}

export const autocompleteStrategy: CandidateStrategy<'autocomplete'> = {
  apiUsed: 'autocomplete',
  responseKey: 'autocomplete',
  parseWithQuery: false,
  search: (client, { query, language }) =>
    client.placesAutocomplete({ input: query, offset: query.length, language }),
  selectPlaceId: (predictions) => predictions[0]?.place_id ?? null
};

export const textSearchStrategy: CandidateStrategy<'textSearch'> = {
  apiUsed: 'text_search',
  responseKey: 'textSearch',
  parseWithQuery: true,
  search: (client, { query, language, location, radius, businessType }) =>
    client.places({ query, location, radius, language, type: businessType }),
  selectPlaceId: (payload, query) => {
    if (payload.status !== undefined && payload.status !== 'OK') {
      return null;
    }
    return pickPlace(payload.results ?? [], query)?.place_id ?? null;
  }
};

export const findPlaceStrategy: CandidateStrategy<'findPlace'> = {
  apiUsed: 'find_place',
  responseKey: 'findPlace',
  parseWithQuery: true,
  search: (client, { query, language, location, radius }) =>
    client.findPlace({
      input: query,
      inputType: findPlaceInputType(query),
      locationBias: location ? formatLocationBias(location, radius) : undefined,
      language
    }),
  selectPlaceId: (payload, query) => {
    const candidates = payload.candidates ?? [];
    // Phone numbers share no text with an address, the first candidate is the match
    const place = findPlaceInputType(query) === 'phonenumber' ? candidates[0] : pickPlace(candidates, query);
    return place?.place_id ?? null;
  }
};

/** Place details from the injected payloads when present, from the client otherwise. */
export async function fetchPlaceDetails(context: PipelineContext, placeId: string): Promise<PlaceDetailsResponse> {
  const details = context.injected?.placeDetails
    ?? await context.client().place({ placeId, language: context.language });
  context.responses.placeDetails = details;
  return details;
}

/**
 * Search → pick a place → fetch its details → parse → derive the address → score.
 * `record.apiUsed` is set even when the search found nothing.
 */
export async function runCandidateStrategy<K extends CandidateResponseKey>(
  strategy: CandidateStrategy<K>,
  context: PipelineContext,
  search: SearchContext
): Promise<void> {
  const { record } = context;

  const injected = context.injected?.[strategy.responseKey];
  const payload: Payload<K> = injected ?? await strategy.search(context.client(), search);
  context.responses[strategy.responseKey] = payload;

  const placeId = strategy.selectPlaceId(payload, search.query);
  if (placeId !== null) {
    const details = await fetchPlaceDetails(context, placeId);
    parsePlaceDetails(strategy.parseWithQuery ? search.query : null, details, record, context.codeLength);
    deriveAddress(record);
    context.score(record);
  } else {
    logger.debug('No candidate to detail', { strategy: strategy.apiUsed, query: search.query });
  }

  record.apiUsed = strategy.apiUsed;
}
