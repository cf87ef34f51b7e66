/**
 * Place Service
 * Runs one reconciliation strategy per request, or several in turn keeping the best result
 */

import config from '../config';
import {
  NearbySearchRequest,
  NearbySearchResult,
  PlaceDetailsRequest,
  PlaceQueryRequest,
  PlaceResult,
  PlaceSearchRequest,
  ReconcileAttempt,
  ReconcileResult,
  ReverseGeocodeRequest
} from '../types/api';
import { MapsClient } from '../types/googleMaps';
import { CoordinatePoint } from '../utils/coordinateTransform';
import Logger from '../utils/logger';
import { GoogleMapsClient } from './googleMapsClient';
import { Place, PlaceSource } from './place';

const logger = Logger.createServiceLogger('PlaceService');

export interface PlaceServiceDefaults {
  language: string;
  country: string;
}

type PlaceRequestOptions = Pick<PlaceQueryRequest, 'components' | 'language' | 'isBusiness' | 'thresholds'>;

type ReconcileStrategy = (place: Place) => Promise<Place>;

// Tried in this order; a later result only replaces the kept one when it is better
const RECONCILE_STRATEGIES: ReadonlyArray<[string, ReconcileStrategy]> = [
  ['geocode', (place) => place.geocode()],
  ['find_place', (place) => place.findPlace()],
  ['text_search', (place) => place.textSearch()]
];

export function toPlaceResult(place: Place): PlaceResult {
  return { ...place.toJSON(), thresholds: place.thresholds };
}

export class PlaceService {
  constructor(
    private readonly getClient: () => MapsClient,
    private readonly defaults: PlaceServiceDefaults = {
      language: config.defaultLanguage,
      country: config.defaultCountry
    }
  ) {}

  async geocode(request: PlaceQueryRequest): Promise<PlaceResult> {
    const place = this.createPlace(this.querySource(request), request);
    await place.geocode();
    return this.finish('geocode', place);
  }

  async reverseGeocode(request: ReverseGeocodeRequest): Promise<PlaceResult> {
    const { latitude, longitude } = request.coordinates;
    const place = this.createPlace([latitude, longitude], request);
    await place.reverseGeocode();
    return this.finish('reverse_geocode', place);
  }

  async autocomplete(request: PlaceQueryRequest): Promise<PlaceResult> {
    const place = this.createPlace(this.querySource(request), request);
    await place.autocomplete();
    return this.finish('autocomplete', place);
  }

  async textSearch(request: PlaceSearchRequest): Promise<PlaceResult> {
    const place = this.createPlace(this.querySource(request), request);
    await place.textSearch({
      location: request.location,
      radius: request.radius,
      businessType: request.businessType
    });
    return this.finish('text_search', place);
  }

  async findPlace(request: PlaceSearchRequest): Promise<PlaceResult> {
    const place = this.createPlace(this.querySource(request), request);
    await place.findPlace({ location: request.location, radius: request.radius });
    return this.finish('find_place', place);
  }

  async placeDetails(request: PlaceDetailsRequest): Promise<PlaceResult> {
    const place = this.createPlace(request.placeId, { language: request.language, components: null });
    await place.placeDetails();
    return this.finish('place_details', place);
  }

  async nearby(request: NearbySearchRequest): Promise<NearbySearchResult> {
    const source: PlaceSource = request.query !== undefined
      ? request.query
      : [request.coordinates?.latitude ?? Number.NaN, request.coordinates?.longitude ?? Number.NaN];
    const place = this.createPlace(source, { language: request.language });

    const candidates = await place.radar({
      radius: request.radius,
      keyword: request.keyword,
      businessType: request.businessType
    });

    let origin: CoordinatePoint | null = request.coordinates ?? null;
    if (request.query !== undefined) {
      origin = place.placeId.length > 0 ? { latitude: place.latitude, longitude: place.longitude } : null;
    }

    logger.info('Nearby search completed', { candidateCount: candidates.length });
    return { origin, candidates };
  }

  /** Geocode, find place then text search, keeping the best record by `isBetter`. */
  async reconcile(request: PlaceQueryRequest): Promise<ReconcileResult> {
    const attempts: ReconcileAttempt[] = [];
    let best: Place | null = null;

    for (const [name, run] of RECONCILE_STRATEGIES) {
      const place = this.createPlace(this.querySource(request), request);
      await run(place);
      place.check();

      const kept = place.isBetter(best);
      if (kept) {
        best = place;
      }

      attempts.push({
        apiUsed: place.apiUsed,
        accepted: place.accepted,
        confidence: place.confidence,
        locationAccuracy: place.locationAccuracy,
        kept
      });

      logger.debug('Reconcile attempt', { strategy: name, accepted: place.accepted, kept });
    }

    logger.info('Reconcile completed', {
      query: request.query,
      apiUsed: best?.apiUsed,
      accepted: best?.accepted ?? false
    });

    return { result: best ? toPlaceResult(best) : null, attempts };
  }

  private querySource(request: PlaceQueryRequest): PlaceSource {
    return { ...request.hints, inputText: request.query };
  }

  private createPlace(source: PlaceSource, options: PlaceRequestOptions): Place {
    const place = new Place(source, {
      components: options.components === undefined ? { country: this.defaults.country } : options.components,
      language: options.language ?? this.defaults.language,
      isBusiness: options.isBusiness ?? false,
      client: this.getClient()
    });

    if (options.thresholds) {
      place.setThresholds(options.thresholds);
    }

    return place;
  }

  private finish(strategy: string, place: Place): PlaceResult {
    place.check();

    logger.info('Place resolved', {
      strategy,
      apiUsed: place.apiUsed,
      accepted: place.accepted,
      confidence: place.confidence
    });

    return toPlaceResult(place);
  }
}

let sharedClient: GoogleMapsClient | undefined;

export const placeService = new PlaceService(() => {
  sharedClient ??= new GoogleMapsClient(config.googleMaps);
  return sharedClient;
});

export default placeService;
