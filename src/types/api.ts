import { ComponentFilter } from './googleMaps';
import { AddressRecord, ApiUsed, PlaceHints, RadarCandidate, Thresholds } from './place';
import { CoordinatePoint } from '../utils/coordinateTransform';

export interface ApiError {
  error: {
    code: string;
    message: string;
    details?: unknown;
    requestId: string;
  };
}

export interface ApiResponse<T> {
  success: true;
  data: T;
  meta: {
    requestId: string;
    responseTime: number;
    timestamp: string;
  };
}

export type ThresholdSettings = Record<string, number>;

interface PlaceRequestOptions {
  components?: ComponentFilter | null;
  language?: string;
  isBusiness?: boolean;
  thresholds?: ThresholdSettings;
}

export interface PlaceQueryRequest extends PlaceRequestOptions {
  query: string;
  hints?: PlaceHints;
}

export interface PlaceSearchRequest extends PlaceQueryRequest {
  location?: CoordinatePoint;
  radius?: number;
  businessType?: string;
}

export interface ReverseGeocodeRequest extends PlaceRequestOptions {
  coordinates: CoordinatePoint;
}

export interface NearbySearchRequest {
  query?: string;
  coordinates?: CoordinatePoint;
  radius?: number;
  keyword?: string;
  businessType?: string;
  language?: string;
}

export interface PlaceDetailsRequest {
  placeId: string;
  language?: string;
}

export interface StringCompareRequest {
  left: string;
  right: string;
  lcs?: boolean;
}

export interface StringCompareResponse {
  left: string;
  right: string;
  normalizedLeft: string;
  normalizedRight: string;
  similarity: number;
  levenshtein: {
    distance: number;
    ratio: number;
  };
  jaroWinkler: number;
  matchRating: boolean;
}

export interface PlaceResult extends AddressRecord {
  thresholds: Thresholds;
}

export interface NearbySearchResult {
  origin: CoordinatePoint | null;
  candidates: RadarCandidate[];
}

export interface ReconcileAttempt {
  apiUsed: ApiUsed;
  accepted: boolean;
  confidence: number;
  locationAccuracy: number;
  kept: boolean;
}

export interface ReconcileResult {
  result: PlaceResult | null;
  attempts: ReconcileAttempt[];
}

export interface HealthCheckResponse {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  services: {
    googleMaps: {
      configured: boolean;
      baseUrl: string;
    };
  };
}
