/**
 * Place Routes
 * Route definitions for the place reconciliation endpoints
 */

import { Router } from 'express';
import { placeController } from '../controllers/placeController';
import { authenticateApiKey } from '../middleware/auth';
import { rateLimit } from '../middleware/rateLimiting';
import {
  validateNearbySearch,
  validatePlaceId,
  validatePlaceQuery,
  validatePlaceSearch,
  validateReverseGeocode
} from '../middleware/placeValidation';

const router = Router();

// Apply authentication and rate limiting to all place routes
router.use(authenticateApiKey);
router.use(rateLimit);

/**
 * POST /api/v1/places/geocode
 *
 * Request body:
 * {
 *   query: string,
 *   components?: { country?: string, postal_code?: string, locality?: string, ... } | null,
 *   language?: string,      // default from DEFAULT_LANGUAGE
 *   isBusiness?: boolean,   // also read name, opening hours, website and phone
 *   thresholds?: { threshold?: number, thresholdOnCity?: number, ... },
 *   hints?: { name?, inputAddress?, inputCity?, inputPostalCode?, inputCountry? }
 * }
 *
 * Response: the scored address record, with `accepted` set
 */
router.post('/geocode', validatePlaceQuery, placeController.geocode);

/**
 * POST /api/v1/places/reverse-geocode
 * Request body: { coordinates: { latitude, longitude }, language?, isBusiness? }
 */
router.post('/reverse-geocode', validateReverseGeocode, placeController.reverseGeocode);

router.post('/autocomplete', validatePlaceQuery, placeController.autocomplete);

/**
 * POST /api/v1/places/text-search
 * Request body: geocode body plus { location?, radius?, businessType? }
 */
router.post('/text-search', validatePlaceSearch, placeController.textSearch);

/**
 * POST /api/v1/places/find-place
 * Request body: geocode body plus { location?, radius? } used as location bias
 */
router.post('/find-place', validatePlaceSearch, placeController.findPlace);

/**
 * POST /api/v1/places/nearby
 * Request body: { query? | coordinates?, radius?, keyword?, businessType?, language? }
 *
 * Response: { origin, candidates: [{ placeId, distance }] }, distances in meters
 */
router.post('/nearby', validateNearbySearch, placeController.nearby);

/**
 * POST /api/v1/places/reconcile
 * Runs geocode, find place and text search, and keeps the best record
 */
router.post('/reconcile', validatePlaceQuery, placeController.reconcile);

router.get('/:placeId', validatePlaceId, placeController.placeDetails);

export default router;
