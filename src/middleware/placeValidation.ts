/**
 * Place Request Validation Middleware
 * Input validation for the place and string comparison endpoints
 */

import { Request, Response, NextFunction } from 'express';
import businessTypes from '../data/businessTypes.json';
import { SUPPORTED_COMPONENTS, resolveThresholds } from '../services/acceptanceEngine';
import { ApiError } from '../types/api';
import coordinateTransform from '../utils/coordinateTransform';
import { errorMessage } from '../utils/errors';
import Logger from '../utils/logger';

const logger = Logger.createServiceLogger('PlaceValidation');

export const PLACE_VALIDATION_LIMITS = {
  MAX_QUERY_LENGTH: 500,
  MAX_STRING_LENGTH: 1000,
  MIN_RADIUS_METERS: 1,
  MAX_RADIUS_METERS: 50000
} as const;

const BUSINESS_TYPES = new Set<string>(businessTypes);

const HINT_KEYS = ['id', 'externalId', 'name', 'inputAddress', 'inputCity', 'inputPostalCode', 'inputCountry'];

const PLACE_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

type Validator = (body: Record<string, unknown>) => [code: string, message: string] | null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function reject(req: Request, res: Response, code: string, message: string): void {
  const error: ApiError = {
    error: {
      code,
      message,
      requestId: req.requestId ?? Logger.generateRequestId()
    }
  };
  logger.debug('Request validation failed', { code, path: req.path });
  res.status(400).json(error);
}

const checkQuery: Validator = ({ query }) => {
  if (typeof query !== 'string' || query.trim().length === 0) {
    return ['MISSING_QUERY', 'query must be a non-empty string'];
  }
  if (query.length > PLACE_VALIDATION_LIMITS.MAX_QUERY_LENGTH) {
    return ['QUERY_TOO_LONG', `query must not exceed ${PLACE_VALIDATION_LIMITS.MAX_QUERY_LENGTH} characters`];
  }
  return null;
};

const checkOptions: Validator = ({ components, language, isBusiness, thresholds, hints }) => {
  if (components !== undefined && components !== null) {
    if (!isRecord(components) || Object.values(components).some((value) => typeof value !== 'string')) {
      return ['INVALID_COMPONENTS', 'components must map component names to strings'];
    }
    const unsupported = Object.keys(components).filter((key) => !SUPPORTED_COMPONENTS.includes(key));
    if (unsupported.length > 0) {
      return ['INVALID_COMPONENTS', `Unsupported components: ${unsupported.join(', ')}. Supported: ${SUPPORTED_COMPONENTS.join(', ')}`];
    }
  }

  if (language !== undefined && (typeof language !== 'string' || !/^[a-zA-Z]{2}(-[a-zA-Z]{2,4})?$/.test(language))) {
    return ['INVALID_LANGUAGE', 'language must be a language code such as "fr" or "en-GB"'];
  }

  if (isBusiness !== undefined && typeof isBusiness !== 'boolean') {
    return ['INVALID_IS_BUSINESS', 'isBusiness must be a boolean'];
  }

  if (thresholds !== undefined) {
    if (!isRecord(thresholds)) {
      return ['INVALID_THRESHOLDS', 'thresholds must be an object'];
    }
    try {
      resolveThresholds(thresholds);
    } catch (error) {
      return ['INVALID_THRESHOLDS', errorMessage(error)];
    }
  }

  if (hints !== undefined) {
    if (!isRecord(hints)) {
      return ['INVALID_HINTS', 'hints must be an object'];
    }
    for (const [key, value] of Object.entries(hints)) {
      if (!HINT_KEYS.includes(key)) {
        return ['INVALID_HINTS', `Unsupported hint: ${key}. Supported: ${HINT_KEYS.join(', ')}`];
      }
      if (typeof value !== 'string') {
        return ['INVALID_HINTS', `Hint ${key} must be a string`];
      }
    }
  }

  return null;
};

function checkCoordinates(value: unknown, field: string): [string, string] | null {
  if (!isRecord(value)) {
    return ['INVALID_COORDINATES', `${field} must be an object with latitude and longitude`];
  }

  const { latitude, longitude } = value;
  if (typeof latitude !== 'number' || typeof longitude !== 'number'
    || !coordinateTransform.validateCoordinates({ latitude, longitude })) {
    return ['INVALID_COORDINATES', `${field} must hold a latitude in [-90, 90] and a longitude in [-180, 180]`];
  }

  return null;
}

const checkSearch: Validator = ({ location, radius, businessType, keyword }) => {
  if (location !== undefined) {
    const invalid = checkCoordinates(location, 'location');
    if (invalid) {
      return invalid;
    }
  }

  if (radius !== undefined) {
    const { MIN_RADIUS_METERS, MAX_RADIUS_METERS } = PLACE_VALIDATION_LIMITS;
    if (typeof radius !== 'number' || !Number.isInteger(radius) || radius < MIN_RADIUS_METERS || radius > MAX_RADIUS_METERS) {
      return ['INVALID_RADIUS', `radius must be an integer between ${MIN_RADIUS_METERS} and ${MAX_RADIUS_METERS} meters`];
    }
  }

  if (businessType !== undefined && (typeof businessType !== 'string' || !BUSINESS_TYPES.has(businessType))) {
    return ['INVALID_BUSINESS_TYPE', 'businessType must be one of the supported place types'];
  }

  if (keyword !== undefined && (typeof keyword !== 'string' || keyword.length > PLACE_VALIDATION_LIMITS.MAX_QUERY_LENGTH)) {
    return ['INVALID_KEYWORD', `keyword must be a string of at most ${PLACE_VALIDATION_LIMITS.MAX_QUERY_LENGTH} characters`];
  }

  return null;
};

const checkReverse: Validator = ({ coordinates }) => {
  if (coordinates === undefined) {
    return ['MISSING_COORDINATES', 'coordinates are required'];
  }
  return checkCoordinates(coordinates, 'coordinates');
};

const checkNearbyOrigin: Validator = (body) => {
  if (body.query === undefined && body.coordinates === undefined) {
    return ['MISSING_LOCATION', 'Either query or coordinates must be provided'];
  }
  if (body.query !== undefined) {
    return checkQuery(body);
  }
  return checkCoordinates(body.coordinates, 'coordinates');
};

const checkStrings: Validator = ({ left, right, lcs }) => {
  if (typeof left !== 'string' || typeof right !== 'string') {
    return ['INVALID_STRINGS', 'left and right must be strings'];
  }
  const max = PLACE_VALIDATION_LIMITS.MAX_STRING_LENGTH;
  if (left.length > max || right.length > max) {
    return ['STRING_TOO_LONG', `left and right must not exceed ${max} characters`];
  }
  if (lcs !== undefined && typeof lcs !== 'boolean') {
    return ['INVALID_LCS', 'lcs must be a boolean'];
  }
  return null;
};

function validateBody(...validators: Validator[]) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const body: unknown = req.body;

    if (!isRecord(body)) {
      reject(req, res, 'INVALID_BODY', 'Request body must be a JSON object');
      return;
    }

    for (const validator of validators) {
      const failure = validator(body);
      if (failure) {
        reject(req, res, failure[0], failure[1]);
        return;
      }
    }

    next();
  };
}

export const validatePlaceQuery = validateBody(checkQuery, checkOptions);

export const validatePlaceSearch = validateBody(checkQuery, checkOptions, checkSearch);

export const validateReverseGeocode = validateBody(checkReverse, checkOptions);

export const validateNearbySearch = validateBody(checkNearbyOrigin, checkSearch, checkOptions);

export const validateStringCompare = validateBody(checkStrings);

export const validatePlaceId = (req: Request, res: Response, next: NextFunction): void => {
  const { placeId } = req.params;
  const { language } = req.query;

  if (!placeId || !PLACE_ID_PATTERN.test(placeId)) {
    reject(req, res, 'INVALID_PLACE_ID', 'placeId must only contain letters, digits, "-" and "_"');
    return;
  }

  const failure = checkOptions({ language });
  if (failure) {
    reject(req, res, failure[0], failure[1]);
    return;
  }

  next();
};
