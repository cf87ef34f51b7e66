/**
 * Place Controller
 * Handles HTTP requests for the place reconciliation endpoints
 */

import { Request, Response } from 'express';
import { placeService, PlaceService } from '../services/placeService';
import {
  ApiError,
  ApiResponse,
  NearbySearchRequest,
  PlaceQueryRequest,
  PlaceSearchRequest,
  ReverseGeocodeRequest
} from '../types/api';
import { ConfigurationError, InvalidInputError, MapsApiError, errorMessage } from '../utils/errors';
import Logger from '../utils/logger';

const logger = Logger.createServiceLogger('PlaceController');

export function sendSuccess<T>(req: Request, res: Response, data: T): void {
  const requestId = req.requestId ?? Logger.generateRequestId();
  const responseTime = req.startTime ? Date.now() - req.startTime : 0;

  const body: ApiResponse<T> = {
    success: true,
    data,
    meta: {
      requestId,
      responseTime,
      timestamp: new Date().toISOString()
    }
  };

  res.status(200)
    .header('X-Response-Time', `${responseTime}ms`)
    .json(body);
}

function errorStatus(error: unknown): { statusCode: number; code: string } {
  if (error instanceof InvalidInputError) {
    return { statusCode: 400, code: error.code };
  }
  if (error instanceof ConfigurationError) {
    return error.key === 'GOOGLE_MAPS_API_KEY'
      ? { statusCode: 503, code: 'UPSTREAM_NOT_CONFIGURED' }
      : { statusCode: 400, code: error.code };
  }
  if (error instanceof MapsApiError) {
    return { statusCode: 502, code: error.code };
  }
  return { statusCode: 500, code: 'INTERNAL_ERROR' };
}

export function sendError(req: Request, res: Response, operation: string, error: unknown): void {
  const { statusCode, code } = errorStatus(error);
  const requestId = req.requestId ?? Logger.generateRequestId();

  if (statusCode >= 500) {
    logger.error(`${operation} failed`, { requestId, error: errorMessage(error) });
  } else {
    logger.warn(`${operation} rejected`, { requestId, code, error: errorMessage(error) });
  }

  const body: ApiError = {
    error: {
      code,
      message: statusCode === 500 && process.env.NODE_ENV === 'production'
        ? 'An internal server error occurred.'
        : errorMessage(error),
      requestId
    }
  };

  res.status(statusCode).json(body);
}

export class PlaceController {
  private static instance: PlaceController;

  constructor(private readonly service: PlaceService = placeService) {}

  static getInstance(): PlaceController {
    if (!this.instance) {
      this.instance = new PlaceController();
    }
    return this.instance;
  }

  /**
   * POST /api/v1/places/geocode
   */
  geocode = async (req: Request, res: Response): Promise<void> => {
    try {
      const request: PlaceQueryRequest = req.body;
      sendSuccess(req, res, await this.service.geocode(request));
    } catch (error) {
      sendError(req, res, 'Geocode', error);
    }
  };

  /**
   * POST /api/v1/places/reverse-geocode
   */
  reverseGeocode = async (req: Request, res: Response): Promise<void> => {
    try {
      const request: ReverseGeocodeRequest = req.body;
      sendSuccess(req, res, await this.service.reverseGeocode(request));
    } catch (error) {
      sendError(req, res, 'Reverse geocode', error);
    }
  };

  /**
   * POST /api/v1/places/autocomplete
   */
  autocomplete = async (req: Request, res: Response): Promise<void> => {
    try {
      const request: PlaceQueryRequest = req.body;
      sendSuccess(req, res, await this.service.autocomplete(request));
    } catch (error) {
      sendError(req, res, 'Autocomplete', error);
    }
  };

  /**
   * POST /api/v1/places/text-search
   */
  textSearch = async (req: Request, res: Response): Promise<void> => {
    try {
      const request: PlaceSearchRequest = req.body;
      sendSuccess(req, res, await this.service.textSearch(request));
    } catch (error) {
      sendError(req, res, 'Text search', error);
    }
  };

  /**
   * POST /api/v1/places/find-place
   */
  findPlace = async (req: Request, res: Response): Promise<void> => {
    try {
      const request: PlaceSearchRequest = req.body;
      sendSuccess(req, res, await this.service.findPlace(request));
    } catch (error) {
      sendError(req, res, 'Find place', error);
    }
  };

  /**
   * POST /api/v1/places/nearby
   */
  nearby = async (req: Request, res: Response): Promise<void> => {
    try {
      const request: NearbySearchRequest = req.body;
      sendSuccess(req, res, await this.service.nearby(request));
    } catch (error) {
      sendError(req, res, 'Nearby search', error);
    }
  };

  /**
   * GET /api/v1/places/:placeId
   */
  placeDetails = async (req: Request, res: Response): Promise<void> => {
    try {
      const { language } = req.query;
      const result = await this.service.placeDetails({
        placeId: req.params.placeId,
        language: typeof language === 'string' ? language : undefined
      });
      sendSuccess(req, res, result);
    } catch (error) {
      sendError(req, res, 'Place details', error);
    }
  };

  /**
   * POST /api/v1/places/reconcile
   * Tries several strategies and keeps the best record
   */
  reconcile = async (req: Request, res: Response): Promise<void> => {
    try {
      const request: PlaceQueryRequest = req.body;
      sendSuccess(req, res, await this.service.reconcile(request));
    } catch (error) {
      sendError(req, res, 'Reconcile', error);
    }
  };
}

export const placeController = PlaceController.getInstance();
