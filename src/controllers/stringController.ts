/**
 * String Controller
 * Exposes the similarity metrics used to match queries against candidates
 */

import { Request, Response } from 'express';
import { StringCompareRequest, StringCompareResponse } from '../types/api';
import { jaroWinkler, levenshteinDistance, match, normalize, roundTo, similarity } from '../utils/stringMetrics';
import { sendError, sendSuccess } from './placeController';

export function compareStrings({ left, right, lcs = false }: StringCompareRequest): StringCompareResponse {
  const normalizedLeft = normalize(left);
  const normalizedRight = normalize(right);
  const levenshtein = levenshteinDistance(normalizedLeft, normalizedRight);

  return {
    left,
    right,
    normalizedLeft,
    normalizedRight,
    similarity: roundTo(similarity(left, right, lcs), 4),
    levenshtein: {
      distance: levenshtein.distance,
      ratio: roundTo(levenshtein.ratio, 4)
    },
    jaroWinkler: roundTo(jaroWinkler(normalizedLeft, normalizedRight), 4),
    matchRating: match(normalizedLeft, normalizedRight, lcs)
  };
}

/**
 * POST /api/v1/strings/compare
 */
export const compare = (req: Request, res: Response): void => {
  try {
    const request: StringCompareRequest = req.body;
    sendSuccess(req, res, compareStrings(request));
  } catch (error) {
    sendError(req, res, 'String comparison', error);
  }
};

export default { compare };
