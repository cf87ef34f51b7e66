/**
 * String Routes
 */

import { Router } from 'express';
import { compare } from '../controllers/stringController';
import { authenticateApiKey } from '../middleware/auth';
import { rateLimit } from '../middleware/rateLimiting';
import { validateStringCompare } from '../middleware/placeValidation';

const router = Router();

router.use(authenticateApiKey);
router.use(rateLimit);

/**
 * POST /api/v1/strings/compare
 * Request body: { left: string, right: string, lcs?: boolean }
 */
router.post('/compare', validateStringCompare, compare);

export default router;
