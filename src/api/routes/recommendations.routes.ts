import { Router } from 'express';
import * as recommendationsController from '@/controllers/recommendations.controller';
import { recommendationRateLimiter } from '@/middlewares/rateLimiter';

const router = Router();

/**
 * POST /api/v1/recommendations
 * Body: { count?, minVolume?, useLive?, rules?, credentials? }
 *
 * POST rather than GET: the body may carry KIS credentials, which must not
 * end up in URLs or access logs.
 */
router.post('/', recommendationRateLimiter, recommendationsController.createRecommendations);

export default router;
