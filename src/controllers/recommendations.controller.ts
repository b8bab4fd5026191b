import { Request, Response, NextFunction } from 'express';
import { env } from '@/config/env';
import { recommendationService } from '@/config/dependencies';
import { createRecommendationSchema } from '@/validators/recommendation.validator';
import { describeRules } from '@/services/scoring.service';
import { ValidationError } from '@/errors';
import { logger } from '@/adapters/logging/LoggerFactory';

/**
 * Recommendations Controller
 * Handles HTTP requests for recommendation endpoints
 */

const recommendationSchema = createRecommendationSchema(env.USE_LIVE_DATA);

/**
 * POST /api/v1/recommendations
 * Rank the tracked universe and return the top candidates
 */
export async function createRecommendations(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const validationResult = recommendationSchema.safeParse(req.body ?? {});

    if (!validationResult.success) {
      logger.warn(
        { errors: validationResult.error.flatten().fieldErrors },
        'Recommendation request failed validation'
      );
      throw new ValidationError(
        'Invalid recommendation request',
        validationResult.error.flatten()
      );
    }

    const response = await recommendationService.recommend(validationResult.data);

    res.json(response);
  } catch (error) {
    next(error);
  }
}

/**
 * GET /api/v1/rules
 * Scoring rule catalogue with points and defaults
 */
export function listRules(_req: Request, res: Response): void {
  res.json({ rules: describeRules() });
}
