/**
 * Rate Limiting Middleware (express-rate-limit)
 *
 * - Global: all endpoints except /api/health
 * - Recommendations: a cache miss with live data costs two KIS calls per tracked instrument
 * - Refresh: clears the cache shared by every client
 *
 * In-memory store: limits are per process.
 */

import rateLimit, { Options } from 'express-rate-limit';
import { Request, Response, NextFunction } from 'express';
import { RATE_LIMITS } from '@/config/businessRules';
import { logger } from '@/adapters/logging/LoggerFactory';

/**
 * Client IP for rate limiting
 *
 * app.ts trusts one proxy hop, so req.ip already reflects X-Forwarded-For
 * when the API sits behind a load balancer.
 */
function getClientIp(req: Request): string {
  return req.ip ?? req.socket.remoteAddress ?? 'unknown';
}

function limitMessage(message: string) {
  return { success: false, error: { message } };
}

function logAndReject(endpoint: string) {
  return (req: Request, res: Response, _next: NextFunction, options: Options): void => {
    logger.warn(
      { type: 'RATE_LIMIT_EXCEEDED', endpoint, ip: getClientIp(req), limit: options.limit },
      'Rate limit exceeded'
    );
    res.status(options.statusCode).json(options.message);
  };
}

export const globalRateLimiter = rateLimit({
  windowMs: RATE_LIMITS.GLOBAL.WINDOW_MS,
  limit: RATE_LIMITS.GLOBAL.MAX_REQUESTS,
  message: limitMessage(
    `Too many requests. Please try again later. Limit: ${RATE_LIMITS.GLOBAL.MAX_REQUESTS} requests per minute.`
  ),
  standardHeaders: true, // Return rate limit info in `RateLimit-*` headers
  legacyHeaders: false, // Disable `X-RateLimit-*` headers
  keyGenerator: (req) => getClientIp(req),
  skip: (req) => req.path === '/api/health',
});

export const recommendationRateLimiter = rateLimit({
  windowMs: RATE_LIMITS.RECOMMENDATIONS.WINDOW_MS,
  limit: RATE_LIMITS.RECOMMENDATIONS.MAX_REQUESTS,
  message: limitMessage(
    `Too many recommendation requests. Please slow down. Limit: ${RATE_LIMITS.RECOMMENDATIONS.MAX_REQUESTS} per minute.`
  ),
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => getClientIp(req),
  handler: logAndReject('recommendations'),
});

export const refreshRateLimiter = rateLimit({
  windowMs: RATE_LIMITS.REFRESH.WINDOW_MS,
  limit: RATE_LIMITS.REFRESH.MAX_REQUESTS,
  message: limitMessage(
    `Too many refresh requests. Limit: ${RATE_LIMITS.REFRESH.MAX_REQUESTS} per minute.`
  ),
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => getClientIp(req),
  handler: logAndReject('snapshots/refresh'),
});
