/**
 * Business Rules Configuration
 *
 * Centralized configuration for scoring weights, thresholds and request limits.
 * These values can be adjusted without touching validation schemas or service logic.
 *
 * IMPORTANT: Changing a scoring value changes every ranking produced by the API.
 * Clients comparing scores across deployments should be told.
 */

/**
 * Scoring rule weights and thresholds
 *
 * Each rule contributes a fixed number of points when its condition holds.
 * Tiered rules list their tiers highest first; only the first match counts.
 */
export const SCORING_RULES = {
  UPTREND: {
    POINTS: 4,
  },

  /**
   * Strong uptrend tiers on percent change vs prior close (exclusive bounds)
   */
  STRONG_UPTREND: {
    HIGH_THRESHOLD_PCT: 3,
    HIGH_POINTS: 3,
    LOW_THRESHOLD_PCT: 1.5,
    LOW_POINTS: 2,
  },

  /**
   * Volume tiers on traded shares (exclusive bounds)
   */
  VOLUME_INCREASE: {
    HIGH_THRESHOLD: 5_000_000,
    HIGH_POINTS: 2,
    LOW_THRESHOLD: 2_000_000,
    LOW_POINTS: 1,
  },

  /**
   * Price band in KRW (inclusive on both ends)
   */
  PRICE_RANGE: {
    MIN_PRICE: 50_000,
    MAX_PRICE: 500_000,
    POINTS: 1.5,
  },

  DAILY_GAIN: {
    POINTS: 1,
  },

  /**
   * Volatility penalty tiers on |percent change| (exclusive bounds)
   */
  HIGH_VOLATILITY: {
    HIGH_THRESHOLD_PCT: 5,
    HIGH_POINTS: -1,
    LOW_THRESHOLD_PCT: 3,
    LOW_POINTS: -0.5,
  },
} as const;

/**
 * Market data normalization
 *
 * Raw market capitalization is divided (integer division) by this unit,
 * giving values in 억원 (100 million KRW).
 */
export const MARKET_DATA = {
  MARKET_CAP_UNIT: 100_000_000,
} as const;

/**
 * Recommendation request limits
 *
 * Request controls exposed to clients:
 * - COUNT: how many top candidates to return
 * - MIN_VOLUME: minimum trading size in 억원 (accepted, not applied)
 */
export const RECOMMENDATION_LIMITS = {
  COUNT: {
    MIN: 1,
    MAX: 20,
    DEFAULT: 5,
  },
  MIN_VOLUME: {
    MIN: 10,
    MAX: 1000,
    DEFAULT: 100,
  },
} as const;

/**
 * Rate Limiting Configuration
 *
 * - Global limits apply to all endpoints except /health
 * - Recommendations can trigger up to one KIS round trip pair per tracked instrument
 * - Refresh drops the shared cache for every client, so it is the strictest
 */
export const RATE_LIMITS = {
  GLOBAL: {
    WINDOW_MS: 60_000, // 1 minute
    MAX_REQUESTS: 100,
  },

  RECOMMENDATIONS: {
    WINDOW_MS: 60_000, // 1 minute
    MAX_REQUESTS: 30,
  },

  REFRESH: {
    WINDOW_MS: 60_000, // 1 minute
    MAX_REQUESTS: 5,
  },
} as const;

/**
 * Type exports for TypeScript safety
 */
export type ScoringRules = typeof SCORING_RULES;
export type RecommendationLimits = typeof RECOMMENDATION_LIMITS;
export type RateLimits = typeof RATE_LIMITS;
