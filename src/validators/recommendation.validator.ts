import { z } from 'zod';
import { RECOMMENDATION_LIMITS } from '@/config/businessRules';
import { DEFAULT_RULE_SELECTION } from '@/services/scoring.service';

const { COUNT, MIN_VOLUME } = RECOMMENDATION_LIMITS;

/**
 * Credentials passed through to the quote provider
 *
 * Blank values are accepted: a live request with a blank key or secret is
 * served fallback data by the snapshot service.
 */
export const credentialsSchema = z.object({
  appKey: z.string().trim(),
  appSecret: z.string().trim(),
  accountNumber: z.string().trim().optional(),
});

/**
 * Rule toggles. Omitted rules take their default; unknown names are rejected.
 */
export const ruleSelectionSchema = z
  .object({
    uptrend: z.boolean().default(DEFAULT_RULE_SELECTION.uptrend),
    strongUptrend: z.boolean().default(DEFAULT_RULE_SELECTION.strongUptrend),
    volumeIncrease: z.boolean().default(DEFAULT_RULE_SELECTION.volumeIncrease),
    priceRange: z.boolean().default(DEFAULT_RULE_SELECTION.priceRange),
    dailyGain: z.boolean().default(DEFAULT_RULE_SELECTION.dailyGain),
    highVolatility: z.boolean().default(DEFAULT_RULE_SELECTION.highVolatility),
  })
  .strict();

/**
 * Recommendation request validation schema
 *
 * Business rules (enforced from config):
 * - count between COUNT.MIN and COUNT.MAX (default COUNT.DEFAULT)
 * - minVolume between MIN_VOLUME.MIN and MIN_VOLUME.MAX, in 억원
 * - useLive falls back to the server default when omitted
 */
export function createRecommendationSchema(defaultUseLive: boolean) {
  return z.object({
    count: z
      .number()
      .int()
      .min(COUNT.MIN, { message: `count must be at least ${COUNT.MIN}` })
      .max(COUNT.MAX, { message: `count cannot exceed ${COUNT.MAX}` })
      .default(COUNT.DEFAULT),
    minVolume: z
      .number()
      .int()
      .min(MIN_VOLUME.MIN, { message: `minVolume must be at least ${MIN_VOLUME.MIN}` })
      .max(MIN_VOLUME.MAX, { message: `minVolume cannot exceed ${MIN_VOLUME.MAX}` })
      .default(MIN_VOLUME.DEFAULT),
    useLive: z.boolean().default(defaultUseLive),
    rules: ruleSelectionSchema.default({}),
    credentials: credentialsSchema.optional(),
  });
}

export type RecommendationDTO = z.infer<ReturnType<typeof createRecommendationSchema>>;

/**
 * GET /snapshots query: useLive arrives as a string
 */
export const snapshotQuerySchema = z.object({
  useLive: z.enum(['true', 'false']).transform((value) => value === 'true').optional(),
});
