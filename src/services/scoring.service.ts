import { SCORING_RULES } from '@/config/businessRules';
import { RULE_NAMES, RuleName } from '@/constants/instruments';
import { MarketSnapshot, RuleSelection, ScoreResult } from '@/models';

/**
 * One scoring tier: a condition and what it contributes when it holds
 */
interface RuleTier {
  points: number;
  label: string;
  matches: (snapshot: MarketSnapshot) => boolean;
}

export interface ScoringRule {
  name: RuleName;
  /** Human-readable title for rule catalogues */
  title: string;
  /** Highest tier first; only the first matching tier contributes */
  tiers: readonly RuleTier[];
}

const {
  UPTREND,
  STRONG_UPTREND,
  VOLUME_INCREASE,
  PRICE_RANGE,
  DAILY_GAIN,
  HIGH_VOLATILITY,
} = SCORING_RULES;

/**
 * Scoring rules in evaluation order. Order decides the order of reasons,
 * not the score.
 *
 * uptrend and dailyGain share the same condition and both count.
 */
export const SCORING_RULE_SET: readonly ScoringRule[] = [
  {
    name: RULE_NAMES.UPTREND,
    title: 'Uptrend entry',
    tiers: [
      {
        points: UPTREND.POINTS,
        label: 'uptrend entry',
        matches: (s) => s.changePercent > 0,
      },
    ],
  },
  {
    name: RULE_NAMES.STRONG_UPTREND,
    title: 'Strong uptrend',
    tiers: [
      {
        points: STRONG_UPTREND.HIGH_POINTS,
        label: 'strong uptrend (3pt)',
        matches: (s) => s.changePercent > STRONG_UPTREND.HIGH_THRESHOLD_PCT,
      },
      {
        points: STRONG_UPTREND.LOW_POINTS,
        label: 'strong uptrend (2pt)',
        matches: (s) => s.changePercent > STRONG_UPTREND.LOW_THRESHOLD_PCT,
      },
    ],
  },
  {
    name: RULE_NAMES.VOLUME_INCREASE,
    title: 'Volume increase',
    tiers: [
      {
        points: VOLUME_INCREASE.HIGH_POINTS,
        label: 'volume increase (2pt)',
        matches: (s) => s.volume > VOLUME_INCREASE.HIGH_THRESHOLD,
      },
      {
        points: VOLUME_INCREASE.LOW_POINTS,
        label: 'volume increase (1pt)',
        matches: (s) => s.volume > VOLUME_INCREASE.LOW_THRESHOLD,
      },
    ],
  },
  {
    name: RULE_NAMES.PRICE_RANGE,
    title: 'Fair price band',
    tiers: [
      {
        points: PRICE_RANGE.POINTS,
        label: 'fair price band',
        matches: (s) => s.price >= PRICE_RANGE.MIN_PRICE && s.price <= PRICE_RANGE.MAX_PRICE,
      },
    ],
  },
  {
    name: RULE_NAMES.DAILY_GAIN,
    title: 'Prior-day gain',
    tiers: [
      {
        points: DAILY_GAIN.POINTS,
        label: 'prior-day gain',
        matches: (s) => s.changePercent > 0,
      },
    ],
  },
  {
    name: RULE_NAMES.HIGH_VOLATILITY,
    title: 'High volatility (penalty)',
    tiers: [
      {
        points: HIGH_VOLATILITY.HIGH_POINTS,
        label: 'high volatility (-1pt)',
        matches: (s) => Math.abs(s.changePercent) > HIGH_VOLATILITY.HIGH_THRESHOLD_PCT,
      },
      {
        points: HIGH_VOLATILITY.LOW_POINTS,
        label: 'high volatility (-0.5pt)',
        matches: (s) => Math.abs(s.changePercent) > HIGH_VOLATILITY.LOW_THRESHOLD_PCT,
      },
    ],
  },
];

/**
 * Rule selection used when a request does not mention a rule
 */
export const DEFAULT_RULE_SELECTION: Readonly<RuleSelection> = Object.freeze({
  uptrend: true,
  strongUptrend: true,
  volumeIncrease: true,
  priceRange: true,
  dailyGain: true,
  highVolatility: false,
});

/**
 * Score one snapshot under a rule selection
 *
 * Pure: same inputs, same score and reasons.
 */
export function scoreSnapshot(snapshot: MarketSnapshot, rules: RuleSelection): ScoreResult {
  let score = 0;
  const reasons: string[] = [];

  for (const rule of SCORING_RULE_SET) {
    if (!rules[rule.name]) continue;

    const tier = rule.tiers.find((candidate) => candidate.matches(snapshot));
    if (tier) {
      score += tier.points;
      reasons.push(tier.label);
    }
  }

  return { score, reasons };
}

export interface RuleDescription {
  name: RuleName;
  title: string;
  enabledByDefault: boolean;
  contributions: Array<{ label: string; points: number }>;
}

/**
 * Rule catalogue for clients that render the scoring table
 */
export function describeRules(): RuleDescription[] {
  return SCORING_RULE_SET.map((rule) => ({
    name: rule.name,
    title: rule.title,
    enabledByDefault: DEFAULT_RULE_SELECTION[rule.name],
    contributions: rule.tiers.map(({ label, points }) => ({ label, points })),
  }));
}
