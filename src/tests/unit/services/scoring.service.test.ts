import {
  DEFAULT_RULE_SELECTION,
  describeRules,
  scoreSnapshot,
} from '@/services/scoring.service';
import { RuleSelection } from '@/models';
import { buildSnapshot } from '@/tests/utils/mockProviders';

const ALL_ENABLED: RuleSelection = {
  uptrend: true,
  strongUptrend: true,
  volumeIncrease: true,
  priceRange: true,
  dailyGain: true,
  highVolatility: true,
};

const ALL_DISABLED: RuleSelection = {
  uptrend: false,
  strongUptrend: false,
  volumeIncrease: false,
  priceRange: false,
  dailyGain: false,
  highVolatility: false,
};

function only(rule: keyof RuleSelection): RuleSelection {
  return { ...ALL_DISABLED, [rule]: true };
}

describe('scoreSnapshot', () => {
  it('should sum every rule for a strong, liquid, fairly priced gainer', () => {
    const snapshot = buildSnapshot({ changePercent: 4.0, volume: 6_000_000, price: 100_000 });

    const result = scoreSnapshot(snapshot, ALL_ENABLED);

    expect(result.score).toBe(11);
    expect(result.reasons).toEqual([
      'uptrend entry',
      'strong uptrend (3pt)',
      'volume increase (2pt)',
      'fair price band',
      'prior-day gain',
      'high volatility (-0.5pt)',
    ]);
  });

  it('should return zero and no reasons when every rule is disabled', () => {
    const snapshot = buildSnapshot({ changePercent: 9.9, volume: 50_000_000, price: 100_000 });

    expect(scoreSnapshot(snapshot, ALL_DISABLED)).toEqual({ score: 0, reasons: [] });
  });

  it('should be deterministic for identical inputs', () => {
    const snapshot = buildSnapshot({ changePercent: 2.1, volume: 3_000_000, price: 425_000 });

    const first = scoreSnapshot(snapshot, ALL_ENABLED);
    const second = scoreSnapshot(snapshot, ALL_ENABLED);

    expect(second).toEqual(first);
  });

  it('should count uptrend and prior-day gain on the same positive change', () => {
    const snapshot = buildSnapshot({ changePercent: 0.1 });

    const result = scoreSnapshot(snapshot, { ...ALL_DISABLED, uptrend: true, dailyGain: true });

    expect(result.score).toBe(5);
    expect(result.reasons).toEqual(['uptrend entry', 'prior-day gain']);
  });

  it('should go negative when only the volatility penalty applies', () => {
    const snapshot = buildSnapshot({ changePercent: -7 });

    const result = scoreSnapshot(snapshot, ALL_ENABLED);

    expect(result.score).toBe(-1);
    expect(result.reasons).toEqual(['high volatility (-1pt)']);
  });

  describe('uptrend', () => {
    it.each([
      [0.01, 4],
      [0, 0],
      [-0.5, 0],
    ])('change %p scores %p', (changePercent, expected) => {
      expect(scoreSnapshot(buildSnapshot({ changePercent }), only('uptrend')).score).toBe(expected);
    });
  });

  describe('strongUptrend tiers', () => {
    it.each([
      [3.01, 3, ['strong uptrend (3pt)']],
      [3, 2, ['strong uptrend (2pt)']],
      [1.51, 2, ['strong uptrend (2pt)']],
      [1.5, 0, []],
    ])('change %p scores %p', (changePercent, expected, reasons) => {
      const result = scoreSnapshot(buildSnapshot({ changePercent }), only('strongUptrend'));
      expect(result.score).toBe(expected);
      expect(result.reasons).toEqual(reasons);
    });
  });

  describe('volumeIncrease tiers', () => {
    it.each([
      [5_000_001, 2, ['volume increase (2pt)']],
      [5_000_000, 1, ['volume increase (1pt)']],
      [2_000_001, 1, ['volume increase (1pt)']],
      [2_000_000, 0, []],
    ])('volume %p scores %p', (volume, expected, reasons) => {
      const result = scoreSnapshot(buildSnapshot({ volume }), only('volumeIncrease'));
      expect(result.score).toBe(expected);
      expect(result.reasons).toEqual(reasons);
    });
  });

  describe('priceRange band', () => {
    it.each([
      [49_999, 0],
      [50_000, 1.5],
      [500_000, 1.5],
      [500_001, 0],
    ])('price %p scores %p', (price, expected) => {
      expect(scoreSnapshot(buildSnapshot({ price }), only('priceRange')).score).toBe(expected);
    });
  });

  describe('dailyGain', () => {
    it.each([
      [0.5, 1],
      [0, 0],
    ])('change %p scores %p', (changePercent, expected) => {
      expect(scoreSnapshot(buildSnapshot({ changePercent }), only('dailyGain')).score).toBe(expected);
    });
  });

  describe('highVolatility tiers', () => {
    it.each([
      [5.01, -1, ['high volatility (-1pt)']],
      [-5.01, -1, ['high volatility (-1pt)']],
      [5, -0.5, ['high volatility (-0.5pt)']],
      [-3.5, -0.5, ['high volatility (-0.5pt)']],
      [3, 0, []],
      [-3, 0, []],
    ])('change %p scores %p', (changePercent, expected, reasons) => {
      const result = scoreSnapshot(buildSnapshot({ changePercent }), only('highVolatility'));
      expect(result.score).toBe(expected);
      expect(result.reasons).toEqual(reasons);
    });
  });
});

describe('DEFAULT_RULE_SELECTION', () => {
  it('should enable every rule except the volatility penalty', () => {
    expect(DEFAULT_RULE_SELECTION).toEqual({
      uptrend: true,
      strongUptrend: true,
      volumeIncrease: true,
      priceRange: true,
      dailyGain: true,
      highVolatility: false,
    });
  });
});

describe('describeRules', () => {
  it('should list rules in evaluation order with their contributions', () => {
    const rules = describeRules();

    expect(rules.map((rule) => rule.name)).toEqual([
      'uptrend',
      'strongUptrend',
      'volumeIncrease',
      'priceRange',
      'dailyGain',
      'highVolatility',
    ]);
    expect(rules[1]?.contributions).toEqual([
      { label: 'strong uptrend (3pt)', points: 3 },
      { label: 'strong uptrend (2pt)', points: 2 },
    ]);
    expect(rules[5]?.enabledByDefault).toBe(false);
  });
});
