/**
 * Tracked universe: KOSPI 200 constituents evaluated by the screener
 *
 * Order matters: live batches are returned in this order, and ranking
 * ties keep it.
 */
export const TRACKED_UNIVERSE: readonly string[] = Object.freeze([
  '005930', // 삼성전자
  '000660', // SK하이닉스
  '035720', // 카카오
  '005380', // 현대차
  '051910', // LG화학
  '035420', // NAVER
  '006400', // 삼성SDI
  '068270', // 셀트리온
  '207940', // 삼성바이오로직스
  '005490', // POSCO홀딩스
  '012330', // 현대모비스
  '028260', // 삼성물산
  '066570', // LG전자
  '003670', // 포스코퓨처엠
  '096770', // SK이노베이션
  '000270', // 기아
  '017670', // SK텔레콤
  '034730', // SK
  '018260', // 삼성에스디에스
  '032830', // 삼성생명
]);

/**
 * KIS open API endpoints and fixed request parameters
 */
export const KIS_API = {
  TOKEN_PATH: '/oauth2/tokenP',
  QUOTE_PATH: '/uapi/domestic-stock/v1/quotations/inquire-price',
  GRANT_TYPE: 'client_credentials',
  /** Transaction id for "domestic stock current price" */
  QUOTE_TR_ID: 'FHKST01010100',
  /** Market division: J = KRX stocks */
  MARKET_DIVISION: 'J',
} as const;

/**
 * Scoring rule names
 */
export const RULE_NAMES = {
  UPTREND: 'uptrend',
  STRONG_UPTREND: 'strongUptrend',
  VOLUME_INCREASE: 'volumeIncrease',
  PRICE_RANGE: 'priceRange',
  DAILY_GAIN: 'dailyGain',
  HIGH_VOLATILITY: 'highVolatility',
} as const;

/**
 * Where a snapshot batch came from
 */
export const SNAPSHOT_SOURCES = {
  LIVE: 'live',
  FALLBACK: 'fallback',
} as const;

// Type exports
export type RuleName = (typeof RULE_NAMES)[keyof typeof RULE_NAMES];
export type SnapshotSource = (typeof SNAPSHOT_SOURCES)[keyof typeof SNAPSHOT_SOURCES];
