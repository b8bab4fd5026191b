import { MarketSnapshot } from '@/models';

/**
 * Sample snapshots served when live data is disabled or unavailable
 *
 * Used verbatim and in this order. marketCap is in 억원.
 */
export const FALLBACK_SNAPSHOTS: readonly MarketSnapshot[] = Object.freeze([
  { code: '005930', name: '삼성전자', price: 71000, changePercent: 2.5, volume: 15000000, marketCap: 423000000 },
  { code: '000660', name: 'SK하이닉스', price: 135000, changePercent: 3.2, volume: 5000000, marketCap: 98000000 },
  { code: '035720', name: '카카오', price: 52000, changePercent: -1.5, volume: 8000000, marketCap: 23000000 },
  { code: '005380', name: '현대차', price: 195000, changePercent: 1.8, volume: 2000000, marketCap: 41000000 },
  { code: '051910', name: 'LG화학', price: 425000, changePercent: 2.1, volume: 1500000, marketCap: 30000000 },
  { code: '035420', name: 'NAVER', price: 215000, changePercent: -0.5, volume: 3000000, marketCap: 35000000 },
  { code: '006400', name: '삼성SDI', price: 478000, changePercent: 4.2, volume: 800000, marketCap: 33000000 },
  { code: '068270', name: '셀트리온', price: 168000, changePercent: 1.5, volume: 4000000, marketCap: 22000000 },
  { code: '207940', name: '삼성바이오로직스', price: 825000, changePercent: 0.8, volume: 250000, marketCap: 59000000 },
  { code: '005490', name: 'POSCO홀딩스', price: 385000, changePercent: 2.8, volume: 900000, marketCap: 32000000 },
].map((snapshot) => Object.freeze(snapshot)));
