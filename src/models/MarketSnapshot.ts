/**
 * Point-in-time market reading for one instrument
 *
 * A fetch yields a complete snapshot or none; there are no partial snapshots.
 */
export interface MarketSnapshot {
  /** Six-digit KRX instrument code */
  code: string;
  name: string;
  /** Last traded price in KRW (positive) */
  price: number;
  /** Percent change vs prior close (signed) */
  changePercent: number;
  /** Accumulated traded volume in shares */
  volume: number;
  /** Market capitalization in 억원 (100 million KRW) */
  marketCap: number;
}
