/**
 * Central export point for all models
 * Allows clean imports: import { MarketSnapshot, ScoredInstrument } from '@/models'
 */

export * from './MarketSnapshot';
export * from './Credentials';
export * from './Snapshot';
export * from './Scoring';
export * from './Recommendation';
