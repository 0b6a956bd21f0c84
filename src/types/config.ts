/**
 * Configuration related types
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type SizeBucket = 'EXTREME HIGH' | 'EXTRA HIGH' | 'HIGH' | 'MEDIUM' | 'LOW' | 'IGNORE';

/**
 * Inclusive lower bound (in lots) for a size bucket
 */
export interface BucketBoundary {
  label: Exclude<SizeBucket, 'IGNORE'>;
  minLots: number;
}

export interface UnderlyingSettings {
  lotSize: number;
  displayName?: string;
}

/**
 * Strike ladder definition used to generate monitored option symbols
 */
export interface StrikeChainSettings {
  underlying: string;
  expiry: string;
  fromStrike: number;
  toStrike: number;
  step: number;
}

/**
 * Shape of the instruments JSON file
 */
export interface InstrumentsFile {
  defaultLotSize?: number;
  underlyings?: Record<string, UnderlyingSettings>;
  chains?: StrikeChainSettings[];
  futures?: string[];
  symbols?: string[];
  buckets?: BucketBoundary[];
}
