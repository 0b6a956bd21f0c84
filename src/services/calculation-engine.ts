/**
 * Calculation Engine Implementation
 * Handles OI/price action classification, lot sizing and moneyness checks
 */

import {
  ActionLabel,
  BucketBoundary,
  Moneyness,
  ParsedInstrument,
  SizeBucket,
  UnderlyingSettings,
} from '../types';
import { parseInstrumentSymbol } from './instrument-symbol';

export const DEFAULT_BUCKET_BOUNDARIES: readonly BucketBoundary[] = [
  { label: 'EXTREME HIGH', minLots: 200 },
  { label: 'EXTRA HIGH', minLots: 150 },
  { label: 'HIGH', minLots: 100 },
  { label: 'MEDIUM', minLots: 75 },
  { label: 'LOW', minLots: 1 },
];

export const DEFAULT_ATM_BAND_FRACTION = 0.005;

/**
 * Signal Classifier: OI change × price change decision table
 */
export class SignalClassifier {
  /**
   * First match wins. Total over every input, including NaN.
   */
  static classify(oiDelta: number, priceDelta: number): ActionLabel {
    if (priceDelta === 0) {
      if (oiDelta > 0) return 'WRITING / HEDGING';
      if (oiDelta < 0) return 'POSITION UNWINDING / PROFIT BOOKING';
    } else if (oiDelta > 0) {
      if (priceDelta > 0) return 'BUYERS DOMINANT (LONG BUILD-UP)';
      if (priceDelta < 0) return 'WRITERS DOMINANT (SHORT / PUT WRITING)';
    } else if (oiDelta < 0) {
      if (priceDelta > 0) return 'SHORT COVERING';
      if (priceDelta < 0) return 'LONG UNWINDING';
    }

    return 'Indecisive Movement';
  }
}

export interface LotBucketEngineOptions {
  underlyings?: Record<string, UnderlyingSettings>;
  defaultLotSize?: number;
  buckets?: readonly BucketBoundary[];
}

/**
 * Lot/Bucket Engine: converts raw OI change into lots and a size label
 */
export class LotBucketEngine {
  private readonly lotSizes: Array<[string, number]>;
  private readonly lotSizeByUnderlying: Map<string, number>;
  private readonly defaultLotSize: number;
  private readonly buckets: BucketBoundary[];

  constructor(options: LotBucketEngineOptions = {}) {
    this.lotSizes = Object.entries(options.underlyings ?? {}).map(
      ([name, settings]): [string, number] => [name, settings.lotSize]
    );
    this.lotSizeByUnderlying = new Map(this.lotSizes);
    this.defaultLotSize = options.defaultLotSize ?? 75;
    this.buckets = [...(options.buckets ?? DEFAULT_BUCKET_BOUNDARIES)].sort(
      (a, b) => b.minLots - a.minLots
    );
  }

  /**
   * Resolve the lot size from the parsed underlying. Symbols that do not parse
   * fall back to the first configured underlying contained in the symbol.
   */
  lotSizeFor(symbol: string, instrument: ParsedInstrument | null = parseInstrumentSymbol(symbol)): number {
    if (instrument) {
      return this.lotSizeByUnderlying.get(instrument.underlying) ?? this.defaultLotSize;
    }

    const match = this.lotSizes.find(([name]) => symbol.includes(name));
    return match ? match[1] : this.defaultLotSize;
  }

  lots(symbol: string, oiDelta: number, instrument: ParsedInstrument | null = parseInstrumentSymbol(symbol)): number {
    const lotSize = this.lotSizeFor(symbol, instrument);
    return LotBucketEngine.lotsFromOiChange(oiDelta, lotSize);
  }

  bucket(lotCount: number): SizeBucket {
    for (const boundary of this.buckets) {
      if (lotCount >= boundary.minLots) {
        return boundary.label;
      }
    }
    return 'IGNORE';
  }

  getDefaultLotSize(): number {
    return this.defaultLotSize;
  }

  /**
   * floor(|oiDelta| / lotSize); zero or invalid lot size yields 0 lots
   */
  static lotsFromOiChange(oiDelta: number, lotSize: number): number {
    if (!Number.isFinite(lotSize) || lotSize <= 0 || !Number.isFinite(oiDelta)) {
      return 0;
    }
    return Math.floor(Math.abs(oiDelta) / lotSize);
  }
}

export interface MoneynessClassifierOptions {
  underlyings: Iterable<string>;
  atmBandFraction?: number;
}

/**
 * Moneyness Classifier: ITM / ATM / OTM relative to the underlying future price
 */
export class MoneynessClassifier {
  private readonly underlyings: Set<string>;
  private readonly atmBandFraction: number;

  constructor(options: MoneynessClassifierOptions) {
    this.underlyings = new Set(options.underlyings);
    this.atmBandFraction = options.atmBandFraction ?? DEFAULT_ATM_BAND_FRACTION;
  }

  classify(symbol: string, futurePrice: number): Moneyness {
    return this.classifyInstrument(parseInstrumentSymbol(symbol), futurePrice);
  }

  classifyInstrument(instrument: ParsedInstrument | null, futurePrice: number): Moneyness {
    if (!instrument || instrument.kind === 'future') {
      return 'NotApplicable';
    }

    if (!this.underlyings.has(instrument.underlying)) {
      return 'NotApplicable';
    }

    // No future price yet counts as OTM
    if (!Number.isFinite(futurePrice) || futurePrice <= 0) {
      return 'OTM';
    }

    const { strike, optionType } = instrument;
    if (strike === undefined || optionType === undefined) {
      return 'NotApplicable';
    }

    const atmBand = futurePrice * this.atmBandFraction;
    if (Math.abs(futurePrice - strike) <= atmBand) {
      return 'ATM';
    }

    const isItm =
      (optionType === 'CE' && strike < futurePrice) || (optionType === 'PE' && strike > futurePrice);

    return isItm ? 'ITM' : 'OTM';
  }

  getAtmBandFraction(): number {
    return this.atmBandFraction;
  }
}
