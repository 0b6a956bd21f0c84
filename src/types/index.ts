/**
 * Core data types for the OI Flow Scanner
 */

export * from './config';
import type { SizeBucket } from './config';

/**
 * 2文字の接尾辞そのまま (CE = call, PE = put)
 */
export type OptionType = 'CE' | 'PE';

export type InstrumentKind = 'option' | 'future';

export interface ExpiryCode {
  day: string;
  month: string;
  year: string;
}

/**
 * Structured view of an instrument symbol such as BANKNIFTY27JAN2660000CE
 */
export interface ParsedInstrument {
  symbol: string;
  underlying: string;
  expiry: ExpiryCode;
  kind: InstrumentKind;
  strike?: number;
  optionType?: OptionType;
}

export type Moneyness = 'ITM' | 'ATM' | 'OTM' | 'NotApplicable';

export type ActionLabel =
  | 'WRITING / HEDGING'
  | 'POSITION UNWINDING / PROFIT BOOKING'
  | 'BUYERS DOMINANT (LONG BUILD-UP)'
  | 'WRITERS DOMINANT (SHORT / PUT WRITING)'
  | 'SHORT COVERING'
  | 'LONG UNWINDING'
  | 'Indecisive Movement';

/**
 * Raw realtime frame delivered by the market data vendor.
 * Every field is optional because the feed occasionally emits partial records.
 */
export interface RealtimeResultMessage {
  MessageType?: string;
  Exchange?: string;
  InstrumentIdentifier?: string;
  LastTradePrice?: number;
  OpenInterest?: number;
  LastTradeTime?: number;
}

/**
 * Per-symbol sliding window of depth 2
 */
export interface SymbolState {
  price: number;
  pricePrev: number;
  oi: number;
  oiPrev: number;
}

export interface SymbolStateUpdate {
  priceDelta: number;
  oiDelta: number;
  isWarmUp: boolean;
}

/**
 * Materialised decision to notify; lives for a single tick
 */
export interface AlertEvent {
  symbol: string;
  instrument: ParsedInstrument;
  action: ActionLabel;
  bucket: SizeBucket;
  lots: number;
  oiDelta: number;
  oiRoc: number;
  priceDelta: number;
  moneyness: Moneyness;
  existingOi: number;
  lastPrice: number;
  futurePrice: number;
  timestamp: number;
  message: string;
}

export type SuppressionGate = 'OI_ROC' | 'MIN_LOTS' | 'BUCKET' | 'MONEYNESS';

export type DropReason =
  | 'NOT_REALTIME_RESULT'
  | 'MISSING_SYMBOL'
  | 'UNKNOWN_SYMBOL'
  | 'MISSING_PRICE'
  | 'MISSING_OPEN_INTEREST'
  | 'INVALID_QUOTE';

export type TickOutcome =
  | { status: 'dropped'; reason: DropReason }
  | { status: 'futurePrice'; underlying: string; price: number; accepted: boolean }
  | { status: 'warmUp'; symbol: string }
  | { status: 'unchanged'; symbol: string }
  | { status: 'suppressed'; symbol: string; gate: SuppressionGate; oiRoc: number; lots: number }
  | { status: 'dispatched'; alert: AlertEvent }
  | { status: 'failed'; error: Error };

export type SinkName = 'telegram' | 'whatsapp';

export interface DispatchResult {
  sink: SinkName;
  success: boolean;
  error?: string;
}
