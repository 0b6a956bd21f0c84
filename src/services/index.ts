/**
 * Service exports for the OI Flow Scanner
 */

export {
  parseInstrumentSymbol,
  formatInstrumentSymbol,
  parseExpiryCode,
  formatExpiryCode,
  buildStrikeLadder,
} from './instrument-symbol';
export { SymbolStateStore, UnderlyingPriceCache } from './symbol-state-store';
export {
  SignalClassifier,
  LotBucketEngine,
  MoneynessClassifier,
  DEFAULT_BUCKET_BOUNDARIES,
  DEFAULT_ATM_BAND_FRACTION,
} from './calculation-engine';
export { AlertMessageFormatter } from './alert-formatter';
export { AlertDecisionPipeline } from './alert-pipeline';
export { AlertManager, TelegramSink, UltraMsgSink } from './alert-manager';
export { RealtimeWebSocketClient } from './websocket-client';
export { TickFlowMonitor } from './tick-flow-monitor';
export { MarketScanner } from './market-scanner';
export * from './interfaces';
