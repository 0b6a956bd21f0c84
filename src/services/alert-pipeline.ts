/**
 * Alert Decision Pipeline
 * Received → Updated → Evaluated → (Suppressed | Dispatched), one tick at a time
 */

import { EventEmitter } from 'events';
import {
  AlertEvent,
  BucketBoundary,
  DispatchResult,
  ParsedInstrument,
  RealtimeResultMessage,
  SuppressionGate,
  SymbolStateUpdate,
  TickOutcome,
  UnderlyingSettings,
} from '../types';
import { parseInstrumentSymbol } from './instrument-symbol';
import { SymbolStateStore, UnderlyingPriceCache } from './symbol-state-store';
import { LotBucketEngine, MoneynessClassifier, SignalClassifier } from './calculation-engine';
import { AlertMessageFormatter } from './alert-formatter';
import { IAlertDispatcher } from './interfaces';
import { logger as rootLogger } from '../utils/logger';

const logger = rootLogger.child('pipeline');

export const REALTIME_RESULT = 'RealtimeResult';

export interface AlertDecisionPipelineOptions {
  symbols: string[];
  underlyings?: Record<string, UnderlyingSettings>;
  defaultLotSize?: number;
  buckets?: readonly BucketBoundary[];
  oiRocThreshold?: number;
  minAlertLots?: number;
  atmBandFraction?: number;
  timeZone?: string;
  dispatcher?: IAlertDispatcher;
  now?: () => number;
}

export declare interface AlertDecisionPipeline {
  on(event: 'alert', listener: (alert: AlertEvent) => void): this;
  on(event: 'suppressed', listener: (outcome: Extract<TickOutcome, { status: 'suppressed' }>) => void): this;
  on(event: 'futurePrice', listener: (payload: { underlying: string; price: number; message: string }) => void): this;
  on(event: 'dispatched', listener: (alert: AlertEvent, results: DispatchResult[]) => void): this;
}

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value);

export class AlertDecisionPipeline extends EventEmitter {
  private readonly options = new Map<string, ParsedInstrument>();
  private readonly futures = new Map<string, ParsedInstrument>();
  private readonly stateStore: SymbolStateStore;
  private readonly priceCache: UnderlyingPriceCache;
  private readonly lotEngine: LotBucketEngine;
  private readonly moneynessClassifier: MoneynessClassifier;
  private readonly formatter: AlertMessageFormatter;
  private readonly oiRocThreshold: number;
  private readonly minAlertLots: number;
  private readonly dispatcher: IAlertDispatcher | undefined;
  private readonly now: () => number;

  constructor(config: AlertDecisionPipelineOptions) {
    super();

    for (const symbol of config.symbols) {
      const instrument = parseInstrumentSymbol(symbol);
      if (!instrument) {
        logger.warn(`Ignoring monitored symbol with unrecognised shape: ${symbol}`);
        continue;
      }
      if (instrument.kind === 'future') {
        this.futures.set(symbol, instrument);
      } else {
        this.options.set(symbol, instrument);
      }
    }

    const underlyings = config.underlyings ?? {};
    const knownUnderlyings = new Set(Object.keys(underlyings));
    for (const future of this.futures.values()) {
      knownUnderlyings.add(future.underlying);
    }

    this.stateStore = new SymbolStateStore(this.options.keys());
    logger.debug(`Tracking ${this.stateStore.size} option symbols and ${this.futures.size} futures`);
    this.priceCache = new UnderlyingPriceCache(knownUnderlyings);
    this.lotEngine = new LotBucketEngine({
      underlyings,
      ...(config.defaultLotSize !== undefined ? { defaultLotSize: config.defaultLotSize } : {}),
      ...(config.buckets !== undefined ? { buckets: config.buckets } : {}),
    });
    this.moneynessClassifier = new MoneynessClassifier({
      underlyings: knownUnderlyings,
      ...(config.atmBandFraction !== undefined ? { atmBandFraction: config.atmBandFraction } : {}),
    });

    const displayNames: Record<string, string> = {};
    for (const [name, settings] of Object.entries(underlyings)) {
      if (settings.displayName) {
        displayNames[name] = settings.displayName;
      }
    }
    this.formatter = new AlertMessageFormatter({
      displayNames,
      ...(config.timeZone !== undefined ? { timeZone: config.timeZone } : {}),
    });

    this.oiRocThreshold = config.oiRocThreshold ?? 2.0;
    this.minAlertLots = config.minAlertLots ?? 50;
    this.dispatcher = config.dispatcher;
    this.now = config.now ?? Date.now;
  }

  /**
   * Run one inbound frame through the state machine. Never throws.
   */
  processTick(message: RealtimeResultMessage): TickOutcome {
    try {
      return this.handleTick(message);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error('Tick processing failed', err);
      return { status: 'failed', error: err };
    }
  }

  getStateStore(): SymbolStateStore {
    return this.stateStore;
  }

  getPriceCache(): UnderlyingPriceCache {
    return this.priceCache;
  }

  getLotEngine(): LotBucketEngine {
    return this.lotEngine;
  }

  getMoneynessClassifier(): MoneynessClassifier {
    return this.moneynessClassifier;
  }

  getMonitoredSymbols(): string[] {
    return [...this.options.keys(), ...this.futures.keys()];
  }

  private handleTick(message: RealtimeResultMessage): TickOutcome {
    // Received
    if (message.MessageType !== REALTIME_RESULT) {
      return { status: 'dropped', reason: 'NOT_REALTIME_RESULT' };
    }

    const symbol = message.InstrumentIdentifier;
    if (typeof symbol !== 'string' || symbol.length === 0) {
      return { status: 'dropped', reason: 'MISSING_SYMBOL' };
    }

    const future = this.futures.get(symbol);
    const option = this.options.get(symbol);
    if (!future && !option) {
      return { status: 'dropped', reason: 'UNKNOWN_SYMBOL' };
    }

    const price = message.LastTradePrice;
    if (!isFiniteNumber(price)) {
      return { status: 'dropped', reason: 'MISSING_PRICE' };
    }

    // Updated: futures only refresh the underlying price
    if (future) {
      const accepted = this.priceCache.update(future.underlying, price);
      if (accepted) {
        const message = this.formatter.formatFuturePrice(future, price, this.now());
        this.emit('futurePrice', { underlying: future.underlying, price, message });
      }
      return { status: 'futurePrice', underlying: future.underlying, price, accepted };
    }

    if (!option) {
      return { status: 'dropped', reason: 'UNKNOWN_SYMBOL' };
    }

    const oi = message.OpenInterest;
    if (!isFiniteNumber(oi)) {
      return { status: 'dropped', reason: 'MISSING_OPEN_INTEREST' };
    }

    const update = this.stateStore.update(symbol, price, oi);
    if (!update) {
      return { status: 'dropped', reason: 'INVALID_QUOTE' };
    }

    if (update.isWarmUp) {
      logger.debug(`${symbol}: Initializing option data state`);
      return { status: 'warmUp', symbol };
    }

    if (update.oiDelta === 0) {
      return { status: 'unchanged', symbol };
    }

    return this.evaluate(option, update);
  }

  private evaluate(instrument: ParsedInstrument, update: SymbolStateUpdate): TickOutcome {
    const { symbol } = instrument;
    const state = this.stateStore.get(symbol);
    const oiPrev = state?.oiPrev ?? 0;
    const { oiDelta, priceDelta } = update;

    const oiRoc = oiPrev === 0 ? 0.0 : (oiDelta / oiPrev) * 100;
    if (Math.abs(oiRoc) <= this.oiRocThreshold) {
      return this.suppress(symbol, 'OI_ROC', oiRoc, 0);
    }

    logger.debug(`${symbol}: OI RoC ${oiRoc.toFixed(2)}% > ${this.oiRocThreshold}%. Potential alert`);

    const lots = this.lotEngine.lots(symbol, oiDelta, instrument);
    if (lots <= this.minAlertLots) {
      return this.suppress(symbol, 'MIN_LOTS', oiRoc, lots);
    }

    const bucket = this.lotEngine.bucket(lots);
    if (bucket === 'IGNORE') {
      return this.suppress(symbol, 'BUCKET', oiRoc, lots);
    }

    const futurePrice = this.priceCache.get(instrument.underlying);
    const moneyness = this.moneynessClassifier.classifyInstrument(instrument, futurePrice);
    if (moneyness !== 'ITM' && moneyness !== 'ATM') {
      if (futurePrice === 0) {
        logger.debug(`${symbol}: Waiting for future price of ${instrument.underlying} to check moneyness`);
      } else {
        logger.debug(`${symbol}: ${moneyness} (Future: ${futurePrice.toFixed(2)}, Strike: ${instrument.strike}), alert suppressed`);
      }
      return this.suppress(symbol, 'MONEYNESS', oiRoc, lots);
    }

    const action = SignalClassifier.classify(oiDelta, priceDelta);
    const timestamp = this.now();
    const lastPrice = state?.price ?? 0;
    const existingOi = oiPrev;

    const message = this.formatter.formatOptionAlert({
      instrument,
      action,
      bucket,
      lots,
      existingOi,
      oiDelta,
      oiRoc,
      priceDelta,
      lastPrice,
      moneyness,
      timestamp,
    });

    const alert: AlertEvent = {
      symbol,
      instrument,
      action,
      bucket,
      lots,
      oiDelta,
      oiRoc,
      priceDelta,
      moneyness,
      existingOi,
      lastPrice,
      futurePrice,
      timestamp,
      message,
    };

    logger.info(`${symbol}: ${moneyness}, lots: ${lots}, bucket: ${bucket}. Triggering alert`);
    this.dispatch(alert);

    // Observers run after delivery is queued and cannot cancel it
    try {
      this.emit('alert', alert);
    } catch (error) {
      logger.error(`Alert listener failed for ${symbol}`, error);
    }

    return { status: 'dispatched', alert };
  }

  private suppress(symbol: string, gate: SuppressionGate, oiRoc: number, lots: number): TickOutcome {
    const outcome = { status: 'suppressed' as const, symbol, gate, oiRoc, lots };
    this.emit('suppressed', outcome);
    return outcome;
  }

  /**
   * Fire-and-forget: the tick path never waits on delivery
   */
  private dispatch(alert: AlertEvent): void {
    if (!this.dispatcher) {
      return;
    }

    void this.dispatcher
      .broadcast(alert.message)
      .then((results) => {
        this.emit('dispatched', alert, results);
      })
      .catch((error) => {
        logger.error(`Alert dispatch failed for ${alert.symbol}`, error);
      });
  }
}
