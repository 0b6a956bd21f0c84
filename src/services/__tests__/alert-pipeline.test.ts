/**
 * Unit tests for AlertDecisionPipeline
 * Drives ticks through warm-up, the four suppression gates and dispatch
 */

import { AlertDecisionPipeline, AlertDecisionPipelineOptions } from '../alert-pipeline';
import { IAlertDispatcher } from '../interfaces';
import { AlertEvent, DispatchResult, RealtimeResultMessage, TickOutcome } from '../../types';

const OPTION = 'XYZ27JAN26500CE';
const FUTURE = 'XYZ27JAN26FUT';

// 2026-01-27 04:00:05 UTC = 09:30:05 in Asia/Kolkata
const TIMESTAMP = Date.UTC(2026, 0, 27, 4, 0, 5);

const tick = (symbol: string, price: number, openInterest?: number): RealtimeResultMessage => ({
  MessageType: 'RealtimeResult',
  Exchange: 'NFO',
  InstrumentIdentifier: symbol,
  LastTradePrice: price,
  ...(openInterest !== undefined ? { OpenInterest: openInterest } : {}),
});

const flushPromises = () => new Promise<void>((resolve) => setImmediate(resolve));

const expectDispatched = (outcome: TickOutcome): AlertEvent => {
  if (outcome.status !== 'dispatched') {
    throw new Error(`Expected a dispatched outcome, got ${JSON.stringify(outcome)}`);
  }
  return outcome.alert;
};

describe('AlertDecisionPipeline', () => {
  let broadcast: jest.Mock<Promise<DispatchResult[]>, [string]>;
  let dispatcher: IAlertDispatcher;

  const createPipeline = (overrides: Partial<AlertDecisionPipelineOptions> = {}): AlertDecisionPipeline =>
    new AlertDecisionPipeline({
      symbols: [OPTION, 'XYZ27JAN26500PE', FUTURE],
      underlyings: { XYZ: { lotSize: 100 } },
      dispatcher,
      now: () => TIMESTAMP,
      ...overrides,
    });

  beforeEach(() => {
    broadcast = jest.fn((_text: string) => Promise.resolve<DispatchResult[]>([{ sink: 'telegram', success: true }]));
    dispatcher = { broadcast };
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('warm-up and state', () => {
    it('never alerts on the first observation of a symbol', () => {
      const pipeline = createPipeline();
      pipeline.processTick(tick(FUTURE, 520));

      expect(pipeline.processTick(tick(OPTION, 100, 1_000_000))).toEqual({ status: 'warmUp', symbol: OPTION });
      expect(broadcast).not.toHaveBeenCalled();
    });

    it('reports unchanged open interest without evaluating the gates', () => {
      const pipeline = createPipeline();
      const suppressed = jest.fn();
      pipeline.on('suppressed', suppressed);

      pipeline.processTick(tick(OPTION, 100, 10000));

      expect(pipeline.processTick(tick(OPTION, 140, 10000))).toEqual({ status: 'unchanged', symbol: OPTION });
      expect(suppressed).not.toHaveBeenCalled();
      expect(pipeline.getStateStore().get(OPTION)).toEqual({ price: 140, pricePrev: 100, oi: 10000, oiPrev: 10000 });
    });
  });

  describe('drops', () => {
    it.each<[string, RealtimeResultMessage, string]>([
      ['other message types', { MessageType: 'Echo', InstrumentIdentifier: OPTION, LastTradePrice: 1 }, 'NOT_REALTIME_RESULT'],
      ['missing symbols', { MessageType: 'RealtimeResult', LastTradePrice: 1, OpenInterest: 1 }, 'MISSING_SYMBOL'],
      ['unmonitored symbols', tick('ABC27JAN26100CE', 1, 1), 'UNKNOWN_SYMBOL'],
      ['missing prices', { MessageType: 'RealtimeResult', InstrumentIdentifier: OPTION, OpenInterest: 1 }, 'MISSING_PRICE'],
      ['non-finite prices', tick(OPTION, Number.NaN, 1), 'MISSING_PRICE'],
      ['option ticks without open interest', tick(OPTION, 100), 'MISSING_OPEN_INTEREST'],
      ['negative open interest', tick(OPTION, 100, -5), 'INVALID_QUOTE'],
    ])('drops %s', (_label, message, reason) => {
      const pipeline = createPipeline();
      expect(pipeline.processTick(message)).toEqual({ status: 'dropped', reason });
    });
  });

  describe('futures', () => {
    it('updates the underlying price and never alerts', () => {
      const pipeline = createPipeline();
      const futurePrice = jest.fn();
      pipeline.on('futurePrice', futurePrice);

      expect(pipeline.processTick(tick(FUTURE, 520))).toEqual({
        status: 'futurePrice',
        underlying: 'XYZ',
        price: 520,
        accepted: true,
      });
      expect(pipeline.processTick(tick(FUTURE, 530, 99999999))).toMatchObject({ status: 'futurePrice', price: 530 });

      expect(pipeline.getPriceCache().get('XYZ')).toBe(530);
      expect(futurePrice).toHaveBeenLastCalledWith({
        underlying: 'XYZ',
        price: 530,
        message: '26 XYZ FUT\n530.00\nTIME: 09:30:05',
      });
      expect(broadcast).not.toHaveBeenCalled();
    });

    it('rejects non-positive future prices', () => {
      const pipeline = createPipeline();
      expect(pipeline.processTick(tick(FUTURE, 0))).toMatchObject({ status: 'futurePrice', accepted: false });
      expect(pipeline.getPriceCache().get('XYZ')).toBe(0);
    });
  });

  describe('suppression gates', () => {
    it('suppresses at the lots gate when the change is smaller than one lot', () => {
      const pipeline = createPipeline({ underlyings: { XYZ: { lotSize: 500 } } });
      pipeline.processTick(tick(FUTURE, 520));
      pipeline.processTick(tick(OPTION, 100, 10000));

      const outcome = pipeline.processTick(tick(OPTION, 105, 10300));

      expect(outcome).toMatchObject({ status: 'suppressed', symbol: OPTION, gate: 'MIN_LOTS', lots: 0 });
      if (outcome.status === 'suppressed') {
        expect(outcome.oiRoc).toBeCloseTo(3);
      }
    });

    it('suppresses when the rate of change does not exceed the threshold', () => {
      const pipeline = createPipeline();
      pipeline.processTick(tick(OPTION, 100, 10000));

      expect(pipeline.processTick(tick(OPTION, 100, 10200))).toMatchObject({
        status: 'suppressed',
        gate: 'OI_ROC',
        lots: 0,
      });
    });

    it('requires strictly more lots than the minimum', () => {
      const pipeline = createPipeline();
      pipeline.processTick(tick(FUTURE, 520));
      pipeline.processTick(tick(OPTION, 100, 10000));

      expect(pipeline.processTick(tick(OPTION, 95, 15000))).toMatchObject({
        status: 'suppressed',
        gate: 'MIN_LOTS',
        lots: 50,
      });
    });

    it('suppresses lot counts that fall below every bucket', () => {
      const pipeline = createPipeline({ buckets: [{ label: 'HIGH', minLots: 100 }] });
      pipeline.processTick(tick(FUTURE, 520));
      pipeline.processTick(tick(OPTION, 100, 10000));

      expect(pipeline.processTick(tick(OPTION, 95, 16000))).toMatchObject({
        status: 'suppressed',
        gate: 'BUCKET',
        lots: 60,
      });
    });

    it('suppresses while the future price is unknown', () => {
      const pipeline = createPipeline();
      pipeline.processTick(tick(OPTION, 100, 10000));

      expect(pipeline.processTick(tick(OPTION, 95, 16000))).toMatchObject({ status: 'suppressed', gate: 'MONEYNESS' });
      expect(broadcast).not.toHaveBeenCalled();
    });

    it('suppresses out-of-the-money strikes', () => {
      const pipeline = createPipeline();
      pipeline.processTick(tick(FUTURE, 480));
      pipeline.processTick(tick(OPTION, 100, 10000));

      expect(pipeline.processTick(tick(OPTION, 95, 16000))).toMatchObject({ status: 'suppressed', gate: 'MONEYNESS' });
    });

    it('emits every suppression', () => {
      const pipeline = createPipeline();
      const suppressed = jest.fn();
      pipeline.on('suppressed', suppressed);
      pipeline.processTick(tick(OPTION, 100, 10000));

      pipeline.processTick(tick(OPTION, 100, 10100));

      expect(suppressed).toHaveBeenCalledWith(
        expect.objectContaining({ status: 'suppressed', symbol: OPTION, gate: 'OI_ROC' })
      );
    });
  });

  describe('dispatch', () => {
    it('alerts on a large in-the-money build-up with falling price', () => {
      const pipeline = createPipeline();
      pipeline.processTick(tick(FUTURE, 520));
      pipeline.processTick(tick(OPTION, 100, 10000));

      const alert = expectDispatched(pipeline.processTick(tick(OPTION, 95, 16000)));

      expect(alert).toMatchObject({
        symbol: OPTION,
        action: 'WRITERS DOMINANT (SHORT / PUT WRITING)',
        bucket: 'LOW',
        lots: 60,
        oiDelta: 6000,
        priceDelta: -5,
        moneyness: 'ITM',
        existingOi: 10000,
        lastPrice: 95,
        futurePrice: 520,
        timestamp: TIMESTAMP,
      });
      expect(alert.oiRoc).toBeCloseTo(60);
      expect(alert.message.split('\n')).toEqual([
        'XYZ | OPTIONSTRIKE: 500CE ITM',
        'ACTION: WRITERS DOMINANT (SHORT / PUT WRITING)',
        'SIZE: LOW (60 lots)',
        'EXISTING OI: 10000',
        'OI Δ: 6000',
        'OI RoC: 60.00%',
        'PRICE: ↓',
        'TIME: 09:30:05',
        '26 XYZ 500CE',
        'LAST PRICE: 95.00',
      ]);
      expect(broadcast).toHaveBeenCalledWith(alert.message);
    });

    it('alerts on at-the-money strikes and falling open interest', () => {
      const pipeline = createPipeline();
      pipeline.processTick(tick(FUTURE, 501));
      pipeline.processTick(tick(OPTION, 100, 10000));

      const alert = expectDispatched(pipeline.processTick(tick(OPTION, 110, 4000)));

      expect(alert).toMatchObject({ moneyness: 'ATM', action: 'SHORT COVERING', oiDelta: -6000, lots: 60 });
      expect(alert.message).toContain('OI RoC: -60.00%');
    });

    it('uses the put side of the moneyness rule', () => {
      const pipeline = createPipeline();
      pipeline.processTick(tick(FUTURE, 480));
      pipeline.processTick(tick('XYZ27JAN26500PE', 20, 10000));

      const alert = expectDispatched(pipeline.processTick(tick('XYZ27JAN26500PE', 20, 20000)));

      expect(alert).toMatchObject({ moneyness: 'ITM', action: 'WRITING / HEDGING', bucket: 'HIGH', lots: 100 });
    });

    it('returns before delivery completes', () => {
      broadcast.mockImplementation(() => new Promise<DispatchResult[]>(() => undefined));
      const pipeline = createPipeline();
      pipeline.processTick(tick(FUTURE, 520));
      pipeline.processTick(tick(OPTION, 100, 10000));

      expect(pipeline.processTick(tick(OPTION, 95, 16000)).status).toBe('dispatched');
      expect(broadcast).toHaveBeenCalledTimes(1);
    });

    it('emits dispatched with the sink results once delivery settles', async () => {
      const pipeline = createPipeline();
      const dispatched = jest.fn();
      pipeline.on('dispatched', dispatched);
      pipeline.processTick(tick(FUTURE, 520));
      pipeline.processTick(tick(OPTION, 100, 10000));

      const alert = expectDispatched(pipeline.processTick(tick(OPTION, 95, 16000)));
      await flushPromises();

      expect(dispatched).toHaveBeenCalledWith(alert, [{ sink: 'telegram', success: true }]);
    });

    it('keeps processing ticks when delivery fails', async () => {
      const failure = new Error('network down');
      broadcast.mockRejectedValue(failure);
      const pipeline = createPipeline();
      pipeline.processTick(tick(FUTURE, 520));
      pipeline.processTick(tick(OPTION, 100, 10000));

      pipeline.processTick(tick(OPTION, 95, 16000));
      await flushPromises();

      expect(console.error).toHaveBeenCalledWith(
        `[ERROR] [pipeline] Alert dispatch failed for ${OPTION}`,
        failure
      );
      expect(pipeline.processTick(tick(OPTION, 90, 23000)).status).toBe('dispatched');
    });

    it('works without a dispatcher', () => {
      const pipeline = new AlertDecisionPipeline({
        symbols: [OPTION, FUTURE],
        underlyings: { XYZ: { lotSize: 100 } },
      });
      const alerts: AlertEvent[] = [];
      pipeline.on('alert', (alert) => alerts.push(alert));
      pipeline.processTick(tick(FUTURE, 520));
      pipeline.processTick(tick(OPTION, 100, 10000));

      expect(pipeline.processTick(tick(OPTION, 95, 16000)).status).toBe('dispatched');
      expect(alerts).toHaveLength(1);
    });
  });

  describe('configuration', () => {
    it('skips monitored symbols that cannot be parsed', () => {
      const pipeline = createPipeline({ symbols: [OPTION, 'NOT-A-SYMBOL', FUTURE] });

      expect(pipeline.getMonitoredSymbols()).toEqual([OPTION, FUTURE]);
      expect(console.warn).toHaveBeenCalledWith(
        '[WARN] [pipeline] Ignoring monitored symbol with unrecognised shape: NOT-A-SYMBOL'
      );
    });

    it('falls back to the default lot size for underlyings without one', () => {
      const pipeline = createPipeline({ underlyings: {}, defaultLotSize: 75 });

      expect(pipeline.getLotEngine().lotSizeFor(OPTION)).toBe(75);
      // Underlyings with a monitored future still get moneyness
      expect(pipeline.getMoneynessClassifier().classify(OPTION, 520)).toBe('ITM');
    });

    it('uses configured display names in the message', () => {
      const pipeline = createPipeline({ underlyings: { XYZ: { lotSize: 100, displayName: 'XYZ CORP' } } });
      pipeline.processTick(tick(FUTURE, 520));
      pipeline.processTick(tick(OPTION, 100, 10000));

      const alert = expectDispatched(pipeline.processTick(tick(OPTION, 95, 16000)));

      expect(alert.message.split('\n')[0]).toBe('XYZ CORP | OPTIONSTRIKE: 500CE ITM');
    });

    it('still delivers the alert when an alert listener throws', () => {
      const pipeline = createPipeline();
      const listenerError = new Error('listener exploded');
      pipeline.on('alert', () => {
        throw listenerError;
      });
      pipeline.processTick(tick(FUTURE, 520));
      pipeline.processTick(tick(OPTION, 100, 10000));

      const alert = expectDispatched(pipeline.processTick(tick(OPTION, 95, 16000)));

      expect(broadcast).toHaveBeenCalledWith(alert.message);
      expect(console.error).toHaveBeenCalledWith(
        '[ERROR] [pipeline] Alert listener failed for XYZ27JAN26500CE',
        listenerError
      );
    });

    it('turns a throwing suppression listener into a failed outcome', () => {
      const pipeline = createPipeline();
      pipeline.on('suppressed', () => {
        throw new Error('listener exploded');
      });
      pipeline.processTick(tick(OPTION, 100, 10000));

      const outcome = pipeline.processTick(tick(OPTION, 100, 10010));

      expect(outcome.status).toBe('failed');
      if (outcome.status === 'failed') {
        expect(outcome.error.message).toBe('listener exploded');
      }
    });
  });
});
