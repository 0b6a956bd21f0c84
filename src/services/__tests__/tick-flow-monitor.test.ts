import { TickFlowMonitor } from '../tick-flow-monitor';

describe('TickFlowMonitor', () => {
  let now: number;
  let monitor: TickFlowMonitor;

  beforeEach(() => {
    now = Date.UTC(2026, 0, 27, 4, 0, 0);
    monitor = new TickFlowMonitor({
      staleThresholdMs: 300000,
      checkIntervalMs: 60000,
      now: () => now,
    });
  });

  afterEach(() => {
    monitor.stop();
  });

  it('reports a stale stream once until ticks resume', () => {
    const stale = jest.fn();
    monitor.on('tickStreamStale', stale);
    monitor.markStreaming();

    now += 60000;
    monitor.evaluate();
    now += 60000;
    monitor.evaluate();
    expect(stale).not.toHaveBeenCalled();

    now += 60000 * 4;
    monitor.evaluate();
    expect(stale).toHaveBeenCalledTimes(1);
    expect(stale).toHaveBeenCalledWith({
      staleMs: 360000,
      lastTickTimestamp: Date.UTC(2026, 0, 27, 4, 0, 0),
      detectedAt: '2026-01-27T04:06:00.000Z',
    });

    now += 60000;
    monitor.evaluate();
    expect(stale).toHaveBeenCalledTimes(1);

    monitor.trackTick();
    now += 360000;
    monitor.evaluate();
    expect(stale).toHaveBeenCalledTimes(2);
  });

  it('does not judge staleness while disconnected', () => {
    const stale = jest.fn();
    monitor.on('tickStreamStale', stale);
    monitor.markStreaming();
    monitor.markDisconnected();

    now += 60000;
    monitor.evaluate();
    now += 600000;
    monitor.evaluate();

    expect(stale).not.toHaveBeenCalled();
  });

  it('detects gaps in the check loop as a system resume', () => {
    const resumed = jest.fn();
    monitor.on('systemResumeDetected', resumed);

    now += 60000;
    monitor.evaluate();
    expect(resumed).not.toHaveBeenCalled();

    now += 125000;
    monitor.evaluate();
    expect(resumed).toHaveBeenCalledWith({
      gapMs: 125000,
      detectedAt: '2026-01-27T04:03:05.000Z',
      checkIntervalMs: 60000,
    });
  });

  it('runs the check on an interval while started', () => {
    jest.useFakeTimers();
    try {
      const evaluate = jest.spyOn(monitor, 'evaluate');
      monitor.start();
      monitor.start();
      expect(monitor.isRunning()).toBe(true);

      jest.advanceTimersByTime(180000);
      expect(evaluate).toHaveBeenCalledTimes(3);

      monitor.stop();
      jest.advanceTimersByTime(180000);
      expect(evaluate).toHaveBeenCalledTimes(3);
      expect(monitor.isRunning()).toBe(false);
    } finally {
      jest.useRealTimers();
    }
  });
});
