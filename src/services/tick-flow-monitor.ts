import { EventEmitter } from 'events';

export interface TickFlowMonitorOptions {
  staleThresholdMs?: number;
  checkIntervalMs?: number;
  sleepThresholdMs?: number;
  now?: () => number;
}

export interface TickStreamStalePayload {
  staleMs: number;
  lastTickTimestamp: number;
  detectedAt: string;
}

export interface SystemResumePayload {
  gapMs: number;
  detectedAt: string;
  checkIntervalMs: number;
}

export declare interface TickFlowMonitor {
  on(event: 'tickStreamStale', listener: (payload: TickStreamStalePayload) => void): this;
  on(event: 'systemResumeDetected', listener: (payload: SystemResumePayload) => void): this;
}

/**
 * Observes the tick stream and emits events when it stops flowing.
 */
export class TickFlowMonitor extends EventEmitter {
  private readonly staleThresholdMs: number;
  private readonly checkIntervalMs: number;
  private readonly sleepThresholdMs: number;
  private readonly now: () => number;

  private timer: NodeJS.Timeout | null = null;
  private lastCheckAt: number;
  private lastTickTimestamp: number | null = null;
  private staleReported = false;
  private streaming = false;

  constructor(options: TickFlowMonitorOptions = {}) {
    super();

    this.staleThresholdMs = options.staleThresholdMs ?? 5 * 60 * 1000;
    this.checkIntervalMs = options.checkIntervalMs ?? 60 * 1000;
    this.sleepThresholdMs = options.sleepThresholdMs ?? 2 * this.checkIntervalMs;
    this.now = options.now ?? Date.now;
    this.lastCheckAt = this.now();
  }

  start(): void {
    if (this.timer) {
      return;
    }

    this.lastCheckAt = this.now();
    this.timer = setInterval(() => this.evaluate(), this.checkIntervalMs);
  }

  stop(): void {
    if (!this.timer) {
      return;
    }

    clearInterval(this.timer);
    this.timer = null;
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  trackTick(): void {
    this.lastTickTimestamp = this.now();
    this.staleReported = false;
  }

  /**
   * Staleness is only judged while the feed is subscribed
   */
  markStreaming(): void {
    this.streaming = true;
    this.lastTickTimestamp = this.now();
    this.staleReported = false;
  }

  markDisconnected(): void {
    this.streaming = false;
    this.staleReported = false;
  }

  evaluate(): void {
    const now = this.now();
    const gapMs = now - this.lastCheckAt;

    if (gapMs > this.sleepThresholdMs) {
      const payload: SystemResumePayload = {
        gapMs,
        detectedAt: new Date(now).toISOString(),
        checkIntervalMs: this.checkIntervalMs,
      };

      this.emit('systemResumeDetected', payload);
    }

    this.lastCheckAt = now;

    if (!this.streaming || this.lastTickTimestamp === null) {
      return;
    }

    const staleMs = now - this.lastTickTimestamp;

    if (staleMs > this.staleThresholdMs) {
      if (!this.staleReported) {
        const payload: TickStreamStalePayload = {
          staleMs,
          lastTickTimestamp: this.lastTickTimestamp,
          detectedAt: new Date(now).toISOString(),
        };

        this.staleReported = true;
        this.emit('tickStreamStale', payload);
      }
    } else {
      this.staleReported = false;
    }
  }
}
