/**
 * Market Scanner
 * Connects the realtime feed, the alert pipeline and the tick flow monitor
 */

import { EventEmitter } from 'events';
import { RealtimeResultMessage, TickOutcome } from '../types';
import { RealtimeWebSocketClient } from './websocket-client';
import { AlertDecisionPipeline } from './alert-pipeline';
import { AlertManager } from './alert-manager';
import { TickFlowMonitor } from './tick-flow-monitor';
import { logger as rootLogger } from '../utils/logger';

const logger = rootLogger.child('scanner');

export interface MarketScannerDependencies {
  client: RealtimeWebSocketClient;
  pipeline: AlertDecisionPipeline;
  alertManager: AlertManager;
  tickMonitor: TickFlowMonitor;
}

export declare interface MarketScanner {
  on(event: 'tick', listener: (outcome: TickOutcome) => void): this;
  on(event: 'live', listener: (symbolCount: number) => void): this;
  on(event: 'restarted', listener: (reason: string) => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
}

export class MarketScanner extends EventEmitter {
  private readonly client: RealtimeWebSocketClient;
  private readonly pipeline: AlertDecisionPipeline;
  private readonly alertManager: AlertManager;
  private readonly tickMonitor: TickFlowMonitor;

  private running = false;
  private eventsBound = false;
  private liveAnnounced = false;
  private restartPromise: Promise<void> | null = null;

  constructor(dependencies: MarketScannerDependencies) {
    super();
    this.client = dependencies.client;
    this.pipeline = dependencies.pipeline;
    this.alertManager = dependencies.alertManager;
    this.tickMonitor = dependencies.tickMonitor;
  }

  /**
   * Start monitoring. A failed first connection is left to the client's reconnect loop.
   */
  async start(): Promise<void> {
    if (this.running) {
      return;
    }

    this.running = true;
    this.bindEvents();
    this.tickMonitor.start();

    const symbolCount = this.pipeline.getMonitoredSymbols().length;
    logger.info(`Starting OI flow scanner for ${symbolCount} symbols`);

    try {
      await this.client.connect();
    } catch (error) {
      logger.error('Initial connection to market data feed failed; waiting for reconnect', error);
    }
  }

  /**
   * Stop monitoring and announce the shutdown reason
   */
  async stop(reason: string): Promise<void> {
    if (!this.running) {
      return;
    }

    this.running = false;
    this.tickMonitor.stop();
    this.client.disconnect();

    logger.info(`Scanner stopped (${reason})`);
    await this.alertManager.sendScannerStopped(reason);
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Reconnect the transport; concurrent requests share one attempt
   */
  async restart(reason: string): Promise<void> {
    if (!this.running) {
      return;
    }

    if (this.restartPromise) {
      return this.restartPromise;
    }

    this.restartPromise = this.performRestart(reason).finally(() => {
      this.restartPromise = null;
    });

    return this.restartPromise;
  }

  private async performRestart(reason: string): Promise<void> {
    logger.warn(`Restarting market data feed (${reason})`);

    this.tickMonitor.markDisconnected();
    this.client.disconnect();

    try {
      await this.client.connect();
      logger.info('Market data feed restarted successfully');
      this.emit('restarted', reason);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error('Failed to restart market data feed', err);
      this.emit('error', err);
      throw err;
    }
  }

  private bindEvents(): void {
    if (this.eventsBound) {
      return;
    }
    this.eventsBound = true;

    this.client.on('realtimeResult', (message) => this.handleRealtimeResult(message));

    this.client.on('authenticated', () => this.handleAuthenticated());

    this.client.on('subscribed', (symbols) => {
      this.tickMonitor.markStreaming();
      this.announceLive(symbols.length);
    });

    this.client.on('disconnected', ({ code, reason }) => {
      logger.warn(`Market data feed disconnected (${code}${reason ? `: ${reason}` : ''})`);
      this.tickMonitor.markDisconnected();
    });

    this.client.on('authenticationFailed', (reason) => {
      logger.error(`Market data feed rejected the API key: ${reason}`);
    });

    this.client.on('maxReconnectAttemptsReached', () => {
      this.restart('max reconnect attempts reached').catch((error) => {
        logger.error('Failed to restart after reaching max reconnect attempts', error);
      });
    });

    this.client.on('error', (error) => {
      logger.error('Market data feed error', error);
    });

    this.tickMonitor.on('tickStreamStale', (payload) => {
      logger.warn('Tick stream appears stale', payload);
      this.restart('tick stream stale').catch((error) => {
        logger.error('Failed to restart feed after stale detection', error);
      });
    });

    this.tickMonitor.on('systemResumeDetected', (payload) => {
      logger.warn('Detected potential system sleep or suspension', payload);
      this.restart('system resume detected').catch((error) => {
        logger.error('Failed to restart feed after system resume detection', error);
      });
    });
  }

  private handleRealtimeResult(message: RealtimeResultMessage): void {
    this.tickMonitor.trackTick();
    const outcome = this.pipeline.processTick(message);
    this.emit('tick', outcome);
  }

  private handleAuthenticated(): void {
    // The client replays known subscriptions itself after a reconnect
    if (this.client.getSubscriptions().length > 0) {
      this.tickMonitor.markStreaming();
      return;
    }

    try {
      this.client.subscribeSymbols(this.pipeline.getMonitoredSymbols());
    } catch (error) {
      logger.error('Failed to subscribe monitored symbols', error);
    }
  }

  private announceLive(symbolCount: number): void {
    if (this.liveAnnounced) {
      return;
    }
    this.liveAnnounced = true;

    logger.info(`Scanner is LIVE and monitoring ${symbolCount} symbols`);
    this.emit('live', symbolCount);
    void this.alertManager.sendScannerLive(symbolCount).catch((error) => {
      logger.error('Failed to send scanner live notification', error);
    });
  }
}
