/**
 * Alert Manager
 * Fans alert text out to Telegram and WhatsApp (UltraMsg) with independent outcomes
 */

import { EventEmitter } from 'events';
import axios, { AxiosRequestConfig } from 'axios';
import { DispatchResult, SinkName } from '../types';
import {
  HttpClient,
  IAlertDispatcher,
  IAlertSink,
  TelegramSettings,
  UltraMsgSettings,
} from './interfaces';
import { logger as rootLogger } from '../utils/logger';

const logger = rootLogger.child('dispatch');

export interface SinkOptions {
  httpClient?: HttpClient;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
}

interface SinkRequest {
  url: string;
  params: Record<string, string | number>;
}

/**
 * Shared HTTP delivery with bounded retry and exponential backoff
 */
abstract class HttpAlertSink implements IAlertSink {
  abstract readonly name: SinkName;

  protected readonly httpClient: HttpClient;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(options: SinkOptions = {}) {
    this.httpClient = options.httpClient ?? axios;
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.maxRetries = options.maxRetries ?? 0;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
  }

  protected abstract buildRequest(text: string): SinkRequest;

  async send(text: string): Promise<void> {
    const request = this.buildRequest(text);
    const config: AxiosRequestConfig = { params: request.params, timeout: this.timeoutMs };

    logger.debug(`Preparing to send ${this.name} message`);

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      try {
        const response = await this.httpClient.post(request.url, null, config);
        logger.debug(`${this.name} responded`, { status: response.status });
        return;
      } catch (error) {
        const isLastAttempt = attempt === this.maxRetries;
        logger.error(`Failed to send ${this.name} message`, describeError(error));

        if (isLastAttempt) {
          throw error;
        }

        await sleep(this.retryDelayMs * Math.pow(2, attempt));
      }
    }
  }
}

export class TelegramSink extends HttpAlertSink {
  readonly name = 'telegram' as const;

  constructor(private readonly settings: TelegramSettings, options: SinkOptions = {}) {
    super(options);
  }

  protected buildRequest(text: string): SinkRequest {
    return {
      url: `https://api.telegram.org/bot${this.settings.botToken}/sendMessage`,
      params: { chat_id: this.settings.chatId, text, parse_mode: 'Markdown' },
    };
  }
}

export class UltraMsgSink extends HttpAlertSink {
  readonly name = 'whatsapp' as const;

  constructor(private readonly settings: UltraMsgSettings, options: SinkOptions = {}) {
    super(options);
  }

  protected buildRequest(text: string): SinkRequest {
    return {
      url: `https://api.ultramsg.com/${this.settings.instance}/messages/chat`,
      params: { token: this.settings.token, to: this.settings.groupId, body: text, priority: 10 },
    };
  }
}

export declare interface AlertManager {
  on(event: 'alertSent', listener: (payload: { text: string; results: DispatchResult[] }) => void): this;
  on(event: 'dispatchFailed', listener: (payload: { sink: SinkName; error: Error }) => void): this;
}

/**
 * Main alert manager implementation
 */
export class AlertManager extends EventEmitter implements IAlertDispatcher {
  constructor(private readonly sinks: IAlertSink[]) {
    super();
  }

  getSinkNames(): SinkName[] {
    return this.sinks.map((sink) => sink.name);
  }

  /**
   * Deliver to every sink concurrently; one failing sink never affects another
   */
  async broadcast(text: string): Promise<DispatchResult[]> {
    if (this.sinks.length === 0) {
      logger.warn('No alert sinks configured; message dropped');
      return [];
    }

    const results = await Promise.all(this.sinks.map((sink) => this.deliver(sink, text)));

    this.emit('alertSent', { text, results });
    return results;
  }

  private async deliver(sink: IAlertSink, text: string): Promise<DispatchResult> {
    try {
      await sink.send(text);
      logger.info(`${sink.name} message sent successfully`);
      return { sink: sink.name, success: true };
    } catch (reason) {
      const error = reason instanceof Error ? reason : new Error(String(reason));
      this.emit('dispatchFailed', { sink: sink.name, error });
      return { sink: sink.name, success: false, error: error.message };
    }
  }

  async sendScannerLive(symbolCount: number): Promise<DispatchResult[]> {
    return this.broadcast(`✅ OI Flow Scanner is LIVE and monitoring ${symbolCount} symbols.`);
  }

  async sendScannerStopped(reason: string): Promise<DispatchResult[]> {
    return this.broadcast(`🛑 OI Flow Scanner was stopped (${reason}).`);
  }

  async sendScannerCrashed(error: unknown): Promise<DispatchResult[]> {
    const message = error instanceof Error ? error.message : String(error);
    return this.broadcast(`💥 OI Flow Scanner CRASHED with a critical error: ${message}`);
  }
}

function describeError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    return status !== undefined ? `HTTP ${status}: ${error.message}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
