/**
 * Service interfaces for the OI Flow Scanner
 */

import { AxiosRequestConfig, AxiosResponse } from 'axios';
import { BucketBoundary, DispatchResult, LogLevel, SinkName, UnderlyingSettings } from '../types';

export interface TelegramSettings {
  botToken: string;
  chatId: string;
}

export interface UltraMsgSettings {
  instance: string;
  token: string;
  groupId: string;
}

/**
 * Application configuration structure
 */
export interface AppConfig {
  apiKey: string;
  websocketUrl: string;
  exchange: string;
  telegram: TelegramSettings | null;
  ultraMsg: UltraMsgSettings | null;
  instrumentsConfigPath: string;
  symbols: string[];
  underlyings: Record<string, UnderlyingSettings>;
  defaultLotSize: number;
  buckets: BucketBoundary[];
  oiRocThreshold: number;
  minAlertLots: number;
  atmBandFraction: number;
  alertTimeZone: string;
  dispatchTimeoutMs: number;
  dispatchMaxRetries: number;
  dispatchRetryDelayMs: number;
  tickStaleThresholdMs: number;
  logLevel: LogLevel;
}

/**
 * Minimal axios-compatible client, injectable for tests
 */
export interface HttpClient {
  post(url: string, data?: unknown, config?: AxiosRequestConfig): Promise<AxiosResponse<unknown>>;
}

/**
 * A single outbound messaging channel
 */
export interface IAlertSink {
  readonly name: SinkName;

  /**
   * Deliver plain text; rejects when delivery fails
   */
  send(text: string): Promise<void>;
}

/**
 * Fan-out over every configured sink
 */
export interface IAlertDispatcher {
  /**
   * Resolves with one result per sink; never rejects
   */
  broadcast(text: string): Promise<DispatchResult[]>;
}

/**
 * Interface for configuration management
 */
export interface IConfigManager {
  /**
   * Load and validate configuration from environment variables and the instruments file
   */
  loadConfig(): Promise<void>;

  /**
   * Get current configuration
   */
  getConfig(): AppConfig;

  /**
   * Validate configuration values
   */
  validateConfig(config: Partial<AppConfig>): boolean;
}
