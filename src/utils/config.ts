/**
 * Configuration management module
 * Handles loading and validation of environment variables and the instruments file
 */

import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import { AppConfig, IConfigManager, TelegramSettings, UltraMsgSettings } from '../services/interfaces';
import {
  BucketBoundary,
  InstrumentsFile,
  LogLevel,
  StrikeChainSettings,
  UnderlyingSettings,
} from '../types/config';
import { buildStrikeLadder, parseInstrumentSymbol } from '../services/instrument-symbol';
import { DEFAULT_ATM_BAND_FRACTION, DEFAULT_BUCKET_BOUNDARIES } from '../services/calculation-engine';

// Load environment variables from .env file
dotenv.config();

const BUCKET_LABELS: ReadonlySet<string> = new Set(['EXTREME HIGH', 'EXTRA HIGH', 'HIGH', 'MEDIUM', 'LOW']);

export type InstrumentsReader = (filePath: string) => string;

/**
 * Configuration manager implementation
 */
export class ConfigManager implements IConfigManager {
  private config: AppConfig | null = null;

  constructor(
    private readonly env: NodeJS.ProcessEnv = process.env,
    private readonly readInstruments: InstrumentsReader = (filePath) => fs.readFileSync(filePath, 'utf8')
  ) {}

  /**
   * Load and validate configuration
   */
  async loadConfig(): Promise<void> {
    const instrumentsConfigPath = path.resolve(
      this.getEnvVar('INSTRUMENTS_CONFIG_PATH', 'config/instruments.json')
    );
    const instruments = this.loadInstrumentsFile(instrumentsConfigPath);

    const config: AppConfig = {
      apiKey: this.getRequiredEnvVar('GFDL_API_KEY'),
      websocketUrl: this.getEnvVar('GFDL_WS_URL', 'wss://nimblewebstream.lisuns.com:4576/'),
      exchange: this.getEnvVar('GFDL_EXCHANGE', 'NFO'),
      telegram: this.getTelegramSettings(),
      ultraMsg: this.getUltraMsgSettings(),
      instrumentsConfigPath,
      symbols: this.collectSymbols(instruments),
      underlyings: instruments.underlyings ?? {},
      defaultLotSize: instruments.defaultLotSize ?? 75,
      buckets: instruments.buckets ?? [...DEFAULT_BUCKET_BOUNDARIES],
      oiRocThreshold: this.getNumberEnvVar('OI_ROC_THRESHOLD', 2.0),
      minAlertLots: this.getNumberEnvVar('MIN_ALERT_LOTS', 50),
      atmBandFraction: this.getNumberEnvVar('ATM_BAND_FRACTION', DEFAULT_ATM_BAND_FRACTION),
      alertTimeZone: this.getEnvVar('ALERT_TIMEZONE', 'Asia/Kolkata'),
      dispatchTimeoutMs: this.getNumberEnvVar('DISPATCH_TIMEOUT_MS', 10000),
      dispatchMaxRetries: this.getNumberEnvVar('DISPATCH_MAX_RETRIES', 0),
      dispatchRetryDelayMs: this.getNumberEnvVar('DISPATCH_RETRY_DELAY_MS', 1000),
      tickStaleThresholdMs: this.getNumberEnvVar('TICK_STALE_THRESHOLD_MS', 5 * 60 * 1000),
      logLevel: this.getLogLevel(this.getEnvVar('LOG_LEVEL', 'info')),
    };

    if (!this.validateConfig(config)) {
      throw new Error('Configuration validation failed');
    }

    this.config = config;
  }

  /**
   * Get current configuration
   */
  getConfig(): AppConfig {
    if (!this.config) {
      throw new Error('Configuration not loaded. Call loadConfig() first.');
    }
    return this.config;
  }

  /**
   * Validate configuration values
   */
  validateConfig(config: Partial<AppConfig>): boolean {
    const errors: string[] = [];

    if (!config.apiKey) {
      errors.push('GFDL_API_KEY is required');
    }

    if (config.websocketUrl !== undefined && !this.isValidWebSocketUrl(config.websocketUrl)) {
      errors.push('GFDL_WS_URL must be a valid WebSocket URL');
    }

    if (config.telegram === null && config.ultraMsg === null) {
      errors.push(
        'At least one alert channel is required: set TELEGRAM_BOT_TOKEN/TELEGRAM_CHAT_ID or ULTRAMSG_INSTANCE/ULTRAMSG_TOKEN/ULTRAMSG_GROUP_ID'
      );
    }

    if (config.symbols !== undefined) {
      if (config.symbols.length === 0) {
        errors.push('Instruments file must define at least one symbol');
      }
      const unparseable = config.symbols.filter((symbol) => !parseInstrumentSymbol(symbol));
      if (unparseable.length > 0) {
        errors.push(`Unrecognised instrument symbols: ${unparseable.join(', ')}`);
      }
    }

    if (config.underlyings !== undefined) {
      for (const [name, settings] of Object.entries(config.underlyings)) {
        if (!Number.isFinite(settings.lotSize) || settings.lotSize <= 0) {
          errors.push(`Lot size for ${name} must be greater than 0`);
        }
      }
    }

    if (config.defaultLotSize !== undefined && !(config.defaultLotSize > 0)) {
      errors.push('defaultLotSize must be greater than 0');
    }

    if (config.buckets !== undefined) {
      for (const bucket of config.buckets) {
        if (!BUCKET_LABELS.has(bucket.label)) {
          errors.push(`Unknown bucket label: ${bucket.label}`);
        }
        if (!Number.isFinite(bucket.minLots) || bucket.minLots < 1) {
          errors.push(`Bucket ${bucket.label} must have minLots of at least 1`);
        }
      }
    }

    if (config.oiRocThreshold !== undefined && config.oiRocThreshold < 0) {
      errors.push('OI_ROC_THRESHOLD must be zero or positive');
    }

    if (config.minAlertLots !== undefined && config.minAlertLots < 0) {
      errors.push('MIN_ALERT_LOTS must be zero or positive');
    }

    if (
      config.atmBandFraction !== undefined &&
      (config.atmBandFraction < 0 || config.atmBandFraction >= 1)
    ) {
      errors.push('ATM_BAND_FRACTION must be between 0 and 1');
    }

    if (config.alertTimeZone !== undefined && !this.isValidTimeZone(config.alertTimeZone)) {
      errors.push(`ALERT_TIMEZONE is not a valid IANA time zone: ${config.alertTimeZone}`);
    }

    if (config.dispatchTimeoutMs !== undefined && config.dispatchTimeoutMs < 1000) {
      errors.push('DISPATCH_TIMEOUT_MS must be at least 1000ms (1 second)');
    }

    if (config.dispatchMaxRetries !== undefined && config.dispatchMaxRetries < 0) {
      errors.push('DISPATCH_MAX_RETRIES must be zero or positive');
    }

    if (config.tickStaleThresholdMs !== undefined && config.tickStaleThresholdMs < 10000) {
      errors.push('TICK_STALE_THRESHOLD_MS must be at least 10000ms (10 seconds)');
    }

    if (errors.length > 0) {
      console.error('Configuration validation errors:');
      errors.forEach((error) => console.error(`  - ${error}`));
      return false;
    }

    return true;
  }

  private loadInstrumentsFile(filePath: string): InstrumentsFile {
    let raw: string;
    try {
      raw = this.readInstruments(filePath);
    } catch (error) {
      throw new Error(
        `Unable to read instruments file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const parsed: unknown = JSON.parse(raw);
    if (!isRecord(parsed)) {
      throw new Error(`Instruments file ${filePath} must contain a JSON object`);
    }

    return toInstrumentsFile(parsed);
  }

  private collectSymbols(instruments: InstrumentsFile): string[] {
    const symbols = new Set<string>();
    for (const symbol of instruments.symbols ?? []) {
      symbols.add(symbol.trim().toUpperCase());
    }
    for (const chain of instruments.chains ?? []) {
      buildStrikeLadder(chain).forEach((symbol) => symbols.add(symbol));
    }
    for (const symbol of instruments.futures ?? []) {
      symbols.add(symbol.trim().toUpperCase());
    }
    return [...symbols].filter((symbol) => symbol.length > 0);
  }

  private getTelegramSettings(): TelegramSettings | null {
    const botToken = this.env['TELEGRAM_BOT_TOKEN'];
    const chatId = this.env['TELEGRAM_CHAT_ID'];
    if (!botToken || !chatId) {
      return null;
    }
    return { botToken, chatId };
  }

  private getUltraMsgSettings(): UltraMsgSettings | null {
    const instance = this.env['ULTRAMSG_INSTANCE'];
    const token = this.env['ULTRAMSG_TOKEN'];
    const groupId = this.env['ULTRAMSG_GROUP_ID'];
    if (!instance || !token || !groupId) {
      return null;
    }
    return { instance, token, groupId };
  }

  /**
   * Get required environment variable
   */
  private getRequiredEnvVar(name: string): string {
    const value = this.env[name];
    if (!value) {
      throw new Error(`Required environment variable ${name} is not set`);
    }
    return value;
  }

  /**
   * Get optional environment variable with default value
   */
  private getEnvVar(name: string, defaultValue: string): string {
    return this.env[name] || defaultValue;
  }

  /**
   * Get numeric environment variable with default value
   */
  private getNumberEnvVar(name: string, defaultValue: number): number {
    const value = this.env[name];
    if (value === undefined || value === '') {
      return defaultValue;
    }

    const numValue = Number(value);
    if (isNaN(numValue)) {
      console.warn(`Invalid numeric value for ${name}: ${value}. Using default: ${defaultValue}`);
      return defaultValue;
    }

    return numValue;
  }

  /**
   * Normalize log level value
   */
  private getLogLevel(value: string): LogLevel {
    if (this.isValidLogLevel(value)) {
      return value;
    }
    console.warn(`Invalid LOG_LEVEL: ${value}. Falling back to info.`);
    return 'info';
  }

  private isValidLogLevel(value: string): value is LogLevel {
    return ['error', 'warn', 'info', 'debug'].includes(value);
  }

  private isValidTimeZone(value: string): boolean {
    try {
      new Intl.DateTimeFormat('en-US', { timeZone: value });
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Validate WebSocket URL format
   */
  private isValidWebSocketUrl(url: string): boolean {
    try {
      const urlObj = new URL(url);
      return urlObj.protocol === 'ws:' || urlObj.protocol === 'wss:';
    } catch {
      return false;
    }
  }
}

type JsonRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const asArray = (value: unknown): unknown[] => (Array.isArray(value) ? value : []);

const isString = (value: unknown): value is string => typeof value === 'string';

function toUnderlyingSettings(value: unknown): UnderlyingSettings | null {
  if (!isRecord(value) || typeof value['lotSize'] !== 'number') {
    return null;
  }
  const displayName = value['displayName'];
  return isString(displayName)
    ? { lotSize: value['lotSize'], displayName }
    : { lotSize: value['lotSize'] };
}

function toStrikeChain(value: unknown): StrikeChainSettings | null {
  if (!isRecord(value)) {
    return null;
  }
  const { underlying, expiry, fromStrike, toStrike, step } = value;
  if (
    !isString(underlying) ||
    !isString(expiry) ||
    typeof fromStrike !== 'number' ||
    typeof toStrike !== 'number' ||
    typeof step !== 'number'
  ) {
    return null;
  }
  return { underlying, expiry, fromStrike, toStrike, step };
}

function toBucketBoundary(value: unknown): BucketBoundary | null {
  if (!isRecord(value) || typeof value['minLots'] !== 'number') {
    return null;
  }
  const label = value['label'];
  if (!isString(label) || !isBucketLabel(label)) {
    return null;
  }
  return { label, minLots: value['minLots'] };
}

function isBucketLabel(value: string): value is BucketBoundary['label'] {
  return BUCKET_LABELS.has(value);
}

/**
 * Keep the recognised sections of the instruments file with their expected shapes
 */
export function toInstrumentsFile(value: JsonRecord): InstrumentsFile {
  const file: InstrumentsFile = {};

  const defaultLotSize = value['defaultLotSize'];
  if (typeof defaultLotSize === 'number') {
    file.defaultLotSize = defaultLotSize;
  }

  const underlyings = value['underlyings'];
  if (isRecord(underlyings)) {
    const table: Record<string, UnderlyingSettings> = {};
    for (const [name, raw] of Object.entries(underlyings)) {
      const settings = toUnderlyingSettings(raw);
      if (settings) {
        table[name.toUpperCase()] = settings;
      } else {
        console.warn(`Ignoring malformed underlying entry: ${name}`);
      }
    }
    file.underlyings = table;
  }

  if (value['chains'] !== undefined) {
    file.chains = asArray(value['chains'])
      .map(toStrikeChain)
      .filter((chain): chain is StrikeChainSettings => chain !== null);
  }

  if (value['futures'] !== undefined) {
    file.futures = asArray(value['futures']).filter(isString);
  }

  if (value['symbols'] !== undefined) {
    file.symbols = asArray(value['symbols']).filter(isString);
  }

  if (value['buckets'] !== undefined) {
    const raw = asArray(value['buckets']);
    const buckets = raw
      .map(toBucketBoundary)
      .filter((bucket): bucket is BucketBoundary => bucket !== null);
    if (buckets.length !== raw.length) {
      console.warn('Ignoring malformed bucket entries in instruments file');
    }
    file.buckets = buckets;
  }

  return file;
}

/**
 * Global configuration manager instance
 */
export const configManager = new ConfigManager();

/**
 * Utility function to get configuration
 */
export function getConfig(): AppConfig {
  return configManager.getConfig();
}

/**
 * Utility function to initialize configuration
 */
export async function initializeConfig(): Promise<void> {
  await configManager.loadConfig();
}
