/**
 * Alert message formatting
 */

import { ActionLabel, Moneyness, ParsedInstrument, SizeBucket } from '../types';

export interface OptionAlertFields {
  instrument: ParsedInstrument;
  action: ActionLabel;
  bucket: SizeBucket;
  lots: number;
  existingOi: number;
  oiDelta: number;
  oiRoc: number;
  priceDelta: number;
  lastPrice: number;
  moneyness: Moneyness;
  timestamp: number;
}

export interface AlertMessageFormatterOptions {
  timeZone?: string;
  displayNames?: Record<string, string>;
}

export class AlertMessageFormatter {
  private readonly timeFormatter: Intl.DateTimeFormat;
  private readonly displayNames: Record<string, string>;

  constructor(options: AlertMessageFormatterOptions = {}) {
    this.timeFormatter = new Intl.DateTimeFormat('en-GB', {
      timeZone: options.timeZone ?? 'Asia/Kolkata',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hourCycle: 'h23',
    });
    this.displayNames = options.displayNames ?? {};
  }

  displayName(underlying: string): string {
    return this.displayNames[underlying] ?? underlying;
  }

  formatTime(timestamp: number): string {
    const parts: Record<string, string> = {};
    for (const part of this.timeFormatter.formatToParts(new Date(timestamp))) {
      parts[part.type] = part.value;
    }
    return `${parts['hour']}:${parts['minute']}:${parts['second']}`;
  }

  formatOptionAlert(fields: OptionAlertFields): string {
    const { instrument } = fields;
    const product = this.displayName(instrument.underlying);
    const contract = `${instrument.strike ?? 'N/A'}${instrument.optionType ?? ''}`;

    return [
      `${product} | OPTIONSTRIKE: ${contract} ${fields.moneyness}`,
      `ACTION: ${fields.action}`,
      `SIZE: ${fields.bucket} (${fields.lots} lots)`,
      `EXISTING OI: ${fields.existingOi}`,
      `OI Δ: ${fields.oiDelta}`,
      `OI RoC: ${fields.oiRoc.toFixed(2)}%`,
      `PRICE: ${AlertMessageFormatter.priceDirection(fields.priceDelta)}`,
      `TIME: ${this.formatTime(fields.timestamp)}`,
      `${instrument.expiry.year} ${product} ${contract}`,
      `LAST PRICE: ${fields.lastPrice.toFixed(2)}`,
    ].join('\n');
  }

  /**
   * Informational future price line; not produced by the alert gate
   */
  formatFuturePrice(instrument: ParsedInstrument, price: number, timestamp: number): string {
    const product = this.displayName(instrument.underlying);
    return [
      `${instrument.expiry.year} ${product} FUT`,
      `${price.toFixed(2)}`,
      `TIME: ${this.formatTime(timestamp)}`,
    ].join('\n');
  }

  static priceDirection(priceDelta: number): string {
    if (priceDelta > 0) return '↑';
    if (priceDelta < 0) return '↓';
    return '↔';
  }
}
