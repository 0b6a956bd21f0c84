/**
 * Instrument symbol parsing
 * <UNDERLYING><DD><MON><YY><STRIKE><CE|PE> for options, <UNDERLYING><DD><MON><YY>FUT for futures
 */

import { ExpiryCode, OptionType, ParsedInstrument, StrikeChainSettings } from '../types';

const SYMBOL_PATTERN = /^([A-Z][A-Z&-]*)(\d{2})([A-Z]{3})(\d{2})(?:(\d+)(CE|PE)|FUT)$/;
const EXPIRY_PATTERN = /^(\d{2})([A-Z]{3})(\d{2})$/;

const OPTION_TYPES: readonly OptionType[] = ['CE', 'PE'];

const MONTHS = new Set([
  'JAN', 'FEB', 'MAR', 'APR', 'MAY', 'JUN',
  'JUL', 'AUG', 'SEP', 'OCT', 'NOV', 'DEC',
]);

export function parseExpiryCode(value: string): ExpiryCode | null {
  const match = EXPIRY_PATTERN.exec(value);
  if (!match) {
    return null;
  }
  const [, day = '', month = '', year = ''] = match;
  if (!MONTHS.has(month)) {
    return null;
  }
  return { day, month, year };
}

export function formatExpiryCode(expiry: ExpiryCode): string {
  return `${expiry.day}${expiry.month}${expiry.year}`;
}

/**
 * Parse a symbol once into its structured parts; null when the shape is not recognised
 */
export function parseInstrumentSymbol(symbol: string): ParsedInstrument | null {
  const match = SYMBOL_PATTERN.exec(symbol);
  if (!match) {
    return null;
  }

  const [, underlying = '', day = '', month = '', year = '', strikeRaw, optionTypeRaw] = match;
  if (!MONTHS.has(month)) {
    return null;
  }

  const expiry: ExpiryCode = { day, month, year };

  if (strikeRaw === undefined) {
    return { symbol, underlying, expiry, kind: 'future' };
  }

  const strike = Number(strikeRaw);
  if (!Number.isSafeInteger(strike)) {
    return null;
  }

  return {
    symbol,
    underlying,
    expiry,
    kind: 'option',
    strike,
    optionType: optionTypeRaw === 'PE' ? 'PE' : 'CE',
  };
}

export function formatInstrumentSymbol(instrument: Omit<ParsedInstrument, 'symbol'>): string {
  const prefix = `${instrument.underlying}${formatExpiryCode(instrument.expiry)}`;
  if (instrument.kind === 'future') {
    return `${prefix}FUT`;
  }
  if (instrument.strike === undefined || instrument.optionType === undefined) {
    throw new Error(`Option instrument ${prefix} requires strike and option type`);
  }
  return `${prefix}${instrument.strike}${instrument.optionType}`;
}

/**
 * Generate CE/PE symbols for every strike in [fromStrike, toStrike]
 */
export function buildStrikeLadder(chain: StrikeChainSettings): string[] {
  const expiry = parseExpiryCode(chain.expiry);
  if (!expiry) {
    throw new Error(`Invalid expiry code: ${chain.expiry}`);
  }
  if (!(chain.step > 0)) {
    throw new Error(`Strike step must be greater than 0 for ${chain.underlying}`);
  }

  const symbols: string[] = [];
  for (let strike = chain.fromStrike; strike <= chain.toStrike; strike += chain.step) {
    for (const optionType of OPTION_TYPES) {
      symbols.push(
        formatInstrumentSymbol({ underlying: chain.underlying, expiry, kind: 'option', strike, optionType })
      );
    }
  }
  return symbols;
}
