/**
 * In-memory state for monitored instruments
 * One SymbolState per option symbol, one cached future price per underlying
 */

import { SymbolState, SymbolStateUpdate } from '../types';

const isValidQuote = (value: number): boolean => Number.isFinite(value) && value >= 0;

export class SymbolStateStore {
  private readonly states = new Map<string, SymbolState>();

  constructor(optionSymbols: Iterable<string>) {
    for (const symbol of optionSymbols) {
      this.states.set(symbol, { price: 0, pricePrev: 0, oi: 0, oiPrev: 0 });
    }
  }

  get(symbol: string): Readonly<SymbolState> | undefined {
    return this.states.get(symbol);
  }

  get size(): number {
    return this.states.size;
  }

  /**
   * Shift current values into the _prev slots and store the new quote.
   * Returns null (state untouched) for unknown symbols or invalid values.
   */
  update(symbol: string, price: number, oi: number): SymbolStateUpdate | null {
    const state = this.states.get(symbol);
    if (!state || !isValidQuote(price) || !isValidQuote(oi)) {
      return null;
    }

    state.pricePrev = state.price;
    state.oiPrev = state.oi;
    state.price = price;
    state.oi = oi;

    return {
      priceDelta: state.price - state.pricePrev,
      oiDelta: state.oi - state.oiPrev,
      // oiPrev == 0 means nothing observed yet
      isWarmUp: state.oiPrev === 0,
    };
  }

  /**
   * Zero every entry; the next tick per symbol becomes a warm-up again
   */
  reset(): void {
    for (const state of this.states.values()) {
      state.price = 0;
      state.pricePrev = 0;
      state.oi = 0;
      state.oiPrev = 0;
    }
  }
}

export class UnderlyingPriceCache {
  private readonly prices = new Map<string, number>();

  constructor(underlyings: Iterable<string>) {
    for (const underlying of underlyings) {
      this.prices.set(underlying, 0);
    }
  }

  /**
   * Last observed future price, 0 when unknown
   */
  get(underlying: string): number {
    return this.prices.get(underlying) ?? 0;
  }

  /**
   * Only positive prices for configured underlyings are accepted
   */
  update(underlying: string, price: number): boolean {
    if (!this.prices.has(underlying) || !Number.isFinite(price) || price <= 0) {
      return false;
    }
    this.prices.set(underlying, price);
    return true;
  }
}
