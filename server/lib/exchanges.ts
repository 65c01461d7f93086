import { DEFAULT_TIME_ZONE } from './dateUtils.js';

export interface ExchangeProfile {
  /** Liquid symbol whose daily bars prove which past dates were sessions. */
  referenceSymbol: string;
  timeZone: string;
  /** Exchange name as it appears in the upcoming market-status feed. */
  marketStatusExchange: string;
}

const US_EQUITIES: ExchangeProfile = {
  referenceSymbol: 'SPY',
  timeZone: 'America/New_York',
  marketStatusExchange: 'NYSE',
};

export const EXCHANGE_PROFILES: Readonly<Record<string, ExchangeProfile>> = {
  NYSE: US_EQUITIES,
  AMEX: US_EQUITIES,
  ARCA: US_EQUITIES,
  BATS: US_EQUITIES,
  NASDAQ: { referenceSymbol: 'QQQ', timeZone: 'America/New_York', marketStatusExchange: 'NASDAQ' },
};

export function getExchangeProfile(exchange: string): ExchangeProfile | undefined {
  return EXCHANGE_PROFILES[exchange.trim().toUpperCase()];
}

/** Session time zone for an exchange; unknown exchanges trade on New York time. */
export function exchangeTimeZone(exchange: string): string {
  return getExchangeProfile(exchange)?.timeZone ?? DEFAULT_TIME_ZONE;
}
