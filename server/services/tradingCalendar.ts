/**
 * Trading calendar, built per exchange: the reference symbol's
 * daily bars prove past sessions, and the /v1/marketstatus/upcoming endpoint
 * marks future holidays.
 *
 * Falls back to weekday-only logic for an exchange that has not been loaded,
 * is unknown, or whose data could not be fetched.
 */

import type pino from 'pino';

import { AggregateResponseSchema, UpcomingMarketStatusSchema, validatePayload } from '../lib/apiSchemas.js';
import { addDays, dateKeyInTimeZone, dateKeysBetween, isDateKey, isWeekday } from '../lib/dateUtils.js';
import { describeError } from '../lib/errors.js';
import { getExchangeProfile, type ExchangeProfile } from '../lib/exchanges.js';
import type { DataApiClient } from './dataApi.js';

export interface TradingCalendarService {
  isTradingDay(exchangeId: string, date: string): boolean;
}

const HISTORICAL_LOOKBACK_DAYS = 400;
const FUTURE_PROJECTION_DAYS = 365;

interface ExchangeCalendar {
  tradingDays: Set<string>;
  rangeStart: string;
  rangeEnd: string;
}

/** Weekday-only calendar; used when no data API key is configured. */
export class WeekdayTradingCalendar implements TradingCalendarService {
  isTradingDay(_exchangeId: string, date: string): boolean {
    return isWeekday(date);
  }
}

export interface ExchangeTradingCalendarOptions {
  client: DataApiClient;
  logger: pino.Logger;
  now?: () => Date;
}

export class ExchangeTradingCalendar implements TradingCalendarService {
  private readonly client: DataApiClient;
  private readonly log: pino.Logger;
  private readonly now: () => Date;
  private readonly calendars = new Map<string, ExchangeCalendar>();
  private readonly warnedUnknown = new Set<string>();

  constructor(options: ExchangeTradingCalendarOptions) {
    this.client = options.client;
    this.log = options.logger.child({ module: 'tradingCalendar' });
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Load calendars for the given exchanges. Failures are logged and leave
   * that exchange in weekday-only mode.
   */
  async init(exchanges: Iterable<string>): Promise<void> {
    const unique = [...new Set([...exchanges].map((e) => e.trim().toUpperCase()).filter(Boolean))];
    let upcoming: Map<string, Set<string>> | null = null;
    try {
      upcoming = await this.fetchUpcomingHolidays();
    } catch (err: unknown) {
      this.log.warn(`Upcoming market status fetch failed (non-fatal): ${describeError(err)}`);
    }

    for (const exchange of unique) {
      const profile = getExchangeProfile(exchange);
      if (!profile) {
        this.warnUnknown(exchange);
        continue;
      }
      try {
        await this.refreshExchange(exchange, profile, upcoming?.get(profile.marketStatusExchange) ?? new Set());
      } catch (err: unknown) {
        this.log.warn(`${exchange} calendar init failed: ${describeError(err)}; staying in weekday-only mode`);
      }
    }
  }

  isTradingDay(exchangeId: string, date: string): boolean {
    if (!isDateKey(date)) return false;
    const calendar = this.calendarFor(exchangeId);
    if (calendar && date >= calendar.rangeStart && date <= calendar.rangeEnd) {
      return calendar.tradingDays.has(date);
    }
    return isWeekday(date);
  }

  // -------------------------------------------------------------------------
  // Loading
  // -------------------------------------------------------------------------

  private calendarFor(exchangeId: string): ExchangeCalendar | undefined {
    return this.calendars.get(exchangeId.trim().toUpperCase());
  }

  private warnUnknown(exchange: string): void {
    if (this.warnedUnknown.has(exchange)) return;
    this.warnedUnknown.add(exchange);
    this.log.warn(`No calendar profile for exchange ${exchange}; using weekday-only sessions`);
  }

  private async refreshExchange(exchange: string, profile: ExchangeProfile, holidays: ReadonlySet<string>): Promise<void> {
    const today = dateKeyInTimeZone(this.now(), profile.timeZone);
    const from = addDays(today, -HISTORICAL_LOOKBACK_DAYS);
    const historical = await this.fetchHistoricalSessions(profile, from, today);
    if (historical.size === 0) {
      this.log.warn(`${profile.referenceSymbol} history returned 0 sessions; ${exchange} stays weekday-only`);
      return;
    }

    const rangeEnd = addDays(today, FUTURE_PROJECTION_DAYS);
    const tradingDays = new Set<string>();
    for (const date of dateKeysBetween(from, addDays(rangeEnd, 1))) {
      if (!isWeekday(date)) continue;
      if (date < today) {
        // Past: only dates the reference symbol actually traded.
        if (historical.has(date)) tradingDays.add(date);
      } else if (!holidays.has(date)) {
        tradingDays.add(date);
      }
    }

    this.calendars.set(exchange, { tradingDays, rangeStart: from, rangeEnd });
    this.log.info(`${exchange}: ${tradingDays.size} trading days, range ${from} to ${rangeEnd}`);
  }

  private async fetchHistoricalSessions(profile: ExchangeProfile, from: string, to: string): Promise<Set<string>> {
    const label = `TradingCalendar-${profile.referenceSymbol}`;
    const url = this.client.buildUrl(`/v2/aggs/ticker/${profile.referenceSymbol}/range/1/day/${from}/${to}`, {
      adjusted: 'true',
      sort: 'asc',
      limit: 50000,
    });
    const payload = await this.client.fetchJson(url, { label });
    const validated = validatePayload(AggregateResponseSchema, payload);
    if (!validated.ok) {
      throw new Error(`${label} returned unexpected payload shape: ${validated.issues}`);
    }
    const dates = new Set<string>();
    for (const bar of validated.data.results ?? []) {
      if (typeof bar.t === 'number' && Number.isFinite(bar.t)) {
        dates.add(dateKeyInTimeZone(bar.t, profile.timeZone));
      }
    }
    return dates;
  }

  /** Upcoming full-day closures keyed by exchange. */
  private async fetchUpcomingHolidays(): Promise<Map<string, Set<string>>> {
    const label = 'TradingCalendar-upcoming';
    const payload = await this.client.fetchJson(this.client.buildUrl('/v1/marketstatus/upcoming'), { label });
    const validated = validatePayload(UpcomingMarketStatusSchema, payload);
    if (!validated.ok) {
      throw new Error(`${label} returned unexpected payload shape: ${validated.issues}`);
    }
    const byExchange = new Map<string, Set<string>>();
    for (const entry of validated.data) {
      const date = entry.date.trim();
      // Early closes are still sessions.
      if (!isDateKey(date) || entry.status.toLowerCase() !== 'closed') continue;
      const exchange = String(entry.exchange || '').trim().toUpperCase();
      let holidays = byExchange.get(exchange);
      if (!holidays) {
        holidays = new Set();
        byExchange.set(exchange, holidays);
      }
      holidays.add(date);
    }
    return byExchange;
  }
}
