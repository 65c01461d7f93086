import test from 'node:test';
import assert from 'node:assert/strict';

import { ExchangeTradingCalendar, WeekdayTradingCalendar } from '../server/services/tradingCalendar.js';
import { FIXED_NOW, fakeFetch, makeClient, silentLogger, type Reply } from './helpers.js';

const UPCOMING: Reply = {
  body: [
    { exchange: 'NYSE', date: '2026-04-03', status: 'closed', name: 'Good Friday' },
    { exchange: 'NYSE', date: '2026-11-27', status: 'early-close' },
    { exchange: 'NASDAQ', date: '2026-04-06', status: 'closed' },
  ],
};

// SPY daily bars for the three sessions before "today"; 2026-03-06 is missing on purpose.
const SPY_HISTORY: Reply = {
  body: {
    status: 'OK',
    results: ['2026-03-05', '2026-03-09', '2026-03-10', '2026-03-11'].map((date) => ({
      t: Date.parse(`${date}T05:00:00Z`),
      c: 500,
    })),
  },
};

async function loadedCalendar(replies: Reply[], exchanges: string[] = ['NYSE']) {
  const http = fakeFetch(replies);
  const calendar = new ExchangeTradingCalendar({
    client: makeClient(http.impl),
    logger: silentLogger,
    now: () => new Date(FIXED_NOW),
  });
  await calendar.init(exchanges);
  return { calendar, urls: http.urls };
}

test('init loads upcoming status and the reference symbol history', async () => {
  const { urls } = await loadedCalendar([UPCOMING, SPY_HISTORY]);

  assert.equal(urls.length, 2);
  assert.ok(urls[0].startsWith('https://api.example.test/v1/marketstatus/upcoming?'));
  assert.ok(urls[1].startsWith('https://api.example.test/v2/aggs/ticker/SPY/range/1/day/2025-02-05/2026-03-12?'));
});

test('the loaded range ends a year out; weekdays beyond it are sessions again', async () => {
  const { calendar } = await loadedCalendar([
    { body: [{ exchange: 'NYSE', date: '2027-03-12', status: 'closed' }, { exchange: 'NYSE', date: '2027-03-15', status: 'closed' }] },
    SPY_HISTORY,
  ]);

  assert.equal(calendar.isTradingDay('NYSE', '2027-03-12'), false);
  assert.equal(calendar.isTradingDay('NYSE', '2027-03-15'), true);
});

test('past dates are sessions only when the reference symbol traded', async () => {
  const { calendar } = await loadedCalendar([UPCOMING, SPY_HISTORY]);

  assert.equal(calendar.isTradingDay('NYSE', '2026-03-10'), true);
  assert.equal(calendar.isTradingDay('nyse', '2026-03-11'), true);
  assert.equal(calendar.isTradingDay('NYSE', '2026-03-06'), false);
  assert.equal(calendar.isTradingDay('NYSE', '2026-03-07'), false);
});

test('future weekdays are sessions unless the upcoming feed closes them', async () => {
  const { calendar } = await loadedCalendar([UPCOMING, SPY_HISTORY]);

  assert.equal(calendar.isTradingDay('NYSE', '2026-03-12'), true);
  assert.equal(calendar.isTradingDay('NYSE', '2026-04-03'), false);
  // NASDAQ closures do not apply to NYSE; early closes are still sessions.
  assert.equal(calendar.isTradingDay('NYSE', '2026-04-06'), true);
  assert.equal(calendar.isTradingDay('NYSE', '2026-11-27'), true);
});

test('unknown exchanges and failed loads fall back to weekdays', async () => {
  const { calendar, urls } = await loadedCalendar([], ['LSE', 'NYSE']);

  // Only the upcoming feed and the NYSE history were attempted; LSE has no profile.
  assert.equal(urls.length, 2);
  assert.equal(calendar.isTradingDay('LSE', '2026-03-06'), true);
  assert.equal(calendar.isTradingDay('NYSE', '2026-04-03'), true);
  assert.equal(calendar.isTradingDay('NYSE', '2026-03-07'), false);
  assert.equal(calendar.isTradingDay('NYSE', 'not-a-date'), false);
});

test('WeekdayTradingCalendar treats every weekday as a session', () => {
  const calendar = new WeekdayTradingCalendar();
  assert.equal(calendar.isTradingDay('NYSE', '2026-04-03'), true);
  assert.equal(calendar.isTradingDay('NYSE', '2026-04-04'), false);
});
