import type { MarketCalendar, SessionStatus } from '../../shared/src/index.js';

const MARKET_TZ = 'America/New_York';

// Seconds since midnight, Eastern time
const PREMARKET_OPEN = 4 * 3600;
const MARKET_OPEN = 9 * 3600 + 30 * 60;
const MARKET_CLOSE = 16 * 3600;
const AFTERHOURS_CLOSE = 20 * 3600;

interface CalendarDate {
  year: number;
  month: number; // 1-12
  day: number;
}

interface EasternParts extends CalendarDate {
  secondsOfDay: number;
}

const formatter = new Intl.DateTimeFormat('en-US', {
  timeZone: MARKET_TZ,
  year: 'numeric',
  month: '2-digit',
  day: '2-digit',
  hour: '2-digit',
  minute: '2-digit',
  second: '2-digit',
  hourCycle: 'h23',
});

function easternParts(time: Date): EasternParts {
  const values: Record<string, number> = {};
  for (const part of formatter.formatToParts(time)) {
    if (part.type !== 'literal') values[part.type] = parseInt(part.value, 10);
  }
  return {
    year: values.year,
    month: values.month,
    day: values.day,
    secondsOfDay: values.hour * 3600 + values.minute * 60 + values.second,
  };
}

function weekday(date: CalendarDate): number {
  return new Date(Date.UTC(date.year, date.month - 1, date.day)).getUTCDay();
}

function addDays(date: CalendarDate, days: number): CalendarDate {
  const d = new Date(Date.UTC(date.year, date.month - 1, date.day + days));
  return { year: d.getUTCFullYear(), month: d.getUTCMonth() + 1, day: d.getUTCDate() };
}

function dateKey(date: CalendarDate): string {
  return `${date.year}-${String(date.month).padStart(2, '0')}-${String(date.day).padStart(2, '0')}`;
}

function isWeekendDate(date: CalendarDate): boolean {
  const dow = weekday(date);
  return dow === 0 || dow === 6;
}

// Converts an Eastern wall-clock time on `date` into an instant
function easternInstant(date: CalendarDate, secondsOfDay: number): Date {
  const wallAsUtc = Date.UTC(date.year, date.month - 1, date.day) + secondsOfDay * 1000;
  let instant = wallAsUtc;
  // Two passes settle the offset on either side of a DST change
  for (let i = 0; i < 2; i++) {
    const p = easternParts(new Date(instant));
    const observedWall = Date.UTC(p.year, p.month - 1, p.day) + p.secondsOfDay * 1000;
    instant += wallAsUtc - observedWall;
  }
  return new Date(instant);
}

/* =========================
   US federal holidays
   ========================= */
function nthWeekday(year: number, month: number, dow: number, n: number): CalendarDate {
  const first = weekday({ year, month, day: 1 });
  return { year, month, day: 1 + ((dow - first + 7) % 7) + (n - 1) * 7 };
}

function lastWeekday(year: number, month: number, dow: number): CalendarDate {
  const lastDay = new Date(Date.UTC(year, month, 0)).getUTCDate();
  const last = weekday({ year, month, day: lastDay });
  return { year, month, day: lastDay - ((last - dow + 7) % 7) };
}

// Saturday holidays are observed on Friday, Sunday holidays on Monday
function observed(date: CalendarDate): CalendarDate {
  const dow = weekday(date);
  if (dow === 6) return addDays(date, -1);
  if (dow === 0) return addDays(date, 1);
  return date;
}

export function federalHolidays(year: number): Map<string, string> {
  const holidays = new Map<string, string>();
  const fixed = (month: number, day: number, name: string) => {
    const date = { year, month, day };
    holidays.set(dateKey(date), name);
    const obs = observed(date);
    if (dateKey(obs) !== dateKey(date)) holidays.set(dateKey(obs), `${name} (Observed)`);
  };

  fixed(1, 1, "New Year's Day");
  holidays.set(dateKey(nthWeekday(year, 1, 1, 3)), 'Martin Luther King Jr. Day');
  holidays.set(dateKey(nthWeekday(year, 2, 1, 3)), "Washington's Birthday");
  holidays.set(dateKey(lastWeekday(year, 5, 1)), 'Memorial Day');
  if (year >= 2021) fixed(6, 19, 'Juneteenth National Independence Day');
  fixed(7, 4, 'Independence Day');
  holidays.set(dateKey(nthWeekday(year, 9, 1, 1)), 'Labor Day');
  holidays.set(dateKey(nthWeekday(year, 10, 1, 2)), 'Columbus Day');
  fixed(11, 11, 'Veterans Day');
  holidays.set(dateKey(nthWeekday(year, 11, 4, 4)), 'Thanksgiving');
  fixed(12, 25, 'Christmas Day');

  // New Year's Day on a Saturday is observed on December 31
  const nextNewYear = { year: year + 1, month: 1, day: 1 };
  if (weekday(nextNewYear) === 6) {
    holidays.set(`${year}-12-31`, "New Year's Day (Observed)");
  }

  return holidays;
}

export class MarketHours implements MarketCalendar {
  private readonly holidayCache = new Map<number, Map<string, string>>();

  getHolidayName(date: CalendarDate): string | null {
    let holidays = this.holidayCache.get(date.year);
    if (!holidays) {
      holidays = federalHolidays(date.year);
      this.holidayCache.set(date.year, holidays);
    }
    return holidays.get(dateKey(date)) ?? null;
  }

  isTradingDay(date: CalendarDate): boolean {
    return !isWeekendDate(date) && this.getHolidayName(date) === null;
  }

  isMarketOpen(time: Date = new Date()): boolean {
    const parts = easternParts(time);
    return this.isTradingDay(parts) &&
      parts.secondsOfDay >= MARKET_OPEN &&
      parts.secondsOfDay <= MARKET_CLOSE;
  }

  isPreMarket(time: Date = new Date()): boolean {
    const parts = easternParts(time);
    return this.isTradingDay(parts) &&
      parts.secondsOfDay >= PREMARKET_OPEN &&
      parts.secondsOfDay < MARKET_OPEN;
  }

  isAfterHours(time: Date = new Date()): boolean {
    const parts = easternParts(time);
    return this.isTradingDay(parts) &&
      parts.secondsOfDay > MARKET_CLOSE &&
      parts.secondsOfDay <= AFTERHOURS_CLOSE;
  }

  getSessionStatus(time: Date = new Date()): SessionStatus {
    const parts = easternParts(time);
    const isWeekend = isWeekendDate(parts);
    const isHoliday = this.getHolidayName(parts) !== null;
    const isOpen = this.isMarketOpen(time);
    const isPreMarket = this.isPreMarket(time);
    const isAfterHours = this.isAfterHours(time);

    let statusText = 'Market Closed';
    if (isHoliday) statusText = 'Market Closed (Holiday)';
    else if (isWeekend) statusText = 'Market Closed (Weekend)';
    else if (isOpen) statusText = 'Market Open';
    else if (isPreMarket) statusText = 'Pre-Market';
    else if (isAfterHours) statusText = 'After-Hours';

    return {
      isOpen,
      isPreMarket,
      isAfterHours,
      isWeekend,
      isHoliday,
      statusText,
      currentTime: time.toISOString(),
      marketOpen: easternInstant(parts, MARKET_OPEN).toISOString(),
      marketClose: easternInstant(parts, MARKET_CLOSE).toISOString(),
      nextOpen: this.getNextMarketOpen(time).toISOString(),
    };
  }

  getNextMarketOpen(time: Date = new Date()): Date {
    const parts = easternParts(time);
    let candidate: CalendarDate = parts;

    if (parts.secondsOfDay >= MARKET_CLOSE || this.isMarketOpen(time)) {
      candidate = addDays(candidate, 1);
    }
    while (!this.isTradingDay(candidate)) {
      candidate = addDays(candidate, 1);
    }

    return easternInstant(candidate, MARKET_OPEN);
  }

  getTimeUntilMarketOpen(time: Date = new Date()): number {
    return this.getNextMarketOpen(time).getTime() - time.getTime();
  }
}
