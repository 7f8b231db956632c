/**
 * Date helpers shared by the calendars and the refresh scheduler.
 * Date keys are `YYYY-MM-DD` strings in US/Eastern time.
 */

const DAY_MS = 24 * 60 * 60 * 1000;

function etDateStringFromUnixSeconds(unixSeconds: number): string {
  if (!Number.isFinite(unixSeconds)) return '';
  return new Date(Number(unixSeconds) * 1000).toLocaleDateString('en-CA', {
    timeZone: 'America/New_York',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  });
}

function currentEtDateString(nowUtc: Date = new Date()): string {
  return nowUtc.toLocaleDateString('en-CA', {
    timeZone: 'America/New_York',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  });
}

function parseDateKeyToUtcMs(dateKey: string): number {
  const value = String(dateKey || '').trim();
  const match = value.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) return NaN;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (!Number.isFinite(year) || !Number.isFinite(month) || !Number.isFinite(day)) return NaN;
  return Date.UTC(year, month - 1, day, 0, 0, 0, 0);
}

function addDaysToDateKey(dateKey: string, days: number): string {
  const baseMs = parseDateKeyToUtcMs(dateKey);
  if (!Number.isFinite(baseMs)) return '';
  return new Date(baseMs + Math.trunc(Number(days) || 0) * DAY_MS).toISOString().slice(0, 10);
}

/** True when `dateKey` lies in `[fromKey, fromKey + days]`, both ends inclusive. */
function isDateKeyWithinDays(dateKey: string, fromKey: string, days: number): boolean {
  if (!Number.isFinite(parseDateKeyToUtcMs(dateKey))) return false;
  const endKey = addDaysToDateKey(fromKey, days);
  if (!endKey) return false;
  return dateKey >= fromKey && dateKey <= endKey;
}

/**
 * Extended US equity session: weekdays 04:00–20:00 ET (pre-market through
 * after-hours). Exchange holidays are not modelled.
 */
function isExtendedMarketSession(nowUtc: Date = new Date()): boolean {
  const nowEt = new Date(nowUtc.toLocaleString('en-US', { timeZone: 'America/New_York' }));
  const day = nowEt.getDay();
  if (day === 0 || day === 6) return false;
  const minutes = nowEt.getHours() * 60 + nowEt.getMinutes();
  return minutes >= 4 * 60 && minutes < 20 * 60;
}

export {
  etDateStringFromUnixSeconds,
  currentEtDateString,
  parseDateKeyToUtcMs,
  addDaysToDateKey,
  isDateKeyWithinDays,
  isExtendedMarketSession,
};
