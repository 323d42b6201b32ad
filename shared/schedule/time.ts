const TIME_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const SECONDS_PER_MINUTE = 60;
const SECONDS_PER_HOUR = 3600;
const MS_PER_DAY = 86_400_000;

export interface CalendarDate {
  year: number;
  month: number; // 1-12
  day: number;
}

interface ZonedParts extends CalendarDate {
  hour: number;
  minute: number;
  second: number;
}

const pad = (value: number, width = 2) => String(value).padStart(width, '0');

/**
 * Parses `HH:MM:SS` or `HH:MM` into seconds since midnight.
 */
export const parseTimeOfDay = (raw: string): number | null => {
  const match = TIME_PATTERN.exec(raw.trim());
  if (!match) {
    return null;
  }

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = match[3] === undefined ? 0 : Number(match[3]);
  if (hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }

  return hours * SECONDS_PER_HOUR + minutes * SECONDS_PER_MINUTE + seconds;
};

export const formatTimeOfDay = (secondsOfDay: number): string => {
  const hours = Math.floor(secondsOfDay / SECONDS_PER_HOUR);
  const minutes = Math.floor((secondsOfDay % SECONDS_PER_HOUR) / SECONDS_PER_MINUTE);
  const seconds = secondsOfDay % SECONDS_PER_MINUTE;
  return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;
};

/**
 * Parses a real calendar date written as `YYYY-MM-DD`.
 */
export const parseIsoDate = (raw: string): CalendarDate | null => {
  const match = DATE_PATTERN.exec(raw.trim());
  if (!match) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1) {
    return null;
  }

  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day > daysInMonth) {
    return null;
  }

  return { year, month, day };
};

export const formatIsoDate = ({ year, month, day }: CalendarDate): string =>
  `${pad(year, 4)}-${pad(month)}-${pad(day)}`;

export const formatDisplayDate = (isoDate: string): string => {
  const parsed = parseIsoDate(isoDate);
  if (!parsed) {
    return isoDate;
  }
  return `${pad(parsed.day)}/${pad(parsed.month)}/${pad(parsed.year, 4)}`;
};

const formatterCache = new Map<string, Intl.DateTimeFormat>();

const getZoneFormatter = (timeZone: string): Intl.DateTimeFormat => {
  let formatter = formatterCache.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatterCache.set(timeZone, formatter);
  }
  return formatter;
};

const getZonedParts = (instant: number, timeZone: string): ZonedParts => {
  const values: Partial<Record<Intl.DateTimeFormatPartTypes, number>> = {};
  for (const part of getZoneFormatter(timeZone).formatToParts(new Date(instant))) {
    if (part.type !== 'literal') {
      values[part.type] = Number(part.value);
    }
  }

  return {
    year: values.year ?? 1970,
    month: values.month ?? 1,
    day: values.day ?? 1,
    hour: values.hour ?? 0,
    minute: values.minute ?? 0,
    second: values.second ?? 0,
  };
};

const getZoneOffsetMs = (instant: number, timeZone: string): number => {
  const parts = getZonedParts(instant, timeZone);
  const wallAsUtc = Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second);
  return wallAsUtc - Math.floor(instant / 1000) * 1000;
};

export const isValidTimeZone = (timeZone: string): boolean => {
  if (!timeZone.trim()) {
    return false;
  }
  try {
    getZoneFormatter(timeZone);
    return true;
  } catch {
    return false;
  }
};

// First instant of the offset that follows a forward clock change, searched to the second.
const findTransition = (before: number, after: number, offsetAfter: number, timeZone: string): number => {
  let low = before;
  let high = after;
  while (high - low > 1000) {
    const mid = low + Math.floor((high - low) / 2000) * 1000;
    if (getZoneOffsetMs(mid, timeZone) === offsetAfter) {
      high = mid;
    } else {
      low = mid;
    }
  }
  return high;
};

/**
 * Epoch milliseconds of a wall-clock date and time in the given IANA zone.
 * A time repeated by a backward clock change resolves to its first occurrence;
 * a time skipped by a forward change moves forward to the end of the gap.
 * Returns null when either value does not parse.
 */
export const zonedDateTimeToInstant = (date: string, time: string, timeZone: string): number | null => {
  const calendarDate = parseIsoDate(date);
  const secondsOfDay = parseTimeOfDay(time);
  if (!calendarDate || secondsOfDay === null) {
    return null;
  }

  const wallAsUtc =
    Date.UTC(calendarDate.year, calendarDate.month - 1, calendarDate.day) + secondsOfDay * 1000;
  const offsetBefore = getZoneOffsetMs(wallAsUtc - MS_PER_DAY, timeZone);
  const offsetAfter = getZoneOffsetMs(wallAsUtc + MS_PER_DAY, timeZone);

  const candidates = [wallAsUtc - offsetBefore, wallAsUtc - offsetAfter].filter(
    (instant) => getZoneOffsetMs(instant, timeZone) === wallAsUtc - instant,
  );
  if (candidates.length > 0) {
    return Math.min(...candidates);
  }

  const gapStart = Math.min(wallAsUtc - offsetBefore, wallAsUtc - offsetAfter);
  const gapEnd = Math.max(wallAsUtc - offsetBefore, wallAsUtc - offsetAfter);
  return findTransition(gapStart, gapEnd, offsetAfter, timeZone);
};

/**
 * `DD/MM HH:MM:SS` in the given zone, as shown on the board's clock.
 */
export const formatZonedDateTime = (instant: number, timeZone: string): string => {
  const parts = getZonedParts(instant, timeZone);
  return `${pad(parts.day)}/${pad(parts.month)} ${pad(parts.hour)}:${pad(parts.minute)}:${pad(parts.second)}`;
};

/**
 * Today's date in the given zone, as `YYYY-MM-DD`.
 */
export const getZonedIsoDate = (instant: number, timeZone: string): string => formatIsoDate(getZonedParts(instant, timeZone));

export const formatDuration = (ms: number): string => {
  const sign = ms < 0 ? '-' : '';
  const totalSeconds = Math.floor(Math.abs(ms) / 1000);
  const hours = Math.floor(totalSeconds / SECONDS_PER_HOUR);
  const minutes = Math.floor((totalSeconds % SECONDS_PER_HOUR) / SECONDS_PER_MINUTE);
  const seconds = totalSeconds % SECONDS_PER_MINUTE;

  if (hours > 0) {
    return `${sign}${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;
  }
  return `${sign}${pad(minutes)}:${pad(seconds)}`;
};
