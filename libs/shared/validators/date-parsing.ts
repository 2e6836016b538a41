type FieldOrder = 'dmy' | 'ymd' | 'mdy';

interface DatePattern {
  pattern: RegExp;
  order: FieldOrder;
}

interface DateTimePattern extends DatePattern {
  twelveHour: boolean;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/** Tried in order; the first calendar-valid match wins. */
const DATE_PATTERNS: DatePattern[] = [
  { pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, order: 'dmy' },
  { pattern: /^(\d{1,2})-(\d{1,2})-(\d{4})$/, order: 'dmy' },
  { pattern: /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/, order: 'dmy' },
  { pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})$/, order: 'ymd' },
  { pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, order: 'mdy' },
];

const DATE_TIME_PATTERNS: DateTimePattern[] = [
  { pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})\s+(\d{1,2}):(\d{2})$/, order: 'dmy', twelveHour: false },
  { pattern: /^(\d{1,2})-(\d{1,2})-(\d{4})\s+(\d{1,2}):(\d{2})$/, order: 'dmy', twelveHour: false },
  { pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})\s+(\d{1,2}):(\d{2})$/, order: 'ymd', twelveHour: false },
  { pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})\s+(\d{1,2}):(\d{2})\s*([AaPp][Mm])$/, order: 'dmy', twelveHour: true },
];

function pickFields(match: RegExpMatchArray, order: FieldOrder): { year: number; month: number; day: number } {
  const [first, second, third] = [Number(match[1]), Number(match[2]), Number(match[3])];
  switch (order) {
    case 'dmy':
      return { day: first, month: second, year: third };
    case 'mdy':
      return { month: first, day: second, year: third };
    case 'ymd':
      return { year: first, month: second, day: third };
  }
}

/** Builds a local date, rejecting overflowed values such as 31/02. */
export function buildLocalDate(year: number, month: number, day: number, hour = 0, minute = 0): Date | null {
  if (hour > 23 || minute > 59) return null;
  const date = new Date(year, month - 1, day, hour, minute);
  const matches =
    date.getFullYear() === year &&
    date.getMonth() === month - 1 &&
    date.getDate() === day;
  return matches ? date : null;
}

export function parseCalendarDate(value: string): Date | null {
  for (const { pattern, order } of DATE_PATTERNS) {
    const match = value.match(pattern);
    if (!match) continue;
    const { year, month, day } = pickFields(match, order);
    const date = buildLocalDate(year, month, day);
    if (date) return date;
  }
  return null;
}

function toTwentyFourHour(hour: number, meridiem: string): number | null {
  if (hour < 1 || hour > 12) return null;
  const isPm = meridiem.toLowerCase() === 'pm';
  if (hour === 12) return isPm ? 12 : 0;
  return isPm ? hour + 12 : hour;
}

export function parseDateTime(value: string): Date | null {
  for (const { pattern, order, twelveHour } of DATE_TIME_PATTERNS) {
    const match = value.match(pattern);
    if (!match) continue;
    const { year, month, day } = pickFields(match, order);
    const rawHour = Number(match[4]);
    const hour = twelveHour ? toTwentyFourHour(rawHour, match[6]) : rawHour;
    if (hour === null) continue;
    const date = buildLocalDate(year, month, day, hour, Number(match[5]));
    if (date) return date;
  }
  return null;
}

export function startOfTomorrow(now: Date): Date {
  return new Date(now.getFullYear(), now.getMonth(), now.getDate() + 1);
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

const pad = (value: number) => String(value).padStart(2, '0');

/** DD/MM/YYYY */
export function formatCalendarDate(date: Date): string {
  return `${pad(date.getDate())}/${pad(date.getMonth() + 1)}/${date.getFullYear()}`;
}

/** YYYY-MM-DD HH:mm:ss */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
