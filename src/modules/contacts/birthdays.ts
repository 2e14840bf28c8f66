const DAY_MS = 24 * 60 * 60 * 1000;

export const BIRTHDAY_WINDOW_DAYS = 7;

export const isLeapYear = (year: number): boolean =>
  (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;

const pad = (value: number): string => value.toString().padStart(2, '0');

const startOfUtcDay = (date: Date): number =>
  Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());

/**
 * `MM-DD` keys of the window starting `today` (UTC). In a non-leap year the
 * window also carries `02-29` when it covers Feb 28.
 */
export const birthdayWindowKeys = (today: Date, days: number = BIRTHDAY_WINDOW_DAYS): string[] => {
  const start = startOfUtcDay(today);
  const keys: string[] = [];

  for (let offset = 0; offset < days; offset++) {
    const day = new Date(start + offset * DAY_MS);
    const month = day.getUTCMonth() + 1;
    const date = day.getUTCDate();
    keys.push(`${pad(month)}-${pad(date)}`);

    if (month === 2 && date === 28 && !isLeapYear(day.getUTCFullYear())) {
      keys.push('02-29');
    }
  }

  return keys;
};

/**
 * Whole days from `today` (UTC) to the next occurrence of the birthday, 0 when it is today
 */
export const daysUntilBirthday = (birthDate: string, today: Date): number => {
  const [, month, day] = birthDate.split('-').map(Number);
  const start = startOfUtcDay(today);

  const occurrence = (year: number): number => {
    const observedDay = month === 2 && day === 29 && !isLeapYear(year) ? 28 : day;
    return Date.UTC(year, month - 1, observedDay);
  };

  const year = today.getUTCFullYear();
  const next = occurrence(year) >= start ? occurrence(year) : occurrence(year + 1);

  return Math.round((next - start) / DAY_MS);
};
