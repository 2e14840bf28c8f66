/**
 * Unit Tests: birthday window helpers
 */

import { describe, it, expect } from 'vitest';
import { birthdayWindowKeys, daysUntilBirthday, isLeapYear } from '../../modules/contacts/birthdays';

describe('birthdayWindowKeys', () => {
  it('covers today and the next six days', () => {
    expect(birthdayWindowKeys(new Date('2026-06-10T15:30:00Z'))).toEqual([
      '06-10',
      '06-11',
      '06-12',
      '06-13',
      '06-14',
      '06-15',
      '06-16',
    ]);
  });

  it('wraps around the end of the year', () => {
    expect(birthdayWindowKeys(new Date('2026-12-30T00:00:00Z'))).toEqual([
      '12-30',
      '12-31',
      '01-01',
      '01-02',
      '01-03',
      '01-04',
      '01-05',
    ]);
  });

  it('adds Feb 29 next to Feb 28 in a non-leap year', () => {
    expect(birthdayWindowKeys(new Date('2027-02-25T00:00:00Z'))).toEqual([
      '02-25',
      '02-26',
      '02-27',
      '02-28',
      '02-29',
      '03-01',
      '03-02',
      '03-03',
    ]);
  });

  it('keeps the calendar as is in a leap year', () => {
    expect(birthdayWindowKeys(new Date('2028-02-25T00:00:00Z'))).toEqual([
      '02-25',
      '02-26',
      '02-27',
      '02-28',
      '02-29',
      '03-01',
      '03-02',
    ]);
  });

  it('uses the UTC calendar day', () => {
    expect(birthdayWindowKeys(new Date('2026-06-10T23:59:59Z'), 1)).toEqual(['06-10']);
  });
});

describe('daysUntilBirthday', () => {
  const today = new Date('2026-12-30T08:00:00Z');

  it('is zero on the birthday', () => {
    expect(daysUntilBirthday('1990-12-30', today)).toBe(0);
  });

  it('counts across the new year', () => {
    expect(daysUntilBirthday('1985-01-02', today)).toBe(3);
  });

  it('points to next year once this year has passed', () => {
    expect(daysUntilBirthday('1985-12-29', today)).toBe(364);
  });

  it('observes Feb 29 on Feb 28 in non-leap years', () => {
    expect(daysUntilBirthday('2000-02-29', new Date('2027-02-25T00:00:00Z'))).toBe(3);
    expect(daysUntilBirthday('2000-02-29', new Date('2028-02-25T00:00:00Z'))).toBe(4);
  });
});

describe('isLeapYear', () => {
  it('follows the Gregorian rules', () => {
    expect(isLeapYear(2028)).toBe(true);
    expect(isLeapYear(2026)).toBe(false);
    expect(isLeapYear(1900)).toBe(false);
    expect(isLeapYear(2000)).toBe(true);
  });
});
