import {
  addDays,
  formatCalendarDate,
  parseCalendarDate,
  parseDateTime,
  startOfTomorrow,
} from './date-parsing';

export type ValidationResult<T = string> = { ok: true; value: T } | { ok: false; error: string };

const ok = <T>(value: T): ValidationResult<T> => ({ ok: true, value });
const fail = (error: string): ValidationResult<never> => ({ ok: false, error });

export const NAME_LENGTH = { min: 2, max: 50 };
export const COMPANY_NAME_MAX_LENGTH = 100;
export const QUANTITY_RANGE = { min: 1, max: 100_000 };
export const MESSAGE_LENGTH = { min: 5, max: 1000 };
export const DELIVERY_WINDOW_DAYS = 365;
export const BUSINESS_HOURS = { start: 8, end: 18 };

const NAME_PATTERN = /^[a-zA-Z\s\-']+$/;
const COMPANY_NAME_PATTERN = /^[a-zA-Z0-9\s\-'&.,()]+$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
const PHONE_PATTERN = /^\+?[0-9]{6,15}$/;
const PHONE_SEPARATORS = /[\s\-()]/g;

/** Length in characters; an emoji counts once. */
const charCount = (value: string): number => [...value].length;

/** Upper-cases the first letter of every word; "o'brien" becomes "O'Brien". */
export function toTitleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_match, prefix: string, letter: string) => prefix + letter.toUpperCase());
}

export function validateName(raw: string): ValidationResult {
  const name = raw.trim();
  if (charCount(name) < NAME_LENGTH.min) return fail('Name must be at least 2 characters long');
  if (charCount(name) > NAME_LENGTH.max) return fail('Name cannot exceed 50 characters');
  if (!NAME_PATTERN.test(name)) return fail('Name can only contain letters, spaces, hyphens, and apostrophes');
  return ok(toTitleCase(name));
}

/** Empty input is valid: the company is optional. */
export function validateCompanyName(raw: string): ValidationResult {
  const company = raw.trim();
  if (!company) return ok('');
  if (charCount(company) > COMPANY_NAME_MAX_LENGTH) return fail('Company name cannot exceed 100 characters');
  if (!COMPANY_NAME_PATTERN.test(company)) return fail('Company name contains invalid characters');
  return ok(company);
}

export function validateQuantity(raw: string): ValidationResult<number> {
  const text = raw.trim();
  if (!INTEGER_PATTERN.test(text)) return fail('Please enter a valid whole number (e.g. 100)');
  const quantity = Number(text);
  if (quantity < QUANTITY_RANGE.min) return fail('Quantity must be at least 1');
  if (quantity > QUANTITY_RANGE.max) return fail('Quantity cannot exceed 100,000');
  return ok(quantity);
}

/**
 * Accepts DD/MM/YYYY, DD-MM-YYYY, DD.MM.YYYY, YYYY-MM-DD and MM/DD/YYYY, in that
 * order, so "03/04/2031" is read as 3 April. The result is always DD/MM/YYYY.
 */
export function validateDeliveryDate(raw: string, now: Date = new Date()): ValidationResult {
  const date = parseCalendarDate(raw.trim());
  if (!date) {
    return fail('Please enter a valid date in DD/MM/YYYY format (e.g. 25/12/2030)');
  }
  if (date.getTime() < startOfTomorrow(now).getTime()) {
    return fail('Delivery date must be tomorrow or later');
  }
  if (date.getTime() > addDays(now, DELIVERY_WINDOW_DAYS).getTime()) {
    return fail('Delivery date cannot be more than one year from now');
  }
  return ok(formatCalendarDate(date));
}

/** E-mails come back lower-cased, phone numbers exactly as typed (trimmed). */
export function validateContactInfo(raw: string): ValidationResult {
  const contact = raw.trim();
  if (!contact) return fail('Please provide a phone number or an email address');
  if (EMAIL_PATTERN.test(contact)) return ok(contact.toLowerCase());
  if (PHONE_PATTERN.test(contact.replace(PHONE_SEPARATORS, ''))) return ok(contact);
  return fail('Please enter a valid phone number (e.g. +1234567890) or email address (e.g. name@example.com)');
}

/**
 * Strictly formatted moments must lie in the future and get a "will confirm" note
 * on weekends or outside business hours. Anything else of five or more characters
 * is kept as a free-form preference.
 */
export function validateDatetimePreference(raw: string, now: Date = new Date()): ValidationResult {
  const text = raw.trim();
  const moment = parseDateTime(text);

  if (moment) {
    if (moment.getTime() <= now.getTime()) {
      return fail('Please choose a date and time in the future');
    }
    const weekday = moment.getDay();
    if (weekday === 0 || weekday === 6) {
      return ok(`${text} (Weekend - will confirm availability)`);
    }
    const hour = moment.getHours();
    if (hour < BUSINESS_HOURS.start || hour > BUSINESS_HOURS.end) {
      return ok(`${text} (Outside business hours - will confirm availability)`);
    }
    return ok(text);
  }

  if (charCount(text) >= 5) {
    return ok(`${text} (Will confirm specific time)`);
  }
  return fail('Please tell us when suits you (e.g. 25/12/2030 14:30 or "next Monday afternoon")');
}

export function validateMessageText(raw: string): ValidationResult {
  const text = raw.trim();
  if (charCount(text) < MESSAGE_LENGTH.min) return fail('Message is too short (minimum 5 characters)');
  if (charCount(text) > MESSAGE_LENGTH.max) return fail('Message is too long (maximum 1000 characters)');
  return ok(text);
}

export function validateServiceSelection(input: string, serviceNames: readonly string[]): ValidationResult {
  const query = input.trim().toLowerCase();
  if (!query) return fail('Please choose a service from the list');

  const exact = serviceNames.find((name) => name.toLowerCase() === query);
  if (exact) return ok(exact);

  const partial = serviceNames.filter((name) => name.toLowerCase().includes(query));
  if (partial.length === 1) return ok(partial[0]);
  if (partial.length > 1) return fail('Several services match that. Please be more specific or use the number');
  return fail('Service not found. Please choose a number or a name from the list');
}

/** A 1-based list position takes precedence over a name. */
export function resolveServiceChoice(input: string, serviceNames: readonly string[]): ValidationResult {
  const text = input.trim();
  if (/^\d+$/.test(text)) {
    const index = Number(text) - 1;
    if (index >= 0 && index < serviceNames.length) return ok(serviceNames[index]);
    return fail(`Please choose a number between 1 and ${serviceNames.length}`);
  }
  return validateServiceSelection(text, serviceNames);
}
