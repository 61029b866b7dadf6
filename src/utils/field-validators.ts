import { ValidationError } from '../errors/validation.error';
import usStateCodes from '../definitions/us-state-codes.json';

const US_STATE_CODES: ReadonlySet<string> = new Set(usStateCodes);

const CYRILLIC = /[\u0400-\u04FF]/;
const NAME_CHARS = /^[A-Za-z .'-]+$/;
const ADDRESS_CHARS = /^[A-Za-z0-9 .,\-#&/]+$/;
const CITY_CHARS = /^[A-Za-z '-]+$/;
const ZIP_PATTERN = /^\d{5}(-\d{4})?$/;

export const MAX_WEIGHT_LBS = 150;
export const MAX_DIMENSION_INCHES = 108;
const MIN_MEASURE = 0.1;

function requireLatin(value: string, field: string, example: string): void {
  if (CYRILLIC.test(value)) {
    throw new ValidationError(
      field,
      `Use Latin letters only. Example: ${example}`,
    );
  }
}

function checkLength(
  value: string,
  field: string,
  label: string,
  min: number,
  max: number,
): void {
  if (value.length < min) {
    throw new ValidationError(
      field,
      `${label} is too short (minimum ${min} characters)`,
    );
  }
  if (value.length > max) {
    throw new ValidationError(
      field,
      `${label} is too long (maximum ${max} characters)`,
    );
  }
}

export function validateName(raw: string, field: string): string {
  const name = raw.trim();
  requireLatin(name, field, 'John Smith');
  checkLength(name, field, 'Name', 2, 50);
  if (!NAME_CHARS.test(name)) {
    throw new ValidationError(
      field,
      'Only letters, spaces, dots, hyphens and apostrophes are allowed',
    );
  }
  return name;
}

export function validateAddress(raw: string, field: string): string {
  const address = raw.trim();
  requireLatin(address, field, '123 Main St');
  checkLength(address, field, 'Address', 3, 100);
  if (!ADDRESS_CHARS.test(address)) {
    throw new ValidationError(
      field,
      'Only Latin letters, digits and . , - # & / are allowed',
    );
  }
  return address;
}

export function validateCity(raw: string, field: string): string {
  const city = raw.trim();
  requireLatin(city, field, 'New York');
  checkLength(city, field, 'City', 2, 50);
  if (!CITY_CHARS.test(city)) {
    throw new ValidationError(
      field,
      'Only letters, spaces, hyphens and apostrophes are allowed',
    );
  }
  return city;
}

export function validateStateCode(raw: string, field: string): string {
  const state = raw.trim().toUpperCase();
  if (state.length !== 2) {
    throw new ValidationError(
      field,
      'Enter a 2-letter state code (e.g. CA, NY, TX)',
    );
  }
  if (!/^[A-Z]{2}$/.test(state)) {
    throw new ValidationError(field, 'State code must contain letters only');
  }
  if (!US_STATE_CODES.has(state)) {
    throw new ValidationError(field, `Unknown state code: ${state}`);
  }
  return state;
}

export function validateZip(raw: string, field: string): string {
  const zip = raw.trim();
  if (!ZIP_PATTERN.test(zip)) {
    throw new ValidationError(
      field,
      'Invalid ZIP format. Enter 5 digits (e.g. 12345) or ZIP+4',
    );
  }
  return zip;
}

/** Normalizes to +1XXXXXXXXXX for 10-digit numbers. */
export function validatePhone(raw: string, field: string): string {
  const phone = raw.trim();
  if (!phone || !/^[0-9+]/.test(phone)) {
    throw new ValidationError(
      field,
      'Phone number must start with + or a digit',
    );
  }

  const digits = phone.replace(/\D/g, '');
  if (digits.length < 10 || digits.length > 11) {
    throw new ValidationError(
      field,
      'Enter a 10-digit phone number (e.g. 1234567890)',
    );
  }

  if (digits.length === 10) return `+1${digits}`;
  return `+${digits}`;
}

function parseMeasure(raw: string, field: string): number {
  const trimmed = raw.trim();
  const value = trimmed === '' ? Number.NaN : Number(trimmed);
  if (!Number.isFinite(value)) {
    throw new ValidationError(field, 'Enter a number (e.g. 5 or 5.5)');
  }
  return value;
}

export function validateWeight(raw: string, field: string): number {
  const weight = parseMeasure(raw, field);
  if (weight <= 0) {
    throw new ValidationError(field, 'Weight must be greater than 0');
  }
  if (weight < MIN_MEASURE) {
    throw new ValidationError(field, `Minimum weight is ${MIN_MEASURE} lb`);
  }
  if (weight > MAX_WEIGHT_LBS) {
    throw new ValidationError(
      field,
      `Maximum weight is ${MAX_WEIGHT_LBS} lb`,
    );
  }
  return weight;
}

export function validateDimension(
  raw: string,
  field: string,
  label: string,
): number {
  const dimension = parseMeasure(raw, field);
  if (dimension <= 0) {
    throw new ValidationError(field, `${label} must be greater than 0`);
  }
  if (dimension < MIN_MEASURE) {
    throw new ValidationError(
      field,
      `Minimum ${label.toLowerCase()} is ${MIN_MEASURE} in`,
    );
  }
  if (dimension > MAX_DIMENSION_INCHES) {
    throw new ValidationError(
      field,
      `Maximum ${label.toLowerCase()} is ${MAX_DIMENSION_INCHES} in`,
    );
  }
  return dimension;
}
