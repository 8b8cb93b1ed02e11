// ============================================
// ANSWER VALIDATORS
// ============================================
// One validator per question. A validator normalizes the raw text and either
// returns the typed value or the fixed guidance message for that question.

import {
  LICENSE_STATUSES,
  LICENSE_TYPES,
  VEHICLE_USES,
  type ConversationState,
  type LicenseStatus,
  type LicenseType,
  type ValidatedValue,
  type ValidationResult,
  type VehicleIdentity,
  type VehicleUse,
} from '../types/conversation.js';

export interface ValidateOptions {
  /** Clock for the vehicle-year upper bound */
  now?: Date;
}

type Validator<T extends ValidatedValue> = (text: string, options: ValidateOptions) => ValidationResult<T>;

export const VALIDATION_MESSAGES = {
  zip: 'Please provide a valid 5-digit zip code.',
  name: 'Please provide your full name (first and last).',
  email: 'Please provide a valid email address.',
  vehicleInfo: "Please provide either a 17-character VIN or 'Year Make Body-Type'.",
  vehicleUse: 'Please choose: commuting, commercial, farming, or business.',
  yesNo: 'Please answer Yes or No.',
  commuteDays: 'Please enter a number between 1 and 7.',
  commuteMiles: 'Please enter the number of miles (1-999).',
  annualMileage: 'Please enter annual mileage (e.g., 12000).',
  licenseType: 'Please choose: Foreign, Personal, or Commercial.',
  licenseStatus: 'Please choose: Valid or Suspended.',
} as const;

export const MIN_VEHICLE_YEAR = 1900;

const YES_WORDS = new Set(['yes', 'y', 'yeah', 'yep', 'sure', 'ok', 'okay']);
const NO_WORDS = new Set(['no', 'n', 'nope', 'nah']);

const ZIP_PATTERN = /^[0-9]{5}$/;
const EMAIL_PATTERN = /^[^@]+@[^@]+\.[^@]+$/;
// 17 characters, I/O/Q never appear in a VIN
const VIN_PATTERN = /^[A-HJ-NPR-Z0-9]{17}$/;
const INTEGER_PATTERN = /^[+-]?[0-9]+$/;

function ok<T>(value: T): ValidationResult<T> {
  return { ok: true, value };
}

function fail(error: string): { ok: false; error: string } {
  return { ok: false, error };
}

function parseInteger(text: string): number | null {
  if (!INTEGER_PATTERN.test(text)) return null;
  const n = Number.parseInt(text, 10);
  return Number.isSafeInteger(n) ? n : null;
}

/** Capitalizes the first letter of every alphabetic run: "f-150" -> "F-150", "ŠKODA" -> "Škoda" */
export function titleCase(text: string): string {
  return text
    .toLowerCase()
    .replace(/(^|\P{L})(\p{L})/gu, (_m, before: string, letter: string) => before + letter.toUpperCase());
}

/** Splits on whitespace into at most `limit` parts, the last one keeping the remainder */
function splitWords(text: string, limit: number): string[] {
  const parts: string[] = [];
  let rest = text.trim();
  while (rest.length > 0 && parts.length < limit - 1) {
    const match = /\s+/.exec(rest);
    if (!match) break;
    parts.push(rest.slice(0, match.index));
    rest = rest.slice(match.index + match[0].length);
  }
  if (rest.length > 0) parts.push(rest);
  return parts;
}

function integerInRange(min: number, max: number, message: string): Validator<number> {
  return (text) => {
    const n = parseInteger(text.trim());
    if (n !== null && n >= min && n <= max) {
      return ok(n);
    }
    return fail(message);
  };
}

function oneOf<T extends string>(values: readonly T[], message: string): Validator<T> {
  return (text) => {
    const lower = text.trim().toLowerCase();
    const match = values.find((v) => v === lower);
    return match ? ok(match) : fail(message);
  };
}

export const validateZip: Validator<string> = (text) => {
  const txt = text.trim();
  return ZIP_PATTERN.test(txt) ? ok(txt) : fail(VALIDATION_MESSAGES.zip);
};

export const validateName: Validator<string> = (text) => {
  const txt = text.trim();
  const tokens = txt.split(/\s+/).filter((t) => t.length > 0);
  return tokens.length >= 2 ? ok(txt) : fail(VALIDATION_MESSAGES.name);
};

export const validateEmail: Validator<string> = (text) => {
  const txt = text.trim().toLowerCase();
  return EMAIL_PATTERN.test(txt) ? ok(txt) : fail(VALIDATION_MESSAGES.email);
};

export const validateVehicleInfo: Validator<VehicleIdentity> = (text, options) => {
  const vin = text.trim().toUpperCase();
  if (VIN_PATTERN.test(vin)) {
    return ok({ vin });
  }

  const parts = splitWords(text, 3);
  if (parts.length === 3) {
    const year = parseInteger(parts[0]);
    const maxYear = (options.now ?? new Date()).getUTCFullYear() + 1;
    if (year !== null && year >= MIN_VEHICLE_YEAR && year <= maxYear) {
      return ok({
        year,
        make: titleCase(parts[1]),
        bodyType: titleCase(parts[2]),
      });
    }
  }
  return fail(VALIDATION_MESSAGES.vehicleInfo);
};

export const validateVehicleUse: Validator<VehicleUse> = oneOf(VEHICLE_USES, VALIDATION_MESSAGES.vehicleUse);

export const validateYesNo: Validator<boolean> = (text) => {
  const txt = text.trim().toLowerCase();
  if (YES_WORDS.has(txt)) return ok(true);
  if (NO_WORDS.has(txt)) return ok(false);
  return fail(VALIDATION_MESSAGES.yesNo);
};

export const validateCommuteDays = integerInRange(1, 7, VALIDATION_MESSAGES.commuteDays);

export const validateCommuteMiles = integerInRange(1, 999, VALIDATION_MESSAGES.commuteMiles);

const mileageInRange = integerInRange(1, 499_999, VALIDATION_MESSAGES.annualMileage);

export const validateAnnualMileage: Validator<number> = (text, options) =>
  mileageInRange(text.trim().replace(/,/g, ''), options);

export const validateLicenseType: Validator<LicenseType> = oneOf(LICENSE_TYPES, VALIDATION_MESSAGES.licenseType);

export const validateLicenseStatus: Validator<LicenseStatus> = oneOf(
  LICENSE_STATUSES,
  VALIDATION_MESSAGES.licenseStatus,
);

// start, vehicle_intro and completed take any input
const VALIDATORS: Partial<Record<ConversationState, Validator<ValidatedValue>>> = {
  collecting_zip: validateZip,
  collecting_name: validateName,
  collecting_email: validateEmail,
  collecting_vehicle_info: validateVehicleInfo,
  collecting_vehicle_use: validateVehicleUse,
  collecting_blind_spot: validateYesNo,
  collecting_commute_days: validateCommuteDays,
  collecting_commute_miles: validateCommuteMiles,
  collecting_annual_mileage: validateAnnualMileage,
  ask_more_vehicles: validateYesNo,
  collecting_license_type: validateLicenseType,
  collecting_license_status: validateLicenseStatus,
};

export function hasValidator(state: ConversationState): boolean {
  return VALIDATORS[state] !== undefined;
}

export function validate(
  state: ConversationState,
  rawInput: string,
  options: ValidateOptions = {},
): ValidationResult<ValidatedValue> {
  const validator = VALIDATORS[state];
  if (validator) {
    return validator(rawInput, options);
  }
  return ok(rawInput);
}
